export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
