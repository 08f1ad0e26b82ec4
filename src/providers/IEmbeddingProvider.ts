/**
 * Embedding provider interface.
 * Turns entry text into vectors for the semantic search index.
 */

export interface IEmbeddingProvider {
  /** Vector length produced by `generate`. */
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** One vector per input, in input order. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
