/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Flushing never throws; a failed batch stays buffered for the next attempt.
 * No-op when apiToken is empty.
 */

import { stampEvent, type ILogProvider, type LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Buffer cap; oldest events are dropped past it. Default: 5_000. */
  maxBufferSize?: number;
  /** Merged into every event's fields. */
  baseFields?: Record<string, unknown>;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBufferSize: number;
  private readonly baseFields: Record<string, unknown> | undefined;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  /** Number of failed ingest attempts since construction. */
  failedFlushes = 0;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBufferSize = options.maxBufferSize ?? 5_000;
    this.baseFields = options.baseFields;
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push(stampEvent(event, this.baseFields));

    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.splice(0, this.buffer.length - this.maxBufferSize);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Only clear the events that were in this batch
        this.buffer.splice(0, batch.length);
      } else {
        this.failedFlushes++;
      }
    } catch (err) {
      // Network error: keep the batch for the next flush
      this.failedFlushes++;
      if (this.failedFlushes === 1) {
        console.error(
          `[axiom] ingest failed, buffering events: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  /** Events waiting to be sent. */
  get pending(): number {
    return this.buffer.length;
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
