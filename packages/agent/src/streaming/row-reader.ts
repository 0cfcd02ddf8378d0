/**
 * Row reader
 *
 * Pull-based, forward-only view over a streamed row response. The reader
 * asks its source for another chunk only when no decoded row is buffered,
 * so memory stays bounded by one chunk's worth of rows.
 *
 * After `nextRow()` has returned null, `err()` tells whether the stream
 * ended cleanly; rows produced before a failure are still delivered first.
 *
 * @packageDocumentation
 */

import { AgentError, ProtocolError, RequestCanceledError, TransportError } from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { RetryReason } from '../retry/reasons.js';
import { JsonRowDecoder } from './json-row-decoder.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Source of body chunks. `next()` resolves null at end of body.
 */
export interface ChunkSource {
  next(): Promise<Uint8Array | null>;
  /** Abort the underlying transfer */
  cancel(reason: AgentError): Promise<void>;
}

export interface RowReaderOptions {
  /** Attribute holding the rows array */
  rowsAttribute: string;
  /** Turns the final metadata into a terminal error, if it reports one */
  errorFromMetadata?: (metadata: Record<string, unknown>) => AgentError | null;
  /** Runs exactly once when the reader ends, fails or is closed */
  onRelease?: () => void;
  logger?: StructuredLogger;
}

// =============================================================================
// RowReader
// =============================================================================

/**
 * @example
 * ```typescript
 * for await (const row of reader) {
 *   console.log(JSON.parse(row.toString()));
 * }
 * if (reader.err()) throw reader.err();
 * console.log(reader.metadata());
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class RowReader implements AsyncIterable<Buffer> {
  private readonly source: ChunkSource;
  private readonly decoder: JsonRowDecoder;
  private readonly errorFromMetadata?: (metadata: Record<string, unknown>) => AgentError | null;
  private readonly logger: StructuredLogger;
  private onRelease: (() => void) | null;

  private rows: Buffer[] = [];
  private ended = false;
  private terminalError: AgentError | null = null;
  private finalMetadata: Record<string, unknown> | null = null;
  private pulling: Promise<void> | null = null;

  constructor(source: ChunkSource, options: RowReaderOptions) {
    this.source = source;
    this.decoder = new JsonRowDecoder(options.rowsAttribute);
    this.errorFromMetadata = options.errorFromMetadata;
    this.onRelease = options.onRelease ?? null;
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * Next row, or null at end of stream (and forever after).
   */
  async nextRow(): Promise<Buffer | null> {
    for (;;) {
      const row = this.rows.shift();
      if (row) {
        return row;
      }
      if (this.ended) {
        return null;
      }
      await this.pull();
    }
  }

  /**
   * Terminal error. Meaningful once `nextRow()` has returned null.
   */
  err(): AgentError | null {
    return this.terminalError;
  }

  /**
   * Top-level attributes other than the rows. Null until the stream ended
   * cleanly.
   */
  metadata(): Record<string, unknown> | null {
    return this.finalMetadata;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /** Decoded rows not yet returned by `nextRow()` */
  get bufferedRows(): number {
    return this.rows.length;
  }

  /**
   * Read until the first row is buffered or the body ends, without
   * consuming anything. Surfaces errors reported before the first row.
   */
  async peek(): Promise<void> {
    while (!this.ended && this.rows.length === 0) {
      await this.pull();
    }
  }

  /**
   * Stop reading and release the transfer. Buffered rows are discarded.
   */
  async close(): Promise<void> {
    if (this.ended) {
      return;
    }
    const reason = new RequestCanceledError('row reader closed');
    this.finish(null);
    this.rows = [];
    await this.source.cancel(reason);
  }

  /**
   * End the stream with an error (deadline, cancellation). Rows already
   * buffered stay readable.
   */
  async abort(error: AgentError): Promise<void> {
    if (this.ended) {
      return;
    }
    this.finish(error);
    await this.source.cancel(error);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    try {
      for (;;) {
        const row = await this.nextRow();
        if (row === null) {
          return;
        }
        yield row;
      }
    } finally {
      await this.close();
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private pull(): Promise<void> {
    if (!this.pulling) {
      this.pulling = this.readChunk().finally(() => {
        this.pulling = null;
      });
    }
    return this.pulling;
  }

  private async readChunk(): Promise<void> {
    let chunk: Uint8Array | null;
    try {
      chunk = await this.source.next();
    } catch (error) {
      if (!this.ended) {
        this.finish(
          error instanceof AgentError
            ? error
            : new TransportError('response stream failed', {
                cause: error,
                retryReason: RetryReason.SOCKET_CLOSED_IN_FLIGHT,
              })
        );
      }
      return;
    }

    if (this.ended) {
      return;
    }

    try {
      if (chunk === null) {
        this.decoder.end();
      } else {
        this.decoder.push(chunk);
      }
    } catch (error) {
      this.rows.push(...this.decoder.takeRows());
      this.finish(error instanceof AgentError ? error : new ProtocolError('malformed response', { cause: error }));
      return;
    }

    this.rows.push(...this.decoder.takeRows());
    if (chunk === null) {
      const metadata = this.decoder.metadata();
      const reported = this.errorFromMetadata?.(metadata) ?? null;
      if (!reported) {
        this.finalMetadata = metadata;
      }
      this.finish(reported);
    }
  }

  private finish(error: AgentError | null): void {
    this.ended = true;
    if (error && !this.terminalError) {
      this.terminalError = error;
      this.logger.debug('row stream ended with {code}', { code: error.code, message: error.message });
    }
    const release = this.onRelease;
    this.onRelease = null;
    release?.();
  }
}
