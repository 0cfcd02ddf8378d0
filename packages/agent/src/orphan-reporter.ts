/**
 * Orphaned response reporter
 *
 * A response that arrives after its request was canceled or timed out has
 * nobody waiting for it. Such responses are counted, a bounded sample is
 * kept, and the lot is logged once per interval.
 *
 * @packageDocumentation
 */

import { createNoopLogger, type StructuredLogger } from './logging/index.js';

export interface OrphanRecord {
  node: string;
  opcode: number;
  opaque: number;
  status: number;
  /** Epoch milliseconds */
  receivedAt: number;
}

export interface OrphanReporterOptions {
  intervalMs: number;
  sampleSize: number;
  logger?: StructuredLogger;
  now?: () => number;
}

export class OrphanReporter {
  private readonly intervalMs: number;
  private readonly sampleSize: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private sample: OrphanRecord[] = [];
  private count = 0;
  private total = 0;

  constructor(options: OrphanReporterOptions) {
    this.intervalMs = options.intervalMs;
    this.sampleSize = options.sampleSize;
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? Date.now;
  }

  /** Orphans seen since the reporter was created */
  get totalOrphans(): number {
    return this.total;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.flush(), this.intervalMs);
  }

  add(record: Omit<OrphanRecord, 'receivedAt'>): void {
    this.count++;
    this.total++;
    if (this.sample.length < this.sampleSize) {
      this.sample.push({ ...record, receivedAt: this.now() });
    }
  }

  /**
   * Log what was collected since the last flush, if anything.
   */
  flush(): void {
    if (this.count === 0) {
      return;
    }
    this.logger.warn('{count} orphaned responses in the last {intervalMs}ms', {
      count: this.count,
      intervalMs: this.intervalMs,
      sample: this.sample,
    });
    this.count = 0;
    this.sample = [];
  }

  /**
   * Stop the interval and flush what is left.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.flush();
  }
}
