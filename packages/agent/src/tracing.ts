/**
 * Request tracing
 *
 * The agent reports one span per operation (and one child span per attempt)
 * to a pluggable tracer. The no-op tracer is the default.
 *
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';

// =============================================================================
// TYPES
// =============================================================================

export type SpanStatus = 'UNSET' | 'OK' | 'ERROR';

export type AttributeValue = string | number | boolean;

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: Readonly<Record<string, AttributeValue>>;
}

/**
 * A span reported by the agent.
 */
export interface RequestSpan {
  readonly spanId: string;
  readonly traceId: string;
  setAttribute(key: string, value: AttributeValue): this;
  setStatus(status: SpanStatus, message?: string): this;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): this;
  end(endTime?: number): void;
  isRecording(): boolean;
}

export interface SpanOptions {
  parent?: RequestSpan;
  attributes?: Record<string, AttributeValue>;
  startTime?: number;
}

/**
 * Capability the agent reports spans to.
 */
export interface RequestTracer {
  startSpan(name: string, options?: SpanOptions): RequestSpan;
}

// =============================================================================
// SPAN IMPLEMENTATIONS
// =============================================================================

function generateId(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * Span that keeps everything it is told, in memory.
 */
export class RecordedSpan implements RequestSpan {
  readonly spanId: string;
  readonly traceId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly startTime: number;
  endTime?: number;
  status: SpanStatus = 'UNSET';
  statusMessage?: string;
  readonly attributes: Map<string, AttributeValue> = new Map();
  readonly events: SpanEvent[] = [];

  private recording = true;

  constructor(name: string, traceId: string, parentSpanId?: string, startTime?: number) {
    this.name = name;
    this.traceId = traceId;
    this.spanId = generateId(8);
    this.parentSpanId = parentSpanId;
    this.startTime = startTime ?? Date.now();
  }

  setAttribute(key: string, value: AttributeValue): this {
    if (this.recording) {
      this.attributes.set(key, value);
    }
    return this;
  }

  setStatus(status: SpanStatus, message?: string): this {
    if (this.recording) {
      this.status = status;
      this.statusMessage = message;
    }
    return this;
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): this {
    if (this.recording) {
      this.events.push({ name, timestamp: Date.now(), attributes });
    }
    return this;
  }

  end(endTime?: number): void {
    if (this.recording) {
      this.endTime = endTime ?? Date.now();
      this.recording = false;
      if (this.status === 'UNSET') {
        this.status = 'OK';
      }
    }
  }

  isRecording(): boolean {
    return this.recording;
  }
}

class NoOpSpan implements RequestSpan {
  readonly spanId = '0000000000000000';
  readonly traceId = '00000000000000000000000000000000';

  setAttribute(): this { return this; }
  setStatus(): this { return this; }
  addEvent(): this { return this; }
  end(): void {}
  isRecording(): boolean { return false; }
}

const NOOP_SPAN = new NoOpSpan();

// =============================================================================
// TRACERS
// =============================================================================

/**
 * Tracer that records nothing.
 */
export class NoopTracer implements RequestTracer {
  startSpan(): RequestSpan {
    return NOOP_SPAN;
  }
}

/**
 * Tracer that keeps every span it started. Useful for tests and debugging.
 */
export class RecordingTracer implements RequestTracer {
  readonly spans: RecordedSpan[] = [];

  startSpan(name: string, options: SpanOptions = {}): RequestSpan {
    const traceId = options.parent?.traceId ?? generateId(16);
    const span = new RecordedSpan(name, traceId, options.parent?.spanId, options.startTime);
    if (options.attributes) {
      for (const [key, value] of Object.entries(options.attributes)) {
        span.setAttribute(key, value);
      }
    }
    this.spans.push(span);
    return span;
  }

  /** Spans with the given name, in start order */
  byName(name: string): RecordedSpan[] {
    return this.spans.filter(span => span.name === name);
  }
}
