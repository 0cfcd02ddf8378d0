/**
 * Dispatcher Tests
 *
 * Drives requests with scripted executors through node selection, the
 * circuit breaker and the retry orchestrator, on fake timers.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ServiceType } from '@clusterlink/shared-types';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { Dispatcher, type AttemptContext, type OperationRequest } from '../dispatcher.js';
import {
  AgentClosedError,
  AgentError,
  CircuitOpenError,
  KeyValueError,
  KvStatus,
  RequestCanceledError,
  ServiceNotAvailableError,
  TimeoutError,
  TopologyUnavailableError,
  TransportError,
} from '../errors/index.js';
import { PendingOperationRegistry, type PendingOpHandle } from '../registry/index.js';
import {
  BestEffortRetryStrategy,
  FailFastRetryStrategy,
  RetryOrchestrator,
  RetryReason,
  type RetryStrategy,
} from '../retry/index.js';
import { TopologyManager } from '../topology/manager.js';
import { createTopologySnapshot, type TopologySnapshot } from '../topology/snapshot.js';
import { RecordingTracer } from '../tracing.js';

// =============================================================================
// Test Helpers
// =============================================================================

const A = '10.0.0.1:11210';
const B = '10.0.0.2:11210';

function snapshotAt(rev: number): TopologySnapshot {
  return createTopologySnapshot({
    revision: { epoch: 0, rev },
    nodes: [
      { id: A, endpoints: { kv: A, query: '10.0.0.1:8093' } },
      { id: B, endpoints: { kv: B, query: '10.0.0.2:8093' } },
    ],
  });
}

interface Outcome<T> {
  error: AgentError | null;
  result: T | null;
}

function setup(
  options: { strategy?: RetryStrategy; publish?: boolean; failureThreshold?: number; tracer?: RecordingTracer } = {}
) {
  const topology = new TopologyManager();
  if (options.publish ?? true) {
    topology.publish(snapshotAt(1));
  }
  const breaker = new CircuitBreaker({
    policy: 'consecutive-failures',
    failureThreshold: options.failureThreshold ?? 5,
    cooldownMs: 60_000,
  });
  const registry = new PendingOperationRegistry();
  const dispatcher = new Dispatcher({
    topology,
    breaker,
    registry,
    orchestrator: new RetryOrchestrator(
      options.strategy ?? new BestEffortRetryStrategy({ baseDelayMs: 10, maxDelayMs: 10, jitter: 'none' })
    ),
    tracer: options.tracer,
  });
  return { topology, breaker, registry, dispatcher };
}

/**
 * A query request whose attempts run the given steps in order (the last
 * one repeats). Records the context of every attempt.
 */
function scripted<T>(
  steps: Array<(ctx: AttemptContext) => Promise<T>>,
  overrides: Partial<OperationRequest<T>> = {}
): OperationRequest<T> & { attempts: AttemptContext[] } {
  const attempts: AttemptContext[] = [];
  return {
    name: 'scripted',
    service: ServiceType.QUERY,
    deadline: Date.now() + 1000,
    idempotent: true,
    ...overrides,
    attempts,
    execute(ctx) {
      attempts.push(ctx);
      const step = steps[Math.min(attempts.length - 1, steps.length - 1)];
      return step(ctx);
    },
  };
}

function fails(error: AgentError): () => Promise<never> {
  return () => Promise.reject(error);
}

function unreachable(): TransportError {
  return new TransportError('connect refused', { retryReason: RetryReason.NODE_UNREACHABLE });
}

function collect<T>(): { outcomes: Outcome<T>[]; callback: (error: AgentError | null, result: T | null) => void } {
  const outcomes: Outcome<T>[] = [];
  return { outcomes, callback: (error, result) => outcomes.push({ error, result }) };
}

// =============================================================================
// Tests
// =============================================================================

describe('Dispatcher', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run an attempt against the selected node and deliver its result', async () => {
    const { dispatcher } = setup();
    const request = scripted([async () => 'rows']);
    const { outcomes, callback } = collect<string>();

    dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(0);

    expect(outcomes).toEqual([{ error: null, result: 'rows' }]);
    expect(request.attempts[0]).toMatchObject({ attempt: 0, endpoint: '10.0.0.1:8093', node: { id: A } });
  });

  it('should back off and retry a transient failure on the next node', async () => {
    const { dispatcher } = setup();
    const request = scripted([fails(unreachable()), async () => 'rows']);
    const { outcomes, callback } = collect<string>();

    dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(9);
    expect(request.attempts).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);

    expect(outcomes).toEqual([{ error: null, result: 'rows' }]);
    expect(request.attempts.map(ctx => [ctx.attempt, ctx.node.id])).toEqual([
      [0, A],
      [1, B],
    ]);
  });

  it('should report one span per operation and one child span per attempt', async () => {
    const tracer = new RecordingTracer();
    const { dispatcher } = setup({ tracer });
    const request = scripted([fails(unreachable()), async () => 'rows']);

    dispatcher.dispatch(request, () => undefined);
    await vi.advanceTimersByTimeAsync(10);

    const [operation] = tracer.byName('scripted');
    const attempts = tracer.byName('scripted.attempt');
    expect(operation.attributes.get('service')).toBe(ServiceType.QUERY);
    expect(operation.attributes.get('attempts')).toBe(2);
    expect(operation.status).toBe('OK');
    expect(operation.events.map(event => event.name)).toEqual(['retry']);
    expect(attempts.map(span => [span.attributes.get('node'), span.status])).toEqual([
      [A, 'ERROR'],
      [B, 'OK'],
    ]);
    expect(attempts.every(span => span.parentSpanId === operation.spanId && span.traceId === operation.traceId)).toBe(
      true
    );
  });

  it('should not retry a non-idempotent request that may have executed', async () => {
    const { dispatcher } = setup();
    const failure = new TransportError('connection lost', { retryReason: RetryReason.SOCKET_CLOSED_IN_FLIGHT });
    const request = scripted([fails(failure)], { idempotent: false });
    const { outcomes, callback } = collect<string>();

    const handle = dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(100);

    expect(request.attempts).toHaveLength(1);
    expect(outcomes[0].error).toBe(failure);
    expect(failure.context).toMatchObject({ operationId: handle.id, attempt: 0, service: ServiceType.QUERY });
  });

  it('should time out with the last failure once a backoff would pass the deadline', async () => {
    const { dispatcher } = setup();
    const request = scripted([fails(unreachable())], { deadline: Date.now() + 35 });
    const { outcomes, callback } = collect<string>();

    dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(30);

    expect(request.attempts).toHaveLength(4);
    const error = outcomes[0].error;
    expect(error).toBeInstanceOf(TimeoutError);
    if (error instanceof TimeoutError) {
      expect(error.message).toBe('operation timed out after connect refused');
      expect(error.retryAttempts).toBe(3);
      expect(error.retryReasons).toEqual([
        RetryReason.NODE_UNREACHABLE,
        RetryReason.NODE_UNREACHABLE,
        RetryReason.NODE_UNREACHABLE,
      ]);
    }
  });

  it('should abort the running attempt when the operation is canceled', async () => {
    const { dispatcher, registry } = setup();
    const request = scripted<string>([
      ctx =>
        new Promise((_resolve, reject) => {
          ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
        }),
    ]);
    const { outcomes, callback } = collect<string>();

    const handle = dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(0);
    handle.cancel();
    await vi.advanceTimersByTimeAsync(0);

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].error).toBeInstanceOf(RequestCanceledError);
    expect(request.attempts[0].signal.aborted).toBe(true);
    expect(handle.settled).toBe(true);
    expect(registry.getStats()).toMatchObject({ pending: 0, activeTimers: 0, activeHooks: 0 });
  });

  it('should discard a result that arrives after the operation settled', async () => {
    const { dispatcher } = setup();
    let resolveAttempt: (value: string) => void = () => undefined;
    const discard = vi.fn();
    const request = scripted<string>([() => new Promise(resolve => (resolveAttempt = resolve))], { discard });
    const { outcomes, callback } = collect<string>();

    const handle = dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(0);
    handle.cancel();
    resolveAttempt('late rows');
    await vi.advanceTimersByTimeAsync(0);

    expect(outcomes).toHaveLength(1);
    expect(discard).toHaveBeenCalledWith('late rows');
  });

  it('should wait for a new topology after stale routing and ask for a refresh', async () => {
    const { dispatcher, topology } = setup({ strategy: new FailFastRetryStrategy() });
    const refresh = vi.fn();
    topology.setRefreshHandler(refresh);
    const stale = new KeyValueError(KvStatus.NOT_MY_VBUCKET, { retryReason: RetryReason.TOPOLOGY_STALE });
    const request = scripted([fails(stale), async () => 'rows']);
    const { outcomes, callback } = collect<string>();

    dispatcher.dispatch(request, callback);
    await vi.advanceTimersByTimeAsync(100);
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(request.attempts).toHaveLength(1);

    topology.publish(snapshotAt(2));
    await vi.advanceTimersByTimeAsync(0);
    expect(outcomes).toEqual([{ error: null, result: 'rows' }]);
  });

  it('should leave nothing armed once many operations have settled every way', async () => {
    const { dispatcher, registry, topology } = setup({ failureThreshold: 1000 });
    const { outcomes, callback } = collect<string>();
    const hangs = (ctx: AttemptContext): Promise<string> =>
      new Promise((_resolve, reject) => {
        ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
      });
    const stale = (): Promise<never> =>
      Promise.reject(new KeyValueError(KvStatus.NOT_MY_VBUCKET, { retryReason: RetryReason.TOPOLOGY_STALE }));

    const canceled: PendingOpHandle[] = [];
    for (let i = 0; i < 20; i++) {
      dispatcher.dispatch(scripted([async () => 'rows']), callback);
      dispatcher.dispatch(scripted([fails(unreachable()), async () => 'rows']), callback);
      dispatcher.dispatch(scripted([stale, async () => 'rows']), callback);
      dispatcher.dispatch(scripted([hangs], { deadline: Date.now() + 50 }), callback);
      canceled.push(dispatcher.dispatch(scripted([hangs]), callback));
    }
    await vi.advanceTimersByTimeAsync(0);
    for (const handle of canceled) {
      handle.cancel();
    }
    topology.publish(snapshotAt(2));
    await vi.advanceTimersByTimeAsync(100);

    expect(outcomes).toHaveLength(100);
    expect(outcomes.filter(outcome => outcome.result === 'rows')).toHaveLength(60);
    expect(outcomes.filter(outcome => outcome.error instanceof TimeoutError)).toHaveLength(20);
    expect(outcomes.filter(outcome => outcome.error instanceof RequestCanceledError)).toHaveLength(20);
    expect(registry.getStats()).toEqual({ pending: 0, tracked: 100, settled: 100, activeTimers: 0, activeHooks: 0 });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should fail fast on an open circuit with a fail-fast strategy', async () => {
    const { dispatcher } = setup({ strategy: new FailFastRetryStrategy(), failureThreshold: 1 });
    const { outcomes, callback } = collect<string>();

    dispatcher.dispatch(scripted([fails(unreachable())]), callback);
    dispatcher.dispatch(scripted([fails(unreachable())]), callback);
    await vi.advanceTimersByTimeAsync(0);
    const third = scripted([async () => 'rows']);
    dispatcher.dispatch(third, callback);
    await vi.advanceTimersByTimeAsync(0);

    expect(third.attempts).toHaveLength(0);
    const error = outcomes[2].error;
    expect(error).toBeInstanceOf(CircuitOpenError);
    expect(error?.message).toBe(`circuit open for ${A}/query`);
  });

  describe('admission', () => {
    it('should refuse requests before the first topology unless asked to wait', async () => {
      const { dispatcher, topology } = setup({ publish: false });
      expect(() => dispatcher.dispatch(scripted([async () => 'rows']), () => undefined)).toThrow(
        TopologyUnavailableError
      );

      const request = scripted([async () => 'rows'], { waitForConfig: true });
      const { outcomes, callback } = collect<string>();
      dispatcher.dispatch(request, callback);
      await vi.advanceTimersByTimeAsync(50);
      expect(request.attempts).toHaveLength(0);

      topology.publish(snapshotAt(1));
      await vi.advanceTimersByTimeAsync(0);
      expect(outcomes).toEqual([{ error: null, result: 'rows' }]);
    });

    it('should refuse a service no node offers', () => {
      const { dispatcher } = setup();
      expect(() =>
        dispatcher.dispatch(scripted([async () => 'hits'], { service: ServiceType.SEARCH }), () => undefined)
      ).toThrow(new ServiceNotAvailableError(ServiceType.SEARCH).message);
    });

    it('should refuse keyed requests when the configuration has no vbucket map', () => {
      const { dispatcher, registry } = setup();
      const request = scripted([async () => 'doc'], { service: ServiceType.KV, routingKey: 'doc-1' });

      expect(() => dispatcher.dispatch(request, () => undefined)).toThrow(
        'no node offers the kv service: the configuration has no vbucket map'
      );
      expect(request.attempts).toHaveLength(0);
      expect(registry.size).toBe(0);
    });

    it('should refuse malformed deadlines and work after close', () => {
      const { dispatcher } = setup();
      expect(() =>
        dispatcher.dispatch(scripted([async () => 'rows'], { deadline: Number.NaN }), () => undefined)
      ).toThrow('deadline must be a finite epoch timestamp');

      dispatcher.close();
      expect(() => dispatcher.dispatch(scripted([async () => 'rows']), () => undefined)).toThrow(AgentClosedError);
    });

    it('should not run any attempt for a deadline already in the past', async () => {
      const { dispatcher } = setup();
      const request = scripted([async () => 'rows'], { deadline: Date.now() - 1 });
      const { outcomes, callback } = collect<string>();

      dispatcher.dispatch(request, callback);
      await vi.advanceTimersByTimeAsync(0);
      expect(request.attempts).toHaveLength(0);
      expect(outcomes[0].error).toBeInstanceOf(TimeoutError);
    });
  });
});
