/**
 * Orphaned Response Reporter Tests
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemorySink, createLogger } from '../logging/index.js';
import { OrphanReporter } from '../orphan-reporter.js';

describe('OrphanReporter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(sampleSize = 2) {
    const sink = new MemorySink();
    const reporter = new OrphanReporter({
      intervalMs: 1000,
      sampleSize,
      logger: createLogger({ sink, level: 'info' }),
      now: () => 42,
    });
    return { sink, reporter };
  }

  it('should log a count and a bounded sample per flush', () => {
    const { sink, reporter } = setup();
    for (let opaque = 1; opaque <= 3; opaque++) {
      reporter.add({ node: '10.0.0.1:11210', opcode: 0, opaque, status: 0 });
    }
    reporter.flush();
    reporter.flush();

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0].level).toBe('warn');
    expect(sink.entries[0].message).toBe('3 orphaned responses in the last 1000ms');
    expect(sink.entries[0].context?.sample).toEqual([
      { node: '10.0.0.1:11210', opcode: 0, opaque: 1, status: 0, receivedAt: 42 },
      { node: '10.0.0.1:11210', opcode: 0, opaque: 2, status: 0, receivedAt: 42 },
    ]);
    expect(reporter.totalOrphans).toBe(3);
  });

  it('should flush on its interval and once more when stopped', async () => {
    vi.useFakeTimers();
    const { sink, reporter } = setup();
    reporter.start();

    reporter.add({ node: '10.0.0.1:11210', opcode: 0, opaque: 1, status: 0 });
    await vi.advanceTimersByTimeAsync(1000);
    expect(sink.entries).toHaveLength(1);

    reporter.add({ node: '10.0.0.1:11210', opcode: 0, opaque: 2, status: 0 });
    reporter.stop();
    expect(sink.find('1 orphaned responses in the last 1000ms')).toHaveLength(2);
    expect(vi.getTimerCount()).toBe(0);
  });
});
