/**
 * Streaming Row Decoder Tests
 *
 * The decoder hands out rows as soon as they close, regardless of how the
 * body is split into chunks; the reader pulls chunks lazily and reports how
 * the stream ended.
 */

import { describe, expect, it } from 'vitest';
import { AgentError, HttpServiceError, ProtocolError, TimeoutError, TransportError } from '../errors/index.js';
import { RetryReason } from '../retry/reasons.js';
import { JsonRowDecoder, RowReader, type ChunkSource } from '../streaming/index.js';

// =============================================================================
// Test Helpers
// =============================================================================

interface ScriptedSource extends ChunkSource {
  readonly reads: number;
  readonly canceledWith: AgentError | null;
}

function scriptedSource(chunks: (string | Error)[]): ScriptedSource {
  let reads = 0;
  let canceledWith: AgentError | null = null;
  return {
    get reads() {
      return reads;
    },
    get canceledWith() {
      return canceledWith;
    },
    async next() {
      const chunk = chunks[reads++];
      if (chunk === undefined) {
        return null;
      }
      if (chunk instanceof Error) {
        throw chunk;
      }
      return new TextEncoder().encode(chunk);
    },
    async cancel(reason) {
      canceledWith = reason;
    },
  };
}

async function drain(reader: RowReader): Promise<string[]> {
  const rows: string[] = [];
  for (let row = await reader.nextRow(); row !== null; row = await reader.nextRow()) {
    rows.push(row.toString('utf8'));
  }
  return rows;
}

const BODY = '{"requestID":"r-1","results":[{"id":1},{"id":2},{"id":3}],"status":"success","metrics":{"resultCount":3}}';

// =============================================================================
// JsonRowDecoder
// =============================================================================

describe('JsonRowDecoder', () => {
  it('should emit each row as soon as it closes', () => {
    const decoder = new JsonRowDecoder('results');
    decoder.push(Buffer.from('{"requestID":"r-1","results":[{"id":1},{"id"'));
    expect(decoder.rowsStarted).toBe(true);
    expect(decoder.takeRows().map(String)).toEqual(['{"id":1}']);

    decoder.push(Buffer.from(':2}]}'));
    decoder.end();
    expect(decoder.takeRows().map(String)).toEqual(['{"id":2}']);
    expect(decoder.complete).toBe(true);
    expect(decoder.metadata()).toEqual({ requestID: 'r-1' });
  });

  it('should not be confused by brackets and escaped quotes inside strings', () => {
    const decoder = new JsonRowDecoder('rows');
    const body = '{"rows":[{"k":"a]\\"}{"},"x y",null,-1.5e3],"total_rows":4}';
    for (const chunk of [body.slice(0, 13), body.slice(13, 17), body.slice(17)]) {
      decoder.push(Buffer.from(chunk));
    }
    decoder.end();

    expect(decoder.takeRows().map(String)).toEqual(['{"k":"a]\\"}{"}', '"x y"', 'null', '-1.5e3']);
    expect(decoder.metadata()).toEqual({ total_rows: 4 });
  });

  it('should only split the configured attribute into rows', () => {
    const decoder = new JsonRowDecoder('hits');
    decoder.push(Buffer.from('{"status":{"total":1},"results":[1,2],"hits":[{"id":"doc-1"}]}'));
    decoder.end();

    expect(decoder.takeRows().map(String)).toEqual(['{"id":"doc-1"}']);
    expect(decoder.metadata()).toEqual({ status: { total: 1 }, results: [1, 2] });
  });

  it('should poison itself on malformed input', () => {
    const decoder = new JsonRowDecoder('results');
    expect(() => decoder.push(Buffer.from('[1,2]'))).toThrow("expected '{' at start of body, found '['");
    expect(() => decoder.push(Buffer.from('{}'))).toThrow(ProtocolError);
    expect(decoder.error?.message).toBe("expected '{' at start of body, found '['");
  });

  it('should report an empty body', () => {
    const decoder = new JsonRowDecoder('results');
    expect(() => decoder.end()).toThrow('response body was empty');
  });
});

// =============================================================================
// RowReader
// =============================================================================

describe('RowReader', () => {
  it('should return every row, then null forever, with the metadata', async () => {
    const reader = new RowReader(scriptedSource([BODY]), { rowsAttribute: 'results' });

    expect(await drain(reader)).toEqual(['{"id":1}', '{"id":2}', '{"id":3}']);
    expect(await reader.nextRow()).toBeNull();
    expect(await reader.nextRow()).toBeNull();
    expect(reader.err()).toBeNull();
    expect(reader.metadata()).toEqual({ requestID: 'r-1', status: 'success', metrics: { resultCount: 3 } });
  });

  it('should deliver the rows decoded before a truncation, then the error', async () => {
    const reader = new RowReader(scriptedSource(['{"results":[{"a":1},{"a":2},{"a":']), {
      rowsAttribute: 'results',
    });

    expect((await reader.nextRow())?.toString()).toBe('{"a":1}');
    expect((await reader.nextRow())?.toString()).toBe('{"a":2}');
    expect(await reader.nextRow()).toBeNull();

    const error = reader.err();
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error?.message).toBe('response body truncated after 33 bytes');
    expect(error?.retryReason).toBe(RetryReason.SOCKET_CLOSED_IN_FLIGHT);
    expect(reader.metadata()).toBeNull();
  });

  it('should read a chunk only when no row is buffered', async () => {
    const source = scriptedSource(['{"results":[1,', '2,', '3]}']);
    const reader = new RowReader(source, { rowsAttribute: 'results' });

    expect((await reader.nextRow())?.toString()).toBe('1');
    expect(source.reads).toBe(1);
    expect((await reader.nextRow())?.toString()).toBe('2');
    expect(source.reads).toBe(2);
  });

  it('should turn a trailing errors attribute into the terminal error', async () => {
    const body = '{"results":[{"n":1}],"errors":[{"code":5000,"msg":"internal error"}],"status":"errors"}';
    const reader = new RowReader(scriptedSource([body]), {
      rowsAttribute: 'results',
      errorFromMetadata: metadata =>
        Array.isArray(metadata.errors) ? new HttpServiceError('query', 200, [{ code: 5000, msg: 'internal error' }]) : null,
    });

    expect(await drain(reader)).toEqual(['{"n":1}']);
    expect(reader.err()?.message).toBe('query error 5000: internal error');
    expect(reader.metadata()).toBeNull();
  });

  it('should wrap a failing source into a transport error', async () => {
    const reader = new RowReader(scriptedSource(['{"results":[1,', new Error('socket hang up')]), {
      rowsAttribute: 'results',
    });

    expect(await drain(reader)).toEqual(['1']);
    expect(reader.err()).toBeInstanceOf(TransportError);
    expect(reader.err()?.message).toBe('response stream failed');
    expect(reader.err()?.retryReason).toBe(RetryReason.SOCKET_CLOSED_IN_FLIGHT);
  });

  it('should peek without consuming rows', async () => {
    const reader = new RowReader(scriptedSource(['{"results":[', '{"x":1}', ']}']), { rowsAttribute: 'results' });

    await reader.peek();
    expect(reader.bufferedRows).toBe(1);
    expect(reader.isEnded).toBe(false);
    expect((await reader.nextRow())?.toString()).toBe('{"x":1}');
  });

  it('should cancel the source and release once when closed', async () => {
    let released = 0;
    const source = scriptedSource(['{"results":[1,2,', '3]}']);
    const reader = new RowReader(source, { rowsAttribute: 'results', onRelease: () => released++ });

    await reader.peek();
    await reader.close();
    await reader.close();

    expect(source.canceledWith?.message).toBe('row reader closed');
    expect(released).toBe(1);
    expect(await reader.nextRow()).toBeNull();
    expect(reader.err()).toBeNull();
  });

  it('should keep buffered rows readable after an abort', async () => {
    const source = scriptedSource(['{"results":[1,2,', '3]}']);
    const reader = new RowReader(source, { rowsAttribute: 'results' });
    await reader.peek();

    const timeout = new TimeoutError('row stream was not consumed before the operation deadline');
    await reader.abort(timeout);

    expect(await drain(reader)).toEqual(['1', '2']);
    expect(reader.err()).toBe(timeout);
    expect(source.canceledWith).toBe(timeout);
  });

  it('should support async iteration', async () => {
    const reader = new RowReader(scriptedSource([BODY]), { rowsAttribute: 'results' });
    const ids: number[] = [];
    for await (const row of reader) {
      const parsed: unknown = JSON.parse(row.toString());
      if (parsed !== null && typeof parsed === 'object' && 'id' in parsed && typeof parsed.id === 'number') {
        ids.push(parsed.id);
      }
    }
    expect(ids).toEqual([1, 2, 3]);
  });
});
