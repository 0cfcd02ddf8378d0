/**
 * Topology Tests
 *
 * Snapshot construction and config parsing, key routing, and the manager's
 * publish / wait / select behavior.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ServiceType, createNodeId } from '@clusterlink/shared-types';
import { TimeoutError, type AgentError } from '../errors/index.js';
import { MemorySink, createLogger } from '../logging/index.js';
import { TopologyManager } from '../topology/manager.js';
import {
  compareRevisions,
  createTopologySnapshot,
  nodeForKey,
  parseClusterConfig,
  vbucketIdForKey,
  type TopologySnapshot,
} from '../topology/snapshot.js';

// =============================================================================
// Test Helpers
// =============================================================================

const A = '10.0.0.1:11210';
const B = '10.0.0.2:11210';
const C = '10.0.0.3:11210';

function snapshotAt(rev: number, epoch = 0): TopologySnapshot {
  return createTopologySnapshot({
    revision: { epoch, rev },
    bucketName: 'default',
    nodes: [
      { id: A, endpoints: { kv: A, query: '10.0.0.1:8093' } },
      { id: B, endpoints: { kv: B, query: '10.0.0.2:8093' } },
      { id: C, endpoints: { kv: C, query: '10.0.0.3:8093' } },
    ],
    vbuckets: { servers: [A, B, C], map: [[1], [1], [1], [1]] },
  });
}

const CONFIG = {
  rev: 12,
  revEpoch: 2,
  name: 'travel',
  nodesExt: [
    {
      hostname: '$HOST',
      services: { kv: 11210, kvSSL: 11207, mgmt: 8091, mgmtSSL: 18091, n1ql: 8093 },
      alternateAddresses: { external: { hostname: 'ext-1.example.test', ports: { kv: 31210, mgmt: 38091 } } },
    },
    { hostname: '10.0.0.2', services: { mgmt: 8091, fts: 8094 } },
  ],
  vBucketServerMap: { numReplicas: 0, serverList: ['$HOST:11210'], vBucketMap: [[0], [0], [-1], [0]] },
};

// =============================================================================
// Snapshots
// =============================================================================

describe('createTopologySnapshot', () => {
  it('should deep-freeze the snapshot', () => {
    const snapshot = snapshotAt(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0].endpoints)).toBe(true);
    expect(Object.isFrozen(snapshot.vbuckets?.map[0])).toBe(true);
  });

  it('should reject node ids that are not host:port', () => {
    expect(() =>
      createTopologySnapshot({ revision: { epoch: 0, rev: 1 }, nodes: [{ id: 'db1', endpoints: {} }] })
    ).toThrow('invalid node address in configuration: db1');
  });

  it('should reject vbucket entries pointing past the server list', () => {
    expect(() =>
      createTopologySnapshot({
        revision: { epoch: 0, rev: 1 },
        nodes: [{ id: A, endpoints: { kv: A } }],
        vbuckets: { servers: [A], map: [[0], [2]] },
      })
    ).toThrow('vbucket map references server 2 of 1');
  });

  it('should order revisions by epoch first', () => {
    expect(compareRevisions({ epoch: 1, rev: 100 }, { epoch: 2, rev: 1 })).toBeLessThan(0);
    expect(compareRevisions({ epoch: 2, rev: 5 }, { epoch: 2, rev: 4 })).toBeGreaterThan(0);
    expect(compareRevisions({ epoch: 0, rev: 3 }, { epoch: 0, rev: 3 })).toBe(0);
  });
});

describe('parseClusterConfig', () => {
  it('should substitute the source host and map service ports', () => {
    const snapshot = parseClusterConfig(JSON.stringify(CONFIG), {
      sourceHost: '10.0.0.1',
      useTls: false,
      networkType: '',
    });

    expect(snapshot.revision).toEqual({ epoch: 2, rev: 12 });
    expect(snapshot.bucketName).toBe('travel');
    expect(snapshot.nodes).toEqual([
      {
        id: '10.0.0.1:11210',
        hostname: '10.0.0.1',
        endpoints: { kv: '10.0.0.1:11210', mgmt: '10.0.0.1:8091', query: '10.0.0.1:8093' },
      },
      {
        id: '10.0.0.2:8091',
        hostname: '10.0.0.2',
        endpoints: { mgmt: '10.0.0.2:8091', search: '10.0.0.2:8094' },
      },
    ]);
    expect(snapshot.vbuckets).toEqual({
      numVbuckets: 4,
      numReplicas: 0,
      servers: ['10.0.0.1:11210'],
      map: [[0], [0], [-1], [0]],
    });
  });

  it('should use the TLS ports when asked to', () => {
    const config = { ...CONFIG, nodesExt: [CONFIG.nodesExt[0]] };
    const snapshot = parseClusterConfig(JSON.stringify(config), {
      sourceHost: '10.0.0.1',
      useTls: true,
      networkType: '',
    });
    expect(snapshot.nodes[0].endpoints).toEqual({ kv: '10.0.0.1:11207', mgmt: '10.0.0.1:18091' });
    expect(snapshot.vbuckets?.servers).toEqual(['10.0.0.1:11207']);
  });

  it('should reject a node that offers neither kv nor mgmt', () => {
    expect(() =>
      parseClusterConfig(JSON.stringify(CONFIG), { sourceHost: '10.0.0.1', useTls: true, networkType: '' })
    ).toThrow('node 10.0.0.2 advertises neither kv nor mgmt');
  });

  it('should use alternate addresses and remap the vbucket servers', () => {
    const snapshot = parseClusterConfig(Buffer.from(JSON.stringify(CONFIG)), {
      sourceHost: '10.0.0.1',
      useTls: false,
      networkType: 'external',
    });
    expect(snapshot.nodes[0]).toEqual({
      id: 'ext-1.example.test:31210',
      hostname: 'ext-1.example.test',
      endpoints: { kv: 'ext-1.example.test:31210', mgmt: 'ext-1.example.test:38091' },
    });
    expect(snapshot.vbuckets?.servers).toEqual(['ext-1.example.test:31210']);
  });

  it('should report malformed documents', () => {
    const options = { sourceHost: '10.0.0.1', useTls: false, networkType: '' };
    expect(() => parseClusterConfig('{"rev":', options)).toThrow('cluster configuration is not valid JSON');
    expect(() => parseClusterConfig('{"rev":1,"nodesExt":[]}', options)).toThrow(
      'invalid cluster configuration at nodesExt: Array must contain at least 1 element(s)'
    );
  });
});

describe('key routing', () => {
  it('should hash keys into vbuckets with bits 16..30 of the CRC32', () => {
    expect(vbucketIdForKey('Hello', 1024)).toBe(977);
    expect(vbucketIdForKey(Buffer.from('Hello'), 4)).toBe(1);
  });

  it('should route a key to the active copy of its vbucket', () => {
    expect(nodeForKey(snapshotAt(1), 'Hello')).toEqual({ vbucketId: 1, node: B });
  });

  it('should find no node for a vbucket without an active copy', () => {
    const snapshot = createTopologySnapshot({
      revision: { epoch: 0, rev: 1 },
      nodes: [{ id: A, endpoints: { kv: A } }],
      vbuckets: { servers: [A], map: [[-1], [-1], [-1], [-1]] },
    });
    expect(nodeForKey(snapshot, 'Hello')).toBeUndefined();
  });
});

// =============================================================================
// TopologyManager
// =============================================================================

describe('TopologyManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should only publish newer revisions', () => {
    const sink = new MemorySink();
    const manager = new TopologyManager({ logger: createLogger({ sink, level: 'info' }) });
    const updates: number[] = [];
    manager.events.on('update', snapshot => updates.push(snapshot.revision.rev));

    expect(manager.publish(snapshotAt(1))).toBe(true);
    expect(manager.publish(snapshotAt(1))).toBe(false);
    expect(manager.publish(snapshotAt(0))).toBe(false);
    expect(manager.publish(snapshotAt(0, 1))).toBe(true);

    expect(updates).toEqual([1, 0]);
    expect(manager.current()?.revision).toEqual({ epoch: 1, rev: 0 });
    expect(sink.entries.map(entry => entry.message)).toEqual([
      'topology updated to revision 0:1',
      'topology updated to revision 1:0',
    ]);
  });

  it('should wait for the next snapshot newer than a revision', async () => {
    const manager = new TopologyManager();
    manager.publish(snapshotAt(3));
    const seen: number[] = [];

    manager.waitForUpdate(snapshot => seen.push(snapshot.revision.rev), { epoch: 0, rev: 2 });
    manager.waitForUpdate(snapshot => seen.push(snapshot.revision.rev * 10), { epoch: 0, rev: 3 });
    expect(seen).toEqual([]);
    await Promise.resolve();
    expect(seen).toEqual([3]);

    manager.publish(snapshotAt(4));
    expect(seen).toEqual([3, 40]);
  });

  it('should stop waiting when the returned function is called', async () => {
    const manager = new TopologyManager();
    manager.publish(snapshotAt(1));
    const seen: number[] = [];

    const stopImmediate = manager.waitForUpdate(() => seen.push(1), null);
    const stopNext = manager.waitForUpdate(() => seen.push(2));
    stopImmediate();
    stopNext();
    await Promise.resolve();
    manager.publish(snapshotAt(2));

    expect(seen).toEqual([]);
    expect(manager.events.listenerCount('update')).toBe(0);
  });

  it('should report readiness once a snapshot arrives', async () => {
    vi.useFakeTimers();
    const manager = new TopologyManager();
    const results: Array<AgentError | null> = [];
    manager.waitUntilReady(Date.now() + 1000, error => results.push(error));

    manager.publish(snapshotAt(1));
    await vi.advanceTimersByTimeAsync(2000);
    expect(results).toEqual([null]);
  });

  it('should time out waiting for the first snapshot', async () => {
    vi.useFakeTimers();
    const manager = new TopologyManager();
    const results: Array<AgentError | null> = [];
    manager.waitUntilReady(Date.now() + 1000, error => results.push(error));

    await vi.advanceTimersByTimeAsync(999);
    expect(results).toEqual([]);
    await vi.advanceTimersByTimeAsync(1);
    expect(results).toHaveLength(1);
    expect(results[0]).toBeInstanceOf(TimeoutError);
    expect(results[0]?.message).toBe('timed out waiting for the first cluster configuration');
  });

  it('should forward refresh requests to the installed handler', () => {
    const manager = new TopologyManager();
    const handler = vi.fn();
    manager.requestRefresh();
    manager.setRefreshHandler(handler);
    manager.requestRefresh();
    expect(handler).toHaveBeenCalledTimes(1);
  });

  describe('select', () => {
    function selectedIds(manager: TopologyManager, count: number, admit?: (node: string) => boolean): string[] {
      const ids: string[] = [];
      for (let i = 0; i < count; i++) {
        const selection = manager.select(ServiceType.QUERY, { admit });
        ids.push(selection.kind === 'selected' ? selection.node.id : selection.kind);
      }
      return ids;
    }

    it('should find nothing before the first snapshot', () => {
      expect(new TopologyManager().select(ServiceType.QUERY)).toEqual({ kind: 'none' });
    });

    it('should visit the nodes offering a service round-robin', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));
      expect(selectedIds(manager, 4)).toEqual([A, B, C, A]);
    });

    it('should skip nodes refused by the admission check', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));
      expect(selectedIds(manager, 4, node => node !== B)).toEqual([A, C, C, A]);
    });

    it('should report a rejection when no node is admitted', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));
      const selection = manager.select(ServiceType.QUERY, { admit: () => false });
      expect(selection.kind).toBe('rejected');
      if (selection.kind === 'rejected') {
        expect(selection.node.id).toBe(A);
      }
    });

    it('should route key/value requests by vbucket', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));

      expect(manager.select(ServiceType.KV, { routingKey: 'Hello' })).toMatchObject({
        kind: 'selected',
        endpoint: B,
        vbucketId: 1,
      });
      expect(manager.select(ServiceType.KV, { routingKey: 'Hello', admit: () => false })).toMatchObject({
        kind: 'rejected',
        node: { id: B },
      });
    });

    it('should try the preferred node first and keep the vbucket', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));

      expect(manager.select(ServiceType.QUERY, { preferred: createNodeId(C) })).toMatchObject({ node: { id: C } });
      expect(manager.select(ServiceType.KV, { routingKey: 'Hello', preferred: createNodeId(A) })).toMatchObject({
        kind: 'selected',
        node: { id: A },
        vbucketId: 1,
      });
    });

    it('should find nothing for a service no node offers', () => {
      const manager = new TopologyManager();
      manager.publish(snapshotAt(1));
      expect(manager.offers(ServiceType.SEARCH)).toBe(false);
      expect(manager.offers(ServiceType.QUERY)).toBe(true);
      expect(manager.select(ServiceType.SEARCH)).toEqual({ kind: 'none' });
    });
  });
});
