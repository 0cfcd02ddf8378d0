/**
 * Topology snapshots
 *
 * Immutable view of the cluster at one revision: its nodes, the endpoint each
 * node offers per service, and (for a bucket) the vbucket map used to route
 * keys. Snapshots are deep-frozen on creation and replaced wholesale.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  ALL_SERVICE_TYPES,
  ServiceType,
  createNodeId,
  joinHostPort,
  splitHostPort,
  type NodeId,
} from '@clusterlink/shared-types';
import { ProtocolError } from '../errors/index.js';
import { crc32 } from '../utils/crc32.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Revision reported by the cluster. Epochs order before revs.
 *
 * @public
 */
export interface TopologyRevision {
  readonly epoch: number;
  readonly rev: number;
}

/**
 * @public
 */
export interface TopologyNode {
  /** Binary-protocol address, or the management address for nodes without one */
  readonly id: NodeId;
  readonly hostname: string;
  /** host:port per offered service */
  readonly endpoints: Readonly<Partial<Record<ServiceType, string>>>;
}

/**
 * @public
 */
export interface VbucketMap {
  readonly numVbuckets: number;
  readonly numReplicas: number;
  /** Server index to node id */
  readonly servers: readonly NodeId[];
  /** Per vbucket: server index of the active copy, then replicas (-1 = none) */
  readonly map: readonly (readonly number[])[];
}

/**
 * @public
 * @since 0.1.0
 */
export interface TopologySnapshot {
  readonly revision: TopologyRevision;
  readonly bucketName?: string;
  readonly nodes: readonly TopologyNode[];
  readonly vbuckets?: VbucketMap;
}

/**
 * Plain input for {@link createTopologySnapshot}.
 */
export interface TopologySnapshotInput {
  revision: TopologyRevision;
  bucketName?: string;
  nodes: Array<{ id: string; hostname?: string; endpoints: Partial<Record<ServiceType, string>> }>;
  vbuckets?: { numReplicas?: number; servers: string[]; map: number[][] };
}

// =============================================================================
// Revisions
// =============================================================================

/**
 * @returns negative if a is older than b, positive if newer, 0 if equal
 */
export function compareRevisions(a: TopologyRevision, b: TopologyRevision): number {
  if (a.epoch !== b.epoch) {
    return a.epoch - b.epoch;
  }
  return a.rev - b.rev;
}

export function formatRevision(revision: TopologyRevision): string {
  return `${revision.epoch}:${revision.rev}`;
}

// =============================================================================
// Construction
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build a deep-frozen snapshot from plain data.
 *
 * @throws ProtocolError if a node id is not host:port or the vbucket map
 * references an unknown server
 */
export function createTopologySnapshot(input: TopologySnapshotInput): TopologySnapshot {
  const nodes: TopologyNode[] = input.nodes.map(node => {
    const parsed = splitHostPort(node.id);
    if (!parsed) {
      throw new ProtocolError(`invalid node address in configuration: ${node.id}`);
    }
    return {
      id: createNodeId(node.id),
      hostname: node.hostname ?? parsed.host,
      endpoints: { ...node.endpoints },
    };
  });

  let vbuckets: VbucketMap | undefined;
  if (input.vbuckets) {
    const servers = input.vbuckets.servers.map(server => createNodeId(server));
    for (const entry of input.vbuckets.map) {
      for (const index of entry) {
        if (index >= servers.length) {
          throw new ProtocolError(`vbucket map references server ${index} of ${servers.length}`);
        }
      }
    }
    vbuckets = {
      numVbuckets: input.vbuckets.map.length,
      numReplicas: input.vbuckets.numReplicas ?? 0,
      servers,
      map: input.vbuckets.map.map(entry => [...entry]),
    };
  }

  return deepFreeze({
    revision: { epoch: input.revision.epoch, rev: input.revision.rev },
    bucketName: input.bucketName,
    nodes,
    vbuckets,
  });
}

// =============================================================================
// Cluster Config Parsing
// =============================================================================

const PortsSchema = z.record(z.string(), z.number().int().nonnegative());

const NodeExtSchema = z.object({
  services: PortsSchema,
  hostname: z.string().optional(),
  thisNode: z.boolean().optional(),
  alternateAddresses: z
    .record(z.string(), z.object({ hostname: z.string(), ports: PortsSchema.optional() }))
    .optional(),
});

const VbucketServerMapSchema = z.object({
  hashAlgorithm: z.string().optional(),
  numReplicas: z.number().int().nonnegative().optional(),
  serverList: z.array(z.string()),
  vBucketMap: z.array(z.array(z.number().int().min(-1))),
});

/**
 * Shape of the JSON configuration document served by cluster nodes.
 */
export const ClusterConfigSchema = z.object({
  rev: z.number().int(),
  revEpoch: z.number().int().optional(),
  name: z.string().optional(),
  nodesExt: z.array(NodeExtSchema).min(1),
  vBucketServerMap: VbucketServerMapSchema.optional(),
});

export type ClusterConfig = z.infer<typeof ClusterConfigSchema>;

const SERVICE_PORT_KEYS: Readonly<Record<ServiceType, readonly [plain: string, tls: string]>> = {
  [ServiceType.KV]: ['kv', 'kvSSL'],
  [ServiceType.MGMT]: ['mgmt', 'mgmtSSL'],
  [ServiceType.QUERY]: ['n1ql', 'n1qlSSL'],
  [ServiceType.ANALYTICS]: ['cbas', 'cbasSSL'],
  [ServiceType.SEARCH]: ['fts', 'ftsSSL'],
  [ServiceType.VIEWS]: ['capi', 'capiSSL'],
};

const HOST_PLACEHOLDER = '$HOST';

export interface ParseClusterConfigOptions {
  /** Host the document was fetched from; substitutes `$HOST` */
  sourceHost: string;
  useTls: boolean;
  /** Alternate-address network name, '' for the default addresses */
  networkType: string;
}

/**
 * Parse a cluster configuration document into a snapshot.
 *
 * @throws ProtocolError if the document is not valid JSON or does not match
 * {@link ClusterConfigSchema}
 */
export function parseClusterConfig(raw: string | Buffer, options: ParseClusterConfigOptions): TopologySnapshot {
  let json: unknown;
  try {
    json = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf8'));
  } catch (error) {
    throw new ProtocolError('cluster configuration is not valid JSON', { cause: error });
  }

  const result = ClusterConfigSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ProtocolError(
      `invalid cluster configuration at ${issue ? issue.path.join('.') : '<root>'}: ${issue?.message ?? 'unknown'}`,
      { cause: result.error }
    );
  }
  return snapshotFromClusterConfig(result.data, options);
}

function substituteHost(host: string | undefined, sourceHost: string): string {
  return host === undefined || host === '' || host === HOST_PLACEHOLDER ? sourceHost : host;
}

/**
 * Convert a validated configuration document to a snapshot.
 */
export function snapshotFromClusterConfig(config: ClusterConfig, options: ParseClusterConfigOptions): TopologySnapshot {
  const portIndex = options.useTls ? 1 : 0;
  // default-network kv address -> chosen node id, for the vbucket server list
  const idByDefaultKvAddress = new Map<string, string>();

  const nodes = config.nodesExt.map(nodeExt => {
    const defaultHost = substituteHost(nodeExt.hostname, options.sourceHost);
    const alternate = options.networkType ? nodeExt.alternateAddresses?.[options.networkType] : undefined;
    const hostname = alternate ? alternate.hostname : defaultHost;
    const ports = alternate?.ports ?? nodeExt.services;

    const endpoints: Partial<Record<ServiceType, string>> = {};
    for (const service of ALL_SERVICE_TYPES) {
      const port = ports[SERVICE_PORT_KEYS[service][portIndex]];
      if (port !== undefined && port > 0) {
        endpoints[service] = joinHostPort(hostname, port);
      }
    }

    const id = endpoints[ServiceType.KV] ?? endpoints[ServiceType.MGMT];
    if (id === undefined) {
      throw new ProtocolError(`node ${hostname} advertises neither kv nor mgmt`);
    }

    const defaultKvPort = nodeExt.services.kv;
    if (defaultKvPort !== undefined) {
      idByDefaultKvAddress.set(joinHostPort(defaultHost, defaultKvPort), id);
    }

    return { id, hostname, endpoints };
  });

  let vbuckets: TopologySnapshotInput['vbuckets'];
  const serverMap = config.vBucketServerMap;
  if (serverMap && serverMap.vBucketMap.length > 0) {
    const servers = serverMap.serverList.map(server => {
      const resolved = server.startsWith(`${HOST_PLACEHOLDER}:`)
        ? joinHostPort(options.sourceHost, Number.parseInt(server.slice(HOST_PLACEHOLDER.length + 1), 10))
        : server;
      return idByDefaultKvAddress.get(resolved) ?? resolved;
    });
    vbuckets = { numReplicas: serverMap.numReplicas, servers, map: serverMap.vBucketMap };
  }

  return createTopologySnapshot({
    revision: { epoch: config.revEpoch ?? 0, rev: config.rev },
    bucketName: config.name,
    nodes,
    vbuckets,
  });
}

// =============================================================================
// Routing
// =============================================================================

/**
 * vbucket of a key: bits 16..30 of its CRC32, modulo the vbucket count.
 */
export function vbucketIdForKey(key: string | Uint8Array, numVbuckets: number): number {
  const bytes = typeof key === 'string' ? Buffer.from(key, 'utf8') : key;
  return ((crc32(bytes) >>> 16) & 0x7fff) % numVbuckets;
}

/**
 * Node holding the active copy of a key, per the snapshot's vbucket map.
 *
 * @returns undefined when the snapshot has no map or the vbucket has no
 * active copy
 */
export function nodeForKey(
  snapshot: TopologySnapshot,
  key: string | Uint8Array
): { vbucketId: number; node: NodeId } | undefined {
  const vbuckets = snapshot.vbuckets;
  if (!vbuckets || vbuckets.numVbuckets === 0) {
    return undefined;
  }
  const vbucketId = vbucketIdForKey(key, vbuckets.numVbuckets);
  const serverIndex = vbuckets.map[vbucketId]?.[0] ?? -1;
  const node = serverIndex >= 0 ? vbuckets.servers[serverIndex] : undefined;
  return node === undefined ? undefined : { vbucketId, node };
}

/**
 * Nodes advertising an endpoint for the service, in snapshot order.
 */
export function nodesForService(snapshot: TopologySnapshot, service: ServiceType): readonly TopologyNode[] {
  return snapshot.nodes.filter(node => node.endpoints[service] !== undefined);
}

export function findNode(snapshot: TopologySnapshot, id: string): TopologyNode | undefined {
  return snapshot.nodes.find(node => node.id === id);
}
