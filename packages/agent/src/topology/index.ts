export {
  ClusterConfigSchema,
  compareRevisions,
  createTopologySnapshot,
  findNode,
  formatRevision,
  nodeForKey,
  nodesForService,
  parseClusterConfig,
  snapshotFromClusterConfig,
  vbucketIdForKey,
} from './snapshot.js';
export type {
  ClusterConfig,
  ParseClusterConfigOptions,
  TopologyNode,
  TopologyRevision,
  TopologySnapshot,
  TopologySnapshotInput,
  VbucketMap,
} from './snapshot.js';
export { TopologyManager } from './manager.js';
export type { NodeSelection, SelectOptions, TopologyManagerEvents, TopologyManagerOptions } from './manager.js';
export { ConfigPoller } from './poller.js';
export type { ConfigPollerOptions, PollMode, PollerConfig } from './poller.js';
