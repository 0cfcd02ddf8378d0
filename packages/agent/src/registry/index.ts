export { PendingOperation } from './pending-operation.js';
export type {
  OperationCallback,
  PendingOpHandle,
  SettlementState,
  ResourceCounters,
  TrackedOperation,
  Disposer,
} from './pending-operation.js';
export { PendingOperationRegistry } from './registry.js';
export type { TrackOptions, RegistryOptions, RegistryStats } from './registry.js';
