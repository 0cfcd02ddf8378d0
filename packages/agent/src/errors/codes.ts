/**
 * Agent Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

/**
 * Machine-readable codes carried by every {@link AgentError}.
 */
export enum ErrorCode {
  /** The caller (or shutdown) cancelled the operation before it settled */
  REQUEST_CANCELED = 'OP_REQUEST_CANCELED',
  /** The operation's deadline elapsed before it settled */
  TIMEOUT = 'OP_TIMEOUT',
  /** The circuit breaker rejected the target */
  CIRCUIT_OPEN = 'ROUTE_CIRCUIT_OPEN',
  /** No topology snapshot has been obtained yet */
  TOPOLOGY_UNAVAILABLE = 'ROUTE_TOPOLOGY_UNAVAILABLE',
  /** No node in the topology offers the requested service */
  SERVICE_NOT_AVAILABLE = 'ROUTE_SERVICE_NOT_AVAILABLE',
  /** Connection-level failure */
  TRANSPORT_FAILURE = 'NET_TRANSPORT_FAILURE',
  /** The peer sent something that could not be decoded */
  PROTOCOL_FAILURE = 'NET_PROTOCOL_FAILURE',
  /** Invalid configuration or request */
  CONFIGURATION_ERROR = 'CFG_INVALID',
  /** A key/value node answered with a non-success status */
  KV_STATUS = 'SVC_KV_STATUS',
  /** An HTTP service answered with an error */
  HTTP_SERVICE = 'SVC_HTTP_ERROR',
  /** The agent has been closed */
  AGENT_CLOSED = 'AGENT_CLOSED',
}

/**
 * Binary-protocol response statuses the agent interprets.
 */
export enum KvStatus {
  SUCCESS = 0x00,
  KEY_NOT_FOUND = 0x01,
  KEY_EXISTS = 0x02,
  TOO_BIG = 0x03,
  INVALID_ARGS = 0x04,
  NOT_STORED = 0x05,
  NOT_MY_VBUCKET = 0x07,
  NO_BUCKET = 0x08,
  LOCKED = 0x09,
  AUTH_ERROR = 0x20,
  AUTH_CONTINUE = 0x21,
  ACCESS_ERROR = 0x24,
  UNKNOWN_COMMAND = 0x81,
  OUT_OF_MEMORY = 0x82,
  NOT_SUPPORTED = 0x83,
  INTERNAL_ERROR = 0x84,
  BUSY = 0x85,
  TMP_FAIL = 0x86,
  SYNC_WRITE_IN_PROGRESS = 0xa2,
  SYNC_WRITE_RECOMMIT_IN_PROGRESS = 0xa8,
}

/**
 * Human-readable name of a binary-protocol status.
 */
export function kvStatusName(status: number): string {
  const name = KvStatus[status];
  return typeof name === 'string' ? name : `UNKNOWN_STATUS_0x${status.toString(16).padStart(2, '0')}`;
}
