/**
 * Branded identifier types.
 *
 * Branded types prevent accidentally passing a plain string where a node
 * address or an operation id is expected. Use the factory functions to obtain
 * instances; they validate input while dev mode (or strict mode) is enabled.
 *
 * @packageDocumentation
 */

import { _shouldValidate, isStrictMode } from './config.js';

declare const NodeIdBrand: unique symbol;
declare const OperationIdBrand: unique symbol;

/**
 * Address of a cluster node in `host:port` form, where the port is the node's
 * binary (key/value) port, or its management port when it runs no key/value
 * service. Used as the identity of a node in topology
 * snapshots and as half of a circuit-breaker key.
 *
 * @example
 * ```typescript
 * const node: NodeId = createNodeId('10.0.0.12:11210');
 * ```
 *
 * @public
 * @stability stable
 */
export type NodeId = string & { readonly [NodeIdBrand]: never };

/**
 * Process-unique identifier of a pending operation.
 *
 * @public
 * @stability stable
 */
export type OperationId = string & { readonly [OperationIdBrand]: never };

/**
 * Create a typed NodeId from a `host:port` string.
 * IPv6 hosts must be bracketed (`[::1]:11210`).
 * @throws Error if the address has no host or no numeric port (in dev mode)
 * @public
 */
export function createNodeId(address: string): NodeId {
  if (_shouldValidate()) {
    const parsed = splitHostPort(address);
    if (!parsed) {
      throw new Error(`NodeId must be in host:port form, got '${address}'`);
    }
    if (isStrictMode() && (parsed.port < 1 || parsed.port > 65535)) {
      throw new Error(`NodeId port out of range: ${parsed.port}`);
    }
  }
  return address as NodeId;
}

/**
 * Create a typed OperationId.
 * @throws Error if id is empty or whitespace-only (in dev mode)
 * @public
 */
export function createOperationId(id: string): OperationId {
  if (_shouldValidate() && id.trim().length === 0) {
    throw new Error('OperationId cannot be empty');
  }
  return id as OperationId;
}

/**
 * Split a `host:port` address into its parts.
 *
 * @returns the host (without IPv6 brackets) and port, or null when the
 * address is not in `host:port` form
 * @public
 */
export function splitHostPort(address: string): { host: string; port: number } | null {
  const match = /^(\[[^\]]+\]|[^:[\]]+):(\d+)$/.exec(address);
  if (!match) {
    return null;
  }
  const host = match[1].startsWith('[') ? match[1].slice(1, -1) : match[1];
  return { host, port: Number.parseInt(match[2], 10) };
}

/**
 * Join a host and port into `host:port`, bracketing IPv6 hosts.
 * @public
 */
export function joinHostPort(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
