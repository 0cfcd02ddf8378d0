/**
 * Authentication
 *
 * The agent asks an {@link AuthProvider} for credentials every time it opens
 * a binary connection or issues an HTTP request, and keeps nothing beyond
 * that call.
 *
 * @packageDocumentation
 */

import type { ServiceType } from '@clusterlink/shared-types';

/**
 * What the agent is about to authenticate.
 *
 * @public
 */
export interface AuthCredentialsRequest {
  /** Service the connection or request targets */
  service: ServiceType;
  /** host:port of the endpoint */
  endpoint: string;
}

/**
 * A username/password pair.
 *
 * @public
 */
export interface UserPassPair {
  username: string;
  password: string;
}

/**
 * Client certificate material, already loaded.
 *
 * @public
 */
export interface ClientCertificate {
  cert: string | Buffer;
  key: string | Buffer;
}

/**
 * Supplies credentials (and optionally a client certificate) per
 * connection attempt.
 *
 * @public
 * @since 0.1.0
 */
export interface AuthProvider {
  credentials(request: AuthCredentialsRequest): UserPassPair;
  certificate?(request: AuthCredentialsRequest): ClientCertificate | undefined;
}

/**
 * Fixed username/password authentication for every service.
 *
 * @example
 * ```typescript
 * const auth = new PasswordAuthProvider('app-user', 'test-secret');
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class PasswordAuthProvider implements AuthProvider {
  readonly #username: string;
  readonly #password: string;

  constructor(username: string, password: string) {
    this.#username = username;
    this.#password = password;
  }

  credentials(): UserPassPair {
    return { username: this.#username, password: this.#password };
  }
}

/**
 * Value of an HTTP `Authorization` header for the given credentials.
 */
export function basicAuthHeader(creds: UserPassPair): string {
  return `Basic ${Buffer.from(`${creds.username}:${creds.password}`, 'utf8').toString('base64')}`;
}

/**
 * SASL PLAIN initial response: `\0username\0password`.
 */
export function saslPlainPayload(creds: UserPassPair): Buffer {
  return Buffer.from(`\0${creds.username}\0${creds.password}`, 'utf8');
}
