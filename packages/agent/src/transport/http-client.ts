/**
 * HTTP transport
 *
 * Issues requests to the HTTP services with `fetch`. The caller passes the
 * attempt's AbortSignal; aborting it cancels the request or, once headers
 * have arrived, the body transfer.
 *
 * @packageDocumentation
 */

import type { ServiceType } from '@clusterlink/shared-types';
import { basicAuthHeader, type AuthProvider } from '../auth.js';
import {
  AgentError,
  HttpServiceError,
  ProtocolError,
  RequestCanceledError,
  TransportError,
  maskUrl,
  type QueryErrorDescriptor,
} from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { RetryReason } from '../retry/reasons.js';
import type { ChunkSource } from '../streaming/row-reader.js';

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpRequest {
  service: ServiceType;
  /** host:port */
  endpoint: string;
  method: 'GET' | 'POST';
  /** Path and query string */
  path: string;
  body?: string | Uint8Array;
  contentType?: string;
}

export interface HttpTransportOptions {
  auth: AuthProvider;
  useTls: boolean;
  userAgent: string;
  fetch?: FetchFunction;
  logger?: StructuredLogger;
}

export class HttpTransport {
  private readonly auth: AuthProvider;
  private readonly scheme: 'http' | 'https';
  private readonly userAgent: string;
  private readonly fetchFn: FetchFunction;
  private readonly logger: StructuredLogger;

  constructor(options: HttpTransportOptions) {
    this.auth = options.auth;
    this.scheme = options.useTls ? 'https' : 'http';
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * Send the request and resolve once response headers have arrived.
   *
   * @throws RequestCanceledError (or the signal's AgentError reason) when
   * aborted, TransportError with NODE_UNREACHABLE when the request failed
   */
  async send(request: HttpRequest, signal: AbortSignal): Promise<Response> {
    const url = `${this.scheme}://${request.endpoint}${request.path}`;
    const creds = this.auth.credentials({ service: request.service, endpoint: request.endpoint });
    const headers: Record<string, string> = {
      authorization: basicAuthHeader(creds),
      'user-agent': this.userAgent,
    };
    if (request.contentType) {
      headers['content-type'] = request.contentType;
    }

    try {
      return await this.fetchFn(url, { method: request.method, headers, body: request.body, signal });
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason instanceof AgentError
          ? signal.reason
          : new RequestCanceledError('http request aborted', { cause: error });
      }
      this.logger.debug('{method} {url} failed', {
        method: request.method,
        url: maskUrl(url),
        error: error instanceof Error ? error.message : String(error),
      });
      throw new TransportError(`${request.service} request to ${request.endpoint} failed`, {
        cause: error,
        retryReason: RetryReason.NODE_UNREACHABLE,
        context: { node: request.endpoint, service: request.service },
      });
    }
  }
}

// =============================================================================
// Response bodies
// =============================================================================

/**
 * Chunk source over a response body, for a {@link RowReader}.
 */
export function responseChunkSource(response: Response): ChunkSource {
  const body = response.body;
  if (!body) {
    return {
      next: () => Promise.resolve(null),
      cancel: () => Promise.resolve(),
    };
  }
  const reader = body.getReader();
  return {
    async next(): Promise<Uint8Array | null> {
      const { done, value } = await reader.read();
      if (done) {
        return null;
      }
      if (!(value instanceof Uint8Array)) {
        throw new ProtocolError('response body produced a non-binary chunk');
      }
      return value;
    },
    cancel(reason: AgentError): Promise<void> {
      return reader.cancel(reason);
    },
  };
}

/**
 * Read a whole (small) response body.
 */
export async function readBody(response: Response): Promise<Buffer> {
  return Buffer.from(await response.arrayBuffer());
}

// =============================================================================
// Error mapping
// =============================================================================

/**
 * Extract `{code, msg}` descriptors from a decoded `errors` attribute.
 */
export function queryErrorsFrom(metadata: Record<string, unknown>): QueryErrorDescriptor[] {
  const errors = metadata.errors;
  if (!Array.isArray(errors)) {
    return [];
  }
  const descriptors: QueryErrorDescriptor[] = [];
  for (const entry of errors) {
    if (entry !== null && typeof entry === 'object') {
      const code = 'code' in entry && typeof entry.code === 'number' ? entry.code : 0;
      const msg = 'msg' in entry && typeof entry.msg === 'string' ? entry.msg : '';
      descriptors.push({ code, msg });
    }
  }
  return descriptors;
}

/**
 * Codes that tell the client to retry, per service.
 */
const RETRYABLE_QUERY_CODES: Readonly<Record<string, ReadonlyMap<number, RetryReason>>> = {
  query: new Map([
    [4040, RetryReason.QUERY_PREPARED_STATEMENT_FAILURE],
    [4050, RetryReason.QUERY_PREPARED_STATEMENT_FAILURE],
    [4070, RetryReason.QUERY_PREPARED_STATEMENT_FAILURE],
  ]),
  analytics: new Map([
    [23000, RetryReason.SERVICE_UNAVAILABLE],
    [23003, RetryReason.SERVICE_UNAVAILABLE],
    [23007, RetryReason.SERVICE_UNAVAILABLE],
  ]),
};

/**
 * Retry reason implied by an HTTP status and reported error codes.
 */
export function retryReasonFor(
  service: ServiceType,
  statusCode: number,
  errors: readonly QueryErrorDescriptor[]
): RetryReason | undefined {
  const codes = RETRYABLE_QUERY_CODES[service];
  if (codes) {
    for (const error of errors) {
      const reason = codes.get(error.code);
      if (reason) {
        return reason;
      }
    }
  }
  if (statusCode === 503) {
    return RetryReason.SERVICE_UNAVAILABLE;
  }
  if (statusCode === 429) {
    return RetryReason.NODE_OVERLOADED;
  }
  return undefined;
}

/**
 * Build the error for a response that reported failure.
 */
export function httpServiceError(
  service: ServiceType,
  statusCode: number,
  errors: readonly QueryErrorDescriptor[],
  endpoint: string
): HttpServiceError {
  return new HttpServiceError(service, statusCode, errors, {
    retryReason: retryReasonFor(service, statusCode, errors),
    context: { node: endpoint, service, metadata: { statusCode } },
  });
}

/**
 * Error for a non-2xx response whose whole body has been read. JSON bodies
 * contribute their `errors` (or `error`) attribute.
 */
export function errorFromBody(service: ServiceType, statusCode: number, body: Buffer, endpoint: string): HttpServiceError {
  let errors: QueryErrorDescriptor[] = [];
  try {
    const parsed: unknown = JSON.parse(body.toString('utf8'));
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      const metadata: Record<string, unknown> = { ...parsed };
      errors = queryErrorsFrom(metadata);
      if (errors.length === 0 && typeof metadata.error === 'string') {
        errors = [{ code: 0, msg: metadata.error }];
      }
    }
  } catch {
    const text = body.toString('utf8').trim();
    if (text.length > 0) {
      errors = [{ code: 0, msg: text.slice(0, 256) }];
    }
  }
  return httpServiceError(service, statusCode, errors, endpoint);
}
