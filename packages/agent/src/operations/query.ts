/**
 * Streaming query operations
 *
 * N1QL, analytics, search and view queries share one shape: POST (or GET)
 * a request to the service, then stream a JSON object whose rows attribute
 * is read incrementally by a {@link RowReader}. The attempt only succeeds
 * once the body has produced its first row, or ended cleanly without rows,
 * so errors reported up front settle the operation instead of surfacing
 * from an already delivered reader.
 *
 * A delivered reader keeps the operation's deadline: if it has not been
 * drained by then, it is aborted with a TimeoutError.
 *
 * @packageDocumentation
 */

import { ServiceType } from '@clusterlink/shared-types';
import type { AttemptContext, OperationRequest } from '../dispatcher.js';
import { AgentError, ConfigurationError, TimeoutError, type QueryErrorDescriptor } from '../errors/index.js';
import type { StructuredLogger } from '../logging/index.js';
import type { RetryStrategy } from '../retry/strategy.js';
import { RowReader } from '../streaming/row-reader.js';
import {
  errorFromBody,
  httpServiceError,
  queryErrorsFrom,
  readBody,
  responseChunkSource,
  type HttpRequest,
  type HttpTransport,
} from '../transport/http-client.js';

// =============================================================================
// Options
// =============================================================================

export interface QueryOptionsBase {
  /** Request body, already encoded */
  payload: string | Uint8Array;
  /** Absolute deadline, epoch milliseconds */
  deadline: number;
  retryStrategy?: RetryStrategy;
  signal?: AbortSignal;
  /**
   * Whether re-running the statement is harmless. Defaults to false for
   * N1QL and analytics statements, true for search and view queries.
   */
  idempotent?: boolean;
  waitForConfig?: boolean;
}

export type N1qlQueryOptions = QueryOptionsBase;
export type AnalyticsQueryOptions = QueryOptionsBase;

export interface SearchQueryOptions extends QueryOptionsBase {
  indexName: string;
}

export interface ViewQueryOptions extends Omit<QueryOptionsBase, 'payload'> {
  designDocumentName: string;
  viewName: string;
  /** Encoded query string, without the leading `?` */
  query?: string;
}

export interface QueryContext {
  http: HttpTransport;
  bucketName?: string;
  logger: StructuredLogger;
  now: () => number;
  /** Delivered readers that have not ended yet */
  readers: Set<RowReader>;
}

// =============================================================================
// Service profiles
// =============================================================================

interface StreamingProfile {
  name: string;
  service: ServiceType;
  rowsAttribute: string;
  idempotentByDefault: boolean;
  /** Errors reported in the final metadata, if any */
  errorsIn(metadata: Record<string, unknown>): QueryErrorDescriptor[];
}

function viewErrors(metadata: Record<string, unknown>): QueryErrorDescriptor[] {
  const errors: QueryErrorDescriptor[] = [];
  if (Array.isArray(metadata.errors)) {
    for (const entry of metadata.errors) {
      if (entry !== null && typeof entry === 'object') {
        const from = 'from' in entry && typeof entry.from === 'string' ? entry.from : 'view';
        const reason = 'reason' in entry && typeof entry.reason === 'string' ? entry.reason : 'unknown';
        errors.push({ code: 0, msg: `${from}: ${reason}` });
      }
    }
  }
  if (typeof metadata.error === 'string') {
    const reason = typeof metadata.reason === 'string' ? `: ${metadata.reason}` : '';
    errors.push({ code: 0, msg: `${metadata.error}${reason}` });
  }
  return errors;
}

function searchErrors(metadata: Record<string, unknown>): QueryErrorDescriptor[] {
  return typeof metadata.error === 'string' ? [{ code: 0, msg: metadata.error }] : [];
}

const N1QL: StreamingProfile = {
  name: 'n1ql_query',
  service: ServiceType.QUERY,
  rowsAttribute: 'results',
  idempotentByDefault: false,
  errorsIn: queryErrorsFrom,
};

const ANALYTICS: StreamingProfile = {
  name: 'analytics_query',
  service: ServiceType.ANALYTICS,
  rowsAttribute: 'results',
  idempotentByDefault: false,
  errorsIn: queryErrorsFrom,
};

const SEARCH: StreamingProfile = {
  name: 'search_query',
  service: ServiceType.SEARCH,
  rowsAttribute: 'hits',
  idempotentByDefault: true,
  errorsIn: searchErrors,
};

const VIEWS: StreamingProfile = {
  name: 'view_query',
  service: ServiceType.VIEWS,
  rowsAttribute: 'rows',
  idempotentByDefault: true,
  errorsIn: viewErrors,
};

// =============================================================================
// Requests
// =============================================================================

function streamingRequest(
  ctx: QueryContext,
  profile: StreamingProfile,
  options: Omit<QueryOptionsBase, 'payload'>,
  build: (attempt: AttemptContext) => HttpRequest
): OperationRequest<RowReader> {
  return {
    name: profile.name,
    service: profile.service,
    deadline: options.deadline,
    idempotent: options.idempotent ?? profile.idempotentByDefault,
    retryStrategy: options.retryStrategy,
    signal: options.signal,
    waitForConfig: options.waitForConfig,
    execute: attempt => executeStreaming(ctx, profile, attempt, build(attempt)),
    discard: reader => {
      reader.close().catch((error: unknown) => {
        ctx.logger.debug('closing a late {name} reader failed', {
          name: profile.name,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    },
  };
}

async function executeStreaming(
  ctx: QueryContext,
  profile: StreamingProfile,
  attempt: AttemptContext,
  request: HttpRequest
): Promise<RowReader> {
  const response = await ctx.http.send(request, attempt.signal);
  if (response.status < 200 || response.status >= 300) {
    const body = await readBody(response);
    throw errorFromBody(profile.service, response.status, body, attempt.endpoint);
  }

  let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  const reader = new RowReader(responseChunkSource(response), {
    rowsAttribute: profile.rowsAttribute,
    errorFromMetadata: metadata => {
      const errors = profile.errorsIn(metadata);
      return errors.length > 0 ? httpServiceError(profile.service, response.status, errors, attempt.endpoint) : null;
    },
    onRelease: () => {
      clearTimeout(deadlineTimer);
      ctx.readers.delete(reader);
    },
    logger: ctx.logger,
  });
  ctx.readers.add(reader);

  const logAbortFailure = (error: unknown): void => {
    ctx.logger.debug('aborting a {name} reader failed', {
      name: profile.name,
      error: error instanceof Error ? error.message : String(error),
    });
  };
  const onAbort = (): void => {
    const reason: unknown = attempt.signal.reason;
    reader.abort(reason instanceof AgentError ? reason : new TimeoutError()).catch(logAbortFailure);
  };
  attempt.signal.addEventListener('abort', onAbort, { once: true });
  try {
    await reader.peek();
  } finally {
    attempt.signal.removeEventListener('abort', onAbort);
  }

  const failure = reader.err();
  if (failure && reader.bufferedRows === 0) {
    throw failure;
  }
  if (!reader.isEnded) {
    deadlineTimer = setTimeout(() => {
      reader
        .abort(new TimeoutError('row stream was not consumed before the operation deadline'))
        .catch(logAbortFailure);
    }, Math.max(0, attempt.deadline - ctx.now()));
  }
  return reader;
}

function jsonPost(
  service: ServiceType,
  path: string,
  payload: string | Uint8Array
): (attempt: AttemptContext) => HttpRequest {
  return (attempt: AttemptContext): HttpRequest => ({
    service,
    endpoint: attempt.endpoint,
    method: 'POST',
    path,
    body: payload,
    contentType: 'application/json',
  });
}

export function n1qlQueryRequest(ctx: QueryContext, options: N1qlQueryOptions): OperationRequest<RowReader> {
  return streamingRequest(ctx, N1QL, options, jsonPost(ServiceType.QUERY, '/query/service', options.payload));
}

export function analyticsQueryRequest(
  ctx: QueryContext,
  options: AnalyticsQueryOptions
): OperationRequest<RowReader> {
  return streamingRequest(
    ctx,
    ANALYTICS,
    options,
    jsonPost(ServiceType.ANALYTICS, '/analytics/service', options.payload)
  );
}

/**
 * @throws ConfigurationError if the index name is empty
 */
export function searchQueryRequest(ctx: QueryContext, options: SearchQueryOptions): OperationRequest<RowReader> {
  if (options.indexName.length === 0) {
    throw new ConfigurationError('search queries need an index name', 'indexName');
  }
  const path = `/api/index/${encodeURIComponent(options.indexName)}/query`;
  return streamingRequest(ctx, SEARCH, options, jsonPost(ServiceType.SEARCH, path, options.payload));
}

/**
 * @throws ConfigurationError if the agent has no bucket or a name is empty
 */
export function viewQueryRequest(ctx: QueryContext, options: ViewQueryOptions): OperationRequest<RowReader> {
  if (!ctx.bucketName) {
    throw new ConfigurationError('view queries need a bucket', 'bucketName');
  }
  if (options.designDocumentName.length === 0 || options.viewName.length === 0) {
    throw new ConfigurationError('view queries need a design document and a view name', 'viewName');
  }
  const path =
    `/${encodeURIComponent(ctx.bucketName)}/_design/${encodeURIComponent(options.designDocumentName)}` +
    `/_view/${encodeURIComponent(options.viewName)}${options.query ? `?${options.query}` : ''}`;
  return streamingRequest(ctx, VIEWS, options, attempt => ({
    service: ServiceType.VIEWS,
    endpoint: attempt.endpoint,
    method: 'GET',
    path,
  }));
}
