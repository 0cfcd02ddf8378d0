/**
 * Binary protocol connection
 *
 * One socket to one node. Requests are tagged with a connection-unique
 * opaque and responses are matched back by it, so any number of requests
 * may be in flight at once (up to `maxQueueSize`) and arrive in any order.
 *
 * A request canceled before its response arrives only loses its opaque
 * registration: the socket stays usable and the late response is handed to
 * the orphan hook.
 *
 * @packageDocumentation
 */

import { connect as netConnect, isIP } from 'node:net';
import { connect as tlsConnect } from 'node:tls';
import type { Duplex } from 'node:stream';
import { ServiceType, splitHostPort, type NodeId } from '@clusterlink/shared-types';
import { saslPlainPayload, type AuthProvider, type ClientCertificate } from '../auth.js';
import {
  AgentError,
  ConfigurationError,
  KeyValueError,
  KvStatus,
  ProtocolError,
  RequestCanceledError,
  TransportError,
} from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { RetryReason } from '../retry/reasons.js';
import { TypedEventEmitter } from '../utils/event-emitter.js';
import { Magic, MemdFrameDecoder, Opcode, createRequest, encodePacket, type MemdPacket } from './memd-codec.js';

// =============================================================================
// Dialing
// =============================================================================

export interface DialTarget {
  host: string;
  port: number;
  useTls: boolean;
  tlsSkipVerify: boolean;
  certificate?: ClientCertificate;
}

/**
 * Opens the byte stream to a node. Resolves once the stream is writable.
 */
export type MemdDialer = (target: DialTarget, signal: AbortSignal) => Promise<Duplex>;

export const defaultDialer: MemdDialer = (target, signal) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = target.useTls
      ? tlsConnect({
          host: target.host,
          port: target.port,
          servername: isIP(target.host) === 0 ? target.host : undefined,
          rejectUnauthorized: !target.tlsSkipVerify,
          cert: target.certificate?.cert,
          key: target.certificate?.key,
        })
      : netConnect({ host: target.host, port: target.port });
    const readyEvent = target.useTls ? 'secureConnect' : 'connect';

    const cleanup = (): void => {
      socket.off('error', onError);
      socket.off(readyEvent, onReady);
      signal.removeEventListener('abort', onAbort);
    };
    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(error);
    };
    const onAbort = (): void => onError(new Error('dial aborted'));
    const onReady = (): void => {
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    };

    socket.once('error', onError);
    socket.once(readyEvent, onReady);
    signal.addEventListener('abort', onAbort, { once: true });
  });

// =============================================================================
// Types
// =============================================================================

/**
 * Completion of one request. `packet` is set whenever `error` is null.
 */
export type MemdResponseHandler = (error: AgentError | null, packet: MemdPacket | null) => void;

export interface MemdConnectionEvents {
  /** The connection closed; carries the failure that closed it, if any */
  close: AgentError | null;
}

export interface MemdConnectionOptions {
  endpoint: NodeId;
  auth: AuthProvider;
  userAgent: string;
  bucketName?: string;
  useTls: boolean;
  tlsSkipVerify: boolean;
  /** Bound on dial plus handshake */
  connectTimeoutMs: number;
  /** Requests allowed in flight at once */
  maxQueueSize: number;
  dialer?: MemdDialer;
  logger?: StructuredLogger;
  /** Receives responses nobody is waiting for any more */
  onOrphan?: (packet: MemdPacket, connection: MemdConnection) => void;
}

/** Features requested in HELLO: extended errors, select bucket, JSON */
const HELLO_FEATURES = [0x07, 0x08, 0x0b];

let connectionSequence = 0;

// =============================================================================
// MemdConnection
// =============================================================================

export class MemdConnection {
  readonly id: string;
  readonly endpoint: NodeId;
  readonly events: TypedEventEmitter<MemdConnectionEvents>;

  private readonly socket: Duplex;
  private readonly decoder = new MemdFrameDecoder();
  private readonly inflight = new Map<number, MemdResponseHandler>();
  private readonly maxQueueSize: number;
  private readonly logger: StructuredLogger;
  private readonly onOrphan?: (packet: MemdPacket, connection: MemdConnection) => void;
  private lastOpaque = 0;
  private closed = false;

  private constructor(socket: Duplex, options: MemdConnectionOptions, logger: StructuredLogger) {
    this.id = `memd-${++connectionSequence}`;
    this.endpoint = options.endpoint;
    this.socket = socket;
    this.maxQueueSize = options.maxQueueSize;
    this.onOrphan = options.onOrphan;
    this.logger = logger.child({ connection: this.id, node: options.endpoint });
    this.events = new TypedEventEmitter<MemdConnectionEvents>(this.logger);

    socket.on('data', (chunk: Buffer | string) => this.onData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    socket.on('error', (error: Error) => {
      this.close(new TransportError(`connection to ${this.endpoint} failed: ${error.message}`, { cause: error }));
    });
    socket.on('close', () => {
      this.close(new TransportError(`connection to ${this.endpoint} closed by peer`));
    });
  }

  /**
   * Dial the node, then authenticate (SASL PLAIN) and select the bucket.
   *
   * @throws TransportError with NODE_UNREACHABLE when the node could not be
   * reached in time; authentication and bucket failures are not retryable
   */
  static async connect(options: MemdConnectionOptions): Promise<MemdConnection> {
    const address = splitHostPort(options.endpoint);
    if (!address) {
      throw new ConfigurationError(`invalid node address ${options.endpoint}`, 'endpoint');
    }
    const logger = options.logger ?? createNoopLogger();
    const dialer = options.dialer ?? defaultDialer;
    const request = { service: ServiceType.KV, endpoint: options.endpoint };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.connectTimeoutMs);
    let connection: MemdConnection | undefined;
    try {
      const socket = await dialer(
        {
          host: address.host,
          port: address.port,
          useTls: options.useTls,
          tlsSkipVerify: options.tlsSkipVerify,
          certificate: options.auth.certificate?.(request),
        },
        controller.signal
      );
      connection = new MemdConnection(socket, options, logger);
      await connection.handshake(options, controller.signal);
      logger.debug('connected to {node}', { node: options.endpoint, connection: connection.id });
      return connection;
    } catch (error) {
      const failure = controller.signal.aborted
        ? new TransportError(`connect to ${options.endpoint} timed out after ${options.connectTimeoutMs}ms`, {
            cause: error,
            retryReason: RetryReason.NODE_UNREACHABLE,
          })
        : error instanceof AgentError && !error.isRetryable()
          ? error
          : new TransportError(
              `connect to ${options.endpoint} failed: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error, retryReason: RetryReason.NODE_UNREACHABLE }
            );
      connection?.close(failure);
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  get inFlight(): number {
    return this.inflight.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Write a request. The packet's opaque is replaced by a fresh one.
   *
   * @returns a function that stops waiting for the response
   * @throws TransportError (SOCKET_NOT_AVAILABLE) if the connection is
   * closed, or (NODE_OVERLOADED) if the in-flight queue is full
   */
  send(packet: MemdPacket, handler: MemdResponseHandler): () => void {
    if (this.closed) {
      throw new TransportError(`connection to ${this.endpoint} is closed`, {
        retryReason: RetryReason.SOCKET_NOT_AVAILABLE,
      });
    }
    if (this.inflight.size >= this.maxQueueSize) {
      throw new TransportError(`${this.inflight.size} requests already in flight to ${this.endpoint}`, {
        retryReason: RetryReason.NODE_OVERLOADED,
      });
    }

    const opaque = this.allocateOpaque();
    this.inflight.set(opaque, handler);
    this.socket.write(encodePacket({ ...packet, opaque }));
    return () => {
      this.inflight.delete(opaque);
    };
  }

  /**
   * Promise form of {@link send}.
   */
  request(packet: MemdPacket, signal?: AbortSignal): Promise<MemdPacket> {
    return new Promise<MemdPacket>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new RequestCanceledError('request aborted before it was sent'));
        return;
      }
      let stop: () => void = () => undefined;
      const onAbort = (): void => {
        stop();
        reject(new RequestCanceledError('request aborted', { cause: signal?.reason }));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      try {
        stop = this.send(packet, (error, response) => {
          signal?.removeEventListener('abort', onAbort);
          if (response) {
            resolve(response);
          } else {
            reject(error ?? new ProtocolError('response handler called without a packet'));
          }
        });
      } catch (error) {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      }
    });
  }

  /**
   * Close the socket. Requests still in flight fail with
   * SOCKET_CLOSED_IN_FLIGHT.
   */
  close(error: AgentError | null = null): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.destroy();

    const handlers = [...this.inflight.values()];
    this.inflight.clear();
    if (handlers.length > 0) {
      this.logger.debug('failing {count} in-flight requests', { count: handlers.length });
    }
    for (const handler of handlers) {
      this.deliver(
        handler,
        new TransportError(`connection to ${this.endpoint} closed with the request in flight`, {
          cause: error ?? undefined,
          retryReason: RetryReason.SOCKET_CLOSED_IN_FLIGHT,
          context: { node: this.endpoint },
        }),
        null
      );
    }
    this.events.emit('close', error);
    this.events.clear();
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async handshake(options: MemdConnectionOptions, signal: AbortSignal): Promise<void> {
    const features = Buffer.alloc(HELLO_FEATURES.length * 2);
    HELLO_FEATURES.forEach((feature, i) => features.writeUInt16BE(feature, i * 2));
    const hello = await this.request(
      createRequest(Opcode.HELLO, { key: Buffer.from(options.userAgent), value: features }),
      signal
    );
    if (hello.status !== KvStatus.SUCCESS) {
      this.logger.debug('HELLO rejected with status {status}', { status: hello.status });
    }

    const creds = options.auth.credentials({ service: ServiceType.KV, endpoint: options.endpoint });
    const auth = await this.request(
      createRequest(Opcode.SASL_AUTH, { key: Buffer.from('PLAIN'), value: saslPlainPayload(creds) }),
      signal
    );
    if (auth.status !== KvStatus.SUCCESS) {
      throw new TransportError(`authentication to ${options.endpoint} failed`, {
        cause: new KeyValueError(auth.status),
        context: { node: options.endpoint },
      });
    }

    if (options.bucketName) {
      const selected = await this.request(
        createRequest(Opcode.SELECT_BUCKET, { key: Buffer.from(options.bucketName) }),
        signal
      );
      if (selected.status !== KvStatus.SUCCESS) {
        throw new TransportError(`bucket ${options.bucketName} could not be selected on ${options.endpoint}`, {
          cause: new KeyValueError(selected.status),
          context: { node: options.endpoint },
        });
      }
    }
  }

  private allocateOpaque(): number {
    do {
      this.lastOpaque = (this.lastOpaque + 1) >>> 0 || 1;
    } while (this.inflight.has(this.lastOpaque));
    return this.lastOpaque;
  }

  private onData(chunk: Buffer): void {
    let packets: MemdPacket[];
    try {
      packets = this.decoder.push(chunk);
    } catch (error) {
      this.close(error instanceof AgentError ? error : new ProtocolError('undecodable stream', { cause: error }));
      return;
    }

    for (const packet of packets) {
      if (packet.magic !== Magic.RESPONSE) {
        this.logger.debug('ignoring server request with opcode {opcode}', { opcode: packet.opcode });
        continue;
      }
      const handler = this.inflight.get(packet.opaque);
      if (handler) {
        this.inflight.delete(packet.opaque);
        this.deliver(handler, null, packet);
      } else {
        this.onOrphan?.(packet, this);
      }
    }
  }

  private deliver(handler: MemdResponseHandler, error: AgentError | null, packet: MemdPacket | null): void {
    try {
      handler(error, packet);
    } catch (handlerError) {
      this.logger.error(
        'response handler threw',
        handlerError instanceof Error ? handlerError : new Error(String(handlerError))
      );
    }
  }
}
