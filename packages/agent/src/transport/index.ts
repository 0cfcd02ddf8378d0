export { Datatype, HEADER_SIZE, MAX_BODY_SIZE, Magic, MemdFrameDecoder, Opcode, createRequest, encodePacket } from './memd-codec.js';
export type { MemdPacket } from './memd-codec.js';
export { MemdConnection, defaultDialer } from './memd-connection.js';
export type {
  DialTarget,
  MemdConnectionEvents,
  MemdConnectionOptions,
  MemdDialer,
  MemdResponseHandler,
} from './memd-connection.js';
export { MemdPool } from './memd-pool.js';
export type { MemdPoolOptions, MemdPoolStats } from './memd-pool.js';
export {
  HttpTransport,
  errorFromBody,
  httpServiceError,
  queryErrorsFrom,
  readBody,
  responseChunkSource,
  retryReasonFor,
} from './http-client.js';
export type { FetchFunction, HttpRequest, HttpTransportOptions } from './http-client.js';
