export { JsonRowDecoder } from './json-row-decoder.js';
export { RowReader } from './row-reader.js';
export type { ChunkSource, RowReaderOptions } from './row-reader.js';
