export { RingBuffer } from "./core/ring-buffer";
export type { Copyable, WritableArrayLike } from "./core/ring-buffer";
export { ChunkedRingBuffer } from "./core/chunked-ring-buffer";
export {
  RingBufferError,
  InvalidArgumentError,
  InvalidOperationError,
} from "./core/errors";
export type { RingBufferErrorCode, RingBufferErrorDetails } from "./core/errors";
export { ChunkEmitter } from "./stream/chunk-emitter";
export { logger, createLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
