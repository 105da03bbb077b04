import { InvalidArgumentError, InvalidOperationError } from "./errors";
import { RingBuffer, type Copyable, type WritableArrayLike } from "./ring-buffer";
import { chunkLogger as logger } from "../utils/logger";

/**
 * RingBuffer that only hands data out in whole chunks of `chunkSize`.
 * Chunk boundaries are not stored; a chunk is simply the next `chunkSize`
 * elements from the read cursor.
 */
export class ChunkedRingBuffer<T extends Copyable = number> {
  private readonly buffer: RingBuffer<T>;
  readonly chunkSize: number;

  constructor(capacity: number, chunkSize: number) {
    if (!Number.isInteger(capacity) || capacity <= 1) {
      throw new InvalidArgumentError("Capacity must be an integer greater than 1", { capacity });
    }
    if (!Number.isInteger(chunkSize) || chunkSize <= 1) {
      throw new InvalidArgumentError("Chunk size must be an integer greater than 1", { chunkSize });
    }
    if (chunkSize > capacity) {
      throw new InvalidArgumentError("Chunk size must be less than or equal to capacity", {
        capacity,
        chunkSize,
      });
    }

    this.buffer = new RingBuffer<T>(capacity);
    this.chunkSize = chunkSize;
    logger.debug({ capacity, chunkSize }, "ChunkedRingBuffer created");
  }

  get capacity(): number { return this.buffer.capacity; }
  get available(): number { return this.buffer.available; }
  get free(): number { return this.buffer.free; }
  get overrun(): number { return this.buffer.overrun; }

  get chunksAvailable(): number { return Math.floor(this.buffer.available / this.chunkSize); }
  get canReadChunk(): boolean { return this.chunksAvailable > 0; }

  /** Same contract as {@link RingBuffer.write}. */
  write(data: ArrayLike<T>): boolean {
    return this.buffer.write(data);
  }

  readChunk(): T[] {
    if (!this.canReadChunk) {
      throw new InvalidOperationError("No chunks available to read", { available: this.available });
    }
    return this.buffer.read(this.chunkSize);
  }

  /**
   * Consume the next chunk into `chunk`, which must be exactly `chunkSize` long.
   * Returns false, leaving the buffer as it was, when no whole chunk is buffered.
   */
  readChunkInto(chunk: WritableArrayLike<T>): boolean {
    this.assertChunkLength(chunk);
    if (!this.canReadChunk) return false;
    return this.buffer.readInto(chunk);
  }

  peekChunk(): T[] {
    if (!this.canReadChunk) {
      throw new InvalidOperationError("No chunks available to peek", { available: this.available });
    }
    return this.buffer.peek(this.chunkSize);
  }

  peekChunkInto(chunk: WritableArrayLike<T>): boolean {
    this.assertChunkLength(chunk);
    if (!this.canReadChunk) return false;
    return this.buffer.peekInto(chunk);
  }

  /** Drop the chunk a previous peek returned. */
  skipChunk(): boolean {
    if (!this.canReadChunk) return false;
    this.buffer.skip(this.chunkSize);
    return true;
  }

  clear(): void {
    this.buffer.clear();
  }

  /** Remaining partial chunk, consumed. Used when a stream ends. */
  readRemainder(): T[] {
    return this.buffer.read();
  }

  private assertChunkLength(chunk: WritableArrayLike<T>): void {
    if (chunk.length !== this.chunkSize) {
      throw new InvalidArgumentError("Chunk length must equal the chunk size of the buffer", {
        length: chunk.length,
        chunkSize: this.chunkSize,
      });
    }
  }
}
