import { EventEmitter } from "events";
import { ChunkedRingBuffer } from "../core/chunked-ring-buffer";
import type { Copyable } from "../core/ring-buffer";
import { streamLogger as logger } from "../utils/logger";

/**
 * Push-side adapter: feed it blocks of any size, get a "chunk" event for every
 * complete `chunkSize` run of elements, in order. Input is written no faster
 * than chunks are drained, so nothing is ever overwritten.
 */
export class ChunkEmitter<T extends Copyable = number> extends EventEmitter {
  private readonly buffer: ChunkedRingBuffer<T>;
  private _chunksEmitted = 0;
  private _elementsPushed = 0;

  constructor(capacity: number, chunkSize: number) {
    super();
    this.buffer = new ChunkedRingBuffer<T>(capacity, chunkSize);
    logger.debug({ capacity, chunkSize }, "ChunkEmitter initialized");
  }

  get chunkSize(): number { return this.buffer.chunkSize; }

  /**
   * Elements held but not yet emitted. Normally less than `chunkSize`; after a
   * listener threw it can also include whole chunks, which go out on the next
   * `push` or `flush`.
   */
  get pending(): number { return this.buffer.available; }

  get chunksEmitted(): number { return this._chunksEmitted; }
  get elementsPushed(): number { return this._elementsPushed; }

  /**
   * Whole chunks left over from an interrupted push are emitted first.
   * If a listener throws, the error propagates and input not yet written is
   * not accepted; `elementsPushed` tells how far the stream got.
   * @returns how many chunks this call emitted
   */
  push(data: ArrayLike<T>): number {
    let emitted = this.drain();
    let offset = 0;

    while (offset < data.length) {
      // after a drain fewer than chunkSize elements remain, so free >= 1
      const take = Math.min(this.buffer.free, data.length - offset);
      const slice = offset === 0 && take === data.length
        ? data
        : Array.from({ length: take }, (_, i) => data[offset + i]);

      this.buffer.write(slice);
      offset += take;
      this._elementsPushed += take;
      emitted += this.drain();
    }

    return emitted;
  }

  /** Emit any whole chunks still held, then hand back the partial tail and start over empty. */
  flush(): T[] {
    this.drain();
    const rest = this.buffer.readRemainder();
    logger.debug({ length: rest.length, chunksEmitted: this._chunksEmitted }, "Flushed partial chunk");
    return rest;
  }

  private drain(): number {
    let emitted = 0;
    while (this.buffer.canReadChunk) {
      const chunk = this.buffer.readChunk();
      this._chunksEmitted++;
      emitted++;
      logger.trace({ index: this._chunksEmitted - 1 }, "Chunk emitted");
      this.emit("chunk", chunk);
    }
    return emitted;
  }
}
