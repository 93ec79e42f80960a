/**
 * Byte sinks for encoded CBOR output.
 *
 * A sink is append-only: bytes are never rewritten once written, which is why
 * container headers have to be emitted before their contents.
 */

import { SinkClosedError } from "./errors";

/** Default initial buffer capacity for BufferSink. */
const INITIAL_CAPACITY = 256;

/** Growth factor for BufferSink. */
const GROWTH_FACTOR = 2;

/**
 * Append-only destination for encoded bytes.
 */
export interface ByteSink {
  /** Appends the given bytes. */
  write(data: Uint8Array): void;
  /** Number of bytes written so far. */
  readonly position: number;
}

/**
 * Options for BufferSink configuration.
 */
export interface BufferSinkOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
}

/**
 * BufferSink collects encoded bytes in a growable in-memory buffer.
 */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array;
  private pos: number;

  constructor(options: BufferSinkOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialCapacity ?? INITIAL_CAPACITY));
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the sink for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified additional capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  write(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }
}

/**
 * Anything that accepts byte chunks, such as a Node.js `Writable`.
 */
export interface ChunkTarget {
  write(chunk: Uint8Array): unknown;
}

/**
 * StreamSink forwards every chunk to a target as soon as it is written.
 *
 * Chunks are copied before being handed over, so the target may hold on to
 * them. The sink does not wait for the target to drain.
 *
 * @example
 * ```typescript
 * const sink = new StreamSink(fs.createWriteStream("out.cbor"));
 * const writer = new Writer(new CborEncoder({ sink }));
 * writer.array().use((a) => {
 *   for (const row of rows) a.write(row);
 * });
 * sink.close();
 * ```
 */
export class StreamSink implements ByteSink {
  private readonly target: ChunkTarget;
  private pos: number;
  private closed: boolean;

  constructor(target: ChunkTarget) {
    this.target = target;
    this.pos = 0;
    this.closed = false;
  }

  /**
   * Returns the number of bytes forwarded so far.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns true if the sink is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Forwards a chunk to the target.
   *
   * @throws SinkClosedError if the sink is closed
   */
  write(data: Uint8Array): void {
    if (this.closed) {
      throw new SinkClosedError();
    }
    this.target.write(data.slice());
    this.pos += data.length;
  }

  /**
   * Closes the sink. The target itself is left open.
   */
  close(): void {
    this.closed = true;
  }
}
