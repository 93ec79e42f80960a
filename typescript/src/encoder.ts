import { Encoder } from "cbor-x";
import { BufferSink, type ByteSink } from "./sink";
import {
  BREAK,
  ContainerKind,
  INFO_INDEFINITE,
  INFO_UINT16,
  INFO_UINT32,
  INFO_UINT64,
  INFO_UINT8,
  MaxInlineLength,
} from "./types";

/**
 * Encodes single values and container framing to an output sink.
 *
 * Container writers never inspect the bytes; they only decide which of these
 * calls to make and in what order.
 */
export interface PrimitiveEncoder {
  /** Encodes one scalar or compound value to the sink. */
  encode(value: unknown): void;
  /** Returns the header of a container holding `length` elements or pairs. */
  encodeLength(kind: ContainerKind, length: number): Uint8Array;
  /** Returns the start marker of an indefinite-length container. */
  encodeIndefinite(kind: ContainerKind): Uint8Array;
  /** Returns the token that closes an indefinite-length container. */
  encodeBreak(): Uint8Array;
  /** Appends raw bytes, such as a header from `encodeLength`, to the sink. */
  write(data: Uint8Array): void;
}

/** Options of the cbor-x value encoder. */
export type CborValueOptions = NonNullable<ConstructorParameters<typeof Encoder>[0]>;

/**
 * Options for CborEncoder configuration.
 */
export interface CborEncoderOptions {
  /** Destination of the encoded bytes. Default: a new BufferSink */
  sink?: ByteSink;
  /** Options forwarded to the cbor-x value encoder. */
  cbor?: CborValueOptions;
}

const BREAK_BYTES = new Uint8Array([BREAK]);

/**
 * CborEncoder is the PrimitiveEncoder for CBOR (RFC 8949).
 *
 * Values are encoded with cbor-x. Plain objects become ordinary CBOR maps
 * unless `cbor.useRecords` is switched back on.
 *
 * @example
 * ```typescript
 * const encoder = new CborEncoder();
 * encoder.encode("IETF");
 * encoder.bytes(); // 64 49 45 54 46
 * ```
 */
export class CborEncoder implements PrimitiveEncoder {
  readonly sink: ByteSink;
  private readonly values: Encoder;

  constructor(options: CborEncoderOptions = {}) {
    this.sink = options.sink ?? new BufferSink();
    this.values = new Encoder({ useRecords: false, ...options.cbor });
  }

  encode(value: unknown): void {
    this.sink.write(this.values.encode(value));
  }

  encodeLength(kind: ContainerKind, length: number): Uint8Array {
    return encodeHead(kind, length);
  }

  encodeIndefinite(kind: ContainerKind): Uint8Array {
    return new Uint8Array([kind | INFO_INDEFINITE]);
  }

  encodeBreak(): Uint8Array {
    return BREAK_BYTES;
  }

  write(data: Uint8Array): void {
    this.sink.write(data);
  }

  /**
   * Returns the bytes written so far when the sink is a BufferSink.
   * @throws TypeError for any other sink
   */
  bytes(): Uint8Array {
    if (!(this.sink instanceof BufferSink)) {
      throw new TypeError("bytes() is only available on a BufferSink");
    }
    return this.sink.bytes();
  }
}

/**
 * Encodes the initial byte and the big-endian argument of a container head.
 */
export function encodeHead(kind: ContainerKind, length: number): Uint8Array {
  if (length <= MaxInlineLength) {
    return new Uint8Array([kind | length]);
  }
  if (length <= 0xff) {
    return new Uint8Array([kind | INFO_UINT8, length]);
  }
  if (length <= 0xffff) {
    const head = new Uint8Array(3);
    head[0] = kind | INFO_UINT16;
    new DataView(head.buffer).setUint16(1, length);
    return head;
  }
  if (length <= 0xffffffff) {
    const head = new Uint8Array(5);
    head[0] = kind | INFO_UINT32;
    new DataView(head.buffer).setUint32(1, length);
    return head;
  }
  const head = new Uint8Array(9);
  head[0] = kind | INFO_UINT64;
  const view = new DataView(head.buffer);
  view.setUint32(1, Math.floor(length / 0x100000000));
  view.setUint32(5, length >>> 0);
  return head;
}
