/**
 * Test helpers. Not part of the public API.
 */

import type { PrimitiveEncoder } from "./encoder";
import { ContainerKind } from "./types";

/**
 * Something that reached the sink, in the order it arrived.
 */
export type EncoderEvent =
  | { type: "value"; value: unknown }
  | { type: "header"; kind: ContainerKind; length: number }
  | { type: "indefinite"; kind: ContainerKind }
  | { type: "break" };

/**
 * PrimitiveEncoder that records what is written instead of producing CBOR.
 *
 * Framing tokens are only recorded once they are passed to `write`, so a
 * header that was built but never written does not show up.
 */
export class RecordingEncoder implements PrimitiveEncoder {
  readonly events: EncoderEvent[] = [];
  private readonly tokens = new WeakMap<Uint8Array, EncoderEvent>();

  encode(value: unknown): void {
    this.events.push({ type: "value", value });
  }

  encodeLength(kind: ContainerKind, length: number): Uint8Array {
    return this.token({ type: "header", kind, length });
  }

  encodeIndefinite(kind: ContainerKind): Uint8Array {
    return this.token({ type: "indefinite", kind });
  }

  encodeBreak(): Uint8Array {
    return this.token({ type: "break" });
  }

  write(data: Uint8Array): void {
    const event = this.tokens.get(data);
    if (event === undefined) {
      throw new Error("RecordingEncoder only accepts its own framing tokens");
    }
    this.events.push(event);
  }

  private token(event: EncoderEvent): Uint8Array {
    const data = new Uint8Array(1);
    this.tokens.set(data, event);
    return data;
  }
}

export const value = (v: unknown): EncoderEvent => ({ type: "value", value: v });

export const arrayHeader = (length: number): EncoderEvent => ({
  type: "header",
  kind: ContainerKind.Array,
  length,
});

export const mapHeader = (length: number): EncoderEvent => ({
  type: "header",
  kind: ContainerKind.Map,
  length,
});

export const arrayStart: EncoderEvent = { type: "indefinite", kind: ContainerKind.Array };
export const mapStart: EncoderEvent = { type: "indefinite", kind: ContainerKind.Map };
export const brk: EncoderEvent = { type: "break" };

/**
 * Returns the bytes as a lowercase hex string.
 */
export function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString("hex");
}
