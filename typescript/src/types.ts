import { ConfigurationError } from "./errors";

/**
 * CBOR container major types, pre-shifted into the high three bits of the
 * initial byte.
 */
export enum ContainerKind {
  /** Major type 4 */
  Array = 0x80,
  /** Major type 5 */
  Map = 0xa0,
}

/**
 * Additional-information values of the initial byte.
 */
export const INFO_UINT8 = 24;
export const INFO_UINT16 = 25;
export const INFO_UINT32 = 26;
export const INFO_UINT64 = 27;
export const INFO_INDEFINITE = 31;

/**
 * Largest count that fits in the initial byte itself.
 */
export const MaxInlineLength = 23;

/**
 * Terminator of an indefinite-length item.
 */
export const BREAK = 0xff;

/**
 * Container length: a declared element count, or an open-ended container that
 * ends with a break token.
 */
export type Length =
  | { readonly kind: "definite"; readonly count: number }
  | { readonly kind: "indefinite" };

export const INDEFINITE: Length = { kind: "indefinite" };

/**
 * Creates a definite length.
 * @throws ConfigurationError if count is not a non-negative safe integer
 */
export function definite(count: number): Length {
  if (typeof count !== "number" || !Number.isSafeInteger(count) || count < 0) {
    throw new ConfigurationError(
      `Length must be a non-negative integer or undefined, got ${String(count)}`
    );
  }
  return { kind: "definite", count };
}

/**
 * Converts the optional `length` argument of `array()`/`map()` into a Length.
 * An absent length means indefinite.
 */
export function toLength(length?: number): Length {
  return length === undefined ? INDEFINITE : definite(length);
}
