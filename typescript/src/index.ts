/**
 * cbor-scoped-writer - Streaming CBOR writer with scoped containers
 *
 * Nested arrays and maps are written straight to the output as they are
 * produced. Definite-length containers must receive exactly their declared
 * number of elements before they close.
 *
 * @example
 * ```typescript
 * import { marshal } from 'cbor-scoped-writer';
 *
 * const data = marshal(rows, (writer, rows) => {
 *   writer.array(rows.length).use((a) => {
 *     for (const row of rows) {
 *       a.map(2).use((m) => {
 *         m.write("id", row.id);
 *         m.write("name", row.name);
 *       });
 *     }
 *   });
 * });
 * ```
 */

// Core types
export {
  ContainerKind,
  INDEFINITE,
  BREAK,
  MaxInlineLength,
  definite,
  toLength,
} from "./types";
export type { Length } from "./types";

// Errors
export {
  CborWriterError,
  ConfigurationError,
  WriterProtocolError,
  ScopeExitError,
  SinkClosedError,
} from "./errors";
export type { WriterProtocolReason } from "./errors";

// Sinks
export { BufferSink, StreamSink } from "./sink";
export type { ByteSink, BufferSinkOptions, ChunkTarget } from "./sink";

// Encoder
export { CborEncoder, encodeHead } from "./encoder";
export type { PrimitiveEncoder, CborEncoderOptions, CborValueOptions } from "./encoder";

// Scopes
export { ContainerScope, ScopeState } from "./scope";

// Writers
import { CborEncoder } from "./encoder";
import { Writer } from "./writer";
export { Writer, ArrayWriter, MapWriter } from "./writer";
export type { ValueWriter, PairWriter, ContainerWriter } from "./writer";

/**
 * Library version.
 */
export const VERSION = "1.0.0";

/**
 * Marshal encodes a value using a custom writer function and returns the
 * CBOR bytes.
 */
export function marshal<T>(value: T, encode: (writer: Writer, value: T) => void): Uint8Array {
  const encoder = new CborEncoder();
  encode(new Writer(encoder), value);
  return encoder.bytes().slice();
}
