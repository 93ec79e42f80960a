import type { PrimitiveEncoder } from "./encoder";
import { type ContainerScope, ScopeState } from "./scope";
import { ContainerKind, INDEFINITE, type Length, toLength } from "./types";

/**
 * Operations of a position that takes plain values: the top level and the
 * inside of an array.
 */
export interface ValueWriter {
  /** Encodes one value. */
  write(value: unknown): void;
  /** Starts a nested array; an absent length means indefinite. */
  array(length?: number): ContainerScope<ArrayWriter>;
  /** Starts a nested map; an absent length means indefinite. */
  map(length?: number): ContainerScope<MapWriter>;
}

/**
 * Operations of a position that takes key/value pairs: the inside of a map.
 */
export interface PairWriter {
  /** Encodes one key/value pair. */
  write(key: unknown, value: unknown): void;
  /** Encodes `key` and starts an array as its value. */
  array(key: unknown, length?: number): ContainerScope<ArrayWriter>;
  /** Encodes `key` and starts a map as its value. */
  map(key: unknown, length?: number): ContainerScope<MapWriter>;
}

/**
 * State common to the writers bound to an open container.
 */
export interface ContainerWriter {
  /** Remaining commits of a definite container, undefined when indefinite. */
  readonly capacity: number | undefined;
  /** True once the container's scope has been closed. */
  readonly isClosed: boolean;
}

function arrayScope(state: ScopeState, length: Length): ContainerScope<ArrayWriter> {
  return state.nest(ContainerKind.Array, length, (inner) => new ArrayWriter(inner));
}

function mapScope(state: ScopeState, length: Length): ContainerScope<MapWriter> {
  return state.nest(ContainerKind.Map, length, (inner) => new MapWriter(inner));
}

/**
 * Writer is the entry point for streaming CBOR items.
 *
 * Each call to `write`, `array` or `map` starts an independent top-level item.
 *
 * @example
 * ```typescript
 * const encoder = new CborEncoder();
 * const writer = new Writer(encoder);
 *
 * writer.array(3).use((a) => {
 *   a.write(1);
 *   a.array(2).use((inner) => {
 *     inner.write(2);
 *     inner.write(3);
 *   });
 *   a.map().use((m) => m.write("k", "v"));
 * });
 *
 * const data = encoder.bytes();
 * ```
 */
export class Writer implements ValueWriter {
  private readonly state: ScopeState;

  constructor(encoder: PrimitiveEncoder) {
    this.state = new ScopeState(encoder, INDEFINITE);
  }

  /**
   * Returns the encoder this writer emits to.
   */
  get encoder(): PrimitiveEncoder {
    return this.state.encoder;
  }

  /**
   * Writes a single top-level value.
   *
   * @throws WriterProtocolError if a top-level container is still open
   */
  write(value: unknown): void {
    this.state.ensureWritable();
    this.state.encoder.encode(value);
  }

  /**
   * Starts a top-level array.
   *
   * @param length - Number of elements, or undefined for an indefinite array
   * @throws ConfigurationError if length is not a non-negative integer
   */
  array(length?: number): ContainerScope<ArrayWriter> {
    return arrayScope(this.state, toLength(length));
  }

  /**
   * Starts a top-level map.
   *
   * @param length - Number of key/value pairs, or undefined for an indefinite map
   * @throws ConfigurationError if length is not a non-negative integer
   */
  map(length?: number): ContainerScope<MapWriter> {
    return mapScope(this.state, toLength(length));
  }
}

/**
 * ArrayWriter writes the elements of an open array.
 *
 * A definite array accepts exactly its declared number of elements; each
 * `write`, `array` and `map` call takes one, so a nested container counts as a
 * single element of its parent.
 */
export class ArrayWriter implements ValueWriter, ContainerWriter {
  private readonly state: ScopeState;

  /** @internal Created by ContainerScope. */
  constructor(state: ScopeState) {
    this.state = state;
  }

  get capacity(): number | undefined {
    return this.state.capacity;
  }

  get isClosed(): boolean {
    return this.state.isClosed;
  }

  /**
   * Writes one element.
   *
   * @throws WriterProtocolError("capacity exceeded") if the array is full
   * @throws WriterProtocolError("writer is closed") after the scope closed
   */
  write(value: unknown): void {
    this.state.commit();
    this.state.encoder.encode(value);
  }

  /**
   * Starts an array as the next element.
   *
   * @throws ConfigurationError if length is not a non-negative integer
   * @throws WriterProtocolError("capacity exceeded") if the array is full
   */
  array(length?: number): ContainerScope<ArrayWriter> {
    const resolved = toLength(length);
    this.state.commit();
    return arrayScope(this.state, resolved);
  }

  /**
   * Starts a map as the next element.
   *
   * @throws ConfigurationError if length is not a non-negative integer
   * @throws WriterProtocolError("capacity exceeded") if the array is full
   */
  map(length?: number): ContainerScope<MapWriter> {
    const resolved = toLength(length);
    this.state.commit();
    return mapScope(this.state, resolved);
  }
}

/**
 * MapWriter writes the key/value pairs of an open map.
 *
 * Pairs are emitted in call order. Keys are neither sorted nor checked for
 * duplicates.
 */
export class MapWriter implements PairWriter, ContainerWriter {
  private readonly state: ScopeState;

  /** @internal Created by ContainerScope. */
  constructor(state: ScopeState) {
    this.state = state;
  }

  get capacity(): number | undefined {
    return this.state.capacity;
  }

  get isClosed(): boolean {
    return this.state.isClosed;
  }

  /**
   * Writes one key/value pair.
   *
   * @throws WriterProtocolError("capacity exceeded") if the map is full
   * @throws WriterProtocolError("writer is closed") after the scope closed
   */
  write(key: unknown, value: unknown): void {
    this.state.commit();
    this.state.encoder.encode(key);
    this.state.encoder.encode(value);
  }

  /**
   * Writes `key` and starts an array as its value.
   *
   * @throws ConfigurationError if length is not a non-negative integer
   * @throws WriterProtocolError("capacity exceeded") if the map is full
   */
  array(key: unknown, length?: number): ContainerScope<ArrayWriter> {
    const resolved = toLength(length);
    this.state.commit();
    this.state.encoder.encode(key);
    return arrayScope(this.state, resolved);
  }

  /**
   * Writes `key` and starts a map as its value.
   *
   * @throws ConfigurationError if length is not a non-negative integer
   * @throws WriterProtocolError("capacity exceeded") if the map is full
   */
  map(key: unknown, length?: number): ContainerScope<MapWriter> {
    const resolved = toLength(length);
    this.state.commit();
    this.state.encoder.encode(key);
    return mapScope(this.state, resolved);
  }
}
