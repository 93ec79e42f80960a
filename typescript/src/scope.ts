/**
 * Container scopes.
 *
 * A scope pairs the header of one container with its closing step:
 *
 *   open:  write the definite header, or the indefinite start marker
 *   body:  the nested writer commits elements and opens child scopes
 *   close: write the break token (indefinite), or check that the declared
 *          count was reached (definite; the count alone delimits the item)
 *
 * `use()` runs all three and closes on every exit path.
 *
 * A writer whose child scope has been created but not yet closed is busy: its
 * bytes would otherwise land in the middle of the child's. Closing a scope
 * with a child still in flight closes the child first, then reports it.
 */

import { CapacityCounter } from "./capacity";
import type { PrimitiveEncoder } from "./encoder";
import { ScopeExitError, WriterProtocolError } from "./errors";
import { ContainerKind, type Length } from "./types";

/**
 * Bookkeeping shared by every writer: the encoder, the capacity counter of a
 * definite container, the closed flag and the child scope currently in flight.
 */
export class ScopeState {
  readonly encoder: PrimitiveEncoder;
  private readonly counter: CapacityCounter | undefined;
  private closed: boolean;
  private child: ContainerScope<unknown> | undefined;

  constructor(encoder: PrimitiveEncoder, length: Length) {
    this.encoder = encoder;
    this.counter = length.kind === "definite" ? new CapacityCounter(length.count) : undefined;
    this.closed = false;
    this.child = undefined;
  }

  /**
   * Remaining commits, or undefined when the container is unbounded.
   */
  get capacity(): number | undefined {
    return this.counter?.remaining;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Throws unless this writer may emit bytes right now.
   */
  ensureWritable(): void {
    if (this.closed) {
      throw new WriterProtocolError("writer is closed");
    }
    if (this.child !== undefined) {
      throw new WriterProtocolError("nested scope is open");
    }
  }

  /**
   * Consumes one element or pair slot. Nothing is written.
   */
  commit(): void {
    this.ensureWritable();
    this.counter?.take();
  }

  /**
   * Creates a child scope occupying the next value position. The caller has
   * already committed the slot.
   */
  nest<W>(
    kind: ContainerKind,
    length: Length,
    create: (state: ScopeState) => W
  ): ContainerScope<W> {
    this.ensureWritable();
    const scope: ContainerScope<W> = new ContainerScope(this.encoder, kind, length, create, () => {
      if (this.child === scope) {
        this.child = undefined;
      }
    });
    this.child = scope;
    return scope;
  }

  /**
   * Ends the child scope still in flight, if any, without its checks.
   * Returns true when there was one.
   */
  abandonChild(): boolean {
    const child = this.child;
    if (child === undefined) {
      return false;
    }
    child.abandon();
    this.child = undefined;
    return true;
  }

  /**
   * Marks the writer closed and returns the commits it was still owed.
   */
  finish(): number {
    this.closed = true;
    return this.counter?.remaining ?? 0;
  }
}

type ScopeStatus = "unopened" | "open" | "closed";

/**
 * ContainerScope governs the header and terminator of one container.
 *
 * @example
 * ```typescript
 * writer.map(2).use((m) => {
 *   m.write("id", 7);
 *   m.array("tags").use((tags) => {
 *     tags.write("a");
 *     tags.write("b");
 *   });
 * });
 * ```
 */
export class ContainerScope<W> {
  readonly kind: ContainerKind;
  readonly length: Length;
  private readonly encoder: PrimitiveEncoder;
  private readonly create: (state: ScopeState) => W;
  private readonly release: () => void;
  private status: ScopeStatus;
  private state: ScopeState | undefined;

  constructor(
    encoder: PrimitiveEncoder,
    kind: ContainerKind,
    length: Length,
    create: (state: ScopeState) => W,
    release: () => void = () => {}
  ) {
    this.encoder = encoder;
    this.kind = kind;
    this.length = length;
    this.create = create;
    this.release = release;
    this.status = "unopened";
    this.state = undefined;
  }

  get isOpen(): boolean {
    return this.status === "open";
  }

  get isClosed(): boolean {
    return this.status === "closed";
  }

  /**
   * Writes the container header and returns the nested writer.
   *
   * @throws WriterProtocolError if the scope was opened before
   */
  open(): W {
    if (this.status === "closed") {
      throw new WriterProtocolError("writer is closed");
    }
    if (this.status === "open") {
      throw new WriterProtocolError("scope already open");
    }

    this.encoder.write(
      this.length.kind === "indefinite"
        ? this.encoder.encodeIndefinite(this.kind)
        : this.encoder.encodeLength(this.kind, this.length.count)
    );

    const state = new ScopeState(this.encoder, this.length);
    this.state = state;
    this.status = "open";
    return this.create(state);
  }

  /**
   * Ends the container. An indefinite container gets its break token; a
   * definite one must have received exactly its declared count.
   *
   * A child scope still in flight is closed first. The scope is closed
   * afterwards even when a check fails.
   *
   * @throws WriterProtocolError("nested scope is open") if a child was still in flight
   * @throws WriterProtocolError("insufficient elements") if commits are missing
   */
  close(): void {
    const state = this.state;
    if (this.status === "closed") {
      throw new WriterProtocolError("writer is closed");
    }
    if (state === undefined) {
      throw new WriterProtocolError("scope not open");
    }

    const interrupted = state.abandonChild();
    const missing = this.end(state);

    if (interrupted) {
      throw new WriterProtocolError("nested scope is open");
    }
    if (missing > 0) {
      throw new WriterProtocolError("insufficient elements");
    }
  }

  /**
   * @internal Closes the scope without its checks when the parent closes
   * first. An unopened scope writes nothing.
   */
  abandon(): void {
    const state = this.state;
    if (this.status === "closed") {
      return;
    }
    if (state === undefined) {
      this.status = "closed";
      this.release();
      return;
    }
    state.abandonChild();
    this.end(state);
  }

  private end(state: ScopeState): number {
    if (this.length.kind === "indefinite") {
      this.encoder.write(this.encoder.encodeBreak());
    }

    const missing = state.finish();
    this.status = "closed";
    this.release();
    return missing;
  }

  /**
   * Opens the scope, runs `body` with the nested writer and closes the scope,
   * also when `body` throws. The body must be synchronous.
   *
   * @returns The value returned by `body`
   * @throws ScopeExitError if `body` and the close step both fail
   */
  use<R>(body: (writer: W) => R): R {
    const writer = this.open();

    let result: R;
    try {
      result = body(writer);
    } catch (error) {
      try {
        this.close();
      } catch (exitError) {
        throw new ScopeExitError(error, exitError);
      }
      throw error;
    }

    this.close();
    return result;
  }
}
