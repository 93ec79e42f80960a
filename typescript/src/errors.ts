/**
 * Base error class for CBOR writer errors.
 */
export class CborWriterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CborWriterError";
  }
}

/**
 * Error thrown when a container length is not a non-negative integer.
 */
export class ConfigurationError extends CborWriterError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Ways a caller can misuse a container writer.
 */
export type WriterProtocolReason =
  | "capacity exceeded"
  | "insufficient elements"
  | "writer is closed"
  | "scope already open"
  | "scope not open"
  | "nested scope is open";

/**
 * Error thrown when the container writer protocol is violated.
 */
export class WriterProtocolError extends CborWriterError {
  readonly reason: WriterProtocolReason;

  constructor(reason: WriterProtocolReason) {
    super(reason);
    this.name = "WriterProtocolError";
    this.reason = reason;
  }
}

/**
 * Error thrown when a scope body failed and closing the scope failed as well.
 */
export class ScopeExitError extends CborWriterError {
  readonly bodyError: unknown;
  readonly exitError: unknown;

  constructor(bodyError: unknown, exitError: unknown) {
    super(`${describe(bodyError)} (scope exit also failed: ${describe(exitError)})`);
    this.name = "ScopeExitError";
    this.bodyError = bodyError;
    this.exitError = exitError;
  }
}

/**
 * Error thrown when writing to a closed sink.
 */
export class SinkClosedError extends CborWriterError {
  constructor() {
    super("Sink is closed");
    this.name = "SinkClosedError";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
