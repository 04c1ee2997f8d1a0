/**
 * Error types raised by framing negotiation and framed body streams.
 * Every framing error is fatal for the connection it occurred on.
 */

export type FramingErrorCode =
  | "ERR_MALFORMED_LENGTH"
  | "ERR_SHORT_WRITE"
  | "ERR_LENGTH_OVERFLOW"
  | "ERR_PREMATURE_END"
  | "ERR_CHUNKED_ENCODING";

export class FramingError extends Error {
  readonly code: FramingErrorCode;

  constructor(code: FramingErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Content-Length value that is not a non-negative decimal integer. */
export class MalformedLengthError extends FramingError {
  readonly value: string;

  constructor(value: string) {
    super("ERR_MALFORMED_LENGTH", `Malformed Content-Length: ${JSON.stringify(value)}`);
    this.value = value;
  }
}

/** Fixed-length response ended before the declared byte count was written. */
export class ShortWriteError extends FramingError {
  constructor(
    readonly expected: number,
    readonly written: number,
  ) {
    super(
      "ERR_SHORT_WRITE",
      `Response body ended after ${written} of ${expected} declared bytes`,
    );
  }
}

/** Write that would exceed the declared Content-Length. */
export class FixedLengthOverflowError extends FramingError {
  constructor(
    readonly expected: number,
    readonly attempted: number,
  ) {
    super(
      "ERR_LENGTH_OVERFLOW",
      `Write of ${attempted} bytes exceeds declared Content-Length ${expected}`,
    );
  }
}

/** Connection reached EOF before the body's framing said it should. */
export class PrematureEndError extends FramingError {
  constructor(message: string) {
    super("ERR_PREMATURE_END", message);
  }
}

export class ChunkedEncodingError extends FramingError {
  constructor(message: string) {
    super("ERR_CHUNKED_ENCODING", message);
  }
}

/** Request head that cannot be parsed; answered with `status` and a close. */
export class RequestParseError extends Error {
  readonly code = "ERR_BAD_REQUEST";

  constructor(
    message: string,
    readonly status: 400 | 431 = 400,
  ) {
    super(message);
    this.name = "RequestParseError";
  }
}

export class ConfigError extends Error {
  readonly code = "ERR_CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
