/**
 * Message framing decisions (RFC 2616 Section 4.4).
 * Exactly one decision is made per direction per exchange and never changes.
 */
import { MalformedLengthError } from "../errors.js";

export type FramingDecision =
  /** Body runs until the connection closes. Responses only. */
  | { readonly kind: "identity" }
  | { readonly kind: "fixed-length"; readonly length: number }
  | { readonly kind: "chunked" }
  /** Zero-length body; nothing is read from or written to the wire. */
  | { readonly kind: "empty" };

export type FramingKind = FramingDecision["kind"];

const IDENTITY: FramingDecision = Object.freeze({ kind: "identity" });
const CHUNKED: FramingDecision = Object.freeze({ kind: "chunked" });
const EMPTY: FramingDecision = Object.freeze({ kind: "empty" });

export function identity(): FramingDecision {
  return IDENTITY;
}

export function chunked(): FramingDecision {
  return CHUNKED;
}

export function empty(): FramingDecision {
  return EMPTY;
}

export function fixedLength(length: number): FramingDecision {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`Invalid fixed length: ${length}`);
  }
  return Object.freeze({ kind: "fixed-length", length });
}

export function describeFraming(decision: FramingDecision | null): string {
  if (!decision) return "raw";
  return decision.kind === "fixed-length" ? `fixed-length(${decision.length})` : decision.kind;
}

const DECIMAL_RE = /^[0-9]+$/;

/**
 * Parse a Content-Length value as a non-negative decimal integer.
 * Signs, whitespace inside the digits, hex and values beyond 2^53-1 are rejected.
 */
export function parseContentLength(value: string): number {
  const trimmed = value.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new MalformedLengthError(value);
  }
  const length = Number(trimmed);
  if (!Number.isSafeInteger(length)) {
    throw new MalformedLengthError(value);
  }
  return length;
}
