/**
 * Header utilities for the HTTP/1.x server side.
 * Header names are case-insensitive (RFC 7230 Section 3.2); a field may
 * appear more than once and every occurrence is kept in arrival order.
 */

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/** Well-known header names used by framing negotiation. */
export const HeaderNames = {
  CONNECTION: "connection",
  CONTENT_LENGTH: "content-length",
  TRANSFER_ENCODING: "transfer-encoding",
  EXPECT: "expect",
} as const;

/** Header values compared case-insensitively during negotiation. */
export const HeaderValues = {
  CLOSE: "close",
  KEEP_ALIVE: "keep-alive",
  CHUNKED: "chunked",
  IDENTITY: "identity",
  CONTINUE: "100-continue",
} as const;

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new Error(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new Error(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/** Case-insensitive ASCII comparison. */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.length === b.length && a.toLowerCase() === b.toLowerCase();
}

export type HeaderInit = HeaderMap | Record<string, string | string[]> | Array<[string, string]>;

/**
 * Ordered, case-insensitive, multi-valued header map.
 * The spelling of the first occurrence of a name is used on the wire.
 */
export class HeaderMap {
  private readonly fields = new Map<string, { name: string; values: string[] }>();

  constructor(init?: HeaderInit) {
    if (!init) return;
    if (init instanceof HeaderMap) {
      for (const [name, value] of init.entries()) this.add(name, value);
    } else if (Array.isArray(init)) {
      for (const [name, value] of init) this.add(name, value);
    } else {
      for (const [name, value] of Object.entries(init)) {
        for (const v of Array.isArray(value) ? value : [value]) this.add(name, v);
      }
    }
  }

  /** Number of distinct header names. */
  get size(): number {
    return this.fields.size;
  }

  has(name: string): boolean {
    return this.fields.has(name.toLowerCase());
  }

  /** All values of a header in arrival order; empty when absent. */
  getAll(name: string): readonly string[] {
    return this.fields.get(name.toLowerCase())?.values ?? [];
  }

  getFirst(name: string): string | undefined {
    return this.getAll(name)[0];
  }

  getLast(name: string): string | undefined {
    const values = this.getAll(name);
    return values[values.length - 1];
  }

  /** Values joined with ", " (RFC 7230 Section 3.2.2). */
  get(name: string): string | undefined {
    const values = this.getAll(name);
    return values.length > 0 ? values.join(", ") : undefined;
  }

  add(name: string, value: string): this {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    const key = name.toLowerCase();
    const field = this.fields.get(key);
    if (field) {
      field.values.push(value);
    } else {
      this.fields.set(key, { name, values: [value] });
    }
    return this;
  }

  /** Replace every value of a header with a single one. */
  set(name: string, value: string): this {
    this.remove(name);
    return this.add(name, value);
  }

  /** Returns true if the header was present. */
  remove(name: string): boolean {
    return this.fields.delete(name.toLowerCase());
  }

  clear(): void {
    this.fields.clear();
  }

  /** One `[name, value]` pair per value, in insertion order. */
  *entries(): IterableIterator<[string, string]> {
    for (const { name, values } of this.fields.values()) {
      for (const value of values) yield [name, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /** Flat lowercase record, multi-values comma-joined. */
  toRecord(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, { values }] of this.fields) {
      result[key] = values.join(", ");
    }
    return result;
  }
}

/**
 * Serialize headers into HTTP/1.1 format: "Key: Value\r\n"
 * Validates against header injection (CR/LF/NUL).
 */
export function serializeHttp1Headers(headers: HeaderMap): string {
  let result = "";
  for (const [key, value] of headers) {
    validateHeaderName(key);
    validateHeaderValue(key, value);
    result += `${key}: ${value}\r\n`;
  }
  return result;
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new Error(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

// RFC 7230 3.1.1 request-target cannot contain whitespace (SP/HTAB) or CR/LF
const INVALID_PATH_RE = /[\r\n\s]/;

/**
 * Validate a request-target received on the request line.
 */
export function validatePath(path: string): void {
  if (path.length === 0 || INVALID_PATH_RE.test(path)) {
    throw new Error(
      `Invalid path: ${JSON.stringify(path)} contains whitespace or control characters`,
    );
  }
}
