/**
 * Request and response framing negotiation.
 *
 * Both negotiators are pure: they read headers and return a decision, a
 * persistence flag that may only have gone from true to false, and (for
 * responses) the header mutations needed to advertise the decision.
 * RFC 2616 Section 4.4 governs the order of the checks.
 */
import { HeaderNames, HeaderValues, equalsIgnoreCase, type HeaderMap } from "../utils/headers.js";
import {
  chunked,
  empty,
  fixedLength,
  identity,
  parseContentLength,
  type FramingDecision,
} from "./framing.js";
import type { HttpVersion } from "./version.js";

export interface RequestFramingInput {
  version: HttpVersion;
  headers: HeaderMap;
  persistent: boolean;
}

export interface RequestFraming {
  /** null when the body is left unframed (the connection will close anyway). */
  decision: FramingDecision | null;
  persistent: boolean;
  /** No body to read: the request may be terminated immediately. */
  consumed: boolean;
  /**
   * Unread body bytes are owed to the connection and must be drained before
   * it is reused. Never true on a connection that closes after this exchange.
   */
  limited: boolean;
  /** No decision and the body runs until the peer closes. */
  closeDelimited: boolean;
}

/**
 * Decide how the request body is delimited.
 * The last Transfer-Encoding value governs; the first Content-Length value is parsed.
 * @throws MalformedLengthError when Content-Length is not a non-negative integer
 */
export function negotiateRequestFraming(input: RequestFramingInput): RequestFraming {
  const { headers, persistent } = input;
  const transferEncoding = headers.getLast(HeaderNames.TRANSFER_ENCODING);
  const contentLength = headers.getFirst(HeaderNames.CONTENT_LENGTH);

  if (transferEncoding !== undefined && !isIdentity(transferEncoding)) {
    return { decision: chunked(), persistent, consumed: false, limited: true, closeDelimited: false };
  }

  if (contentLength !== undefined) {
    const length = parseContentLength(contentLength);
    if (length === 0) {
      return { decision: empty(), persistent, consumed: true, limited: true, closeDelimited: false };
    }
    // The body is still bounded at `length`; draining is moot on a closing connection
    return {
      decision: fixedLength(length),
      persistent,
      consumed: false,
      limited: persistent,
      closeDelimited: false,
    };
  }

  if (transferEncoding !== undefined) {
    // identity transfer-coding without a length: the end of the body is unknowable
    return { decision: null, persistent: false, consumed: false, limited: false, closeDelimited: true };
  }

  if (persistent) {
    return { decision: empty(), persistent, consumed: true, limited: true, closeDelimited: false };
  }
  // No framing headers: the handler sees no body, but nothing was decided either
  return { decision: null, persistent, consumed: false, limited: false, closeDelimited: false };
}

export interface ResponseFramingInput {
  version: HttpVersion;
  method: string;
  status: number;
  headers: HeaderMap;
  /** Persistence after the request phase. */
  persistent: boolean;
}

export type HeaderMutation =
  | { op: "set"; name: string; value: string }
  | { op: "remove"; name: string };

export interface ResponseFraming {
  decision: FramingDecision;
  persistent: boolean;
  mutations: HeaderMutation[];
}

/** Statuses that never carry a body (RFC 2616 Section 4.3). */
export function isBodilessStatus(status: number): boolean {
  return (status >= 100 && status <= 199) || status === 204 || status === 304;
}

export function isBodilessResponse(method: string, status: number): boolean {
  return equalsIgnoreCase(method, "HEAD") || isBodilessStatus(status);
}

/**
 * Decide how the response body is delimited and which headers advertise it.
 * @throws MalformedLengthError when a response Content-Length is not a non-negative integer
 */
export function negotiateResponseFraming(input: ResponseFramingInput): ResponseFraming {
  const { version, method, status, headers } = input;
  const mutations: HeaderMutation[] = [];
  let persistent = input.persistent;
  let decision: FramingDecision;

  if (isBodilessResponse(method, status)) {
    decision = empty();
  } else {
    let transferEncoding: string = HeaderValues.IDENTITY;
    if (headers.has(HeaderNames.TRANSFER_ENCODING)) {
      if (version === "HTTP/1.1") {
        transferEncoding = headers.getLast(HeaderNames.TRANSFER_ENCODING) ?? HeaderValues.IDENTITY;
      } else {
        // RFC 2616 Section 3.6: transfer-codings are HTTP/1.1 only
        mutations.push({ op: "remove", name: HeaderNames.TRANSFER_ENCODING });
      }
    } else if (version === "HTTP/1.1" && !headers.has(HeaderNames.CONTENT_LENGTH)) {
      mutations.push({ op: "set", name: "Transfer-Encoding", value: HeaderValues.CHUNKED });
      transferEncoding = HeaderValues.CHUNKED;
    }

    const contentLength = headers.getFirst(HeaderNames.CONTENT_LENGTH);
    if (!isIdentity(transferEncoding)) {
      decision = chunked();
    } else if (contentLength !== undefined) {
      decision = fixedLength(parseContentLength(contentLength));
    } else {
      decision = identity();
      persistent = false;
    }
  }

  if (version === "HTTP/1.1") {
    mutations.push(
      persistent
        ? { op: "remove", name: HeaderNames.CONNECTION }
        : { op: "set", name: "Connection", value: HeaderValues.CLOSE },
    );
  } else if (version === "HTTP/1.0") {
    mutations.push(
      persistent
        ? { op: "set", name: "Connection", value: HeaderValues.KEEP_ALIVE }
        : { op: "remove", name: HeaderNames.CONNECTION },
    );
  }

  return { decision, persistent, mutations };
}

export function applyHeaderMutations(headers: HeaderMap, mutations: readonly HeaderMutation[]): void {
  for (const mutation of mutations) {
    if (mutation.op === "set") {
      headers.set(mutation.name, mutation.value);
    } else {
      headers.remove(mutation.name);
    }
  }
}

function isIdentity(value: string): boolean {
  return equalsIgnoreCase(value.trim(), HeaderValues.IDENTITY);
}
