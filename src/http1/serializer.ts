/**
 * Response head serialization.
 */
import { STATUS_CODES } from "node:http";
import { serializeHttp1Headers, type HeaderMap } from "../utils/headers.js";
import type { HttpVersion } from "./version.js";

const INVALID_REASON_RE = /[\r\n\0]/;

/**
 * Status line plus headers plus the empty line, ready for the wire.
 * HTTP/1.0 clients get an HTTP/1.0 status line, everything else HTTP/1.1.
 */
export function serializeResponseHead(
  version: HttpVersion,
  status: number,
  headers: HeaderMap,
  statusText?: string,
): string {
  if (!Number.isInteger(status) || status < 100 || status > 999) {
    throw new RangeError(`Invalid status code: ${status}`);
  }
  const reason = statusText ?? STATUS_CODES[status] ?? "";
  if (INVALID_REASON_RE.test(reason)) {
    throw new Error(`Invalid status text: ${JSON.stringify(reason)} contains CR/LF/NUL`);
  }
  const protocol = version === "HTTP/1.0" ? "HTTP/1.0" : "HTTP/1.1";
  return `${protocol} ${status} ${reason}\r\n${serializeHttp1Headers(headers)}\r\n`;
}
