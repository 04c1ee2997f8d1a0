/**
 * Connection persistence from the request line and Connection header
 * (RFC 2616 Section 8.1.2).
 */
import { HeaderNames, HeaderValues, equalsIgnoreCase, type HeaderMap } from "../utils/headers.js";
import type { HttpVersion } from "./version.js";

/**
 * Whether the connection may be reused after this request.
 * HTTP/1.1 defaults to persistent, HTTP/1.0 must opt in, anything else never is.
 */
export function evaluatePersistence(version: HttpVersion, requestHeaders: HeaderMap): boolean {
  const connection = requestHeaders.getFirst(HeaderNames.CONNECTION);
  switch (version) {
    case "HTTP/1.1":
      return !(connection !== undefined && equalsIgnoreCase(connection, HeaderValues.CLOSE));
    case "HTTP/1.0":
      return connection !== undefined && equalsIgnoreCase(connection, HeaderValues.KEEP_ALIVE);
    default:
      return false;
  }
}
