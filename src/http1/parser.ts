/**
 * HTTP/1.x request head parser.
 * Turns the raw bytes up to the empty line into a structured request head.
 */
import { Buffer } from "node:buffer";
import { RequestParseError, errorMessage } from "../errors.js";
import { HeaderMap, validateMethod, validatePath } from "../utils/headers.js";
import type { RequestHead } from "./exchange.js";
import { toHttpVersion } from "./version.js";

const DOUBLE_CRLF = Buffer.from("\r\n\r\n");
const PROTOCOL_RE = /^HTTP\/\d\.\d$/;

/**
 * Parse the request line and headers from raw data.
 * Returns null if not enough data has been received yet.
 * @throws RequestParseError on a malformed head
 */
export function parseRequestHead(data: Buffer): {
  head: RequestHead;
  bodyStart: number;
} | null {
  // RFC 7230 Section 3.5: ignore empty lines received before the request line
  let start = 0;
  while (data.length >= start + 2 && data[start] === 0x0d && data[start + 1] === 0x0a) {
    start += 2;
  }

  const headerEnd = data.indexOf(DOUBLE_CRLF, start);
  if (headerEnd === -1) return null;

  const headSection = data.subarray(start, headerEnd).toString("latin1");
  const bodyStart = headerEnd + 4; // skip \r\n\r\n
  const lines = headSection.split("\r\n");

  // Request line: "GET /path HTTP/1.1"
  const parts = lines[0].split(" ");
  if (parts.length !== 3) {
    throw new RequestParseError(`Malformed request line: ${JSON.stringify(lines[0])}`);
  }
  const [method, target, protocol] = parts;
  if (!PROTOCOL_RE.test(protocol)) {
    throw new RequestParseError(`Unsupported protocol: ${JSON.stringify(protocol)}`);
  }
  try {
    validateMethod(method);
    validatePath(target);
  } catch (err) {
    throw new RequestParseError(errorMessage(err));
  }

  const headers = new HeaderMap();
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith(" ") || line.startsWith("\t")) {
      // obs-fold is deprecated; RFC 7230 Section 3.2.4 allows rejecting it
      throw new RequestParseError("Obsolete header line folding");
    }
    const colonIdx = line.indexOf(":");
    if (colonIdx <= 0) {
      throw new RequestParseError(`Malformed header line: ${JSON.stringify(line)}`);
    }
    // No whitespace is allowed between the field name and the colon
    const name = line.substring(0, colonIdx);
    const value = line.substring(colonIdx + 1).trim();
    try {
      headers.add(name, value);
    } catch (err) {
      throw new RequestParseError(errorMessage(err));
    }
  }

  return {
    head: { method, target, protocol, version: toHttpVersion(protocol), headers },
    bodyStart,
  };
}
