/** Protocol versions the framing rules distinguish. */
export type HttpVersion = "HTTP/1.0" | "HTTP/1.1" | "other";

export function toHttpVersion(protocol: string): HttpVersion {
  if (protocol === "HTTP/1.1") return "HTTP/1.1";
  if (protocol === "HTTP/1.0") return "HTTP/1.0";
  return "other";
}
