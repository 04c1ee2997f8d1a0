import { describe, it, expect } from "vitest";
import {
  applyHeaderMutations,
  negotiateRequestFraming,
  negotiateResponseFraming,
  type ResponseFramingInput,
} from "../../../src/http1/negotiate.js";
import { MalformedLengthError } from "../../../src/errors.js";
import { HeaderMap } from "../../../src/utils/headers.js";
import type { HttpVersion } from "../../../src/http1/version.js";

function request(headers: Array<[string, string]>, persistent = true, version: HttpVersion = "HTTP/1.1") {
  return negotiateRequestFraming({ version, headers: new HeaderMap(headers), persistent });
}

describe("negotiateRequestFraming", () => {
  it("should choose chunked for a non-identity Transfer-Encoding", () => {
    expect(request([["Transfer-Encoding", "chunked"]])).toEqual({
      decision: { kind: "chunked" },
      persistent: true,
      consumed: false,
      limited: true,
      closeDelimited: false,
    });
  });

  it("should let the last Transfer-Encoding value govern", () => {
    const chunkedLast = request([
      ["Transfer-Encoding", "identity"],
      ["Transfer-Encoding", "chunked"],
    ]);
    expect(chunkedLast.decision).toEqual({ kind: "chunked" });

    const identityLast = request([
      ["Transfer-Encoding", "chunked"],
      ["Transfer-Encoding", "identity"],
    ]);
    expect(identityLast.decision).toBeNull();
    expect(identityLast.persistent).toBe(false);
  });

  it("should prefer chunked over Content-Length", () => {
    const result = request([
      ["Content-Length", "10"],
      ["Transfer-Encoding", "chunked"],
    ]);
    expect(result.decision).toEqual({ kind: "chunked" });
  });

  it("should treat Content-Length: 0 as an empty, already consumed body", () => {
    expect(request([["Content-Length", "0"]])).toEqual({
      decision: { kind: "empty" },
      persistent: true,
      consumed: true,
      limited: true,
      closeDelimited: false,
    });
  });

  it("should install a fixed-length limit on a persistent connection", () => {
    expect(request([["Content-Length", "100"]])).toEqual({
      decision: { kind: "fixed-length", length: 100 },
      persistent: true,
      consumed: false,
      limited: true,
      closeDelimited: false,
    });
  });

  it("should owe no drain for a fixed-length body on a non-persistent connection", () => {
    const result = request([["Content-Length", "100"]], false);
    expect(result.decision).toEqual({ kind: "fixed-length", length: 100 });
    expect(result.limited).toBe(false);
    expect(result.closeDelimited).toBe(false);
    expect(result.persistent).toBe(false);
  });

  it("should parse the first Content-Length value", () => {
    const result = request([
      ["Content-Length", "5"],
      ["Content-Length", "7"],
    ]);
    expect(result.decision).toEqual({ kind: "fixed-length", length: 5 });
  });

  it("should fail on a malformed Content-Length", () => {
    expect(() => request([["Content-Length", "abc"]])).toThrow(MalformedLengthError);
    expect(() => request([["Content-Length", "-3"]])).toThrow(MalformedLengthError);
  });

  it("should use Content-Length when Transfer-Encoding is identity", () => {
    const result = request([
      ["Transfer-Encoding", "Identity"],
      ["Content-Length", "4"],
    ]);
    expect(result.decision).toEqual({ kind: "fixed-length", length: 4 });
    expect(result.persistent).toBe(true);
  });

  it("should downgrade persistence for identity Transfer-Encoding without a length", () => {
    expect(request([["Transfer-Encoding", "identity"]])).toEqual({
      decision: null,
      persistent: false,
      consumed: false,
      limited: false,
      closeDelimited: true,
    });
  });

  it("should keep identity downgrade-only on HTTP/1.0", () => {
    const result = request([["Transfer-Encoding", "identity"]], true, "HTTP/1.0");
    expect(result.persistent).toBe(false);
    expect(result.decision).toBeNull();
  });

  it("should treat a persistent request without framing headers as empty", () => {
    expect(request([])).toEqual({
      decision: { kind: "empty" },
      persistent: true,
      consumed: true,
      limited: true,
      closeDelimited: false,
    });
  });

  it("should make no decision for a non-persistent request without framing headers", () => {
    expect(request([], false)).toEqual({
      decision: null,
      persistent: false,
      consumed: false,
      limited: false,
      closeDelimited: false,
    });
  });
});

function response(overrides: Partial<ResponseFramingInput> = {}) {
  const input: ResponseFramingInput = {
    version: "HTTP/1.1",
    method: "GET",
    status: 200,
    headers: new HeaderMap(),
    persistent: true,
    ...overrides,
  };
  const result = negotiateResponseFraming(input);
  applyHeaderMutations(input.headers, result.mutations);
  return { ...result, headers: input.headers };
}

describe("negotiateResponseFraming", () => {
  it("should frame HEAD responses as empty regardless of headers", () => {
    const headers = new HeaderMap({ "Content-Length": "10", "Transfer-Encoding": "chunked" });
    const result = response({ method: "HEAD", headers });
    expect(result.decision).toEqual({ kind: "empty" });
    expect(result.persistent).toBe(true);
    expect(result.headers.get("content-length")).toBe("10");
  });

  it.each([100, 101, 199, 204, 304])("should frame status %i as empty", status => {
    const result = response({ status });
    expect(result.decision).toEqual({ kind: "empty" });
    expect(result.persistent).toBe(true);
    expect(result.headers.has("transfer-encoding")).toBe(false);
  });

  it("should keep persistence unchanged for bodiless responses on a closing connection", () => {
    const result = response({ status: 204, persistent: false });
    expect(result.persistent).toBe(false);
    expect(result.headers.get("connection")).toBe("close");
  });

  it("should inject chunked for an HTTP/1.1 response without a length", () => {
    const result = response();
    expect(result.decision).toEqual({ kind: "chunked" });
    expect(result.persistent).toBe(true);
    expect(result.headers.get("transfer-encoding")).toBe("chunked");
    expect(result.headers.has("connection")).toBe(false);
  });

  it("should close an otherwise identical HTTP/1.0 response", () => {
    const result = response({ version: "HTTP/1.0" });
    expect(result.decision).toEqual({ kind: "identity" });
    expect(result.persistent).toBe(false);
    expect(result.headers.has("transfer-encoding")).toBe(false);
    expect(result.headers.has("connection")).toBe(false);
  });

  it("should honour Transfer-Encoding on HTTP/1.1", () => {
    const headers = new HeaderMap({ "Transfer-Encoding": "chunked" });
    const result = response({ headers });
    expect(result.decision).toEqual({ kind: "chunked" });
    expect(result.mutations).toEqual([{ op: "remove", name: "connection" }]);
  });

  it("should close-delimit HTTP/1.1 responses with identity Transfer-Encoding and no length", () => {
    const headers = new HeaderMap({ "Transfer-Encoding": "identity" });
    const result = response({ headers });
    expect(result.decision).toEqual({ kind: "identity" });
    expect(result.persistent).toBe(false);
    expect(result.headers.get("connection")).toBe("close");
  });

  it("should strip Transfer-Encoding from HTTP/1.0 responses and fall back to Content-Length", () => {
    const headers = new HeaderMap({ "Transfer-Encoding": "chunked", "Content-Length": "5" });
    const result = response({ version: "HTTP/1.0", headers });
    expect(result.decision).toEqual({ kind: "fixed-length", length: 5 });
    expect(result.persistent).toBe(true);
    expect(result.headers.has("transfer-encoding")).toBe(false);
    expect(result.headers.get("connection")).toBe("keep-alive");
  });

  it("should strip Transfer-Encoding from HTTP/1.0 responses and close without a length", () => {
    const headers = new HeaderMap({ "Transfer-Encoding": "chunked" });
    const result = response({ version: "HTTP/1.0", headers });
    expect(result.decision).toEqual({ kind: "identity" });
    expect(result.persistent).toBe(false);
    expect(result.headers.has("transfer-encoding")).toBe(false);
  });

  it("should use the first Content-Length value", () => {
    const headers = new HeaderMap([
      ["Content-Length", "3"],
      ["Content-Length", "9"],
    ]);
    expect(response({ headers }).decision).toEqual({ kind: "fixed-length", length: 3 });
  });

  it("should fail on a malformed response Content-Length", () => {
    const headers = new HeaderMap({ "Content-Length": "lots" });
    expect(() => response({ headers })).toThrow(MalformedLengthError);
  });

  it("should remove a handler-set Connection header on a persistent HTTP/1.1 response", () => {
    const headers = new HeaderMap({ "Content-Length": "0", Connection: "keep-alive" });
    const result = response({ headers });
    expect(result.headers.has("connection")).toBe(false);
  });

  it("should advertise close on a non-persistent HTTP/1.1 response", () => {
    const headers = new HeaderMap({ "Content-Length": "2" });
    const result = response({ headers, persistent: false });
    expect(result.decision).toEqual({ kind: "fixed-length", length: 2 });
    expect(result.headers.get("connection")).toBe("close");
  });

  it("should remove Connection from a non-persistent HTTP/1.0 response", () => {
    const headers = new HeaderMap({ "Content-Length": "2", Connection: "keep-alive" });
    const result = response({ version: "HTTP/1.0", headers, persistent: false });
    expect(result.headers.has("connection")).toBe(false);
  });

  it("should leave Connection alone for other versions", () => {
    const headers = new HeaderMap({ "Content-Length": "2", Connection: "whatever" });
    const result = response({ version: "other", headers, persistent: false });
    expect(result.mutations).toEqual([]);
    expect(result.headers.get("connection")).toBe("whatever");
  });

  it("should never upgrade persistence", () => {
    const headers = new HeaderMap({ "Content-Length": "2" });
    expect(response({ headers, persistent: false }).persistent).toBe(false);
  });
});
