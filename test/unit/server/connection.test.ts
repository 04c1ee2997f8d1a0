import { describe, it, expect, vi } from "vitest";
import { normalizeServerOptions, type ServerOptions } from "../../../src/config.js";
import type { HttpHandler } from "../../../src/handler.js";
import { serveConnection } from "../../../src/server/connection.js";
import { createMockSocket, createSilentLogger, tick } from "../../helpers/mock-socket.js";

function setup(handler: HttpHandler, overrides: Partial<ServerOptions> = {}) {
  const mock = createMockSocket();
  const logger = createSilentLogger();
  const handle = vi.fn(handler);
  const options = normalizeServerOptions({ handler: handle, headersTimeout: 0, logger, ...overrides });
  return { ...mock, logger, handle, serve: () => serveConnection(mock.socket, options) };
}

const echoTarget: HttpHandler = exchange => exchange.end(exchange.target);

describe("serveConnection", () => {
  it("should answer pipelined requests in order", async () => {
    const { serve, send, finish, output, handle, socket } = setup(echoTarget);
    const done = serve();
    send("GET /a HTTP/1.1\r\n\r\nGET /b HTTP/1.1\r\n\r\n");
    finish();
    await done;

    expect(output()).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\n/a" + "HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\n/b",
    );
    expect(handle).toHaveBeenCalledTimes(2);
    expect(socket.writableEnded).toBe(true);
  });

  it("should serve a single request on a non-persistent HTTP/1.0 connection", async () => {
    const { serve, send, output, handle, socket } = setup(echoTarget);
    const done = serve();
    send("GET /a HTTP/1.0\r\n\r\nGET /b HTTP/1.0\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.0 200 OK\r\nContent-Length: 2\r\n\r\n/a");
    expect(handle).toHaveBeenCalledTimes(1);
    expect(socket.writableEnded).toBe(true);
  });

  it("should keep an HTTP/1.0 keep-alive connection open", async () => {
    const { serve, send, finish, output } = setup(exchange => exchange.end("hi"));
    const done = serve();
    send("GET / HTTP/1.0\r\nConnection: keep-alive\r\n\r\n");
    await tick();
    expect(output()).toBe("HTTP/1.0 200 OK\r\nContent-Length: 2\r\nConnection: keep-alive\r\n\r\nhi");

    finish();
    await done;
  });

  it("should echo a chunked request as a chunked response", async () => {
    const { serve, send, finish, output } = setup(async exchange => {
      const body = await exchange.readBody();
      await exchange.write(body);
      await exchange.end();
    });
    const done = serve();
    send("POST /echo HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n4\r\nwiki\r\n5\r\npedia\r\n0\r\n\r\n");
    finish();
    await done;

    expect(output()).toBe(
      "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n9\r\nwikipedia\r\n0\r\n\r\n",
    );
  });

  it("should send the head but no body for HEAD", async () => {
    const { serve, send, finish, output } = setup(exchange => exchange.end("hello"));
    const done = serve();
    send("HEAD / HTTP/1.1\r\n\r\n");
    finish();
    await done;

    expect(output()).toBe("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n");
  });

  it("should read exactly the declared body on an HTTP/1.1 connection that closes", async () => {
    const bodies: string[] = [];
    const { serve, send, output, socket } = setup(async exchange => {
      const body = await exchange.readBody();
      bodies.push(body.toString());
      await exchange.end(body);
    });
    const done = serve();
    send("POST /echo HTTP/1.1\r\nConnection: close\r\nContent-Length: 5\r\n\r\nhello");
    await done;

    expect(bodies).toEqual(["hello"]);
    expect(output()).toBe("HTTP/1.1 200 OK\r\nContent-Length: 5\r\nConnection: close\r\n\r\nhello");
    expect(socket.writableEnded).toBe(true);
  });

  it("should read exactly the declared body on a plain HTTP/1.0 connection", async () => {
    const bodies: string[] = [];
    const { serve, send, output, socket } = setup(async exchange => {
      const body = await exchange.readBody();
      bodies.push(body.toString());
      await exchange.end(body);
    });
    const done = serve();
    send("POST /echo HTTP/1.0\r\nContent-Length: 5\r\n\r\nhelloEXTRA");
    await done;

    expect(bodies).toEqual(["hello"]);
    expect(output()).toBe("HTTP/1.0 200 OK\r\nContent-Length: 5\r\n\r\nhello");
    expect(socket.writableEnded).toBe(true);
  });

  it("should show an empty body for a non-persistent request without framing headers", async () => {
    const { serve, send, output } = setup(async exchange => {
      await exchange.end(await exchange.readBody());
    });
    const done = serve();
    send("POST /echo HTTP/1.0\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.0 200 OK\r\nContent-Length: 0\r\n\r\n");
  });

  it("should leave the length off a HEAD response ended without data", async () => {
    const { serve, send, finish, output } = setup(() => {});
    const done = serve();
    send("HEAD / HTTP/1.1\r\n\r\n");
    finish();
    await done;

    expect(output()).toBe("HTTP/1.1 200 OK\r\n\r\n");
  });

  it("should complete a response the handler left open", async () => {
    const { serve, send, finish, output } = setup(() => {});
    const done = serve();
    send("GET / HTTP/1.1\r\n\r\n");
    finish();
    await done;

    expect(output()).toBe("HTTP/1.1 200 OK\r\nContent-Length: 0\r\n\r\n");
  });

  it("should drop the connection on a malformed request Content-Length", async () => {
    const { serve, send, output, handle, logger, socket } = setup(echoTarget);
    const done = serve();
    send("POST / HTTP/1.1\r\nContent-Length: abc\r\n\r\n");
    await done;

    expect(handle).not.toHaveBeenCalled();
    expect(output()).toBe("");
    expect(socket.destroyed).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('[http1] Malformed Content-Length: "abc"; dropping connection');
  });

  it("should drain a half-read body before parsing the next request", async () => {
    const reads: number[] = [];
    const { serve, send, finish, output, handle } = setup(async exchange => {
      if (exchange.target === "/up") {
        const chunk = await exchange.read();
        reads.push(chunk?.length ?? 0);
      }
      await exchange.end("ok");
    });
    const done = serve();
    send("POST /up HTTP/1.1\r\nContent-Length: 100\r\n\r\n" + "a".repeat(50));
    await tick();
    expect(output()).toBe("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok");
    expect(handle).toHaveBeenCalledTimes(1);

    send("b".repeat(50) + "GET /next HTTP/1.1\r\n\r\n");
    finish();
    await done;

    expect(reads).toEqual([50]);
    expect(handle).toHaveBeenCalledTimes(2);
    expect(handle.mock.calls.map(([exchange]) => exchange.target)).toEqual(["/up", "/next"]);
    expect(output()).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok" + "HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok",
    );
  });

  it("should answer an unparseable request with 400 and close", async () => {
    const { serve, send, output, handle, socket } = setup(echoTarget);
    const done = serve();
    send("BROKEN\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.1 400 Bad Request\r\nContent-Length: 0\r\nConnection: close\r\n\r\n");
    expect(handle).not.toHaveBeenCalled();
    expect(socket.writableEnded).toBe(true);
  });

  it("should answer an oversized request head with 431", async () => {
    const { serve, send, output } = setup(echoTarget, { maxHeaderSize: 32 });
    const done = serve();
    send("GET / HTTP/1.1\r\nX-Long: " + "a".repeat(100) + "\r\n\r\n");
    await done;

    expect(output()).toBe(
      "HTTP/1.1 431 Request Header Fields Too Large\r\nContent-Length: 0\r\nConnection: close\r\n\r\n",
    );
  });

  it("should answer 500 when the handler throws before responding", async () => {
    const { serve, send, output, logger } = setup(() => {
      throw new Error("boom");
    });
    const done = serve();
    send("GET / HTTP/1.1\r\n\r\nGET /never HTTP/1.1\r\n\r\n");
    await done;

    expect(output()).toBe(
      "HTTP/1.1 500 Internal Server Error\r\nContent-Type: text/plain; charset=utf-8\r\nContent-Length: 22\r\nConnection: close\r\n\r\nInternal Server Error\n",
    );
    expect(logger.error).toHaveBeenCalledWith("[http1] handler failed for GET /: boom");
  });

  it("should destroy the connection after a short fixed-length response", async () => {
    const { serve, send, output, socket } = setup(async exchange => {
      exchange.responseHeaders.set("Content-Length", "5");
      await exchange.write("abc");
    });
    const done = serve();
    send("GET / HTTP/1.1\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nabc");
    expect(socket.destroyed).toBe(true);
  });

  it("should close-delimit an HTTP/1.0 response without a length", async () => {
    const { serve, send, output, socket } = setup(async exchange => {
      await exchange.write("stream");
      await exchange.end();
    });
    const done = serve();
    send("GET / HTTP/1.0\r\nConnection: keep-alive\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.0 200 OK\r\n\r\nstream");
    expect(socket.writableEnded).toBe(true);
  });

  it("should send 100 Continue when the handler reads an expected body", async () => {
    const { serve, send, finish, output } = setup(async exchange => {
      await exchange.end(await exchange.readBody());
    });
    const done = serve();
    send("PUT /f HTTP/1.1\r\nExpect: 100-continue\r\nContent-Length: 4\r\n\r\n");
    await tick();
    expect(output()).toBe("HTTP/1.1 100 Continue\r\n\r\n");

    send("data");
    finish();
    await done;
    expect(output()).toBe(
      "HTTP/1.1 100 Continue\r\n\r\n" + "HTTP/1.1 200 OK\r\nContent-Length: 4\r\n\r\ndata",
    );
  });

  it("should close when the handler answers without reading an expected body", async () => {
    const { serve, send, output, socket } = setup(exchange => exchange.send(413));
    const done = serve();
    send("PUT /f HTTP/1.1\r\nExpect: 100-continue\r\nContent-Length: 4\r\n\r\n");
    await done;

    expect(output()).toBe("HTTP/1.1 413 Payload Too Large\r\nContent-Length: 0\r\n\r\n");
    expect(socket.writableEnded).toBe(true);
  });

  it("should close an idle connection after the headers timeout", async () => {
    const { serve, socket, handle } = setup(echoTarget, { headersTimeout: 20 });
    await serve();

    expect(socket.destroyed).toBe(true);
    expect(handle).not.toHaveBeenCalled();
  });
});
