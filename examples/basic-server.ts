/**
 * Minimal server example.
 *
 * Endpoints:
 *   GET  /         → plain text greeting (Content-Length framed)
 *   GET  /stream   → three lines written separately (chunked on HTTP/1.1)
 *   POST /echo     → request body echoed back
 *   anything else  → 404
 *
 * Try pipelining:
 *   printf 'GET / HTTP/1.1\r\n\r\nGET /stream HTTP/1.1\r\n\r\n' | nc localhost 8080
 */
import { createHandlerChain, createServer, notFoundHandler, type HttpHandler, type Middleware } from "../src/index.js";

const timing: Middleware = async (exchange, next) => {
  const start = Date.now();
  await next();
  console.log(`${exchange.method} ${exchange.target} ${exchange.status} ${Date.now() - start}ms`);
};

const routes: HttpHandler = async exchange => {
  if (exchange.method === "GET" && exchange.target === "/") {
    await exchange.send(200, "hello\n", "text/plain; charset=utf-8");
    return;
  }
  if (exchange.method === "GET" && exchange.target === "/stream") {
    exchange.responseHeaders.set("Content-Type", "text/plain; charset=utf-8");
    for (const line of ["one\n", "two\n", "three\n"]) await exchange.write(line);
    await exchange.end();
    return;
  }
  if (exchange.method === "POST" && exchange.target === "/echo") {
    const body = await exchange.readBody();
    await exchange.send(200, body, exchange.requestHeaders.get("content-type") ?? "application/octet-stream");
    return;
  }
  await notFoundHandler(exchange);
};

const port = Number(process.env.PORT ?? 8080);
const server = createServer({ handler: createHandlerChain(routes, timing) });
const address = await server.listen(port);
console.log(`listening on http://localhost:${address.port}`);

process.once("SIGINT", () => {
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    },
  );
});
