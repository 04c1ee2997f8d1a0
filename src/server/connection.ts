/**
 * Per-connection request loop.
 *
 * Requests on one connection are strictly sequential: the next request head
 * is parsed only after both lifecycle signals of the previous exchange have
 * fired, although its bytes may already sit in the read-ahead buffer.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import type { Logger, ResolvedServerOptions } from "../config.js";
import { FramingError, RequestParseError, errorMessage } from "../errors.js";
import { finishRequest } from "../http1/drain.js";
import { HttpExchange, type RequestHead } from "../http1/exchange.js";
import { parseRequestHead } from "../http1/parser.js";
import { serializeResponseHead } from "../http1/serializer.js";
import { SocketReader } from "../socket/reader.js";
import { socketSink, type ByteSink } from "../socket/writer.js";
import { HeaderMap } from "../utils/headers.js";

/**
 * Serve HTTP/1.x requests on `socket` until it closes or stops being persistent.
 * Never rejects: failures are logged and end in the socket being destroyed.
 */
export async function serveConnection(
  socket: Duplex,
  options: ResolvedServerOptions,
): Promise<void> {
  const { logger } = options;
  const reader = new SocketReader(socket, options.bufferSize * 4);
  const sink = socketSink(socket);
  // Keep a listener for the whole socket lifetime so late errors are never unhandled
  socket.on("error", err => logger.debug(`[http1] socket error: ${err.message}`));

  try {
    for (;;) {
      let head: RequestHead | null;
      try {
        head = await readRequestHead(reader, socket, options);
      } catch (err) {
        if (!(err instanceof RequestParseError)) throw err;
        logger.debug(`[http1] bad request: ${err.message}`);
        await rejectRequest(sink, err.status);
        break;
      }
      if (!head) break;

      const exchange = new HttpExchange(head, {
        reader,
        sink,
        bufferSize: options.bufferSize,
        logger,
      });
      try {
        exchange.beginRequest();
      } catch (err) {
        // The handler must never see an inconsistent body view
        logger.warn(`[http1] ${errorMessage(err)}; dropping connection`);
        socket.destroy();
        return;
      }

      await runExchange(exchange, socket, options);
      finishRequest(exchange, logger);
      await Promise.all([exchange.requestTerminated.wait(), exchange.responseTerminated.wait()]);

      if (!exchange.persistent || socket.destroyed) break;
    }
    closeSocket(socket);
  } catch (err) {
    logger.debug(`[http1] connection failed: ${errorMessage(err)}`);
    socket.destroy();
  } finally {
    reader.detach();
  }
}

/** Invoke the handler, then make sure the response is complete. */
async function runExchange(
  exchange: HttpExchange,
  socket: Duplex,
  options: ResolvedServerOptions,
): Promise<void> {
  try {
    await options.handler(exchange);
    if (!exchange.responseTerminated.fired) await exchange.end();
  } catch (err) {
    await failExchange(exchange, socket, err, options.logger);
  }
  if (!exchange.responseTerminated.fired) {
    // The handler swallowed a failed end(); the body on the wire cannot be trusted
    socket.destroy();
    exchange.abort();
  }
}

async function failExchange(
  exchange: HttpExchange,
  socket: Duplex,
  err: unknown,
  logger: Logger,
): Promise<void> {
  exchange.closeConnection();
  if (err instanceof FramingError || exchange.responseStarted || socket.destroyed) {
    logger.warn(`[http1] ${exchange.method} ${exchange.target} failed: ${errorMessage(err)}; dropping connection`);
    socket.destroy();
    exchange.abort();
    return;
  }

  logger.error(`[http1] handler failed for ${exchange.method} ${exchange.target}: ${errorMessage(err)}`);
  try {
    exchange.responseHeaders.clear();
    exchange.statusText = undefined;
    await exchange.send(500, "Internal Server Error\n", "text/plain; charset=utf-8");
  } catch (sendErr) {
    logger.debug(`[http1] could not send 500: ${errorMessage(sendErr)}`);
    socket.destroy();
    exchange.abort();
  }
}

async function readRequestHead(
  reader: SocketReader,
  socket: Duplex,
  options: ResolvedServerOptions,
): Promise<RequestHead | null> {
  const { logger, maxHeaderSize, headersTimeout } = options;
  const timer =
    headersTimeout > 0
      ? setTimeout(() => {
          logger.debug(`[http1] no request head within ${headersTimeout}ms, closing`);
          socket.destroy();
        }, headersTimeout)
      : null;

  let buffer: Buffer = Buffer.alloc(0);
  try {
    for (;;) {
      const chunk = await reader.read();
      if (chunk === null) {
        if (buffer.length > 0) logger.debug("[http1] connection closed inside a request head");
        return null;
      }
      buffer = buffer.length > 0 ? Buffer.concat([buffer, chunk]) : chunk;

      const result = parseRequestHead(buffer);
      if (result) {
        if (result.bodyStart > maxHeaderSize) {
          throw new RequestParseError(`Request head exceeds ${maxHeaderSize} bytes`, 431);
        }
        reader.unshift(buffer.subarray(result.bodyStart));
        return result.head;
      }
      if (buffer.length > maxHeaderSize) {
        throw new RequestParseError(`Request head exceeds ${maxHeaderSize} bytes`, 431);
      }
    }
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/** Answer an unparseable request and give up on the connection. */
async function rejectRequest(sink: ByteSink, status: 400 | 431): Promise<void> {
  const headers = new HeaderMap([
    ["Content-Length", "0"],
    ["Connection", "close"],
  ]);
  await sink.write(Buffer.from(serializeResponseHead("HTTP/1.1", status, headers), "latin1"));
}

function closeSocket(socket: Duplex): void {
  if (!socket.destroyed && !socket.writableEnded) socket.end();
}
