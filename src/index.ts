/**
 * h1frame: HTTP/1.x server core over node:net.
 * Negotiates message framing and connection persistence per request,
 * frames request and response bodies, and drains unread request bodies
 * so persistent and pipelined connections stay in sync.
 */

// Server
export { createServer, H1Server } from "./server/server.js";
export { serveConnection } from "./server/connection.js";
export { normalizeServerOptions } from "./config.js";
export type { ServerOptions, ResolvedServerOptions, Logger } from "./config.js";
export { createHandlerChain, notFoundHandler } from "./handler.js";
export type { HttpHandler, Middleware } from "./handler.js";

// Exchange
export { HttpExchange, LifecycleSignal } from "./http1/exchange.js";
export type { RequestHead, ExchangeConnection } from "./http1/exchange.js";

// Framing negotiation (advanced usage)
export {
  chunked,
  describeFraming,
  empty,
  fixedLength,
  identity,
  parseContentLength,
} from "./http1/framing.js";
export type { FramingDecision, FramingKind } from "./http1/framing.js";
export { evaluatePersistence } from "./http1/persistence.js";
export {
  applyHeaderMutations,
  isBodilessResponse,
  isBodilessStatus,
  negotiateRequestFraming,
  negotiateResponseFraming,
} from "./http1/negotiate.js";
export type {
  HeaderMutation,
  RequestFraming,
  RequestFramingInput,
  ResponseFraming,
  ResponseFramingInput,
} from "./http1/negotiate.js";
export { toHttpVersion } from "./http1/version.js";
export type { HttpVersion } from "./http1/version.js";

// Framed streams (advanced usage)
export { createBodySource } from "./http1/body-source.js";
export type { BodySource, SourceFraming } from "./http1/body-source.js";
export { createBodySink } from "./http1/body-sink.js";
export type { BodySink, SinkOptions } from "./http1/body-sink.js";
export { ChunkedDecoder, encodeChunk, encodeLastChunk } from "./http1/chunked.js";
export { drainBody, finishRequest } from "./http1/drain.js";
export { parseRequestHead } from "./http1/parser.js";
export { serializeResponseHead } from "./http1/serializer.js";

// Socket layer (advanced usage)
export { SocketReader } from "./socket/reader.js";
export { socketSink, writeToSocket } from "./socket/writer.js";
export type { ByteSink } from "./socket/writer.js";

// Protocol utilities
export { HeaderMap, HeaderNames, HeaderValues } from "./utils/headers.js";
export type { HeaderInit } from "./utils/headers.js";
export * from "./errors.js";
