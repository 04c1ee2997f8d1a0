/**
 * Request handlers and the handler chain.
 * A chain is built once, at configuration time, and never changes afterwards.
 */
import type { HttpExchange } from "./http1/exchange.js";

export type HttpHandler = (exchange: HttpExchange) => void | Promise<void>;

export type Middleware = (exchange: HttpExchange, next: () => Promise<void>) => void | Promise<void>;

/**
 * Compose middleware around a terminal handler. The first middleware is the
 * outermost; each one decides whether and when to call `next`.
 */
export function createHandlerChain(terminal: HttpHandler, ...middleware: Middleware[]): HttpHandler {
  const stack = Object.freeze([...middleware]);
  const dispatch = async (exchange: HttpExchange, index: number): Promise<void> => {
    const layer = stack[index];
    if (!layer) {
      await terminal(exchange);
      return;
    }
    let called = false;
    await layer(exchange, () => {
      if (called) return Promise.reject(new Error("next() called more than once"));
      called = true;
      return dispatch(exchange, index + 1);
    });
  };
  return exchange => dispatch(exchange, 0);
}

/** Answers 404 to everything. Only used when configured explicitly. */
export const notFoundHandler: HttpHandler = exchange =>
  exchange.send(404, "Not Found\n", "text/plain; charset=utf-8");
