/**
 * Drains request body bytes the handler left unread, so the next request
 * on a persistent connection starts at the right byte.
 */
import type { Logger } from "../config.js";
import { errorMessage } from "../errors.js";
import type { BodySource } from "./body-source.js";
import type { HttpExchange } from "./exchange.js";
import { describeFraming } from "./framing.js";

/** Read and discard until the body ends. Resolves with the discarded byte count. */
export async function drainBody(body: BodySource): Promise<number> {
  let discarded = 0;
  for (let chunk = await body.read(); chunk !== null; chunk = await body.read()) {
    discarded += chunk.length;
  }
  return discarded;
}

/**
 * Called once the handler is done with the request.
 *
 * Terminates the request right away when nothing is owed (the body ended,
 * or no bytes are owed because the connection closes after this exchange). Otherwise starts a
 * background drain and terminates the request only when it reaches the end
 * of the body. A failed drain makes the connection non-reusable.
 */
export function finishRequest(exchange: HttpExchange, logger: Logger): void {
  const body = exchange.requestBody;
  if (!exchange.drainRequired || !exchange.persistent) {
    exchange.terminateRequest();
    return;
  }

  if (exchange.awaitingContinue) {
    // The client was never told to send the body; it may never arrive
    logger.debug(`[drain] ${exchange.method} ${exchange.target} body never requested, closing`);
    exchange.closeConnection();
    exchange.terminateRequest();
    return;
  }

  logger.debug(`[drain] draining unread ${describeFraming(body.framing)} request body`);
  void drainBody(body).then(
    discarded => {
      logger.debug(`[drain] discarded ${discarded} bytes`);
      exchange.terminateRequest();
    },
    (err: unknown) => {
      logger.debug(`[drain] failed: ${errorMessage(err)}`);
      exchange.closeConnection();
      exchange.terminateRequest();
    },
  );
}
