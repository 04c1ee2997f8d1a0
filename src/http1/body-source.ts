/**
 * Framed request body views over the connection reader.
 * One dispatch function covers the closed set of framing decisions.
 */
import type { Buffer } from "node:buffer";
import { PrematureEndError } from "../errors.js";
import type { SocketReader } from "../socket/reader.js";
import { ChunkedDecoder } from "./chunked.js";
import type { FramingDecision } from "./framing.js";

export interface BodySource {
  /** null when request negotiation made no decision. */
  readonly framing: FramingDecision | null;
  /** Every framed byte has been taken off the wire. */
  readonly ended: boolean;
  /**
   * Next piece of the body, or null once it has ended.
   * Calls must not overlap.
   */
  read(): Promise<Buffer | null>;
}

/** What request negotiation decided, plus the end-of-body callback. */
export interface SourceFraming {
  decision: FramingDecision | null;
  /** With no decision: read until the peer closes rather than seeing no body. */
  closeDelimited?: boolean;
  /** Called exactly once, when the end of the body is reached. */
  onEnd: () => void;
}

/**
 * A decided body is always bounded by its decision, whether or not the
 * connection is reused afterwards.
 */
export function createBodySource(framing: SourceFraming, reader: SocketReader): BodySource {
  const { decision } = framing;
  const onEnd = once(framing.onEnd);
  if (!decision) {
    return framing.closeDelimited ? rawSource(null, reader, onEnd) : emptySource(null, onEnd);
  }
  switch (decision.kind) {
    case "empty":
      return emptySource(decision, onEnd);
    case "fixed-length":
      return fixedLengthSource(decision, decision.length, reader, onEnd);
    case "chunked":
      return chunkedSource(decision, reader, onEnd);
    case "identity":
      return rawSource(decision, reader, onEnd);
  }
}

function emptySource(framing: FramingDecision | null, onEnd: () => void): BodySource {
  onEnd();
  return {
    framing,
    ended: true,
    read: async () => null,
  };
}

function fixedLengthSource(
  framing: FramingDecision,
  length: number,
  reader: SocketReader,
  onEnd: () => void,
): BodySource {
  let remaining = length;
  return {
    framing,
    get ended() {
      return remaining === 0;
    },
    async read() {
      if (remaining === 0) {
        onEnd();
        return null;
      }
      // Never read past the declared length: the rest belongs to the next request
      const chunk = await reader.read(remaining);
      if (chunk === null) {
        throw new PrematureEndError(
          `Connection closed with ${remaining} of ${length} body bytes unread`,
        );
      }
      remaining -= chunk.length;
      if (remaining === 0) onEnd();
      return chunk;
    },
  };
}

function chunkedSource(
  framing: FramingDecision,
  reader: SocketReader,
  onEnd: () => void,
): BodySource {
  const decoder = new ChunkedDecoder();
  const pending: Buffer[] = [];
  return {
    framing,
    get ended() {
      return decoder.done;
    },
    async read() {
      for (;;) {
        const next = pending.shift();
        if (next) return next;
        if (decoder.done) {
          onEnd();
          return null;
        }
        const data = await reader.read();
        if (data === null) {
          throw new PrematureEndError("Connection closed before the terminating chunk");
        }
        decoder.feed(data);
        pending.push(...decoder.getChunks());
        if (decoder.done) {
          reader.unshift(decoder.takeRemainder());
          onEnd();
        }
      }
    },
  };
}

function rawSource(
  framing: FramingDecision | null,
  reader: SocketReader,
  onEnd: () => void,
): BodySource {
  let ended = false;
  return {
    framing,
    get ended() {
      return ended;
    },
    async read() {
      if (ended) return null;
      const chunk = await reader.read();
      if (chunk === null) {
        ended = true;
        onEnd();
      }
      return chunk;
    },
  };
}

export function once(fn: () => void): () => void {
  let called = false;
  return () => {
    if (called) return;
    called = true;
    fn();
  };
}
