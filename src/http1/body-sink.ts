/**
 * Framed response body writers over the raw connection sink.
 * The framed sink is the outermost transformation applied to the output:
 * nothing may be layered over it once created.
 */
import { Buffer } from "node:buffer";
import { FixedLengthOverflowError, ShortWriteError } from "../errors.js";
import type { ByteSink } from "../socket/writer.js";
import { encodeChunk, encodeLastChunk } from "./chunked.js";
import type { FramingDecision } from "./framing.js";
import { once } from "./body-source.js";

export interface BodySink {
  readonly framing: FramingDecision;
  /** end() completed successfully. */
  readonly finished: boolean;
  /** Payload bytes accepted so far, before any transfer coding. */
  readonly bytesWritten: number;
  write(data: Uint8Array): Promise<void>;
  end(): Promise<void>;
}

export interface SinkOptions {
  /** Largest chunk emitted by the chunked writer. */
  bufferSize: number;
  /** Called exactly once, when the body has been completely written. */
  onComplete: () => void;
}

export function createBodySink(
  decision: FramingDecision,
  sink: ByteSink,
  options: SinkOptions,
): BodySink {
  const onComplete = once(options.onComplete);
  switch (decision.kind) {
    case "chunked":
      return chunkedSink(decision, sink, options.bufferSize, onComplete);
    case "fixed-length":
      return fixedLengthSink(decision, decision.length, sink, onComplete);
    case "empty":
      return emptySink(decision, onComplete);
    case "identity":
      return identitySink(decision, sink, onComplete);
  }
}

/** Write-after-end bookkeeping shared by every sink. */
interface SinkState {
  finished: boolean;
  bytesWritten: number;
  ending: boolean;
}

function newState(): SinkState {
  return { finished: false, bytesWritten: 0, ending: false };
}

function assertWritable(state: SinkState): void {
  if (state.ending) throw new Error("Write after end of response body");
}

/** Returns false when end() was already called. */
function beginEnd(state: SinkState): boolean {
  if (state.ending) return false;
  state.ending = true;
  return true;
}

function makeSink(
  framing: FramingDecision,
  state: SinkState,
  ops: Pick<BodySink, "write" | "end">,
): BodySink {
  return {
    framing,
    get finished() {
      return state.finished;
    },
    get bytesWritten() {
      return state.bytesWritten;
    },
    write: ops.write,
    end: ops.end,
  };
}

function chunkedSink(
  framing: FramingDecision,
  sink: ByteSink,
  bufferSize: number,
  onComplete: () => void,
): BodySink {
  const state = newState();
  return makeSink(framing, state, {
    async write(data) {
      assertWritable(state);
      // A zero-size chunk would terminate the body, so empty writes emit nothing
      for (let offset = 0; offset < data.byteLength; offset += bufferSize) {
        const slice = data.subarray(offset, Math.min(offset + bufferSize, data.byteLength));
        await sink.write(encodeChunk(slice));
        state.bytesWritten += slice.byteLength;
      }
    },
    async end() {
      if (!beginEnd(state)) return;
      await sink.write(encodeLastChunk());
      state.finished = true;
      onComplete();
    },
  });
}

function fixedLengthSink(
  framing: FramingDecision,
  length: number,
  sink: ByteSink,
  onComplete: () => void,
): BodySink {
  const state = newState();
  return makeSink(framing, state, {
    async write(data) {
      assertWritable(state);
      if (state.bytesWritten + data.byteLength > length) {
        throw new FixedLengthOverflowError(length, state.bytesWritten + data.byteLength);
      }
      if (data.byteLength === 0) return;
      state.bytesWritten += data.byteLength;
      await sink.write(toBuffer(data));
    },
    async end() {
      if (!beginEnd(state)) return;
      if (state.bytesWritten < length) {
        throw new ShortWriteError(length, state.bytesWritten);
      }
      state.finished = true;
      onComplete();
    },
  });
}

function emptySink(framing: FramingDecision, onComplete: () => void): BodySink {
  const state = newState();
  return makeSink(framing, state, {
    // HEAD and bodiless statuses: whatever the handler produces stays off the wire
    async write() {
      assertWritable(state);
    },
    async end() {
      if (!beginEnd(state)) return;
      state.finished = true;
      onComplete();
    },
  });
}

function identitySink(framing: FramingDecision, sink: ByteSink, onComplete: () => void): BodySink {
  const state = newState();
  return makeSink(framing, state, {
    async write(data) {
      assertWritable(state);
      if (data.byteLength === 0) return;
      state.bytesWritten += data.byteLength;
      await sink.write(toBuffer(data));
    },
    // The end of a close-delimited body is the connection close itself
    async end() {
      if (!beginEnd(state)) return;
      state.finished = true;
      onComplete();
    },
  });
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
