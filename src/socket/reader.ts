/**
 * Buffered async reader over a Node.js Duplex socket.
 *
 * Incoming data keeps being queued while the current exchange is still in
 * progress, so the bytes of a pipelined request are read ahead of time.
 * Framed body sources push surplus bytes back with unshift().
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";

export class SocketReader {
  private queue: Buffer[] = [];
  private queuedBytes = 0;
  private ended = false;
  private error: Error | null = null;
  private waiter: (() => void) | null = null;
  private paused = false;
  private detached = false;

  /**
   * @param highWaterMark queued byte count at which the socket is paused
   */
  constructor(
    private readonly socket: Duplex,
    private readonly highWaterMark: number,
  ) {
    socket.on("data", this.onData);
    socket.on("end", this.onEnd);
    socket.on("error", this.onError);
    socket.on("close", this.onEnd);
  }

  /** Bytes received and not yet handed out. */
  get buffered(): number {
    return this.queuedBytes;
  }

  /** True once EOF was seen and every queued byte has been read. */
  get exhausted(): boolean {
    return this.ended && this.queuedBytes === 0;
  }

  /**
   * Next available bytes, at most `max` of them.
   * Resolves null at EOF; rejects with the socket's error.
   */
  async read(max = Infinity): Promise<Buffer | null> {
    while (this.queue.length === 0) {
      if (this.error) throw this.error;
      if (this.ended) return null;
      await new Promise<void>(resolve => {
        this.waiter = resolve;
      });
    }

    let chunk = this.queue[0];
    if (chunk.length > max) {
      this.queue[0] = chunk.subarray(max);
      chunk = chunk.subarray(0, max);
    } else {
      this.queue.shift();
    }
    this.queuedBytes -= chunk.length;
    this.maybeResume();
    return chunk;
  }

  /** Return bytes to the front of the queue. */
  unshift(data: Buffer): void {
    if (data.length === 0) return;
    this.queue.unshift(data);
    this.queuedBytes += data.length;
  }

  /** Stop listening on the socket; queued bytes stay readable. */
  detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.socket.removeListener("data", this.onData);
    this.socket.removeListener("end", this.onEnd);
    this.socket.removeListener("error", this.onError);
    this.socket.removeListener("close", this.onEnd);
    this.ended = true;
    this.wake();
  }

  private readonly onData = (chunk: Buffer | Uint8Array | string): void => {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "latin1") : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    if (buf.length === 0) return;
    this.queue.push(buf);
    this.queuedBytes += buf.length;
    if (this.queuedBytes >= this.highWaterMark && !this.paused) {
      this.paused = true;
      this.socket.pause();
    }
    this.wake();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.wake();
  };

  private readonly onError = (err: Error): void => {
    this.error = err;
    this.wake();
  };

  private maybeResume(): void {
    if (this.paused && this.queuedBytes < this.highWaterMark) {
      this.paused = false;
      this.socket.resume();
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
