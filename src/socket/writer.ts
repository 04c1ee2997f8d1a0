import type { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";

/** Raw byte sink the framed response bodies are written to. */
export interface ByteSink {
  write(data: Buffer): Promise<void>;
}

export function writeToSocket(socket: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || socket.writableEnded) {
      reject(new Error("Socket is closed"));
      return;
    }
    socket.write(data, (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/** Adapt a socket to the ByteSink interface. */
export function socketSink(socket: Duplex): ByteSink {
  return { write: data => writeToSocket(socket, data) };
}
