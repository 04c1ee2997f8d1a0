/**
 * HTTP/1.1 chunked transfer coding.
 *
 * Chunked format:
 *   <hex-size>[;ext]\r\n
 *   <data>\r\n
 *   ...
 *   0\r\n
 *   [trailer: value\r\n]*
 *   \r\n
 */
import { Buffer } from "node:buffer";
import { ChunkedEncodingError } from "../errors.js";

const enum ChunkedState {
  READ_SIZE,
  READ_DATA,
  READ_DATA_CRLF,
  READ_TRAILER,
  DONE,
}

const MAX_CHUNK_SIZE = 16 * 1024 * 1024;
const MAX_LINE_LENGTH = 8192;
const HEX_RE = /^[0-9a-fA-F]+$/;

const CRLF = Buffer.from("\r\n");
const LAST_CHUNK = Buffer.from("0\r\n\r\n");

/**
 * Stateful chunked transfer coding decoder.
 * Feed raw data via feed(), collect decoded chunks via getChunks().
 * Bytes following the terminating chunk are kept aside for takeRemainder().
 */
export class ChunkedDecoder {
  private state: ChunkedState = ChunkedState.READ_SIZE;
  private buffer: Buffer = Buffer.alloc(0);
  private currentChunkSize = 0;
  private chunks: Buffer[] = [];

  /** Whether the terminating chunk and its trailer section have been consumed */
  get done(): boolean {
    return this.state === ChunkedState.DONE;
  }

  /** Feed raw data into the decoder */
  feed(data: Buffer | Uint8Array): void {
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, buf]) : buf;
    if (!this.done) this.process();
  }

  /** Get and clear decoded chunks */
  getChunks(): Buffer[] {
    const result = this.chunks;
    this.chunks = [];
    return result;
  }

  /** Bytes received past the end of the chunked body. */
  takeRemainder(): Buffer {
    if (!this.done) return Buffer.alloc(0);
    const rest = this.buffer;
    this.buffer = Buffer.alloc(0);
    return rest;
  }

  private process(): void {
    while (this.state !== ChunkedState.DONE) {
      switch (this.state) {
        case ChunkedState.READ_SIZE: {
          const line = this.takeLine();
          if (line === null) return;

          // Chunk size may have extensions after ";", ignore them
          const semiIdx = line.indexOf(";");
          const sizeStr = (semiIdx === -1 ? line : line.substring(0, semiIdx)).trim();
          if (!HEX_RE.test(sizeStr)) {
            throw new ChunkedEncodingError(`Invalid chunk size: "${sizeStr}"`);
          }
          this.currentChunkSize = parseInt(sizeStr, 16);
          if (this.currentChunkSize > MAX_CHUNK_SIZE) {
            throw new ChunkedEncodingError(`Chunk size too large: ${this.currentChunkSize}`);
          }

          this.state = this.currentChunkSize === 0 ? ChunkedState.READ_TRAILER : ChunkedState.READ_DATA;
          break;
        }

        case ChunkedState.READ_DATA: {
          if (this.buffer.length === 0) return;
          // Hand out partial data as it arrives rather than waiting for the whole chunk
          const take = Math.min(this.buffer.length, this.currentChunkSize);
          this.chunks.push(this.buffer.subarray(0, take));
          this.buffer = this.buffer.subarray(take);
          this.currentChunkSize -= take;
          if (this.currentChunkSize === 0) this.state = ChunkedState.READ_DATA_CRLF;
          break;
        }

        case ChunkedState.READ_DATA_CRLF: {
          if (this.buffer.length < 2) return; // need \r\n
          if (this.buffer[0] !== 0x0d || this.buffer[1] !== 0x0a) {
            throw new ChunkedEncodingError("Expected CRLF after chunk data");
          }
          this.buffer = this.buffer.subarray(2);
          this.state = ChunkedState.READ_SIZE;
          break;
        }

        case ChunkedState.READ_TRAILER: {
          const line = this.takeLine();
          if (line === null) return;
          // Trailer fields are discarded; an empty line ends the message
          if (line.length === 0) this.state = ChunkedState.DONE;
          break;
        }
      }
    }
  }

  private takeLine(): string | null {
    const crlfIdx = this.buffer.indexOf(CRLF);
    if (crlfIdx === -1) {
      if (this.buffer.length > MAX_LINE_LENGTH) {
        throw new ChunkedEncodingError("Chunk size or trailer line too long");
      }
      return null;
    }
    const line = this.buffer.subarray(0, crlfIdx).toString("latin1");
    this.buffer = this.buffer.subarray(crlfIdx + 2);
    return line;
  }
}

/**
 * Encode one chunk: size line, payload, CRLF.
 * An empty payload would read as the terminator, so callers must skip it.
 */
export function encodeChunk(data: Uint8Array): Buffer {
  if (data.byteLength === 0) {
    throw new RangeError("Cannot encode an empty chunk; use encodeLastChunk()");
  }
  return Buffer.concat([Buffer.from(`${data.byteLength.toString(16)}\r\n`, "latin1"), data, CRLF]);
}

/** The zero-size chunk with an empty trailer section. */
export function encodeLastChunk(): Buffer {
  return LAST_CHUNK;
}
