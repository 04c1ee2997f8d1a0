/**
 * One HTTP/1.x request/response cycle on a connection.
 *
 * Holds the framed request body, the lazily created response body sink,
 * the persistence flag shared by both negotiation phases, and the two
 * lifecycle signals the connection loop waits on before reusing the socket.
 */
import { Buffer } from "node:buffer";
import type { Logger } from "../config.js";
import type { SocketReader } from "../socket/reader.js";
import type { ByteSink } from "../socket/writer.js";
import { HeaderMap, HeaderNames, HeaderValues, equalsIgnoreCase } from "../utils/headers.js";
import { createBodySink, type BodySink } from "./body-sink.js";
import { createBodySource, type BodySource } from "./body-source.js";
import { describeFraming } from "./framing.js";
import {
  applyHeaderMutations,
  negotiateRequestFraming,
  negotiateResponseFraming,
  isBodilessResponse,
  isBodilessStatus,
  type RequestFraming,
  type ResponseFraming,
} from "./negotiate.js";
import { evaluatePersistence } from "./persistence.js";
import { serializeResponseHead } from "./serializer.js";
import type { HttpVersion } from "./version.js";

export interface RequestHead {
  method: string;
  target: string;
  /** Protocol token as received, e.g. "HTTP/1.1" */
  protocol: string;
  version: HttpVersion;
  headers: HeaderMap;
}

/** What an exchange needs from the connection it runs on. */
export interface ExchangeConnection {
  reader: SocketReader;
  sink: ByteSink;
  bufferSize: number;
  logger: Logger;
}

/** Fires exactly once; later fire() calls are ignored. */
export class LifecycleSignal {
  private _fired = false;
  private readonly resolve: () => void;
  private readonly promise: Promise<void>;

  constructor() {
    let resolve = (): void => {};
    this.promise = new Promise<void>(r => {
      resolve = r;
    });
    this.resolve = resolve;
  }

  get fired(): boolean {
    return this._fired;
  }

  /** Returns false if the signal had already fired. */
  fire(): boolean {
    if (this._fired) return false;
    this._fired = true;
    this.resolve();
    return true;
  }

  wait(): Promise<void> {
    return this.promise;
  }
}

const CONTINUE_LINE = Buffer.from("HTTP/1.1 100 Continue\r\n\r\n", "latin1");

export class HttpExchange {
  readonly method: string;
  readonly target: string;
  readonly protocol: string;
  readonly version: HttpVersion;
  readonly requestHeaders: HeaderMap;
  readonly responseHeaders = new HeaderMap();
  status = 200;
  statusText: string | undefined;

  readonly requestTerminated = new LifecycleSignal();
  readonly responseTerminated = new LifecycleSignal();

  private _persistent: boolean;
  private requestFraming: RequestFraming | null = null;
  private source: BodySource | null = null;
  private sink: BodySink | null = null;
  private continueSent = false;

  constructor(
    head: RequestHead,
    private readonly connection: ExchangeConnection,
  ) {
    this.method = head.method;
    this.target = head.target;
    this.protocol = head.protocol;
    this.version = head.version;
    this.requestHeaders = head.headers;
    this._persistent = evaluatePersistence(head.version, head.headers);
  }

  /** Whether the connection may serve another request after this one. */
  get persistent(): boolean {
    return this._persistent;
  }

  /** Downgrade persistence; it never goes back to true. */
  closeConnection(): void {
    this._persistent = false;
  }

  /**
   * Negotiate request framing and install the framed body view.
   * Must run before the handler sees the exchange.
   * @throws MalformedLengthError
   */
  beginRequest(): void {
    if (this.requestFraming) throw new Error("Request framing already negotiated");
    const framing = negotiateRequestFraming({
      version: this.version,
      headers: this.requestHeaders,
      persistent: this._persistent,
    });
    if (!framing.persistent) this.closeConnection();
    this.requestFraming = framing;
    this.source = createBodySource(
      {
        decision: framing.decision,
        closeDelimited: framing.closeDelimited,
        onEnd: () => this.terminateRequest(),
      },
      this.connection.reader,
    );
    if (framing.consumed) this.terminateRequest();
    this.connection.logger.debug(
      `[http1] ${this.method} ${this.target} ${this.protocol} request=${describeFraming(framing.decision)} persistent=${this._persistent}`,
    );
  }

  /** The framed request body; only available after beginRequest(). */
  get requestBody(): BodySource {
    if (!this.source) throw new Error("Request framing not negotiated yet");
    return this.source;
  }

  /** Unread request bytes must be drained before the connection is reused. */
  get drainRequired(): boolean {
    return this.requestFraming !== null && this.requestFraming.limited && !this.requestBody.ended;
  }

  /** Next piece of the request body, or null at its end. */
  async read(): Promise<Buffer | null> {
    const body = this.requestBody;
    if (!body.ended) await this.sendContinue();
    return body.read();
  }

  /** Read the whole request body into one buffer. */
  async readBody(): Promise<Buffer> {
    const parts: Buffer[] = [];
    for (let chunk = await this.read(); chunk !== null; chunk = await this.read()) {
      parts.push(chunk);
    }
    return Buffer.concat(parts);
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<Buffer> {
    for (let chunk = await this.read(); chunk !== null; chunk = await this.read()) {
      yield chunk;
    }
  }

  /** Signal that no more request bytes are owed. Fires at most once. */
  terminateRequest(): void {
    if (this.requestTerminated.fire()) {
      this.connection.logger.debug(`[http1] request terminated ${this.method} ${this.target}`);
    }
  }

  /** The response head has been negotiated and written. */
  get responseStarted(): boolean {
    return this.sink !== null;
  }

  /** The framed response sink; null until the response starts. */
  get responseBody(): BodySink | null {
    return this.sink;
  }

  async write(data: Uint8Array | string): Promise<void> {
    const sink = await this.startResponse();
    await this.guard(sink.write(typeof data === "string" ? Buffer.from(data, "utf-8") : data));
  }

  /**
   * Finish the response, optionally writing a last piece of body first.
   * When the response has not started and declares no framing, the length
   * of `data` becomes its Content-Length. A HEAD response ended without data
   * gets no length at all.
   */
  async end(data?: Uint8Array | string): Promise<void> {
    const body = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    if (
      !this.sink &&
      !isBodilessStatus(this.status) &&
      !(body === undefined && isBodilessResponse(this.method, this.status)) &&
      !this.responseHeaders.has(HeaderNames.CONTENT_LENGTH) &&
      !this.responseHeaders.has(HeaderNames.TRANSFER_ENCODING)
    ) {
      this.responseHeaders.set("Content-Length", String(body?.byteLength ?? 0));
    }
    const sink = await this.startResponse();
    if (body && body.byteLength > 0) await this.guard(sink.write(body));
    await this.guard(sink.end());
  }

  /** Set the status and an optional content type, then end with `body`. */
  async send(status: number, body?: Uint8Array | string, contentType?: string): Promise<void> {
    if (this.sink) throw new Error("Response already started");
    this.status = status;
    if (contentType) this.responseHeaders.set("Content-Type", contentType);
    await this.end(body);
  }

  /** Signal that the response has been completely sent. Fires at most once. */
  terminateResponse(): void {
    if (this.responseTerminated.fire()) {
      this.connection.logger.debug(
        `[http1] response terminated ${this.status} persistent=${this._persistent}`,
      );
    }
  }

  /**
   * Give up on this exchange: the connection will not be reused and both
   * lifecycle signals fire so the connection loop can unwind.
   */
  abort(): void {
    this.closeConnection();
    this.terminateRequest();
    this.terminateResponse();
  }

  /** Negotiate response framing, write the head, and wrap the sink exactly once. */
  private async startResponse(): Promise<BodySink> {
    if (this.sink) return this.sink;

    let framing: ResponseFraming;
    try {
      framing = negotiateResponseFraming({
        version: this.version,
        method: this.method,
        status: this.status,
        headers: this.responseHeaders,
        persistent: this._persistent,
      });
    } catch (err) {
      this.closeConnection();
      throw err;
    }
    applyHeaderMutations(this.responseHeaders, framing.mutations);
    if (!framing.persistent) this.closeConnection();

    const sink = createBodySink(framing.decision, this.connection.sink, {
      bufferSize: this.connection.bufferSize,
      onComplete: () => this.terminateResponse(),
    });
    this.sink = sink;
    this.connection.logger.debug(
      `[http1] response ${this.status} framing=${describeFraming(framing.decision)} persistent=${this._persistent}`,
    );

    const head = serializeResponseHead(this.version, this.status, this.responseHeaders, this.statusText);
    await this.guard(this.connection.sink.write(Buffer.from(head, "latin1")));
    return sink;
  }

  /**
   * The client sent `Expect: 100-continue` and has not been told to go on,
   * so it may never send the body.
   */
  get awaitingContinue(): boolean {
    if (this.continueSent || this.version !== "HTTP/1.1") return false;
    const expect = this.requestHeaders.getFirst(HeaderNames.EXPECT);
    return expect !== undefined && equalsIgnoreCase(expect, HeaderValues.CONTINUE);
  }

  /** Interim 100 Continue for an HTTP/1.1 client waiting before it sends the body. */
  private async sendContinue(): Promise<void> {
    if (this.sink || !this.awaitingContinue) return;
    this.continueSent = true;
    await this.guard(this.connection.sink.write(CONTINUE_LINE));
  }

  /** Any failure while producing the response makes the connection unusable. */
  private async guard<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (err) {
      this.closeConnection();
      throw err;
    }
  }
}
