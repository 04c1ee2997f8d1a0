/**
 * TCP listener that runs the HTTP/1.x connection loop on every accepted socket.
 */
import { createServer as createNetServer, type AddressInfo, type Server, type Socket } from "node:net";
import {
  normalizeServerOptions,
  type ResolvedServerOptions,
  type ServerOptions,
} from "../config.js";
import { errorMessage } from "../errors.js";
import { serveConnection } from "./connection.js";

export class H1Server {
  readonly options: ResolvedServerOptions;
  private readonly server: Server;
  private readonly connections = new Set<Socket>();

  /** @throws ConfigError when no handler is configured */
  constructor(options: ServerOptions) {
    this.options = normalizeServerOptions(options);
    this.server = createNetServer(socket => this.onConnection(socket));
  }

  /** Open connections, including idle persistent ones. */
  get connectionCount(): number {
    return this.connections.size;
  }

  listen(port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.removeListener("error", onError);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        this.options.logger.debug(`[server] listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Stop accepting connections and close the open ones. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
      for (const socket of this.connections) socket.destroy();
    });
  }

  private onConnection(socket: Socket): void {
    const { logger } = this.options;
    this.connections.add(socket);
    socket.once("close", () => this.connections.delete(socket));
    socket.setNoDelay(true);
    logger.debug(`[server] connection from ${socket.remoteAddress}:${socket.remotePort}`);

    serveConnection(socket, this.options).catch((err: unknown) => {
      logger.error(`[server] connection loop failed: ${errorMessage(err)}`);
      socket.destroy();
    });
  }
}

export function createServer(options: ServerOptions): H1Server {
  return new H1Server(options);
}
