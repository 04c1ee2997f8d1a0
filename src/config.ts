/**
 * Server configuration and its defaults.
 */
import { ConfigError } from "./errors.js";
import type { HttpHandler } from "./handler.js";

/** Minimal logging surface; `console` satisfies it. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ServerOptions {
  /** Handler chain for every request. Required: there is no fallback handler. */
  handler?: HttpHandler;
  /** Buffer-sizing hint in bytes: largest chunk emitted, read-ahead high-water mark (default: 16384) */
  bufferSize?: number;
  /** Largest accepted request head in bytes (default: 81920) */
  maxHeaderSize?: number;
  /** Idle time allowed while waiting for a request head in ms; 0 disables (default: 30000) */
  headersTimeout?: number;
  /** Where debug/warn/error output goes (default: console) */
  logger?: Logger;
}

export interface ResolvedServerOptions {
  handler: HttpHandler;
  bufferSize: number;
  maxHeaderSize: number;
  headersTimeout: number;
  logger: Logger;
}

export const DEFAULT_BUFFER_SIZE = 16 * 1024;
export const DEFAULT_MAX_HEADER_SIZE = 80 * 1024;
export const DEFAULT_HEADERS_TIMEOUT = 30_000;

export function normalizeServerOptions(options: ServerOptions): ResolvedServerOptions {
  if (typeof options.handler !== "function") {
    throw new ConfigError("A request handler is required");
  }
  return {
    handler: options.handler,
    bufferSize: positiveInteger("bufferSize", options.bufferSize, DEFAULT_BUFFER_SIZE),
    maxHeaderSize: positiveInteger("maxHeaderSize", options.maxHeaderSize, DEFAULT_MAX_HEADER_SIZE),
    headersTimeout: nonNegativeInteger(
      "headersTimeout",
      options.headersTimeout,
      DEFAULT_HEADERS_TIMEOUT,
    ),
    logger: options.logger ?? console,
  };
}

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function nonNegativeInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
