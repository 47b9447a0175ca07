/**
 * In-process stand-ins for node:http's IncomingMessage and ServerResponse,
 * used by the unit tests.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { RequestSource } from "../binder.js";
import type { ResponseSink } from "../response-writer.js";

export function fakeRequest(params: {
  method?: string;
  url?: string;
  headers?: IncomingHttpHeaders;
  body?: string;
} = {}): RequestSource {
  const headers: IncomingHttpHeaders = { ...params.headers };
  const chunks = params.body === undefined ? [] : [Buffer.from(params.body, "utf8")];
  if (params.body !== undefined && headers["content-length"] === undefined) {
    headers["content-length"] = String(Buffer.byteLength(params.body, "utf8"));
  }
  return {
    method: params.method ?? "GET",
    url: params.url ?? "/",
    headers,
    async *[Symbol.asyncIterator]() {
      for (const chunk of chunks) yield chunk;
    },
  };
}

/** Records everything written; copies each chunk the way a socket would. */
export class FakeResponse implements ResponseSink {
  statusCode: number | undefined;
  readonly headers = new Map<string, string>();
  readonly chunks: Buffer[] = [];
  writeHeadCalls = 0;
  endCalls = 0;
  writeError: Error | undefined;
  /** When set, write callbacks are never called, as on a dead socket. */
  dropWriteCallbacks = false;
  destroyed = false;
  private closeListeners: Array<() => void> = [];

  setHeader(name: string, value: string): void {
    if (this.statusCode !== undefined) {
      throw new Error("Cannot set headers after they are sent to the client");
    }
    this.headers.set(name.toLowerCase(), value);
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name.toLowerCase());
  }

  writeHead(statusCode: number): void {
    this.writeHeadCalls++;
    this.statusCode = statusCode;
  }

  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean {
    const err = this.writeError;
    if (err) {
      queueMicrotask(() => callback(err));
      return false;
    }
    if (this.dropWriteCallbacks) return false;
    this.chunks.push(Buffer.from(chunk));
    queueMicrotask(() => callback(null));
    return true;
  }

  once(_event: "close", listener: () => void): void {
    this.closeListeners.push(listener);
  }

  removeListener(_event: "close", listener: () => void): void {
    this.closeListeners = this.closeListeners.filter((l) => l !== listener);
  }

  get listenerCount(): number {
    return this.closeListeners.length;
  }

  /** Tears the response down and fires "close" once. */
  close(): void {
    this.destroyed = true;
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) listener();
  }

  end(): void {
    this.endCalls++;
  }

  get ended(): boolean {
    return this.endCalls > 0;
  }

  get body(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
