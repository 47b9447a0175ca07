/**
 * Proxy over the raw transport response.
 *
 * Tracks whether the status line has been flushed, the status that was sent
 * and the number of body bytes written. Only the first writeHeader() takes
 * effect, so any layer may attempt to respond and at most one envelope is
 * ever sent for a request.
 */

import { contentTypeHeader } from "@actionkit/core";

/**
 * The part of node:http's ServerResponse the dispatcher relies on.
 * Any object of this shape can serve as the transport.
 */
export interface ResponseSink {
  setHeader(name: string, value: string): unknown;
  getHeader(name: string): number | string | readonly string[] | undefined;
  writeHead(statusCode: number): unknown;
  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
  end(): unknown;
  /** Set once the response has been torn down. */
  readonly destroyed?: boolean;
  readonly socket?: { readonly destroyed: boolean } | null;
  /** node:http drops write callbacks on a dead socket; "close" settles them. */
  once?(event: "close", listener: () => void): unknown;
  removeListener?(event: "close", listener: () => void): unknown;
}

const LOG_PREFIX = "actionkit-server:response-writer";

export class ResponseWriter {
  private sink: ResponseSink | null;
  private _wrote = false;
  private _ended = false;
  private _status = 200;
  private _size = 0;

  constructor(sink: ResponseSink | null = null) {
    this.sink = sink;
  }

  /** Whether the status line has been flushed. */
  get wrote(): boolean {
    return this._wrote;
  }

  /** Status that was (or will by default be) sent. */
  get status(): number {
    return this._status;
  }

  /** Body bytes written so far. */
  get size(): number {
    return this._size;
  }

  get ended(): boolean {
    return this._ended;
  }

  /** The wrapped transport response. Throws when detached. */
  get raw(): ResponseSink {
    if (!this.sink) {
      throw new Error(`${LOG_PREFIX}:raw - No response attached`);
    }
    return this.sink;
  }

  /**
   * Sets a response header. Ignored once the status line is flushed.
   * Returns whether the header was applied.
   */
  setHeader(name: string, value: string): boolean {
    if (this._wrote) return false;
    this.raw.setHeader(name, value);
    return true;
  }

  getHeader(name: string): number | string | readonly string[] | undefined {
    return this.raw.getHeader(name);
  }

  /** Sets Content-Type; "" leaves the header untouched. */
  setContentType(ct: string): void {
    const value = contentTypeHeader(ct);
    if (value !== undefined) this.setHeader("Content-Type", value);
  }

  /** Flushes the status line. Only the first call has any effect. */
  writeHeader(code: number): void {
    if (this._wrote) return;
    this._wrote = true;
    this._status = code;
    this.raw.writeHead(code);
  }

  /**
   * Writes body bytes, flushing status 200 first if needed.
   * Resolves once the transport has accepted the chunk, so the caller may
   * reuse the underlying memory afterwards. An aborted connection surfaces
   * as a rejection.
   */
  async write(chunk: Uint8Array | string): Promise<number> {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    if (bytes.length === 0) return 0;

    this.writeHeader(200);
    const sink = this.raw;
    if (isClosed(sink)) {
      throw new Error(`${LOG_PREFIX}:write - Connection closed`);
    }
    return await new Promise<number>((resolve, reject) => {
      const onClose = (): void => {
        reject(new Error(`${LOG_PREFIX}:write - Connection closed before the write completed`));
      };
      sink.once?.("close", onClose);
      sink.write(bytes, (err) => {
        sink.removeListener?.("close", onClose);
        if (err) {
          reject(err);
          return;
        }
        this._size += bytes.length;
        resolve(bytes.length);
      });
    });
  }

  /** Finishes the response. Later calls do nothing. */
  end(): void {
    if (this._ended || !this.sink) return;
    this.writeHeader(this._status);
    this._ended = true;
    this.sink.end();
  }

  /** Rebinds to `sink` and restores the initial state. */
  reset(sink: ResponseSink | null): void {
    this.sink = sink;
    this._wrote = false;
    this._ended = false;
    this._status = 200;
    this._size = 0;
  }
}

function isClosed(sink: ResponseSink): boolean {
  return sink.destroyed === true || sink.socket?.destroyed === true;
}
