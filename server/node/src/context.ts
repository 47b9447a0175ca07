/**
 * Per-request context.
 *
 * A Context is drawn from the service's pool for one request and reset when
 * the request completes. Handlers borrow it for the duration of one call and
 * must not keep a reference after they return.
 */

import { ZodError, type ZodTypeAny, type z } from "zod";
import {
  ActionError,
  ErrInvalidParameter,
  ErrUnsupportedProtocol,
  errorMessage,
  toErrorDescriptor,
  toWireEnvelope,
  type Response,
} from "@actionkit/core";
import { bindQueryValues, contentLength, firstQueryValue, parseQuery, type Binder, type QueryValues, type RequestSource } from "./binder.js";
import type { BufferPool, PooledBuffer } from "./buffer-pool.js";
import { jsonCodec, type Codec } from "./codec.js";
import { ResponseWriter, type ResponseSink } from "./response-writer.js";

const LOG_PREFIX = "actionkit-server:context";

/** Methods whose payload is read from the query string. */
const QUERY_METHODS: ReadonlySet<string> = new Set(["GET", "HEAD"]);
/** Methods whose payload is read from the body. */
const BODY_METHODS: ReadonlySet<string> = new Set(["POST", "PUT", "PATCH", "DELETE"]);

// ── Hooks ───────────────────────────────────────────────────────────

/** Fills zero-valued fields of a bound payload in place. Throws to fail. */
export type DefaultSetter = (data: unknown) => void | Promise<void>;

/** Checks a bound payload. Throws to fail. */
export type Validator = (data: unknown) => void | Promise<void>;

/** Renders the response in place of the default JSON envelope. */
export type Renderer = (c: Context, r: Response) => Promise<void>;

/** Services a context borrows from the service that created it. */
export interface ContextRuntime {
  buffers: BufferPool;
  codec: Codec;
  bodyBinder: Binder;
}

type Hooks = Pick<Context, "binder" | "setDefault" | "validate" | "render">;

// ── Context ─────────────────────────────────────────────────────────

export class Context {
  /** Name of the requested action */
  action = "";
  /** Requested api version */
  version = "";
  /** Unique id of the request */
  requestId = "";

  /**
   * Free slot for request-scoped user data. The dispatcher never clears it;
   * its lifecycle is up to the application.
   */
  data: unknown = undefined;

  /**
   * Replaces the default binding strategy of bind().
   * Default: query string for GET/HEAD, request body for POST/PUT/PATCH/DELETE.
   */
  binder?: Binder;
  /** Called after a successful structural bind. */
  setDefault?: DefaultSetter;
  /** Called after setDefault succeeded. */
  validate?: Validator;
  /** Replaces the default JSON envelope rendering of respond(). */
  render?: Renderer;

  private req: RequestSource | null = null;
  private readonly res = new ResponseWriter();
  private cachedQuery: QueryValues | null = null;
  private runtime: ContextRuntime | null = null;
  private hooks: Hooks = {};

  /**
   * Attaches the service runtime and records the current hooks as the ones
   * every reset restores. Called once, when the pool creates the context.
   */
  attach(runtime: ContextRuntime): void {
    this.runtime = runtime;
    this.hooks = {
      binder: this.binder,
      setDefault: this.setDefault,
      validate: this.validate,
      render: this.render,
    };
  }

  /** Clears all per-request state except `data`. */
  reset(): void {
    this.req = null;
    this.cachedQuery = null;
    this.res.reset(null);
    this.action = "";
    this.version = "";
    this.requestId = "";
    this.binder = this.hooks.binder;
    this.setDefault = this.hooks.setDefault;
    this.validate = this.hooks.validate;
    this.render = this.hooks.render;
  }

  // ── Request / response handles ──────────────────────────────────

  setReqResp(req: RequestSource, res: ResponseSink): void {
    this.req = req;
    this.cachedQuery = null;
    this.res.reset(res);
  }

  request(): RequestSource {
    if (!this.req) {
      throw new Error(`${LOG_PREFIX}:request - No request attached`);
    }
    return this.req;
  }

  /** The underlying transport response. */
  responseWriter(): ResponseSink {
    return this.res.raw;
  }

  /** Status code sent (200 until something else is written). */
  statusCode(): number {
    return this.res.status;
  }

  /** Whether the status line has been sent. */
  isResponded(): boolean {
    return this.res.wrote;
  }

  /** Body bytes written so far. */
  responseSize(): number {
    return this.res.size;
  }

  // ── Request accessors ───────────────────────────────────────────

  /** Parsed query of the request, cached for the request's lifetime. */
  query(): QueryValues {
    if (this.cachedQuery === null) {
      this.cachedQuery = parseQuery(this.request().url);
    }
    return this.cachedQuery;
  }

  /** First value of the query parameter `key`, "" when absent. */
  getQuery(key: string): string {
    return firstQueryValue(this.query(), key);
  }

  /** First value of the request header `key`, "" when absent. */
  getReqHeader(key: string): string {
    const v = this.request().headers[key.toLowerCase()];
    if (v === undefined) return "";
    return Array.isArray(v) ? (v[0] ?? "") : v;
  }

  /** Content-Length of the request, -1 when unknown. */
  contentLength(): number {
    return contentLength(this.request());
  }

  /** Content-Type of the request without parameters such as charset. */
  contentType(): string {
    const ct = this.getReqHeader("Content-Type");
    const index = ct.indexOf(";");
    return index > 0 ? ct.slice(0, index).trim() : ct;
  }

  /** GET with "upgrade" among the Connection tokens and Upgrade: websocket. */
  isWebSocket(): boolean {
    if (this.request().method !== "GET") return false;
    const connection = this.getReqHeader("Connection")
      .split(",")
      .map((token) => token.trim().toLowerCase());
    return (
      connection.includes("upgrade") &&
      this.getReqHeader("Upgrade").trim().toLowerCase() === "websocket"
    );
  }

  // ── Binding ─────────────────────────────────────────────────────

  /**
   * Binds the request to `schema`, then runs setDefault and validate.
   *
   * Rejects with an ActionError: UnsupportedProtocol for a method without a
   * binding strategy, InvalidParameter for any other failure that is not
   * already an ActionError.
   */
  async bind<S extends ZodTypeAny>(schema: S): Promise<z.output<S>> {
    try {
      const value = await this.bindStructure(schema);
      if (this.setDefault) await this.setDefault(value);
      if (this.validate) await this.validate(value);
      return value;
    } catch (err) {
      throw toBindError(err);
    }
  }

  private bindStructure<S extends ZodTypeAny>(schema: S): Promise<z.output<S>> {
    const req = this.request();
    if (this.binder) return this.binder.bind(schema, req);

    const method = (req.method ?? "").toUpperCase();
    if (QUERY_METHODS.has(method)) return bindQueryValues(schema, this.query());
    if (BODY_METHODS.has(method)) return this.getRuntime().bodyBinder.bind(schema, req);
    throw ErrUnsupportedProtocol.withMessage(`unsupported method '${req.method ?? ""}'`);
  }

  // ── Responding ──────────────────────────────────────────────────

  /**
   * Sends `data` and `err` as one response envelope.
   * Does nothing when a response has already been written.
   */
  async respond(data?: unknown, err?: unknown): Promise<void> {
    if (this.res.wrote) return;
    const response: Response = {
      requestId: this.requestId,
      error: toErrorDescriptor(err),
      data,
    };
    if (this.render) {
      await this.render(this, response);
      return;
    }
    const runtime = this.getRuntime();
    await this.encode(runtime.codec, toWireEnvelope(response));
  }

  /** respond(data) */
  success(data?: unknown): Promise<void> {
    return this.respond(data);
  }

  /** respond(undefined, err) */
  failure(err: unknown): Promise<void> {
    return this.respond(undefined, err);
  }

  /** Encodes `data` as JSON and sends it with status 200. */
  json(data: unknown): Promise<void> {
    return this.encode(jsonCodec, data);
  }

  /** Sends bytes with a status code and content type. */
  async blob(code: number, contentType: string, data: Uint8Array): Promise<void> {
    this.res.setContentType(contentType);
    this.res.writeHeader(code);
    if (data.length > 0) await this.res.write(data);
  }

  /** Sends text with a status code and content type. */
  async text(code: number, contentType: string, data: string): Promise<void> {
    this.res.setContentType(contentType);
    this.res.writeHeader(code);
    if (data.length > 0) await this.res.write(data);
  }

  /** Sends every chunk of `source` with a status code and content type. */
  async stream(
    code: number,
    contentType: string,
    source: AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>
  ): Promise<void> {
    this.res.setContentType(contentType);
    this.res.writeHeader(code);
    for await (const chunk of source) {
      await this.res.write(chunk);
    }
  }

  writeHeader(code: number): void {
    this.res.writeHeader(code);
  }

  write(chunk: Uint8Array | string): Promise<number> {
    return this.res.write(chunk);
  }

  /** Sets a response header; Content-Type goes through setContentType. */
  setRespHeader(key: string, value: string): void {
    if (key.toLowerCase() === "content-type") {
      this.res.setContentType(value);
    } else {
      this.res.setHeader(key, value);
    }
  }

  /** Sets the response Content-Type; "" does nothing. */
  setContentType(ct: string): void {
    this.res.setContentType(ct);
  }

  /** Asks the server to close the connection after this response. */
  setConnectionClose(): void {
    this.res.setHeader("Connection", "close");
  }

  /** Finishes the transport response. Used by the dispatcher. */
  end(): void {
    this.res.end();
  }

  // ── Buffers ─────────────────────────────────────────────────────

  acquireBuffer(): PooledBuffer {
    return this.getRuntime().buffers.acquire();
  }

  /** Returns `buf` to the pool; it must not be used afterwards. */
  releaseBuffer(buf: PooledBuffer): void {
    this.getRuntime().buffers.release(buf);
  }

  private async encode(codec: Codec, value: unknown): Promise<void> {
    const buf = this.acquireBuffer();
    try {
      codec.encode(value, buf);
      this.res.setContentType(codec.contentType);
      this.res.writeHeader(200);
      if (buf.length > 0) await this.res.write(buf.bytes());
    } finally {
      this.releaseBuffer(buf);
    }
  }

  private getRuntime(): ContextRuntime {
    if (!this.runtime) {
      throw new Error(`${LOG_PREFIX}:getRuntime - Context is not attached to a service`);
    }
    return this.runtime;
  }
}

// ── Helpers ─────────────────────────────────────────────────────────

/** "path: message" for every zod issue, joined by "; ". */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Wraps a bind failure into InvalidParameter unless it is already an ActionError. */
export function toBindError(err: unknown): ActionError {
  if (err instanceof ActionError) return err;
  if (err instanceof ZodError) {
    return ErrInvalidParameter.withMessage(formatZodError(err), { details: err.issues, cause: err });
  }
  return ErrInvalidParameter.withMessage(errorMessage(err), { cause: err });
}
