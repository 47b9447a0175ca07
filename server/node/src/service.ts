/**
 * Action service: dispatches HTTP requests to named actions.
 *
 * Per request: acquire a pooled context, read action / version / request id,
 * run the global middleware chain around the action lookup, make sure exactly
 * one response is sent, then release the context.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { ErrInvalidAction, ErrServerError, buildPipeline, errorMessage } from "@actionkit/core";
import { ActionRegistry, type ActionHandler, type ActionMiddleware } from "./action-registry.js";
import { bodyBinder, type RequestSource } from "./binder.js";
import { BufferPool } from "./buffer-pool.js";
import { jsonCodec, type Codec } from "./codec.js";
import { resolveServiceConfig, type ServiceConfig, type ServiceConfigInput } from "./config.js";
import { Context, type ContextRuntime } from "./context.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { Pool } from "./pool.js";
import type { ResponseSink } from "./response-writer.js";

const SERVICE_NAME = "actionkit-server:service";

/** Extracts one piece of request metadata; "" when absent. */
export type MetadataExtractor = (req: RequestSource) => string;

export interface ActionServiceOptions {
  /** Service tunables; see ServiceConfigSchema for defaults */
  config?: ServiceConfigInput;
  /** Codec for response envelopes and request bodies. Default: JSON */
  codec?: Codec;
  /** Builds pooled contexts; hooks set here are restored on every reset */
  newContext?: () => Context;
  /** Default: header X-Action, else query parameter Action */
  getAction?: MetadataExtractor;
  /** Default: header X-Version */
  getVersion?: MetadataExtractor;
  /** Default: header X-Request-Id */
  getRequestId?: MetadataExtractor;
  loggerFactory?: LoggerFactory;
}

export class ActionService {
  readonly config: ServiceConfig;

  getAction?: MetadataExtractor;
  getVersion?: MetadataExtractor;
  getRequestId?: MetadataExtractor;

  private readonly registry: ActionRegistry;
  private readonly contexts: Pool<Context>;
  private readonly buffers: BufferPool;
  private readonly log: Logger;
  private middleware: readonly ActionMiddleware[] = [];
  private handler: ActionHandler;

  constructor(options: ActionServiceOptions = {}) {
    this.config = resolveServiceConfig(options.config);
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    this.getAction = options.getAction;
    this.getVersion = options.getVersion;
    this.getRequestId = options.getRequestId;

    this.registry = new ActionRegistry({ log: resolveLogger(options.loggerFactory, "actionkit-server:action-registry") });
    this.buffers = new BufferPool({
      bufferSize: this.config.bufferSize,
      maxSize: this.config.maxPooledBuffers,
    });

    const codec = options.codec ?? jsonCodec;
    const runtime: ContextRuntime = {
      buffers: this.buffers,
      codec,
      bodyBinder: bodyBinder({ codec, maxBodyBytes: this.config.maxBodyBytes }),
    };
    const newContext = options.newContext ?? (() => new Context());
    this.contexts = new Pool<Context>({
      create: () => {
        const c = newContext();
        c.attach(runtime);
        return c;
      },
      reset: (c) => c.reset(),
      maxSize: this.config.maxPooledContexts,
    });

    this.handler = this.dispatch;
  }

  // ── Middleware ────────────────────────────────────────────────────

  /**
   * Append global middlewares, which wrap every action. The chain is rebuilt
   * over the whole list; middlewares[0] of the first call is outermost.
   */
  use(...middlewares: ActionMiddleware[]): void {
    this.middleware = [...this.middleware, ...middlewares];
    this.handler = buildPipeline({ middleware: this.middleware, core: this.dispatch });
  }

  // ── Registry ──────────────────────────────────────────────────────

  /** @see ActionRegistry.register */
  register(name: string, handler: ActionHandler, ...middlewares: ActionMiddleware[]): void {
    this.registry.register(name, handler, ...middlewares);
  }

  /** @see ActionRegistry.unregister */
  unregister(name: string): void {
    this.registry.unregister(name);
  }

  /** @see ActionRegistry.mapping */
  mapping(fromName: string, toName: string): void {
    this.registry.mapping(fromName, toName);
  }

  resolve(name: string): ActionHandler | undefined {
    return this.registry.resolve(name);
  }

  services(): string[] {
    return this.registry.services();
  }

  mappings(): Map<string, string> {
    return this.registry.mappings();
  }

  /** Idle contexts waiting in the pool. */
  get idleContexts(): number {
    return this.contexts.size;
  }

  // ── Request handling ──────────────────────────────────────────────

  /**
   * Handle one request. Resolves once the response has been ended; rejects
   * only when the transport fails while the response is written.
   */
  async handle(req: RequestSource, res: ResponseSink): Promise<void> {
    const c = this.contexts.acquire();
    c.setReqResp(req, res);
    try {
      const handler = this.handler;
      let failure: unknown = undefined;
      try {
        this.populateMetadata(c, req);
        await handler(c);
      } catch (err) {
        // A rejection without a value still counts as a failure.
        failure = err ?? ErrServerError;
      }

      if (!c.isResponded()) {
        await this.respondFallback(c, failure);
      } else if (failure !== undefined) {
        this.log.warn?.(
          { action: c.action, requestId: c.requestId, error: errorMessage(failure) },
          `${SERVICE_NAME}:handle - Handler failed after responding`
        );
      }
    } finally {
      try {
        c.end();
      } finally {
        this.contexts.release(c);
      }
    }
  }

  /** Adapts handle() to a node:http request listener. */
  listener(): (req: IncomingMessage, res: ServerResponse) => void {
    return (req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.log.error?.(
          { method: req.method, url: req.url, error: errorMessage(err) },
          `${SERVICE_NAME}:listener - Failed to write response`
        );
      });
    };
  }

  private populateMetadata(c: Context, req: RequestSource): void {
    c.action = this.getAction
      ? this.getAction(req)
      : c.getReqHeader(this.config.actionHeader) || c.getQuery(this.config.actionQuery);
    c.version = this.getVersion ? this.getVersion(req) : c.getReqHeader(this.config.versionHeader);
    c.requestId = this.getRequestId
      ? this.getRequestId(req)
      : c.getReqHeader(this.config.requestIdHeader);
  }

  private async respondFallback(c: Context, failure: unknown): Promise<void> {
    try {
      await c.respond(undefined, failure);
    } catch (err) {
      if (c.isResponded()) throw err;
      // Renderer failed before sending anything.
      this.log.error?.(
        { action: c.action, requestId: c.requestId, error: errorMessage(err) },
        `${SERVICE_NAME}:handle - Failed to render response`
      );
      c.writeHeader(500);
    }
  }

  private readonly dispatch: ActionHandler = async (c) => {
    if (c.action === "") {
      throw ErrInvalidAction.withMessage("no action");
    }
    const handler = this.registry.resolve(c.action);
    if (!handler) {
      this.log.debug?.({ action: c.action }, `${SERVICE_NAME}:dispatch - Unknown action`);
      throw ErrInvalidAction.withMessage(`invalid action '${c.action}'`);
    }
    await handler(c);
  };
}
