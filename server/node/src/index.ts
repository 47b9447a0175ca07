/**
 * Action service for node:http: registry, pooled contexts, binders.
 */

export { ActionService } from "./service.js";
export type { ActionServiceOptions, MetadataExtractor } from "./service.js";
export { ActionRegistry } from "./action-registry.js";
export type { ActionHandler, ActionMiddleware } from "./action-registry.js";
export { Context, formatZodError, toBindError } from "./context.js";
export type { ContextRuntime, DefaultSetter, Validator, Renderer } from "./context.js";
export {
  binderFunc,
  bodyBinder,
  jsonBinder,
  queryBinder,
  bindQueryValues,
  parseQuery,
  firstQueryValue,
  contentLength,
  readBody,
} from "./binder.js";
export type { Binder, QueryValues, RequestSource } from "./binder.js";
export { ResponseWriter } from "./response-writer.js";
export type { ResponseSink } from "./response-writer.js";
export { jsonCodec } from "./codec.js";
export type { Codec } from "./codec.js";
export { Pool } from "./pool.js";
export { BufferPool, PooledBuffer } from "./buffer-pool.js";
export {
  ServiceConfigSchema,
  defaultServiceConfig,
  resolveServiceConfig,
  loadServerConfig,
} from "./config.js";
export type { ServiceConfig, ServiceConfigInput, ServerProcessConfig } from "./config.js";
export { createNodeJSLogger, resolveLogger } from "./logger.js";
export type { Logger, LoggerFactory, LogLevel, LogMethod } from "./logger.js";
export { createDemoService, requestLogMiddleware, EchoInputSchema } from "./demo.js";
