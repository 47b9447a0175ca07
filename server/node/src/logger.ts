/**
 * Structured logger for the action service (package + method prefix,
 * structured context + message). Any object with the same optional methods,
 * or a factory exposing get(name), can be passed instead.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Either a Logger or an object with get(name) returning one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function log(level: LogLevel, ctx: Record<string, unknown>, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, time: new Date().toISOString(), ...payload });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger whose lines carry the service name and prefix.
 * Lines below `minLevel` (default "info") are dropped.
 */
export function createNodeJSLogger(
  serviceName: string,
  options?: { minLevel?: LogLevel }
): { get: (prefix: string) => Logger } {
  const minRank = LEVEL_RANK[options?.minLevel ?? "info"];
  const method = (level: LogLevel, prefix: string): LogMethod | undefined =>
    LEVEL_RANK[level] < minRank
      ? undefined
      : (ctx, msg) => log(level, { ...ctx, service: serviceName, prefix }, msg);

  return {
    get(prefix: string) {
      return {
        debug: method("debug", prefix),
        info: method("info", prefix),
        warn: method("warn", prefix),
        error: method("error", prefix),
      };
    },
  };
}

/** Resolve a logger from a factory (Logger, or factory.get(name)). */
export function resolveLogger(factory: LoggerFactory | undefined, name: string): Logger {
  if (!factory) return createNodeJSLogger("actionkit").get(name);
  return "get" in factory ? factory.get(name) : factory;
}
