/**
 * Action service configuration.
 *
 * ServiceConfig holds the tunables of the dispatcher (metadata header names,
 * pool sizes, body limit). The demo server process additionally reads its
 * listen address from the environment via loadServerConfig().
 */

import { z } from "zod";
import { errorMessage } from "@actionkit/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "actionkit-server:config";

// ── Service config ──────────────────────────────────────────────────

export const ServiceConfigSchema = z.object({
  /** Header carrying the action name */
  actionHeader: z.string().min(1).default("X-Action"),
  /** Query parameter carrying the action name when the header is absent */
  actionQuery: z.string().min(1).default("Action"),
  /** Header carrying the api version */
  versionHeader: z.string().min(1).default("X-Version"),
  /** Header carrying the request id */
  requestIdHeader: z.string().min(1).default("X-Request-Id"),
  /** Initial capacity of pooled response buffers, in bytes */
  bufferSize: z.number().int().positive().default(2048),
  /** Free-list bound of the response buffer pool */
  maxPooledBuffers: z.number().int().nonnegative().default(256),
  /** Free-list bound of the context pool */
  maxPooledContexts: z.number().int().nonnegative().default(256),
  /** Largest request body the default body binder will read */
  maxBodyBytes: z.number().int().positive().default(1_048_576),
});

export type ServiceConfig = z.output<typeof ServiceConfigSchema>;
export type ServiceConfigInput = z.input<typeof ServiceConfigSchema>;

export const defaultServiceConfig: ServiceConfig = ServiceConfigSchema.parse({});

/**
 * Applies defaults and validates. Throws on invalid values: a bad config is
 * a wiring bug, not a request-time condition.
 */
export function resolveServiceConfig(input?: ServiceConfigInput): ServiceConfig {
  const parsed = ServiceConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`${LOG_PREFIX}:resolveServiceConfig - Invalid service config: ${issues}`);
  }
  return parsed.data;
}

// ── Server process config ───────────────────────────────────────────

/**
 * Top-level demo server process configuration.
 */
export interface ServerProcessConfig {
  /** Interface to bind */
  host: string;
  /** TCP port to listen on */
  port: number;
  /** Service name used in log lines */
  serviceName: string;
  /** Service tunables */
  service: ServiceConfig;
}

const EnvSchema = z.object({
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  SERVICE_NAME: z.string().default("actionkit-server"),
  MAX_BODY_BYTES: z.coerce.number().int().positive().optional(),
});

/**
 * Load config from environment.
 * Env: HOST, PORT, SERVICE_NAME, MAX_BODY_BYTES.
 * Invalid values are logged and replaced by their defaults.
 */
export function loadServerConfig(params: {
  env?: Record<string, string | undefined>;
  log?: Logger;
}): ServerProcessConfig {
  const env = params.env ?? process.env;
  const log = params.log;

  let parsed: z.output<typeof EnvSchema>;
  try {
    parsed = EnvSchema.parse(env);
  } catch (err) {
    log?.warn?.(
      { error: errorMessage(err) },
      `${LOG_PREFIX}:loadServerConfig - Invalid environment, using defaults`
    );
    parsed = EnvSchema.parse({});
  }

  const config: ServerProcessConfig = {
    host: parsed.HOST,
    port: parsed.PORT,
    serviceName: parsed.SERVICE_NAME,
    service: resolveServiceConfig(
      parsed.MAX_BODY_BYTES !== undefined ? { maxBodyBytes: parsed.MAX_BODY_BYTES } : {}
    ),
  };
  log?.info?.(
    { host: config.host, port: config.port, maxBodyBytes: config.service.maxBodyBytes },
    `${LOG_PREFIX}:loadServerConfig - Loaded config`
  );
  return config;
}
