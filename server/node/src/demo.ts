/**
 * Demo actions served by main.ts.
 */

import { z } from "zod";
import { errorMessage } from "@actionkit/core";
import type { ActionMiddleware } from "./action-registry.js";
import type { LoggerFactory } from "./logger.js";
import { resolveLogger } from "./logger.js";
import { ActionService, type ActionServiceOptions } from "./service.js";

const LOG_PREFIX = "actionkit-server:demo";

export const EchoInputSchema = z.object({
  Name: z.string().min(1),
});

/** Logs every invocation with its outcome and duration. */
export function requestLogMiddleware(params: {
  loggerFactory?: LoggerFactory;
  clock?: { now(): number };
}): ActionMiddleware {
  const log = resolveLogger(params.loggerFactory, `${LOG_PREFIX}:requestLog`);
  const clock = params.clock ?? { now: () => Date.now() };
  return (next) => async (c) => {
    const startedAt = clock.now();
    try {
      await next(c);
      log.info?.(
        { action: c.action, requestId: c.requestId, status: c.statusCode(), durationMs: clock.now() - startedAt },
        `${LOG_PREFIX}:requestLog - Handled`
      );
    } catch (err) {
      log.warn?.(
        { action: c.action, requestId: c.requestId, error: errorMessage(err), durationMs: clock.now() - startedAt },
        `${LOG_PREFIX}:requestLog - Failed`
      );
      throw err;
    }
  };
}

/**
 * Service with the demo actions:
 * - ping: responds "pong"
 * - echo: responds the bound Name
 * - hello: alias of echo
 */
export function createDemoService(options: ActionServiceOptions = {}): ActionService {
  const svc = new ActionService(options);
  svc.use(requestLogMiddleware({ loggerFactory: options.loggerFactory }));

  svc.mapping("hello", "echo");
  svc.register("ping", (c) => c.success("pong"));
  svc.register("echo", async (c) => {
    const input = await c.bind(EchoInputSchema);
    return c.success(input.Name);
  });
  return svc;
}
