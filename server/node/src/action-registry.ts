/**
 * Registry of action handlers. Maps an action name to its fully wrapped
 * handler, plus an alias table forwarding one name to another.
 *
 * All operations are synchronous, so on the single request thread no lookup
 * can observe a half-applied update. resolve() hands back the handler
 * reference; the call itself happens outside the registry.
 */

import { buildPipeline, type Handler, type Middleware } from "@actionkit/core";
import type { Context } from "./context.js";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "actionkit-server:action-registry";

export type ActionHandler = Handler<Context>;
export type ActionMiddleware = Middleware<Context>;

export class ActionRegistry {
  private handlers = new Map<string, ActionHandler>();
  private aliases = new Map<string, string>();
  private log?: Logger;

  constructor(params?: { log?: Logger }) {
    this.log = params?.log;
  }

  /**
   * Register a handler under `name`, wrapped once by `middlewares` so that
   * middlewares[0] is outermost. Replaces any handler already registered
   * under that name.
   *
   * @throws if `name` is empty or `handler` is not a function
   */
  register(name: string, handler: ActionHandler, ...middlewares: ActionMiddleware[]): void {
    if (name === "") {
      throw new Error(`${LOG_PREFIX}:register - The action name must not be empty`);
    }
    if (typeof handler !== "function") {
      throw new Error(`${LOG_PREFIX}:register - The action handler must not be empty`);
    }

    const wrapped = buildPipeline({ middleware: middlewares, core: handler });
    this.handlers.set(name, wrapped);
    this.log?.debug?.({ action: name, middlewares: middlewares.length }, `${LOG_PREFIX}:register - Registered`);
  }

  /**
   * Remove the handler registered under `name`. Aliases pointing at it are
   * kept and resolve to nothing until the name is registered again.
   *
   * @throws if `name` is empty
   */
  unregister(name: string): void {
    if (name === "") {
      throw new Error(`${LOG_PREFIX}:unregister - The action name must not be empty`);
    }
    if (this.handlers.delete(name)) {
      this.log?.debug?.({ action: name }, `${LOG_PREFIX}:unregister - Unregistered`);
    }
  }

  /**
   * Make `fromName` an alias of `toName`. `toName` need not be registered
   * yet; it is looked up on every call.
   *
   * @throws if either name is empty
   */
  mapping(fromName: string, toName: string): void {
    if (fromName === "" || toName === "") {
      throw new Error(`${LOG_PREFIX}:mapping - The action name must not be empty`);
    }
    this.aliases.set(fromName, toName);
    this.log?.debug?.({ from: fromName, to: toName }, `${LOG_PREFIX}:mapping - Mapped`);
  }

  /**
   * Handler for `name`: a direct registration first, otherwise the handler
   * of the name it is aliased to. Only one alias hop is followed.
   */
  resolve(name: string): ActionHandler | undefined {
    const direct = this.handlers.get(name);
    if (direct) return direct;
    const target = this.aliases.get(name);
    return target === undefined ? undefined : this.handlers.get(target);
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  /** Names of all directly registered actions (aliases excluded). */
  services(): string[] {
    return Array.from(this.handlers.keys());
  }

  /** Copy of the alias table; changing it does not affect the registry. */
  mappings(): Map<string, string> {
    return new Map(this.aliases);
  }

  /** Number of directly registered actions. */
  get size(): number {
    return this.handlers.size;
  }
}
