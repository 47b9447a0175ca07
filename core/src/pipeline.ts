/**
 * Handler and middleware composition (shared core).
 *
 * The canonical Middleware pattern wraps a `next` handler using reduceRight,
 * enabling pre/post logic, error handling, and short-circuiting.
 */

/**
 * Handler bound to an action. Failure is signalled by rejecting.
 * `C` is the per-request context type of the runtime.
 */
export type Handler<C> = (c: C) => Promise<void>;

/**
 * Middleware wraps a `next` handler, enabling:
 * - Pre-processing of the context before next() is called
 * - Post-processing after next() returns
 * - Error handling (try/catch around next())
 * - Short-circuiting (return without calling next())
 */
export type Middleware<C> = (next: Handler<C>) => Handler<C>;

/**
 * Composes an array of middleware around a core handler.
 *
 * Execution order follows array order:
 *   [mw0, mw1, mw2] + core  →  mw0( mw1( mw2( core ) ) )
 *
 * So mw0 runs first (outermost), core runs last (innermost).
 */
export function buildPipeline<C>(params: {
  middleware: readonly Middleware<C>[];
  core: Handler<C>;
}): Handler<C> {
  return params.middleware.reduceRight<Handler<C>>((next, mw) => mw(next), params.core);
}
