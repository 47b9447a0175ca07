/**
 * Action error class and error classification.
 *
 * Every failure that reaches a client is rendered as an ErrorDescriptor
 * inside the response envelope. ActionError carries one directly; any other
 * error may expose `toErrorDescriptor()`; everything else becomes ServerError.
 */

// ── Error Codes ─────────────────────────────────────────────────────

/**
 * Error codes produced by the dispatcher itself.
 * Applications may use any other string as a code.
 */
export type ActionErrorCode =
  | "InvalidAction"
  | "InvalidParameter"
  | "UnsupportedProtocol"
  | "ServerError"
  | (string & {});

/** Wire-independent (code, message) pair. An empty code means "no error". */
export interface ErrorDescriptor {
  code: string;
  message: string;
}

/** The "no error" descriptor. */
export const NO_ERROR: Readonly<ErrorDescriptor> = Object.freeze({ code: "", message: "" });

// ── ActionError ─────────────────────────────────────────────────────

/**
 * Structured error for action invocations.
 */
export class ActionError extends Error {
  public readonly code: ActionErrorCode;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: ActionErrorCode;
    message: string;
    status?: number;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "ActionError";
    this.code = args.code;
    this.status = args.status;
    this.details = args.details;
    this.cause = args.cause;
  }

  /** Returns a new error with the same code and the given message. */
  withMessage(message: string, extra?: { details?: unknown; cause?: unknown }): ActionError {
    return new ActionError({
      code: this.code,
      message,
      status: this.status,
      details: extra?.details,
      cause: extra?.cause,
    });
  }

  toErrorDescriptor(): ErrorDescriptor {
    return { code: this.code, message: this.message };
  }
}

export const ErrInvalidAction = new ActionError({ code: "InvalidAction", message: "invalid action" });
export const ErrInvalidParameter = new ActionError({ code: "InvalidParameter", message: "invalid parameter" });
export const ErrUnsupportedProtocol = new ActionError({ code: "UnsupportedProtocol", message: "unsupported protocol" });
export const ErrServerError = new ActionError({ code: "ServerError", message: "server error" });

// ── Classification ──────────────────────────────────────────────────

/** Capability: an error that knows how to describe itself. */
export interface DescribableError {
  toErrorDescriptor(): ErrorDescriptor;
}

export function isDescribableError(x: unknown): x is DescribableError {
  return (
    typeof x === "object" &&
    x !== null &&
    "toErrorDescriptor" in x &&
    typeof x.toErrorDescriptor === "function"
  );
}

/** Best-effort message text of an arbitrary thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/**
 * Classifies a thrown value into the descriptor rendered to the client.
 *
 * - undefined / null → NO_ERROR
 * - ActionError → its code and message
 * - DescribableError → its own descriptor
 * - anything else → ServerError carrying the original message
 */
export function toErrorDescriptor(err: unknown): ErrorDescriptor {
  if (err === undefined || err === null) return { ...NO_ERROR };
  if (err instanceof ActionError) return { code: err.code, message: err.message };
  if (isDescribableError(err)) return err.toErrorDescriptor();
  return { code: ErrServerError.code, message: errorMessage(err) };
}
