/**
 * Response type handed to renderers.
 *
 * All three fields are always present here; omission of empty fields only
 * happens on the wire (see wire.ts).
 */

import type { ErrorDescriptor } from "./errors.js";

/** Uniform response of every action invocation. */
export interface Response<T = unknown> {
  /** Request id taken from the inbound request, "" when absent */
  requestId: string;
  /** Error descriptor; code "" means the call succeeded */
  error: ErrorDescriptor;
  /** Payload; undefined when the action returned nothing */
  data: T | undefined;
}
