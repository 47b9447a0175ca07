/**
 * Response envelope wire shape.
 *
 *   { "RequestId"?: string, "Error"?: { "Code", "Message" }, "Data"?: any }
 *
 * RequestId is omitted when empty, Error when its code is empty and Data when
 * it is undefined or null.
 */

import type { Response } from "./envelope.js";
import { NO_ERROR } from "./errors.js";
import { ResponseEnvelopeSchema } from "./envelope-schema.js";

export type ErrorDescriptorWire = {
  Code: string;
  Message: string;
};

export type ResponseEnvelopeWire = {
  RequestId?: string;
  Error?: ErrorDescriptorWire;
  Data?: unknown;
};

export function toWireEnvelope(r: Response): ResponseEnvelopeWire {
  const wire: ResponseEnvelopeWire = {};
  if (r.requestId !== "") wire.RequestId = r.requestId;
  if (r.error.code !== "") wire.Error = { Code: r.error.code, Message: r.error.message };
  if (r.data !== undefined && r.data !== null) wire.Data = r.data;
  return wire;
}

export function fromWireEnvelope(wire: ResponseEnvelopeWire): Response {
  return {
    requestId: wire.RequestId ?? "",
    error: wire.Error ? { code: wire.Error.Code, message: wire.Error.Message } : { ...NO_ERROR },
    data: wire.Data ?? undefined,
  };
}

/**
 * Parses and validates an encoded envelope.
 * Throws a ZodError when the text is JSON but not an envelope.
 */
export function decodeEnvelope(text: string): ResponseEnvelopeWire {
  const raw: unknown = JSON.parse(text);
  return ResponseEnvelopeSchema.parse(raw);
}
