/**
 * Zod runtime schema for the response envelope.
 *
 * Mirrors the wire types in wire.ts; used by clients and tests to decode
 * rendered responses.
 */

import { z } from "zod";

export const ErrorDescriptorWireSchema = z.object({
  Code: z.string(),
  Message: z.string().default(""),
});

export const ResponseEnvelopeSchema = z.object({
  RequestId: z.string().optional(),
  Error: ErrorDescriptorWireSchema.optional(),
  Data: z.unknown().optional(),
});
