// Errors
export * from "./errors.js";

// Response & wire envelope
export * from "./envelope.js";
export * from "./wire.js";
export { ResponseEnvelopeSchema, ErrorDescriptorWireSchema } from "./envelope-schema.js";

// Pipeline
export { type Handler, type Middleware, buildPipeline } from "./pipeline.js";

// Content types
export * from "./mime.js";
