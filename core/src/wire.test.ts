/**
 * Unit tests for the response envelope wire shape.
 */

import { describe, it, expect } from "vitest";
import type { Response } from "./envelope.js";
import { decodeEnvelope, fromWireEnvelope, toWireEnvelope } from "./wire.js";

function createResponse(overrides?: Partial<Response>): Response {
  return {
    requestId: "",
    error: { code: "", message: "" },
    data: undefined,
    ...overrides,
  };
}

describe("toWireEnvelope", () => {
  it("should omit every empty field", () => {
    expect(JSON.stringify(toWireEnvelope(createResponse()))).toBe("{}");
  });

  it("should omit null data", () => {
    expect(toWireEnvelope(createResponse({ data: null }))).toEqual({});
  });

  it("should keep falsy data that is not null", () => {
    expect(JSON.stringify(toWireEnvelope(createResponse({ data: 0 })))).toBe('{"Data":0}');
    expect(JSON.stringify(toWireEnvelope(createResponse({ data: "" })))).toBe('{"Data":""}');
  });

  it("should write fields in RequestId, Error, Data order", () => {
    const wire = toWireEnvelope(
      createResponse({
        requestId: "req-1",
        error: { code: "InvalidAction", message: "no action" },
        data: { a: 1 },
      })
    );
    expect(JSON.stringify(wire)).toBe(
      '{"RequestId":"req-1","Error":{"Code":"InvalidAction","Message":"no action"},"Data":{"a":1}}'
    );
  });
});

describe("decodeEnvelope", () => {
  it("should not produce an Error field for a successful response", () => {
    const text = JSON.stringify(toWireEnvelope(createResponse({ data: "test" })));
    const decoded = decodeEnvelope(text);
    expect("Error" in decoded).toBe(false);
    expect("RequestId" in decoded).toBe(false);
    expect(decoded.Data).toBe("test");
  });

  it("should preserve a non-empty error descriptor", () => {
    const original = createResponse({
      requestId: "req-9",
      error: { code: "ServerError", message: "boom" },
    });
    const decoded = decodeEnvelope(JSON.stringify(toWireEnvelope(original)));
    expect(decoded.Error).toEqual({ Code: "ServerError", Message: "boom" });
    expect(fromWireEnvelope(decoded)).toEqual(original);
  });

  it("should reject JSON that is not an envelope", () => {
    expect(() => decodeEnvelope('{"Error":{"Message":"no code"}}')).toThrow();
    expect(() => decodeEnvelope("not json")).toThrow(SyntaxError);
  });
});
