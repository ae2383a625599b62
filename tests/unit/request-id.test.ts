import { describe, it, expect } from "vitest";
import { generateRequestId, isRequestIdSafe, resolveRequestId } from "../../src/utils/request-id.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("request ids", () => {
  it("generates UUID v4 values", () => {
    expect(generateRequestId()).toMatch(UUID_PATTERN);
  });

  it("accepts safe caller-supplied ids", () => {
    expect(resolveRequestId({ "x-request-id": " trace-123.abc_9 " })).toBe("trace-123.abc_9");
  });

  it("uses the first value of a repeated header", () => {
    expect(resolveRequestId({ "x-request-id": ["first-id", "second-id"] })).toBe("first-id");
  });

  it("replaces unsafe or missing ids", () => {
    expect(resolveRequestId({ "x-request-id": "bad id\nwith newline" })).toMatch(UUID_PATTERN);
    expect(resolveRequestId({ "x-request-id": "x".repeat(65) })).toMatch(UUID_PATTERN);
    expect(resolveRequestId({})).toMatch(UUID_PATTERN);
  });

  it("validates the id shape", () => {
    expect(isRequestIdSafe("abc-DEF_1.2")).toBe(true);
    expect(isRequestIdSafe("")).toBe(false);
    expect(isRequestIdSafe("semi;colon")).toBe(false);
  });
});
