import { describe, it, expect } from "vitest";
import { mergeFlags } from "../../src/services/flag-merger.js";

describe("mergeFlags", () => {
  it("returns the union in canonical order", () => {
    expect(mergeFlags(["vague", "email"], ["phone"])).toEqual(["email", "phone", "vague"]);
  });

  it("keeps local findings the model omitted", () => {
    expect(mergeFlags([], ["card-ish", "email"])).toEqual(["email", "card-ish"]);
  });

  it("does not duplicate flags present on both sides", () => {
    expect(mergeFlags(["email", "unsafe"], ["email"])).toEqual(["email", "unsafe"]);
  });
});
