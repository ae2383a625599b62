import { describe, it, expect } from "vitest";
import { detectPII, passesLuhn, scanForPII } from "../../src/utils/pii-scanner.js";

describe("PII scanner", () => {
  describe("scanForPII", () => {
    it("flags an email address", () => {
      expect(scanForPII("contact me at jane.doe@example.com please")).toEqual(["email"]);
    });

    it("flags a North American phone number", () => {
      expect(scanForPII("call (555) 123-4567 tomorrow")).toEqual(["phone"]);
    });

    it("flags a UK mobile number", () => {
      expect(scanForPII("text 07700 900123 when ready")).toEqual(["phone"]);
    });

    it("flags an international number", () => {
      expect(scanForPII("reach me on +49 30 1234 5678")).toEqual(["phone"]);
    });

    it("flags a Luhn-valid card number", () => {
      expect(scanForPII("my card is 4111 1111 1111 1111")).toEqual(["card-ish"]);
    });

    it("does not report a hyphenated card number as a phone", () => {
      expect(scanForPII("charge 4111-1111-1111-1111 today")).toEqual(["card-ish"]);
    });

    it("flags a card number followed by an expiry date", () => {
      expect(scanForPII("My card 4111111111111111 12 27 expires soon")).toEqual(["card-ish"]);
    });

    it("flags a grouped card number followed by a CVV", () => {
      expect(scanForPII("Card 4111 1111 1111 1111 123 was declined")).toEqual(["card-ish"]);
    });

    it("ignores digit runs that fail the Luhn check", () => {
      expect(scanForPII("order 1234567812345678 shipped")).toEqual([]);
    });

    it("flags a local number without an area code", () => {
      expect(scanForPII("call me at 555-1234")).toEqual(["phone"]);
    });

    it("flags national numbers with a trunk prefix", () => {
      expect(scanForPII("ring 020 7946 0958 tomorrow")).toEqual(["phone"]);
      expect(scanForPII("my number is 0412 345 678")).toEqual(["phone"]);
    });

    it("ignores short numbers", () => {
      expect(scanForPII("I have 3 cats and 12 dogs")).toEqual([]);
    });

    it("returns each flag once, in canonical order", () => {
      expect(scanForPII("ring +44 7700 900123 or mail a@b.io or c@d.io")).toEqual(["email", "phone"]);
    });

    it("returns no flags for clean text", () => {
      expect(scanForPII("How do I center a div?")).toEqual([]);
      expect(scanForPII("")).toEqual([]);
    });

    it("is idempotent", () => {
      const text = "a@b.io and (555) 123-4567";
      expect(scanForPII(text)).toEqual(scanForPII(text));
    });
  });

  describe("detectPII", () => {
    it("reports spans ordered by position", () => {
      expect(detectPII("Email a@b.io or ring +44 7700 900123")).toEqual([
        { type: "email", start: 6, end: 12 },
        { type: "phone", start: 21, end: 36 },
      ]);
    });

    it("reports only the card digits when a CVV follows", () => {
      expect(detectPII("Card 4111 1111 1111 1111 123 was declined")).toEqual([
        { type: "card-ish", start: 5, end: 24 },
      ]);
    });

    it("reports a local number span", () => {
      expect(detectPII("call me at 555-1234")).toEqual([{ type: "phone", start: 11, end: 19 }]);
    });
  });

  describe("passesLuhn", () => {
    it("accepts valid checksums", () => {
      expect(passesLuhn("79927398713")).toBe(true);
      expect(passesLuhn("4111 1111 1111 1111")).toBe(true);
    });

    it("rejects invalid checksums and empty input", () => {
      expect(passesLuhn("79927398710")).toBe(false);
      expect(passesLuhn("")).toBe(false);
    });
  });
});
