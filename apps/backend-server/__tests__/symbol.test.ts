import { describe, expect, it } from "vitest";
import { normalizeSymbol, validateSymbol } from "../lib/symbol.js";

describe("normalizeSymbol", () => {
  it("trims and uppercases", () => {
    expect(normalizeSymbol(" aapl ")).toBe("AAPL");
  });

  it("is idempotent", () => {
    for (const raw of [" aapl ", "Msft", "brk.b", "  ", "googl\t"]) {
      expect(normalizeSymbol(normalizeSymbol(raw))).toBe(normalizeSymbol(raw));
    }
  });
});

describe("validateSymbol", () => {
  it("accepts alphanumeric symbols", () => {
    expect(validateSymbol(" aapl ")).toEqual({ success: true, data: "AAPL" });
    expect(validateSymbol("0700")).toEqual({ success: true, data: "0700" });
  });

  it("rejects symbols with punctuation", () => {
    expect(validateSymbol("BRK.B")).toEqual({
      success: false,
      error: {
        kind: "InvalidSymbol",
        message: 'Invalid symbol "BRK.B": only letters and digits are allowed',
      },
    });
  });

  it("rejects blank input", () => {
    expect(validateSymbol("   ")).toEqual({
      success: false,
      error: { kind: "InvalidSymbol", message: "Symbol is required" },
    });
  });
});
