import type { FetchResult } from "common/portfolio";

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

/** Trim and uppercase. Idempotent. */
export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/** Normalizes, then rejects anything that is not plain alphanumeric (e.g. BRK.B). */
export function validateSymbol(raw: string): FetchResult<string> {
  const symbol = normalizeSymbol(raw);
  if (!SYMBOL_PATTERN.test(symbol)) {
    return {
      success: false,
      error: {
        kind: "InvalidSymbol",
        message: symbol
          ? `Invalid symbol "${symbol}": only letters and digits are allowed`
          : "Symbol is required",
      },
    };
  }
  return { success: true, data: symbol };
}
