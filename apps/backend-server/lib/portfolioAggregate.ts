/**
 * Fans quote retrieval out over the requested holdings and folds the results
 * into table rows plus portfolio-level metrics.
 *
 * One symbol's failure only ever produces that symbol's error row. The only
 * top-level failure is structural input (PortfolioInputError).
 */

import type { Holding } from "common/types";
import type {
  FetchResult,
  MetricsTableRow,
  PortfolioMetrics,
  PortfolioRow,
  PortfolioSuccessRow,
} from "common/portfolio";
import { mapWithConcurrency } from "./concurrency.js";
import {
  errorRow,
  toRow,
  unexpectedError,
  type QuoteRecord,
  type QuoteRetriever,
} from "./quoteRetrieval.js";
import { normalizeSymbol } from "./symbol.js";

export class PortfolioInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PortfolioInputError";
  }
}

export type AggregateResult = {
  rows: PortfolioRow[];
  metrics: PortfolioMetrics;
};

export interface PortfolioAggregator {
  aggregate(requests: readonly Holding[]): Promise<AggregateResult>;
}

/** Builds holdings from the form's parallel symbol / share-count lists. */
export function pairHoldings(
  symbols: readonly string[],
  shares: readonly (number | null)[]
): Holding[] {
  if (symbols.length !== shares.length) {
    throw new PortfolioInputError(
      `Got ${symbols.length} symbols but ${shares.length} share counts`
    );
  }
  return symbols.map((symbol, i) => ({ symbol, shares: shares[i] ?? null }));
}

/** Only pairs with a symbol and a positive share count are processed. */
export function isProcessable(holding: Holding): holding is Holding & { shares: number } {
  return (
    holding.symbol.trim() !== "" &&
    holding.shares != null &&
    Number.isFinite(holding.shares) &&
    holding.shares > 0
  );
}

export function createPortfolioAggregator(deps: {
  retriever: Pick<QuoteRetriever, "loadQuote">;
  concurrency: number;
}): PortfolioAggregator {
  const { retriever, concurrency } = deps;

  return {
    async aggregate(requests) {
      const holdings = requests.filter(isProcessable);

      // One load per symbol per pass, however often it appears.
      const quotes = new Map<string, Promise<FetchResult<QuoteRecord>>>();
      const loadOnce = (rawSymbol: string) => {
        const key = normalizeSymbol(rawSymbol);
        let pending = quotes.get(key);
        if (!pending) {
          pending = retriever.loadQuote(rawSymbol);
          quotes.set(key, pending);
        }
        return pending;
      };

      const rows = await mapWithConcurrency(
        holdings,
        concurrency,
        async ({ symbol, shares }): Promise<PortfolioRow> => {
          try {
            const quote = await loadOnce(symbol);
            return quote.success ? toRow(quote.data, shares) : errorRow(symbol, quote.error);
          } catch (err) {
            console.error("[backend] retrieval failed for", symbol, err);
            return errorRow(symbol, unexpectedError(err));
          }
        }
      );

      const failed = rows.filter((r) => r.status === "error").length;
      console.log(
        `[backend] portfolio aggregated: ${rows.length} rows, ${failed} failed, ${requests.length - holdings.length} skipped`
      );
      return { rows, metrics: computeMetrics(rows) };
    },
  };
}

function pickBy(
  rows: PortfolioSuccessRow[],
  value: (row: PortfolioSuccessRow) => number,
  direction: "max" | "min"
): string | null {
  let best: PortfolioSuccessRow | null = null;
  for (const row of rows) {
    // Strict comparison: ties keep the earliest row.
    if (
      best == null ||
      (direction === "max" ? value(row) > value(best) : value(row) < value(best))
    ) {
      best = row;
    }
  }
  return best?.symbol ?? null;
}

/** Metrics over successful rows only. Error rows are left untouched. */
export function computeMetrics(rows: readonly PortfolioRow[]): PortfolioMetrics {
  const ok = rows.filter((r): r is PortfolioSuccessRow => r.status === "ok");

  const totalValue = ok.reduce((sum, r) => sum + r.totalValue, 0);

  const sectorTotals: Record<string, number> = {};
  for (const row of ok) {
    sectorTotals[row.sector] = (sectorTotals[row.sector] ?? 0) + row.totalValue;
  }
  let dominantSector: string | null = null;
  for (const [sector, value] of Object.entries(sectorTotals)) {
    if (dominantSector == null || value > (sectorTotals[dominantSector] ?? 0)) {
      dominantSector = sector;
    }
  }

  return {
    totalValue,
    assetCount: ok.length,
    averageValue: ok.length > 0 ? totalValue / ok.length : 0,
    highestValueAsset: pickBy(ok, (r) => r.totalValue, "max"),
    lowestValueAsset: pickBy(ok, (r) => r.totalValue, "min"),
    mostSharesAsset: pickBy(ok, (r) => r.shares, "max"),
    fewestSharesAsset: pickBy(ok, (r) => r.shares, "min"),
    highestPriceAsset: pickBy(ok, (r) => r.latestClose, "max"),
    lowestPriceAsset: pickBy(ok, (r) => r.latestClose, "min"),
    sectorCount: Object.keys(sectorTotals).length,
    dominantSector,
    sectorTotals,
  };
}

const money = (n: number) => n.toFixed(2);
const orNA = (s: string | null) => s ?? "N/A";

/** Labelled rows for the metrics table. Amounts are rounded to cents here and only here. */
export function metricsTable(metrics: PortfolioMetrics): MetricsTableRow[] {
  return [
    { metric: "Total Portfolio Value", value: money(metrics.totalValue) },
    { metric: "Number of Assets", value: String(metrics.assetCount) },
    { metric: "Average Asset Value", value: money(metrics.averageValue) },
    { metric: "Highest Value Asset", value: orNA(metrics.highestValueAsset) },
    { metric: "Lowest Value Asset", value: orNA(metrics.lowestValueAsset) },
    { metric: "Most Shares Held", value: orNA(metrics.mostSharesAsset) },
    { metric: "Fewest Shares Held", value: orNA(metrics.fewestSharesAsset) },
    { metric: "Highest Priced Asset", value: orNA(metrics.highestPriceAsset) },
    { metric: "Lowest Priced Asset", value: orNA(metrics.lowestPriceAsset) },
    { metric: "Number of Sectors", value: String(metrics.sectorCount) },
    { metric: "Dominant Sector", value: orNA(metrics.dominantSector) },
  ];
}

/** Display order: highest total value first, error rows last. Returns a new array. */
export function sortRowsByValue(rows: readonly PortfolioRow[]): PortfolioRow[] {
  return [...rows].sort((a, b) => {
    if (a.status === "ok" && b.status === "ok") return b.totalValue - a.totalValue;
    if (a.status === "ok") return -1;
    if (b.status === "ok") return 1;
    return 0;
  });
}
