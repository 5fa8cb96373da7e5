import { Router } from "express";
import { PortfolioRequestSchema } from "common/types";
import type { PortfolioResponse } from "common/portfolio";
import {
  PortfolioInputError,
  metricsTable,
  pairHoldings,
  sortRowsByValue,
} from "../../lib/portfolioAggregate.js";
import type { PortfolioServices } from "../../lib/services.js";
import { normalizeSymbol } from "../../lib/symbol.js";

export function createPortfolioRouter({ aggregator, retriever }: PortfolioServices): Router {
  const portfolioRouter = Router();

  /**
   * Body: { holdings: [{ symbol, shares }] } or { symbols: [...], shares: [...] }.
   * ?sort=value orders rows by total value (error rows last); otherwise input order.
   */
  portfolioRouter.post("/", async (req, res) => {
    const parsed = PortfolioRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        message: "Incorrect inputs",
        issues: parsed.error.issues,
      });
      return;
    }

    try {
      const holdings =
        "holdings" in parsed.data
          ? parsed.data.holdings
          : pairHoldings(parsed.data.symbols, parsed.data.shares);

      const { rows, metrics } = await aggregator.aggregate(holdings);
      const payload: PortfolioResponse = {
        rows: req.query.sort === "value" ? sortRowsByValue(rows) : rows,
        metrics,
        metricsTable: metricsTable(metrics),
        generatedAt: new Date().toISOString(),
      };
      res.json(payload);
    } catch (error) {
      if (error instanceof PortfolioInputError) {
        res.status(400).json({ message: error.message });
        return;
      }
      console.error("[backend] Error aggregating portfolio:", error);
      res.status(500).json({ message: "Internal server error" });
    }
  });

  /** Cached daily bars for the performance chart. Never calls Alpha Vantage. */
  portfolioRouter.get("/history/:symbol", async (req, res) => {
    try {
      const history = await retriever.getHistory(req.params.symbol);
      if (!history.success) {
        res.status(400).json({ message: history.error.message });
        return;
      }
      if (history.data == null) {
        res.status(404).json({
          message: "No cached history for this symbol. Fetch the portfolio first.",
        });
        return;
      }
      res.json({ symbol: normalizeSymbol(req.params.symbol), bars: history.data });
    } catch (error) {
      console.error("[backend] Error reading history:", error);
      res.status(500).json({ message: "Internal server error" });
    }
  });

  return portfolioRouter;
}
