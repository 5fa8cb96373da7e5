import type { AppConfig } from "backend-common/config";
import { createMarketCacheStore, getRedis, redisCommands } from "cached-db/client";
import { createAlphaVantageClient } from "./alphaVantage.js";
import { createPortfolioAggregator, type PortfolioAggregator } from "./portfolioAggregate.js";
import { createQuoteRetriever, type QuoteRetriever } from "./quoteRetrieval.js";
import { createFileResponseLog } from "./responseLog.js";

export type PortfolioServices = {
  retriever: QuoteRetriever;
  aggregator: PortfolioAggregator;
};

/** Wires the Redis cache, the Alpha Vantage client and the aggregator from config. */
export function createPortfolioServices(config: AppConfig): PortfolioServices {
  const cache = createMarketCacheStore(redisCommands(getRedis(config.redisUrl)));
  const upstream = createAlphaVantageClient({
    ...config.alphaVantage,
    responseLog: createFileResponseLog(config.responseLogDir),
  });
  const retriever = createQuoteRetriever({ cache, upstream });
  const aggregator = createPortfolioAggregator({
    retriever,
    concurrency: config.retrievalConcurrency,
  });
  return { retriever, aggregator };
}
