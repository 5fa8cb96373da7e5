/**
 * Row and metric shapes returned by the portfolio API.
 * Consumed by the table, the charts and anything else rendering a portfolio.
 */

export const UNKNOWN = "Unknown";
export const NOT_AVAILABLE = "N/A";
export type NotAvailable = typeof NOT_AVAILABLE;

export type DataClass = "timeSeries" | "overview";

export type RetrievalErrorKind =
  | "InvalidSymbol"
  | "RateLimitExceeded"
  | "UpstreamError"
  | "MalformedResponse";

export type RetrievalError = {
  kind: RetrievalErrorKind;
  message: string;
};

export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; error: RetrievalError };

export type DailyBar = {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type CompanyOverview = {
  name: string;
  assetType: string;
  sector: string;
  industry: string;
  exchange: string | NotAvailable;
  currency: string | NotAvailable;
  country: string | NotAvailable;
  marketCapitalization: number | NotAvailable;
  peRatio: number | NotAvailable;
  eps: number | NotAvailable;
  beta: number | NotAvailable;
  dividendYield: number | NotAvailable;
  week52High: number | NotAvailable;
  week52Low: number | NotAvailable;
  movingAverage50: number | NotAvailable;
  movingAverage200: number | NotAvailable;
};

export type PortfolioSuccessRow = {
  status: "ok";
  symbol: string;
  name: string;
  assetType: string;
  sector: string;
  industry: string;
  shares: number;
  latestClose: number;
  latestCloseDate: string;
  totalValue: number;
  /** Fractional change, e.g. 0.125 for +12.5%. null when the reference close is 0. */
  weekChange52: number | null;
  overview: CompanyOverview;
};

export type PortfolioErrorRow = {
  status: "error";
  symbol: string;
  error: RetrievalError;
};

export type PortfolioRow = PortfolioSuccessRow | PortfolioErrorRow;

export type PortfolioMetrics = {
  totalValue: number;
  assetCount: number;
  averageValue: number;
  highestValueAsset: string | null;
  lowestValueAsset: string | null;
  mostSharesAsset: string | null;
  fewestSharesAsset: string | null;
  highestPriceAsset: string | null;
  lowestPriceAsset: string | null;
  sectorCount: number;
  dominantSector: string | null;
  sectorTotals: Record<string, number>;
};

export type MetricsTableRow = { metric: string; value: string };

export type PortfolioResponse = {
  rows: PortfolioRow[];
  metrics: PortfolioMetrics;
  metricsTable: MetricsTableRow[];
  generatedAt: string;
};
