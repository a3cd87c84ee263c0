import type { Locale } from "./locales.js";

export type IndexQuote = {
  name: string;
  /** Kept as the model wrote it so digits pass through untouched. */
  value: string;
  changePct: string;
};

export type Mover = {
  symbol: string;
  changePct: string;
  reason?: string;
};

export type MarketSummary = {
  indices: IndexQuote[];
  headlines: string[];
  movers: { gainers: Mover[]; losers: Mover[] };
  outlook: string[];
};

export type ChartRef = {
  url: string;
  title: string;
  /** Image-search query that found it. */
  query: string;
};

export type FormattedContent = {
  htmlBody: string;
  chartRef?: ChartRef;
};

export type DeliveryResult = {
  locale: Locale;
  success: boolean;
  messageIds?: number[];
  error?: string;
  /** Delivered, but the content is a fallback notice rather than a translation. */
  degraded?: boolean;
};
