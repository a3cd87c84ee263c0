import { callWithRetry, type RunContext } from "../context.js";
import { errorMessage } from "../errors.js";
import type { ChartRef, FormattedContent, MarketSummary, Mover } from "../types.js";
import { formatReportStamp } from "../utils.js";

export const REPORT_TITLE = "Daily US Financial Summary";
const DEFAULT_CHART_QUERY = "US stock market chart today";
const MAX_CHART_QUERIES = 2;

// Instruments worth a chart, checked in this order against the summary text.
const CHART_TRIGGERS: Array<{ match: RegExp; query: string }> = [
  { match: /S&P/i, query: "S&P 500 chart today" },
  { match: /NASDAQ/i, query: "NASDAQ chart today" },
  { match: /\bDow\b/i, query: "Dow Jones chart today" },
  { match: /\bTesla\b|\bTSLA\b/i, query: "Tesla stock chart" },
  { match: /\bApple\b|\bAAPL\b/i, query: "Apple stock chart" },
  { match: /\bNVIDIA\b|\bNVDA\b/i, query: "NVIDIA stock chart" }
];

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/** "0.64" -> "+0.64%", "-1.2%" stays, "−0.5" keeps its sign. */
export function formatChange(raw: string): string {
  let s = raw.trim();
  if (!s.endsWith("%")) s = `${s}%`;
  if (/^\d/.test(s)) s = `+${s}`;
  return s;
}

function summaryText(summary: MarketSummary): string {
  return [
    ...summary.indices.map((i) => i.name),
    ...summary.headlines,
    ...summary.movers.gainers.map((m) => `${m.symbol} ${m.reason ?? ""}`),
    ...summary.movers.losers.map((m) => `${m.symbol} ${m.reason ?? ""}`),
    ...summary.outlook
  ].join("\n");
}

export function chartQueriesFor(summary: MarketSummary): string[] {
  const text = summaryText(summary);
  const queries = CHART_TRIGGERS.filter((t) => t.match.test(text)).map((t) => t.query);
  return (queries.length ? queries : [DEFAULT_CHART_QUERY]).slice(0, MAX_CHART_QUERIES);
}

function moverLine(marker: string, m: Mover): string {
  const reason = m.reason ? ` - ${escapeHtml(m.reason)}` : "";
  return `${marker} ${escapeHtml(m.symbol)} ${escapeHtml(formatChange(m.changePct))}${reason}`;
}

export function renderSummaryHtml(summary: MarketSummary, stamp: string, chartRef?: ChartRef): string {
  const sections: string[] = [`<b>${REPORT_TITLE}</b>\n<i>${escapeHtml(stamp)}</i>`];

  if (summary.indices.length) {
    const lines = summary.indices.map(
      (i) => `• ${escapeHtml(i.name)}: ${escapeHtml(i.value)} (${escapeHtml(formatChange(i.changePct))})`
    );
    sections.push(["<b>Market Overview</b>", ...lines].join("\n"));
  }

  if (summary.headlines.length) {
    const lines = summary.headlines.map((h, idx) => `${idx + 1}. ${escapeHtml(h)}`);
    sections.push(["<b>Key Headlines</b>", ...lines].join("\n"));
  }

  const { gainers, losers } = summary.movers;
  if (gainers.length || losers.length) {
    const lines = [...gainers.map((m) => moverLine("▲", m)), ...losers.map((m) => moverLine("▼", m))];
    sections.push(["<b>Notable Movers</b>", ...lines].join("\n"));
  }

  if (summary.outlook.length) {
    const lines = summary.outlook.map((o) => `• ${escapeHtml(o)}`);
    sections.push(["<b>Tomorrow's Watch</b>", ...lines].join("\n"));
  }

  if (chartRef) {
    sections.push(`<b>Related Chart:</b> <a href="${escapeHtml(chartRef.url)}">${escapeHtml(chartRef.title)}</a>`);
  }

  return sections.join("\n\n");
}

async function findChart(ctx: RunContext, summary: MarketSummary): Promise<ChartRef | undefined> {
  const images = ctx.images;
  if (!ctx.cfg.CHARTS_ENABLED || !images) return undefined;

  for (const query of chartQueriesFor(summary)) {
    try {
      const found = await callWithRetry(ctx, "format.chart", () => images.searchImages(query, 1));
      const first = found[0];
      if (first) {
        ctx.logger.info("format.chart.selected", { query, url: first.url });
        return { url: first.url, title: first.title, query };
      }
    } catch (err) {
      ctx.logger.warn("format.chart.failed", { query, error: errorMessage(err) });
    }
  }

  ctx.logger.info("format.chart.none");
  return undefined;
}

/** Render the summary as Telegram HTML; a missing chart never fails the stage. */
export async function runFormattingStage(ctx: RunContext, summary: MarketSummary): Promise<FormattedContent> {
  const chartRef = await findChart(ctx, summary);
  const stamp = formatReportStamp(ctx.now(), ctx.cfg.REPORT_TIMEZONE);
  const htmlBody = renderSummaryHtml(summary, stamp, chartRef);
  return chartRef ? { htmlBody, chartRef } : { htmlBody };
}
