import { callWithRetry, type RunContext } from "../context.js";
import { TransportError, ValidationError, errorMessage } from "../errors.js";
import { dedupeDocuments } from "../search/dedupe.js";
import type { NewsDocument, SearchProviderId } from "../search/types.js";

export const DEFAULT_QUERIES = [
  "US stock market news today latest",
  "NASDAQ today news",
  "Dow Jones updates",
  "S&P 500 market news"
] as const;

type ProviderTally = {
  id: SearchProviderId;
  docs: NewsDocument[];
  failures: number;
  lastError?: string;
};

/**
 * Query both providers for every query, then merge: provider A's documents in
 * first-seen order, then provider B's, deduplicated and capped.
 *
 * One provider failing every query is tolerated; both failing is a TransportError.
 */
export async function runSearchStage(ctx: RunContext, queries: readonly string[] = DEFAULT_QUERIES): Promise<NewsDocument[]> {
  if (queries.length === 0) {
    throw new ValidationError("search stage needs at least one query");
  }

  const tallies: ProviderTally[] = ctx.searchProviders.map((p) => ({ id: p.id, docs: [], failures: 0 }));

  for (const [i, query] of queries.entries()) {
    if (i > 0 && ctx.cfg.SEARCH_PAUSE_MS > 0) await ctx.sleep(ctx.cfg.SEARCH_PAUSE_MS);

    for (const [p, provider] of ctx.searchProviders.entries()) {
      const tally = tallies[p];
      try {
        const docs = await callWithRetry(ctx, `search.${provider.id}`, () =>
          provider.search(query, ctx.cfg.SEARCH_RESULTS_PER_QUERY)
        );
        tally.docs.push(...docs);
        ctx.logger.debug("search.query.ok", { provider: provider.id, query, count: docs.length });
      } catch (err) {
        tally.failures += 1;
        tally.lastError = errorMessage(err);
        ctx.logger.warn("search.query.failed", { provider: provider.id, query, error: tally.lastError });
      }
    }
  }

  const failed = tallies.filter((t) => t.failures === queries.length);
  for (const t of failed) {
    ctx.logger.warn("search.provider.failed", { provider: t.id, queries: queries.length, error: t.lastError });
  }
  if (failed.length === tallies.length) {
    throw new TransportError(
      `all search providers failed: ${tallies.map((t) => `${t.id}: ${t.lastError ?? "unknown error"}`).join("; ")}`
    );
  }

  const merged = tallies.flatMap((t) => t.docs);
  const documents = dedupeDocuments(merged).slice(0, ctx.cfg.SEARCH_MAX_DOCUMENTS);

  ctx.logger.info("search.merged", {
    raw: merged.length,
    unique: documents.length,
    byProvider: Object.fromEntries(tallies.map((t) => [t.id, t.docs.length]))
  });

  if (documents.length === 0) {
    throw new ValidationError("search providers returned no usable documents");
  }

  return documents;
}
