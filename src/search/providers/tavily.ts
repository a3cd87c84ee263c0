import { z } from "zod";
import { ValidationError } from "../../errors.js";
import { httpRequest, throwForStatus } from "../../http.js";
import type { NewsDocument, SearchProvider } from "../types.js";

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
        content: z.string().optional(),
        published_date: z.string().optional()
      })
    )
    .default([])
});

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, "");
  } catch {
    return "unknown";
  }
}

export function createTavilyProvider(args: { apiKey: string; timeoutMs: number }): SearchProvider {
  return {
    id: "tavily",

    async search(query: string, maxResults: number): Promise<NewsDocument[]> {
      const res = await httpRequest({
        service: "tavily",
        url: TAVILY_SEARCH_URL,
        body: {
          api_key: args.apiKey,
          query,
          max_results: maxResults,
          search_depth: "advanced"
        },
        timeoutMs: args.timeoutMs
      });
      throwForStatus("tavily", res);

      const parsed = TavilyResponseSchema.safeParse(res.json);
      if (!parsed.success) {
        throw new ValidationError("tavily returned an unexpected payload", parsed.error.issues.map((i) => i.message));
      }

      const docs: NewsDocument[] = [];
      for (const r of parsed.data.results) {
        const title = r.title?.trim();
        const url = r.url?.trim();
        if (!title || !url) continue;
        docs.push({
          title,
          url,
          source: hostnameOf(url),
          snippet: (r.content ?? "").trim(),
          publishedAt: r.published_date,
          provider: "tavily"
        });
      }
      return docs;
    }
  };
}
