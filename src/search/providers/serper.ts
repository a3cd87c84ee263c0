import { z } from "zod";
import { ValidationError } from "../../errors.js";
import { httpRequest, throwForStatus } from "../../http.js";
import type { ImageResult, ImageSearchProvider, NewsDocument, SearchProvider } from "../types.js";

const SERPER_SEARCH_URL = "https://google.serper.dev/search";
const SERPER_IMAGES_URL = "https://google.serper.dev/images";

const SerperSearchSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
        date: z.string().optional(),
        source: z.string().optional()
      })
    )
    .default([])
});

const SerperImagesSchema = z.object({
  images: z
    .array(
      z.object({
        title: z.string().optional(),
        imageUrl: z.string().optional()
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

function isHttpUrl(s: string): boolean {
  try {
    const u = new URL(s);
    return u.protocol === "https:" || u.protocol === "http:";
  } catch {
    return false;
  }
}

export type SerperProvider = SearchProvider & ImageSearchProvider;

export function createSerperProvider(args: { apiKey: string; timeoutMs: number }): SerperProvider {
  async function post(url: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await httpRequest({
      service: "serper",
      url,
      headers: { "X-API-KEY": args.apiKey },
      body,
      timeoutMs: args.timeoutMs
    });
    throwForStatus("serper", res);
    return res.json;
  }

  return {
    id: "serper",

    async search(query: string, maxResults: number): Promise<NewsDocument[]> {
      const json = await post(SERPER_SEARCH_URL, { q: query, num: maxResults });
      const parsed = SerperSearchSchema.safeParse(json);
      if (!parsed.success) {
        throw new ValidationError("serper returned an unexpected payload", parsed.error.issues.map((i) => i.message));
      }

      const docs: NewsDocument[] = [];
      for (const r of parsed.data.organic) {
        const title = r.title?.trim();
        const url = r.link?.trim();
        if (!title || !url) continue;
        docs.push({
          title,
          url,
          source: r.source?.trim() || hostnameOf(url),
          snippet: (r.snippet ?? "").trim(),
          publishedAt: r.date,
          provider: "serper"
        });
      }
      return docs.slice(0, maxResults);
    },

    async searchImages(query: string, maxResults: number): Promise<ImageResult[]> {
      const json = await post(SERPER_IMAGES_URL, { q: query, num: maxResults });
      const parsed = SerperImagesSchema.safeParse(json);
      if (!parsed.success) {
        throw new ValidationError("serper images returned an unexpected payload", parsed.error.issues.map((i) => i.message));
      }

      const out: ImageResult[] = [];
      for (const img of parsed.data.images) {
        const url = img.imageUrl?.trim();
        if (!url || !isHttpUrl(url)) continue;
        out.push({ url, title: img.title?.trim() || query });
      }
      return out.slice(0, maxResults);
    }
  };
}
