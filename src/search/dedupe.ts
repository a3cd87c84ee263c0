import type { NewsDocument } from "./types.js";

export function normalizeTitle(title: string): string {
  return title
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

const TRACKING_PARAM = /^(?:utm_.+|gclid|fbclid|guccounter|ref|mc_cid|mc_eid)$/i;

/**
 * Comparison key for a story URL: host without `www.`, no fragment, no
 * tracking parameters, remaining parameters sorted, no trailing slash.
 * Strings that do not parse as URLs compare as themselves.
 */
export function canonicalizeUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  const kept = Array.from(url.searchParams)
    .filter(([key]) => !TRACKING_PARAM.test(key))
    .sort(([a], [b]) => a.localeCompare(b));
  const query = kept.length ? `?${new URLSearchParams(kept).toString()}` : "";
  const host = url.host.toLowerCase().replace(/^www\./, "");
  const pathname = url.pathname === "/" ? "/" : url.pathname.replace(/\/+$/, "");

  return `${url.protocol}//${host}${pathname}${query}`;
}

/**
 * Keep the first document seen for each normalized title and each canonical URL.
 * Order is preserved, so running it twice returns the same list.
 */
export function dedupeDocuments(docs: NewsDocument[]): NewsDocument[] {
  const seenTitles = new Set<string>();
  const seenUrls = new Set<string>();
  const out: NewsDocument[] = [];

  for (const doc of docs) {
    const titleKey = normalizeTitle(doc.title);
    const urlKey = canonicalizeUrl(doc.url);
    if (seenTitles.has(titleKey) || seenUrls.has(urlKey)) continue;
    seenTitles.add(titleKey);
    seenUrls.add(urlKey);
    out.push(doc);
  }

  return out;
}
