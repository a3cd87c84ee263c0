export type SearchProviderId = "tavily" | "serper";

export type NewsDocument = {
  title: string;
  /** Publisher or site name, best effort. */
  source: string;
  url: string;
  snippet: string;
  /** As reported by the provider; formats vary, never parsed. */
  publishedAt?: string;
  provider: SearchProviderId;
};

export interface SearchProvider {
  readonly id: SearchProviderId;
  search(query: string, maxResults: number): Promise<NewsDocument[]>;
}

export type ImageResult = {
  url: string;
  title: string;
};

export interface ImageSearchProvider {
  searchImages(query: string, maxResults: number): Promise<ImageResult[]>;
}
