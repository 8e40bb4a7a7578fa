/**
 * A normalized news item. Every field is text as the source provided it;
 * `publishedAt` is never parsed into a date.
 */
export type Article = {
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly source: string;
  readonly publishedAt: string;
  readonly author: string;
};

/**
 * Outcome of querying one source. `error` is set when the source failed or
 * reported a non-success status; `articles` is then empty.
 */
export type SourceResult = {
  readonly source: string;
  readonly articles: ReadonlyArray<Article>;
  readonly error: string | null;
};

export const UNKNOWN_AUTHOR = "Unknown";
export const UNTITLED = "Untitled";
