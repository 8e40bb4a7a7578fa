import { z } from "zod/v3";
import type { Logger } from "pino";
import type { NewsApiQuery } from "../config";
import { UNKNOWN_AUTHOR, UNTITLED } from "./types";
import type { Article, SourceResult } from "./types";

const newsItemSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  link: z.string().nullish(),
  source_id: z.string().nullish(),
  source_name: z.string().nullish(),
  pubDate: z.string().nullish(),
  creator: z.array(z.string()).nullish(),
});

const newsResponseSchema = z.object({
  status: z.string(),
  results: z.unknown(),
});

const successResultsSchema = z.array(z.unknown());

const errorResultsSchema = z.object({
  message: z.string().optional(),
  code: z.string().optional(),
});

type NewsItem = z.infer<typeof newsItemSchema>;

export type FetchFn = typeof fetch;

/**
 * Builds the request URL for one query. The key travels as the `apikey`
 * query parameter, which is how NewsData.io authenticates.
 */
export function buildNewsApiUrl(
  endpoint: string,
  apiKey: string,
  query: NewsApiQuery,
): string {
  const url = new URL(endpoint);
  url.searchParams.set("apikey", apiKey);
  url.searchParams.set("q", query.q);
  if (query.language) url.searchParams.set("language", query.language);
  if (query.country) url.searchParams.set("country", query.country);
  if (query.category) url.searchParams.set("category", query.category);
  return url.toString();
}

export function toArticle(item: NewsItem): Article {
  return {
    title: item.title || UNTITLED,
    description: item.description ?? "",
    url: item.link ?? "",
    source: item.source_name || item.source_id || "NewsData.io",
    publishedAt: item.pubDate ?? "",
    author: item.creator?.[0] ?? UNKNOWN_AUTHOR,
  };
}

/**
 * Runs one news-API query. A non-success `status` in the body, a non-2xx
 * response or an unreadable body all yield zero articles and an `error`.
 */
export async function fetchNewsApi(
  endpoint: string,
  apiKey: string,
  query: NewsApiQuery,
  timeoutMs: number,
  logger: Logger,
  fetchFn: FetchFn = fetch,
): Promise<SourceResult> {
  const source = `newsapi:${query.q}`;

  try {
    const response = await fetchFn(buildNewsApiUrl(endpoint, apiKey, query), {
      signal: AbortSignal.timeout(timeoutMs),
      headers: { Accept: "application/json" },
    });

    // NewsData.io reports quota and key errors with a JSON body as well
    const body: unknown = await response.json();
    const parsed = newsResponseSchema.safeParse(body);
    if (!parsed.success) {
      const error = `HTTP ${response.status}: unexpected response body`;
      logger.error({ query: query.q, error }, "news api request failed");
      return { source, articles: [], error };
    }

    if (parsed.data.status !== "success") {
      const details = errorResultsSchema.safeParse(parsed.data.results);
      const apiMessage = details.success ? details.data.message : undefined;
      const error = `status ${parsed.data.status}${apiMessage ? `: ${apiMessage}` : ""}`;
      logger.error(
        { query: query.q, status: parsed.data.status, error },
        "news api returned non-success status",
      );
      return { source, articles: [], error };
    }

    const items = successResultsSchema.safeParse(parsed.data.results);
    if (!items.success) {
      const error = "results is not a list of articles";
      logger.error({ query: query.q, error }, "news api request failed");
      return { source, articles: [], error };
    }

    // one malformed record only costs that record
    const articles: Array<Article> = [];
    items.data.forEach((raw, index) => {
      const item = newsItemSchema.safeParse(raw);
      if (item.success) {
        articles.push(toArticle(item.data));
        return;
      }
      const error = item.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      logger.warn({ query: query.q, index, error }, "news api item skipped");
    });

    logger.info(
      { query: query.q, itemCount: articles.length },
      "news api query complete",
    );
    return { source, articles, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ query: query.q, error: message }, "news api request failed");
    return { source, articles: [], error: message };
  }
}
