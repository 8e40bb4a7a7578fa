import Parser from "rss-parser";
import type { Logger } from "pino";
import type { RssFeedConfig } from "../config";
import { UNKNOWN_AUTHOR, UNTITLED } from "./types";
import type { Article, SourceResult } from "./types";

type CustomItem = {
  // RSS <author> arrives raw and may be an element object
  author?: unknown;
};

type FeedParser = Pick<Parser<Record<string, unknown>, CustomItem>, "parseURL">;

let parserInstance: FeedParser | null = null;

export function createParser(timeoutMs: number): FeedParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    timeout: timeoutMs,
    customFields: {
      item: ["author"],
    },
  });
}

export function getParserInstance(timeoutMs: number): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser(timeoutMs);
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

function firstText(...values: ReadonlyArray<unknown>): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) return value;
  }
  return null;
}

/**
 * Polls one RSS or Atom feed and maps its first `maxItems` entries to
 * articles. Never throws: fetch and parse failures come back in `error`.
 */
export async function pollFeed(
  feed: RssFeedConfig,
  maxItems: number,
  timeoutMs: number,
  logger: Logger,
): Promise<SourceResult> {
  const feedName = feed.name ?? feed.url;

  try {
    const parser = getParserInstance(timeoutMs);
    const parsed = await parser.parseURL(feed.url);
    const source = firstText(parsed.title, feed.name) ?? "RSS Feed";

    const articles: Array<Article> = parsed.items
      .slice(0, maxItems)
      .map((item) => ({
        title: firstText(item.title) ?? UNTITLED,
        description: firstText(item.contentSnippet, item.summary) ?? "",
        url: item.link ?? "",
        source,
        publishedAt: firstText(item.pubDate, item.isoDate) ?? "",
        author: firstText(item.creator, item.author) ?? UNKNOWN_AUTHOR,
      }));

    logger.info(
      { feedName, itemCount: articles.length },
      "feed polled successfully",
    );
    return { source: feedName, articles, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedName, feedUrl: feed.url, error: message }, "feed poll failed");
    return { source: feedName, articles: [], error: message };
  }
}
