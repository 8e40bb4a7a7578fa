// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { SourcesConfig } from "../config";
import { pollFeed } from "./poller";
import { fetchNewsApi } from "./news-api";
import type { FetchFn } from "./news-api";
import type { Article, SourceResult } from "./types";

export type CollectorDeps = {
  readonly fetchFn?: FetchFn;
};

/**
 * Collects articles from every configured RSS feed, then every news-API
 * query. Sources run through a limiter of `sources.concurrency` (1 keeps
 * them strictly sequential); the result keeps configured source order
 * regardless.
 *
 * Never rejects. A failing source is logged and contributes nothing, so the
 * result may be empty.
 */
export async function collectArticles(
  sources: SourcesConfig,
  logger: Logger,
  deps: CollectorDeps = {},
): Promise<ReadonlyArray<Article>> {
  const limit = pLimit(sources.concurrency);
  const tasks: Array<() => Promise<SourceResult>> = [];

  for (const feed of sources.rss.feeds) {
    tasks.push(() =>
      pollFeed(feed, sources.rss.maxItemsPerFeed, sources.rss.timeoutMs, logger),
    );
  }

  const { newsApi } = sources;
  if (newsApi.queries.length > 0) {
    const apiKey = newsApi.apiKey;
    if (apiKey === null) {
      logger.warn(
        { queryCount: newsApi.queries.length },
        "NEWSDATAIO_API_KEY not set, skipping news api queries",
      );
    } else {
      for (const query of newsApi.queries) {
        tasks.push(() =>
          fetchNewsApi(
            newsApi.endpoint,
            apiKey,
            query,
            newsApi.timeoutMs,
            logger,
            deps.fetchFn,
          ),
        );
      }
    }
  }

  const settled = await Promise.allSettled(tasks.map((task) => limit(task)));

  const articles: Array<Article> = [];
  let failedSources = 0;

  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      failedSources += 1;
      const message =
        outcome.reason instanceof Error
          ? outcome.reason.message
          : String(outcome.reason);
      logger.error({ error: message }, "source collection failed");
      continue;
    }
    if (outcome.value.error !== null) failedSources += 1;
    articles.push(...outcome.value.articles);
  }

  logger.info(
    {
      sourceCount: tasks.length,
      failedSources,
      articleCount: articles.length,
    },
    "article collection complete",
  );

  return articles;
}
