export { pollFeed } from "./poller";
export { fetchNewsApi, buildNewsApiUrl } from "./news-api";
export { collectArticles } from "./collector";
export type { Article, SourceResult } from "./types";
export type { FetchFn } from "./news-api";
export type { CollectorDeps } from "./collector";
