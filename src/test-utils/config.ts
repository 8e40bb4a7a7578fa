import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig, ProviderConfig } from "../config";
import type { Article } from "../pipeline/types";

export const TEST_FREE_PROVIDER: ProviderConfig = {
  name: "huggingface",
  kind: "openai-compatible",
  model: "test-free-model",
  baseURL: "https://router.example.com/v1",
  apiKeyEnv: "HF_KEY",
  apiKey: "test-hf-key",
};

export const TEST_PRIMARY_PROVIDER: ProviderConfig = {
  name: "anthropic",
  kind: "anthropic",
  model: "test-primary-model",
  apiKeyEnv: "ANTHROPIC_API_KEY",
  apiKey: "test-anthropic-key",
};

export function createTestConfig(): AppConfig {
  return {
    sources: {
      concurrency: 1,
      rss: {
        feeds: [{ name: "Example Feed", url: "https://example.com/rss" }],
        maxItemsPerFeed: 5,
        timeoutMs: 15000,
      },
      newsApi: {
        endpoint: "https://newsapi.example.com/api/1/latest",
        queries: [{ q: "politics", language: "en" }],
        timeoutMs: 15000,
        apiKey: "test-news-key",
      },
    },
    summarizer: {
      timeoutMs: 30000,
      maxOutputTokens: 2000,
      prompt: {
        maxStories: 10,
        maxThemes: 4,
        maxWords: 500,
        requiredTopics: ["politics", "markets"],
      },
      providers: [TEST_FREE_PROVIDER, TEST_PRIMARY_PROVIDER],
    },
    delivery: {
      subject: "Daily News for {date}",
      from: "digest@example.com",
      to: "reader@example.com",
      smtp: {
        host: "smtp.example.com",
        port: 587,
        user: "digest@example.com",
        password: "test-password",
      },
    },
  };
}

export function createTestArticle(overrides: Partial<Article> = {}): Article {
  return {
    title: "Test Headline",
    description: "Test description",
    url: "https://example.com/article",
    source: "Example Source",
    publishedAt: "Mon, 19 Oct 2026 08:00:00 GMT",
    author: "Test Author",
    ...overrides,
  };
}

export function createTestLogger(): Logger {
  return pino({ level: "silent" });
}
