import { describe, it, expect, vi, afterEach } from "vitest";
import pino from "pino";
import { buildNewsApiUrl, fetchNewsApi, toArticle } from "./news-api";
import type { FetchFn } from "./news-api";

const ENDPOINT = "https://newsapi.example.com/api/1/latest";
const query = { q: "politics", language: "en" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("buildNewsApiUrl", () => {
  it("should embed the key and query parameters", () => {
    expect(buildNewsApiUrl(ENDPOINT, "test-news-key", query)).toBe(
      "https://newsapi.example.com/api/1/latest?apikey=test-news-key&q=politics&language=en",
    );
  });

  it("should encode the query and include optional filters", () => {
    expect(
      buildNewsApiUrl(ENDPOINT, "test-news-key", {
        q: "stock markets",
        country: "us",
        category: "business",
      }),
    ).toBe(
      "https://newsapi.example.com/api/1/latest?apikey=test-news-key&q=stock+markets&country=us&category=business",
    );
  });
});

describe("toArticle", () => {
  it("should fill defaults for missing fields", () => {
    expect(toArticle({ link: "https://example.com/a" })).toEqual({
      title: "Untitled",
      description: "",
      url: "https://example.com/a",
      source: "NewsData.io",
      publishedAt: "",
      author: "Unknown",
    });
  });

  it("should fall back to source_id when source_name is absent", () => {
    expect(toArticle({ source_id: "example_wire", source_name: null }).source).toBe(
      "example_wire",
    );
  });
});

describe("fetchNewsApi", () => {
  const logger = pino({ level: "silent" });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should map results on a success status", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        status: "success",
        totalResults: 1,
        results: [
          {
            title: "Senate passes budget",
            description: "The vote was close.",
            link: "https://news.example.com/budget",
            source_id: "example_wire",
            source_name: "Example Wire",
            pubDate: "2026-10-19 07:30:00",
            creator: ["Alex Writer", "Sam Editor"],
          },
        ],
      }),
    );

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result).toEqual({
      source: "newsapi:politics",
      error: null,
      articles: [
        {
          title: "Senate passes budget",
          description: "The vote was close.",
          url: "https://news.example.com/budget",
          source: "Example Wire",
          publishedAt: "2026-10-19 07:30:00",
          author: "Alex Writer",
        },
      ],
    });
    expect(fetchFn).toHaveBeenCalledWith(
      "https://newsapi.example.com/api/1/latest?apikey=test-news-key&q=politics&language=en",
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it("should contribute zero articles and log on a non-success status", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse(
        {
          status: "error",
          results: { message: "API key is invalid", code: "Unauthorized" },
        },
        401,
      ),
    );
    const errorSpy = vi.spyOn(logger, "error");

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.articles).toHaveLength(0);
    expect(result.error).toBe("status error: API key is invalid");
    expect(errorSpy).toHaveBeenCalledWith(
      {
        query: "politics",
        status: "error",
        error: "status error: API key is invalid",
      },
      "news api returned non-success status",
    );
  });

  it("should report the bare status when the error carries no message", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValue(jsonResponse({ status: "error", results: null }));

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.error).toBe("status error");
  });

  it("should reject a body without a status field", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValue(jsonResponse({ articles: [] }, 502));

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.articles).toHaveLength(0);
    expect(result.error).toBe("HTTP 502: unexpected response body");
  });

  it("should reject a success body whose results are not a list", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValue(jsonResponse({ status: "success", results: "nope" }));

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.error).toBe("results is not a list of articles");
  });

  it("should skip a malformed item and keep the rest", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        status: "success",
        results: [
          { title: "Rates held", link: "https://news.example.com/rates" },
          { title: 42, link: "https://news.example.com/broken" },
          { title: "Shares rally", link: "https://news.example.com/shares" },
        ],
      }),
    );
    const warnSpy = vi.spyOn(logger, "warn");

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.error).toBeNull();
    expect(result.articles.map((a) => a.title)).toEqual([
      "Rates held",
      "Shares rally",
    ]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      {
        query: "politics",
        index: 1,
        error: "title: Expected string, received number",
      },
      "news api item skipped",
    );
  });

  it("should catch transport errors", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockRejectedValue(new TypeError("fetch failed"));

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result).toEqual({
      source: "newsapi:politics",
      articles: [],
      error: "fetch failed",
    });
  });

  it("should catch a body that is not JSON", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValue(new Response("<html>gateway timeout</html>", { status: 504 }));

    const result = await fetchNewsApi(
      ENDPOINT,
      "test-news-key",
      query,
      15000,
      logger,
      fetchFn,
    );

    expect(result.articles).toHaveLength(0);
    expect(result.error).not.toBeNull();
  });
});
