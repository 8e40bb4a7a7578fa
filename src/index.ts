#!/usr/bin/env node
import "dotenv/config";
import { resolve } from "node:path";
import { createLogger } from "./logger";
import {
  findInvalidSettings,
  findMissingSettings,
  loadConfig,
} from "./config";
import type { AppConfig } from "./config";
import { collectArticles } from "./pipeline";
import { createSummaryProviders } from "./llm/client";
import { createDigestSender, exitCodeFor, runDigestCycle } from "./digest";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<number> {
  const logger = createLogger();

  logger.info("daily-news-digest starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    return 1;
  }

  for (const invalid of findInvalidSettings()) {
    logger.warn(invalid, "setting invalid, using default");
  }

  for (const setting of findMissingSettings(config)) {
    logger.warn({ setting }, "setting not configured");
  }

  logger.info(
    {
      feedCount: config.sources.rss.feeds.length,
      queryCount: config.sources.newsApi.queries.length,
      providers: config.summarizer.providers.map((p) => p.name),
      smtpHost: config.delivery.smtp.host,
      smtpPort: config.delivery.smtp.port,
    },
    "config loaded",
  );

  const sendDigest = createDigestSender(config.delivery, logger);
  if (!sendDigest) {
    logger.error("delivery unavailable, aborting run");
    return 1;
  }

  const outcome = await runDigestCycle(
    config,
    {
      collect: () => collectArticles(config.sources, logger),
      providers: createSummaryProviders(config.summarizer, logger),
      sendDigest,
    },
    logger,
  );

  logger.info({ status: outcome.status }, "daily-news-digest finished");
  return exitCodeFor(outcome);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal startup error:", err);
    process.exit(1);
  });
