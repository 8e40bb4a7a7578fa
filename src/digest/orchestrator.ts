// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { SummaryProvider } from "../llm/client";
import type { Article } from "../pipeline/types";
import { summarizeWithFallback } from "../summarizer";
import type { SendDigestFn } from "./sender";
import { formatSubject } from "./subject";

export type RunDeps = {
  readonly collect: () => Promise<ReadonlyArray<Article>>;
  readonly providers: ReadonlyArray<SummaryProvider>;
  readonly sendDigest: SendDigestFn;
  readonly now?: () => Date;
};

export type RunOutcome =
  | {
      readonly status: "sent";
      readonly messageId: string;
      readonly provider: string;
      readonly articleCount: number;
    }
  | { readonly status: "skipped"; readonly reason: string }
  | { readonly status: "failed"; readonly error: string };

/**
 * Runs one digest cycle: collect → summarize with fallback → deliver.
 *
 * Behavior:
 * - The provider list runs even when collection came back empty.
 * - If no provider yields a usable digest, nothing is sent and the run is
 *   reported as `skipped`.
 * - A failed send is reported as `failed` with the underlying cause.
 * - Never rejects for a stage failure; each stage logs and degrades.
 *
 * @param config - The assembled run configuration
 * @param deps - Stage implementations (injected for testability)
 * @param logger - Logger instance for recording progress
 */
export async function runDigestCycle(
  config: AppConfig,
  deps: RunDeps,
  logger: Logger,
): Promise<RunOutcome> {
  const articles = await deps.collect();
  if (articles.length === 0) {
    logger.warn("no articles collected, summarizing empty input");
  }

  const summary = await summarizeWithFallback(deps.providers, articles, logger);
  if (!summary.success) {
    const reason = `no usable digest from providers: ${summary.attempted.join(", ") || "none configured"}`;
    logger.warn({ reason }, "nothing to send, skipping delivery");
    return { status: "skipped", reason };
  }

  const recipient = config.delivery.to;
  if (recipient === null) {
    const error = "EMAIL_TO not set";
    logger.error({ error }, "digest delivery failed");
    return { status: "failed", error };
  }

  const now = deps.now ?? (() => new Date());
  const subject = formatSubject(config.delivery.subject, now());

  const result = await deps.sendDigest(recipient, subject, summary.digest, logger);

  if (!result.success) {
    logger.error({ error: result.error }, "digest delivery failed");
    return { status: "failed", error: result.error };
  }

  logger.info(
    { articleCount: articles.length, provider: summary.provider },
    "digest cycle complete",
  );
  return {
    status: "sent",
    messageId: result.messageId,
    provider: summary.provider,
    articleCount: articles.length,
  };
}

/**
 * Maps a run outcome to the process exit code: 0 sent, 1 delivery failed,
 * 2 nothing to send.
 */
export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case "sent":
      return 0;
    case "failed":
      return 1;
    case "skipped":
      return 2;
    default: {
      const _exhaustive: never = outcome;
      throw new Error(`unknown run outcome: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
