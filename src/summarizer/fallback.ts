// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SummaryProvider } from "../llm/client";
import type { Article } from "../pipeline/types";
import { isUsableDigest } from "./fences";

export type SummaryOutcome =
  | { readonly success: true; readonly digest: string; readonly provider: string }
  | { readonly success: false; readonly attempted: ReadonlyArray<string> };

/**
 * Tries providers in order until one returns a usable digest (non-empty and
 * not an error message). Later providers are only called when every earlier
 * one came back empty.
 */
export async function summarizeWithFallback(
  providers: ReadonlyArray<SummaryProvider>,
  articles: ReadonlyArray<Article>,
  logger: Logger,
): Promise<SummaryOutcome> {
  const attempted: Array<string> = [];

  for (const [index, provider] of providers.entries()) {
    attempted.push(provider.name);

    let text: string | null;
    try {
      text = await provider.summarize(articles);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ provider: provider.name, error: message }, "provider threw");
      text = null;
    }

    if (isUsableDigest(text)) {
      logger.info({ provider: provider.name }, "digest produced");
      return { success: true, digest: text, provider: provider.name };
    }

    logger.warn(
      { provider: provider.name, next: providers[index + 1]?.name ?? null },
      "provider produced no usable digest",
    );
  }

  logger.error({ attempted }, "no provider produced a usable digest");
  return { success: false, attempted };
}
