// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import { requiresApiKey } from "../config";
import type { ProviderConfig, SummarizerConfig } from "../config";
import type { Article } from "../pipeline/types";
import { buildPrompt, stripCodeFences } from "../summarizer";
import { getModel } from "./providers";

export type GenerateRequest = {
  readonly model: LanguageModel;
  readonly system?: string;
  readonly prompt: string;
  readonly maxOutputTokens: number;
  readonly maxRetries: number;
  readonly abortSignal: AbortSignal;
};

export type GenerateFn = (
  request: GenerateRequest,
) => Promise<{ readonly text: string }>;

export const generateWithSdk: GenerateFn = async (request) => {
  const result = await generateText({ ...request });
  return { text: result.text };
};

/**
 * One summarization backend. `summarize` never rejects: a missing key, an
 * upstream failure or an empty answer all resolve to `null`.
 */
export type SummaryProvider = {
  readonly name: string;
  readonly summarize: (
    articles: ReadonlyArray<Article>,
  ) => Promise<string | null>;
};

export function createSummaryProvider(
  provider: ProviderConfig,
  settings: SummarizerConfig,
  logger: Logger,
  generate: GenerateFn = generateWithSdk,
): SummaryProvider {
  const context = { provider: provider.name, model: provider.model };

  async function summarize(
    articles: ReadonlyArray<Article>,
  ): Promise<string | null> {
    if (requiresApiKey(provider.kind) && provider.apiKey === null) {
      logger.warn(
        { ...context, apiKeyEnv: provider.apiKeyEnv ?? null },
        "provider api key not set, skipping provider",
      );
      return null;
    }

    const prompt = buildPrompt(articles, {
      ...settings.prompt,
      maxArticles: provider.maxArticles,
      maxDescriptionLength: provider.maxDescriptionLength,
    });

    try {
      const result = await generate({
        model: getModel(provider),
        system: provider.system,
        prompt,
        maxOutputTokens: settings.maxOutputTokens,
        // one attempt per call; the provider list is the only fallback
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(settings.timeoutMs),
      });

      const digest = stripCodeFences(result.text);
      if (digest.length === 0) {
        logger.warn(context, "provider returned empty content");
        return null;
      }

      logger.info(
        { ...context, articleCount: articles.length, digestLength: digest.length },
        "summary generated",
      );
      return digest;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ ...context, error: message }, "summary generation failed");
      return null;
    }
  }

  return { name: provider.name, summarize };
}

/**
 * Builds the ordered provider list from config. Order is the fallback
 * order: the first provider is tried first.
 */
export function createSummaryProviders(
  settings: SummarizerConfig,
  logger: Logger,
  generate: GenerateFn = generateWithSdk,
): ReadonlyArray<SummaryProvider> {
  return settings.providers.map((provider) =>
    createSummaryProvider(provider, settings, logger, generate),
  );
}
