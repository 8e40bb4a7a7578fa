import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { ProviderConfig } from "../config";

/**
 * Builds the AI SDK model for one configured provider. Keys are passed
 * explicitly so nothing is read from the process environment here.
 */
export function getModel(provider: ProviderConfig): LanguageModel {
  const apiKey = provider.apiKey ?? undefined;
  const baseURL = provider.baseURL;

  switch (provider.kind) {
    case "anthropic":
      return createAnthropic({ apiKey, baseURL })(provider.model);
    case "openai":
      return createOpenAI({ apiKey, baseURL })(provider.model);
    case "gemini":
      return createGoogleGenerativeAI({ apiKey, baseURL })(provider.model);
    case "openai-compatible": {
      if (!baseURL) {
        throw new Error(`provider ${provider.name} needs a baseURL`);
      }
      return createOpenAICompatible({ name: provider.name, baseURL, apiKey })(
        provider.model,
      );
    }
    case "ollama":
      return createOllama({
        baseURL: baseURL ?? "http://localhost:11434/api",
      })(provider.model);
    default: {
      const _exhaustive: never = provider.kind;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
