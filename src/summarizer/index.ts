export { stripCodeFences, hasErrorIndicator, isUsableDigest } from "./fences";
export { buildPrompt, renderArticles } from "./prompt";
export type { PromptOptions } from "./prompt";
export { summarizeWithFallback } from "./fallback";
export type { SummaryOutcome } from "./fallback";
