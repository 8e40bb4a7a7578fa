// pattern: Functional Core
import type { PromptConfig } from "../config";
import type { Article } from "../pipeline/types";

export type PromptOptions = PromptConfig & {
  readonly maxArticles?: number;
  readonly maxDescriptionLength?: number;
};

/**
 * Renders articles as the numbered plain-text block embedded in the prompt.
 * Honors the optional article and description caps.
 */
export function renderArticles(
  articles: ReadonlyArray<Article>,
  options: Pick<PromptOptions, "maxArticles" | "maxDescriptionLength">,
): string {
  const selected =
    options.maxArticles === undefined
      ? articles
      : articles.slice(0, options.maxArticles);

  if (selected.length === 0) {
    return "(no articles were collected today)";
  }

  return selected
    .map((article, i) => {
      const description =
        options.maxDescriptionLength === undefined
          ? article.description
          : article.description.slice(0, options.maxDescriptionLength);

      return [
        `Article ${i + 1}:`,
        `Headline: ${article.title}`,
        `Source: ${article.source}`,
        `Summary: ${description || "No description available"}`,
        `URL: ${article.url}`,
        `Published: ${article.publishedAt || "Unknown date"}`,
      ].join("\n");
    })
    .join("\n\n");
}

/**
 * Builds the single instruction sent to a provider. Pure: the same articles
 * and options always give the same string.
 */
export function buildPrompt(
  articles: ReadonlyArray<Article>,
  options: PromptOptions,
): string {
  const rules = [
    "No introduction or conclusion.",
    "Keep the title and all headings emoji free.",
    `Pick at most ${options.maxStories} key stories grouped into at most ${options.maxThemes} themes.`,
    ...(options.requiredTopics.length > 0
      ? [
          `Make sure the following topics are discussed if the articles cover them: ${options.requiredTopics.join(", ")}.`,
        ]
      : []),
    "For each story: headline, 2-4 sentence summary, link to the source.",
    "Professional but friendly tone.",
  ];

  return [
    "Create a concise, engaging daily news summary email.",
    "",
    "Articles:",
    renderArticles(articles, options),
    "",
    "Format as an HTML email with:",
    ...rules.map((rule, i) => `${i + 1}. ${rule}`),
    "",
    `Keep under ${options.maxWords} words.`,
  ].join("\n");
}
