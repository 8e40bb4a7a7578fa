// pattern: Functional Core

const LEADING_FENCES = /^(?:```(?:html)?\s*)+/i;
const TRAILING_FENCES = /(?:\s*```)+$/;
const ERROR_INDICATOR = /^(?:error|exception)\b/i;

/**
 * Removes the markdown code fences models like to wrap HTML in: any run of
 * leading "```html" or "```" markers and any run of trailing "```", plus
 * surrounding whitespace. Text without fences only loses its surrounding
 * whitespace.
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(LEADING_FENCES, "")
    .replace(TRAILING_FENCES, "")
    .trim();
}

/** True when the text reads as an error message rather than a digest. */
export function hasErrorIndicator(text: string): boolean {
  return ERROR_INDICATOR.test(text.trim());
}

export function isUsableDigest(text: string | null): text is string {
  return text !== null && text.trim().length > 0 && !hasErrorIndicator(text);
}
