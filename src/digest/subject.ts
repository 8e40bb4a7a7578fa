// pattern: Functional Core

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats a date as DD/MM/YYYY in local time. */
export function formatDigestDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/** Replaces every `{date}` in the subject template with the run date. */
export function formatSubject(template: string, date: Date): string {
  return template.replaceAll("{date}", formatDigestDate(date));
}
