import { describe, it, expect } from "vitest";
import { formatDigestDate, formatSubject } from "./subject";

describe("formatDigestDate", () => {
  it("should format as DD/MM/YYYY with zero padding", () => {
    expect(formatDigestDate(new Date(2026, 0, 5))).toBe("05/01/2026");
    expect(formatDigestDate(new Date(2026, 9, 19))).toBe("19/10/2026");
  });
});

describe("formatSubject", () => {
  it("should replace every date placeholder", () => {
    expect(formatSubject("News {date} ({date})", new Date(2026, 9, 19))).toBe(
      "News 19/10/2026 (19/10/2026)",
    );
  });

  it("should leave a template without placeholders unchanged", () => {
    expect(formatSubject("Morning briefing", new Date(2026, 9, 19))).toBe(
      "Morning briefing",
    );
  });
});
