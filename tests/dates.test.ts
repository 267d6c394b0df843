import { describe, expect, it } from "vitest";
import { formatCompactDate, formatDate, formatTimestamp, unixSeconds } from "../src/utils/dates.js";

describe("date formatting", () => {
  const date = new Date(2025, 0, 5, 7, 4, 30);

  it("formats local dates and timestamps", () => {
    expect(formatDate(date)).toBe("2025-01-05");
    expect(formatCompactDate(date)).toBe("20250105");
    expect(formatTimestamp(date)).toBe("2025-01-05 07:04");
  });

  it("truncates to whole seconds", () => {
    expect(unixSeconds(new Date(1736000000999))).toBe(1736000000);
  });
});
