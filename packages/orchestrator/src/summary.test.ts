import { describe, expect, test } from "vitest";
import { formatSummary } from "./summary";

describe("formatSummary", () => {
  test("distinguishes none, one and many", () => {
    expect(formatSummary(0)).toBe("No new items found");
    expect(formatSummary(1)).toBe("1 item imported");
    expect(formatSummary(12)).toBe("12 items imported");
  });
});
