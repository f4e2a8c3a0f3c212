import { describe, expect, it } from "vitest";
import { formatSummary } from "@/lib/export";

describe("formatSummary", () => {
  it("prints one dotted line per category and a totals line", () => {
    const text = formatSummary(
      {
        categories: [
          { category: "Anthropic", transactionCount: 2, totalCents: 123456 },
          { category: "OpenRouter", transactionCount: 1, totalCents: 12050 },
        ],
        totalCount: 3,
        totalCents: 135506,
      },
      "THB",
      (category) => (category === "Anthropic" ? "Anthropic AI" : category)
    );

    expect(text.split("\n")).toEqual([
      "=".repeat(70),
      "AI TRANSACTION SUMMARY",
      "=".repeat(70),
      "",
      `Anthropic AI${".".repeat(38)}   2 txns    1,234.56 THB`,
      `OpenRouter${".".repeat(40)}   1 txns      120.50 THB`,
      "",
      "-".repeat(70),
      `TOTAL${".".repeat(45)}   3 txns    1,355.06 THB`,
      "=".repeat(70),
      "",
    ]);
  });
});
