import type { AggregateReport } from "../aggregate";
import { formatCents } from "../parsers/utils";

const WIDTH = 70;
const NAME_WIDTH = 50;

function summaryLine(
  name: string,
  count: number,
  totalCents: number,
  currency: string
): string {
  const amount = formatCents(totalCents, true).padStart(10);
  return `${name.padEnd(NAME_WIDTH, ".")} ${String(count).padStart(3)} txns  ${amount} ${currency}`;
}

export function formatSummary(
  report: AggregateReport,
  currency: string,
  labelFor: (category: string) => string = (category) => category
): string {
  const lines = [
    "=".repeat(WIDTH),
    "AI TRANSACTION SUMMARY",
    "=".repeat(WIDTH),
    "",
    ...report.categories.map((summary) =>
      summaryLine(
        labelFor(summary.category),
        summary.transactionCount,
        summary.totalCents,
        currency
      )
    ),
    "",
    "-".repeat(WIDTH),
    summaryLine("TOTAL", report.totalCount, report.totalCents, currency),
    "=".repeat(WIDTH),
  ];
  return `${lines.join("\n")}\n`;
}
