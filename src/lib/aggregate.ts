import type { ClassifiedRecord } from "./classifier";

export type CategorySummary = {
  category: string;
  transactionCount: number;
  totalCents: number;
};

export type AggregateReport = {
  categories: CategorySummary[];
  totalCount: number;
  totalCents: number;
};

// Sums integer minor units, so totals never drift.
export function aggregate(
  records: readonly Pick<ClassifiedRecord, "category" | "amountCents">[]
): AggregateReport {
  const byCategory = new Map<string, CategorySummary>();
  let totalCount = 0;
  let totalCents = 0;

  for (const record of records) {
    const summary = byCategory.get(record.category) ?? {
      category: record.category,
      transactionCount: 0,
      totalCents: 0,
    };
    summary.transactionCount += 1;
    summary.totalCents += record.amountCents;
    byCategory.set(record.category, summary);
    totalCount += 1;
    totalCents += record.amountCents;
  }

  const categories = [...byCategory.values()].sort((a, b) => {
    if (a.totalCents !== b.totalCents) return b.totalCents - a.totalCents;
    if (a.category === b.category) return 0;
    return a.category < b.category ? -1 : 1;
  });

  return { categories, totalCount, totalCents };
}
