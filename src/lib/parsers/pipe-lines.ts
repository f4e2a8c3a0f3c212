import type {
  PageParseResult,
  RawExtraction,
  SkipReason,
  TransactionRecord,
} from "./types";
import {
  isShortDate,
  parseAmountToCents,
  stripCodeFences,
} from "./utils";

export const NO_TRANSACTIONS_SENTINEL = "NO_TRANSACTIONS";

// Date at line start, then exactly three more pipe-delimited fields.
const LINE_REGEX = /^(\d{2}\/\d{2}\/\d{2})\s*\|([^|]*)\|([^|]*)\|([^|]*)$/;

type LineOutcome =
  | { kind: "record"; record: TransactionRecord }
  | { kind: "skip"; reason: SkipReason };

export function isNoTransactionsSentinel(text: string): boolean {
  const compact = stripCodeFences(text).replace(/\s+/g, "").toUpperCase();
  return compact === NO_TRANSACTIONS_SENTINEL;
}

function emptySkipCounts(): Record<SkipReason, number> {
  return { pattern: 0, "posting-date": 0, description: 0, amount: 0 };
}

function parseLine(
  line: string,
  pageKey: TransactionRecord["pageKey"]
): LineOutcome {
  const match = line.match(LINE_REGEX);
  if (!match) return { kind: "skip", reason: "pattern" };

  const [, transactionDate, postingRaw, descriptionRaw, amountRaw] = match;
  const postingDate = postingRaw.trim();
  if (!isShortDate(postingDate)) {
    return { kind: "skip", reason: "posting-date" };
  }

  const description = descriptionRaw.trim();
  if (!description) return { kind: "skip", reason: "description" };

  let amountCents: number;
  try {
    amountCents = parseAmountToCents(amountRaw);
  } catch {
    return { kind: "skip", reason: "amount" };
  }

  return {
    kind: "record",
    record: Object.freeze({
      pageKey,
      transactionDate,
      postingDate,
      description,
      amountCents,
    }),
  };
}

export function parsePageDetailed(extraction: RawExtraction): PageParseResult {
  const skipped = emptySkipCounts();
  if (!extraction.text.trim()) {
    return { records: [], sentinel: false, skipped };
  }
  if (isNoTransactionsSentinel(extraction.text)) {
    return { records: [], sentinel: true, skipped };
  }

  const pageKey = Object.freeze({ ...extraction.pageKey });
  const records: TransactionRecord[] = [];

  for (const rawLine of extraction.text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const outcome = parseLine(line, pageKey);
    if (outcome.kind === "record") {
      records.push(outcome.record);
    } else {
      skipped[outcome.reason] += 1;
    }
  }

  return { records, sentinel: false, skipped };
}

export function parsePageText(extraction: RawExtraction): TransactionRecord[] {
  return parsePageDetailed(extraction).records;
}
