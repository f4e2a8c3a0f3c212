import { describe, expect, it } from "vitest";
import {
  isNoTransactionsSentinel,
  parsePageDetailed,
  parsePageText,
} from "@/lib/parsers";
import type { RawExtraction } from "@/lib/parsers";

const pageKey = { documentId: "2024-01-31", pageNumber: 1 };

function extraction(text: string): RawExtraction {
  return { pageKey, text };
}

describe("parsePageText", () => {
  it("parses pipe-delimited transaction lines in order", () => {
    const records = parsePageText(
      extraction(
        [
          "Here are the transactions:",
          "07/01/25|07/01/25|Payment-KTB Internet|-8,851.33",
          "18/12/24 | 20/12/24 |  SHOPEE BANGKOK TH  | 199.00 ",
        ].join("\n")
      )
    );

    expect(records).toEqual([
      {
        pageKey,
        transactionDate: "07/01/25",
        postingDate: "07/01/25",
        description: "Payment-KTB Internet",
        amountCents: -885133,
      },
      {
        pageKey,
        transactionDate: "18/12/24",
        postingDate: "20/12/24",
        description: "SHOPEE BANGKOK TH",
        amountCents: 19900,
      },
    ]);
  });

  it("treats the sentinel as an empty page", () => {
    expect(parsePageText(extraction("NO_TRANSACTIONS"))).toEqual([]);
    expect(parsePageText(extraction("  no_transactions \n"))).toEqual([]);
    expect(parsePageText(extraction("```\nNO_TRANSACTIONS\n```"))).toEqual([]);
  });

  it("returns no records for empty text", () => {
    expect(parsePageText(extraction(""))).toEqual([]);
    expect(parsePageText(extraction("   \n  "))).toEqual([]);
  });

  it("discards a line that does not start with a date", () => {
    expect(parsePageText(extraction("not a date|x|y|z"))).toEqual([]);
  });

  it("requires exactly four fields", () => {
    const text = [
      "15/01/24|16/01/24|ONLY THREE",
      "15/01/24|16/01/24|TOO|MANY|1.00",
      "15/01/24|16/01/24|JUST RIGHT|1.00",
    ].join("\n");
    const records = parsePageText(extraction(text));
    expect(records.map((record) => record.description)).toEqual(["JUST RIGHT"]);
  });

  it("skips lines with a bad amount, posting date or description", () => {
    const result = parsePageDetailed(
      extraction(
        [
          "15/01/24|16/01/24|SHOP|abc",
          "15/01/24|16-01-24|SHOP|10.00",
          "15/01/24|16/01/24|   |10.00",
          "| 15/01/24 | 16/01/24 | TABLE | 10.00 |",
          "15/01/24|16/01/24|KEPT|10.00",
        ].join("\n")
      )
    );

    expect(result.records).toHaveLength(1);
    expect(result.skipped).toEqual({
      pattern: 1,
      "posting-date": 1,
      description: 1,
      amount: 1,
    });
  });

  it("does not validate calendar ranges", () => {
    const [record] = parsePageText(extraction("45/13/24|45/13/24|ODD DATE|1.00"));
    expect(record.transactionDate).toBe("45/13/24");
  });

  it("yields identical records when parsing the same text twice", () => {
    const text = "15/01/24|16/01/24|OPENROUTER AI SERVICES|120.50\n16/01/24|17/01/24|GRAB|-3.00";
    expect(parsePageText(extraction(text))).toEqual(parsePageText(extraction(text)));
    expect(JSON.stringify(parsePageText(extraction(text)))).toBe(
      JSON.stringify(parsePageText(extraction(text)))
    );
  });

  it("freezes emitted records", () => {
    const [record] = parsePageText(extraction("15/01/24|16/01/24|SHOP|1.00"));
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.pageKey)).toBe(true);
  });
});

describe("isNoTransactionsSentinel", () => {
  it("only matches the whole text", () => {
    expect(isNoTransactionsSentinel("NO _ TRANSACTIONS")).toBe(true);
    expect(isNoTransactionsSentinel("NO_TRANSACTIONS on this page")).toBe(false);
  });
});
