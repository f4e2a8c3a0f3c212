export type PageKey = {
  documentId: string;
  pageNumber: number;
};

export type RawExtraction = {
  pageKey: PageKey;
  text: string;
};

export type TransactionRecord = {
  pageKey: PageKey;
  transactionDate: string;
  postingDate: string;
  description: string;
  // Signed, in minor units: positive is an expense, negative a credit.
  amountCents: number;
};

export type SkipReason =
  | "pattern"
  | "posting-date"
  | "description"
  | "amount";

export type PageParseResult = {
  records: TransactionRecord[];
  sentinel: boolean;
  skipped: Record<SkipReason, number>;
};
