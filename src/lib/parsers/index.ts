export {
  NO_TRANSACTIONS_SENTINEL,
  isNoTransactionsSentinel,
  parsePageDetailed,
  parsePageText,
} from "./pipe-lines";
export type {
  PageKey,
  PageParseResult,
  RawExtraction,
  SkipReason,
  TransactionRecord,
} from "./types";
