import { NO_TRANSACTIONS_SENTINEL } from "../parsers";

export const EXTRACTION_INSTRUCTION = [
  "Extract all transaction data from this credit card statement.",
  "Return in format: DATE|POSTING_DATE|DESCRIPTION|AMOUNT (one per line).",
  "Dates are DD/MM/YY. Amounts are plain numbers; credits and payments are negative.",
  `If no transactions, return ${NO_TRANSACTIONS_SENTINEL} only.`,
].join("\n");
