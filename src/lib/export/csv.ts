import ExcelJS from "exceljs";
import type { TransactionRecord } from "../parsers";
import { formatCents } from "../parsers/utils";

export const LEDGER_COLUMNS = [
  "documentId",
  "pageNumber",
  "transactionDate",
  "postingDate",
  "description",
  "amount",
] as const;

export type CsvCell = string | number;

export async function writeCsvBuffer(
  rows: CsvCell[][],
  options: { bom?: boolean } = {}
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("data");
  for (const row of rows) {
    worksheet.addRow(row.map((cell) => String(cell)));
  }
  const output = await workbook.csv.writeBuffer({
    formatterOptions: {
      quoteColumns: true,
      quoteHeaders: true,
      writeBOM: options.bom ?? false,
    },
  });
  return Buffer.from(output);
}

export function ledgerRow(record: TransactionRecord): CsvCell[] {
  return [
    record.pageKey.documentId,
    record.pageKey.pageNumber,
    record.transactionDate,
    record.postingDate,
    record.description,
    formatCents(record.amountCents),
  ];
}

export function toLedgerCsv(
  records: readonly TransactionRecord[]
): Promise<Buffer> {
  return writeCsvBuffer([[...LEDGER_COLUMNS], ...records.map(ledgerRow)]);
}
