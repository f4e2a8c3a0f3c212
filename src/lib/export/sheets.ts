import ExcelJS from "exceljs";
import type { ClassifiedRecord } from "../classifier";
import { formatCents } from "../parsers/utils";
import { writeCsvBuffer } from "./csv";

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export const SHEETS_HEADERS = [
  "วันที่",
  "month(hide)",
  "รายการ",
  "ราคา",
  "จำนวน",
  "รวม",
] as const;

export type SheetsRow = {
  date: string;
  month: string;
  item: string;
  priceCents: number;
  quantity: number;
  totalCents: number;
};

function dateSortKey(date: string): number {
  const [day, month, year] = date.split("/").map(Number);
  return (2000 + year) * 10000 + month * 100 + day;
}

export function monthName(date: string): string {
  const month = Number(date.split("/")[1]);
  return MONTH_NAMES[month - 1] ?? "";
}

export function toSheetsRows(
  records: readonly ClassifiedRecord[],
  labelFor: (category: string) => string
): SheetsRow[] {
  return [...records]
    .sort(
      (a, b) =>
        dateSortKey(a.transactionDate) - dateSortKey(b.transactionDate)
    )
    .map((record) => ({
      date: record.transactionDate,
      month: monthName(record.transactionDate),
      item: labelFor(record.category),
      priceCents: record.amountCents,
      quantity: 1,
      totalCents: record.amountCents,
    }));
}

export async function buildSheetsWorkbook(rows: SheetsRow[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("AI Spend");

  worksheet.columns = [
    { header: SHEETS_HEADERS[0], key: "date", width: 12 },
    { header: SHEETS_HEADERS[1], key: "month", width: 12, hidden: true },
    { header: SHEETS_HEADERS[2], key: "item", width: 28 },
    { header: SHEETS_HEADERS[3], key: "price", width: 14 },
    { header: SHEETS_HEADERS[4], key: "quantity", width: 10 },
    { header: SHEETS_HEADERS[5], key: "total", width: 14 },
  ];

  worksheet.getColumn("price").numFmt = "0.00";
  worksheet.getColumn("total").numFmt = "0.00";

  for (const row of rows) {
    worksheet.addRow({
      date: row.date,
      month: row.month,
      item: row.item,
      price: row.priceCents / 100,
      quantity: row.quantity,
      total: row.totalCents / 100,
    });
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export function buildSheetsCsv(rows: SheetsRow[]): Promise<Buffer> {
  return writeCsvBuffer(
    [
      [...SHEETS_HEADERS],
      ...rows.map((row) => [
        row.date,
        row.month,
        row.item,
        formatCents(row.priceCents),
        row.quantity,
        formatCents(row.totalCents),
      ]),
    ],
    { bom: true }
  );
}
