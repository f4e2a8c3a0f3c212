import { access, mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";
import { LEDGER_COLUMNS, toLedgerCsv } from "./export/csv";
import { Ledger } from "./ledger";
import type { TransactionRecord } from "./parsers";
import { isShortDate, parseAmountToCents } from "./parsers/utils";

export type LoadedLedger = {
  ledger: Ledger;
  skippedRows: number;
};

function cellText(value: CellValue): string {
  if (value === null || value === undefined) return "";
  return typeof value === "string" ? value : String(value);
}

function rowToRecord(cells: string[]): TransactionRecord | null {
  const [documentId, pageRaw, transactionDate, postingDate, description, amountRaw] =
    cells.map((cell) => cell.trim());
  const pageNumber = Number(pageRaw);
  if (!documentId || !Number.isSafeInteger(pageNumber) || pageNumber < 1) {
    return null;
  }
  if (!isShortDate(transactionDate) || !isShortDate(postingDate)) return null;
  if (!description) return null;
  let amountCents: number;
  try {
    amountCents = parseAmountToCents(amountRaw);
  } catch {
    return null;
  }
  return Object.freeze({
    pageKey: Object.freeze({ documentId, pageNumber }),
    transactionDate,
    postingDate,
    description,
    amountCents,
  });
}

async function fileExists(filePath: string): Promise<boolean> {
  return access(filePath).then(
    () => true,
    () => false
  );
}

export async function loadLedger(filePath: string): Promise<LoadedLedger> {
  if (!(await fileExists(filePath))) {
    return { ledger: new Ledger(), skippedRows: 0 };
  }

  const workbook = new ExcelJS.Workbook();
  const worksheet = await workbook.csv.readFile(filePath, {
    map: (value: string) => value,
  });

  const records: TransactionRecord[] = [];
  let skippedRows = 0;
  worksheet.eachRow((row, rowNumber) => {
    const cells = LEDGER_COLUMNS.map((_, index) =>
      cellText(row.getCell(index + 1).value)
    );
    if (rowNumber === 1) {
      if (cells.join(",") !== LEDGER_COLUMNS.join(",")) {
        throw new Error(`Unrecognized ledger header in ${filePath}`);
      }
      return;
    }
    const record = rowToRecord(cells);
    if (record) {
      records.push(record);
    } else {
      skippedRows += 1;
    }
  });

  return { ledger: new Ledger(records), skippedRows };
}

// Written to a sibling temp file first so a crash never leaves half a ledger.
export async function saveLedger(
  filePath: string,
  records: readonly TransactionRecord[]
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, await toLedgerCsv(records));
  await rename(tempPath, filePath);
}
