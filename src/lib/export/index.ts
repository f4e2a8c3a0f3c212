import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { categoryLabel } from "../classifier";
import type { CompiledRule } from "../classifier";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { RunResult } from "../pipeline";
import { toLedgerCsv } from "./csv";
import { buildSheetsCsv, buildSheetsWorkbook, toSheetsRows } from "./sheets";
import { formatSummary } from "./summary";

export const OUTPUT_FILES = {
  ledger: "all_transactions.csv",
  classified: "ai_transactions.csv",
  sheetsWorkbook: "ai_transactions_for_sheets.xlsx",
  sheetsCsv: "ai_transactions_for_sheets.csv",
  summary: "summary.txt",
  report: "run-report.json",
} as const;

export type ExportOptions = {
  outputDir: string;
  currency: string;
  rules: readonly CompiledRule[];
  logger?: Logger;
};

export type ExportedFiles = Record<
  Exclude<keyof typeof OUTPUT_FILES, "ledger">,
  string
>;

export async function writeOutputs(
  result: RunResult,
  options: ExportOptions
): Promise<ExportedFiles> {
  const logger = options.logger ?? silentLogger;
  const labelFor = (category: string) => categoryLabel(category, options.rules);
  const target = (name: string) => path.join(options.outputDir, name);
  await mkdir(options.outputDir, { recursive: true });

  const files: ExportedFiles = {
    classified: target(OUTPUT_FILES.classified),
    sheetsWorkbook: target(OUTPUT_FILES.sheetsWorkbook),
    sheetsCsv: target(OUTPUT_FILES.sheetsCsv),
    summary: target(OUTPUT_FILES.summary),
    report: target(OUTPUT_FILES.report),
  };

  const sheetsRows = toSheetsRows(result.classification.included, labelFor);
  await writeFile(
    files.classified,
    await toLedgerCsv(result.classification.included)
  );
  await writeFile(files.sheetsWorkbook, await buildSheetsWorkbook(sheetsRows));
  await writeFile(files.sheetsCsv, await buildSheetsCsv(sheetsRows));
  await writeFile(
    files.summary,
    formatSummary(result.summary, options.currency, labelFor)
  );
  await writeFile(files.report, `${JSON.stringify(result.report, null, 2)}\n`);

  logger.info(
    `[export] Wrote ${result.classification.included.length} AI transaction(s) to ${files.classified}`
  );
  return files;
}

export { LEDGER_COLUMNS, toLedgerCsv, writeCsvBuffer } from "./csv";
export { SHEETS_HEADERS, buildSheetsCsv, buildSheetsWorkbook, toSheetsRows } from "./sheets";
export { formatSummary } from "./summary";
