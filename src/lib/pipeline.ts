import { aggregate } from "./aggregate";
import type { AggregateReport } from "./aggregate";
import { classifyLedger } from "./classifier";
import type { Classification, CompiledRule } from "./classifier";
import type { LedgerMode } from "./config";
import {
  EXTRACTION_INSTRUCTION,
  Throttle,
  extractPage,
} from "./extraction";
import type {
  ExtractionFailure,
  ExtractionResult,
  VisionAdapter,
} from "./extraction";
import { Ledger, buildLedger } from "./ledger";
import type { PageRecords } from "./ledger";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { formatPageKey, listPageImages } from "./pages";
import { parsePageDetailed } from "./parsers";
import { mapPool } from "./pool";

export type RunOptions = {
  inputDir: string;
  adapter: VisionAdapter;
  model: string;
  rules: readonly CompiledRule[];
  mode?: LedgerMode;
  timeoutMs?: number;
  minIntervalMs?: number;
  concurrency?: number;
  instruction?: string;
  ledger?: Ledger;
  throttle?: Pick<Throttle, "wait">;
  logger?: Logger;
  signal?: AbortSignal;
};

export type RunReport = {
  pagesFound: number;
  pagesProcessed: number;
  pagesWithoutRecords: number;
  pagesFailed: number;
  warnings: ExtractionFailure[];
  recordsParsed: number;
  recordsClassified: number;
  recordsExcludedBySign: number;
  recordsIncluded: number;
  recordsUnmatched: number;
  documentsCommitted: string[];
  documentsSkipped: string[];
  ledgerSize: number;
  aborted: boolean;
};

export type RunResult = {
  report: RunReport;
  ledger: Ledger;
  classification: Classification;
  summary: AggregateReport;
};

function isCompleted(result: ExtractionResult): boolean {
  return result.ok || result.failure.reason !== "aborted";
}

export async function runPipeline(options: RunOptions): Promise<RunResult> {
  const logger = options.logger ?? silentLogger;
  const mode = options.mode ?? "rebuild";
  const ledger = options.ledger ?? new Ledger();
  const throttle = options.throttle ?? new Throttle(options.minIntervalMs ?? 1000);
  const instruction = options.instruction ?? EXTRACTION_INSTRUCTION;
  const timeoutMs = options.timeoutMs ?? 120_000;

  const images = await listPageImages(options.inputDir, logger);
  logger.info(`[pages] Found ${images.length} page image(s) in ${options.inputDir}`);

  const results = await mapPool(
    images,
    options.concurrency ?? 1,
    async (image, index) => {
      await throttle.wait();
      logger.info(`[extract] [${index + 1}/${images.length}] ${image.fileName}`);
      return extractPage(options.adapter, image, {
        instruction,
        model: options.model,
        timeoutMs,
        signal: options.signal,
      });
    },
    options.signal
  );

  const report: RunReport = {
    pagesFound: images.length,
    pagesProcessed: 0,
    pagesWithoutRecords: 0,
    pagesFailed: 0,
    warnings: [],
    recordsParsed: 0,
    recordsClassified: 0,
    recordsExcludedBySign: 0,
    recordsIncluded: 0,
    recordsUnmatched: 0,
    documentsCommitted: [],
    documentsSkipped: [],
    ledgerSize: 0,
    aborted: options.signal?.aborted ?? false,
  };

  const pagesByDocument = new Map<string, PageRecords[]>();
  const incompleteDocuments = new Set<string>();

  for (const [index, image] of images.entries()) {
    const result = results[index];
    const documentId = image.key.documentId;
    if (!result || !isCompleted(result)) {
      incompleteDocuments.add(documentId);
      continue;
    }
    report.pagesProcessed += 1;
    const pages = pagesByDocument.get(documentId) ?? [];
    pagesByDocument.set(documentId, pages);

    if (!result.ok) {
      report.pagesFailed += 1;
      report.warnings.push(result.failure);
      logger.warn(
        `[extract] ${image.fileName} failed (${result.failure.reason}): ${result.failure.message}`
      );
      continue;
    }

    const parsed = parsePageDetailed(result.extraction);
    logger.debug(
      `[parse] ${formatPageKey(image.key)} skipped lines`,
      parsed.skipped
    );
    if (parsed.records.length === 0) {
      report.pagesWithoutRecords += 1;
      logger.info(`[extract] ${image.fileName}: no transactions`);
    } else {
      logger.info(
        `[extract] ${image.fileName}: ${parsed.records.length} transaction(s)`
      );
    }
    report.recordsParsed += parsed.records.length;
    pages.push({ pageKey: image.key, records: parsed.records });
  }

  for (const [documentId, pages] of pagesByDocument) {
    if (incompleteDocuments.has(documentId)) continue;
    ledger.commit(mode, documentId, buildLedger(pages));
    report.documentsCommitted.push(documentId);
  }
  report.documentsSkipped = [...incompleteDocuments];
  if (report.documentsSkipped.length > 0) {
    logger.warn(
      `[ledger] Left unchanged after abort: ${report.documentsSkipped.join(", ")}`
    );
  }
  report.ledgerSize = ledger.size;
  logger.info(
    `[ledger] ${ledger.size} record(s) across ${ledger.documentIds().length} document(s)`
  );

  const classification = classifyLedger(ledger.records, options.rules);
  report.recordsClassified =
    classification.included.length + classification.excludedBySign.length;
  report.recordsExcludedBySign = classification.excludedBySign.length;
  report.recordsIncluded = classification.included.length;
  report.recordsUnmatched = classification.unmatched.length;

  return {
    report,
    ledger,
    classification,
    summary: aggregate(classification.included),
  };
}

export function formatRunReport(report: RunReport): string {
  const lines = [
    `Pages processed:         ${report.pagesProcessed}/${report.pagesFound}`,
    `Pages with no records:   ${report.pagesWithoutRecords}`,
    `Pages failed:            ${report.pagesFailed}`,
    `Records parsed:          ${report.recordsParsed}`,
    `Records classified:      ${report.recordsClassified}`,
    `Excluded by sign:        ${report.recordsExcludedBySign}`,
    `Included in report:      ${report.recordsIncluded}`,
    `Ledger size:             ${report.ledgerSize}`,
  ];
  for (const warning of report.warnings) {
    lines.push(
      `WARNING ${formatPageKey(warning.pageKey)} (${warning.fileName}): ${warning.reason} - ${warning.message}`
    );
  }
  if (report.aborted) {
    lines.push("Run aborted before all pages were processed.");
  }
  return lines.join("\n");
}
