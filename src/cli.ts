import path from "node:path";
import { parseArgs } from "node:util";
import { loadRules, categoryLabel } from "./lib/classifier";
import { loadConfig } from "./lib/config";
import type { EnvSource } from "./lib/config";
import { ConfigError, NoInputError, errorMessage } from "./lib/errors";
import { OUTPUT_FILES, formatSummary, writeOutputs } from "./lib/export";
import { createVisionAdapter } from "./lib/extraction";
import type { VisionAdapter } from "./lib/extraction";
import { loadLedger, saveLedger } from "./lib/ledger-store";
import { createLogger } from "./lib/logger";
import { formatRunReport, runPipeline } from "./lib/pipeline";

const USAGE = `Usage: statement-spend <image-dir> [options]

Reads statement page images named <documentId>_page_<n>.<ext>, extracts
transactions with a vision model and reports spend per AI/cloud vendor.

Options:
  --out <dir>          output directory (OUTPUT_DIR, default workflow_output)
  --mode <mode>        rebuild | append (LEDGER_MODE, default rebuild)
  --provider <name>    command | openai (EXTRACTION_PROVIDER)
  --model <id>         model identifier passed to the provider (EXTRACTION_MODEL)
  --concurrency <n>    parallel extraction calls (EXTRACTION_CONCURRENCY)
  --rules <file>       vendor rule file (RULES_PATH)
  --currency <code>    currency shown in the summary (CURRENCY, default THB)
  -h, --help           show this message`;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string" },
      mode: { type: "string" },
      provider: { type: "string" },
      model: { type: "string" },
      concurrency: { type: "string" },
      rules: { type: "string" },
      currency: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export type MainOptions = {
  env?: EnvSource;
  adapter?: VisionAdapter;
  signal?: AbortSignal;
};

export async function main(
  argv: string[],
  options: MainOptions = {}
): Promise<number> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    console.error(USAGE);
    return 2;
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.warn("\n[run] Interrupt received, finishing in-flight pages...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  const onExternalAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const config = loadConfig(options.env ?? {}, {
      OUTPUT_DIR: values.out,
      LEDGER_MODE: values.mode,
      EXTRACTION_PROVIDER: values.provider,
      EXTRACTION_MODEL: values.model,
      EXTRACTION_CONCURRENCY: values.concurrency,
      RULES_PATH: values.rules,
      CURRENCY: values.currency,
    });
    const logger = createLogger(config.logLevel);
    const rules = await loadRules(config.rulesPath);
    const adapter = options.adapter ?? createVisionAdapter(config.extraction);

    const ledgerPath = path.join(config.outputDir, OUTPUT_FILES.ledger);
    const { ledger, skippedRows } = await loadLedger(ledgerPath);
    if (skippedRows > 0) {
      logger.warn(`[ledger] Ignored ${skippedRows} unreadable row(s) in ${ledgerPath}`);
    }
    logger.info(
      `[ledger] Loaded ${ledger.size} record(s), mode ${config.ledgerMode}, adapter ${adapter.name}`
    );

    const result = await runPipeline({
      inputDir: positionals[0],
      adapter,
      model: config.extraction.model,
      rules,
      mode: config.ledgerMode,
      timeoutMs: config.extraction.timeoutMs,
      minIntervalMs: config.extraction.minIntervalMs,
      concurrency: config.extraction.concurrency,
      ledger,
      logger,
      signal: controller.signal,
    });

    await saveLedger(ledgerPath, result.ledger.records);
    const files = await writeOutputs(result, {
      outputDir: config.outputDir,
      currency: config.currency,
      rules,
      logger,
    });

    console.log("");
    console.log(
      formatSummary(result.summary, config.currency, (category) =>
        categoryLabel(category, rules)
      )
    );
    console.log(formatRunReport(result.report));
    console.log("");
    console.log(`Output file: ${files.classified}`);
    console.log(`Sheets import: ${files.sheetsWorkbook}`);
    return result.report.aborted ? 130 : 0;
  } catch (error) {
    if (error instanceof NoInputError) {
      console.error(`[ERROR] ${error.message}`);
      return 1;
    }
    if (error instanceof ConfigError) {
      console.error(`[ERROR] ${error.message}`);
      return 2;
    }
    console.error("[ERROR] Unexpected failure", error);
    return 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
    options.signal?.removeEventListener("abort", onExternalAbort);
  }
}
