import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";

export const envSchema = z
  .object({
    EXTRACTION_PROVIDER: z.enum(["command", "openai"]).default("command"),
    EXTRACTION_COMMAND: z.string().default("opencode"),
    EXTRACTION_MODEL: z.string().default("kimi-for-coding/k2p5"),
    EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    EXTRACTION_MIN_INTERVAL_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(1000),
    EXTRACTION_CONCURRENCY: z.coerce.number().int().positive().default(1),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    OUTPUT_DIR: z.string().default("workflow_output"),
    LEDGER_MODE: z.enum(["rebuild", "append"]).default("rebuild"),
    RULES_PATH: z.string().optional(),
    CURRENCY: z.string().default("THB"),
    LOG_LEVEL: z
      .enum(["debug", "info", "warn", "error", "silent"])
      .default("info"),
  })
  .superRefine((value, ctx) => {
    if (value.EXTRACTION_PROVIDER === "openai" && !value.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "required when EXTRACTION_PROVIDER is openai",
      });
    }
  });

export type ExtractionProvider = "command" | "openai";
export type LedgerMode = "rebuild" | "append";

export type AppConfig = {
  extraction: {
    provider: ExtractionProvider;
    command: string;
    model: string;
    timeoutMs: number;
    minIntervalMs: number;
    concurrency: number;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
  };
  outputDir: string;
  ledgerMode: LedgerMode;
  rulesPath?: string;
  currency: string;
  logLevel: LogLevel;
};

export type EnvSource = Record<string, string | undefined>;

export function parseConfig(source: EnvSource): AppConfig {
  // Blank entries in .env mean "unset".
  const present = Object.fromEntries(
    Object.entries(source).filter(
      ([, value]) => value !== undefined && value.trim() !== ""
    )
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const env = result.data;
  return {
    extraction: {
      provider: env.EXTRACTION_PROVIDER,
      command: env.EXTRACTION_COMMAND,
      model: env.EXTRACTION_MODEL,
      timeoutMs: env.EXTRACTION_TIMEOUT_MS,
      minIntervalMs: env.EXTRACTION_MIN_INTERVAL_MS,
      concurrency: env.EXTRACTION_CONCURRENCY,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL,
    },
    outputDir: env.OUTPUT_DIR,
    ledgerMode: env.LEDGER_MODE,
    rulesPath: env.RULES_PATH,
    currency: env.CURRENCY,
    logLevel: env.LOG_LEVEL,
  };
}

function definedEntries(source: EnvSource): EnvSource {
  return Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined)
  );
}

// Later layers win; an undefined entry never hides an earlier value.
export function loadConfig(...layers: EnvSource[]): AppConfig {
  dotenv.config();
  return parseConfig(
    layers.reduce<EnvSource>(
      (merged, layer) => ({ ...merged, ...definedEntries(layer) }),
      { ...process.env }
    )
  );
}
