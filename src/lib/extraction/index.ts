import type { AppConfig } from "../config";
import { ConfigError } from "../errors";
import { createCommandAdapter } from "./command";
import { createOpenAIAdapter } from "./openai";
import type { VisionAdapter } from "./types";

export function createVisionAdapter(
  extraction: AppConfig["extraction"]
): VisionAdapter {
  if (extraction.provider === "openai") {
    if (!extraction.openaiApiKey) {
      throw new ConfigError("OPENAI_API_KEY is required for the openai provider");
    }
    return createOpenAIAdapter({
      apiKey: extraction.openaiApiKey,
      baseURL: extraction.openaiBaseUrl,
    });
  }
  return createCommandAdapter(extraction.command);
}

export { EXTRACTION_INSTRUCTION } from "./prompt";
export { extractPage } from "./extract-page";
export type { ExtractPageOptions } from "./extract-page";
export { Throttle } from "./throttle";
export { buildCommandArgs, CommandFailedError, createCommandAdapter } from "./command";
export type {
  ExtractionFailure,
  ExtractionFailureReason,
  ExtractionResult,
  VisionAdapter,
  VisionRequest,
} from "./types";
