import type { PageKey, RawExtraction } from "../parsers";

export type VisionRequest = {
  imagePath: string;
  instruction: string;
  model: string;
  signal: AbortSignal;
};

export interface VisionAdapter {
  name: string;
  extract: (request: VisionRequest) => Promise<string>;
}

export type ExtractionFailureReason = "timeout" | "exit" | "error" | "aborted";

export type ExtractionFailure = {
  pageKey: PageKey;
  fileName: string;
  reason: ExtractionFailureReason;
  message: string;
};

export type ExtractionResult =
  | { ok: true; extraction: RawExtraction }
  | { ok: false; failure: ExtractionFailure };
