import { errorMessage } from "../errors";
import type { PageImage } from "../pages";
import { CommandFailedError } from "./command";
import type {
  ExtractionFailureReason,
  ExtractionResult,
  VisionAdapter,
} from "./types";

export type ExtractPageOptions = {
  instruction: string;
  model: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

function failureReason(
  error: unknown,
  timedOut: boolean,
  aborted: boolean
): ExtractionFailureReason {
  if (timedOut) return "timeout";
  if (aborted) return "aborted";
  if (error instanceof CommandFailedError && error.exitCode !== null) {
    return "exit";
  }
  return "error";
}

// Never rejects: every adapter problem becomes an ExtractionFailure value.
export async function extractPage(
  adapter: VisionAdapter,
  image: PageImage,
  options: ExtractPageOptions
): Promise<ExtractionResult> {
  const { instruction, model, timeoutMs, signal } = options;
  const controller = new AbortController();
  let timedOut = false;
  let rejectInterrupted: (error: Error) => void = () => undefined;
  const interrupted = new Promise<never>((_, reject) => {
    rejectInterrupted = reject;
  });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
    rejectInterrupted(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onAbort = () => {
    controller.abort();
    rejectInterrupted(new Error("aborted"));
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    if (signal?.aborted) {
      throw new Error("aborted");
    }
    const text = await Promise.race([
      adapter.extract({
        imagePath: image.path,
        instruction,
        model,
        signal: controller.signal,
      }),
      interrupted,
    ]);
    return { ok: true, extraction: { pageKey: image.key, text } };
  } catch (error) {
    return {
      ok: false,
      failure: {
        pageKey: image.key,
        fileName: image.fileName,
        reason: failureReason(error, timedOut, signal?.aborted ?? false),
        message: errorMessage(error),
      },
    };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
