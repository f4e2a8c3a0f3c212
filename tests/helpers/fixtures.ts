import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { VisionAdapter } from "@/lib/extraction";
import { silentLogger } from "@/lib/logger";
import type { Logger } from "@/lib/logger";

export async function makeTempDir(prefix = "statement-spend-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writePages(dir: string, names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(path.join(dir, name), "not really an image");
  }
}

// Answers from a table keyed by image file name; unknown pages throw.
export function fakeAdapter(
  answers: Record<string, string | Error>
): VisionAdapter & { calls: string[] } {
  const calls: string[] = [];
  return {
    name: "fake",
    calls,
    async extract({ imagePath }) {
      const fileName = path.basename(imagePath);
      calls.push(fileName);
      const answer = answers[fileName];
      if (answer === undefined) {
        throw new Error(`no answer for ${fileName}`);
      }
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

export const noWait = { wait: async () => undefined };

export function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    ...silentLogger,
    warnings,
    warn: (message) => {
      warnings.push(message);
    },
  };
}
