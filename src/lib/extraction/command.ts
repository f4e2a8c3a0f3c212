import { execFile } from "node:child_process";
import type { VisionAdapter, VisionRequest } from "./types";

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export class CommandFailedError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim().split(/\r?\n/).slice(-1)[0] ?? "";
    super(
      exitCode === null
        ? `${command} failed${detail ? `: ${detail}` : ""}`
        : `${command} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`
    );
    this.name = "CommandFailedError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function buildCommandArgs(
  request: Pick<VisionRequest, "imagePath" | "instruction" | "model">
): string[] {
  return [
    "run",
    request.instruction,
    "-m",
    request.model,
    "-f",
    request.imagePath.replace(/\\/g, "/"),
  ];
}

function runCommand(
  command: string,
  args: string[],
  signal: AbortSignal
): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { signal, maxBuffer: MAX_OUTPUT_BYTES, windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          const exitCode = typeof error.code === "number" ? error.code : null;
          reject(new CommandFailedError(command, exitCode, String(stderr)));
          return;
        }
        resolve(String(stdout));
      }
    );
  });
}

export function createCommandAdapter(command: string): VisionAdapter {
  return {
    name: `command:${command}`,
    async extract(request) {
      const stdout = await runCommand(
        command,
        buildCommandArgs(request),
        request.signal
      );
      return stdout.trim();
    },
  };
}
