export class NoInputError extends Error {
  readonly directory: string;

  constructor(directory: string, detail?: string) {
    super(
      detail
        ? `No page images found in ${directory}: ${detail}`
        : `No page images found in ${directory}`
    );
    this.name = "NoInputError";
    this.directory = directory;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
