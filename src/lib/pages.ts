import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { NoInputError, errorMessage } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import type { PageKey } from "./parsers";

export type PageImage = {
  key: PageKey;
  fileName: string;
  path: string;
};

const PAGE_NAME_REGEX = /^(.+)_page_(\d+)$/;
const IMAGE_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".webp",
  ".gif",
  ".bmp",
  ".tif",
  ".tiff",
]);

export function derivePageKey(fileName: string): PageKey {
  const base = path.basename(fileName);
  const extension = path.extname(base);
  const stem = extension ? base.slice(0, -extension.length) : base;
  const match = stem.match(PAGE_NAME_REGEX);
  if (match) {
    const pageNumber = Number(match[2]);
    if (Number.isSafeInteger(pageNumber) && pageNumber > 0) {
      return Object.freeze({ documentId: match[1], pageNumber });
    }
  }
  return Object.freeze({ documentId: stem, pageNumber: 1 });
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function comparePageKeys(a: PageKey, b: PageKey): number {
  return (
    compareText(a.documentId, b.documentId) || a.pageNumber - b.pageNumber
  );
}

export function formatPageKey(key: PageKey): string {
  return `${key.documentId}#${key.pageNumber}`;
}

export function isPageImage(fileName: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

export function sortPageImages(images: PageImage[]): PageImage[] {
  return [...images].sort(
    (a, b) =>
      comparePageKeys(a.key, b.key) || compareText(a.fileName, b.fileName)
  );
}

function warnSharedKeys(images: readonly PageImage[], logger: Logger): void {
  const byKey = new Map<string, string[]>();
  for (const image of images) {
    const key = formatPageKey(image.key);
    byKey.set(key, [...(byKey.get(key) ?? []), image.fileName]);
  }
  for (const [key, fileNames] of byKey) {
    if (fileNames.length > 1) {
      logger.warn(`[pages] ${fileNames.join(", ")} share page key ${key}`);
    }
  }
}

export async function listPageImages(
  directory: string,
  logger: Logger = silentLogger
): Promise<PageImage[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new NoInputError(directory, errorMessage(error));
  }

  const images = entries
    .filter((entry) => entry.isFile() && isPageImage(entry.name))
    .map((entry) => ({
      key: derivePageKey(entry.name),
      fileName: entry.name,
      path: path.join(directory, entry.name),
    }));

  if (images.length === 0) {
    throw new NoInputError(directory);
  }
  const sorted = sortPageImages(images);
  warnSharedKeys(sorted, logger);
  return sorted;
}
