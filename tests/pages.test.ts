import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { NoInputError } from "@/lib/errors";
import {
  comparePageKeys,
  derivePageKey,
  isPageImage,
  listPageImages,
} from "@/lib/pages";
import {
  makeTempDir,
  recordingLogger,
  removeDir,
  writePages,
} from "./helpers/fixtures";

describe("derivePageKey", () => {
  it("reads document id and page number from the file name", () => {
    expect(derivePageKey("2024-01-31_page_2.jpg")).toEqual({
      documentId: "2024-01-31",
      pageNumber: 2,
    });
    expect(derivePageKey("/scans/ktc_statement_page_10.PNG")).toEqual({
      documentId: "ktc_statement",
      pageNumber: 10,
    });
  });

  it("falls back to the file stem and page 1", () => {
    expect(derivePageKey("receipt.jpg")).toEqual({
      documentId: "receipt",
      pageNumber: 1,
    });
    expect(derivePageKey("scan_page_0.jpg")).toEqual({
      documentId: "scan_page_0",
      pageNumber: 1,
    });
    expect(derivePageKey("scan_page_x.jpg")).toEqual({
      documentId: "scan_page_x",
      pageNumber: 1,
    });
  });

  it("is deterministic for the same file name", () => {
    expect(derivePageKey("2025-05-01_page_3.jpeg")).toEqual(
      derivePageKey("2025-05-01_page_3.jpeg")
    );
  });
});

describe("comparePageKeys", () => {
  it("orders by document id then numeric page", () => {
    const keys = [
      { documentId: "b", pageNumber: 1 },
      { documentId: "a", pageNumber: 10 },
      { documentId: "a", pageNumber: 2 },
    ];
    expect([...keys].sort(comparePageKeys)).toEqual([
      { documentId: "a", pageNumber: 2 },
      { documentId: "a", pageNumber: 10 },
      { documentId: "b", pageNumber: 1 },
    ]);
  });
});

describe("isPageImage", () => {
  it("accepts common raster extensions", () => {
    expect(isPageImage("a.JPG")).toBe(true);
    expect(isPageImage("a.webp")).toBe(true);
    expect(isPageImage("a.pdf")).toBe(false);
    expect(isPageImage("notes.txt")).toBe(false);
  });
});

describe("listPageImages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("lists images sorted by page key", async () => {
    await writePages(dir, [
      "2024-02-29_page_1.jpg",
      "2024-01-31_page_10.jpg",
      "2024-01-31_page_2.jpg",
      "notes.txt",
    ]);
    await mkdir(path.join(dir, "nested_page_1.jpg"));

    const images = await listPageImages(dir);

    expect(images.map((image) => image.fileName)).toEqual([
      "2024-01-31_page_2.jpg",
      "2024-01-31_page_10.jpg",
      "2024-02-29_page_1.jpg",
    ]);
    expect(images[0].path).toBe(path.join(dir, "2024-01-31_page_2.jpg"));
  });

  it("warns when two images map to the same page key", async () => {
    await writePages(dir, ["x_page_1.jpg", "x_page_01.png", "y_page_1.jpg"]);
    const logger = recordingLogger();

    const images = await listPageImages(dir, logger);

    expect(images.map((image) => image.fileName)).toEqual([
      "x_page_01.png",
      "x_page_1.jpg",
      "y_page_1.jpg",
    ]);
    expect(logger.warnings).toEqual([
      "[pages] x_page_01.png, x_page_1.jpg share page key x#1",
    ]);
  });

  it("throws NoInputError when no page images exist", async () => {
    await writePages(dir, ["readme.md"]);
    await expect(listPageImages(dir)).rejects.toBeInstanceOf(NoInputError);
  });

  it("throws NoInputError for a missing directory", async () => {
    await expect(
      listPageImages(path.join(dir, "missing"))
    ).rejects.toBeInstanceOf(NoInputError);
  });
});
