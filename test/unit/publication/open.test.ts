import { describe, test, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { InMemoryFetcher } from "../../../src/fetcher/memory.ts";
import { MEDIA_TYPES } from "../../../src/media-type.ts";
import { fileAsset } from "../../../src/publication/asset.ts";
import { openPublication, parsePublication } from "../../../src/publication/open.ts";
import { ArchiveError, NoBitmapError, UnsupportedFormatError } from "../../../src/utils/errors.ts";
import { minimalEpub3, zipBuffer } from "../../helpers/epub.ts";
import { mockLogger, runTest, runTestFailure } from "../../helpers/layers.ts";

const TEST_DIR = join(tmpdir(), `webpub-open-test-${Date.now()}`);

describe("publication/open", () => {
  beforeAll(async () => {
    await mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  beforeEach(() => {
    mockLogger.reset();
  });

  describe("fileAsset", () => {
    test("derives the media type from the extension", () => {
      expect(fileAsset("/books/Some Book.EPUB")).toEqual({ name: "Some Book.EPUB", mediaType: MEDIA_TYPES.epub });
      expect(fileAsset("/books/comic.cbz")).toEqual({ name: "comic.cbz", mediaType: MEDIA_TYPES.cbz });
      expect(fileAsset("/books/unknown.bin")).toEqual({ name: "unknown.bin", mediaType: "application/octet-stream" });
    });

    test("keeps an explicit media type", () => {
      expect(fileAsset("/books/book", MEDIA_TYPES.epub).mediaType).toBe(MEDIA_TYPES.epub);
    });
  });

  describe("parsePublication", () => {
    test("hands an EPUB to the EPUB parser", async () => {
      const publication = await runTest(
        parsePublication({ name: "book.epub", mediaType: MEDIA_TYPES.epub }, new InMemoryFetcher(minimalEpub3())),
      );

      expect(publication.manifest.metadata.title).toEqual({ translations: { und: "Test Book" } });
      expect(mockLogger.infoCalls).toEqual([
        { tag: "Publication", msg: "Parsed book.epub", ctx: { parser: "epub", media_type: MEDIA_TYPES.epub } },
      ]);
    });

    test("falls through to the image parser", async () => {
      const publication = await runTest(
        parsePublication({ name: "pages.zip", mediaType: MEDIA_TYPES.zip }, new InMemoryFetcher({ "01.png": "1" })),
      );

      expect(publication.manifest.readingOrder.map((link) => link.href)).toEqual(["01.png"]);
      expect(mockLogger.infoCalls[0]?.ctx?.parser).toBe("image");
    });

    test("fails when no parser accepts the asset", async () => {
      const error = await runTestFailure(
        parsePublication({ name: "doc.pdf", mediaType: "application/pdf" }, new InMemoryFetcher({ "doc.pdf": "%PDF" })),
      );

      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error.message).toBe("No parser accepts application/pdf");
    });

    test("propagates a parser's hard error", async () => {
      const error = await runTestFailure(
        parsePublication({ name: "empty.cbz", mediaType: MEDIA_TYPES.cbz }, new InMemoryFetcher({ "info.txt": "x" })),
      );

      expect(error).toBeInstanceOf(NoBitmapError);
    });

    test("uses the given parsers only", async () => {
      const error = await runTestFailure(
        parsePublication({ name: "pages.zip", mediaType: MEDIA_TYPES.zip }, new InMemoryFetcher({ "01.png": "1" }), []),
      );

      expect(error).toBeInstanceOf(UnsupportedFormatError);
    });
  });

  describe("openPublication", () => {
    test("opens an EPUB file", async () => {
      const path = join(TEST_DIR, "book.epub");
      await writeFile(path, zipBuffer(minimalEpub3()));

      const publication = await runTest(openPublication(path));

      expect(publication.manifest.readingOrder.map((link) => link.href)).toEqual([
        "OEBPS/chapter1.xhtml",
        "OEBPS/chapter2.xhtml",
      ]);
      publication.close();
    });

    test("opens a comic archive", async () => {
      const path = join(TEST_DIR, "Issue 1.cbz");
      await writeFile(path, zipBuffer({ "p2.jpg": "2", "p1.jpg": "1" }));

      const publication = await runTest(openPublication(path));

      expect(publication.manifest.metadata.title).toEqual({ translations: { und: "Issue 1.cbz" } });
      expect(publication.manifest.readingOrder.map((link) => link.href)).toEqual(["p1.jpg", "p2.jpg"]);
    });

    test("fails for a file that is not a ZIP archive", async () => {
      const path = join(TEST_DIR, "plain.epub");
      await writeFile(path, "not an archive");

      const error = await runTestFailure(openPublication(path));

      expect(error).toBeInstanceOf(ArchiveError);
      expect(error.message).toBe("Archive open (unknown archive) failed");
    });

    test("fails for a missing file", async () => {
      const error = await runTestFailure(openPublication(join(TEST_DIR, "missing.epub")));

      expect(error).toBeInstanceOf(ArchiveError);
      expect(error.message).toBe("Archive read failed");
    });
  });
});
