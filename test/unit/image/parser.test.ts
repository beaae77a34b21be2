import { describe, test, expect } from "vitest";
import { Effect } from "effect";
import { PROFILES, WEBPUB_CONTEXT } from "../../../src/constants.ts";
import { InMemoryFetcher } from "../../../src/fetcher/memory.ts";
import { createImageParser, acceptsImageArchive } from "../../../src/image/parser.ts";
import { MEDIA_TYPES } from "../../../src/media-type.ts";
import type { PublicationAsset } from "../../../src/publication/asset.ts";
import { NoBitmapError } from "../../../src/utils/errors.ts";
import { runTest, runTestFailure } from "../../helpers/layers.ts";

const zipAsset: PublicationAsset = { name: "comic.zip", mediaType: MEDIA_TYPES.zip };
const cbzAsset: PublicationAsset = { name: "comic.cbz", mediaType: MEDIA_TYPES.cbz };

describe("image/parser", () => {
  describe("acceptsImageArchive", () => {
    test("accepts comic book types unconditionally", () => {
      expect(acceptsImageArchive(cbzAsset, [{ href: "setup.exe" }])).toBe(true);
      expect(acceptsImageArchive({ name: "comic.cbr", mediaType: MEDIA_TYPES.cbr }, [{ href: "setup.exe" }])).toBe(true);
    });

    test("accepts bitmaps, metadata sidecars and hidden files", () => {
      const links = [
        { href: "001.png", type: "image/png" },
        { href: "ComicInfo.xml", type: "application/xml" },
        { href: "book.acbf" },
        { href: "notes.txt" },
        { href: "meta.json" },
        { href: ".DS_Store" },
        { href: "Thumbs.db" },
      ];
      expect(acceptsImageArchive(zipAsset, links)).toBe(true);
    });

    test("rejects any other content", () => {
      expect(acceptsImageArchive(zipAsset, [{ href: "001.png", type: "image/png" }, { href: "setup.exe" }])).toBe(false);
      expect(acceptsImageArchive(zipAsset, [{ href: "cover.svg", type: "image/svg+xml" }])).toBe(false);
    });
  });

  describe("createImageParser", () => {
    test("sorts bitmaps by path and tags the first as cover", async () => {
      const fetcher = new InMemoryFetcher({ "b.jpg": "b", "a.png": "a", "c.png": "c" });

      const builder = await runTest(createImageParser().parse(zipAsset, fetcher));

      expect(builder?.manifest).toEqual({
        context: [WEBPUB_CONTEXT],
        metadata: { title: { translations: { und: "comic.zip" } }, conformsTo: [PROFILES.divina] },
        links: [],
        readingOrder: [
          { href: "a.png", type: "image/png", rels: ["cover"] },
          { href: "b.jpg", type: "image/jpeg" },
          { href: "c.png", type: "image/png" },
        ],
        resources: [],
        tableOfContents: [],
        subcollections: {},
      });
      expect(builder?.fetcher).toBe(fetcher);
    });

    test("fails when a metadata-only archive holds no bitmap", async () => {
      const fetcher = new InMemoryFetcher({ "metadata.xml": "<comic/>" });

      expect(acceptsImageArchive(zipAsset, await Effect.runPromise(fetcher.links()))).toBe(true);

      const error = await runTestFailure(createImageParser().parse(zipAsset, fetcher));
      expect(error).toBeInstanceOf(NoBitmapError);
      expect(error.message).toBe("No bitmap found in the publication");
      expect(error.source).toBe("comic.zip");
    });

    test("declines an archive holding an executable", async () => {
      const fetcher = new InMemoryFetcher({ "page.png": "p", "setup.exe": "x" });

      expect(await runTest(createImageParser().parse(zipAsset, fetcher))).toBeNull();
    });

    test("sorts by code unit, not numerically", async () => {
      const fetcher = new InMemoryFetcher({ "page2.jpg": "2", "page10.jpg": "10", "page1.jpg": "1" });

      const builder = await runTest(createImageParser().parse(cbzAsset, fetcher));

      expect(builder?.manifest.readingOrder.map((link) => link.href)).toEqual(["page1.jpg", "page10.jpg", "page2.jpg"]);
    });

    test("skips hidden files and non-bitmaps", async () => {
      const fetcher = new InMemoryFetcher({
        "pages/.cover.jpg": "hidden",
        "pages/ComicInfo.xml": "<ComicInfo/>",
        "pages/01.jpg": "1",
        "pages/02.webp": "2",
      });

      const builder = await runTest(createImageParser().parse(cbzAsset, fetcher));

      expect(builder?.manifest.readingOrder.map((link) => link.href)).toEqual(["pages/01.jpg", "pages/02.webp"]);
    });

    test("takes the title from a shared top-level directory", async () => {
      const fetcher = new InMemoryFetcher({ "Vol 1/002.jpg": "2", "Vol 1/001.jpg": "1" });

      const builder = await runTest(createImageParser().parse(cbzAsset, fetcher));

      expect(builder?.manifest.metadata.title).toEqual({ translations: { und: "Vol 1" } });
    });

    test("gives one position per image", async () => {
      const fetcher = new InMemoryFetcher({ "b.jpg": "b", "a.png": "a" });

      const builder = await runTest(createImageParser().parse(cbzAsset, fetcher));
      const positions = builder ? await Effect.runPromise(builder.build().positions()) : [];

      expect(positions).toEqual([
        { href: "a.png", type: "image/png", locations: { position: 1, totalProgression: 0 } },
        { href: "b.jpg", type: "image/jpeg", locations: { position: 2, totalProgression: 0.5 } },
      ]);
    });
  });
});
