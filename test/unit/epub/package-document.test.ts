import { describe, test, expect } from "vitest";
import { Either } from "effect";
import { PACKAGE_BINDINGS } from "../../../src/constants.ts";
import { parsePackageDocument } from "../../../src/epub/package-document.ts";
import { parseXml } from "../../../src/xml/document.ts";
import { packageXml } from "../../helpers/epub.ts";

const OPF_PATH = "OEBPS/content.opf";

function parse(xml: string) {
  return parsePackageDocument(parseXml(xml, PACKAGE_BINDINGS), OPF_PATH);
}

describe("epub/package-document", () => {
  test("reads metadata with refinements", () => {
    const xml = packageXml({
      metadata: `<dc:identifier id="isbn">9780000000000</dc:identifier>
    <dc:identifier id="uid">urn:uuid:abc</dc:identifier>
    <dc:title id="t1">A Subtitle</dc:title>
    <dc:title id="t2">Main Title</dc:title>
    <meta refines="#t2" property="title-type">main</meta>
    <dc:creator id="a1">Jane Doe</dc:creator>
    <meta refines="#a1" property="role" scheme="marc:relators">aut</meta>
    <dc:creator xmlns:opf="http://www.idpf.org/2007/opf" opf:role="ill">John Roe</dc:creator>
    <dc:publisher>Example Press</dc:publisher>
    <dc:language>en</dc:language>
    <dc:language>fr</dc:language>
    <dc:subject>Fiction</dc:subject>
    <dc:description>&lt;p&gt;A story.&lt;/p&gt;</dc:description>
    <dc:date>2020-05-01</dc:date>
    <meta property="dcterms:modified">2024-01-02T00:00:00Z</meta>
    <meta property="rendition:layout">pre-paginated</meta>
    <meta name="cover" content="cover-img"/>`,
      manifest: `<item id="c1" href="c1.xhtml" media-type="application/xhtml+xml"/>`,
      spine: `<itemref idref="c1"/>`,
    });

    const { metadata, epubVersion, uniqueIdentifierId } = Either.getOrThrow(parse(xml));

    expect(epubVersion).toBe(3);
    expect(uniqueIdentifierId).toBe("uid");
    expect(metadata).toEqual({
      title: "Main Title",
      identifier: "urn:uuid:abc",
      languages: ["en", "fr"],
      authors: [
        { name: "Jane Doe", role: "aut" },
        { name: "John Roe", role: "ill" },
      ],
      publishers: [{ name: "Example Press" }],
      description: "<p>A story.</p>",
      subjects: ["Fiction"],
      date: "2020-05-01",
      modified: "2024-01-02T00:00:00Z",
      coverId: "cover-img",
      layout: "fixed",
    });
  });

  test("resolves manifest hrefs against the package path", () => {
    const xml = packageXml({
      manifest: `<item id="c1" href="Text/Chapter%201.xhtml" media-type="application/xhtml+xml" properties="scripted svg" media-overlay="s1"/>
    <item id="s1" href="../smil/c1.smil" media-type="application/smil+xml"/>`,
      spine: `<itemref idref="c1"/>`,
    });

    expect(Either.getOrThrow(parse(xml)).manifest).toEqual([
      {
        id: "c1",
        href: "OEBPS/Text/Chapter 1.xhtml",
        mediaType: "application/xhtml+xml",
        properties: ["scripted", "svg"],
        mediaOverlay: "s1",
      },
      {
        id: "s1",
        href: "smil/c1.smil",
        mediaType: "application/smil+xml",
        properties: [],
        mediaOverlay: undefined,
      },
    ]);
  });

  test("reads the spine", () => {
    const xml = packageXml({
      version: "2.0",
      manifest: `<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
      spine: `<itemref idref="c1"/>
    <itemref idref="notes" linear="no"/>
    <itemref idref="c2" properties="page-spread-left"/>
    <itemref/>`,
      spineAttributes: ` toc="ncx" page-progression-direction="rtl"`,
    });

    const { spine, epubVersion } = Either.getOrThrow(parse(xml));

    expect(epubVersion).toBe(2);
    expect(spine).toEqual({
      toc: "ncx",
      direction: "rtl",
      items: [
        { idref: "c1", linear: true, properties: [] },
        { idref: "notes", linear: false, properties: [] },
        { idref: "c2", linear: true, properties: ["page-spread-left"] },
      ],
    });
  });

  test("defaults the version and the reading progression", () => {
    const result = parse(`<package xmlns="http://www.idpf.org/2007/opf"><metadata/><manifest/><spine/></package>`);
    const parsed = Either.getOrThrow(result);

    expect(parsed.epubVersion).toBe(1.2);
    expect(parsed.spine).toEqual({ toc: undefined, direction: "auto", items: [] });
    expect(parsed.metadata.title).toBeUndefined();
  });

  test("rejects a root that is not an OPF package", () => {
    const result = parse(`<package><metadata/></package>`);

    expect(Either.isLeft(result) && result.left).toBe("expected an OPF <package> root, found <package>");
  });
});
