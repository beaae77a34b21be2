import { Either } from "effect";
import type { Contributor, Layout, ReadingProgression } from "../manifest.ts";
import { resolveHref } from "../utils/path.ts";
import type { XmlDocument, XmlElement } from "../xml/document.ts";

export interface ManifestItem {
  id: string;
  /** Resolved against the package document path. */
  href: string;
  mediaType?: string;
  properties: string[];
  mediaOverlay?: string;
}

export interface SpineItem {
  idref: string;
  linear: boolean;
  properties: string[];
}

export interface Spine {
  /** Manifest id of the NCX, EPUB 2 only. */
  toc?: string;
  direction: ReadingProgression;
  items: SpineItem[];
}

export interface PackageMetadata {
  title?: string;
  identifier?: string;
  languages: string[];
  authors: Contributor[];
  publishers: Contributor[];
  description?: string;
  subjects: string[];
  date?: string;
  modified?: string;
  /** EPUB 2 `<meta name="cover">` target. */
  coverId?: string;
  layout?: Layout;
}

export interface PackageDocument {
  path: string;
  epubVersion: number;
  uniqueIdentifierId?: string;
  metadata: PackageMetadata;
  manifest: ManifestItem[];
  spine: Spine;
}

const DEFAULT_EPUB_VERSION = 1.2;

function tokens(value: string | undefined): string[] {
  return value ? value.split(/\s+/).filter(Boolean) : [];
}

function texts(elements: XmlElement[]): string[] {
  return elements.map((element) => element.textContent()).filter(Boolean);
}

/** `<meta refines="#id" property="...">` values, keyed by refined id then property. */
function collectRefinements(metas: XmlElement[]): Map<string, Map<string, string>> {
  const refinements = new Map<string, Map<string, string>>();
  for (const meta of metas) {
    const refines = meta.attr("refines");
    const property = meta.attr("property");
    if (!refines?.startsWith("#") || !property) continue;
    const id = refines.slice(1);
    const byProperty = refinements.get(id) ?? new Map<string, string>();
    if (!byProperty.has(property)) byProperty.set(property, meta.textContent());
    refinements.set(id, byProperty);
  }
  return refinements;
}

function contributors(elements: XmlElement[], refinements: Map<string, Map<string, string>>): Contributor[] {
  return elements.flatMap((element) => {
    const name = element.textContent();
    if (!name) return [];
    const id = element.attr("id");
    const role = element.attr("opf:role") ?? (id ? refinements.get(id)?.get("role") : undefined);
    return [role ? { name, role } : { name }];
  });
}

function pickTitle(titles: XmlElement[], refinements: Map<string, Map<string, string>>): string | undefined {
  const main = titles.find((title) => {
    const id = title.attr("id");
    return id !== undefined && refinements.get(id)?.get("title-type") === "main";
  });
  return (main ?? titles[0])?.textContent() || undefined;
}

function parseMetadata(metadata: XmlElement | undefined, uniqueIdentifierId: string | undefined): PackageMetadata {
  if (!metadata) {
    return { languages: [], authors: [], publishers: [], subjects: [] };
  }

  const metas = metadata.descendants("opf:meta");
  const refinements = collectRefinements(metas);
  const metaProperty = (property: string) =>
    metas.find((meta) => meta.attr("property") === property && !meta.attr("refines"))?.textContent() || undefined;

  const identifiers = metadata.descendants("dc:identifier");
  const identifier =
    identifiers.find((element) => uniqueIdentifierId !== undefined && element.attr("id") === uniqueIdentifierId) ??
    identifiers[0];

  const layout = metaProperty("rendition:layout");

  return {
    title: pickTitle(metadata.descendants("dc:title"), refinements),
    identifier: identifier?.textContent() || undefined,
    languages: texts(metadata.descendants("dc:language")),
    authors: contributors(metadata.descendants("dc:creator"), refinements),
    publishers: texts(metadata.descendants("dc:publisher")).map((name) => ({ name })),
    description: metadata.element("dc:description")?.text(),
    subjects: texts(metadata.descendants("dc:subject")),
    date: metadata.element("dc:date")?.textContent() || undefined,
    modified: metaProperty("dcterms:modified"),
    coverId: metas.find((meta) => meta.attr("name") === "cover")?.attr("content"),
    layout: layout === "pre-paginated" ? "fixed" : layout === "reflowable" ? "reflowable" : undefined,
  };
}

function parseManifest(manifest: XmlElement | undefined, path: string): ManifestItem[] {
  if (!manifest) return [];
  return manifest.elements("opf:item").flatMap((item) => {
    const id = item.attr("id");
    const href = item.attr("href");
    if (!id || !href) return [];
    return [
      {
        id,
        href: resolveHref(path, href),
        mediaType: item.attr("media-type"),
        properties: tokens(item.attr("properties")),
        mediaOverlay: item.attr("media-overlay"),
      },
    ];
  });
}

function parseSpine(spine: XmlElement | undefined): Spine {
  const direction = spine?.attr("page-progression-direction");
  return {
    toc: spine?.attr("toc") || undefined,
    direction: direction === "ltr" || direction === "rtl" ? direction : "auto",
    items: (spine?.elements("opf:itemref") ?? []).flatMap((itemref) => {
      const idref = itemref.attr("idref");
      if (!idref) return [];
      return [{ idref, linear: itemref.attr("linear") !== "no", properties: tokens(itemref.attr("properties")) }];
    }),
  };
}

/** Reads the OPF package document at `path`. Fails only when the root is not an OPF `<package>`. */
export function parsePackageDocument(document: XmlDocument, path: string): Either.Either<PackageDocument, string> {
  const root = document.documentElement;
  if (!root || root.name !== "opf:package") {
    return Either.left(`expected an OPF <package> root, found <${root?.name ?? "nothing"}>`);
  }

  const version = Number.parseFloat(root.attr("version") ?? "");
  const uniqueIdentifierId = root.attr("unique-identifier");

  return Either.right({
    path,
    epubVersion: Number.isNaN(version) ? DEFAULT_EPUB_VERSION : version,
    uniqueIdentifierId,
    metadata: parseMetadata(root.element("opf:metadata"), uniqueIdentifierId),
    manifest: parseManifest(root.element("opf:manifest"), path),
    spine: parseSpine(root.element("opf:spine")),
  });
}
