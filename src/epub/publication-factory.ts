import { PROFILES, WEBPUB_CONTEXT } from "../constants.ts";
import {
  localizedString,
  splitNavigation,
  type Encryption,
  type Layout,
  type Link,
  type LinkProperties,
  type Manifest,
  type Metadata,
  type NavigationMap,
  type Page,
} from "../manifest.ts";
import { MEDIA_TYPES } from "../media-type.ts";
import { stripFragment } from "../utils/path.ts";
import { cleanText } from "../utils/text.ts";
import type { ManifestItem, PackageDocument, SpineItem } from "./package-document.ts";

export interface PublicationFactoryInput {
  fallbackTitle: string;
  packageDocument: PackageDocument;
  navigationData: NavigationMap;
  encryptionData: Record<string, Encryption>;
  displayOptions: Record<string, string>;
}

const CONTAINS: Record<string, string> = {
  mathml: "mathml",
  "remote-resources": "remote-resources",
  scripted: "js",
  svg: "svg",
};

const PAGE_SPREADS: Record<string, Page> = {
  "page-spread-left": "left",
  "page-spread-right": "right",
  "page-spread-center": "center",
  "rendition:page-spread-center": "center",
};

const ITEMREF_LAYOUTS: Record<string, Layout> = {
  "rendition:layout-pre-paginated": "fixed",
  "rendition:layout-reflowable": "reflowable",
};

function nonEmpty<T>(values: T[]): T[] | undefined {
  return values.length > 0 ? values : undefined;
}

/** Folds a parsed package and its side documents into a manifest. */
export class PublicationFactory {
  private readonly items: Map<string, ManifestItem>;
  private readonly coverIds: Set<string>;

  constructor(private readonly input: PublicationFactoryInput) {
    const { manifest, metadata } = input.packageDocument;
    this.items = new Map(manifest.map((item) => [item.id, item]));
    this.coverIds = new Set(manifest.filter((item) => item.properties.includes("cover-image")).map((item) => item.id));
    if (metadata.coverId) this.coverIds.add(metadata.coverId);
  }

  create(): Manifest {
    const { packageDocument, navigationData } = this.input;

    const readingOrderIds = new Set<string>();
    const readingOrder: Link[] = [];
    for (const itemref of packageDocument.spine.items) {
      const item = this.items.get(itemref.idref);
      if (!item || !itemref.linear || readingOrderIds.has(item.id)) continue;
      readingOrderIds.add(item.id);
      readingOrder.push(this.link(item, itemref));
    }

    const resources = packageDocument.manifest
      .filter((item) => !readingOrderIds.has(item.id))
      .map((item) => this.link(item));

    return {
      context: [WEBPUB_CONTEXT],
      metadata: this.metadata(),
      links: [],
      readingOrder,
      resources,
      ...splitNavigation(navigationData),
    };
  }

  private layout(): Layout {
    const declared = this.input.packageDocument.metadata.layout;
    if (declared) return declared;
    return this.input.displayOptions["fixed-layout"] === "true" ? "fixed" : "reflowable";
  }

  private metadata(): Metadata {
    const { packageDocument, fallbackTitle } = this.input;
    const { metadata, spine } = packageDocument;

    return {
      identifier: metadata.identifier,
      title: localizedString(metadata.title ?? fallbackTitle),
      conformsTo: [PROFILES.epub],
      languages: nonEmpty(metadata.languages),
      authors: nonEmpty(metadata.authors),
      publishers: nonEmpty(metadata.publishers),
      description: cleanText(metadata.description),
      subjects: nonEmpty(metadata.subjects),
      published: metadata.date,
      modified: metadata.modified,
      readingProgression: spine.direction,
      presentation: { layout: this.layout() },
    };
  }

  private link(item: ManifestItem, itemref?: SpineItem): Link {
    const link: Link = { href: item.href };
    if (item.mediaType) link.type = item.mediaType;

    const rels: string[] = [];
    if (this.coverIds.has(item.id)) rels.push("cover");
    if (item.properties.includes("nav")) rels.push("contents");
    if (rels.length > 0) link.rels = rels;

    const properties: LinkProperties = {};
    const contains = item.properties.flatMap((property) => CONTAINS[property] ?? []);
    if (contains.length > 0) properties.contains = contains;
    for (const property of itemref?.properties ?? []) {
      const page = PAGE_SPREADS[property];
      if (page) properties.page = page;
      const layout = ITEMREF_LAYOUTS[property];
      if (layout) properties.layout = layout;
    }
    const encrypted = this.input.encryptionData[stripFragment(item.href)];
    if (encrypted) properties.encrypted = encrypted;
    if (Object.keys(properties).length > 0) link.properties = properties;

    const overlay = item.mediaOverlay ? this.items.get(item.mediaOverlay) : undefined;
    if (overlay) link.alternates = [{ href: overlay.href, type: overlay.mediaType ?? MEDIA_TYPES.smil }];

    return link;
  }
}
