/**
 * Canonical publication model, shaped after the Readium Web Publication Manifest.
 * Every parser produces this, whatever the container format.
 */

export interface Encryption {
  /** URI of the algorithm used to encrypt the resource. */
  algorithm: string;
  /** Compression applied before encryption (`deflate` or `none`). */
  compression?: string;
  /** Length of the resource before compression and encryption. */
  originalLength?: number;
  /** Identifies the DRM scheme, e.g. LCP. */
  scheme?: string;
}

export type Layout = "fixed" | "reflowable";
export type Page = "left" | "right" | "center";
export type ReadingProgression = "ltr" | "rtl" | "auto";

export interface LinkProperties {
  contains?: string[];
  page?: Page;
  layout?: Layout;
  encrypted?: Encryption;
}

export interface Link {
  href: string;
  type?: string;
  title?: string;
  rels?: string[];
  properties?: LinkProperties;
  children?: Link[];
  alternates?: Link[];
}

export interface LocalizedString {
  /** Translations keyed by BCP 47 tag; `und` holds the untagged value. */
  translations: Record<string, string>;
}

export const UNDEFINED_LANGUAGE = "und";

export function localizedString(value: string, language: string = UNDEFINED_LANGUAGE): LocalizedString {
  return { translations: { [language]: value } };
}

export interface Contributor {
  name: string;
  role?: string;
}

export interface Presentation {
  layout?: Layout;
}

export interface Metadata {
  identifier?: string;
  title: LocalizedString;
  conformsTo: string[];
  languages?: string[];
  authors?: Contributor[];
  publishers?: Contributor[];
  description?: string;
  subjects?: string[];
  published?: string;
  modified?: string;
  readingProgression?: ReadingProgression;
  presentation?: Presentation;
}

/** Navigation roles keyed the way EPUB names them (`toc`, `page-list`, ...). */
export type NavigationMap = Record<string, Link[]>;

export interface Manifest {
  context: string[];
  metadata: Metadata;
  links: Link[];
  readingOrder: Link[];
  resources: Link[];
  tableOfContents: Link[];
  /** Remaining navigation collections keyed by Readium role (`pageList`, `landmarks`, ...). */
  subcollections: Record<string, Link[]>;
}

export interface Locations {
  position?: number;
  progression?: number;
  totalProgression?: number;
}

export interface Locator {
  href: string;
  type: string;
  title?: string;
  locations: Locations;
}

const ROLE_NAMES: Record<string, string> = {
  "page-list": "pageList",
  landmarks: "landmarks",
  lot: "lot",
  loi: "loi",
  loa: "loa",
  lov: "lov",
};

/**
 * Splits an EPUB navigation map into the table of contents and the named
 * subcollections of the manifest.
 *
 * @example
 * splitNavigation({ toc: [a], "page-list": [b] }) => { tableOfContents: [a], subcollections: { pageList: [b] } }
 */
export function splitNavigation(navigation: NavigationMap): Pick<Manifest, "tableOfContents" | "subcollections"> {
  const subcollections: Record<string, Link[]> = {};
  for (const [role, links] of Object.entries(navigation)) {
    if (role === "toc" || links.length === 0) continue;
    subcollections[ROLE_NAMES[role] ?? role] = links;
  }
  return { tableOfContents: navigation.toc ?? [], subcollections };
}

function titleToJson(title: LocalizedString): string | Record<string, string> {
  const entries = Object.entries(title.translations);
  const [first] = entries;
  if (entries.length === 1 && first && first[0] === UNDEFINED_LANGUAGE) return first[1];
  return title.translations;
}

/** Serializes a manifest to Readium Web Publication Manifest JSON. */
export function manifestToJson(manifest: Manifest): Record<string, unknown> {
  const { title, ...metadata } = manifest.metadata;
  const json: Record<string, unknown> = {
    "@context": manifest.context.length === 1 ? manifest.context[0] : manifest.context,
    metadata: { ...metadata, title: titleToJson(title) },
    links: manifest.links,
    readingOrder: manifest.readingOrder,
  };
  if (manifest.resources.length > 0) json.resources = manifest.resources;
  if (manifest.tableOfContents.length > 0) json.toc = manifest.tableOfContents;
  for (const [role, links] of Object.entries(manifest.subcollections)) {
    json[role] = links;
  }
  return json;
}
