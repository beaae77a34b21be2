import { XMLParser } from "fast-xml-parser";
import type { NamespaceBindings } from "../constants.ts";

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
});

// Named entities beyond the parser's built-in HTML set that show up in navigation labels.
const TYPOGRAPHIC_ENTITIES: Record<string, string> = {
  mdash: "\u2014",
  ndash: "\u2013",
  hellip: "\u2026",
  lsquo: "\u2018",
  rsquo: "\u2019",
  sbquo: "\u201a",
  ldquo: "\u201c",
  rdquo: "\u201d",
  bdquo: "\u201e",
  laquo: "\u00ab",
  raquo: "\u00bb",
  lsaquo: "\u2039",
  rsaquo: "\u203a",
  middot: "\u00b7",
  bull: "\u2022",
  shy: "\u00ad",
  ensp: "\u2002",
  emsp: "\u2003",
  thinsp: "\u2009",
  zwnj: "\u200c",
  zwj: "\u200d",
  trade: "\u2122",
  times: "\u00d7",
  deg: "\u00b0",
  sect: "\u00a7",
  para: "\u00b6",
  dagger: "\u2020",
  Dagger: "\u2021",
};

for (const [name, value] of Object.entries(TYPOGRAPHIC_ENTITIES)) {
  xmlParser.addEntity(name, value);
}

export type XmlNode = XmlElement | string;

/**
 * Element of a parsed document. Names are rewritten through the namespace
 * bindings given to {@link parseXml}, so `<ncx:navMap>`, `<navMap xmlns="...ncx/">`
 * and `<n:navMap xmlns:n="...ncx/">` are all queried as `ncx:navMap`.
 */
export class XmlElement {
  constructor(
    readonly name: string,
    readonly localName: string,
    readonly namespace: string | undefined,
    readonly attributes: Readonly<Record<string, string>>,
    readonly children: readonly XmlNode[],
  ) {}

  attr(name: string): string | undefined {
    return this.attributes[name];
  }

  /** Direct child elements, optionally filtered by name. */
  elements(name?: string): XmlElement[] {
    return this.children.filter(
      (child): child is XmlElement => child instanceof XmlElement && (name === undefined || child.name === name),
    );
  }

  element(name: string): XmlElement | undefined {
    return this.elements(name)[0];
  }

  /** Descendant elements with the given name, in document order. */
  descendants(name: string): XmlElement[] {
    const found: XmlElement[] = [];
    for (const child of this.elements()) {
      if (child.name === name) found.push(child);
      found.push(...child.descendants(name));
    }
    return found;
  }

  find(name: string): XmlElement | undefined {
    for (const child of this.elements()) {
      if (child.name === name) return child;
      const nested = child.find(name);
      if (nested) return nested;
    }
    return undefined;
  }

  /** Concatenated text of all descendant text nodes, untouched. */
  text(): string {
    return this.children.map((child) => (typeof child === "string" ? child : child.text())).join("");
  }

  /** Text with whitespace runs collapsed and trimmed. */
  textContent(): string {
    return this.text().replace(/\s+/g, " ").trim();
  }
}

export class XmlDocument extends XmlElement {
  constructor(children: readonly XmlNode[]) {
    super("#document", "#document", undefined, {}, children);
  }

  get documentElement(): XmlElement | undefined {
    return this.elements()[0];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function splitName(qualified: string): [prefix: string | undefined, local: string] {
  const index = qualified.indexOf(":");
  return index === -1 ? [undefined, qualified] : [qualified.slice(0, index), qualified.slice(index + 1)];
}

function canonicalName(local: string, namespace: string | undefined, bindings: NamespaceBindings): string {
  if (namespace === XML_NAMESPACE) return `xml:${local}`;
  const prefix = namespace === undefined ? undefined : bindings[namespace];
  return prefix ? `${prefix}:${local}` : local;
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") attributes[name] = value;
    else if (value === true) attributes[name] = "";
  }
  return attributes;
}

function buildNodes(raw: unknown, scope: ReadonlyMap<string, string>, bindings: NamespaceBindings): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const nodes: XmlNode[] = [];

  for (const item of raw) {
    if (!isRecord(item)) continue;

    if ("#text" in item) {
      const text = item["#text"];
      if (typeof text === "string" || typeof text === "number") nodes.push(String(text));
      continue;
    }

    const tag = Object.keys(item).find((key) => key !== ":@");
    if (!tag) continue;

    const rawAttributes = readAttributes(item[":@"]);
    const elementScope = new Map(scope);
    for (const [name, value] of Object.entries(rawAttributes)) {
      if (name === "xmlns") elementScope.set("", value);
      else if (name.startsWith("xmlns:")) elementScope.set(name.slice(6), value);
    }

    const [prefix, local] = splitName(tag);
    const namespace = elementScope.get(prefix ?? "") || undefined;

    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(rawAttributes)) {
      if (name === "xmlns" || name.startsWith("xmlns:")) continue;
      const [attrPrefix, attrLocal] = splitName(name);
      const attrNamespace = attrPrefix === undefined ? undefined : elementScope.get(attrPrefix);
      attributes[attrPrefix === undefined ? attrLocal : canonicalName(attrLocal, attrNamespace, bindings)] = value;
    }

    const children = buildNodes(item[tag], elementScope, bindings);
    nodes.push(new XmlElement(canonicalName(local, namespace, bindings), local, namespace, attributes, children));
  }

  return nodes;
}

/**
 * Parses and validates an XML document. `bindings` maps namespace URIs to the
 * prefixes the caller queries with. Throws on malformed input.
 *
 * Named entities cover the XML five, the parser's small HTML set (`nbsp`,
 * `copy`, currency signs) and common typographic ones such as `mdash` and
 * `hellip`. Any other named entity is left in the text as written; numeric
 * references are always decoded.
 */
export function parseXml(text: string, bindings: NamespaceBindings = {}): XmlDocument {
  const raw: unknown = xmlParser.parse(text, true);
  const scope = new Map<string, string>([["xml", XML_NAMESPACE]]);
  const document = new XmlDocument(buildNodes(raw, scope, bindings));
  if (!document.documentElement) {
    throw new Error("Document has no root element");
  }
  return document;
}
