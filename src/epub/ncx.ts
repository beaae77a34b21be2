import type { Link, NavigationMap } from "../manifest.ts";
import { resolveHref } from "../utils/path.ts";
import type { XmlDocument, XmlElement } from "../xml/document.ts";

function ncxPoint(point: XmlElement, ncxPath: string, childName: string): Link | undefined {
  const title = point.element("ncx:navLabel")?.element("ncx:text")?.textContent() ?? "";
  const src = point.element("ncx:content")?.attr("src");
  const children = point
    .elements(childName)
    .map((child) => ncxPoint(child, ncxPath, childName))
    .filter((link): link is Link => link !== undefined);

  let href = src ? resolveHref(ncxPath, src) : "";
  if (!href) {
    if (children.length === 0) return undefined;
    href = "#";
  }

  const link: Link = { href };
  if (title) link.title = title;
  if (children.length > 0) link.children = children;
  return link;
}

function ncxList(container: XmlElement | undefined, childName: string, ncxPath: string): Link[] {
  if (!container) return [];
  return container
    .elements(childName)
    .map((point) => ncxPoint(point, ncxPath, childName))
    .filter((link): link is Link => link !== undefined);
}

/** Legacy (EPUB 2) navigation index: `navMap` becomes `toc`, `pageList` becomes `page-list`. */
export function parseNcx(document: XmlDocument, ncxPath: string): NavigationMap {
  const root = document.documentElement;
  const navigation: NavigationMap = {};
  if (!root || root.name !== "ncx:ncx") return navigation;

  const toc = ncxList(root.element("ncx:navMap"), "ncx:navPoint", ncxPath);
  if (toc.length > 0) navigation.toc = toc;

  const pageList = ncxList(root.element("ncx:pageList"), "ncx:pageTarget", ncxPath);
  if (pageList.length > 0) navigation["page-list"] = pageList;

  return navigation;
}
