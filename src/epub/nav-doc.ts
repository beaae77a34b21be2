import type { Link, NavigationMap } from "../manifest.ts";
import { resolveHref } from "../utils/path.ts";
import type { XmlDocument, XmlElement } from "../xml/document.ts";

export const NAVIGATION_ROLES = ["toc", "page-list", "landmarks", "lot", "loi", "loa", "lov"] as const;

function listItems(list: XmlElement | undefined, navPath: string): Link[] {
  if (!list) return [];
  return list
    .elements("html:li")
    .map((item) => listItem(item, navPath))
    .filter((link): link is Link => link !== undefined);
}

function listItem(item: XmlElement, navPath: string): Link | undefined {
  const label = item.element("html:a") ?? item.element("html:span");
  if (!label) return undefined;

  const title = label.textContent();
  const rawHref = label.name === "html:a" ? label.attr("href") : undefined;
  const children = listItems(item.element("html:ol"), navPath);

  let href = rawHref ? resolveHref(navPath, rawHref) : "";
  if (!href) {
    if (children.length === 0) return undefined;
    href = "#";
  }

  const link: Link = { href };
  if (title) link.title = title;
  if (children.length > 0) link.children = children;
  return link;
}

/** EPUB 3 navigation document: one entry per `<nav epub:type>` role, first occurrence wins. */
export function parseNavDoc(document: XmlDocument, navPath: string): NavigationMap {
  const navigation: NavigationMap = {};

  for (const nav of document.descendants("html:nav")) {
    const types = (nav.attr("epub:type") ?? "").split(/\s+/);
    const role = NAVIGATION_ROLES.find((candidate) => types.includes(candidate));
    if (!role || navigation[role]) continue;

    const links = listItems(nav.element("html:ol"), navPath);
    if (links.length > 0) navigation[role] = links;
  }

  return navigation;
}
