import type { Link } from "../manifest.ts";
import { firstComponent } from "../utils/path.ts";

/**
 * When every entry of the archive sits under one top-level directory, that
 * directory is usually the publication's name.
 *
 * @example
 * titleFromFileStructure([{ href: "Vol 1/001.jpg" }, { href: "Vol 1/002.jpg" }]) => "Vol 1"
 * titleFromFileStructure([{ href: "001.jpg" }]) => undefined
 */
export function titleFromFileStructure(links: readonly Link[]): string | undefined {
  const [first] = links;
  if (!first) return undefined;

  const directory = firstComponent(first.href);
  const href = first.href.startsWith("/") ? first.href.slice(1) : first.href;
  if (directory === href) return undefined;

  return links.every((link) => firstComponent(link.href) === directory) ? directory : undefined;
}

export type TitleCandidate = () => string | undefined;

/** Tries each candidate in order and keeps the first non-empty title. */
export function firstTitle(candidates: readonly TitleCandidate[]): string | undefined {
  for (const candidate of candidates) {
    const title = candidate();
    if (title) return title;
  }
  return undefined;
}
