const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // Stray "%" that is not an escape sequence: keep the raw path.
    return path;
  }
}

/**
 * Returns the directory part of a path, with its trailing slash.
 *
 * @example
 * directoryOf("OEBPS/content.opf") => "OEBPS/"
 * directoryOf("content.opf") => ""
 */
export function directoryOf(path: string): string {
  const index = path.lastIndexOf("/");
  return index === -1 ? "" : path.slice(0, index + 1);
}

export function basenameOf(path: string): string {
  const clean = path.split("#")[0] ?? "";
  return clean.slice(clean.lastIndexOf("/") + 1);
}

/**
 * Lowercased extension without the dot.
 *
 * @example
 * extensionOf("Images/Cover.JPG") => "jpg"
 * extensionOf("README") => ""
 */
export function extensionOf(path: string): string {
  const name = basenameOf(path);
  const index = name.lastIndexOf(".");
  return index <= 0 ? "" : name.slice(index + 1).toLowerCase();
}

/**
 * Resolves a reference found in the document at `basePath` to a path relative
 * to the publication root. Fragments are kept, absolute URLs are returned as-is.
 *
 * @example
 * resolveHref("OEBPS/content.opf", "toc.ncx") => "OEBPS/toc.ncx"
 * resolveHref("OEBPS/Text/nav.xhtml", "../Text/ch1.xhtml#s1") => "OEBPS/Text/ch1.xhtml#s1"
 * resolveHref("OEBPS/content.opf", "/fonts/a.otf") => "fonts/a.otf"
 */
export function resolveHref(basePath: string, href: string): string {
  if (SCHEME.test(href)) return href;

  const hashIndex = href.indexOf("#");
  const pathPart = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? "" : href.slice(hashIndex);

  if (pathPart === "") {
    return stripFragment(basePath) + fragment;
  }

  const joined = pathPart.startsWith("/") ? pathPart.slice(1) : directoryOf(basePath) + pathPart;
  const segments: string[] = [];
  for (const segment of joined.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return decodePath(segments.join("/")) + fragment;
}

export function stripFragment(href: string): string {
  const index = href.indexOf("#");
  return index === -1 ? href : href.slice(0, index);
}

/**
 * Hidden files and Windows thumbnail caches never count as publication content.
 *
 * @example
 * isHiddenOrThumbs("pages/.DS_Store") => true
 * isHiddenOrThumbs("Thumbs.db") => true
 * isHiddenOrThumbs("pages/001.jpg") => false
 */
export function isHiddenOrThumbs(path: string): boolean {
  const name = basenameOf(path);
  return name.startsWith(".") || name === "Thumbs.db";
}

/**
 * First path component, or the whole path when it has no directory.
 *
 * @example
 * firstComponent("Vol 1/001.jpg") => "Vol 1"
 * firstComponent("001.jpg") => "001.jpg"
 */
export function firstComponent(path: string): string {
  const trimmed = path.startsWith("/") ? path.slice(1) : path;
  const index = trimmed.indexOf("/");
  return index === -1 ? trimmed : trimmed.slice(0, index);
}
