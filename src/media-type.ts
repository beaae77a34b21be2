export const MEDIA_TYPES = {
  epub: "application/epub+zip",
  cbz: "application/vnd.comicbook+zip",
  cbr: "application/vnd.comicbook-rar",
  zip: "application/zip",
  opf: "application/oebps-package+xml",
  ncx: "application/x-dtbncx+xml",
  xhtml: "application/xhtml+xml",
  html: "text/html",
  css: "text/css",
  smil: "application/smil+xml",
  xml: "application/xml",
  json: "application/json",
  text: "text/plain",
  bmp: "image/bmp",
  gif: "image/gif",
  jpeg: "image/jpeg",
  png: "image/png",
  tiff: "image/tiff",
  webp: "image/webp",
  avif: "image/avif",
  jxl: "image/jxl",
  svg: "image/svg+xml",
} as const;

const BITMAP_TYPES: ReadonlySet<string> = new Set([
  MEDIA_TYPES.bmp,
  MEDIA_TYPES.gif,
  MEDIA_TYPES.jpeg,
  MEDIA_TYPES.png,
  MEDIA_TYPES.tiff,
  MEDIA_TYPES.webp,
  MEDIA_TYPES.avif,
  MEDIA_TYPES.jxl,
]);

const EXTENSION_TYPES: Record<string, string> = {
  epub: MEDIA_TYPES.epub,
  cbz: MEDIA_TYPES.cbz,
  cbr: MEDIA_TYPES.cbr,
  zip: MEDIA_TYPES.zip,
  opf: MEDIA_TYPES.opf,
  ncx: MEDIA_TYPES.ncx,
  xhtml: MEDIA_TYPES.xhtml,
  html: MEDIA_TYPES.html,
  htm: MEDIA_TYPES.html,
  css: MEDIA_TYPES.css,
  smil: MEDIA_TYPES.smil,
  xml: MEDIA_TYPES.xml,
  json: MEDIA_TYPES.json,
  txt: MEDIA_TYPES.text,
  bmp: MEDIA_TYPES.bmp,
  gif: MEDIA_TYPES.gif,
  jpg: MEDIA_TYPES.jpeg,
  jpeg: MEDIA_TYPES.jpeg,
  png: MEDIA_TYPES.png,
  tif: MEDIA_TYPES.tiff,
  tiff: MEDIA_TYPES.tiff,
  webp: MEDIA_TYPES.webp,
  avif: MEDIA_TYPES.avif,
  jxl: MEDIA_TYPES.jxl,
  svg: MEDIA_TYPES.svg,
};

/** Strips parameters and normalizes case: `Text/HTML; charset=utf-8` → `text/html`. */
export function essence(mediaType: string): string {
  return (mediaType.split(";")[0] ?? "").trim().toLowerCase();
}

export function matchesMediaType(mediaType: string | undefined, expected: string): boolean {
  if (!mediaType) return false;
  return essence(mediaType) === essence(expected);
}

export function isBitmap(mediaType: string | undefined): boolean {
  return mediaType !== undefined && BITMAP_TYPES.has(essence(mediaType));
}

export function isHtml(mediaType: string | undefined): boolean {
  return matchesMediaType(mediaType, MEDIA_TYPES.xhtml) || matchesMediaType(mediaType, MEDIA_TYPES.html);
}

/** `image/*` style wildcard match. */
export function matchesPattern(mediaType: string | undefined, pattern: string): boolean {
  if (!mediaType) return false;
  const [type, subtype] = essence(mediaType).split("/");
  const [patternType, patternSubtype] = essence(pattern).split("/");
  return type === patternType && (patternSubtype === "*" || subtype === patternSubtype);
}

export function mediaTypeFromExtension(extension: string): string | undefined {
  return EXTENSION_TYPES[extension.toLowerCase()];
}
