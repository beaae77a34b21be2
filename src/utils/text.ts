export function decodeEntities(str: string): string {
  return str
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/&#(\d+);/g, (_, n: string) => String.fromCodePoint(Number(n)))
    .replace(/&#x([0-9a-f]+);/gi, (_, n: string) => String.fromCodePoint(parseInt(n, 16)))
    .replace(/&amp;/g, "&");
}

/** Drops markup, decodes entities and collapses whitespace; empty results become undefined. */
export function cleanText(html: string | undefined): string | undefined {
  if (!html) return undefined;
  return (
    decodeEntities(html.replace(/<[^>]+>/g, ""))
      .replace(/\s+/g, " ")
      .trim() || undefined
  );
}
