import { Effect } from "effect";
import { SMIL_BINDINGS } from "../constants.ts";
import type { Link } from "../manifest.ts";
import { MEDIA_TYPES, matchesMediaType } from "../media-type.ts";
import { resolveHref, stripFragment } from "../utils/path.ts";
import type { XmlDocument } from "../xml/document.ts";
import type { GuidedNavigationObject, GuidedNavigationService, ServiceContext } from "./services.ts";

/**
 * Converts a SMIL clock value to seconds.
 *
 * @example
 * parseClockValue("0:01:02.5") => 62.5
 * parseClockValue("1.5s") => 1.5
 * parseClockValue("250ms") => 0.25
 */
export function parseClockValue(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const clock = value.trim();

  if (clock.includes(":")) {
    const parts = clock.split(":").map(Number);
    if (parts.some((part) => Number.isNaN(part))) return undefined;
    return parts.reduce((total, part) => total * 60 + part, 0);
  }

  const match = clock.match(/^([\d.]+)(h|min|s|ms)?$/);
  if (!match) return undefined;
  const amount = Number(match[1]);
  if (Number.isNaN(amount)) return undefined;
  switch (match[2]) {
    case "h":
      return amount * 3600;
    case "min":
      return amount * 60;
    case "ms":
      return amount / 1000;
    default:
      return amount;
  }
}

function audioRef(src: string, begin: number | undefined, end: number | undefined): string {
  if (begin === undefined && end === undefined) return src;
  return `${src}#t=${begin ?? 0}${end === undefined ? "" : `,${end}`}`;
}

export function parseSmil(document: XmlDocument, smilPath: string): GuidedNavigationObject[] {
  return document.descendants("smil:par").map((par) => {
    const guided: GuidedNavigationObject = {};
    const text = par.element("smil:text")?.attr("src");
    if (text) guided.textref = resolveHref(smilPath, text);

    const audio = par.element("smil:audio");
    const audioSrc = audio?.attr("src");
    if (audio && audioSrc) {
      guided.audioref = audioRef(
        resolveHref(smilPath, audioSrc),
        parseClockValue(audio.attr("clipBegin")),
        parseClockValue(audio.attr("clipEnd")),
      );
    }
    return guided;
  });
}

function overlayOf(link: Link): Link | undefined {
  return link.alternates?.find((alternate) => matchesMediaType(alternate.type, MEDIA_TYPES.smil));
}

/** Exposes EPUB media overlays (SMIL) as guided navigation documents. */
export function mediaOverlayFactory() {
  return ({ manifest, fetcher }: ServiceContext): GuidedNavigationService => {
    const overlays = new Map<string, Link>();
    for (const link of manifest.readingOrder) {
      const overlay = overlayOf(link);
      if (overlay) overlays.set(stripFragment(link.href), overlay);
    }

    return {
      hasGuidedNavigation: overlays.size > 0,
      guideForResource: (href) => {
        const overlay = overlays.get(stripFragment(href));
        if (!overlay) return Effect.succeed(null);
        return fetcher
          .get(overlay)
          .readAsXml(SMIL_BINDINGS)
          .pipe(Effect.map((document) => parseSmil(document, overlay.href)));
      },
    };
  };
}
