import { Effect, Either } from "effect";
import { NAV_DOC_BINDINGS, NCX_BINDINGS } from "../constants.ts";
import { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import type { NavigationMap } from "../manifest.ts";
import { MEDIA_TYPES, matchesMediaType } from "../media-type.ts";
import type { XmlDocument } from "../xml/document.ts";
import { parseNavDoc } from "./nav-doc.ts";
import { parseNcx } from "./ncx.ts";
import type { ManifestItem, PackageDocument } from "./package-document.ts";

/**
 * The two table-of-contents schemes are chosen by EPUB version alone, before
 * any manifest item is inspected: an EPUB 3 package never reaches the NCX path,
 * whatever media types its manifest declares.
 */
export type NavigationSource =
  | { readonly _tag: "Ncx"; readonly item: ManifestItem }
  | { readonly _tag: "NavDoc"; readonly item: ManifestItem };

export function selectNavigationSource(packageDocument: PackageDocument): NavigationSource | undefined {
  const { manifest, spine } = packageDocument;

  if (packageDocument.epubVersion < 3.0) {
    const item =
      (spine.toc !== undefined ? manifest.find((candidate) => candidate.id === spine.toc) : undefined) ??
      manifest.find((candidate) => matchesMediaType(candidate.mediaType, MEDIA_TYPES.ncx));
    return item ? { _tag: "Ncx", item } : undefined;
  }

  const item = manifest.find((candidate) => candidate.properties.includes("nav"));
  return item ? { _tag: "NavDoc", item } : undefined;
}

const STRATEGIES = {
  Ncx: { bindings: NCX_BINDINGS, parse: parseNcx },
  NavDoc: { bindings: NAV_DOC_BINDINGS, parse: parseNavDoc },
} satisfies Record<NavigationSource["_tag"], { bindings: object; parse: (doc: XmlDocument, path: string) => NavigationMap }>;

/** Builds the navigation map of a package. Never fails: anything unreadable yields `{}`. */
export function parseNavigationData(
  packageDocument: PackageDocument,
  fetcher: Fetcher,
): Effect.Effect<NavigationMap, never, LoggerService> {
  return Effect.gen(function* () {
    const logger = yield* LoggerService;
    const none: NavigationMap = {};
    const source = selectNavigationSource(packageDocument);
    if (!source) {
      yield* logger.debug("Navigation", "No navigation resource declared", {
        epub_version: packageDocument.epubVersion,
      });
      return none;
    }

    const { item } = source;
    const strategy = STRATEGIES[source._tag];
    const result = yield* fetcher
      .get({ href: item.href, type: item.mediaType })
      .readAsXml(strategy.bindings)
      .pipe(
        Effect.map((document) => strategy.parse(document, item.href)),
        Effect.either,
      );

    if (Either.isLeft(result)) {
      yield* logger.debug("Navigation", "Navigation resource unreadable", {
        href: item.href,
        strategy: source._tag,
        error: result.left.message,
      });
      return none;
    }
    return result.right;
  });
}
