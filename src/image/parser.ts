import { Effect } from "effect";
import { IMAGE_ARCHIVE_AUXILIARY_EXTENSIONS, PROFILES, WEBPUB_CONTEXT } from "../constants.ts";
import { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import { localizedString, type Link, type Manifest } from "../manifest.ts";
import { MEDIA_TYPES, isBitmap, matchesMediaType } from "../media-type.ts";
import type { PublicationAsset } from "../publication/asset.ts";
import { PublicationBuilder } from "../publication/builder.ts";
import type { PublicationParser } from "../publication/parser.ts";
import { perResourcePositionsServiceFactory } from "../publication/positions.ts";
import { ServicesBuilder } from "../publication/services.ts";
import { ArchiveError, NoBitmapError, type PublicationError } from "../utils/errors.ts";
import { extensionOf, isHiddenOrThumbs } from "../utils/path.ts";
import { firstTitle, titleFromFileStructure } from "./title.ts";

function isAuxiliary(link: Link): boolean {
  return IMAGE_ARCHIVE_AUXILIARY_EXTENSIONS.has(extensionOf(link.href));
}

/** A comic-book type is taken at its word; anything else must hold only bitmaps and metadata sidecars. */
export function acceptsImageArchive(asset: PublicationAsset, links: readonly Link[]): boolean {
  if (matchesMediaType(asset.mediaType, MEDIA_TYPES.cbz) || matchesMediaType(asset.mediaType, MEDIA_TYPES.cbr)) {
    return true;
  }
  return links.every((link) => isHiddenOrThumbs(link.href) || isBitmap(link.type) || isAuxiliary(link));
}

/** Code-unit order on the full href: "page10" sorts before "page2". */
function byHref(a: Link, b: Link): number {
  return a.href < b.href ? -1 : a.href > b.href ? 1 : 0;
}

/**
 * Parses an image-based publication from an unstructured archive of bitmaps
 * (CBZ, CBR, or a plain ZIP).
 */
export function createImageParser(): PublicationParser {
  const parse = (asset: PublicationAsset, fetcher: Fetcher): Effect.Effect<PublicationBuilder | null, PublicationError, LoggerService> =>
    Effect.gen(function* () {
      const logger = yield* LoggerService;
      const links = yield* fetcher.links().pipe(Effect.mapError((e) => new ArchiveError(asset.name, "listing", e)));

      if (!acceptsImageArchive(asset, links)) {
        yield* logger.debug("ImageParser", "Archive holds non-image content", { asset: asset.name });
        return null;
      }

      const readingOrder = links
        .filter((link) => !isHiddenOrThumbs(link.href) && isBitmap(link.type))
        .map((link): Link => ({ ...link }))
        .sort(byHref);

      const [cover] = readingOrder;
      if (!cover) {
        return yield* Effect.fail(new NoBitmapError(asset.name));
      }
      cover.rels = ["cover"];

      const title = firstTitle([() => titleFromFileStructure(links), () => asset.name]) ?? asset.name;

      const manifest: Manifest = {
        context: [WEBPUB_CONTEXT],
        metadata: {
          title: localizedString(title),
          conformsTo: [PROFILES.divina],
        },
        links: [],
        readingOrder,
        resources: [],
        tableOfContents: [],
        subcollections: {},
      };

      yield* logger.debug("ImageParser", "Assembled manifest", {
        asset: asset.name,
        reading_order: readingOrder.length,
      });

      const servicesBuilder = new ServicesBuilder({
        PositionsService: perResourcePositionsServiceFactory("image/*"),
      });
      return new PublicationBuilder(manifest, fetcher, servicesBuilder);
    });

  return { name: "image", parse };
}
