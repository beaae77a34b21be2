import { Effect } from "effect";
import { DEFAULT_POSITIONS_PAGE_LENGTH } from "../constants.ts";
import type { Link, Locator, Manifest } from "../manifest.ts";
import { matchesPattern } from "../media-type.ts";
import type { ResourceError } from "../utils/errors.ts";
import type { PositionsService, ServiceContext } from "./services.ts";

/**
 * How a reflowable resource is cut into positions. Both cut every `pageLength`
 * bytes; they differ in which length they measure.
 */
export type ReflowableStrategy =
  | { readonly _tag: "ArchiveEntryLength"; readonly pageLength: number }
  | { readonly _tag: "OriginalLength"; readonly pageLength: number };

export const RECOMMENDED_REFLOWABLE_STRATEGY: ReflowableStrategy = {
  _tag: "ArchiveEntryLength",
  pageLength: DEFAULT_POSITIONS_PAGE_LENGTH,
};

function withTotalProgression(positions: Locator[][]): Locator[] {
  const flat = positions.flat();
  const total = flat.length;
  return flat.map((locator, index) => ({
    ...locator,
    locations: {
      ...locator.locations,
      position: index + 1,
      totalProgression: total === 0 ? 0 : index / total,
    },
  }));
}

/** One position per reading-order resource, used for image publications. */
export function perResourcePositionsServiceFactory(fallbackMediaType: string) {
  return ({ manifest }: ServiceContext): PositionsService => ({
    positions: () =>
      Effect.succeed(
        withTotalProgression(
          manifest.readingOrder.map((link) => [
            {
              href: link.href,
              type: link.type && matchesPattern(link.type, fallbackMediaType) ? link.type : fallbackMediaType,
              title: link.title,
              locations: {},
            },
          ]),
        ),
      ),
  });
}

function isFixedLayout(manifest: Manifest, link: Link): boolean {
  return (link.properties?.layout ?? manifest.metadata.presentation?.layout) === "fixed";
}

function pageCount(strategy: ReflowableStrategy, context: ServiceContext, link: Link): Effect.Effect<number, ResourceError> {
  const originalLength = link.properties?.encrypted?.originalLength;
  const length =
    strategy._tag === "OriginalLength" && originalLength !== undefined
      ? Effect.succeed(originalLength)
      : context.fetcher.get(link).length();
  return length.pipe(Effect.map((bytes) => Math.max(1, Math.ceil(bytes / strategy.pageLength))));
}

function resourcePositions(strategy: ReflowableStrategy, context: ServiceContext, link: Link): Effect.Effect<Locator[], ResourceError> {
  const type = link.type ?? "text/html";
  if (isFixedLayout(context.manifest, link)) {
    return Effect.succeed([{ href: link.href, type, title: link.title, locations: { progression: 0 } }]);
  }
  return pageCount(strategy, context, link).pipe(
    Effect.map((count) =>
      Array.from({ length: count }, (_, n) => ({
        href: link.href,
        type,
        title: link.title,
        locations: { progression: n / count },
      })),
    ),
  );
}

export function epubPositionsServiceFactory(strategy: ReflowableStrategy) {
  return (context: ServiceContext): PositionsService => ({
    positions: () =>
      Effect.forEach(context.manifest.readingOrder, (link) => resourcePositions(strategy, context, link)).pipe(
        Effect.map(withTotalProgression),
      ),
  });
}
