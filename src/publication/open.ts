import { Effect } from "effect";
import { createEpubParser } from "../epub/parser.ts";
import { LoggerService } from "../effect/services.ts";
import { ArchiveFetcher } from "../fetcher/archive.ts";
import type { Fetcher } from "../fetcher/types.ts";
import { createImageParser } from "../image/parser.ts";
import { UnsupportedFormatError, type PublicationError } from "../utils/errors.ts";
import { fileAsset, type PublicationAsset } from "./asset.ts";
import type { Publication } from "./builder.ts";
import type { PublicationParser } from "./parser.ts";

export function defaultParsers(): PublicationParser[] {
  return [createEpubParser(), createImageParser()];
}

/** Runs `parsers` in order; the first one that recognizes the asset builds the publication. */
export function parsePublication(
  asset: PublicationAsset,
  fetcher: Fetcher,
  parsers: readonly PublicationParser[] = defaultParsers(),
): Effect.Effect<Publication, PublicationError, LoggerService> {
  return Effect.gen(function* () {
    const logger = yield* LoggerService;

    for (const parser of parsers) {
      const builder = yield* parser.parse(asset, fetcher);
      if (builder) {
        yield* logger.info("Publication", `Parsed ${asset.name}`, { parser: parser.name, media_type: asset.mediaType });
        return builder.build();
      }
    }

    return yield* Effect.fail(new UnsupportedFormatError(asset.name, asset.mediaType));
  });
}

/** Opens a publication file from disk. The caller owns the result and must `close()` it. */
export function openPublication(
  filePath: string,
  parsers?: readonly PublicationParser[],
): Effect.Effect<Publication, PublicationError, LoggerService> {
  return ArchiveFetcher.open(filePath).pipe(
    Effect.flatMap((fetcher) =>
      parsePublication(fileAsset(filePath), fetcher, parsers).pipe(Effect.tapError(() => Effect.sync(() => fetcher.close()))),
    ),
  );
}
