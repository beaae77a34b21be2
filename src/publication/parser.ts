import type { Effect } from "effect";
import type { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import type { PublicationError } from "../utils/errors.ts";
import type { PublicationAsset } from "./asset.ts";
import type { PublicationBuilder } from "./builder.ts";

/**
 * Turns an asset into a publication. Succeeding with `null` means the asset is
 * not this parser's format and the next parser should be tried.
 */
export interface PublicationParser {
  readonly name: string;
  parse(asset: PublicationAsset, fetcher: Fetcher): Effect.Effect<PublicationBuilder | null, PublicationError, LoggerService>;
}
