import { Schema } from "@effect/schema";
import { Either } from "effect";
import { DEFAULT_POSITIONS_PAGE_LENGTH } from "./constants.ts";
import type { ReflowableStrategy } from "./publication/positions.ts";

export interface Config {
  positionsStrategy: ReflowableStrategy;
}

// LOG_LEVEL is read by the logger itself; it is only validated here.
const Environment = Schema.Struct({
  LOG_LEVEL: Schema.optional(Schema.Literal("debug", "info", "warn", "error")),
  POSITIONS_PAGE_LENGTH: Schema.optional(Schema.NumberFromString.pipe(Schema.int(), Schema.positive())),
  POSITIONS_STRATEGY: Schema.optional(Schema.Literal("archive-entry-length", "original-length")),
});

export function parseConfig(env: Record<string, string | undefined>): Either.Either<Config, string> {
  const parseResult = Schema.decodeUnknownEither(Environment)(env);
  if (parseResult._tag === "Left") {
    return Either.left(parseResult.left.message);
  }

  const raw = parseResult.right;
  const pageLength = raw.POSITIONS_PAGE_LENGTH ?? DEFAULT_POSITIONS_PAGE_LENGTH;
  return Either.right({
    positionsStrategy:
      raw.POSITIONS_STRATEGY === "original-length"
        ? { _tag: "OriginalLength", pageLength }
        : { _tag: "ArchiveEntryLength", pageLength },
  });
}
