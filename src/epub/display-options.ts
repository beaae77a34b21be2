import { Effect, Either } from "effect";
import { DISPLAY_OPTIONS_PATHS } from "../constants.ts";
import { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import { MEDIA_TYPES } from "../media-type.ts";
import type { XmlDocument } from "../xml/document.ts";

function readOptions(document: XmlDocument): Record<string, string> {
  const options: Record<string, string> = {};
  const platform = document.find("platform");
  if (!platform) return options;

  for (const option of platform.elements("option")) {
    const name = option.attr("name");
    const value = option.textContent();
    if (name && value) options[name] = value;
  }
  return options;
}

/**
 * Vendor display options (`fixed-layout`, `specified-fonts`, ...). The Apple
 * document is tried first, then Kobo's; the first one that parses wins.
 */
export function parseDisplayOptions(fetcher: Fetcher): Effect.Effect<Record<string, string>, never, LoggerService> {
  return Effect.gen(function* () {
    const logger = yield* LoggerService;

    const result = yield* Effect.firstSuccessOf(
      DISPLAY_OPTIONS_PATHS.map((href) => Effect.suspend(() => fetcher.get({ href, type: MEDIA_TYPES.xml }).readAsXml())),
    ).pipe(Effect.either);

    if (Either.isLeft(result)) {
      const none: Record<string, string> = {};
      yield* logger.debug("DisplayOptions", "No vendor display options", { error: result.left.message });
      return none;
    }
    return readOptions(result.right);
  });
}
