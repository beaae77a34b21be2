import { Effect, Either } from "effect";
import { parseConfig, type Config } from "./config.ts";
import { LiveLayer } from "./effect/services.ts";
import { createEpubParser } from "./epub/parser.ts";
import { createImageParser } from "./image/parser.ts";
import { log } from "./logging/index.ts";
import { manifestToJson } from "./manifest.ts";
import { openPublication } from "./publication/open.ts";
import { UnsupportedFormatError, logHandlerError } from "./utils/errors.ts";

function loadConfig(): Config {
  const result = parseConfig(process.env);
  if (Either.isLeft(result)) {
    log.error("Config", "Invalid environment", result.left);
    process.exit(1);
  }
  return result.right;
}

async function main(): Promise<void> {
  const config = loadConfig();

  const [filePath] = process.argv.slice(2);
  if (!filePath) {
    log.error("CLI", "Usage: webpub-normalizer <file.epub|file.cbz|file.zip>");
    process.exitCode = 1;
    return;
  }

  const startTime = Date.now();
  const result = await Effect.runPromise(
    openPublication(filePath, [
      createEpubParser({ reflowableStrategy: config.positionsStrategy }),
      createImageParser(),
    ]).pipe(Effect.either, Effect.provide(LiveLayer)),
  );

  if (Either.isLeft(result)) {
    logHandlerError("CLI", filePath, result.left);
    process.exitCode = result.left instanceof UnsupportedFormatError ? 2 : 1;
    return;
  }

  const publication = result.right;
  try {
    process.stdout.write(`${JSON.stringify(manifestToJson(publication.manifest), null, 2)}\n`);
  } finally {
    publication.close();
  }
  log.debug("CLI", "Done", { file: filePath, duration_ms: Date.now() - startTime });
}

void main();
