import { Effect, Either } from "effect";
import { ENCRYPTION_BINDINGS, ENCRYPTION_PATH, LCP_KEY_RETRIEVAL_URI, LCP_SCHEME } from "../constants.ts";
import { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import type { Encryption } from "../manifest.ts";
import { MEDIA_TYPES } from "../media-type.ts";
import { resolveHref } from "../utils/path.ts";
import type { XmlDocument, XmlElement } from "../xml/document.ts";

const COMPRESSION_METHODS: Record<string, string> = {
  "8": "deflate",
  "0": "none",
};

function parseEncryptedData(data: XmlElement): [href: string, encryption: Encryption] | undefined {
  const uri = data.element("enc:CipherData")?.element("enc:CipherReference")?.attr("URI");
  const algorithm = data.element("enc:EncryptionMethod")?.attr("Algorithm");
  if (!uri || !algorithm) return undefined;

  const encryption: Encryption = { algorithm };

  const retrieval = data.element("ds:KeyInfo")?.element("ds:RetrievalMethod")?.attr("URI");
  if (retrieval === LCP_KEY_RETRIEVAL_URI) {
    encryption.scheme = LCP_SCHEME;
  }

  const compression = data.find("comp:Compression");
  if (compression) {
    const method = compression.attr("Method");
    const originalLength = Number.parseInt(compression.attr("OriginalLength") ?? "", 10);
    if (method !== undefined && COMPRESSION_METHODS[method]) encryption.compression = COMPRESSION_METHODS[method];
    if (!Number.isNaN(originalLength)) encryption.originalLength = originalLength;
  }

  // CipherReference URIs are relative to the container root.
  return [resolveHref("", uri), encryption];
}

/** One record per `EncryptedData` entry, keyed by resource path. */
export function parseEncryption(document: XmlDocument): Record<string, Encryption> {
  const records: Record<string, Encryption> = {};
  for (const data of document.descendants("enc:EncryptedData")) {
    const record = parseEncryptedData(data);
    if (record) records[record[0]] = record[1];
  }
  return records;
}

/** Reads `META-INF/encryption.xml`. A missing or malformed descriptor yields `{}`. */
export function parseEncryptionData(fetcher: Fetcher): Effect.Effect<Record<string, Encryption>, never, LoggerService> {
  return Effect.gen(function* () {
    const logger = yield* LoggerService;
    const result = yield* fetcher
      .get({ href: ENCRYPTION_PATH, type: MEDIA_TYPES.xml })
      .readAsXml(ENCRYPTION_BINDINGS)
      .pipe(Effect.map(parseEncryption), Effect.either);

    if (Either.isLeft(result)) {
      const none: Record<string, Encryption> = {};
      yield* logger.debug("Encryption", "No usable encryption descriptor", {
        href: ENCRYPTION_PATH,
        error: result.left.message,
      });
      return none;
    }
    return result.right;
  });
}
