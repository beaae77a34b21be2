import { Effect, Either } from "effect";
import { PACKAGE_BINDINGS } from "../constants.ts";
import { LoggerService } from "../effect/services.ts";
import type { Fetcher } from "../fetcher/types.ts";
import { MEDIA_TYPES, matchesMediaType } from "../media-type.ts";
import type { PublicationAsset } from "../publication/asset.ts";
import { PublicationBuilder } from "../publication/builder.ts";
import { defaultContentServiceFactory, htmlIteratorFactory, type ResourceContentIteratorFactory } from "../publication/content.ts";
import { mediaOverlayFactory } from "../publication/guided-navigation.ts";
import type { PublicationParser } from "../publication/parser.ts";
import { RECOMMENDED_REFLOWABLE_STRATEGY, epubPositionsServiceFactory, type ReflowableStrategy } from "../publication/positions.ts";
import { ServicesBuilder } from "../publication/services.ts";
import { InvalidPackageError, type PublicationError } from "../utils/errors.ts";
import { getRootFilePath } from "./container.ts";
import { withDeobfuscation } from "./deobfuscator.ts";
import { parseDisplayOptions } from "./display-options.ts";
import { parseEncryptionData } from "./encryption.ts";
import { parseNavigationData } from "./navigation.ts";
import { parsePackageDocument } from "./package-document.ts";
import { PublicationFactory } from "./publication-factory.ts";

export interface EpubParserOptions {
  reflowableStrategy?: ReflowableStrategy;
  contentIterators?: ResourceContentIteratorFactory[];
}

export function createEpubParser(options: EpubParserOptions = {}): PublicationParser {
  const reflowableStrategy = options.reflowableStrategy ?? RECOMMENDED_REFLOWABLE_STRATEGY;
  const contentIterators = options.contentIterators ?? [htmlIteratorFactory()];

  const parse = (asset: PublicationAsset, fetcher: Fetcher): Effect.Effect<PublicationBuilder | null, PublicationError, LoggerService> =>
    Effect.gen(function* () {
      if (!matchesMediaType(asset.mediaType, MEDIA_TYPES.epub)) return null;

      const logger = yield* LoggerService;
      const opfPath = yield* getRootFilePath(fetcher);

      const packageDocument = yield* fetcher
        .get({ href: opfPath, type: MEDIA_TYPES.opf })
        .readAsXml(PACKAGE_BINDINGS)
        .pipe(
          Effect.mapError((e) => new InvalidPackageError(opfPath, e)),
          Effect.flatMap((document) =>
            Either.match(parsePackageDocument(document, opfPath), {
              onLeft: (reason) => Effect.fail(new InvalidPackageError(opfPath, new Error(reason))),
              onRight: (parsed) => Effect.succeed(parsed),
            }),
          ),
        );

      const navigationData = yield* parseNavigationData(packageDocument, fetcher);
      const encryptionData = yield* parseEncryptionData(fetcher);
      const displayOptions = yield* parseDisplayOptions(fetcher);

      const manifest = new PublicationFactory({
        fallbackTitle: asset.name,
        packageDocument,
        navigationData,
        encryptionData,
        displayOptions,
      }).create();

      yield* logger.debug("EpubParser", "Assembled manifest", {
        asset: asset.name,
        epub_version: packageDocument.epubVersion,
        reading_order: manifest.readingOrder.length,
        resources: manifest.resources.length,
        navigation_roles: Object.keys(navigationData),
        encrypted: Object.keys(encryptionData).length,
        options: Object.keys(displayOptions).length,
      });

      const servicesBuilder = new ServicesBuilder({
        PositionsService: epubPositionsServiceFactory(reflowableStrategy),
        ContentService: defaultContentServiceFactory(contentIterators),
        GuidedNavigationService: mediaOverlayFactory(),
      });

      return new PublicationBuilder(manifest, withDeobfuscation(fetcher, manifest.metadata.identifier), servicesBuilder);
    });

  return { name: "epub", parse };
}
