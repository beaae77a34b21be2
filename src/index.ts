export { createEpubParser, type EpubParserOptions } from "./epub/parser.ts";
export { createImageParser } from "./image/parser.ts";
export { parseNavigationData, selectNavigationSource, type NavigationSource } from "./epub/navigation.ts";
export { parseEncryption, parseEncryptionData } from "./epub/encryption.ts";
export { parseDisplayOptions } from "./epub/display-options.ts";
export { Deobfuscator, withDeobfuscation } from "./epub/deobfuscator.ts";
export { parsePackageDocument, type PackageDocument } from "./epub/package-document.ts";
export { ArchiveFetcher } from "./fetcher/archive.ts";
export { InMemoryFetcher } from "./fetcher/memory.ts";
export { TransformingFetcher } from "./fetcher/transforming.ts";
export type { Fetcher, Resource, ResourceTransformer } from "./fetcher/types.ts";
export { LoggerService, LiveLoggerService, LiveLayer } from "./effect/services.ts";
export { fileAsset, type PublicationAsset } from "./publication/asset.ts";
export { Publication, PublicationBuilder } from "./publication/builder.ts";
export { defaultParsers, openPublication, parsePublication } from "./publication/open.ts";
export type { PublicationParser } from "./publication/parser.ts";
export { RECOMMENDED_REFLOWABLE_STRATEGY, type ReflowableStrategy } from "./publication/positions.ts";
export { manifestToJson } from "./manifest.ts";
export type { Encryption, Link, Locator, Manifest, Metadata, NavigationMap } from "./manifest.ts";
export * from "./utils/errors.ts";
