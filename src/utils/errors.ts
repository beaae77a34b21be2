import { log } from "../logging/index.ts";

export type ResourceErrorKind = "NotFound" | "Forbidden" | "Unavailable";

export class ResourceError extends Error {
  readonly _tag = "ResourceError";
  public readonly kind: ResourceErrorKind;
  public readonly href: string;
  public readonly originalError?: unknown;

  constructor(kind: ResourceErrorKind, href: string, originalError?: unknown) {
    super(`Resource ${kind === "NotFound" ? "not found" : kind.toLowerCase()}: ${href}`);
    this.name = "ResourceError";
    this.kind = kind;
    this.href = href;
    this.originalError = originalError;
  }
}

export class XmlParseError extends Error {
  readonly _tag = "XmlParseError";
  public readonly href: string;

  constructor(href: string, reason: string) {
    super(`Malformed XML in ${href}: ${reason}`);
    this.name = "XmlParseError";
    this.href = href;
  }
}

export type ReadError = ResourceError | XmlParseError;

export class PublicationError extends Error {
  public readonly source: string;
  public readonly originalError?: unknown;

  constructor(message: string, source: string, originalError?: unknown) {
    super(message);
    this.name = "PublicationError";
    this.source = source;
    this.originalError = originalError;
  }
}

export class ContainerError extends PublicationError {
  readonly _tag = "ContainerError";

  constructor(source: string, reason: string, cause?: unknown) {
    super(`Cannot locate the package document: ${reason}`, source, cause);
    this.name = "ContainerError";
  }
}

export class InvalidPackageError extends PublicationError {
  readonly _tag = "InvalidPackageError";

  constructor(source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Invalid package document${detail}`, source, cause);
    this.name = "InvalidPackageError";
  }
}

export class NoBitmapError extends PublicationError {
  readonly _tag = "NoBitmapError";

  constructor(source: string) {
    super("No bitmap found in the publication", source);
    this.name = "NoBitmapError";
  }
}

export class ArchiveError extends PublicationError {
  readonly _tag = "ArchiveError";

  constructor(source: string, operation: string, cause?: unknown) {
    super(`Archive ${operation} failed`, source, cause);
    this.name = "ArchiveError";
  }
}

export class UnsupportedFormatError extends PublicationError {
  readonly _tag = "UnsupportedFormatError";

  constructor(source: string, mediaType: string) {
    super(`No parser accepts ${mediaType}`, source);
    this.name = "UnsupportedFormatError";
  }
}

export function logHandlerError(tag: string, filePath: string, error: unknown): void {
  if (error instanceof PublicationError) {
    log.error(tag, error.message, error.originalError, { file: filePath, source: error.source });
  } else if (error instanceof Error) {
    log.error(tag, "Unexpected error", error, { file: filePath });
  } else {
    log.error(tag, "Unknown error", error, { file: filePath });
  }
}
