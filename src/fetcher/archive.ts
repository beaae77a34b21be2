import AdmZip from "adm-zip";
import { Effect } from "effect";
import { readFile } from "node:fs/promises";
import type { Link } from "../manifest.ts";
import { mediaTypeFromExtension } from "../media-type.ts";
import { detectArchiveType } from "../utils/archive.ts";
import { ArchiveError, ResourceError } from "../utils/errors.ts";
import { extensionOf, stripFragment } from "../utils/path.ts";
import { BaseResource, FailureResource } from "./resource.ts";
import type { Fetcher, Resource } from "./types.ts";

type ZipEntry = ReturnType<AdmZip["getEntries"]>[number];

class ArchiveEntryResource extends BaseResource {
  constructor(
    link: Link,
    private readonly entry: ZipEntry,
  ) {
    super(link);
  }

  read(): Effect.Effect<Uint8Array, ResourceError> {
    return Effect.try({
      try: () => new Uint8Array(this.entry.getData()),
      catch: (e) => new ResourceError("Unavailable", this.link.href, e),
    });
  }

  override length(): Effect.Effect<number, ResourceError> {
    return Effect.succeed(this.entry.header.size);
  }
}

/** Fetcher over a ZIP container (EPUB, CBZ, plain ZIP). Entries keep archive order. */
export class ArchiveFetcher implements Fetcher {
  private constructor(private readonly zip: AdmZip) {}

  static fromBuffer(buffer: Buffer, source: string): Effect.Effect<ArchiveFetcher, ArchiveError> {
    const type = detectArchiveType(buffer.subarray(0, 8));
    if (type !== "zip") {
      return Effect.fail(new ArchiveError(source, `open (${type ?? "unknown"} archive)`));
    }
    return Effect.try({
      try: () => new ArchiveFetcher(new AdmZip(buffer)),
      catch: (e) => new ArchiveError(source, "open", e),
    });
  }

  static open(filePath: string): Effect.Effect<ArchiveFetcher, ArchiveError> {
    return Effect.tryPromise({
      try: () => readFile(filePath),
      catch: (e) => new ArchiveError(filePath, "read", e),
    }).pipe(Effect.flatMap((buffer) => ArchiveFetcher.fromBuffer(buffer, filePath)));
  }

  links(): Effect.Effect<Link[], ResourceError> {
    return Effect.try({
      try: () =>
        this.zip
          .getEntries()
          .filter((entry) => !entry.isDirectory)
          .map((entry): Link => {
            const type = mediaTypeFromExtension(extensionOf(entry.entryName));
            return type ? { href: entry.entryName, type } : { href: entry.entryName };
          }),
      catch: (e) => new ResourceError("Unavailable", "/", e),
    });
  }

  get(link: Link): Resource {
    const entry = this.zip.getEntry(stripFragment(link.href));
    if (!entry || entry.isDirectory) return new FailureResource(link, "NotFound");
    return new ArchiveEntryResource(link, entry);
  }

  close(): void {
    // adm-zip holds the whole archive in memory; nothing to release.
  }
}
