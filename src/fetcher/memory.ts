import { Effect } from "effect";
import type { Link } from "../manifest.ts";
import { mediaTypeFromExtension } from "../media-type.ts";
import { extensionOf, stripFragment } from "../utils/path.ts";
import type { ResourceError } from "../utils/errors.ts";
import { BytesResource, FailureResource } from "./resource.ts";
import type { Fetcher, Resource } from "./types.ts";

/** Fetcher over entries held in memory, in insertion order. */
export class InMemoryFetcher implements Fetcher {
  private readonly entries: Map<string, Uint8Array>;

  constructor(entries: Record<string, string | Uint8Array>) {
    this.entries = new Map(
      Object.entries(entries).map(([path, content]) => [
        path,
        typeof content === "string" ? new Uint8Array(Buffer.from(content, "utf-8")) : content,
      ]),
    );
  }

  links(): Effect.Effect<Link[], ResourceError> {
    return Effect.succeed(
      [...this.entries.keys()].map((href) => {
        const type = mediaTypeFromExtension(extensionOf(href));
        return type ? { href, type } : { href };
      }),
    );
  }

  get(link: Link): Resource {
    const bytes = this.entries.get(stripFragment(link.href));
    return bytes ? new BytesResource(link, bytes) : new FailureResource(link, "NotFound");
  }

  close(): void {
    this.entries.clear();
  }
}
