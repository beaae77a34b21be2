import type { Effect } from "effect";
import type { Link } from "../manifest.ts";
import type { ResourceError } from "../utils/errors.ts";
import type { Fetcher, Resource, ResourceTransformer } from "./types.ts";

/**
 * Passes every resource of the wrapped fetcher through `transformer`.
 * `key` names the transformation so callers can tell whether it is already applied.
 */
export class TransformingFetcher implements Fetcher {
  constructor(
    readonly inner: Fetcher,
    private readonly transformer: ResourceTransformer,
    readonly key: string,
  ) {}

  links(): Effect.Effect<Link[], ResourceError> {
    return this.inner.links();
  }

  get(link: Link): Resource {
    return this.transformer(this.inner.get(link));
  }

  close(): void {
    this.inner.close();
  }
}
