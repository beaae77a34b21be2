import { Effect } from "effect";
import type { Fetcher, Resource } from "../fetcher/types.ts";
import type { Link, Locator, Manifest } from "../manifest.ts";
import type { ResourceError } from "../utils/errors.ts";
import { stripFragment } from "../utils/path.ts";
import { ServicesBuilder, type ServiceMap, type ServiceName, type Services } from "./services.ts";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export class Publication {
  private readonly services: Services;

  constructor(
    readonly manifest: Manifest,
    readonly fetcher: Fetcher,
    servicesBuilder: ServicesBuilder,
  ) {
    this.services = servicesBuilder.build({ manifest, fetcher });
  }

  findService<K extends ServiceName>(name: K): ServiceMap[K] | undefined {
    return this.services[name];
  }

  /** Finds a manifest link by href, ignoring any fragment. Nested table-of-contents entries are not searched. */
  linkWithHref(href: string): Link | undefined {
    const path = stripFragment(href);
    const { readingOrder, resources, links } = this.manifest;
    return [...readingOrder, ...resources, ...links].find((link) => stripFragment(link.href) === path);
  }

  /** Opens a resource through the manifest's own link, so properties such as encryption apply. */
  get(link: Link): Resource {
    return this.fetcher.get(this.linkWithHref(link.href) ?? link);
  }

  positions(): Effect.Effect<Locator[], ResourceError> {
    return this.findService("PositionsService")?.positions() ?? Effect.succeed([]);
  }

  close(): void {
    this.fetcher.close();
  }
}

/** What a parser hands back: the manifest, the fetcher to read it through, and its services. */
export class PublicationBuilder {
  constructor(
    readonly manifest: Manifest,
    readonly fetcher: Fetcher,
    readonly servicesBuilder: ServicesBuilder = new ServicesBuilder(),
  ) {}

  build(): Publication {
    return new Publication(deepFreeze(this.manifest), this.fetcher, this.servicesBuilder);
  }
}
