import type { Effect } from "effect";
import type { NamespaceBindings } from "../constants.ts";
import type { Link } from "../manifest.ts";
import type { ReadError, ResourceError } from "../utils/errors.ts";
import type { XmlDocument } from "../xml/document.ts";

/** A single readable entry of a publication. Reads are lazy and may be repeated. */
export interface Resource {
  readonly link: Link;
  read(): Effect.Effect<Uint8Array, ResourceError>;
  length(): Effect.Effect<number, ResourceError>;
  readAsString(): Effect.Effect<string, ResourceError>;
  readAsXml(bindings?: NamespaceBindings): Effect.Effect<XmlDocument, ReadError>;
}

/** Resource access for one publication: lists what it holds and opens entries by link. */
export interface Fetcher {
  links(): Effect.Effect<Link[], ResourceError>;
  get(link: Link): Resource;
  close(): void;
}

export type ResourceTransformer = (resource: Resource) => Resource;
