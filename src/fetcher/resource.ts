import { Effect } from "effect";
import type { NamespaceBindings } from "../constants.ts";
import type { Link } from "../manifest.ts";
import { ResourceError, XmlParseError, type ReadError, type ResourceErrorKind } from "../utils/errors.ts";
import { parseXml, type XmlDocument } from "../xml/document.ts";
import type { Resource } from "./types.ts";

export function decodeText(bytes: Uint8Array): string {
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export abstract class BaseResource implements Resource {
  constructor(readonly link: Link) {}

  abstract read(): Effect.Effect<Uint8Array, ResourceError>;

  length(): Effect.Effect<number, ResourceError> {
    return this.read().pipe(Effect.map((bytes) => bytes.byteLength));
  }

  readAsString(): Effect.Effect<string, ResourceError> {
    return this.read().pipe(Effect.map(decodeText));
  }

  readAsXml(bindings: NamespaceBindings = {}): Effect.Effect<XmlDocument, ReadError> {
    const href = this.link.href;
    return this.readAsString().pipe(
      Effect.flatMap((text) =>
        Effect.try({
          try: () => parseXml(text, bindings),
          catch: (e) => new XmlParseError(href, e instanceof Error ? e.message : String(e)),
        }),
      ),
    );
  }
}

export class BytesResource extends BaseResource {
  constructor(
    link: Link,
    private readonly bytes: Uint8Array,
  ) {
    super(link);
  }

  read(): Effect.Effect<Uint8Array, ResourceError> {
    return Effect.succeed(this.bytes);
  }
}

export class FailureResource extends BaseResource {
  constructor(
    link: Link,
    private readonly kind: ResourceErrorKind,
    private readonly cause?: unknown,
  ) {
    super(link);
  }

  read(): Effect.Effect<Uint8Array, ResourceError> {
    return Effect.fail(new ResourceError(this.kind, this.link.href, this.cause));
  }
}

/** Resource whose bytes are rewritten on every read; the length is taken as unchanged. */
export class MappedResource extends BaseResource {
  constructor(
    private readonly inner: Resource,
    private readonly map: (bytes: Uint8Array) => Uint8Array,
  ) {
    super(inner.link);
  }

  read(): Effect.Effect<Uint8Array, ResourceError> {
    return this.inner.read().pipe(Effect.map(this.map));
  }

  override length(): Effect.Effect<number, ResourceError> {
    return this.inner.length();
  }
}
