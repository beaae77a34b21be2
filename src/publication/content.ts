import { Effect } from "effect";
import type { Resource } from "../fetcher/types.ts";
import type { Link } from "../manifest.ts";
import { isHtml } from "../media-type.ts";
import type { ResourceError } from "../utils/errors.ts";
import { cleanText } from "../utils/text.ts";
import type { ContentElement, ContentService, ServiceContext } from "./services.ts";

export interface ResourceContentIteratorFactory {
  accepts(link: Link): boolean;
  elements(resource: Resource): Effect.Effect<ContentElement[], ResourceError>;
}

const BLOCK_PATTERN = /<(h[1-6]|p|li|blockquote)\b[^>]*>([\s\S]*?)<\/\1\s*>/gi;

function roleOf(tag: string): ContentElement["role"] {
  const name = tag.toLowerCase();
  if (name.startsWith("h")) return "heading";
  if (name === "li") return "listItem";
  if (name === "blockquote") return "quote";
  return "body";
}

/** Splits an (X)HTML resource into its text blocks. */
export function htmlIteratorFactory(): ResourceContentIteratorFactory {
  return {
    accepts: (link) => isHtml(link.type),
    elements: (resource) =>
      resource.readAsString().pipe(
        Effect.map((html) => {
          const body = html.match(/<body\b[^>]*>([\s\S]*)<\/body\s*>/i)?.[1] ?? html;
          const elements: ContentElement[] = [];
          for (const match of body.matchAll(BLOCK_PATTERN)) {
            const text = cleanText(match[2]);
            if (!text) continue;
            elements.push({
              locator: {
                href: resource.link.href,
                type: resource.link.type ?? "text/html",
                locations: { progression: (match.index ?? 0) / body.length },
              },
              role: roleOf(match[1] ?? "p"),
              text,
            });
          }
          return elements;
        }),
      ),
  };
}

export function defaultContentServiceFactory(iterators: readonly ResourceContentIteratorFactory[]) {
  return ({ manifest, fetcher }: ServiceContext): ContentService => ({
    elements: () =>
      Effect.forEach(manifest.readingOrder, (link) => {
        const iterator = iterators.find((candidate) => candidate.accepts(link));
        return iterator ? iterator.elements(fetcher.get(link)) : Effect.succeed([]);
      }).pipe(Effect.map((perResource) => perResource.flat())),
  });
}
