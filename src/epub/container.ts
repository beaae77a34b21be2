import { Effect } from "effect";
import { CONTAINER_BINDINGS, CONTAINER_PATH } from "../constants.ts";
import type { Fetcher } from "../fetcher/types.ts";
import { MEDIA_TYPES, matchesMediaType } from "../media-type.ts";
import { ContainerError } from "../utils/errors.ts";
import { decodePath } from "../utils/path.ts";
import type { XmlDocument } from "../xml/document.ts";

export function findPackagePath(container: XmlDocument): string | undefined {
  // Some producers drop the container namespace.
  const rootfiles = [...container.descendants("cn:rootfile"), ...container.descendants("rootfile")];

  const opf = rootfiles.find((rootfile) => matchesMediaType(rootfile.attr("media-type"), MEDIA_TYPES.opf));
  const path = opf?.attr("full-path") ?? rootfiles.find((rootfile) => rootfile.attr("full-path"))?.attr("full-path");
  return path ? decodePath(path) : undefined;
}

/** Reads `META-INF/container.xml` and returns the path of the package document. */
export function getRootFilePath(fetcher: Fetcher): Effect.Effect<string, ContainerError> {
  return fetcher
    .get({ href: CONTAINER_PATH, type: MEDIA_TYPES.xml })
    .readAsXml(CONTAINER_BINDINGS)
    .pipe(
      Effect.mapError((e) => new ContainerError(CONTAINER_PATH, e.message, e)),
      Effect.flatMap((container) => {
        const path = findPackagePath(container);
        return path
          ? Effect.succeed(path)
          : Effect.fail(new ContainerError(CONTAINER_PATH, "no rootfile declared"));
      }),
    );
}
