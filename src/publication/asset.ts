import { basename, extname } from "node:path";
import { mediaTypeFromExtension } from "../media-type.ts";

/** What a publication file claims to be, before any parser has looked inside it. */
export interface PublicationAsset {
  readonly name: string;
  readonly mediaType: string;
}

export const UNKNOWN_MEDIA_TYPE = "application/octet-stream";

export function fileAsset(filePath: string, mediaType?: string): PublicationAsset {
  return {
    name: basename(filePath),
    mediaType: mediaType ?? mediaTypeFromExtension(extname(filePath).slice(1)) ?? UNKNOWN_MEDIA_TYPE,
  };
}
