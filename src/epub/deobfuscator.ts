import { createHash } from "node:crypto";
import { ALGORITHM_ADOBE_OBFUSCATION, ALGORITHM_IDPF_OBFUSCATION } from "../constants.ts";
import { MappedResource } from "../fetcher/resource.ts";
import { TransformingFetcher } from "../fetcher/transforming.ts";
import type { Fetcher, Resource } from "../fetcher/types.ts";

interface ObfuscationKey {
  key: Uint8Array;
  /** Number of leading bytes XOR-ed by the algorithm. */
  length: number;
}

function idpfKey(identifier: string): ObfuscationKey {
  const digest = createHash("sha1").update(identifier.replace(/[ \u0009\u000d\u000a]/g, ""), "utf-8").digest();
  return { key: new Uint8Array(digest), length: 1040 };
}

function adobeKey(identifier: string): ObfuscationKey | undefined {
  const hex = identifier.replace("urn:uuid:", "").replace(/-/g, "");
  if (hex.length === 0 || hex.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(hex)) return undefined;
  return { key: new Uint8Array(Buffer.from(hex, "hex")), length: 1024 };
}

function xorPrefix(bytes: Uint8Array, { key, length }: ObfuscationKey): Uint8Array {
  const result = Uint8Array.from(bytes);
  const end = Math.min(length, result.length);
  for (let i = 0; i < end; i++) {
    result[i] = (result[i] ?? 0) ^ (key[i % key.length] ?? 0);
  }
  return result;
}

/**
 * Reverses IDPF and Adobe font obfuscation. Both XOR the start of the file
 * with a key derived from the publication identifier, so the transform is its
 * own inverse. Resources with any other algorithm pass through untouched.
 */
export class Deobfuscator {
  private readonly keys: Record<string, ObfuscationKey | undefined>;

  constructor(readonly identifier: string) {
    this.keys = {
      [ALGORITHM_IDPF_OBFUSCATION]: idpfKey(identifier),
      [ALGORITHM_ADOBE_OBFUSCATION]: adobeKey(identifier),
    };
  }

  transform = (resource: Resource): Resource => {
    const algorithm = resource.link.properties?.encrypted?.algorithm;
    const key = algorithm ? this.keys[algorithm] : undefined;
    if (!key) return resource;
    return new MappedResource(resource, (bytes) => xorPrefix(bytes, key));
  };
}

const transformKey = (identifier: string) => `deobfuscation:${identifier}`;

/**
 * Wraps `fetcher` so obfuscated resources read back in clear. Without an
 * identifier there is no key, and the fetcher is returned as-is. Wrapping a
 * fetcher already deobfuscating with the same identifier is a no-op.
 */
export function withDeobfuscation(fetcher: Fetcher, identifier: string | undefined): Fetcher {
  if (!identifier) return fetcher;
  const key = transformKey(identifier);
  if (fetcher instanceof TransformingFetcher && fetcher.key === key) return fetcher;
  return new TransformingFetcher(fetcher, new Deobfuscator(identifier).transform, key);
}
