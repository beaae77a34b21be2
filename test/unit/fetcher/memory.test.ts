import { describe, test, expect } from "vitest";
import { Effect } from "effect";
import { InMemoryFetcher } from "../../../src/fetcher/memory.ts";
import { TransformingFetcher } from "../../../src/fetcher/transforming.ts";
import { MappedResource } from "../../../src/fetcher/resource.ts";

describe("fetcher/memory", () => {
  test("lists entries in insertion order", async () => {
    const fetcher = new InMemoryFetcher({ "b.png": "b", "a.xhtml": "a", LICENSE: "l" });

    expect(await Effect.runPromise(fetcher.links())).toEqual([
      { href: "b.png", type: "image/png" },
      { href: "a.xhtml", type: "application/xhtml+xml" },
      { href: "LICENSE" },
    ]);
  });

  test("reads by href, ignoring the fragment", async () => {
    const fetcher = new InMemoryFetcher({ "a.xhtml": "<p>a</p>" });

    expect(await Effect.runPromise(fetcher.get({ href: "a.xhtml#frag" }).readAsString())).toBe("<p>a</p>");
  });

  test("close drops every entry", async () => {
    const fetcher = new InMemoryFetcher({ "a.xhtml": "a" });
    fetcher.close();

    expect(await Effect.runPromise(fetcher.links())).toEqual([]);
  });
});

describe("fetcher/transforming", () => {
  test("passes every resource through the transformer", async () => {
    const inner = new InMemoryFetcher({ "a.txt": "abc" });
    const upper = new TransformingFetcher(
      inner,
      (resource) => new MappedResource(resource, (bytes) => new Uint8Array(Buffer.from(Buffer.from(bytes).toString("utf-8").toUpperCase()))),
      "upper",
    );

    expect(await Effect.runPromise(upper.get({ href: "a.txt" }).readAsString())).toBe("ABC");
    expect(await Effect.runPromise(upper.links())).toEqual([{ href: "a.txt", type: "text/plain" }]);
    expect(upper.key).toBe("upper");
  });
});
