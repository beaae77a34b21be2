import { describe, test, expect, afterEach, vi } from "vitest";
import { log } from "../../../src/logging/index.ts";

describe("logging/logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("writes one JSON line per entry to stderr for warnings", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    log.warn("Navigation", "Skipped", { href: "OEBPS/toc.ncx" });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: Record<string, unknown> = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: "warn", tag: "Navigation", msg: "Skipped", href: "OEBPS/toc.ncx" });
    expect(typeof entry.ts).toBe("string");
  });

  test("serializes non-Error causes", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    log.error("Archive", "Failed", { code: 3 });

    const entry: Record<string, unknown> = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry.error).toBe('{"code":3}');
  });

  test("writes info entries to stdout", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    log.info("Publication", "Parsed book.epub", { parser: "epub" });

    expect(err).not.toHaveBeenCalled();
    const entry: Record<string, unknown> = JSON.parse(String(out.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: "info", tag: "Publication", msg: "Parsed book.epub", parser: "epub" });
  });

  test("records the message of an Error cause", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    log.error("Archive", "Failed", new Error("bad header"), { file: "book.epub" });

    const entry: Record<string, unknown> = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: "error", error: "bad header", file: "book.epub" });
    expect(typeof entry.error_stack).toBe("string");
  });
});
