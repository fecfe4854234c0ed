import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FragmentStore, parseSequenceNumber } from "./fragmentStore.js";

const body = (text: string) => () => Promise.resolve(new TextEncoder().encode(text));

describe("parseSequenceNumber", () => {
  it("reads common segment naming schemes", () => {
    expect(parseSequenceNumber("https://cdn.example.com/v/media_42.ts?token=x", 0)).toBe(42);
    expect(parseSequenceNumber("https://cdn.example.com/v/seg-7.ts", 0)).toBe(7);
    expect(parseSequenceNumber("https://cdn.example.com/v/chunk_003.ts", 0)).toBe(3);
  });

  it("falls back when no sequence is present", () => {
    expect(parseSequenceNumber("https://cdn.example.com/v/abcdef.ts", 9)).toBe(9);
  });
});

describe("FragmentStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coursekeep-fragments-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("accepts each .ts URL once", async () => {
    const store = new FragmentStore(dir);
    expect(store.observe("https://cdn.example.com/seg-1.ts", body("a"))).toBe(true);
    expect(store.observe("https://cdn.example.com/seg-1.ts", body("a"))).toBe(false);
    expect(store.observe("https://cdn.example.com/index.m3u8", body("#EXTM3U"))).toBe(false);
    expect(store.observe("https://cdn.example.com/poster.jpg", body("x"))).toBe(false);
    await store.settle();

    expect(store.count).toBe(1);
    expect(store.fragments()).toHaveLength(1);
    expect(await readFile(join(dir, "fragment_00000.ts"), "utf-8")).toBe("a");
  });

  it("orders by arrival even when writes finish out of order", async () => {
    const store = new FragmentStore(dir);
    let releaseFirst: () => void = () => undefined;
    const slow = () =>
      new Promise<Uint8Array>((resolve) => {
        releaseFirst = () => resolve(new TextEncoder().encode("first"));
      });

    store.observe("https://cdn.example.com/seg-9.ts", slow);
    store.observe("https://cdn.example.com/seg-2.ts", body("second"));
    await Promise.resolve();
    releaseFirst();
    await store.settle();

    expect(store.fragments().map((fragment) => fragment.sequence)).toEqual([9, 2]);
    expect(store.buildConcatList()).toBe("file 'fragment_00000.ts'\nfile 'fragment_00001.ts'");
    expect(store.totalBytes).toBe(11);
  });

  it("tracks the furthest captured position", () => {
    const store = new FragmentStore(dir, { segmentSeconds: 10 });
    expect(store.capturedUntilSeconds).toBe(0);
    store.observe("https://cdn.example.com/media_12.ts", body("x"));
    store.observe("https://cdn.example.com/media_4.ts", body("x"));
    expect(store.capturedUntilSeconds).toBe(120);
  });

  it("ignores responses after sealing", async () => {
    const store = new FragmentStore(dir);
    store.seal();
    expect(store.observe("https://cdn.example.com/seg-1.ts", body("a"))).toBe(false);
    await store.settle();
    expect(store.count).toBe(0);
  });

  it("drops fragments from the given index on when sealed with a limit", async () => {
    const store = new FragmentStore(dir);
    store.observe("https://cdn.example.com/a/seg-0.ts", body("a0"));
    store.observe("https://cdn.example.com/a/seg-1.ts", body("a1"));
    store.observe("https://cdn.example.com/b/seg-0.ts", body("b0"));
    store.seal(2);
    await store.settle();

    expect(store.count).toBe(2);
    expect(store.fragments().map((fragment) => fragment.url)).toEqual([
      "https://cdn.example.com/a/seg-0.ts",
      "https://cdn.example.com/a/seg-1.ts",
    ]);
    expect(store.buildConcatList()).toBe("file 'fragment_00000.ts'\nfile 'fragment_00001.ts'");
    expect(store.totalBytes).toBe(4);
  });

  it("logs and skips fragments whose body cannot be read", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const store = new FragmentStore(dir, { logger });
    store.observe("https://cdn.example.com/seg-1.ts", () => Promise.reject(new Error("reset")));
    await store.settle();

    expect(store.count).toBe(1);
    expect(store.fragments()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Could not save fragment 0: reset");
  });
});
