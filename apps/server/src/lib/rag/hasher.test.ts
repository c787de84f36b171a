import { describe, expect, it } from "vitest";
import { chunkId } from "./hasher.js";

const meta = { source: "A", page: "1", type: "text" };

describe("chunkId", () => {
  it("joins metadata with the sha1 of the content", () => {
    expect(chunkId("hello", meta)).toBe("A|p1|text|aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d");
  });

  it("is stable across calls", () => {
    const content = "Fund performance improved by 4.2% year over year.";
    expect(chunkId(content, meta)).toBe(chunkId(content, { ...meta }));
  });

  it("hashes only the first 400 characters", () => {
    const head = "x".repeat(400);
    expect(chunkId(`${head}tail one`, meta)).toBe(chunkId(`${head}tail two`, meta));
    expect(chunkId(`${"x".repeat(399)}a`, meta)).not.toBe(chunkId(`${"x".repeat(399)}b`, meta));
  });

  it("distinguishes page and type", () => {
    const base = chunkId("same", meta);
    expect(chunkId("same", { ...meta, page: "2" })).not.toBe(base);
    expect(chunkId("same", { ...meta, type: "table" })).not.toBe(base);
    expect(chunkId("same", { ...meta, page: "2" }).startsWith("A|p2|text|")).toBe(true);
  });

  it("does not fold whitespace in metadata", () => {
    expect(chunkId("same", { ...meta, source: " A " }).startsWith(" A |p1|text|")).toBe(true);
    expect(chunkId("same", { ...meta, source: " A " })).not.toBe(chunkId("same", meta));
  });
});
