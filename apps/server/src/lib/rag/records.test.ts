import fsp from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { IngestionRecordMalformed, IngestionSourceUnavailable } from "../../errors.js";
import { chunk, tempDir, writeChunks } from "../../testing/fakes.js";
import { parseChunkLine, readChunkRecords, scanSources } from "./records.js";

async function collect<T>(it: AsyncIterable<T>) {
  const out: T[] = [];
  for await (const x of it) out.push(x);
  return out;
}

describe("parseChunkLine", () => {
  it("reads content and metadata", () => {
    const rec = parseChunkLine(JSON.stringify(chunk("Annual Report", 7, "Body text", "table")), 1);
    expect(rec).toEqual({ content: "Body text", metadata: { source: "Annual Report", page: "7", type: "table" } });
  });

  it("defaults absent fields", () => {
    expect(parseChunkLine("{}", 1)).toEqual({
      content: "",
      metadata: { source: "Unknown", page: "Unknown", type: "text" },
    });
    expect(parseChunkLine('{"content":"x","metadata":{"source":""}}', 1).metadata.source).toBe("Unknown");
  });

  it("keeps present metadata values verbatim", () => {
    const rec = parseChunkLine('{"content":"x","metadata":{"source":" A ","page":"  ","type":"Table"}}', 1);
    expect(rec.metadata).toEqual({ source: " A ", page: "  ", type: "Table" });
  });

  it("rejects invalid JSON with the line number", () => {
    const err = (() => {
      try {
        parseChunkLine("{nope", 12);
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(IngestionRecordMalformed);
    expect(err).toMatchObject({ line: 12, message: "Malformed chunk record on line 12: invalid JSON" });
  });

  it("rejects shapes that cannot be read as text", () => {
    expect(() => parseChunkLine('{"content":{"nested":true}}', 3)).toThrowError(/line 3: content/);
    expect(() => parseChunkLine('{"metadata":"A"}', 4)).toThrowError(/line 4: metadata/);
    expect(() => parseChunkLine("42", 5)).toThrowError(IngestionRecordMalformed);
  });
});

describe("readChunkRecords", () => {
  it("skips blank and malformed lines and reports them", async () => {
    const dir = await tempDir();
    const file = await writeChunks(dir, [chunk("A", 1, "one"), "", "{broken", chunk("B", 2, "two")]);
    const skipped: number[] = [];

    const rows = await collect(readChunkRecords(file, { onSkip: (e) => skipped.push(e.line) }));

    expect(rows.map((r) => [r.line, r.record.content])).toEqual([
      [1, "one"],
      [4, "two"],
    ]);
    expect(skipped).toEqual([3]);
  });

  it("stops on the first malformed line under the fail policy", async () => {
    const dir = await tempDir();
    const file = await writeChunks(dir, [chunk("A", 1, "one"), "{broken"]);
    await expect(collect(readChunkRecords(file, { onMalformed: "fail" }))).rejects.toBeInstanceOf(IngestionRecordMalformed);
  });

  it("fails fast when the source is missing", async () => {
    const dir = await tempDir();
    await expect(collect(readChunkRecords(path.join(dir, "absent.jsonl")))).rejects.toBeInstanceOf(
      IngestionSourceUnavailable
    );
  });

  it("treats a directory as unavailable", async () => {
    const dir = await tempDir();
    await fsp.mkdir(path.join(dir, "sub"));
    await expect(collect(readChunkRecords(path.join(dir, "sub")))).rejects.toBeInstanceOf(IngestionSourceUnavailable);
  });
});

describe("scanSources", () => {
  it("returns distinct sources sorted", async () => {
    const dir = await tempDir();
    const file = await writeChunks(dir, [
      chunk("Zeta", 1, "a"),
      chunk("Alpha", 1, "b"),
      chunk("Zeta", 2, "c"),
      { content: "no metadata" },
      "not json",
    ]);
    expect(await scanSources(file)).toEqual(["Alpha", "Unknown", "Zeta"]);
  });
});
