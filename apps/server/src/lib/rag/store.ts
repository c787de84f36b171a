// apps/server/src/lib/rag/store.ts
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { z } from "zod";
import { errorMessage, IndexOpenFailed, IngestionFailed, RetrievalFailed } from "../../errors.js";
import type { Logger } from "../../logger.js";
import type { Embedder } from "../ollama.js";
import type { ChunkMetadata } from "./records.js";

export const INDEX_VERSION = 1;
export const DISTANCE_SPACE = "cosine";

// ──────────────────────────────────────────────────────────────
// On-disk shape
// ──────────────────────────────────────────────────────────────
const Metadata = z.object({ source: z.string(), page: z.string(), type: z.string() });

const Entry = z.object({
  id: z.string(),
  content: z.string(),
  metadata: Metadata,
  embedding: z.array(z.number()),
});

const Header = z.object({
  name: z.string(),
  space: z.string(),
  embedModel: z.string(),
  version: z.number(),
  dims: z.number().int().nonnegative(),
  complete: z.boolean(),
});

type IndexHeader = z.infer<typeof Header>;
export type IndexEntry = z.infer<typeof Entry>;

export type QueryResult = {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  distance: number;
};

export type UpsertBatch = {
  ids: string[];
  documents: string[];
  metadatas: ChunkMetadata[];
};

export type UpsertReport = { written: number; embedded: number };

export type IndexFiles = { header: string; entries: string };

export interface IndexLocation {
  dir: string;
  name: string;
  embedder: Embedder;
  logger?: Logger;
}

export type OpenResult =
  | { state: "ready"; index: VectorIndex }
  | { state: "incomplete"; index: VectorIndex }
  | { state: "missing" }
  | { state: "incompatible"; error: IndexOpenFailed };

// ──────────────────────────────────────────────────────────────
// Math
// ──────────────────────────────────────────────────────────────
export function cosineDistance(a: number[], b: number[]) {
  let dot = 0, na = 0, nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-9);
}

const sameMetadata = (a: ChunkMetadata, b: ChunkMetadata) =>
  a.source === b.source && a.page === b.page && a.type === b.type;

// ──────────────────────────────────────────────────────────────
// Collection
// ──────────────────────────────────────────────────────────────
const isMissing = (e: unknown) => e instanceof Error && "code" in e && e.code === "ENOENT";

/**
 * A persisted similarity-search collection keyed by chunk id. Entries are
 * written only through `upsert`; an existing id is overwritten, never duplicated.
 *
 * On disk the collection is a small header document plus an append-only JSONL
 * log of entries. Each upsert appends only its own batch; a later line for the
 * same id supersedes earlier ones, and `markComplete` compacts the log.
 */
export class VectorIndex {
  private readonly entries = new Map<string, IndexEntry>();
  private header: IndexHeader;
  private headerDirty: boolean;
  /** Lines currently in the entries log, superseded ones included. */
  private logLines: number;

  private constructor(
    private readonly loc: IndexLocation,
    header: IndexHeader,
    entries: IndexEntry[] = [],
    logLines = 0
  ) {
    this.header = header;
    this.headerDirty = logLines === 0;
    this.logLines = logLines;
    for (const e of entries) this.entries.set(e.id, e);
  }

  static filesFor(dir: string, name: string): IndexFiles {
    return {
      header: path.join(dir, `${name}.header.json`),
      entries: path.join(dir, `${name}.entries.jsonl`),
    };
  }

  /** A fresh, empty, not-yet-complete collection. Nothing is written until the first upsert. */
  static create(loc: IndexLocation): VectorIndex {
    return new VectorIndex(loc, {
      name: loc.name,
      space: DISTANCE_SPACE,
      embedModel: loc.embedder.model,
      version: INDEX_VERSION,
      dims: 0,
      complete: false,
    });
  }

  /**
   * Classifies what is on disk. Missing and incompatible collections are
   * reported so the caller can rebuild; a corrupt one throws. A torn last line
   * in the log of an unfinished build is cut off so the build can resume.
   */
  static async open(loc: IndexLocation): Promise<OpenResult> {
    const files = VectorIndex.filesFor(loc.dir, loc.name);
    let raw: string;
    try {
      raw = await fsp.readFile(files.header, "utf-8");
    } catch (e) {
      if (isMissing(e)) return { state: "missing" };
      throw new IndexOpenFailed("corrupt", `cannot read ${files.header}`, e);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new IndexOpenFailed("corrupt", `${files.header} is not valid JSON`, e);
    }

    const head = Header.safeParse(json);
    if (!head.success) throw new IndexOpenFailed("corrupt", `${files.header} has no readable header`, head.error);

    const h = head.data;
    const mismatch =
      h.version !== INDEX_VERSION ? `version ${h.version} != ${INDEX_VERSION}`
      : h.name !== loc.name ? `collection "${h.name}" != "${loc.name}"`
      : h.space !== DISTANCE_SPACE ? `space "${h.space}" != "${DISTANCE_SPACE}"`
      : h.embedModel !== loc.embedder.model ? `embedding model "${h.embedModel}" != "${loc.embedder.model}"`
      : null;
    if (mismatch) return { state: "incompatible", error: new IndexOpenFailed("incompatible", mismatch) };

    const { entries, lines } = await readLog(files.entries, h);
    const index = new VectorIndex(loc, h, entries, lines);
    return h.complete ? { state: "ready", index } : { state: "incomplete", index };
  }

  get name() {
    return this.header.name;
  }

  get complete() {
    return this.header.complete;
  }

  get files(): IndexFiles {
    return VectorIndex.filesFor(this.loc.dir, this.loc.name);
  }

  count() {
    return this.entries.size;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  get(id: string): IndexEntry | undefined {
    return this.entries.get(id);
  }

  /**
   * Insert-or-overwrite by id. Items already stored with identical content and
   * metadata keep their embedding; everything else is embedded in one call.
   * A batch is checked as a whole before any entry changes.
   */
  async upsert(batch: UpsertBatch): Promise<UpsertReport> {
    const { ids, documents, metadatas } = batch;
    if (ids.length !== documents.length || ids.length !== metadatas.length) {
      throw new IngestionFailed(`upsert arity mismatch: ${ids.length} ids, ${documents.length} documents, ${metadatas.length} metadatas`);
    }

    // last occurrence of an id within the batch wins
    const pending = new Map<string, { content: string; metadata: ChunkMetadata }>();
    ids.forEach((id, i) => pending.set(id, { content: documents[i], metadata: metadatas[i] }));

    const stale = [...pending].filter(([id, item]) => {
      const prev = this.entries.get(id);
      return !prev || prev.content !== item.content || !sameMetadata(prev.metadata, item.metadata);
    });
    if (!stale.length) return { written: pending.size, embedded: 0 };

    let vectors: number[][];
    try {
      vectors = await this.loc.embedder.embed(stale.map(([, item]) => item.content));
    } catch (e) {
      throw new IngestionFailed(`embedding ${stale.length} chunk(s) failed: ${errorMessage(e)}`, e);
    }
    if (vectors.length !== stale.length) {
      throw new IngestionFailed(`embedder returned ${vectors.length} vectors for ${stale.length} chunk(s)`);
    }

    const dims = this.header.dims || vectors[0].length;
    const wrong = vectors.findIndex((v) => v.length !== dims);
    if (wrong >= 0) {
      throw new IngestionFailed(`embedding for "${stale[wrong][0]}" has ${vectors[wrong].length} dims, expected ${dims}`);
    }

    const fresh: IndexEntry[] = stale.map(([id, item], i) => ({
      id,
      content: item.content,
      metadata: { ...item.metadata },
      embedding: vectors[i],
    }));
    if (this.header.dims !== dims) {
      this.header = { ...this.header, dims };
      this.headerDirty = true;
    }
    await this.append(fresh);
    for (const e of fresh) this.entries.set(e.id, e);
    return { written: pending.size, embedded: stale.length };
  }

  /** Nearest `n` entries to `text`, ascending cosine distance. */
  async query(text: string, n: number, signal?: AbortSignal): Promise<QueryResult[]> {
    if (this.entries.size === 0 || n <= 0) return [];

    const [vec] = await this.loc.embedder.embed([text], signal);
    if (!vec) throw new RetrievalFailed("embedder returned no vector for the query");
    if (vec.length !== this.header.dims) {
      throw new RetrievalFailed(`query embedding has ${vec.length} dims, index has ${this.header.dims}`);
    }

    const scored: QueryResult[] = [];
    for (const e of this.entries.values()) {
      scored.push({ id: e.id, content: e.content, metadata: e.metadata, distance: cosineDistance(vec, e.embedding) });
    }
    return scored.sort((a, b) => a.distance - b.distance).slice(0, n);
  }

  /** Flags the build finished; superseded log lines are dropped first. */
  async markComplete(complete = true) {
    if (this.logLines > this.entries.size) await this.compact();
    this.header = { ...this.header, complete };
    await this.writeHeader();
  }

  /** Drops every entry and resets the embedding identity to the current embedder. */
  async clear() {
    this.entries.clear();
    await fsp.mkdir(this.loc.dir, { recursive: true });
    await fsp.writeFile(this.files.entries, "", "utf-8");
    this.logLines = 0;
    this.header = { ...this.header, embedModel: this.loc.embedder.model, dims: 0, complete: false };
    await this.writeHeader();
  }

  // ──────────────────────────────────────────────────────────────
  // persistence
  // ──────────────────────────────────────────────────────────────
  private async writeHeader() {
    const file = this.files.header;
    const tmp = `${file}.tmp`;
    await fsp.mkdir(this.loc.dir, { recursive: true });
    await fsp.writeFile(tmp, JSON.stringify(this.header), "utf-8");
    await fsp.rename(tmp, file);
    this.headerDirty = false;
  }

  private async append(entries: IndexEntry[]) {
    // the header goes first so every logged entry matches its `dims`
    if (this.headerDirty) await this.writeHeader();
    await fsp.appendFile(this.files.entries, entries.map(toLine).join(""), "utf-8");
    this.logLines += entries.length;
    this.loc.logger?.debug({ file: this.files.entries, appended: entries.length, entries: this.entries.size }, "index appended");
  }

  private async compact() {
    const file = this.files.entries;
    const tmp = `${file}.tmp`;
    const handle = await fsp.open(tmp, "w");
    try {
      let buf: string[] = [];
      for (const e of this.entries.values()) {
        buf.push(toLine(e));
        if (buf.length >= COMPACT_CHUNK) {
          await handle.write(buf.join(""));
          buf = [];
        }
      }
      if (buf.length) await handle.write(buf.join(""));
    } finally {
      await handle.close();
    }
    await fsp.rename(tmp, file);
    this.loc.logger?.debug({ file, dropped: this.logLines - this.entries.size }, "index log compacted");
    this.logLines = this.entries.size;
  }
}

const COMPACT_CHUNK = 500;

const toLine = (e: IndexEntry) => `${JSON.stringify(e)}\n`;

/**
 * Replays the entries log, last line per id wins. Any unreadable line is
 * corruption, except a torn final line of an unfinished build, which is
 * truncated away.
 */
async function readLog(file: string, h: IndexHeader): Promise<{ entries: IndexEntry[]; lines: number }> {
  const byId = new Map<string, IndexEntry>();
  let lines = 0;
  let goodBytes = 0;
  let torn: { line: number; detail: string } | undefined;

  const corrupt = (line: number, detail: string, cause?: unknown) =>
    new IndexOpenFailed("corrupt", `${file} line ${line}: ${detail}`, cause);

  let input: fs.ReadStream;
  try {
    await fsp.access(file);
    input = fs.createReadStream(file, { encoding: "utf-8" });
  } catch (e) {
    if (isMissing(e)) return { entries: [], lines: 0 };
    throw new IndexOpenFailed("corrupt", `cannot read ${file}`, e);
  }

  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  for await (const text of rl) {
    lineNo++;
    if (torn) throw corrupt(torn.line, torn.detail);
    if (!text.trim()) {
      goodBytes += Buffer.byteLength(text, "utf-8") + 1;
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      torn = { line: lineNo, detail: "not valid JSON" };
      continue;
    }
    const parsed = Entry.safeParse(json);
    if (!parsed.success) throw corrupt(lineNo, "malformed entry", parsed.error);
    const e = parsed.data;
    if (e.embedding.length !== h.dims) {
      throw corrupt(lineNo, `entry "${e.id}" has ${e.embedding.length} dims, expected ${h.dims}`);
    }
    byId.set(e.id, e);
    lines++;
    goodBytes += Buffer.byteLength(text, "utf-8") + 1;
  }

  if (torn) {
    if (h.complete) throw corrupt(torn.line, torn.detail);
    await fsp.truncate(file, goodBytes);
  }
  return { entries: [...byId.values()], lines };
}
