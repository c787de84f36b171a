// apps/server/src/lib/rag/records.ts
import fs from "node:fs";
import fsp from "node:fs/promises";
import readline from "node:readline";
import { z } from "zod";
import { IngestionRecordMalformed, IngestionSourceUnavailable } from "../../errors.js";

// ──────────────────────────────────────────────────────────────
// Chunk record shape (one JSON object per line)
// ──────────────────────────────────────────────────────────────
export type ChunkMetadata = {
  source: string;
  page: string;
  type: string;
};

export type ChunkRecord = {
  content: string;
  metadata: ChunkMetadata;
};

export const UNKNOWN = "Unknown";
export const DEFAULT_TYPE = "text";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

const RawRecord = z.object({
  content: scalar.nullish(),
  metadata: z
    .object({
      source: scalar.nullish(),
      page: scalar.nullish(),
      type: scalar.nullish(),
    })
    .nullish(),
});

// present values are kept verbatim; only absent or empty ones take the default
const orDefault = (v: string | null | undefined, d: string) => (v ? v : d);

export function normalizeMetadata(meta?: Partial<Record<keyof ChunkMetadata, string | null>> | null): ChunkMetadata {
  return {
    source: orDefault(meta?.source, UNKNOWN),
    page: orDefault(meta?.page, UNKNOWN),
    type: orDefault(meta?.type, DEFAULT_TYPE),
  };
}

/** Parses one line; absent fields take their defaults, wrong shapes throw IngestionRecordMalformed. */
export function parseChunkLine(line: string, lineNo: number): ChunkRecord {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    throw new IngestionRecordMalformed(lineNo, "invalid JSON", e);
  }
  const parsed = RawRecord.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "record";
    throw new IngestionRecordMalformed(lineNo, `${where}: ${issue?.message ?? "unexpected shape"}`, parsed.error);
  }
  return {
    content: parsed.data.content ?? "",
    metadata: normalizeMetadata(parsed.data.metadata),
  };
}

// ──────────────────────────────────────────────────────────────
// Streaming reader
// ──────────────────────────────────────────────────────────────
export type MalformedPolicy = "skip" | "fail";

export interface ReadOptions {
  onMalformed?: MalformedPolicy;
  /** Called for every skipped line when the policy is "skip". */
  onSkip?: (err: IngestionRecordMalformed) => void;
}

export type NumberedRecord = { line: number; record: ChunkRecord };

async function assertReadable(file: string) {
  try {
    const stat = await fsp.stat(file);
    if (!stat.isFile()) throw new Error("not a regular file");
  } catch (e) {
    throw new IngestionSourceUnavailable(file, e);
  }
}

/** Streams records line by line; the file is never held in memory as a whole. */
export async function* readChunkRecords(file: string, opts: ReadOptions = {}): AsyncGenerator<NumberedRecord> {
  await assertReadable(file);
  const policy = opts.onMalformed ?? "skip";

  const input = fs.createReadStream(file, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  try {
    for await (const raw of rl) {
      lineNo++;
      const line = raw.trim();
      if (!line) continue;
      try {
        yield { line: lineNo, record: parseChunkLine(line, lineNo) };
      } catch (e) {
        if (policy === "fail" || !(e instanceof IngestionRecordMalformed)) throw e;
        opts.onSkip?.(e);
      }
    }
  } finally {
    rl.close();
    input.destroy();
  }
}

/** Distinct `metadata.source` values of a chunk stream, sorted. */
export async function scanSources(file: string, opts: Pick<ReadOptions, "onSkip"> = {}): Promise<string[]> {
  const sources = new Set<string>();
  for await (const { record } of readChunkRecords(file, { onMalformed: "skip", onSkip: opts.onSkip })) {
    sources.add(record.metadata.source);
  }
  return [...sources].sort();
}
