// apps/server/src/lib/rag/ingest.ts
import type { Logger } from "../../logger.js";
import { chunkId } from "./hasher.js";
import { readChunkRecords, type ChunkMetadata, type ChunkRecord, type MalformedPolicy } from "./records.js";
import { VectorIndex, type IndexLocation } from "./store.js";

export const DEFAULT_BATCH_SIZE = 50;

export interface IngestOptions {
  batchSize?: number;
  onMalformed?: MalformedPolicy;
  logger?: Logger;
}

export type IngestReport = {
  /** Records upserted, duplicates included. */
  indexed: number;
  /** Malformed lines skipped. */
  skipped: number;
  /** Records that needed a fresh embedding. */
  embedded: number;
  batches: number;
};

/**
 * Upserts records into `index` in fixed-size batches. Records are consumed one
 * at a time; only the current batch is held in memory.
 */
export async function ingestRecords(
  index: VectorIndex,
  records: AsyncIterable<ChunkRecord> | Iterable<ChunkRecord>,
  opts: IngestOptions = {}
): Promise<IngestReport> {
  const size = opts.batchSize && opts.batchSize > 0 ? opts.batchSize : DEFAULT_BATCH_SIZE;
  const report: IngestReport = { indexed: 0, skipped: 0, embedded: 0, batches: 0 };

  let ids: string[] = [];
  let documents: string[] = [];
  let metadatas: ChunkMetadata[] = [];

  const flush = async () => {
    if (!ids.length) return;
    const { embedded } = await index.upsert({ ids, documents, metadatas });
    report.batches++;
    report.embedded += embedded;
    opts.logger?.info({ batch: report.batches, size: ids.length, embedded, total: report.indexed }, "batch upserted");
    ids = [];
    documents = [];
    metadatas = [];
  };

  for await (const { content, metadata } of records) {
    ids.push(chunkId(content, metadata));
    documents.push(content);
    metadatas.push(metadata);
    report.indexed++;
    if (ids.length >= size) await flush();
  }
  await flush();

  return report;
}

/** Streams a JSONL chunk file into `index`. Throws IngestionSourceUnavailable if it cannot be read. */
export async function ingestFile(index: VectorIndex, file: string, opts: IngestOptions = {}): Promise<IngestReport> {
  let skipped = 0;
  const records = async function* () {
    const stream = readChunkRecords(file, {
      onMalformed: opts.onMalformed,
      onSkip: (err) => {
        skipped++;
        opts.logger?.warn({ line: err.line }, err.message);
      },
    });
    for await (const { record } of stream) yield record;
  };

  const report = await ingestRecords(index, records(), opts);
  report.skipped = skipped;
  opts.logger?.info({ file, indexed: report.indexed, skipped, unique: index.count() }, "ingestion finished");
  return report;
}

// ──────────────────────────────────────────────────────────────
// Bootstrap: reuse a persisted collection or build it
// ──────────────────────────────────────────────────────────────
export type BootstrapPath = "loaded" | "built" | "resumed" | "rebuilt";

export interface BootstrapOptions extends IngestOptions {
  location: IndexLocation;
  chunksPath: string;
}

export type BootstrapResult = {
  index: VectorIndex;
  path: BootstrapPath;
  report?: IngestReport;
};

export async function loadOrBuildIndex(opts: BootstrapOptions): Promise<BootstrapResult> {
  const log = opts.logger;
  const opened = await VectorIndex.open(opts.location);

  if (opened.state === "ready") {
    log?.info({ entries: opened.index.count() }, "loaded existing index");
    return { index: opened.index, path: "loaded" };
  }

  let index: VectorIndex;
  let path: BootstrapPath;
  if (opened.state === "incomplete") {
    log?.warn({ entries: opened.index.count() }, "previous build did not finish; resuming");
    index = opened.index;
    path = "resumed";
  } else if (opened.state === "incompatible") {
    log?.warn({ reason: opened.error.message }, "existing index is incompatible; rebuilding");
    index = VectorIndex.create(opts.location);
    await index.clear();
    path = "rebuilt";
  } else {
    log?.info("no index on disk; building from chunks");
    index = VectorIndex.create(opts.location);
    path = "built";
  }

  const report = await ingestFile(index, opts.chunksPath, opts);
  await index.markComplete();
  log?.info({ path, entries: index.count() }, "index ready");
  return { index, path, report };
}
