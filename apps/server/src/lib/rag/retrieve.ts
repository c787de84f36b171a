// apps/server/src/lib/rag/retrieve.ts
import { errorMessage, RagError, RetrievalFailed, RetrievalTimeout } from "../../errors.js";
import { withTimeout } from "../timeout.js";
import type { ChunkMetadata } from "./records.js";
import type { VectorIndex } from "./store.js";

export const DEFAULT_K = 3;
export const DEFAULT_OVERFETCH = 10;

export type Retrieved = {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
};

export interface RetrieveOptions {
  /** Keep only chunks whose `metadata.source` equals this. */
  source?: string;
  k?: number;
  /** Candidates requested from the index when `source` is set. */
  overfetch?: number;
  timeoutMs?: number;
}

/**
 * Nearest chunks for `query`. With a source filter the index is over-fetched and
 * the ranked candidates are scanned in order until `k` matches are collected.
 * An empty array is a valid answer, not an error.
 */
export async function retrieve(index: VectorIndex, query: string, opts: RetrieveOptions = {}): Promise<Retrieved[]> {
  const k = opts.k ?? DEFAULT_K;
  const overfetch = opts.overfetch ?? DEFAULT_OVERFETCH;
  const source = opts.source;

  const run = async (signal?: AbortSignal) => {
    if (!source) return index.query(query, k, signal);

    const candidates = await index.query(query, overfetch, signal);
    const out: typeof candidates = [];
    for (const c of candidates) {
      if (c.metadata.source !== source) continue;
      out.push(c);
      if (out.length >= k) break;
    }
    return out;
  };

  try {
    const hits = opts.timeoutMs
      ? await withTimeout(run, opts.timeoutMs, () => new RetrievalTimeout(opts.timeoutMs ?? 0))
      : await run();
    return hits.map(({ content, metadata, distance }) => ({ content, metadata, distance }));
  } catch (e) {
    if (e instanceof RagError) throw e;
    throw new RetrievalFailed(errorMessage(e), e);
  }
}
