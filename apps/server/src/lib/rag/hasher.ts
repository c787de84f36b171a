import { createHash } from "node:crypto";
import type { ChunkMetadata } from "./records.js";

export const HASH_PREFIX_CHARS = 400;

function prefix(s: string, n: number) {
  // count code points, not UTF-16 units, so a surrogate pair is never split
  let out = "";
  let i = 0;
  for (const ch of s) {
    if (i++ >= n) break;
    out += ch;
  }
  return out;
}

/** `source|p<page>|type|sha1(first 400 chars)`; stable across runs for identical input. */
export function chunkId(content: string, metadata: ChunkMetadata): string {
  const h = createHash("sha1").update(prefix(content, HASH_PREFIX_CHARS), "utf8").digest("hex");
  return `${metadata.source}|p${metadata.page}|${metadata.type}|${h}`;
}
