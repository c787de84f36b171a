import type { SourceCitation } from "@docqa/core";
import { DEFAULT_TYPE, UNKNOWN, type ChunkMetadata } from "./records.js";

export type Passage = { content: string; metadata: Partial<ChunkMetadata> };

export type AssembledContext = {
  context: string;
  /** One entry per passage, same order as the blocks in `context`. */
  citations: SourceCitation[];
};

export function toCitation(meta: Partial<ChunkMetadata>): SourceCitation {
  return {
    source: meta.source || UNKNOWN,
    page: meta.page || UNKNOWN,
    type: meta.type || DEFAULT_TYPE,
  };
}

export function assembleContext(passages: Passage[]): AssembledContext {
  const citations = passages.map((p) => toCitation(p.metadata));
  const context = passages
    .map((p, i) => {
      const c = citations[i];
      return `[Source ${i + 1}: ${c.source} - Page ${c.page} - ${c.type}]\n${p.content}`;
    })
    .join("\n\n");
  return { context, citations };
}
