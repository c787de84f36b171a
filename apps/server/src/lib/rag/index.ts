export { chunkId, HASH_PREFIX_CHARS } from "./hasher.js";
export { readChunkRecords, scanSources, parseChunkLine, normalizeMetadata } from "./records.js";
export type { ChunkMetadata, ChunkRecord, MalformedPolicy } from "./records.js";
export { VectorIndex, cosineDistance } from "./store.js";
export type { QueryResult, OpenResult, IndexLocation } from "./store.js";
export { ingestRecords, ingestFile, loadOrBuildIndex } from "./ingest.js";
export type { IngestReport, BootstrapPath } from "./ingest.js";
export { retrieve } from "./retrieve.js";
export type { Retrieved, RetrieveOptions } from "./retrieve.js";
export { assembleContext, toCitation } from "./context.js";
export { buildPrompt, PROMPT_VERSION } from "./prompt.js";
export type { PromptStrictness } from "./prompt.js";
export { Session } from "./session.js";
export { RagService, noResultsMessage } from "./service.js";
export type { AskOutcome, ServiceConfig } from "./service.js";
