// apps/server/src/config.ts
import { ConfigurationMissing } from "./errors.js";
import type { PromptStrictness } from "./lib/rag/prompt.js";
import type { MalformedPolicy } from "./lib/rag/records.js";

const toNumber = (v: string | undefined, d: number) => {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
};

const toCount = (v: string | undefined, d: number) => {
  const n = Math.floor(toNumber(v, d));
  return n > 0 ? n : d;
};

// setTimeout treats anything larger as 1ms
const MAX_TIMER_MS = 2_147_483_647;

const toTimeout = (v: string | undefined, d: number) => {
  const n = toCount(v, d);
  return n <= MAX_TIMER_MS ? n : d;
};

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;

  anthropicUrl: string;
  anthropicApiKey: string;
  genModel: string;
  genMaxTokens: number;
  generationTimeoutMs: number;

  ollamaUrl: string;
  embedModel: string;
  retrievalTimeoutMs: number;

  chunksPath: string;
  indexDir: string;
  collection: string;
  batchSize: number;
  onMalformed: MalformedPolicy;

  topK: number;
  overfetch: number;
  strictness: PromptStrictness;
  costPerQuestion: number;
}

export const COLLECTION_NAME = "ers_documents";

/** Reads the process environment once; throws ConfigurationMissing for absent required values. */
export function loadConfig(env: Env = process.env): AppConfig {
  const anthropicApiKey = env.ANTHROPIC_API_KEY?.trim();
  if (!anthropicApiKey) throw new ConfigurationMissing("ANTHROPIC_API_KEY");

  const chunksPath = (env.CHUNKS_PATH ?? "data/chunks.jsonl").trim();
  if (!chunksPath) throw new ConfigurationMissing("CHUNKS_PATH");
  const indexDir = (env.INDEX_DIR ?? "data/index").trim();
  if (!indexDir) throw new ConfigurationMissing("INDEX_DIR");

  return {
    port: toNumber(env.PORT, 8787),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",

    anthropicUrl: String(env.ANTHROPIC_URL || "https://api.anthropic.com").replace(/\/+$/, ""),
    anthropicApiKey,
    genModel: env.GEN_MODEL || "claude-haiku-4-5-20251001",
    genMaxTokens: toCount(env.GEN_MAX_TOKENS, 1024),
    generationTimeoutMs: toTimeout(env.GENERATION_TIMEOUT_MS, 60_000),

    ollamaUrl: String(env.OLLAMA_URL || "http://127.0.0.1:11434").replace(/\/+$/, ""),
    embedModel: env.EMBED_MODEL || "nomic-embed-text:latest",
    retrievalTimeoutMs: toTimeout(env.RETRIEVAL_TIMEOUT_MS, 30_000),

    chunksPath,
    indexDir,
    collection: COLLECTION_NAME,
    batchSize: toCount(env.INGEST_BATCH_SIZE, 50),
    onMalformed: env.INGEST_ON_MALFORMED === "fail" ? "fail" : "skip",

    topK: toCount(env.RAG_TOP_K, 3),
    overfetch: toCount(env.RAG_OVERFETCH, 10),
    strictness: env.PROMPT_STRICTNESS === "strict" ? "strict" : "grounded",
    costPerQuestion: Math.max(0, toNumber(env.COST_PER_QUESTION, 0.002)),
  };
}
