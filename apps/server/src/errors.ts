// apps/server/src/errors.ts
import type { FailedStage } from "@docqa/core";

export type ErrorStage = FailedStage;

export type ErrorCode =
  | "INVALID_REQUEST"
  | "CONFIGURATION_MISSING"
  | "INGESTION_SOURCE_UNAVAILABLE"
  | "INGESTION_RECORD_MALFORMED"
  | "INGESTION_FAILED"
  | "INDEX_OPEN_FAILED"
  | "RETRIEVAL_FAILED"
  | "GENERATION_FAILED";

export class RagError extends Error {
  readonly code: ErrorCode;
  readonly stage: ErrorStage;

  constructor(code: ErrorCode, stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
  }
}

export class InvalidRequest extends RagError {
  constructor(detail: string) {
    super("INVALID_REQUEST", "request", detail);
  }
}

export class ConfigurationMissing extends RagError {
  constructor(readonly variable: string) {
    super("CONFIGURATION_MISSING", "configuration", `Missing required configuration: ${variable}`);
  }
}

export class IngestionSourceUnavailable extends RagError {
  constructor(readonly path: string, cause?: unknown) {
    super("INGESTION_SOURCE_UNAVAILABLE", "ingestion", `Chunk source unavailable: ${path}`, { cause });
  }
}

export class IngestionRecordMalformed extends RagError {
  constructor(readonly line: number, detail: string, cause?: unknown) {
    super("INGESTION_RECORD_MALFORMED", "ingestion", `Malformed chunk record on line ${line}: ${detail}`, { cause });
  }
}

/** Embedding or writing a batch failed while building the index. */
export class IngestionFailed extends RagError {
  constructor(detail: string, cause?: unknown) {
    super("INGESTION_FAILED", "ingestion", `Ingestion failed: ${detail}`, { cause });
  }
}

export type IndexOpenFailure = "incompatible" | "corrupt";

export class IndexOpenFailed extends RagError {
  constructor(readonly reason: IndexOpenFailure, detail: string, cause?: unknown) {
    super("INDEX_OPEN_FAILED", "index", `Index ${reason}: ${detail}`, { cause });
  }
}

export class RetrievalFailed extends RagError {
  readonly timedOut: boolean = false;

  constructor(detail: string, cause?: unknown) {
    super("RETRIEVAL_FAILED", "retrieval", `Retrieval failed: ${detail}`, { cause });
  }
}

export class GenerationFailed extends RagError {
  readonly timedOut: boolean = false;

  constructor(detail: string, cause?: unknown) {
    super("GENERATION_FAILED", "generation", `Generation failed: ${detail}`, { cause });
  }
}

export class RetrievalTimeout extends RetrievalFailed {
  override readonly timedOut = true;

  constructor(ms: number, cause?: unknown) {
    super(`timed out after ${ms}ms`, cause);
  }
}

export class GenerationTimeout extends GenerationFailed {
  override readonly timedOut = true;

  constructor(ms: number, cause?: unknown) {
    super(`timed out after ${ms}ms`, cause);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
