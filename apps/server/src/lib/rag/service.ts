// apps/server/src/lib/rag/service.ts
import { ALL_DOCUMENTS, type AskStatus, type SessionMessage, type SessionStats, type SourceCitation } from "@docqa/core";
import type { AppConfig } from "../../config.js";
import {
  errorMessage,
  GenerationFailed,
  GenerationTimeout,
  IngestionSourceUnavailable,
  InvalidRequest,
  RagError,
} from "../../errors.js";
import type { Logger } from "../../logger.js";
import type { Generator } from "../anthropic.js";
import type { Embedder } from "../ollama.js";
import { withTimeout } from "../timeout.js";
import { assembleContext } from "./context.js";
import { ingestFile, loadOrBuildIndex, type BootstrapPath, type IngestReport } from "./ingest.js";
import { buildPrompt } from "./prompt.js";
import { scanSources } from "./records.js";
import { retrieve } from "./retrieve.js";
import { Session } from "./session.js";
import type { VectorIndex } from "./store.js";

export type ServiceConfig = Pick<
  AppConfig,
  | "chunksPath"
  | "indexDir"
  | "collection"
  | "batchSize"
  | "onMalformed"
  | "topK"
  | "overfetch"
  | "strictness"
  | "costPerQuestion"
  | "retrievalTimeoutMs"
  | "generationTimeoutMs"
>;

export interface RagServiceDeps {
  config: ServiceConfig;
  embedder: Embedder;
  generator: Generator;
  logger: Logger;
}

export type AskOutcome = {
  status: AskStatus;
  answer: string;
  citations: SourceCitation[];
};

export function noResultsMessage(source?: string) {
  return source
    ? `No relevant information found in '${source}' about your question.`
    : "No relevant documents found for your question. Try asking about a different topic or select 'All Documents' to search broadly.";
}

type Ready = { index: VectorIndex; documents: string[]; path: BootstrapPath };

/**
 * Owns the index handle, the document list and the session. `init()` runs the
 * load-or-build step at most once per instance; questions are answered one at a time.
 */
export class RagService {
  private readonly session: Session;
  private readonly log: Logger;
  private ready?: Promise<Ready>;
  private state?: Ready;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: RagServiceDeps) {
    this.session = new Session(deps.config.costPerQuestion);
    this.log = deps.logger.child({ component: "service" });
  }

  init(): Promise<Ready> {
    this.ready ??= this.bootstrap().catch((e: unknown) => {
      // allow a later retry after a failed start
      this.ready = undefined;
      throw e;
    });
    return this.ready;
  }

  async close() {
    await this.tail;
    this.ready = undefined;
    this.state = undefined;
  }

  get isReady() {
    return this.state !== undefined;
  }

  get chunkCount() {
    return this.state?.index.count() ?? 0;
  }

  async listDocuments(): Promise<string[]> {
    const { documents } = await this.init();
    return [...documents];
  }

  history(): readonly SessionMessage[] {
    return this.session.history();
  }

  stats(): SessionStats {
    return this.session.stats(this.state?.documents.length ?? 0);
  }

  ask(question: string, source?: string): Promise<AskOutcome> {
    return this.enqueue(() => this.answer(question, source));
  }

  /** Re-runs ingestion over the chunk file; upserts make this safe to repeat. */
  reindex(): Promise<IngestReport> {
    return this.enqueue(async () => {
      const ready = await this.init();
      const { config } = this.deps;
      const report = await ingestFile(ready.index, config.chunksPath, {
        batchSize: config.batchSize,
        onMalformed: config.onMalformed,
        logger: this.deps.logger.child({ component: "ingest" }),
      });
      await ready.index.markComplete();
      ready.documents = await this.scanDocuments();
      return report;
    });
  }

  // ──────────────────────────────────────────────────────────────
  // internals
  // ──────────────────────────────────────────────────────────────
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // the caller observes failures through `run`; the queue only needs ordering
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async bootstrap(): Promise<Ready> {
    const { config, embedder, logger } = this.deps;
    const { index, path } = await loadOrBuildIndex({
      location: {
        dir: config.indexDir,
        name: config.collection,
        embedder,
        logger: logger.child({ component: "index" }),
      },
      chunksPath: config.chunksPath,
      batchSize: config.batchSize,
      onMalformed: config.onMalformed,
      logger: logger.child({ component: "ingest" }),
    });
    const documents = await this.scanDocuments();
    this.state = { index, documents, path };
    this.log.info({ path, chunks: index.count(), documents: documents.length }, "service ready");
    return this.state;
  }

  private async scanDocuments(): Promise<string[]> {
    try {
      return await scanSources(this.deps.config.chunksPath);
    } catch (e) {
      if (!(e instanceof IngestionSourceUnavailable)) throw e;
      this.log.warn({ file: e.path }, "chunk source unavailable; document list is empty");
      return [];
    }
  }

  private async answer(rawQuestion: string, rawSource?: string): Promise<AskOutcome> {
    const question = rawQuestion.trim();
    if (!question) throw new InvalidRequest("question must not be empty");
    const picked = rawSource?.trim();
    const source = picked && picked !== ALL_DOCUMENTS ? picked : undefined;

    const { index } = await this.init();
    const { config, generator } = this.deps;

    const hits = await retrieve(index, question, {
      source,
      k: config.topK,
      overfetch: config.overfetch,
      timeoutMs: config.retrievalTimeoutMs,
    });

    const createdAt = Date.now();
    if (!hits.length) {
      const answer = noResultsMessage(source);
      this.log.info({ source: source ?? null }, "no relevant results");
      this.session.append(
        { role: "user", content: question, createdAt },
        { role: "assistant", content: answer, createdAt: Date.now(), sources: [] }
      );
      return { status: "no_results", answer, citations: [] };
    }

    const { context, citations } = assembleContext(hits);
    const prompt = buildPrompt(question, context, config.strictness);

    let answer: string;
    try {
      answer = await withTimeout(
        (signal) => generator.generate(prompt, signal),
        config.generationTimeoutMs,
        () => new GenerationTimeout(config.generationTimeoutMs)
      );
    } catch (e) {
      this.log.error({ err: e, model: generator.model }, "generation failed");
      if (e instanceof RagError) throw e;
      throw new GenerationFailed(errorMessage(e), e);
    }

    this.session.append(
      { role: "user", content: question, createdAt },
      { role: "assistant", content: answer, createdAt: Date.now(), sources: citations }
    );
    this.log.info({ source: source ?? null, passages: hits.length }, "answered");
    return { status: "answered", answer, citations };
  }
}
