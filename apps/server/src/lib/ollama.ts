// apps/server/src/lib/ollama.ts
import { z } from "zod";

/** Turns text into vectors; `model` identifies the embedding function a persisted index was built with. */
export interface Embedder {
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OllamaEmbedderOptions {
  baseUrl: string;
  model: string;
}

const EmbedResponse = z.object({ embeddings: z.array(z.array(z.number())) });

async function safeText(r: Response) {
  try {
    return await r.text();
  } catch {
    return "";
  }
}

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly base: string;

  constructor(opts: OllamaEmbedderOptions) {
    this.model = opts.model;
    this.base = opts.baseUrl.replace(/\/+$/, "");
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const res = await fetch(`${this.base}/api/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({ model: this.model, input: texts }),
      signal,
    });

    if (!res.ok) {
      const txt = await safeText(res);
      throw new Error(`Ollama HTTP ${res.status} ${res.statusText}${txt ? ` — ${txt}` : ""}`);
    }

    const parsed = EmbedResponse.safeParse(await res.json());
    if (!parsed.success) throw new Error("No embedding vectors returned from Ollama");
    const { embeddings } = parsed.data;
    if (embeddings.length !== texts.length) {
      throw new Error(`Ollama returned ${embeddings.length} embeddings for ${texts.length} inputs`);
    }
    return embeddings;
  }
}
