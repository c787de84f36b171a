// apps/server/src/lib/anthropic.ts
import { z } from "zod";
import { errorMessage, GenerationFailed } from "../errors.js";

/** Single-turn text generation: one prompt in, one answer out. */
export interface Generator {
  readonly model: string;
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface AnthropicOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  maxTokens: number;
}

export const ANTHROPIC_VERSION = "2023-06-01";

const MessagesResponse = z.object({
  content: z.array(
    z.object({ type: z.string(), text: z.string().optional() }).passthrough()
  ),
});

const ErrorBody = z.object({ error: z.object({ message: z.string() }) });

async function describeFailure(res: Response) {
  let txt = "";
  try {
    txt = await res.text();
  } catch {
    return "";
  }
  try {
    const parsed = ErrorBody.safeParse(JSON.parse(txt));
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // not JSON; fall through to the raw body
  }
  return txt.slice(0, 300);
}

export class AnthropicGenerator implements Generator {
  readonly model: string;
  private readonly base: string;
  private readonly apiKey: string;
  private readonly maxTokens: number;

  constructor(opts: AnthropicOptions) {
    this.model = opts.model;
    this.base = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.maxTokens = opts.maxTokens;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.base}/v1/messages`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [{ role: "user", content: prompt }],
        }),
        signal,
      });
    } catch (e) {
      throw new GenerationFailed(errorMessage(e), e);
    }

    if (!res.ok) {
      const detail = await describeFailure(res);
      throw new GenerationFailed(`HTTP ${res.status}${detail ? ` — ${detail}` : ""}`);
    }

    const parsed = MessagesResponse.safeParse(await res.json());
    if (!parsed.success) throw new GenerationFailed("unexpected response shape", parsed.error);

    const first = parsed.data.content.find((c) => c.type === "text");
    if (first?.text === undefined) throw new GenerationFailed("response contained no text");
    return first.text;
  }
}
