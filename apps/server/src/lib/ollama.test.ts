import { afterEach, describe, expect, it, vi } from "vitest";
import { OllamaEmbedder } from "./ollama.js";

const embedder = () => new OllamaEmbedder({ baseUrl: "http://embed.test", model: "nomic-embed-text:latest" });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaEmbedder", () => {
  it("embeds a batch in one request", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => Response.json({ embeddings: [[1, 0], [0, 1]] }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await embedder().embed(["a", "b"])).toEqual([[1, 0], [0, 1]]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://embed.test/api/embed");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "nomic-embed-text:latest", input: ["a", "b"] });
  });

  it("skips the request for no input", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    expect(await embedder().embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects a short response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Response.json({ embeddings: [[1, 0]] })));
    await expect(embedder().embed(["a", "b"])).rejects.toThrow("Ollama returned 1 embeddings for 2 inputs");
  });

  it("reports HTTP failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("model not found", { status: 404, statusText: "Not Found" })));
    await expect(embedder().embed(["a"])).rejects.toThrow("Ollama HTTP 404 Not Found — model not found");
  });
});
