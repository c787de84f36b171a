import { describe, expect, it } from "vitest";
import { assembleContext } from "./context.js";
import { buildPrompt, instructionsFor } from "./prompt.js";

describe("assembleContext", () => {
  it("labels each passage and keeps citations parallel", () => {
    const { context, citations } = assembleContext([
      { content: "Rating is 3.", metadata: { source: "Report", page: "4", type: "text" } },
      { content: "| a | b |", metadata: { source: "Annex", page: "9", type: "table" } },
    ]);

    expect(context).toBe(
      "[Source 1: Report - Page 4 - text]\nRating is 3.\n\n[Source 2: Annex - Page 9 - table]\n| a | b |"
    );
    expect(citations).toEqual([
      { source: "Report", page: "4", type: "text" },
      { source: "Annex", page: "9", type: "table" },
    ]);
  });

  it("fills in missing provenance", () => {
    const { context, citations } = assembleContext([{ content: "x", metadata: {} }]);
    expect(context).toBe("[Source 1: Unknown - Page Unknown - text]\nx");
    expect(citations).toEqual([{ source: "Unknown", page: "Unknown", type: "text" }]);
  });

  it("is empty for no passages", () => {
    expect(assembleContext([])).toEqual({ context: "", citations: [] });
  });
});

describe("buildPrompt", () => {
  it("lays out instructions, documents and question", () => {
    const prompt = buildPrompt("What is the rating?", "[Source 1: R - Page 1 - text]\nRating is 3.");
    expect(prompt).toBe(
      `${instructionsFor("grounded")}\n\nDOCUMENTS:\n[Source 1: R - Page 1 - text]\nRating is 3.\n\nQUESTION: What is the rating?\n\nANSWER:`
    );
  });

  it("always asks the model to say when the excerpts do not cover the question", () => {
    for (const level of ["grounded", "strict"] as const) {
      expect(instructionsFor(level)).toContain("If the excerpts do not cover the question, say so explicitly");
    }
  });

  it("adds the no-outside-knowledge rule only when strict", () => {
    expect(instructionsFor("strict")).toContain("Do not use outside knowledge");
    expect(instructionsFor("grounded")).not.toContain("Do not use outside knowledge");
  });
});
