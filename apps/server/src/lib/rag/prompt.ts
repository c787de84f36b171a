// apps/server/src/lib/rag/prompt.ts
export const PROMPT_VERSION = 2;

export type PromptStrictness = "grounded" | "strict";

const BASE_RULES = [
  "Based on the following document excerpts, answer the question accurately and comprehensively.",
  "Use only what the excerpts say. Include concrete figures, ratings and findings when they are present.",
  "If the excerpts do not cover the question, say so explicitly instead of guessing.",
];

const STRICT_RULES = [
  "Do not use outside knowledge, even when you are confident it is correct.",
  "Refer to the excerpts you rely on as [Source n].",
];

export function instructionsFor(strictness: PromptStrictness): string {
  const rules = strictness === "strict" ? [...BASE_RULES, ...STRICT_RULES] : BASE_RULES;
  return rules.join("\n");
}

export function buildPrompt(question: string, context: string, strictness: PromptStrictness = "grounded"): string {
  return `${instructionsFor(strictness)}

DOCUMENTS:
${context}

QUESTION: ${question}

ANSWER:`;
}
