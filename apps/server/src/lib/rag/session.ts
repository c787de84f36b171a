import type { SessionMessage, SessionStats } from "@docqa/core";

/** How many of the latest messages feed `recentSources`. */
export const RECENT_WINDOW = 10;

/** In-memory, append-only chat history for one process. */
export class Session {
  private readonly messages: SessionMessage[] = [];

  constructor(private readonly unitCost: number) {}

  append(...msgs: SessionMessage[]) {
    for (const m of msgs) this.messages.push({ ...m, sources: m.sources?.map((s) => ({ ...s })) });
  }

  history(): readonly SessionMessage[] {
    return this.messages;
  }

  get length() {
    return this.messages.length;
  }

  /** Cost is a flat estimate per question, not metered from token usage. */
  stats(documentCount = 0): SessionStats {
    const questionCount = this.messages.filter((m) => m.role === "user").length;
    const recent = new Set<string>();
    for (const m of this.messages.slice(-RECENT_WINDOW)) {
      for (const s of m.sources ?? []) recent.add(s.source);
    }
    return {
      questionCount,
      estimatedCost: questionCount * this.unitCost,
      unitCost: this.unitCost,
      messageCount: this.messages.length,
      documentCount,
      recentSources: [...recent].sort(),
    };
  }
}
