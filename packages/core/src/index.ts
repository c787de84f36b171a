export type Role = "user" | "assistant";

/** Provenance of one passage used in an answer. */
export interface SourceCitation {
  source: string;
  page: string;
  type: string;
}

export interface SessionMessage {
  role: Role;
  content: string;
  createdAt: number;
  sources?: SourceCitation[];
}

export type AskStatus = "answered" | "no_results";

export interface AskResponse {
  ok: true;
  status: AskStatus;
  answer: string;
  citations: SourceCitation[];
}

export type FailedStage = "configuration" | "ingestion" | "index" | "retrieval" | "generation" | "request";

export interface AskFailure {
  ok: false;
  stage: FailedStage;
  error: string;
}

export interface SessionStats {
  questionCount: number;
  /** Flat per-question estimate; not derived from token usage. */
  estimatedCost: number;
  unitCost: number;
  messageCount: number;
  /** Size of the document list offered for filtering. */
  documentCount: number;
  /** Distinct cited sources in the most recent messages, sorted. */
  recentSources: string[];
}

export const ALL_DOCUMENTS = "All Documents";
