import type { RetrievalError } from "./errors.js";

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface ReformulationResult {
  primaryQuery: string;
  alternativeQueries: string[];
}

export type DocumentChunk = {
  id: string;
  text: string;
  source: string | null;
  title: string | null;
  topics: string[];
  score: number | null;
  relevance: number | null;
  namespace: string;
};

export type SearchFilter = {
  topics?: string[];
  source?: string;
};

export type RawMatch = {
  id: string;
  score: number | null;
  metadata: Record<string, unknown>;
};

export type VectorQueryRequest = {
  vector: number[];
  topK: number;
  namespace: string;
  filter?: SearchFilter;
};

export type IndexStats = {
  namespaces: Record<string, { vectorCount: number }>;
  totalVectorCount: number;
};

export interface EmbeddingBackend {
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface VectorIndexBackend {
  query(request: VectorQueryRequest): Promise<RawMatch[]>;
  describeStats(): Promise<IndexStats>;
}

export type SearchInput = {
  query: string;
  topK: number;
  namespace?: string;
  filter?: SearchFilter;
  vector?: number[];
  signal?: AbortSignal;
  requestId?: string;
};

export type RetrievalInput = {
  query: string;
  topK: number;
  filter?: SearchFilter;
  history?: readonly ConversationTurn[];
  useReformulation: boolean;
  signal?: AbortSignal;
  requestId?: string;
};

export type RetrievalOutcome =
  | {
      ok: true;
      documents: DocumentChunk[];
      usedQuery: string;
      reformulation: ReformulationResult | null;
    }
  | {
      ok: false;
      error: RetrievalError;
      usedQuery: string;
    };
