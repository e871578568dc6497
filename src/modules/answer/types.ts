import type { ConversationTurn, DocumentChunk } from "../rag/types.js";

export interface SourceDescriptor {
  title: string;
  source: string;
  topics: string[];
  relevance: number;
}

export type AnswerResult =
  | {
      success: true;
      answer: string;
      sources: SourceDescriptor[];
      suggestedTopics: string[];
    }
  | {
      success: false;
      error: string;
      sources: SourceDescriptor[];
    };

export interface ComposeAnswerInput {
  query: string;
  documents: DocumentChunk[];
  history?: readonly ConversationTurn[];
  signal?: AbortSignal;
  requestId?: string;
}

export interface GenerationRequest {
  systemPrompt: string;
  history: readonly ConversationTurn[];
  userMessage: string;
  context: string;
}

export type TokenUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

/** What a generation backend handed back, decoded once at the boundary. */
export type GenerationResponse =
  | { kind: "completion"; content: string | null; usage: TokenUsage | null }
  | { kind: "text"; text: string }
  | { kind: "plain"; value: string }
  | { kind: "opaque"; value: unknown };

export interface GenerationBackend {
  generate(request: GenerationRequest, options?: { signal?: AbortSignal; requestId?: string }): Promise<GenerationResponse>;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };
