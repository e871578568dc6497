import type { InfrastructureClients } from "../../clients/lifecycle.js";
import type { Config } from "../../config/index.js";
import { errorMessage, logError, logInfo, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { composeAnswer as defaultComposeAnswer } from "../answer/answer-composer.js";
import { createOpenAIGenerationBackend } from "../answer/generation-backend.js";
import type { GenerationBackend, SourceDescriptor } from "../answer/types.js";
import { createOpenAIEmbeddingBackend } from "../rag/embedding-backend.js";
import { isAbortError } from "../rag/errors.js";
import { createQdrantVectorIndex } from "../rag/qdrant-vector-index.js";
import { reformulate } from "../rag/query-reformulator.js";
import { retrieveDocuments as defaultRetrieveDocuments } from "../rag/retrieval-orchestrator.js";
import type { ConversationTurn, DocumentChunk, ReformulationResult, SearchFilter, SearchInput } from "../rag/types.js";
import { VectorSearchGateway } from "../rag/vector-search-gateway.js";

export type QueryFailureKind = "retrieval" | "generation" | "cancelled" | "internal";

export type ProcessQueryResult =
  | {
      success: true;
      answer: string;
      sources: SourceDescriptor[];
      usedQuery: string;
      error: null;
      suggestedTopics: string[];
    }
  | {
      success: false;
      failure: QueryFailureKind;
      answer: null;
      sources: SourceDescriptor[];
      usedQuery: string | null;
      error: string;
      suggestedTopics: string[];
    };

export interface ProcessQueryInput {
  query: string;
  topK?: number;
  filter?: SearchFilter;
  chatHistory?: readonly ConversationTurn[];
  useReformulation?: boolean;
  signal?: AbortSignal;
  requestId?: string;
}

export interface KnowledgeServiceDependencies {
  gateway: { search(input: SearchInput): Promise<DocumentChunk[]> };
  generation: GenerationBackend;
  defaults: { topK: number; useReformulation: boolean };
  retrieveDocuments?: typeof defaultRetrieveDocuments;
  composeAnswer?: typeof defaultComposeAnswer;
}

const CANCELLED_MESSAGE = "Request cancelled before completion";

const failed = (
  failure: QueryFailureKind,
  error: string,
  usedQuery: string | null,
  sources: SourceDescriptor[] = []
): ProcessQueryResult => ({
  success: false,
  failure,
  answer: null,
  sources,
  usedQuery,
  error,
  suggestedTopics: []
});

export class KnowledgeService {
  private readonly dependencies: KnowledgeServiceDependencies;

  constructor(dependencies: KnowledgeServiceDependencies) {
    this.dependencies = dependencies;
  }

  reformulate(query: string, history: readonly ConversationTurn[] = []): ReformulationResult {
    return reformulate(query, history);
  }

  /** Retrieval then answer composition. Resolves with a failed result instead of rejecting. */
  async processQuery(input: ProcessQueryInput): Promise<ProcessQueryResult> {
    const retrieveDocuments = this.dependencies.retrieveDocuments ?? defaultRetrieveDocuments;
    const composeAnswer = this.dependencies.composeAnswer ?? defaultComposeAnswer;
    const context = { requestId: input.requestId };
    const history = input.chatHistory ?? [];
    let usedQuery: string | null = null;

    try {
      const retrieval = await retrieveDocuments(
        {
          query: input.query,
          topK: input.topK ?? this.dependencies.defaults.topK,
          filter: input.filter,
          history,
          useReformulation: input.useReformulation ?? this.dependencies.defaults.useReformulation,
          signal: input.signal,
          requestId: input.requestId
        },
        { gateway: this.dependencies.gateway }
      );
      usedQuery = retrieval.usedQuery;

      if (!retrieval.ok) {
        return failed("retrieval", retrieval.error.message, usedQuery);
      }

      const answer = await composeAnswer(
        {
          query: input.query,
          documents: retrieval.documents,
          history,
          signal: input.signal,
          requestId: input.requestId
        },
        { generation: this.dependencies.generation }
      );

      if (input.signal?.aborted) {
        return failed("cancelled", CANCELLED_MESSAGE, usedQuery);
      }
      if (!answer.success) {
        return failed("generation", answer.error, usedQuery, answer.sources);
      }

      logInfo("knowledge.query.complete", context, {
        used_query: usedQuery,
        sources: answer.sources.length
      });
      return {
        success: true,
        answer: answer.answer,
        sources: answer.sources,
        usedQuery,
        error: null,
        suggestedTopics: answer.suggestedTopics
      };
    } catch (error) {
      if (isAbortError(error, input.signal)) {
        recordErrorRate("cancelled");
        logInfo("knowledge.query.cancelled", context, { used_query: usedQuery });
        return failed("cancelled", CANCELLED_MESSAGE, usedQuery);
      }
      recordErrorRate("internal");
      logError("knowledge.query.failed", context, serializeError(error));
      return failed("internal", `Error processing query: ${errorMessage(error, String(error))}`, usedQuery);
    }
  }
}

export function createKnowledgeService(config: Config, clients: InfrastructureClients): KnowledgeService {
  const gateway = new VectorSearchGateway({
    embedding: createOpenAIEmbeddingBackend({
      client: clients.openai.client,
      model: config.OPENAI_EMBEDDING_MODEL
    }),
    index: createQdrantVectorIndex({
      store: clients.vectorStore.client,
      collection: config.QDRANT_COLLECTION,
      distance: config.QDRANT_DISTANCE
    })
  });

  return new KnowledgeService({
    gateway,
    generation: createOpenAIGenerationBackend({
      client: clients.openai.client,
      model: config.OPENAI_MODEL,
      temperature: config.OPENAI_TEMPERATURE
    }),
    defaults: {
      topK: config.RETRIEVAL_TOP_K,
      useReformulation: config.USE_QUERY_REFORMULATION
    }
  });
}
