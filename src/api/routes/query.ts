import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { SourceDescriptor } from "../../modules/answer/types.js";
import type { KnowledgeService, ProcessQueryResult, QueryFailureKind } from "../../modules/knowledge/knowledge-service.js";
import { logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { resolveRequestId, toValidationError } from "./request-helpers.js";

const conversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string()
});

const queryBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  top_k: z.number().int().positive().max(50).optional(),
  topics: z.array(z.string().min(1)).optional(),
  source: z.string().min(1).optional(),
  chat_history: z.array(conversationTurnSchema).optional(),
  use_reformulation: z.boolean().optional()
});

const reformulateBodySchema = z.object({
  query: z.string(),
  conversation_history: z.array(conversationTurnSchema).optional()
});

const FAILURE_STATUS: Record<QueryFailureKind, number> = {
  retrieval: 503,
  generation: 502,
  cancelled: 499,
  internal: 500
};

const toSourceResponse = (source: SourceDescriptor) => ({
  title: source.title,
  source: source.source,
  topics: source.topics,
  relevance: source.relevance
});

const toQueryResponse = (result: ProcessQueryResult) => ({
  success: result.success,
  answer: result.answer,
  sources: result.sources.map(toSourceResponse),
  used_query: result.usedQuery,
  error: result.error,
  suggested_topics: result.suggestedTopics
});

/** Aborts when the client goes away before the response has been written. */
const abortOnDisconnect = (reply: FastifyReply): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();
  const onClose = (): void => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  };
  reply.raw.on("close", onClose);
  return {
    signal: controller.signal,
    dispose: () => {
      reply.raw.off("close", onClose);
    }
  };
};

export interface QueryRoutesDependencies {
  knowledge: Pick<KnowledgeService, "processQuery" | "reformulate">;
}

export async function registerQueryRoutes(app: FastifyInstance, dependencies: QueryRoutesDependencies): Promise<void> {
  app.post("/query", async (request, reply) => {
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    const requestId = resolveRequestId(request);
    const { signal, dispose } = abortOnDisconnect(reply);
    const body = parsed.data;
    let result: ProcessQueryResult;
    try {
      result = await dependencies.knowledge.processQuery({
        query: body.query,
        topK: body.top_k,
        filter: body.topics || body.source ? { topics: body.topics, source: body.source } : undefined,
        chatHistory: body.chat_history,
        useReformulation: body.use_reformulation,
        signal,
        requestId
      });
    } finally {
      dispose();
    }

    logInfo("http.query.complete", { requestId }, {
      success: result.success,
      failure: result.success ? null : result.failure,
      sources: result.sources.length
    });

    reply.code(result.success ? 200 : FAILURE_STATUS[result.failure]).send(toQueryResponse(result));
  });

  app.post("/reformulate", async (request, reply) => {
    const parsed = reformulateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    const result = dependencies.knowledge.reformulate(parsed.data.query, parsed.data.conversation_history ?? []);
    reply.send({
      primary_query: result.primaryQuery,
      alternative_queries: result.alternativeQueries
    });
  });
}
