import { errorMessage, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import {
  recordErrorRate,
  recordQueryPath,
  recordRetrievalLatency,
  type QueryPath
} from "../../observability/metrics.js";
import { isAbortError, RetrievalError, throwIfAborted } from "./errors.js";
import { reformulate as defaultReformulate } from "./query-reformulator.js";
import type { DocumentChunk, ReformulationResult, RetrievalInput, RetrievalOutcome, SearchInput } from "./types.js";

const MIN_RESULTS_PER_ALTERNATIVE = 2;

export interface RetrievalOrchestratorDependencies {
  gateway: { search(input: SearchInput): Promise<DocumentChunk[]> };
  reformulate?: typeof defaultReformulate;
  now?: () => number;
}

export const dedupeById = (documents: DocumentChunk[]): DocumentChunk[] => {
  const seen = new Set<string>();
  return documents.filter((document) => {
    if (seen.has(document.id)) {
      return false;
    }
    seen.add(document.id);
    return true;
  });
};

export const alternativeBudget = (topK: number, primaryCount: number, alternativeCount: number): number =>
  Math.max(MIN_RESULTS_PER_ALTERNATIVE, Math.floor((topK - primaryCount) / alternativeCount));

/**
 * Runs the primary query, tops up with the decomposed sub-questions when the primary falls short,
 * and retries the untouched user query when nothing came back. Failed attempts count as empty;
 * the outcome only fails when no attempt reached the index.
 */
export async function retrieveDocuments(
  input: RetrievalInput,
  dependencies: RetrievalOrchestratorDependencies
): Promise<RetrievalOutcome> {
  const now = dependencies.now ?? Date.now;
  const reformulate = dependencies.reformulate ?? defaultReformulate;
  const context = { requestId: input.requestId };
  const startedAt = now();

  let attempts = 0;
  let failures = 0;
  let lastError: unknown;

  const attempt = async (query: string, topK: number): Promise<DocumentChunk[]> => {
    throwIfAborted(input.signal);
    attempts += 1;
    try {
      return await dependencies.gateway.search({
        query,
        topK,
        filter: input.filter,
        signal: input.signal,
        requestId: input.requestId
      });
    } catch (error) {
      if (isAbortError(error, input.signal)) {
        throw error;
      }
      failures += 1;
      lastError = error;
      recordErrorRate("retrieval_attempt");
      logWarn("rag.retrieve.attempt_failed", context, { query, top_k: topK, ...serializeError(error) });
      return [];
    }
  };

  let path: QueryPath;
  let usedQuery: string;
  let reformulation: ReformulationResult | null = null;
  let collected: DocumentChunk[];

  if (!input.useReformulation) {
    path = "direct";
    usedQuery = input.query;
    collected = [...(await attempt(input.query, input.topK))];
  } else {
    reformulation = reformulate(input.query, input.history ?? []);
    path = "primary";
    usedQuery = reformulation.primaryQuery;
    collected = [...(await attempt(reformulation.primaryQuery, input.topK))];

    const alternatives = reformulation.alternativeQueries;
    if (collected.length < input.topK && alternatives.length > 0) {
      const perQuery = alternativeBudget(input.topK, collected.length, alternatives.length);
      for (const alternative of alternatives) {
        collected.push(...(await attempt(alternative, perQuery)));
      }
      path = "alternatives";
      usedQuery = `${reformulation.primaryQuery} + alternatives`;
    }
  }

  let documents = dedupeById(collected).slice(0, input.topK);

  if (documents.length === 0 && input.useReformulation) {
    const fallback = await attempt(input.query, input.topK);
    documents = dedupeById(fallback).slice(0, input.topK);
    path = "fallback";
    usedQuery = input.query;
  }

  const durationMs = now() - startedAt;
  recordRetrievalLatency(durationMs);

  if (attempts > 0 && failures === attempts) {
    recordErrorRate("retrieval");
    return {
      ok: false,
      error: new RetrievalError(`Error retrieving documents: ${errorMessage(lastError, String(lastError))}`, {
        cause: lastError
      }),
      usedQuery
    };
  }

  recordQueryPath(path);
  logInfo("rag.retrieve.complete", context, {
    path,
    used_query: usedQuery,
    attempts,
    failed_attempts: failures,
    documents: documents.length,
    duration_ms: durationMs
  });

  return { ok: true, documents, usedQuery, reformulation };
}
