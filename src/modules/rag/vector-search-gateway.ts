import { errorMessage, logDebug, logError, logWarn, serializeError } from "../../observability/logger.js";
import { isAbortError, MalformedRecordError, RetrievalError, throwIfAborted } from "./errors.js";
import { decodeMatch } from "./match-decoder.js";
import type {
  DocumentChunk,
  EmbeddingBackend,
  RawMatch,
  SearchFilter,
  SearchInput,
  VectorIndexBackend
} from "./types.js";

export const DEFAULT_NAMESPACE = "";

export interface VectorSearchGatewayDependencies {
  embedding: EmbeddingBackend;
  index: VectorIndexBackend;
}

/**
 * Embeds a query and searches the vector index. An empty default namespace falls through to the
 * other namespaces one at a time; the first that yields anything wins.
 */
export class VectorSearchGateway {
  private readonly embedding: EmbeddingBackend;
  private readonly index: VectorIndexBackend;

  constructor(dependencies: VectorSearchGatewayDependencies) {
    this.embedding = dependencies.embedding;
    this.index = dependencies.index;
  }

  async search(input: SearchInput): Promise<DocumentChunk[]> {
    const namespace = input.namespace ?? DEFAULT_NAMESPACE;
    const context = { requestId: input.requestId };
    const vector = input.vector ?? (await this.embed(input.query, input.signal));
    throwIfAborted(input.signal);

    let matches: RawMatch[];
    try {
      matches = await this.index.query({ vector, topK: input.topK, namespace, filter: input.filter });
    } catch (error) {
      if (isAbortError(error, input.signal)) {
        throw error;
      }
      throw new RetrievalError(`Vector index query failed: ${errorMessage(error, String(error))}`, { cause: error });
    }

    const chunks = this.decodeAll(matches, namespace, input.requestId);
    logDebug("rag.search.namespace", context, {
      namespace,
      raw_matches: matches.length,
      decoded: chunks.length
    });

    if (chunks.length > 0 || namespace !== DEFAULT_NAMESPACE) {
      return chunks;
    }

    return this.searchOtherNamespaces(vector, input.topK, input.filter, input.signal, input.requestId);
  }

  private async embed(query: string, signal?: AbortSignal): Promise<number[]> {
    try {
      return await this.embedding.embed(query, { signal });
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      throw new RetrievalError(`Embedding request failed: ${errorMessage(error, String(error))}`, { cause: error });
    }
  }

  private async searchOtherNamespaces(
    vector: number[],
    topK: number,
    filter: SearchFilter | undefined,
    signal: AbortSignal | undefined,
    requestId: string | undefined
  ): Promise<DocumentChunk[]> {
    const context = { requestId };
    let namespaces: string[];
    try {
      const stats = await this.index.describeStats();
      namespaces = Object.keys(stats.namespaces).filter((name) => name !== DEFAULT_NAMESPACE);
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      logWarn("rag.search.describe_stats_failed", context, serializeError(error));
      return [];
    }

    for (const namespace of namespaces) {
      throwIfAborted(signal);
      let matches: RawMatch[];
      try {
        matches = await this.index.query({ vector, topK, namespace, filter });
      } catch (error) {
        if (isAbortError(error, signal)) {
          throw error;
        }
        logWarn("rag.search.namespace_failed", context, { namespace, ...serializeError(error) });
        continue;
      }

      const chunks = this.decodeAll(matches, namespace, requestId);
      logDebug("rag.search.namespace", context, {
        namespace,
        raw_matches: matches.length,
        decoded: chunks.length
      });
      if (chunks.length > 0) {
        return chunks;
      }
    }

    return [];
  }

  private decodeAll(matches: RawMatch[], namespace: string, requestId: string | undefined): DocumentChunk[] {
    const chunks: DocumentChunk[] = [];
    for (const match of matches) {
      try {
        chunks.push(decodeMatch(match, namespace));
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        const fields = { record_id: error.recordId, reason: error.reason, namespace, message: error.message };
        if (error.reason === "missing_text") {
          logWarn("rag.search.record_skipped", { requestId }, fields);
        } else {
          logError("rag.search.record_malformed", { requestId }, fields);
        }
      }
    }
    return chunks;
  }
}
