import type { DistanceMetric } from "../../config/index.js";
import type { VectorFilter, VectorFilterCondition, VectorPointStore } from "../../clients/vector-store.js";
import type { IndexStats, RawMatch, SearchFilter, VectorIndexBackend, VectorQueryRequest } from "./types.js";

export const NAMESPACE_PAYLOAD_KEY = "namespace";
const TOPICS_PAYLOAD_KEY = "topics";
const SOURCE_PAYLOAD_KEY = "file_path";
const NAMESPACE_FACET_LIMIT = 1000;

export interface QdrantVectorIndexOptions {
  store: VectorPointStore;
  collection: string;
  distance: DistanceMetric;
}

const namespaceCondition = (namespace: string): VectorFilterCondition => {
  if (namespace.length > 0) {
    return { key: NAMESPACE_PAYLOAD_KEY, match: { value: namespace } };
  }
  // Points ingested without a namespace live in the default partition.
  return {
    should: [
      { is_empty: { key: NAMESPACE_PAYLOAD_KEY } },
      { key: NAMESPACE_PAYLOAD_KEY, match: { value: "" } }
    ]
  };
};

export const buildFilter = (namespace: string, filter?: SearchFilter): VectorFilter => {
  const must: VectorFilterCondition[] = [namespaceCondition(namespace)];

  const topics = filter?.topics?.filter((topic) => topic.trim().length > 0) ?? [];
  if (topics.length > 0) {
    must.push({ key: TOPICS_PAYLOAD_KEY, match: { any: topics } });
  }
  if (filter?.source) {
    must.push({ key: SOURCE_PAYLOAD_KEY, match: { value: filter.source } });
  }

  return { must };
};

/** Distances come back lower-is-closer; everything leaving the index is higher-is-closer. */
export const normalizeScore = (raw: number | undefined, distance: DistanceMetric): number | null => {
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    return null;
  }
  if (distance === "euclid" || distance === "manhattan") {
    return 1 / (1 + Math.max(0, raw));
  }
  return raw;
};

export const createQdrantVectorIndex = (options: QdrantVectorIndexOptions): VectorIndexBackend => ({
  async query(request: VectorQueryRequest): Promise<RawMatch[]> {
    const points = await options.store.search(options.collection, {
      vector: request.vector,
      limit: Math.max(1, request.topK),
      filter: buildFilter(request.namespace, request.filter),
      with_payload: true,
      with_vector: false
    });

    return points.map((point) => ({
      id: String(point.id),
      score: normalizeScore(point.score, options.distance),
      metadata: point.payload ?? {}
    }));
  },

  async describeStats(): Promise<IndexStats> {
    const response = await options.store.facet(options.collection, {
      key: NAMESPACE_PAYLOAD_KEY,
      exact: true,
      limit: NAMESPACE_FACET_LIMIT
    });

    const namespaces: IndexStats["namespaces"] = {};
    let totalVectorCount = 0;
    for (const hit of response.hits) {
      const name = String(hit.value);
      namespaces[name] = { vectorCount: (namespaces[name]?.vectorCount ?? 0) + hit.count };
      totalVectorCount += hit.count;
    }

    return { namespaces, totalVectorCount };
  }
});
