import fs from "node:fs/promises";
import path from "node:path";
import type { FacetHit, VectorFilter, VectorFilterCondition, VectorPointStore } from "./vector-store.js";

type StoredPoint = {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
};

type StoreShape = {
  collections: Record<string, StoredPoint[]>;
};

export const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined, cwd: string = process.cwd()): string {
  const relative = configured && configured.trim().length > 0 ? configured.trim() : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative) ? relative : path.resolve(cwd, relative);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const payloadValues = (payload: Record<string, unknown>, key: string): unknown[] => {
  const value = payload[key];
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
};

const matchesCondition = (payload: Record<string, unknown>, condition: VectorFilterCondition): boolean => {
  if ("is_empty" in condition) {
    return payloadValues(payload, condition.is_empty.key).length === 0;
  }
  if ("key" in condition) {
    const values = payloadValues(payload, condition.key);
    if ("any" in condition.match) {
      const accepted = condition.match.any;
      return values.some((value) => typeof value === "string" && accepted.includes(value));
    }
    const expected = condition.match.value;
    return values.some((value) => value === expected);
  }
  return matchesFilter(payload, condition);
};

export function matchesFilter(payload: Record<string, unknown>, filter?: VectorFilter): boolean {
  const must = filter?.must ?? [];
  const should = filter?.should ?? [];
  if (!must.every((condition) => matchesCondition(payload, condition))) {
    return false;
  }
  return should.length === 0 || should.some((condition) => matchesCondition(payload, condition));
}

async function readStore(filePath: string): Promise<StoreShape> {
  try {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    const collections =
      parsed && typeof parsed === "object" && "collections" in parsed && parsed.collections && typeof parsed.collections === "object"
        ? parsed.collections
        : {};
    const normalized: StoreShape["collections"] = {};
    for (const [name, points] of Object.entries(collections)) {
      normalized[name] = Array.isArray(points) ? points.filter(isStoredPoint) : [];
    }
    return { collections: normalized };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }
}

function isStoredPoint(value: unknown): value is StoredPoint {
  if (!value || typeof value !== "object") {
    return false;
  }
  const candidate: { id?: unknown; vector?: unknown; payload?: unknown } = value;
  return (
    typeof candidate.id === "string" &&
    Array.isArray(candidate.vector) &&
    candidate.vector.every((entry) => typeof entry === "number") &&
    !!candidate.payload &&
    typeof candidate.payload === "object"
  );
}

/**
 * File-backed stand-in for a Qdrant collection set, used in local mode when no
 * QDRANT_URL is configured. Scores are cosine similarity.
 */
export function createLocalVectorStoreClient(filePath: string): VectorPointStore {
  return {
    async getCollections() {
      const store = await readStore(filePath);
      return {
        collections: Object.keys(store.collections).map((name) => ({ name }))
      };
    },

    async collectionExists(name) {
      const store = await readStore(filePath);
      return { exists: Array.isArray(store.collections[name]) };
    },

    async search(collection, request) {
      const store = await readStore(filePath);
      const points = store.collections[collection];
      if (!points) {
        throw new Error(`Collection ${collection} not found in local vector store`);
      }
      return points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point) => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: point.payload
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit));
    },

    async facet(collection, request) {
      const store = await readStore(filePath);
      const points = store.collections[collection];
      if (!points) {
        throw new Error(`Collection ${collection} not found in local vector store`);
      }

      const counts = new Map<string, FacetHit>();
      for (const point of points) {
        if (!matchesFilter(point.payload, request.filter)) {
          continue;
        }
        const seen = new Set<string>();
        for (const value of payloadValues(point.payload, request.key)) {
          if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
            continue;
          }
          const key = `${typeof value}:${String(value)}`;
          if (seen.has(key)) {
            continue;
          }
          seen.add(key);
          const current = counts.get(key);
          counts.set(key, { value, count: (current?.count ?? 0) + 1 });
        }
      }

      const hits = [...counts.values()].sort((a, b) => b.count - a.count || String(a.value).localeCompare(String(b.value)));
      return { hits: hits.slice(0, Math.max(1, request.limit ?? 10)) };
    }
  };
}
