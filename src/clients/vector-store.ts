export type VectorFilterCondition =
  | { key: string; match: { value: string } }
  | { key: string; match: { any: string[] } }
  | { is_empty: { key: string } }
  | VectorFilter;

export type VectorFilter = {
  must?: VectorFilterCondition[];
  should?: VectorFilterCondition[];
};

export type ScoredVectorPoint = {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
};

export type FacetHit = {
  value: string | number | boolean;
  count: number;
};

/**
 * The slice of the Qdrant REST client the service talks to. The local file store
 * implements the same surface so either can back the search gateway.
 */
export interface VectorPointStore {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  search(
    collectionName: string,
    request: {
      vector: number[];
      limit: number;
      filter?: VectorFilter;
      with_payload?: boolean;
      with_vector?: boolean;
    }
  ): Promise<ScoredVectorPoint[]>;
  facet(
    collectionName: string,
    request: {
      key: string;
      exact?: boolean;
      limit?: number;
      filter?: VectorFilter;
    }
  ): Promise<{ hits: FacetHit[] }>;
}
