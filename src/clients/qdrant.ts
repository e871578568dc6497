import { QdrantClient } from "@qdrant/js-client-rest";
import type { Config } from "../config/index.js";
import { errorMessage, logInfo } from "../observability/logger.js";
import type { ClientHandle } from "./health.js";
import { createLocalVectorStoreClient, resolveStorePath } from "./local-vector-store.js";
import { withRetries } from "./retry.js";
import type { VectorPointStore } from "./vector-store.js";

export type VectorStoreHandle = ClientHandle<VectorPointStore> & {
  backend: "qdrant" | "local-file";
};

type VectorStoreConfig = Pick<
  Config,
  "APP_MODE" | "QDRANT_URL" | "QDRANT_API_KEY" | "QDRANT_COLLECTION" | "QDRANT_TIMEOUT_MS" | "LOCAL_VECTOR_STORE_FILE"
>;

const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

export interface VectorStoreHandleOptions {
  cwd?: string;
  createQdrantClient?: (options: { url: string; apiKey?: string; timeout: number }) => VectorPointStore;
  sleep?: (ms: number) => Promise<void>;
}

const defaultQdrantClient = (options: { url: string; apiKey?: string; timeout: number }): VectorPointStore =>
  new QdrantClient(options);

/**
 * Local mode without QDRANT_URL reads points from a JSON file; every other combination talks to a
 * Qdrant server and verifies it answers before returning.
 */
export async function createVectorStoreHandle(
  config: VectorStoreConfig,
  options: VectorStoreHandleOptions = {}
): Promise<VectorStoreHandle> {
  if (config.APP_MODE === "local" && !config.QDRANT_URL) {
    const filePath = resolveStorePath(config.LOCAL_VECTOR_STORE_FILE, options.cwd);
    const client = createLocalVectorStoreClient(filePath);
    logInfo("clients.vector_store.initialized", {}, { backend: "local-file", file: filePath });

    return {
      backend: "local-file",
      client,
      async healthCheck() {
        try {
          await client.getCollections();
          return { status: "ok", details: "local file vector store" };
        } catch (error) {
          return { status: "error", details: errorMessage(error) };
        }
      },
      async close() {
        logInfo("clients.vector_store.closed", {}, { backend: "local-file" });
      }
    };
  }

  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is required to connect to the vector store");
  }

  const client = (options.createQdrantClient ?? defaultQdrantClient)({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: config.QDRANT_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await client.getCollections();
    },
    { attempts: REQUEST_RETRIES, delayMs: REQUEST_RETRY_DELAY_MS, sleep: options.sleep }
  );

  logInfo("clients.vector_store.initialized", {}, { backend: "qdrant", collection: config.QDRANT_COLLECTION });

  return {
    backend: "qdrant",
    client,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        if (!exists) {
          return { status: "error", details: `collection ${config.QDRANT_COLLECTION} not found` };
        }
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    },
    async close() {
      logInfo("clients.vector_store.closed", {}, { backend: "qdrant" });
    }
  };
}
