import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  checkInfrastructureHealth,
  registerClientLifecycle,
  resetClientLifecycleStateForTests,
  type InfrastructureClients
} from "../../src/clients/lifecycle.js";
import { createOpenAIClientHandle } from "../../src/clients/openai.js";
import { createVectorStoreHandle } from "../../src/clients/qdrant.js";
import { withRetries } from "../../src/clients/retry.js";
import type { VectorPointStore } from "../../src/clients/vector-store.js";

const makeStore = (overrides: Partial<VectorPointStore> = {}): VectorPointStore => ({
  getCollections: vi.fn().mockResolvedValue({ collections: [] }),
  collectionExists: vi.fn().mockResolvedValue({ exists: true }),
  search: vi.fn().mockResolvedValue([]),
  facet: vi.fn().mockResolvedValue({ hits: [] }),
  ...overrides
});

const baseVectorConfig = {
  APP_MODE: "prod" as const,
  QDRANT_URL: "http://qdrant.test:6333",
  QDRANT_API_KEY: "test-secret",
  QDRANT_COLLECTION: "kb",
  QDRANT_TIMEOUT_MS: 5000,
  LOCAL_VECTOR_STORE_FILE: undefined
};

describe("clients", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    resetClientLifecycleStateForTests();
  });

  afterEach(() => {
    resetClientLifecycleStateForTests();
  });

  describe("withRetries", () => {
    it("retries with linear backoff and rethrows the last error", async () => {
      const sleep = vi.fn(async () => undefined);
      const operation = vi.fn().mockRejectedValueOnce(new Error("first")).mockRejectedValueOnce(new Error("second"));

      await expect(withRetries(operation, { attempts: 2, delayMs: 100, sleep })).rejects.toThrow("second");
      expect(operation).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(100);
    });
  });

  describe("createVectorStoreHandle", () => {
    it("uses the local file store in local mode without a server url", async () => {
      const handle = await createVectorStoreHandle(
        { ...baseVectorConfig, APP_MODE: "local", QDRANT_URL: undefined, LOCAL_VECTOR_STORE_FILE: "/tmp/events-kb-none.json" },
        { createQdrantClient: vi.fn() }
      );

      expect(handle.backend).toBe("local-file");
      await expect(handle.healthCheck()).resolves.toEqual({ status: "ok", details: "local file vector store" });
    });

    it("connects to qdrant and retries the first call", async () => {
      const getCollections = vi
        .fn()
        .mockRejectedValueOnce(new Error("warming up"))
        .mockResolvedValue({ collections: [] });
      const store = makeStore({ getCollections });
      const createQdrantClient = vi.fn(() => store);

      const handle = await createVectorStoreHandle(baseVectorConfig, {
        createQdrantClient,
        sleep: async () => undefined
      });

      expect(createQdrantClient).toHaveBeenCalledWith({
        url: "http://qdrant.test:6333",
        apiKey: "test-secret",
        timeout: 5000
      });
      expect(getCollections).toHaveBeenCalledTimes(2);
      expect(handle.backend).toBe("qdrant");
      expect(handle.client).toBe(store);
    });

    it("reports a missing collection as unhealthy", async () => {
      const store = makeStore({ collectionExists: vi.fn().mockResolvedValue({ exists: false }) });

      const handle = await createVectorStoreHandle(baseVectorConfig, { createQdrantClient: () => store });

      await expect(handle.healthCheck()).resolves.toEqual({ status: "error", details: "collection kb not found" });
    });

    it("fails fast without a url outside local mode", async () => {
      await expect(createVectorStoreHandle({ ...baseVectorConfig, QDRANT_URL: undefined })).rejects.toThrow(
        "QDRANT_URL is required to connect to the vector store"
      );
    });
  });

  describe("createOpenAIClientHandle", () => {
    it("builds the client from config and checks the configured model", async () => {
      const retrieve = vi.fn().mockResolvedValue({ id: "gpt-test" });
      const factory = vi.fn(() => ({ models: { retrieve } }) as never);

      const handle = createOpenAIClientHandle(
        { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-test", OPENAI_TIMEOUT_MS: 30000 },
        factory
      );

      expect(factory).toHaveBeenCalledWith({ apiKey: "test-secret", maxRetries: 2, timeout: 30000 });
      await expect(handle.healthCheck()).resolves.toEqual({ status: "ok" });
      expect(retrieve).toHaveBeenCalledWith("gpt-test", { signal: expect.any(AbortSignal) });
    });
  });

  describe("lifecycle", () => {
    const makeClients = (vectorHealthy = true): InfrastructureClients => ({
      openai: {
        client: {} as never,
        healthCheck: vi.fn().mockResolvedValue({ status: "ok" }),
        close: vi.fn().mockResolvedValue(undefined)
      },
      vectorStore: {
        backend: "qdrant",
        client: makeStore(),
        healthCheck: vi
          .fn()
          .mockResolvedValue(vectorHealthy ? { status: "ok" } : { status: "error", details: "down" }),
        close: vi.fn().mockResolvedValue(undefined)
      }
    });

    it("aggregates health reports", async () => {
      await expect(checkInfrastructureHealth(makeClients(false))).resolves.toEqual({
        openai: { status: "ok" },
        vectorStore: { status: "error", details: "down" }
      });
    });

    it("health checks on ready and closes clients with the app", async () => {
      const clients = makeClients();
      const app = Fastify();
      registerClientLifecycle(app, { clients, enableBootstrap: true, registerProcessSignals: false });

      await app.ready();
      expect(clients.openai.healthCheck).toHaveBeenCalledTimes(1);
      expect(clients.vectorStore.healthCheck).toHaveBeenCalledTimes(1);

      await app.close();
      expect(clients.openai.close).toHaveBeenCalledTimes(1);
      expect(clients.vectorStore.close).toHaveBeenCalledTimes(1);
    });

    it("skips the ready check when bootstrap is disabled", async () => {
      const clients = makeClients();
      const app = Fastify();
      registerClientLifecycle(app, { clients, enableBootstrap: false, registerProcessSignals: false });

      await app.ready();
      await app.close();

      expect(clients.openai.healthCheck).not.toHaveBeenCalled();
      expect(clients.vectorStore.close).toHaveBeenCalledTimes(1);
    });
  });
});
