import type { FastifyInstance } from "fastify";
import type { Config } from "../config/index.js";
import { logError, logInfo, logWarn, serializeError } from "../observability/logger.js";
import type { HealthReport } from "./health.js";
import { createOpenAIClientHandle, type OpenAIClientHandle } from "./openai.js";
import { createVectorStoreHandle, type VectorStoreHandle } from "./qdrant.js";

export interface InfrastructureClients {
  openai: OpenAIClientHandle;
  vectorStore: VectorStoreHandle;
}

export async function createInfrastructureClients(config: Config): Promise<InfrastructureClients> {
  const openai = createOpenAIClientHandle(config);
  const vectorStore = await createVectorStoreHandle(config);
  return { openai, vectorStore };
}

export async function checkInfrastructureHealth(
  clients: InfrastructureClients
): Promise<{ openai: HealthReport; vectorStore: HealthReport }> {
  const [openai, vectorStore] = await Promise.all([clients.openai.healthCheck(), clients.vectorStore.healthCheck()]);
  return { openai, vectorStore };
}

export async function shutdownInfrastructureClients(clients: InfrastructureClients, logPrefix: string): Promise<void> {
  logInfo("clients.lifecycle.shutdown", {}, { origin: logPrefix });
  const results = await Promise.allSettled([clients.vectorStore.close(), clients.openai.close()]);
  for (const result of results) {
    if (result.status === "rejected") {
      logWarn("clients.lifecycle.close_failed", {}, serializeError(result.reason));
    }
  }
}

let processHooksRegistered = false;

export interface ClientLifecycleOptions {
  clients: InfrastructureClients;
  enableBootstrap?: boolean;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions): void {
  const { clients } = options;
  const shouldRegisterProcessSignals = options.registerProcessSignals ?? true;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  if (options.enableBootstrap) {
    app.addHook("onReady", async () => {
      const health = await checkInfrastructureHealth(clients);
      if (health.openai.status === "error" || health.vectorStore.status === "error") {
        logWarn("clients.lifecycle.unhealthy", {}, { openai: health.openai, vector_store: health.vectorStore });
        return;
      }
      app.log.info("Infrastructure clients initialized and health checked");
    });
  } else {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
  }

  app.addHook("onClose", async () => {
    await shutdownInfrastructureClients(clients, "onClose");
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = (signal: NodeJS.Signals): void => {
      logInfo("clients.lifecycle.signal", {}, { signal });
      app.close().then(
        () => exit(0),
        (error: unknown) => {
          logError("clients.lifecycle.shutdown_failed", {}, serializeError(error));
          exit(1);
        }
      );
    };

    process.once("SIGINT", handleSignal);
    process.once("SIGTERM", handleSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
