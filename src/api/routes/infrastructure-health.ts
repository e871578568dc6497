import type { FastifyInstance } from "fastify";
import { checkInfrastructureHealth, type InfrastructureClients } from "../../clients/lifecycle.js";

export async function registerInfrastructureHealthRoute(app: FastifyInstance, clients: InfrastructureClients): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    const health = await checkInfrastructureHealth(clients);
    const healthy = health.openai.status === "ok" && health.vectorStore.status === "ok";
    if (!healthy) {
      reply.code(503);
    }

    return {
      status: healthy ? "ok" : "error",
      clients: {
        openai: health.openai,
        vector_store: { ...health.vectorStore, backend: clients.vectorStore.backend }
      }
    };
  });
}
