import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerApiRoutes } from "./api/routes/index.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerClientLifecycle, type InfrastructureClients } from "./clients/lifecycle.js";
import type { DocumentMappingStore } from "./modules/documents/document-mapping-store.js";
import type { KnowledgeService } from "./modules/knowledge/knowledge-service.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions {
  services: {
    knowledge: Pick<KnowledgeService, "processQuery" | "reformulate">;
    documents: Pick<DocumentMappingStore, "listTopics" | "listDocuments">;
  };
  clients?: InfrastructureClients;
  frontendOrigin?: string;
  enableBootstrap?: boolean;
  registerProcessSignals?: boolean;
  logger?: boolean;
}

const swapLoopbackHost = (origin: string): string | null => {
  if (!URL.canParse(origin)) {
    return null;
  }
  const url = new URL(origin);
  if (url.hostname === "localhost") {
    url.hostname = "127.0.0.1";
  } else if (url.hostname === "127.0.0.1") {
    url.hostname = "localhost";
  } else {
    return null;
  }
  return url.toString().replace(/\/$/, "");
};

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(configured && configured.length > 0 ? configured : ["http://localhost:8501"]);
  for (const origin of [...origins]) {
    const alias = swapLoopbackHost(origin);
    if (alias) {
      origins.add(alias);
    }
  }

  return [...origins];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(options.frontendOrigin),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  if (options.clients) {
    registerClientLifecycle(app, {
      clients: options.clients,
      enableBootstrap: options.enableBootstrap,
      registerProcessSignals: options.registerProcessSignals
    });
    await registerInfrastructureHealthRoute(app, options.clients);
  }
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  await registerApiRoutes(app, {
    query: { knowledge: options.services.knowledge },
    documents: { documents: options.services.documents }
  });

  return app;
}
