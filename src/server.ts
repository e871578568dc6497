import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { createInfrastructureClients } from "./clients/lifecycle.js";
import { loadConfig } from "./config/index.js";
import { DocumentMappingStore } from "./modules/documents/document-mapping-store.js";
import { createKnowledgeService } from "./modules/knowledge/knowledge-service.js";
import { logError, serializeError } from "./observability/logger.js";

export async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const clients = await createInfrastructureClients(config);

  const app = await buildApp({
    services: {
      knowledge: createKnowledgeService(config, clients),
      documents: new DocumentMappingStore({ filePath: config.DOCUMENT_MAPPING_FILE })
    },
    clients,
    frontendOrigin: config.FRONTEND_ORIGIN,
    enableBootstrap: config.ENABLE_INFRA_BOOTSTRAP
  });

  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
