import type { FastifyInstance } from "fastify";
import { registerDocumentRoutes, type DocumentRoutesDependencies } from "./documents.js";
import { registerQueryRoutes, type QueryRoutesDependencies } from "./query.js";

export interface ApiRoutesDependencies {
  query: QueryRoutesDependencies;
  documents: DocumentRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerQueryRoutes(app, dependencies.query);
  await registerDocumentRoutes(app, dependencies.documents);
}
