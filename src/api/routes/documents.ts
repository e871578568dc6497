import type { FastifyInstance } from "fastify";
import type { DocumentMappingStore } from "../../modules/documents/document-mapping-store.js";

export interface DocumentRoutesDependencies {
  documents: Pick<DocumentMappingStore, "listTopics" | "listDocuments">;
}

export async function registerDocumentRoutes(app: FastifyInstance, dependencies: DocumentRoutesDependencies): Promise<void> {
  app.get("/topics", async () => ({
    topics: await dependencies.documents.listTopics()
  }));

  app.get("/documents", async () => {
    const documents = await dependencies.documents.listDocuments();
    return {
      documents: documents.map((document) => ({
        doc_id: document.docId,
        title: document.title,
        source: document.source,
        topics: document.topics,
        chunk_count: document.chunkCount
      }))
    };
  });
}
