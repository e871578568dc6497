import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage, logError, logInfo, logWarn } from "../../observability/logger.js";

export interface MappedDocument {
  docId: string;
  title: string | null;
  source: string | null;
  topics: string[];
  chunkCount: number | null;
}

const mappingEntrySchema = z
  .object({
    title: z.unknown().optional(),
    file_name: z.unknown().optional(),
    source: z.unknown().optional(),
    file_path: z.unknown().optional(),
    topics: z.unknown().optional(),
    chunk_count: z.unknown().optional(),
    embedding_info: z.object({ chunks: z.unknown().optional() }).passthrough().nullish()
  })
  .passthrough();

type MappingEntry = z.infer<typeof mappingEntrySchema>;

const firstString = (...values: unknown[]): string | null => {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return null;
};

const firstCount = (...values: unknown[]): number | null => {
  for (const value of values) {
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
      return value;
    }
  }
  return null;
};

const toDocument = (docId: string, entry: MappingEntry): MappedDocument => ({
  docId,
  title: firstString(entry.title, entry.file_name),
  source: firstString(entry.source, entry.file_path),
  topics: Array.isArray(entry.topics) ? entry.topics.filter((topic): topic is string => typeof topic === "string") : [],
  chunkCount: firstCount(entry.chunk_count, entry.embedding_info?.chunks)
});

export interface DocumentMappingStoreOptions {
  filePath: string;
  cwd?: string;
  readFile?: (filePath: string) => Promise<string>;
}

/** Read-only view of the mapping file the ingestion pipeline maintains. Loaded once, cached until refresh. */
export class DocumentMappingStore {
  private readonly filePath: string;
  private readonly readFile: (filePath: string) => Promise<string>;
  private cache: Promise<MappedDocument[]> | null = null;

  constructor(options: DocumentMappingStoreOptions) {
    this.filePath = path.resolve(options.cwd ?? process.cwd(), options.filePath);
    this.readFile = options.readFile ?? ((candidate) => fs.readFile(candidate, "utf8"));
  }

  async listDocuments(): Promise<MappedDocument[]> {
    const documents = await this.load();
    return documents.map((document) => ({ ...document, topics: [...document.topics] }));
  }

  async listTopics(): Promise<string[]> {
    const documents = await this.load();
    const topics = new Set<string>();
    for (const document of documents) {
      for (const topic of document.topics) {
        topics.add(topic);
      }
    }
    return [...topics].sort();
  }

  refresh(): void {
    this.cache = null;
  }

  private load(): Promise<MappedDocument[]> {
    if (!this.cache) {
      this.cache = this.readMapping();
    }
    return this.cache;
  }

  private async readMapping(): Promise<MappedDocument[]> {
    let raw: string;
    try {
      raw = await this.readFile(this.filePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logWarn("documents.mapping.missing", {}, { file: this.filePath });
      } else {
        logError("documents.mapping.unreadable", {}, { file: this.filePath, message: errorMessage(error) });
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logError("documents.mapping.invalid_json", {}, { file: this.filePath, message: errorMessage(error) });
      return [];
    }

    const mapping = z.record(z.unknown()).safeParse(parsed);
    if (!mapping.success) {
      logError("documents.mapping.invalid_shape", {}, { file: this.filePath });
      return [];
    }

    const documents: MappedDocument[] = [];
    for (const [docId, value] of Object.entries(mapping.data)) {
      const entry = mappingEntrySchema.safeParse(value);
      if (!entry.success) {
        logWarn("documents.mapping.entry_skipped", {}, { doc_id: docId });
        continue;
      }
      documents.push(toDocument(docId, entry.data));
    }
    documents.sort((a, b) => (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0));

    logInfo("documents.mapping.loaded", {}, { file: this.filePath, documents: documents.length });
    return documents;
  }
}
