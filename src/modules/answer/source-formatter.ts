import type { DocumentChunk } from "../rag/types.js";
import type { SourceDescriptor } from "./types.js";

const UNTITLED_DOCUMENT = "Untitled Document";
const UNKNOWN_SOURCE = "Unknown Source";

export const formatSources = (documents: DocumentChunk[]): SourceDescriptor[] =>
  documents.map((document) => ({
    title: document.title ?? UNTITLED_DOCUMENT,
    source: document.source ?? UNKNOWN_SOURCE,
    topics: [...document.topics],
    relevance: document.relevance ?? document.score ?? 0
  }));

export const buildContextBlock = (documents: DocumentChunk[]): string =>
  documents.map((document) => document.text).join("\n\n");
