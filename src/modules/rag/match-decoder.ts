import { z } from "zod";
import { MalformedRecordError } from "./errors.js";
import type { DocumentChunk, RawMatch } from "./types.js";

const NODE_CONTENT_KEY = "_node_content";

const nodeContentSchema = z
  .object({
    text: z.unknown().optional(),
    metadata: z.record(z.unknown()).nullish()
  })
  .passthrough();

const pickFirstString = (
  source: Record<string, unknown>,
  keys: string[],
): string | null => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return null;
};

const pickNumber = (source: Record<string, unknown>, key: string): number | null => {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

const toTopics = (value: unknown): string[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter((topic): topic is string => typeof topic === "string");
};

const parseNodeContent = (
  match: RawMatch,
): { text: unknown; metadata: Record<string, unknown> } => {
  const raw = match.metadata[NODE_CONTENT_KEY];
  if (raw === undefined) {
    return { text: match.metadata.text, metadata: {} };
  }
  if (typeof raw !== "string") {
    throw new MalformedRecordError(match.id, "invalid_payload", `${NODE_CONTENT_KEY} is not a string`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : "invalid JSON";
    throw new MalformedRecordError(match.id, "invalid_payload", `Failed to parse ${NODE_CONTENT_KEY}: ${detail}`);
  }

  const parsed = nodeContentSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedRecordError(match.id, "invalid_payload", `${NODE_CONTENT_KEY} is not an object`);
  }

  return { text: parsed.data.text, metadata: parsed.data.metadata ?? {} };
};

/**
 * Turns a raw index match into a chunk. Node content written by the ingestion pipeline
 * nests the text and document metadata inside a JSON string; source and title live on
 * the outer payload.
 *
 * @throws MalformedRecordError when the payload cannot be decoded or carries no text.
 */
export const decodeMatch = (match: RawMatch, namespace: string): DocumentChunk => {
  const node = parseNodeContent(match);
  if (typeof node.text !== "string") {
    throw new MalformedRecordError(match.id, "missing_text", `No text field found for match ${match.id}`);
  }

  const outer = match.metadata;
  const sourceKeys = ["file_path", "url", "source"];
  const titleKeys = ["file_name", "title"];

  return {
    id: match.id,
    text: node.text,
    source: pickFirstString(outer, sourceKeys) ?? pickFirstString(node.metadata, sourceKeys),
    title: pickFirstString(outer, titleKeys) ?? pickFirstString(node.metadata, titleKeys),
    topics: toTopics(node.metadata.topics) ?? toTopics(outer.topics) ?? [],
    score: match.score,
    relevance: pickNumber(outer, "relevance") ?? pickNumber(node.metadata, "relevance"),
    namespace,
  };
};
