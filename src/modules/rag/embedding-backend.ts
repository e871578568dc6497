import type OpenAI from "openai";
import type { EmbeddingBackend } from "./types.js";

export interface OpenAIEmbeddingBackendOptions {
  client: OpenAI;
  model: string;
}

export const createOpenAIEmbeddingBackend = (options: OpenAIEmbeddingBackendOptions): EmbeddingBackend => ({
  async embed(text, requestOptions) {
    const response = await options.client.embeddings.create(
      {
        model: options.model,
        input: text
      },
      { signal: requestOptions?.signal }
    );

    const embedding = response.data?.[0]?.embedding;
    if (!embedding || !Array.isArray(embedding) || embedding.length === 0) {
      throw new Error("Embedding response missing vector payload.");
    }

    return embedding;
  }
});
