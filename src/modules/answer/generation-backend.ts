import type OpenAI from "openai";
import { z } from "zod";
import { logDebug } from "../../observability/logger.js";
import { recordGenerationLatency, recordOpenAIUsage } from "../../observability/metrics.js";
import { GenerationError } from "../rag/errors.js";
import { buildMessages } from "./prompt-builder.js";
import type { GenerationBackend, GenerationResponse, TokenUsage } from "./types.js";

const completionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullish() }).passthrough()
          })
          .passthrough()
      )
      .min(1),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

const textSchema = z.object({ text: z.string() }).passthrough();

const toUsage = (usage: z.infer<typeof completionSchema>["usage"]): TokenUsage | null => {
  if (!usage) {
    return null;
  }
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens
  };
};

export const decodeGenerationResponse = (raw: unknown): GenerationResponse => {
  if (typeof raw === "string") {
    return { kind: "plain", value: raw };
  }

  const completion = completionSchema.safeParse(raw);
  if (completion.success) {
    return {
      kind: "completion",
      content: completion.data.choices[0].message.content ?? null,
      usage: toUsage(completion.data.usage)
    };
  }

  const text = textSchema.safeParse(raw);
  if (text.success) {
    return { kind: "text", text: text.data.text };
  }

  return { kind: "opaque", value: raw };
};

/** JSON with object keys sorted, so the same value always renders the same way. */
export const stableStringify = (value: unknown): string => {
  const normalize = (input: unknown): unknown => {
    if (Array.isArray(input)) {
      return input.map(normalize);
    }
    if (input && typeof input === "object") {
      return Object.fromEntries(
        Object.entries(input)
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([key, entry]) => [key, normalize(entry)])
      );
    }
    return input;
  };

  const rendered = JSON.stringify(normalize(value));
  return rendered === undefined ? String(value) : rendered;
};

export const extractAnswerText = (response: GenerationResponse): string => {
  switch (response.kind) {
    case "completion":
      return response.content ?? "";
    case "text":
      return response.text;
    case "plain":
      return response.value;
    case "opaque":
      return stableStringify(response.value);
  }
};

export interface OpenAIGenerationBackendOptions {
  client: OpenAI;
  model: string;
  temperature: number;
  now?: () => number;
}

export const createOpenAIGenerationBackend = (options: OpenAIGenerationBackendOptions): GenerationBackend => {
  const now = options.now ?? Date.now;

  return {
    async generate(request, requestOptions) {
      const messages = buildMessages(request);
      const startedAt = now();
      try {
        const completion = await options.client.chat.completions.create(
          {
            model: options.model,
            temperature: options.temperature,
            messages
          },
          { signal: requestOptions?.signal }
        );

        if (completion.choices.length === 0) {
          throw new GenerationError("completion returned no choices");
        }
        const decoded = decodeGenerationResponse(completion);
        if (decoded.kind === "completion" && decoded.usage) {
          recordOpenAIUsage(decoded.usage);
        }
        logDebug("answer.generation.complete", { requestId: requestOptions?.requestId }, {
          model: options.model,
          messages: messages.length,
          response_kind: decoded.kind
        });
        return decoded;
      } finally {
        recordGenerationLatency(now() - startedAt);
      }
    }
  };
};
