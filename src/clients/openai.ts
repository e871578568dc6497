import OpenAI from "openai";
import type { Config } from "../config/index.js";
import { errorMessage, logInfo } from "../observability/logger.js";
import type { ClientHandle } from "./health.js";
import { withRetries, withTimeout } from "./retry.js";

export type OpenAIClientHandle = ClientHandle<OpenAI>;

type OpenAIClientConfig = Pick<Config, "OPENAI_API_KEY" | "OPENAI_MODEL" | "OPENAI_TIMEOUT_MS">;

const REQUEST_RETRIES = 2;
const REQUEST_RETRY_DELAY_MS = 300;
const HEALTH_CHECK_TIMEOUT_MS = 7000;

export type OpenAIClientFactory = (options: { apiKey: string; maxRetries: number; timeout: number }) => OpenAI;

const defaultFactory: OpenAIClientFactory = (options) => new OpenAI(options);

export function createOpenAIClientHandle(
  config: OpenAIClientConfig,
  factory: OpenAIClientFactory = defaultFactory
): OpenAIClientHandle {
  const client = factory({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: REQUEST_RETRIES,
    timeout: config.OPENAI_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { model: config.OPENAI_MODEL });

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(
          async () =>
            withTimeout(async (signal) => {
              await client.models.retrieve(config.OPENAI_MODEL, { signal });
            }, Math.min(HEALTH_CHECK_TIMEOUT_MS, config.OPENAI_TIMEOUT_MS)),
          { attempts: REQUEST_RETRIES, delayMs: REQUEST_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    },
    async close() {
      logInfo("clients.openai.closed", {});
    }
  };
}
