import { errorMessage, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { KNOWLEDGE_SYSTEM_PROMPT, NO_INFORMATION_ANSWER } from "../../prompts/index.js";
import { GenerationError, isAbortError, throwIfAborted } from "../rag/errors.js";
import { suggestRelatedTopics } from "./fallback-topics.js";
import { extractAnswerText } from "./generation-backend.js";
import { buildContextBlock, formatSources } from "./source-formatter.js";
import type { AnswerResult, ComposeAnswerInput, GenerationBackend } from "./types.js";

export { NO_INFORMATION_ANSWER };

export interface AnswerComposerDependencies {
  generation: GenerationBackend;
}

const generationFailure = (error: GenerationError, input: ComposeAnswerInput, sources: AnswerResult["sources"]): AnswerResult => {
  recordErrorRate("generation");
  logWarn("answer.generation.failed", { requestId: input.requestId }, serializeError(error));
  return { success: false, error: error.message, sources };
};

/**
 * Produces the grounded answer for a retrieved document set. Aborts propagate; every other
 * failure comes back as an unsuccessful result that still lists the sources.
 */
export async function composeAnswer(
  input: ComposeAnswerInput,
  dependencies: AnswerComposerDependencies
): Promise<AnswerResult> {
  if (input.documents.length === 0) {
    const suggestedTopics = suggestRelatedTopics(input.query);
    logInfo("answer.no_documents", { requestId: input.requestId }, { suggested_topics: suggestedTopics });
    return { success: true, answer: NO_INFORMATION_ANSWER, sources: [], suggestedTopics };
  }

  const sources = formatSources(input.documents);
  throwIfAborted(input.signal);

  let answer: string;
  try {
    const response = await dependencies.generation.generate(
      {
        systemPrompt: KNOWLEDGE_SYSTEM_PROMPT,
        history: input.history ?? [],
        userMessage: input.query,
        context: buildContextBlock(input.documents)
      },
      { signal: input.signal, requestId: input.requestId }
    );
    answer = extractAnswerText(response).trim();
  } catch (error) {
    if (isAbortError(error, input.signal)) {
      throw error;
    }
    return generationFailure(
      new GenerationError(`Error generating answer: ${errorMessage(error, String(error))}`, { cause: error }),
      input,
      sources
    );
  }

  if (answer.length === 0) {
    return generationFailure(new GenerationError("Error generating answer: empty response"), input, sources);
  }

  return { success: true, answer, sources, suggestedTopics: [] };
}
