import { buildContextMessage } from "../../prompts/index.js";
import type { ChatMessage, GenerationRequest } from "./types.js";

const toHistoryMessages = (history: GenerationRequest["history"]): ChatMessage[] =>
  history.map((turn): ChatMessage => {
    if (turn.role === "user") {
      return { role: "user", content: turn.content };
    }
    return { role: "assistant", content: turn.content };
  });

export const buildMessages = (request: GenerationRequest): ChatMessage[] => [
  { role: "system", content: request.systemPrompt },
  ...toHistoryMessages(request.history),
  { role: "user", content: request.userMessage },
  { role: "user", content: buildContextMessage(request.context) }
];
