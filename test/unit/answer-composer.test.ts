import { beforeEach, describe, expect, it, vi } from "vitest";
import { composeAnswer, NO_INFORMATION_ANSWER } from "../../src/modules/answer/answer-composer.js";
import { suggestRelatedTopics } from "../../src/modules/answer/fallback-topics.js";
import { createOpenAIGenerationBackend } from "../../src/modules/answer/generation-backend.js";
import { buildMessages } from "../../src/modules/answer/prompt-builder.js";
import { formatSources } from "../../src/modules/answer/source-formatter.js";
import type { ConversationTurn } from "../../src/modules/rag/types.js";
import { KNOWLEDGE_SYSTEM_PROMPT } from "../../src/prompts/index.js";
import { createFakeGenerationBackend, makeChunk } from "../../tests/helpers/fakes.js";

describe("modules/answer", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  describe("composeAnswer", () => {
    it("returns the canned answer with suggestions when nothing was retrieved", async () => {
      const generation = createFakeGenerationBackend();

      const result = await composeAnswer(
        { query: "How do I automate reminders?", documents: [] },
        { generation: generation.backend }
      );

      expect(result).toEqual({
        success: true,
        answer: NO_INFORMATION_ANSWER,
        sources: [],
        suggestedTopics: ["n8n", "automation"]
      });
      expect(NO_INFORMATION_ANSWER).toBe("I don't have information about that topic in my knowledge base.");
      expect(generation.generate).not.toHaveBeenCalled();
    });

    it("sends the system prompt, question and joined context to the backend", async () => {
      const generation = createFakeGenerationBackend({ kind: "plain", value: "  Use a Webflow form.  " });
      const history: ConversationTurn[] = [{ role: "user", content: "Hi" }];
      const documents = [makeChunk("a", { text: "First." }), makeChunk("b", { text: "Second.", relevance: 0.3 })];

      const result = await composeAnswer(
        { query: "How do I collect signups?", documents, history, requestId: "req-1" },
        { generation: generation.backend }
      );

      expect(generation.generate).toHaveBeenCalledWith(
        {
          systemPrompt: KNOWLEDGE_SYSTEM_PROMPT,
          history,
          userMessage: "How do I collect signups?",
          context: "First.\n\nSecond."
        },
        { signal: undefined, requestId: "req-1" }
      );
      expect(result).toEqual({
        success: true,
        answer: "Use a Webflow form.",
        sources: [
          { title: "a.md", source: "docs/a.md", topics: [], relevance: 0.9 },
          { title: "b.md", source: "docs/b.md", topics: [], relevance: 0.3 }
        ],
        suggestedTopics: []
      });
    });

    it("reports generation failures with the sources", async () => {
      const generation = createFakeGenerationBackend();
      generation.generate.mockRejectedValue(new Error("rate limited"));

      const result = await composeAnswer(
        { query: "q", documents: [makeChunk("a")] },
        { generation: generation.backend }
      );

      expect(result).toEqual({
        success: false,
        error: "Error generating answer: rate limited",
        sources: [{ title: "a.md", source: "docs/a.md", topics: [], relevance: 0.9 }]
      });
    });

    it("treats an empty completion as a failure", async () => {
      const generation = createFakeGenerationBackend({ kind: "completion", content: null, usage: null });

      const result = await composeAnswer({ query: "q", documents: [makeChunk("a")] }, { generation: generation.backend });

      expect(result).toMatchObject({ success: false, error: "Error generating answer: empty response" });
    });

    it("fails when the chat completion carries no choices", async () => {
      const create = vi.fn().mockResolvedValue({ id: "cmpl-1", object: "chat.completion", choices: [] });
      const generation = createOpenAIGenerationBackend({
        client: { chat: { completions: { create } } } as never,
        model: "gpt-test",
        temperature: 0.7
      });

      const result = await composeAnswer({ query: "q", documents: [makeChunk("a")] }, { generation });

      expect(result).toEqual({
        success: false,
        error: "Error generating answer: completion returned no choices",
        sources: [{ title: "a.md", source: "docs/a.md", topics: [], relevance: 0.9 }]
      });
    });

    it("propagates aborts from the backend", async () => {
      const controller = new AbortController();
      const generation = createFakeGenerationBackend();
      generation.generate.mockImplementation(async () => {
        controller.abort();
        throw new Error("Request was aborted.");
      });

      await expect(
        composeAnswer({ query: "q", documents: [makeChunk("a")], signal: controller.signal }, { generation: generation.backend })
      ).rejects.toThrow("Request was aborted.");
    });
  });

  describe("formatSources", () => {
    it("fills defaults for missing metadata", () => {
      expect(
        formatSources([makeChunk("x", { title: null, source: null, score: null, topics: ["Xano"] })])
      ).toEqual([{ title: "Untitled Document", source: "Unknown Source", topics: ["Xano"], relevance: 0 }]);
    });
  });

  describe("buildMessages", () => {
    it("passes the whole history in order and appends question then context", () => {
      const history = Array.from({ length: 18 }, (_, index): ConversationTurn => ({
        role: index % 2 === 0 ? "user" : "assistant",
        content: `turn-${index}`
      }));

      const messages = buildMessages({ systemPrompt: "system", history, userMessage: "question", context: "ctx" });

      expect(messages).toHaveLength(21);
      expect(messages[0]).toEqual({ role: "system", content: "system" });
      expect(messages[1]).toEqual({ role: "user", content: "turn-0" });
      expect(messages[18]).toEqual({ role: "assistant", content: "turn-17" });
      expect(messages.slice(-2)).toEqual([
        { role: "user", content: "question" },
        { role: "user", content: "Context: ctx" }
      ]);
    });
  });

  describe("suggestRelatedTopics", () => {
    it("prefers known topics sharing a word with the query", () => {
      expect(suggestRelatedTopics("airtable event analytics")).toEqual(["Airtable", "event registration", "event marketing"]);
    });

    it("falls back to keyword families and then defaults", () => {
      expect(suggestRelatedTopics("How do I connect forms?")).toEqual(["Webflow", "Airtable", "integration"]);
      expect(suggestRelatedTopics("How do I set up a payment gateway?")).toEqual([
        "event management",
        "Airtable",
        "Webflow"
      ]);
    });
  });
});
