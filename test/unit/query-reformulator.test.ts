import { describe, expect, it } from "vitest";
import {
  EVENT_SYNONYMS,
  decomposeQuery,
  expandQuery,
  extractQueryKeywords,
  generateContextAwareQuery,
  isComplexQuery,
  reformulate
} from "../../src/modules/rag/query-reformulator.js";
import type { ConversationTurn } from "../../src/modules/rag/types.js";

const history: ConversationTurn[] = [
  { role: "user", content: "How do I set up Airtable?" },
  { role: "assistant", content: "Create a base first." }
];

describe("modules/rag/query-reformulator", () => {
  describe("generateContextAwareQuery", () => {
    it("appends recent history when the query refers back to it", () => {
      expect(generateContextAwareQuery("Can it sync with Webflow", history)).toBe(
        "Can it sync with Webflow in the context of How do I set up Airtable? Create a base first."
      );
    });

    it("treats backward-reference phrases like pronouns", () => {
      expect(generateContextAwareQuery("Use THE SAME base for Xano", history)).toBe(
        "Use THE SAME base for Xano in the context of How do I set up Airtable? Create a base first."
      );
    });

    it("leaves the query alone without enough history or without a reference", () => {
      expect(generateContextAwareQuery("Can it sync with Webflow", history.slice(0, 1))).toBe("Can it sync with Webflow");
      expect(generateContextAwareQuery("Sync Webflow forms", history)).toBe("Sync Webflow forms");
    });

    it("only uses the last six turns and skips empty ones", () => {
      const longHistory: ConversationTurn[] = [
        { role: "user", content: "turn-1" },
        { role: "assistant", content: "turn-2" },
        { role: "user", content: "turn-3" },
        { role: "assistant", content: "" },
        { role: "user", content: "turn-5" },
        { role: "assistant", content: "turn-6" },
        { role: "user", content: "turn-7" },
        { role: "assistant", content: "turn-8" }
      ];

      expect(generateContextAwareQuery("what about that", longHistory)).toBe(
        "what about that in the context of turn-3 turn-5 turn-6 turn-7 turn-8"
      );
    });

    it("does not inject when every recent turn is empty", () => {
      const emptyHistory: ConversationTurn[] = [
        { role: "user", content: "" },
        { role: "assistant", content: "" }
      ];
      expect(generateContextAwareQuery("what about that", emptyHistory)).toBe("what about that");
    });

    it("does not mutate the caller's history", () => {
      const snapshot = history.map((turn) => ({ ...turn }));
      generateContextAwareQuery("Can it sync", history);
      expect(history).toEqual(snapshot);
    });
  });

  describe("expandQuery", () => {
    it("adds registration terms for an RSVP question and attendee synonyms", () => {
      expect(expandQuery("How do I track attendee RSVPs?")).toBe(
        "How do I track attendee RSVPs? registration signup enroll register booking guest participant visitor delegate invitee"
      );
    });

    it("does not repeat terms already in the query", () => {
      expect(expandQuery("Where is the venue?")).toBe("Where is the venue? location place site facility");
    });

    it.each(Object.keys(EVENT_SYNONYMS))("adds nothing when the expanded %s query is expanded again", (term) => {
      const expanded = expandQuery(`Tell me about the ${term}`);
      expect(expandQuery(expanded)).toBe(expanded);
    });

    it("does not let a synonym shared by two entries pull in the other entry", () => {
      const expanded = expandQuery("Who is the speaker?");

      expect(expanded).toBe("Who is the speaker? presenter host panelist lecturer");
      expect(reformulate(expanded).primaryQuery).toBe(expanded);
    });

    it("expands registration when a ticket question adds it as a synonym", () => {
      const expanded = expandQuery("How much is a ticket?");

      expect(expanded).toBe(
        "How much is a ticket? registration signup enroll register booking RSVP pass admission entry"
      );
      expect(expandQuery(expanded)).toBe(expanded);
    });

    it("ignores shared synonyms as triggers", () => {
      expect(expandQuery("Where do I pick up my pass?")).toBe("Where do I pick up my pass?");
    });

    it("returns the query unchanged when nothing matches", () => {
      expect(expandQuery("Connect Xano to n8n")).toBe("Connect Xano to n8n");
    });
  });

  describe("decomposeQuery", () => {
    it("splits interrogative clauses joined by and", () => {
      expect(decomposeQuery("What's the best way to check in attendees and how do I track attendance?")).toEqual([
        "What's the best way to check in attendees",
        "how do I track attendance?"
      ]);
    });

    it("carries the 'do I' prefix into the second clause", () => {
      expect(decomposeQuery("How do I create an event form and send it to guests?")).toEqual([
        "How do I create an event form",
        "How do I send it to guests?"
      ]);
    });

    it("splits multiple questions on question marks", () => {
      expect(decomposeQuery("How do I add a speaker? Where do badges print?")).toEqual([
        "How do I add a speaker?",
        "Where do badges print?"
      ]);
    });

    it("keeps simple queries whole", () => {
      expect(isComplexQuery("How do I export guests?")).toBe(false);
      expect(decomposeQuery("How do I export guests?")).toEqual(["How do I export guests?"]);
    });

    it("keeps complex queries whole when no split rule applies", () => {
      expect(isComplexQuery("What happens if the webhook fails?")).toBe(true);
      expect(decomposeQuery("What happens if the webhook fails?")).toEqual(["What happens if the webhook fails?"]);
    });
  });

  describe("reformulate", () => {
    it("returns the expanded primary query without alternatives for simple questions", () => {
      expect(reformulate("How do I track attendee RSVPs?")).toEqual({
        primaryQuery:
          "How do I track attendee RSVPs? registration signup enroll register booking guest participant visitor delegate invitee",
        alternativeQueries: []
      });
    });

    it("decomposes the expanded query of a compound question", () => {
      expect(reformulate("What's the best way to check in attendees and how do I track attendance?")).toEqual({
        primaryQuery:
          "What's the best way to check in attendees and how do I track attendance? guest participant visitor delegate invitee",
        alternativeQueries: [
          "What's the best way to check in attendees and how do I track attendance?",
          "guest participant visitor delegate invitee?"
        ]
      });
    });

    it("returns blank input unchanged", () => {
      expect(reformulate("   ")).toEqual({ primaryQuery: "   ", alternativeQueries: [] });
    });
  });

  it("extracts keywords without stop words or short tokens", () => {
    expect(extractQueryKeywords("How do I connect the Airtable base to Webflow")).toEqual([
      "how",
      "connect",
      "airtable",
      "base",
      "webflow"
    ]);
  });
});
