import { logDebug } from "../../observability/logger.js";
import type { ConversationTurn, ReformulationResult } from "./types.js";

/** Canonical event-management terms and the phrasings users reach for instead. */
export const EVENT_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  registration: ["signup", "enroll", "register", "booking", "RSVP"],
  attendee: ["guest", "participant", "visitor", "delegate", "invitee"],
  "check-in": ["arrival", "sign-in", "entrance", "admission"],
  schedule: ["agenda", "timetable", "program", "itinerary"],
  venue: ["location", "place", "site", "facility"],
  speaker: ["presenter", "host", "panelist", "lecturer"],
  session: ["talk", "presentation", "workshop", "seminar", "breakout"],
  badge: ["name tag", "ID", "credential", "pass"],
  ticket: ["pass", "admission", "entry", "registration"],
  organizer: ["planner", "coordinator", "manager", "host"],
  feedback: ["survey", "evaluation", "review", "assessment"]
};

const COMPLEX_QUERY_PATTERNS: readonly RegExp[] = [
  /\b(how|what)\b.+?\band\b.+?\?/i,
  /\b(how|what)\b.+?\bor\b.+?\?/i,
  /\b(how|what|why)\b.+?\bif\b.+?\?/i,
  /\bcompare\b.+?\band\b.+?\?/i,
  /what are the steps to.+?\?/i,
  /\?[\s\S]*\?/
];

const ANAPHORA_PATTERN = /\b(it|they|them|those|these|this|that)\b/i;
const BACKWARD_REFERENCES = ["the same", "as mentioned"];
const RECENT_HISTORY_WINDOW = 6;
const MIN_HISTORY_FOR_CONTEXT = 2;

const INTERROGATIVE_DO_I_PREFIX = /^(how|what|why|when|where|who|which)\b.*?\bdo\s+I\s+/i;
const INTERROGATIVE_START = /^(how|what|why|when|where|who|which)\b/i;

const STOP_WORDS = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for", "with", "about", "is", "are"
]);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const mentionsWord = (query: string, word: string): boolean =>
  new RegExp(`\\b${escapeRegExp(word)}(?:s|es)?\\b`, "i").test(query);

export const generateContextAwareQuery = (
  query: string,
  history: readonly ConversationTurn[] = []
): string => {
  if (history.length < MIN_HISTORY_FOR_CONTEXT) {
    return query;
  }

  const contextText = history
    .slice(-RECENT_HISTORY_WINDOW)
    .map((turn) => turn.content)
    .filter((content) => content.length > 0)
    .join(" ");
  if (contextText.length === 0) {
    return query;
  }

  const lowered = query.toLowerCase();
  const hasAnaphora =
    ANAPHORA_PATTERN.test(query) || BACKWARD_REFERENCES.some((reference) => lowered.includes(reference));

  return hasAnaphora ? `${query} in the context of ${contextText}` : query;
};

const CANONICAL_TERMS = new Set(Object.keys(EVENT_SYNONYMS).map((term) => term.toLowerCase()));

const synonymOwners = new Map<string, number>();
for (const synonyms of Object.values(EVENT_SYNONYMS)) {
  for (const synonym of synonyms) {
    const key = synonym.toLowerCase();
    synonymOwners.set(key, (synonymOwners.get(key) ?? 0) + 1);
  }
}

/** Synonyms that point at exactly one entry and are not canonical terms themselves. */
const TRIGGER_SYNONYMS: Readonly<Record<string, readonly string[]>> = Object.fromEntries(
  Object.entries(EVENT_SYNONYMS).map(([term, synonyms]) => [
    term,
    synonyms.filter((synonym) => {
      const key = synonym.toLowerCase();
      return synonymOwners.get(key) === 1 && !CANONICAL_TERMS.has(key);
    })
  ])
);

const entryFires = (text: string, term: string): boolean =>
  text.toLowerCase().includes(term) || (TRIGGER_SYNONYMS[term] ?? []).some((synonym) => mentionsWord(text, synonym));

/**
 * Entries that fire on the query, closed over the terms those entries add, so that
 * expanding an already expanded query adds nothing.
 */
const firingEntries = (query: string): Set<string> => {
  const fired = new Set<string>();
  let text = query;
  let changed = true;
  while (changed) {
    changed = false;
    for (const [term, synonyms] of Object.entries(EVENT_SYNONYMS)) {
      if (!fired.has(term) && entryFires(text, term)) {
        fired.add(term);
        text = `${text} ${[term, ...synonyms].join(" ")}`;
        changed = true;
      }
    }
  }
  return fired;
};

export const expandQuery = (query: string): string => {
  const lowered = query.toLowerCase();
  const additions: string[] = [];
  const isPresent = (candidate: string): boolean => {
    const needle = candidate.toLowerCase();
    return lowered.includes(needle) || additions.some((addition) => addition.toLowerCase() === needle);
  };

  const fired = firingEntries(query);
  for (const [term, synonyms] of Object.entries(EVENT_SYNONYMS)) {
    if (!fired.has(term)) {
      continue;
    }
    for (const candidate of [term, ...synonyms]) {
      if (!isPresent(candidate)) {
        additions.push(candidate);
      }
    }
  }

  return additions.length > 0 ? `${query} ${additions.join(" ")}` : query;
};

export const isComplexQuery = (query: string): boolean =>
  COMPLEX_QUERY_PATTERNS.some((pattern) => pattern.test(query));

export const decomposeQuery = (query: string): string[] => {
  if (!isComplexQuery(query)) {
    return [query];
  }

  const questionMarkCount = query.split("?").length - 1;
  const segments = query
    .split("?")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
  if (questionMarkCount > 1 || segments.length > 1) {
    return segments.map((segment) => `${segment}?`);
  }

  const parts = query.split(/ and /i);
  if (parts.length === 2) {
    const [first, second] = parts;
    const prefix = INTERROGATIVE_DO_I_PREFIX.exec(first);
    if (prefix) {
      return [first, `${prefix[0]}${second}`];
    }
    if (INTERROGATIVE_START.test(second.trim())) {
      return [first, second.trim()];
    }
  }

  return [query];
};

export const extractQueryKeywords = (query: string): string[] =>
  query
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word));

export const reformulate = (
  query: string,
  history: readonly ConversationTurn[] = []
): ReformulationResult => {
  if (query.trim().length === 0) {
    return { primaryQuery: query, alternativeQueries: [] };
  }

  const contextAware = generateContextAwareQuery(query, history);
  const primaryQuery = expandQuery(contextAware);
  const alternativeQueries = decomposeQuery(primaryQuery).filter((candidate) => candidate !== primaryQuery);

  logDebug("rag.reformulate.complete", {}, {
    original_query: query,
    keywords: extractQueryKeywords(query),
    primary_query: primaryQuery,
    alternative_queries: alternativeQueries
  });

  return { primaryQuery, alternativeQueries };
};
