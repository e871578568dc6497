export const KNOWN_TOPICS: readonly string[] = [
  "Webflow",
  "Airtable",
  "Xano",
  "n8n",
  "WhatsApp API",
  "event registration",
  "event marketing",
  "attendee management",
  "event analytics",
  "ticket sales",
  "check-in process",
  "integration",
  "automation",
  "database design",
  "API connectivity"
];

const TOPIC_FAMILIES: ReadonlyArray<{ stems: readonly string[]; topics: readonly string[] }> = [
  { stems: ["event", "attendee", "registration"], topics: ["event registration", "attendee management"] },
  { stems: ["integrat", "connect"], topics: ["Webflow", "Airtable", "integration"] },
  { stems: ["data", "database"], topics: ["Airtable", "database design"] },
  { stems: ["automat", "workflow"], topics: ["n8n", "automation"] },
  { stems: ["message", "communication", "notif"], topics: ["WhatsApp API"] }
];

const DEFAULT_TOPICS: readonly string[] = ["event management", "Airtable", "Webflow"];
const MAX_SUGGESTIONS = 3;

/** Topics worth offering when the knowledge base had nothing for a query. */
export const suggestRelatedTopics = (query: string): string[] => {
  const lowered = query.toLowerCase();
  const queryWords = new Set(lowered.split(/\s+/).filter((word) => word.length > 0));

  let related: readonly string[] = KNOWN_TOPICS.filter((topic) =>
    topic
      .toLowerCase()
      .split(/\s+/)
      .some((word) => queryWords.has(word))
  );

  if (related.length === 0) {
    const family = TOPIC_FAMILIES.find((candidate) => candidate.stems.some((stem) => lowered.includes(stem)));
    related = family ? family.topics : DEFAULT_TOPICS;
  }

  return related.slice(0, MAX_SUGGESTIONS);
};
