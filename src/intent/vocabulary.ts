/**
 * Keyword tables used by the intent classifier rules.
 * Every entry is lower case and punctuation free, matching the normalized form.
 */

import type { IntentTag } from "../types.js";

export const EXIT_WORDS: readonly string[] = ["bye", "exit", "quit", "goodbye", "end"];

export const SEARCH_TRIGGERS: readonly { prefix: string; tag: IntentTag }[] = [
  { prefix: "google ", tag: "google_search" },
  { prefix: "search google for ", tag: "google_search" },
  { prefix: "youtube ", tag: "youtube_search" },
  { prefix: "search youtube for ", tag: "youtube_search" },
];

export const BATCHABLE_VERBS = ["open", "close", "play", "system"] as const;

export type BatchableVerb = (typeof BATCHABLE_VERBS)[number];

// Matched anywhere in the normalized utterance, inside words too
export const REALTIME_KEYWORDS: readonly string[] = [
  "news",
  "weather",
  "update",
  "current",
  "latest",
  "recent",
  "headline",
  "now",
  "live",
  "score",
  "trending",
  "breaking",
  "forecast",
  "stock",
  "price",
  "exchange rate",
  "covid",
  "coronavirus",
  "result",
  "match",
  "game",
  "event",
  "happening",
  "going on",
  "today",
  "tonight",
  "tomorrow",
  "yesterday",
];

export const DATE_TIME_KEYWORDS: readonly string[] = ["date", "time", "day", "month", "year"];

// Applied to the punctuation-stripped utterance; group 1 is the subject
export const ENTITY_PATTERNS: readonly RegExp[] = [
  /^(?:who|what) is (.+)$/i,
  /^(?:tell me about|information about) (.+)$/i,
];
