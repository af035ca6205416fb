/**
 * Intent Classifier
 *
 * Deterministic, rule-based classification of an utterance into an ordered list of
 * intent segments. Rules are evaluated top to bottom and the first rule that matches
 * builds the whole segment list. No I/O and no state between calls.
 */

import type { IntentSegment, IntentTag } from "../types.js";
import {
  BATCHABLE_VERBS,
  type BatchableVerb,
  DATE_TIME_KEYWORDS,
  ENTITY_PATTERNS,
  EXIT_WORDS,
  REALTIME_KEYWORDS,
  SEARCH_TRIGGERS,
} from "./vocabulary.js";

/**
 * Utterance prepared for matching
 */
export interface NormalizedUtterance {
  /** Text exactly as received */
  original: string;

  /** Original text without surrounding whitespace */
  trimmed: string;

  /** Trimmed text without punctuation, original casing */
  stripped: string;

  /** Lower-cased stripped text, used for every match */
  plain: string;

  /** Whitespace tokens of plain */
  tokens: string[];
}

/**
 * One entry of the rule table
 */
export interface ClassifierRule {
  /** Rule name, for logs and tests */
  name: string;

  /** Whether the rule applies */
  matches(input: NormalizedUtterance): boolean;

  /** Build the segments; only called when matches() returned true */
  build(input: NormalizedUtterance): IntentSegment[];
}

const PUNCTUATION = /[^\p{L}\p{N}_\s]/gu;
const ITEM_SEPARATOR = /\s*,\s*|\s+and\s+/i;
const REMINDER_CLAUSE = /remind(?:er)?(?: me\b)?(?: on\b| at\b)?\s*(.*)/i;

/**
 * Normalize an utterance for matching
 */
export function normalizeUtterance(utterance: string): NormalizedUtterance {
  const trimmed = utterance.trim();
  const stripped = trimmed.replace(PUNCTUATION, "");
  const plain = stripped.toLowerCase();
  return {
    original: utterance,
    trimmed,
    stripped,
    plain,
    tokens: plain.split(/\s+/).filter((token) => token.length > 0),
  };
}

/**
 * Plain substring containment: "now" also matches "know", "live" matches "deliver"
 */
function containsAny(input: NormalizedUtterance, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => input.plain.includes(keyword));
}

function single(tag: IntentTag, argument: string): IntentSegment[] {
  return [{ tag, argument }];
}

/**
 * Split the remainder after a batchable verb into items
 */
function splitItems(input: NormalizedUtterance, verb: string): string[] {
  const remainder = input.trimmed.slice(verb.length).trim();
  return remainder
    .split(ITEM_SEPARATOR)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function findBatchVerb(input: NormalizedUtterance): BatchableVerb | undefined {
  return BATCHABLE_VERBS.find(
    (verb) => input.plain.startsWith(`${verb} `) && splitItems(input, verb).length > 0
  );
}

/**
 * Extract the reminder text: the clause after "remind"/"reminder", an optional "me"
 * and at most one "on"/"at" qualifier
 */
export function extractReminderText(utterance: string): string {
  const trimmed = utterance.trim();
  const match = REMINDER_CLAUSE.exec(trimmed);
  const clause = match?.[1]?.trim() ?? "";
  return clause.length > 0 ? clause : trimmed;
}

/**
 * Subject of an entity question ("who is X"), in its original casing
 */
function entitySubject(input: NormalizedUtterance): string | undefined {
  for (const pattern of ENTITY_PATTERNS) {
    const match = pattern.exec(input.stripped);
    if (match) {
      return match[1].trim();
    }
  }
  return undefined;
}

function isProminentSubject(subject: string): boolean {
  const words = subject.split(/\s+/).filter((word) => word.length > 0);
  return words.length > 1 || words.some((word) => /^\p{Lu}/u.test(word));
}

/**
 * The rule table, in priority order
 */
export const DEFAULT_RULES: readonly ClassifierRule[] = [
  {
    name: "exit",
    matches: (input) => input.tokens.some((token) => EXIT_WORDS.includes(token)),
    build: () => single("exit", ""),
  },
  {
    name: "search-trigger",
    matches: (input) => SEARCH_TRIGGERS.some(({ prefix }) => input.plain.startsWith(prefix)),
    build: (input) => {
      const trigger = SEARCH_TRIGGERS.find(({ prefix }) => input.plain.startsWith(prefix));
      if (!trigger) {
        return single("general", input.trimmed);
      }
      return single(trigger.tag, input.trimmed.slice(trigger.prefix.length).trim());
    },
  },
  {
    name: "batch-verb",
    matches: (input) => findBatchVerb(input) !== undefined,
    build: (input) => {
      const verb = findBatchVerb(input);
      if (!verb) {
        return single("general", input.trimmed);
      }
      return splitItems(input, verb).map((item) => ({ tag: verb, argument: item }));
    },
  },
  {
    name: "reminder",
    matches: (input) => input.plain.includes("remind"),
    build: (input) => single("reminder", extractReminderText(input.trimmed)),
  },
  {
    name: "realtime-keyword",
    matches: (input) => containsAny(input, REALTIME_KEYWORDS),
    build: (input) => single("realtime", input.trimmed),
  },
  {
    name: "entity-query",
    matches: (input) => entitySubject(input) !== undefined,
    build: (input) => {
      const subject = entitySubject(input) ?? "";
      return single(isProminentSubject(subject) ? "realtime" : "general", input.trimmed);
    },
  },
  {
    name: "date-time",
    matches: (input) => containsAny(input, DATE_TIME_KEYWORDS),
    build: (input) => single("general", input.trimmed),
  },
];

/**
 * Rule-based intent classifier
 */
export class IntentClassifier {
  private readonly rules: readonly ClassifierRule[];

  constructor(rules: readonly ClassifierRule[] = DEFAULT_RULES) {
    this.rules = rules;
  }

  /**
   * Classify an utterance. Always returns at least one segment.
   */
  classify(utterance: string): IntentSegment[] {
    const input = normalizeUtterance(utterance);

    for (const rule of this.rules) {
      if (!rule.matches(input)) {
        continue;
      }
      const segments = rule.build(input);
      if (segments.length > 0) {
        return segments;
      }
    }

    return single("general", input.trimmed);
  }

  /**
   * Name of the rule that decides an utterance, or "fallback"
   */
  explain(utterance: string): string {
    const input = normalizeUtterance(utterance);
    const rule = this.rules.find((candidate) => candidate.matches(input));
    return rule?.name ?? "fallback";
  }
}

/**
 * Render a segment as "<tag> <argument>"
 */
export function formatSegment(segment: IntentSegment): string {
  return segment.argument ? `${segment.tag} ${segment.argument}` : segment.tag;
}

/**
 * Create an intent classifier instance
 */
export function createIntentClassifier(rules?: readonly ClassifierRule[]): IntentClassifier {
  return new IntentClassifier(rules);
}

// Export singleton
export const intentClassifier = new IntentClassifier();

/**
 * Classify with the default rule table
 */
export function classify(utterance: string): IntentSegment[] {
  return intentClassifier.classify(utterance);
}
