/**
 * Realtime Search Engine
 *
 * Answers questions about current events: the chat model gets the current date and
 * time plus the top web results as extra system messages.
 */

import type { WebAugmentedReply } from "../executor/capabilities.js";
import type { TranscriptStore } from "../session/transcript-store.js";
import type { SearchProvider, SearchResult } from "../search/search-provider.js";
import type { ChatCompleter } from "./chat-client.js";
import { runTranscriptTurn } from "./chatbot.js";

export const NO_RESULTS_MESSAGE = "No recent search results found. Using general knowledge.";

/** Lines starting with these are tool or diagnostic noise */
const NOISE_PREFIXES = ["err:", "error:", "warning:", "[", "api request failed", "failed to generate"];

export interface RealtimeSearchOptions {
  client: ChatCompleter;
  transcript: TranscriptStore;
  search: SearchProvider;
  assistantName: string;
  timeZone: string;
  maxResults: number;

  /** Clock override */
  now?: () => Date;
}

export function buildRealtimeSystemPrompt(assistantName: string): string {
  return [
    `You are ${assistantName}, an AI assistant with real-time information access.`,
    "- Provide professional, well-formatted answers.",
    "- Use proper grammar and punctuation.",
    "- Prefer the latest information available.",
  ].join("\n");
}

export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  let formatted = "Latest Search Results:\n\n";
  results.forEach((result, index) => {
    formatted += `${index + 1}. ${result.title}\n   ${result.description}\n`;
  });
  return formatted;
}

/**
 * "05 March 2024\n09:07:03 UTC" in the given time zone
 */
export function formatRealtimeInfo(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    day: "2-digit",
    month: "long",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short",
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "";

  return `${part("day")} ${part("month")} ${part("year")}\n${part("hour")}:${part("minute")}:${part("second")} ${part("timeZoneName")}`;
}

/**
 * Drop blank lines and diagnostic noise
 */
export function cleanRealtimeResponse(answer: string): string {
  return answer
    .split("\n")
    .filter((line) => {
      if (!line.trim()) {
        return false;
      }
      const lower = line.toLowerCase();
      return !NOISE_PREFIXES.some((prefix) => lower.startsWith(prefix));
    })
    .join("\n");
}

export class RealtimeSearchEngine implements WebAugmentedReply {
  private readonly options: RealtimeSearchOptions;
  private readonly systemPrompt: string;
  private readonly now: () => Date;

  constructor(options: RealtimeSearchOptions) {
    this.options = options;
    this.systemPrompt = buildRealtimeSystemPrompt(options.assistantName);
    this.now = options.now ?? (() => new Date());
  }

  async reply(query: string): Promise<string> {
    const { results } = await this.options.search.search(query, this.options.maxResults);
    if (results.length > 0) {
      console.log(`[Search] ${results.length} result(s) for "${query}"`);
    }

    const answer = await runTranscriptTurn(
      this.options.client,
      this.options.transcript,
      [
        { role: "system", content: this.systemPrompt },
        { role: "system", content: formatRealtimeInfo(this.now(), this.options.timeZone) },
        { role: "system", content: formatSearchResults(results) },
      ],
      query
    );
    return cleanRealtimeResponse(answer);
  }
}

export function createRealtimeSearchEngine(options: RealtimeSearchOptions): RealtimeSearchEngine {
  return new RealtimeSearchEngine(options);
}
