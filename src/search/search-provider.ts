/**
 * Web Search Providers
 *
 * Fetch a handful of results to ground real-time answers. Providers never throw:
 * a failed search yields no results and an error string.
 */

import type { SearchProviderType, SearchSettings } from "../types.js";
import { isRecord, readArray, readRecord, readString } from "../utils/json.js";
import { withTimeout } from "../utils/retry.js";

const MAX_DESCRIPTION_LENGTH = 200;

export interface SearchResult {
  title: string;
  url: string;
  description: string;
}

export interface SearchResponse {
  provider: SearchProviderType;
  results: SearchResult[];
  error?: string;
}

export interface SearchProvider {
  readonly name: SearchProviderType;
  search(query: string, maxResults: number): Promise<SearchResponse>;
}

export function truncateDescription(description: string): string {
  const trimmed = description.trim();
  return trimmed.length > MAX_DESCRIPTION_LENGTH
    ? `${trimmed.slice(0, MAX_DESCRIPTION_LENGTH)}...`
    : trimmed;
}

async function fetchJson(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number,
  serviceName: string
): Promise<unknown> {
  return withTimeout(
    async (signal) => {
      const response = await fetch(url, { headers, signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      const body: unknown = await response.json();
      return body;
    },
    timeoutMs,
    serviceName
  );
}

function failed(provider: SearchProviderType, error: unknown): SearchResponse {
  const message = error instanceof Error ? error.message : String(error);
  console.warn(`[Search] ${provider} search failed: ${message}`);
  return { provider, results: [], error: message };
}

/**
 * DuckDuckGo instant answer API (no key)
 */
export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = "duckduckgo";
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async search(query: string, maxResults: number): Promise<SearchResponse> {
    const url = new URL("https://api.duckduckgo.com/");
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");

    try {
      const body = await fetchJson(url.toString(), { Accept: "application/json" }, this.timeoutMs, "DuckDuckGo");
      return { provider: this.name, results: parseDuckDuckGo(body).slice(0, maxResults) };
    } catch (error) {
      return failed(this.name, error);
    }
  }
}

function collectTopics(topics: unknown[], into: SearchResult[]): void {
  for (const topic of topics) {
    if (!isRecord(topic)) {
      continue;
    }
    // Category groups nest their entries under Topics
    const nested = readArray(topic, "Topics");
    if (nested.length > 0) {
      collectTopics(nested, into);
      continue;
    }
    const text = readString(topic, "Text");
    const url = readString(topic, "FirstURL");
    if (text && url) {
      const [title] = text.split(" - ");
      into.push({ title: title.trim(), url, description: truncateDescription(text) });
    }
  }
}

export function parseDuckDuckGo(body: unknown): SearchResult[] {
  if (!isRecord(body)) {
    return [];
  }

  const results: SearchResult[] = [];
  const abstract = readString(body, "AbstractText");
  if (abstract) {
    results.push({
      title: readString(body, "Heading") || "Summary",
      url: readString(body, "AbstractURL") ?? "",
      description: truncateDescription(abstract),
    });
  }

  const answer = readString(body, "Answer");
  if (answer) {
    results.push({ title: "Answer", url: "", description: truncateDescription(answer) });
  }

  collectTopics(readArray(body, "RelatedTopics"), results);
  return results;
}

/**
 * Brave web search API (key required)
 */
export class BraveSearchProvider implements SearchProvider {
  readonly name = "brave";
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: { apiKey?: string; timeoutMs?: number } = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async search(query: string, maxResults: number): Promise<SearchResponse> {
    if (!this.apiKey) {
      return failed(this.name, new Error("BRAVE_SEARCH_API_KEY not set"));
    }

    const url = new URL("https://api.search.brave.com/res/v1/web/search");
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(maxResults));

    try {
      const body = await fetchJson(
        url.toString(),
        { Accept: "application/json", "X-Subscription-Token": this.apiKey },
        this.timeoutMs,
        "Brave Search"
      );
      return { provider: this.name, results: parseBrave(body).slice(0, maxResults) };
    } catch (error) {
      return failed(this.name, error);
    }
  }
}

export function parseBrave(body: unknown): SearchResult[] {
  const web = isRecord(body) ? readRecord(body, "web") : undefined;
  if (!web) {
    return [];
  }

  const results: SearchResult[] = [];
  for (const entry of readArray(web, "results")) {
    if (!isRecord(entry)) {
      continue;
    }
    const title = readString(entry, "title");
    const url = readString(entry, "url");
    if (title && url) {
      results.push({
        title,
        url,
        description: truncateDescription(readString(entry, "description") ?? ""),
      });
    }
  }
  return results;
}

/**
 * Search disabled
 */
export class NoSearchProvider implements SearchProvider {
  readonly name = "none";

  async search(): Promise<SearchResponse> {
    return { provider: this.name, results: [] };
  }
}

export function createSearchProvider(settings: SearchSettings): SearchProvider {
  switch (settings.provider) {
    case "duckduckgo":
      return new DuckDuckGoSearchProvider({ timeoutMs: settings.timeoutMs });
    case "brave":
      return new BraveSearchProvider({ apiKey: settings.apiKey, timeoutMs: settings.timeoutMs });
    case "none":
      return new NoSearchProvider();
  }
}
