/**
 * Assistant TypeScript Interfaces
 *
 * Type definitions shared by the classifier, dispatcher, speech output and session loop.
 */

import type { AssistantErrorCode } from "./utils/error-handler.js";

/**
 * Intent tags produced by the classifier
 */
export const INTENT_TAGS = [
  "exit",
  "google_search",
  "youtube_search",
  "open",
  "close",
  "play",
  "system",
  "reminder",
  "realtime",
  "general",
] as const;

export type IntentTag = (typeof INTENT_TAGS)[number];

/**
 * One classified, independently dispatchable piece of an utterance
 */
export interface IntentSegment {
  /** Which handler family the segment belongs to */
  tag: IntentTag;

  /** Argument text, original casing preserved (empty for exit) */
  argument: string;
}

/**
 * Outcome of dispatching one segment
 */
export type DispatchOutcome =
  | { kind: "success"; text: string }
  | { kind: "failure"; reason: string; code: AssistantErrorCode }
  | { kind: "halt" };

/**
 * Result of dispatching one segment
 */
export interface DispatchResult {
  /** The segment that was dispatched */
  segment: IntentSegment;

  /** Success, failure or halt */
  outcome: DispatchOutcome;

  /** Handler time in milliseconds */
  duration_ms: number;
}

/**
 * Everything handleUtterance produced for one utterance
 */
export interface UtteranceReport {
  /** The utterance as received */
  utterance: string;

  /** Segments the classifier produced */
  segments: IntentSegment[];

  /** Results in execution order (stops at the first halt) */
  results: DispatchResult[];

  /** Whether the exit intent was observed */
  halted: boolean;
}

/**
 * Chat transcript entry
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Input modes for the session loop
 */
export type InputMode = "text" | "voice" | "both";

export const INPUT_MODES: readonly InputMode[] = ["text", "voice", "both"];

/**
 * Speech synthesizer providers
 */
export type SpeechProviderType = "piper" | "macos" | "openai";

export const SPEECH_PROVIDERS: readonly SpeechProviderType[] = ["piper", "macos", "openai"];

/**
 * Web search providers
 */
export type SearchProviderType = "duckduckgo" | "brave" | "none";

export const SEARCH_PROVIDERS: readonly SearchProviderType[] = ["duckduckgo", "brave", "none"];

/**
 * Chat completion backend settings
 */
export interface ChatSettings {
  /** OpenAI-compatible API base URL */
  baseUrl: string;

  /** Model name */
  model: string;

  /** Sampling temperature */
  temperature: number;

  /** Maximum tokens in a reply */
  maxTokens: number;

  /** Request timeout in milliseconds */
  timeoutMs: number;

  /** API key (usually from GROQ_API_KEY) */
  apiKey?: string;
}

/**
 * Web search settings
 */
export interface SearchSettings {
  provider: SearchProviderType;

  /** Number of results folded into the prompt */
  maxResults: number;

  /** Request timeout in milliseconds */
  timeoutMs: number;

  /** API key for providers that need one */
  apiKey?: string;
}

/**
 * Speech output settings
 */
export interface SpeechSettings {
  /** Whether spoken output is enabled at all */
  enabled: boolean;

  /** Preferred synthesizer */
  provider: SpeechProviderType;

  /** Providers tried in order when the preferred one is unavailable */
  fallbackChain: SpeechProviderType[];

  /** Voice name or model path, provider specific */
  voice?: string;

  /** Speaking rate in words per minute (macOS) */
  rate: number;

  /** Cancellation poll tick in milliseconds */
  pollIntervalMs: number;

  /** Pause after playback before cleanup, in milliseconds */
  postPlaybackDelayMs: number;

  /** Audio player command override (e.g. "mpg123") */
  playerCommand?: string;

  /** OpenAI speech API key */
  openaiApiKey?: string;
}

/**
 * Input capture settings
 */
export interface InputSettings {
  mode: InputMode;

  /** Whisper STT server URL */
  sttServerUrl: string;

  /** Language passed to the STT server */
  language: string;

  /** Maximum recording length in seconds */
  maxRecordingSeconds: number;

  /** Silence threshold in percent of full scale */
  silenceThreshold: number;

  /** Trailing silence that ends a recording, in seconds */
  silenceSeconds: number;
}

/**
 * Assistant configuration
 */
export interface AssistantConfig {
  /** Name the assistant answers to */
  assistantName: string;

  /** Name of the user, used in prompts */
  userName: string;

  /** Directory for the transcript, reminders and speech artifacts */
  dataDir: string;

  /** IANA time zone for real-time prompts */
  timeZone: string;

  chat: ChatSettings;
  search: SearchSettings;
  speech: SpeechSettings;
  input: InputSettings;

  session: {
    /** Delay between segment executions in milliseconds */
    segmentPacingMs: number;
  };
}

/**
 * Default configuration
 */
export const DEFAULT_ASSISTANT_CONFIG: AssistantConfig = {
  assistantName: "Assistant",
  userName: "User",
  dataDir: "data",
  timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
  chat: {
    baseUrl: "https://api.groq.com/openai/v1",
    model: "llama-3.1-8b-instant",
    temperature: 0.7,
    maxTokens: 1024,
    timeoutMs: 30000,
  },
  search: {
    provider: "duckduckgo",
    maxResults: 3,
    timeoutMs: 10000,
  },
  speech: {
    enabled: true,
    provider: "piper",
    fallbackChain: ["piper", "macos", "openai"],
    rate: 200,
    pollIntervalMs: 33,
    postPlaybackDelayMs: 50,
  },
  input: {
    mode: "text",
    sttServerUrl: "http://localhost:5001",
    language: "en",
    maxRecordingSeconds: 15,
    silenceThreshold: 1,
    silenceSeconds: 1.5,
  },
  session: {
    segmentPacingMs: 300,
  },
};
