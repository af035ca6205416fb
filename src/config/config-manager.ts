/**
 * Config Manager
 *
 * Loads assistant settings from a YAML file, validates each field, merges over the
 * defaults and applies environment overrides. Invalid fields are dropped with a
 * warning; a missing file yields the defaults.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import {
  DEFAULT_ASSISTANT_CONFIG,
  INPUT_MODES,
  SEARCH_PROVIDERS,
  SPEECH_PROVIDERS,
  type AssistantConfig,
  type SpeechProviderType,
} from "../types.js";
import { isRecord } from "../utils/json.js";

export const DEFAULT_CONFIG_FILE = "assistant.config.yaml";

export interface LoadConfigOptions {
  /** Explicit path (--config) */
  configPath?: string;

  /** Environment; defaults to process.env */
  env?: NodeJS.ProcessEnv;

  /** Base directory for the default file name */
  cwd?: string;
}

type Accept<T> = (value: unknown) => T | undefined;

const asString: Accept<string> = (value) =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

const asBoolean: Accept<boolean> = (value) => (typeof value === "boolean" ? value : undefined);

function asNumber(min: number, max: number): Accept<number> {
  return (value) =>
    typeof value === "number" && Number.isFinite(value) && value >= min && value <= max
      ? value
      : undefined;
}

function asOneOf<T extends string>(options: readonly T[]): Accept<T> {
  return (value) => options.find((option) => option === value);
}

const asSpeechProvider = asOneOf(SPEECH_PROVIDERS);

const asProviderList: Accept<SpeechProviderType[]> = (value) => {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const providers: SpeechProviderType[] = [];
  for (const entry of value) {
    const provider = asSpeechProvider(entry);
    if (provider && !providers.includes(provider)) {
      providers.push(provider);
    }
  }
  return providers.length > 0 ? providers : undefined;
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const asTimeZone: Accept<string> = (value) => {
  const timeZone = asString(value);
  return timeZone && isValidTimeZone(timeZone) ? timeZone : undefined;
};

/**
 * Read one field; absent keeps the fallback, invalid warns and keeps the fallback
 */
function field<T>(
  section: Record<string, unknown>,
  key: string,
  label: string,
  fallback: T,
  accept: Accept<T>
): T {
  const raw = section[key];
  if (raw === undefined || raw === null) {
    return fallback;
  }
  const accepted = accept(raw);
  if (accepted === undefined) {
    console.warn(`[Config] Ignoring invalid ${label}: ${JSON.stringify(raw)}`);
    return fallback;
  }
  return accepted;
}

function section(input: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = input[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    console.warn(`[Config] Ignoring invalid ${key} section`);
    return {};
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults
 */
export function validateAndMergeConfig(input: unknown): AssistantConfig {
  const defaults = DEFAULT_ASSISTANT_CONFIG;
  if (input === undefined || input === null) {
    return structuredClone(defaults);
  }
  if (!isRecord(input)) {
    console.warn("[Config] Config file must contain a mapping, using defaults");
    return structuredClone(defaults);
  }

  const chat = section(input, "chat");
  const search = section(input, "search");
  const speech = section(input, "speech");
  const inputSettings = section(input, "input");
  const session = section(input, "session");

  return {
    assistantName: field(input, "assistantName", "assistantName", defaults.assistantName, asString),
    userName: field(input, "userName", "userName", defaults.userName, asString),
    dataDir: field(input, "dataDir", "dataDir", defaults.dataDir, asString),
    timeZone: field(input, "timeZone", "timeZone", defaults.timeZone, asTimeZone),
    chat: {
      baseUrl: field(chat, "baseUrl", "chat.baseUrl", defaults.chat.baseUrl, asString),
      model: field(chat, "model", "chat.model", defaults.chat.model, asString),
      temperature: field(chat, "temperature", "chat.temperature", defaults.chat.temperature, asNumber(0, 2)),
      maxTokens: field(chat, "maxTokens", "chat.maxTokens", defaults.chat.maxTokens, asNumber(1, 32768)),
      timeoutMs: field(chat, "timeoutMs", "chat.timeoutMs", defaults.chat.timeoutMs, asNumber(1000, 300000)),
      apiKey: field<string | undefined>(chat, "apiKey", "chat.apiKey", defaults.chat.apiKey, asString),
    },
    search: {
      provider: field(search, "provider", "search.provider", defaults.search.provider, asOneOf(SEARCH_PROVIDERS)),
      maxResults: field(search, "maxResults", "search.maxResults", defaults.search.maxResults, asNumber(1, 10)),
      timeoutMs: field(search, "timeoutMs", "search.timeoutMs", defaults.search.timeoutMs, asNumber(1000, 60000)),
      apiKey: field<string | undefined>(search, "apiKey", "search.apiKey", defaults.search.apiKey, asString),
    },
    speech: {
      enabled: field(speech, "enabled", "speech.enabled", defaults.speech.enabled, asBoolean),
      provider: field(speech, "provider", "speech.provider", defaults.speech.provider, asSpeechProvider),
      fallbackChain: field(speech, "fallbackChain", "speech.fallbackChain", [...defaults.speech.fallbackChain], asProviderList),
      voice: field<string | undefined>(speech, "voice", "speech.voice", defaults.speech.voice, asString),
      rate: field(speech, "rate", "speech.rate", defaults.speech.rate, asNumber(50, 400)),
      pollIntervalMs: field(speech, "pollIntervalMs", "speech.pollIntervalMs", defaults.speech.pollIntervalMs, asNumber(5, 1000)),
      postPlaybackDelayMs: field(
        speech,
        "postPlaybackDelayMs",
        "speech.postPlaybackDelayMs",
        defaults.speech.postPlaybackDelayMs,
        asNumber(0, 5000)
      ),
      playerCommand: field<string | undefined>(speech, "playerCommand", "speech.playerCommand", defaults.speech.playerCommand, asString),
      openaiApiKey: field<string | undefined>(speech, "openaiApiKey", "speech.openaiApiKey", defaults.speech.openaiApiKey, asString),
    },
    input: {
      mode: field(inputSettings, "mode", "input.mode", defaults.input.mode, asOneOf(INPUT_MODES)),
      sttServerUrl: field(inputSettings, "sttServerUrl", "input.sttServerUrl", defaults.input.sttServerUrl, asString),
      language: field(inputSettings, "language", "input.language", defaults.input.language, asString),
      maxRecordingSeconds: field(
        inputSettings,
        "maxRecordingSeconds",
        "input.maxRecordingSeconds",
        defaults.input.maxRecordingSeconds,
        asNumber(1, 120)
      ),
      silenceThreshold: field(
        inputSettings,
        "silenceThreshold",
        "input.silenceThreshold",
        defaults.input.silenceThreshold,
        asNumber(0.1, 50)
      ),
      silenceSeconds: field(
        inputSettings,
        "silenceSeconds",
        "input.silenceSeconds",
        defaults.input.silenceSeconds,
        asNumber(0.1, 10)
      ),
    },
    session: {
      segmentPacingMs: field(
        session,
        "segmentPacingMs",
        "session.segmentPacingMs",
        defaults.session.segmentPacingMs,
        asNumber(0, 10000)
      ),
    },
  };
}

/**
 * Environment variables win over the file
 */
export function applyEnvOverrides(config: AssistantConfig, env: NodeJS.ProcessEnv): AssistantConfig {
  const read = (name: string): string | undefined => asString(env[name]);
  const timeZone = read("ASSISTANT_TIME_ZONE");
  if (timeZone && !isValidTimeZone(timeZone)) {
    console.warn(`[Config] Ignoring invalid ASSISTANT_TIME_ZONE: ${timeZone}`);
  }

  return {
    ...config,
    assistantName: read("ASSISTANT_NAME") ?? config.assistantName,
    userName: read("ASSISTANT_USER_NAME") ?? config.userName,
    dataDir: read("ASSISTANT_DATA_DIR") ?? config.dataDir,
    timeZone: timeZone && isValidTimeZone(timeZone) ? timeZone : config.timeZone,
    chat: { ...config.chat, apiKey: read("GROQ_API_KEY") ?? config.chat.apiKey },
    search: { ...config.search, apiKey: read("BRAVE_SEARCH_API_KEY") ?? config.search.apiKey },
    speech: { ...config.speech, openaiApiKey: read("OPENAI_API_KEY") ?? config.speech.openaiApiKey },
    input: { ...config.input, sttServerUrl: read("STT_SERVER_URL") ?? config.input.sttServerUrl },
  };
}

/**
 * --config, then ASSISTANT_CONFIG, then ./assistant.config.yaml
 */
export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  return resolve(cwd, options.configPath ?? asString(env.ASSISTANT_CONFIG) ?? DEFAULT_CONFIG_FILE);
}

/**
 * Load configuration. Never throws; unreadable files fall back to the defaults.
 */
export function loadAssistantConfig(options: LoadConfigOptions = {}): AssistantConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  let config = structuredClone(DEFAULT_ASSISTANT_CONFIG);

  if (existsSync(configPath)) {
    try {
      const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
      config = validateAndMergeConfig(parsed);
    } catch (error) {
      console.warn(
        `[Config] Failed to load config from ${configPath}:`,
        error instanceof Error ? error.message : error
      );
    }
  } else if (options.configPath) {
    console.warn(`[Config] Config file not found: ${configPath}, using defaults`);
  }

  return applyEnvOverrides(config, env);
}

/**
 * Write configuration as YAML, without secrets. Returns false on failure.
 */
export function saveAssistantConfig(config: AssistantConfig, configPath: string): boolean {
  const persisted = {
    ...config,
    chat: { ...config.chat, apiKey: undefined },
    search: { ...config.search, apiKey: undefined },
    speech: { ...config.speech, openaiApiKey: undefined },
  };

  try {
    const dir = dirname(configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(configPath, stringifyYaml(persisted), "utf-8");
    console.log(`[Config] Config saved to ${configPath}`);
    return true;
  } catch (error) {
    console.error(
      `[Config] Failed to save config to ${configPath}:`,
      error instanceof Error ? error.message : error
    );
    return false;
  }
}

/**
 * Default config file location for a directory
 */
export function defaultConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, DEFAULT_CONFIG_FILE);
}
