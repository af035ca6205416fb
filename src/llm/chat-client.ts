/**
 * Chat Completion Client
 *
 * HTTP client for an OpenAI-compatible /chat/completions endpoint (Groq by default).
 * Each request runs under a timeout and is retried on network and 5xx errors.
 */

import type { ChatMessage, ChatSettings } from "../types.js";
import { AssistantErrorCode, ServiceError } from "../utils/error-handler.js";
import {
  formatRetryMessage,
  isTimeoutError,
  withRetry,
  type RetryConfig,
} from "../utils/retry.js";
import { isRecord, readArray, readNumber, readRecord, readString } from "../utils/json.js";

const SERVICE_NAME = "Chat";

/**
 * Default retry configuration for chat calls
 */
const DEFAULT_CHAT_RETRY_CONFIG: Partial<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 8000,
};

/**
 * Per-request overrides
 */
export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * A completed chat request
 */
export interface ChatCompletion {
  /** Generated text, trimmed */
  text: string;

  /** Model that answered */
  model: string;

  /** Token counts, when the server reports them */
  tokens?: {
    prompt: number;
    completion: number;
    total: number;
  };

  duration_ms: number;
}

/**
 * Anything that can complete a conversation. Throws ServiceError.
 */
export interface ChatCompleter {
  complete(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<ChatCompletion>;
}

/**
 * Parse a /chat/completions response body
 */
export function parseChatCompletion(
  body: unknown,
  fallbackModel: string
): Omit<ChatCompletion, "duration_ms"> {
  if (!isRecord(body)) {
    throw new ServiceError(SERVICE_NAME, "Invalid response: expected a JSON object", {
      code: AssistantErrorCode.SERVICE_BAD_RESPONSE,
    });
  }

  const [firstChoice] = readArray(body, "choices");
  const message = isRecord(firstChoice) ? readRecord(firstChoice, "message") : undefined;
  if (!message) {
    throw new ServiceError(SERVICE_NAME, "Invalid response: no choices returned", {
      code: AssistantErrorCode.SERVICE_BAD_RESPONSE,
    });
  }

  const text = (readString(message, "content") ?? "").replace(/<\/s>/g, "").trim();
  const usage = readRecord(body, "usage");
  const prompt = usage ? readNumber(usage, "prompt_tokens") : undefined;
  const completion = usage ? readNumber(usage, "completion_tokens") : undefined;
  const total = usage ? readNumber(usage, "total_tokens") : undefined;

  return {
    text,
    model: readString(body, "model") ?? fallbackModel,
    tokens:
      prompt !== undefined && completion !== undefined
        ? { prompt, completion, total: total ?? prompt + completion }
        : undefined,
  };
}

/**
 * Client for OpenAI-compatible chat completion servers
 */
export class ChatClient implements ChatCompleter {
  private readonly settings: ChatSettings;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(settings: ChatSettings, retryConfig: Partial<RetryConfig> = {}) {
    this.settings = settings;
    this.retryConfig = { ...DEFAULT_CHAT_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Whether an API key is available
   */
  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  getModel(): string {
    return this.settings.model;
  }

  /**
   * Send a chat completion request
   */
  async complete(
    messages: ChatMessage[],
    options: ChatCompletionOptions = {}
  ): Promise<ChatCompletion> {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw new ServiceError(SERVICE_NAME, "No API key configured (set GROQ_API_KEY)", {
        code: AssistantErrorCode.SERVICE_NOT_CONFIGURED,
      });
    }

    const startTime = Date.now();
    const maxAttempts = this.retryConfig.maxAttempts ?? 3;
    const requestBody = {
      model: this.settings.model,
      messages,
      temperature: options.temperature ?? this.settings.temperature,
      max_tokens: options.maxTokens ?? this.settings.maxTokens,
      top_p: 1,
      stream: false,
    };

    const result = await withRetry(
      async (signal) => {
        const response = await fetch(`${this.settings.baseUrl}/chat/completions`, {
          method: "POST",
          signal,
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify(requestBody),
        });

        if (!response.ok) {
          const errorText = await response.text().catch(() => "");
          throw new Error(`HTTP ${response.status}: ${errorText.slice(0, 200)}`);
        }

        const body: unknown = await response.json();
        return parseChatCompletion(body, this.settings.model);
      },
      {
        ...this.retryConfig,
        timeoutMs: this.settings.timeoutMs,
        serviceName: SERVICE_NAME,
        onRetry: (attempt, error, delayMs) => {
          const message = formatRetryMessage(attempt, maxAttempts, "Chat server");
          console.warn(`[Chat] ${message}. Waiting ${delayMs}ms... (${error.message})`);
        },
      }
    );

    if (!result.success) {
      throw this.toServiceError(result.error);
    }

    return { ...result.result, duration_ms: Date.now() - startTime };
  }

  private toServiceError(error: Error): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }
    if (isTimeoutError(error)) {
      return new ServiceError(SERVICE_NAME, error.message, {
        code: AssistantErrorCode.SERVICE_TIMEOUT,
        cause: error,
      });
    }
    return new ServiceError(SERVICE_NAME, `Request failed: ${error.message}`, { cause: error });
  }
}

/**
 * Create a chat client
 */
export function createChatClient(
  settings: ChatSettings,
  retryConfig: Partial<RetryConfig> = {}
): ChatClient {
  return new ChatClient(settings, retryConfig);
}
