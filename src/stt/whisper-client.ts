/**
 * Whisper STT Client
 *
 * HTTP client for a local Whisper transcription server (POST /transcribe with a
 * multipart WAV upload, GET /health). Requests are retried with backoff.
 */

import type { InputSettings } from "../types.js";
import { isRecord, readNumber, readString } from "../utils/json.js";
import { formatRetryMessage, withRetry, type RetryConfig } from "../utils/retry.js";

/**
 * Default retry configuration for STT calls
 */
const DEFAULT_STT_RETRY_CONFIG: Partial<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 1000, // 1s, 2s, 4s
  backoffMultiplier: 2,
  maxDelayMs: 10000,
};

export interface TranscriptionResult {
  success: boolean;
  text: string;
  language?: string;
  duration_ms?: number;
  error?: string;
}

export interface STTServerStatus {
  healthy: boolean;
  model: string;
  modelLoaded: boolean;
  url: string;
}

/**
 * Anything that turns WAV bytes into text
 */
export interface Transcriber {
  transcribe(audio: Buffer, options?: { language?: string; signal?: AbortSignal }): Promise<TranscriptionResult>;
}

/**
 * Client for the Whisper Speech-to-Text server
 */
export class WhisperClient implements Transcriber {
  private readonly baseUrl: string;
  private readonly language?: string;
  private readonly retryConfig: Partial<RetryConfig>;
  private readonly timeoutMs: number;

  constructor(
    settings: Pick<InputSettings, "sttServerUrl" | "language">,
    options: { retry?: Partial<RetryConfig>; timeoutMs?: number } = {}
  ) {
    this.baseUrl = settings.sttServerUrl.replace(/\/+$/, "");
    this.language = settings.language || undefined;
    this.retryConfig = { ...DEFAULT_STT_RETRY_CONFIG, ...options.retry };
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /**
   * Check if the Whisper server is healthy and ready
   */
  async checkHealth(): Promise<STTServerStatus> {
    const unhealthy: STTServerStatus = {
      healthy: false,
      model: "unknown",
      modelLoaded: false,
      url: this.baseUrl,
    };

    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(5000),
      });
      if (!response.ok) {
        return unhealthy;
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        return unhealthy;
      }
      return {
        healthy: readString(data, "status") === "healthy",
        model: readString(data, "model") ?? "unknown",
        modelLoaded: data.model_loaded === true,
        url: this.baseUrl,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[WhisperClient] Health check failed: ${message}`);
      return unhealthy;
    }
  }

  /**
   * Transcribe WAV audio to text. Never throws.
   */
  async transcribe(
    audio: Buffer,
    options: { language?: string; signal?: AbortSignal } = {}
  ): Promise<TranscriptionResult> {
    const url = new URL(`${this.baseUrl}/transcribe`);
    const language = options.language ?? this.language;
    if (language) {
      url.searchParams.set("language", language);
    }

    const maxAttempts = this.retryConfig.maxAttempts ?? 3;

    const result = await withRetry(
      async (signal) => {
        const formData = new FormData();
        formData.append("file", new Blob([new Uint8Array(audio)], { type: "audio/wav" }), "audio.wav");

        const response = await fetch(url.toString(), {
          method: "POST",
          body: formData,
          signal,
        });

        const data: unknown = await response.json().catch(() => ({}));
        const body = isRecord(data) ? data : {};

        if (!response.ok) {
          throw new Error(readString(body, "error") ?? `HTTP ${response.status}: ${response.statusText}`);
        }
        if (body.success !== true) {
          throw new Error(readString(body, "error") ?? "Transcription failed");
        }
        return body;
      },
      {
        ...this.retryConfig,
        timeoutMs: this.timeoutMs,
        serviceName: "STT server",
        signal: options.signal,
        isRetryable: (error) => !options.signal?.aborted && isTransientSttError(error),
        onRetry: (attempt, _error, delayMs) => {
          const message = formatRetryMessage(attempt, maxAttempts, "STT server");
          console.warn(`[WhisperClient] ${message}. Waiting ${delayMs}ms...`);
        },
      }
    );

    if (!result.success) {
      return {
        success: false,
        text: "",
        error: `Transcription request failed: ${result.error.message}`,
      };
    }

    return {
      success: true,
      text: readString(result.result, "text") ?? "",
      language: readString(result.result, "language"),
      duration_ms: readNumber(result.result, "duration_ms"),
    };
  }

  getServerUrl(): string {
    return this.baseUrl;
  }
}

function isTransientSttError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes("fetch failed") ||
    message.includes("econnrefused") ||
    message.includes("timed out") ||
    /\bhttp 5\d\d\b/.test(message)
  );
}

export function createWhisperClient(
  settings: Pick<InputSettings, "sttServerUrl" | "language">,
  options: { retry?: Partial<RetryConfig>; timeoutMs?: number } = {}
): WhisperClient {
  return new WhisperClient(settings, options);
}
