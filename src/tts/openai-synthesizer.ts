/**
 * OpenAI Speech Synthesizer
 *
 * Calls the OpenAI speech endpoint and writes the returned MP3.
 */

import { writeFile } from "node:fs/promises";
import type { SpeechSynthesizer } from "./types.js";
import { SynthesisError } from "../utils/error-handler.js";
import { SERVICE_TIMEOUTS } from "../utils/retry.js";

/**
 * OpenAI TTS voice options
 */
export type OpenAIVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export const OPENAI_VOICES: readonly OpenAIVoice[] = [
  "alloy",
  "echo",
  "fable",
  "onyx",
  "nova",
  "shimmer",
];

const DEFAULT_VOICE: OpenAIVoice = "alloy";
const DEFAULT_MODEL = "tts-1";
const API_BASE_URL = "https://api.openai.com/v1";

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return OPENAI_VOICES.some((candidate) => candidate === voice);
}

export class OpenAISynthesizer implements SpeechSynthesizer {
  readonly name = "openai";
  readonly fileExtension = "mp3";
  private readonly apiKey?: string;
  private readonly voice: OpenAIVoice;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: { apiKey?: string; voice?: string; baseUrl?: string; timeoutMs?: number } = {}) {
    this.apiKey = options.apiKey;
    const voice = options.voice?.toLowerCase() ?? DEFAULT_VOICE;
    this.voice = isOpenAIVoice(voice) ? voice : DEFAULT_VOICE;
    this.baseUrl = options.baseUrl ?? API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? SERVICE_TIMEOUTS.TTS;
  }

  async synthesize(text: string, destinationPath: string): Promise<void> {
    if (!this.apiKey) {
      throw new SynthesisError("OpenAI TTS: no API key configured");
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/audio/speech`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: DEFAULT_MODEL,
          input: text,
          voice: this.voice,
          response_format: "mp3",
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SynthesisError(`OpenAI TTS request failed: ${message}`, error);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      console.error(`[OpenAI TTS] API error: ${response.status} - ${errorText}`);
      throw new SynthesisError(`OpenAI TTS error: HTTP ${response.status}`);
    }

    const audio = Buffer.from(await response.arrayBuffer());
    await writeFile(destinationPath, audio);
  }

  async checkAvailable(): Promise<{ available: boolean; error?: string }> {
    if (!this.apiKey) {
      return { available: false, error: "OPENAI_API_KEY not set" };
    }
    return { available: true };
  }
}
