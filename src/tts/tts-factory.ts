/**
 * TTS Factory
 *
 * Picks a speech synthesizer from the configured provider and fallback chain,
 * skipping providers that are unavailable on this host.
 */

import type { SpeechProviderType, SpeechSettings } from "../types.js";
import type { SpeechSynthesizer } from "./types.js";
import { PiperSynthesizer } from "./piper-synthesizer.js";
import { MacOSSynthesizer } from "./macos-synthesizer.js";
import { OpenAISynthesizer } from "./openai-synthesizer.js";

/**
 * Factory result with metadata
 */
export interface SynthesizerSelection {
  synthesizer: SpeechSynthesizer;

  /** The provider actually used */
  provider: SpeechProviderType;

  /** Whether a provider other than the preferred one was chosen */
  usedFallback: boolean;
}

/**
 * Create a synthesizer for a specific provider, without availability checks
 */
export function createSynthesizer(
  provider: SpeechProviderType,
  settings: SpeechSettings
): SpeechSynthesizer {
  switch (provider) {
    case "piper":
      return new PiperSynthesizer({ voice: settings.voice });
    case "macos":
      return new MacOSSynthesizer({ voice: settings.voice, rate: settings.rate });
    case "openai":
      return new OpenAISynthesizer({ apiKey: settings.openaiApiKey, voice: settings.voice });
  }
}

/**
 * Preferred provider first, then the rest of the chain without duplicates
 */
export function buildFallbackChain(settings: SpeechSettings): SpeechProviderType[] {
  const chain: SpeechProviderType[] = [settings.provider];
  for (const provider of settings.fallbackChain) {
    if (!chain.includes(provider)) {
      chain.push(provider);
    }
  }
  return chain;
}

/**
 * Select the first available synthesizer, or null when none can run here
 */
export async function selectSynthesizer(
  settings: SpeechSettings,
  create: (provider: SpeechProviderType, settings: SpeechSettings) => SpeechSynthesizer = createSynthesizer
): Promise<SynthesizerSelection | null> {
  const chain = buildFallbackChain(settings);

  for (const provider of chain) {
    const synthesizer = create(provider, settings);
    const status = await synthesizer.checkAvailable();

    if (!status.available) {
      console.log(`[TTS Factory] Provider ${provider} unavailable: ${status.error}`);
      continue;
    }

    const usedFallback = provider !== settings.provider;
    if (usedFallback) {
      console.log(`[TTS Factory] Using fallback provider ${provider} (requested: ${settings.provider})`);
    } else {
      console.log(`[TTS Factory] Using ${provider} synthesizer`);
    }
    return { synthesizer, provider, usedFallback };
  }

  console.warn(`[TTS Factory] No speech provider available. Tried: ${chain.join(", ")}`);
  return null;
}
