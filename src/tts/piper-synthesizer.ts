/**
 * Piper Speech Synthesizer
 *
 * Local neural TTS. Text goes to piper's stdin and the WAV lands at the
 * destination path.
 */

import { existsSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import type { SpeechSynthesizer } from "./types.js";
import { SynthesisError } from "../utils/error-handler.js";
import { processRunner, type CommandRunner } from "../utils/process-runner.js";

/** Piper voice directory */
export const PIPER_VOICE_DIR = path.join(homedir(), ".local", "share", "piper-voices");

/** Voice name -> model file */
const PIPER_VOICES: Record<string, string> = {
  lessac: "en_US-lessac-medium.onnx",      // American female, professional
  ryan: "en_US-ryan-medium.onnx",          // American male, casual
  libritts: "en_US-libritts_r-medium.onnx", // Multi-speaker
  alba: "en_GB-alba-medium.onnx",          // Scottish
  jenny: "en_GB-jenny_dioco-medium.onnx",  // British female
};

const DEFAULT_VOICE = "ryan";

/**
 * Resolve a voice name or model path to a model file
 */
export function resolvePiperModel(voice: string | undefined, voiceDir: string = PIPER_VOICE_DIR): string {
  if (voice && voice.endsWith(".onnx")) {
    return path.resolve(voice);
  }
  const modelFile = PIPER_VOICES[(voice ?? DEFAULT_VOICE).toLowerCase()] ?? PIPER_VOICES[DEFAULT_VOICE];
  return path.join(voiceDir, modelFile);
}

/**
 * Piper synthesizer class
 */
export class PiperSynthesizer implements SpeechSynthesizer {
  readonly name = "piper";
  readonly fileExtension = "wav";
  private readonly modelPath: string;
  private readonly runner: CommandRunner;

  constructor(options: { voice?: string; voiceDir?: string; runner?: CommandRunner } = {}) {
    this.modelPath = resolvePiperModel(options.voice, options.voiceDir);
    this.runner = options.runner ?? processRunner;
  }

  async synthesize(text: string, destinationPath: string): Promise<void> {
    const result = await this.runner.run(
      "piper",
      ["--model", this.modelPath, "--output_file", destinationPath],
      { input: text, timeout: 30000 }
    );

    if (!result.success) {
      throw new SynthesisError(
        `Piper failed: ${result.error || result.stderr.trim() || `exit code ${result.exitCode}`}`
      );
    }
  }

  async checkAvailable(): Promise<{ available: boolean; error?: string }> {
    const which = await this.runner.run("which", ["piper"], { timeout: 3000 });
    if (!which.success) {
      return { available: false, error: "Piper TTS not installed. Run: pip3 install piper-tts" };
    }
    if (!existsSync(this.modelPath)) {
      return { available: false, error: `Piper voice model not found: ${this.modelPath}` };
    }
    return { available: true };
  }
}
