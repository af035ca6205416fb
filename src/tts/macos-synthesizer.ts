/**
 * macOS Speech Synthesizer
 *
 * Uses the built-in `say` command, writing AIFF instead of speaking directly.
 */

import type { SpeechSynthesizer } from "./types.js";
import { SynthesisError } from "../utils/error-handler.js";
import { processRunner, type CommandRunner } from "../utils/process-runner.js";

export class MacOSSynthesizer implements SpeechSynthesizer {
  readonly name = "macos";
  readonly fileExtension = "aiff";
  private readonly voice?: string;
  private readonly rate: number;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;

  constructor(
    options: { voice?: string; rate?: number; runner?: CommandRunner; platform?: NodeJS.Platform } = {}
  ) {
    this.voice = options.voice;
    this.rate = options.rate ?? 200;
    this.runner = options.runner ?? processRunner;
    this.platform = options.platform ?? process.platform;
  }

  async synthesize(text: string, destinationPath: string): Promise<void> {
    const args: string[] = [];

    if (this.voice) {
      args.push("-v", this.voice);
    }
    args.push("-r", String(this.rate));
    args.push("-o", destinationPath);
    // "--" keeps text that starts with a dash from being read as an option
    args.push("--", text);

    const result = await this.runner.run("say", args, { timeout: 30000 });
    if (!result.success) {
      throw new SynthesisError(
        `say failed: ${result.error || result.stderr.trim() || `exit code ${result.exitCode}`}`
      );
    }
  }

  async checkAvailable(): Promise<{ available: boolean; error?: string }> {
    if (this.platform !== "darwin") {
      return { available: false, error: "macOS TTS requires macOS" };
    }
    return { available: true };
  }
}
