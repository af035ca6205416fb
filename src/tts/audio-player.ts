/**
 * Audio Player
 *
 * Plays an artifact with a command-line player: afplay on macOS, ffplay elsewhere,
 * or whatever `speech.playerCommand` names. Aborting the signal kills the player.
 */

import type { AudioPlayer } from "./types.js";
import { PlaybackError } from "../utils/error-handler.js";
import { processRunner, type CommandRunner } from "../utils/process-runner.js";

// Upper bound for a single playback
const MAX_PLAYBACK_MS = 10 * 60 * 1000;

/**
 * Player command and leading arguments for a platform
 */
export function resolvePlayerCommand(
  platform: NodeJS.Platform,
  override?: string
): { command: string; args: string[] } {
  const trimmed = override?.trim();
  if (trimmed) {
    const [command, ...args] = trimmed.split(/\s+/);
    return { command, args };
  }
  if (platform === "darwin") {
    return { command: "afplay", args: [] };
  }
  return { command: "ffplay", args: ["-nodisp", "-autoexit", "-loglevel", "quiet"] };
}

export class ProcessAudioPlayer implements AudioPlayer {
  private readonly command: string;
  private readonly args: string[];
  private readonly runner: CommandRunner;

  constructor(
    options: { platform?: NodeJS.Platform; playerCommand?: string; runner?: CommandRunner } = {}
  ) {
    const resolved = resolvePlayerCommand(options.platform ?? process.platform, options.playerCommand);
    this.command = resolved.command;
    this.args = resolved.args;
    this.runner = options.runner ?? processRunner;
  }

  async play(filePath: string, signal: AbortSignal): Promise<void> {
    const result = await this.runner.run(this.command, [...this.args, filePath], {
      signal,
      timeout: MAX_PLAYBACK_MS,
    });

    if (signal.aborted || result.success) {
      return;
    }

    if (!result.started) {
      throw new PlaybackError(`Audio player unavailable: ${result.error ?? this.command}`);
    }
    throw new PlaybackError(
      result.error ?? `${this.command} exited with code ${result.exitCode}: ${result.stderr.trim()}`
    );
  }

  getCommand(): string {
    return this.command;
  }
}
