/**
 * Microphone Recorder
 *
 * Captures one utterance to a 16 kHz mono WAV with SoX `rec`. Recording starts on
 * sound, stops after trailing silence or at the length cap.
 */

import type { InputSettings } from "../types.js";
import { AssistantError, AssistantErrorCode } from "../utils/error-handler.js";
import { processRunner, type CommandRunner } from "../utils/process-runner.js";

export interface AudioRecorder {
  /** Record to destinationPath; throws AssistantError (RECORDING_FAILED) */
  record(destinationPath: string, signal?: AbortSignal): Promise<void>;
}

export type RecorderSettings = Pick<
  InputSettings,
  "maxRecordingSeconds" | "silenceThreshold" | "silenceSeconds"
>;

/**
 * Arguments for `rec`
 */
export function buildRecordArgs(destinationPath: string, settings: RecorderSettings): string[] {
  const threshold = `${settings.silenceThreshold}%`;
  return [
    "-q",
    "-c", "1",
    "-r", "16000",
    "-b", "16",
    destinationPath,
    // wait for sound, then stop after silenceSeconds below threshold
    "silence", "1", "0.1", threshold, "1", String(settings.silenceSeconds), threshold,
    "trim", "0", String(settings.maxRecordingSeconds),
  ];
}

export class SoxRecorder implements AudioRecorder {
  private readonly settings: RecorderSettings;
  private readonly runner: CommandRunner;

  constructor(settings: RecorderSettings, runner: CommandRunner = processRunner) {
    this.settings = settings;
    this.runner = runner;
  }

  async record(destinationPath: string, signal?: AbortSignal): Promise<void> {
    const result = await this.runner.run("rec", buildRecordArgs(destinationPath, this.settings), {
      signal,
      // Waiting for the first sound is part of the budget
      timeout: (this.settings.maxRecordingSeconds + 30) * 1000,
    });

    if (signal?.aborted) {
      throw new AssistantError(AssistantErrorCode.RECORDING_FAILED, "Recording interrupted", {
        recoverable: true,
      });
    }

    if (!result.started) {
      throw new AssistantError(
        AssistantErrorCode.RECORDING_FAILED,
        `SoX rec not available: ${result.error ?? "rec"}`
      );
    }

    if (!result.success && !result.timedOut) {
      throw new AssistantError(
        AssistantErrorCode.RECORDING_FAILED,
        `rec exited with code ${result.exitCode}: ${result.stderr.trim()}`
      );
    }
  }
}

export function createRecorder(settings: RecorderSettings, runner?: CommandRunner): SoxRecorder {
  return new SoxRecorder(settings, runner);
}
