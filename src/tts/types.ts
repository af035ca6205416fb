/**
 * Speech Output Type Definitions
 */

import type { ControllerBusyError, PlaybackError, SynthesisError } from "../utils/error-handler.js";

/**
 * Controller state
 */
export type SpeechState = "idle" | "synthesizing" | "playing";

/**
 * How a playback cycle ended
 */
export type PlaybackStatus = "completed" | "cancelled" | "failed";

/**
 * Passed to SpeechRequest.onComplete once per admitted request
 */
export interface PlaybackCompletion {
  status: PlaybackStatus;
  error?: SynthesisError | PlaybackError;
}

/**
 * A request to speak some text
 */
export interface SpeechRequest {
  /** Text to speak */
  text: string;

  /** Invoked after the artifact is deleted, whatever the outcome */
  onComplete?: (completion: PlaybackCompletion) => void;

  /** Polled while playing; returning false stops playback early */
  keepPlaying?: () => boolean;
}

/**
 * Result of SpeechOutputController.submit
 */
export type SpeechOutcome =
  | { status: "completed" | "cancelled"; duration_ms: number }
  | { status: "failed"; error: SynthesisError | PlaybackError; duration_ms: number }
  | { status: "busy"; error: ControllerBusyError; duration_ms: number };

/**
 * Writes synthesized speech for `text` to `destinationPath`.
 */
export interface SpeechSynthesizer {
  /** Provider name for logs */
  readonly name: string;

  /** Extension of the files it writes, without the dot */
  readonly fileExtension: string;

  /** Throws SynthesisError */
  synthesize(text: string, destinationPath: string): Promise<void>;

  /** Whether the synthesizer can run on this host */
  checkAvailable(): Promise<{ available: boolean; error?: string }>;
}

/**
 * Plays an audio file until it ends or `signal` aborts.
 */
export interface AudioPlayer {
  /** Resolves when playback ends or is aborted; throws PlaybackError */
  play(path: string, signal: AbortSignal): Promise<void>;

  /** Release any resource held for the last file */
  release?(): void;
}

/**
 * Timing knobs for the controller
 */
export interface SpeechControllerOptions {
  /** Directory for artifacts */
  scratchDir: string;

  /** Cancellation poll tick in milliseconds */
  pollIntervalMs: number;

  /** Pause after playback before cleanup, in milliseconds */
  postPlaybackDelayMs: number;
}
