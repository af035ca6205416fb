/**
 * Speech Output Controller
 *
 * Owns the single speech pipeline of the process: synthesize to a uniquely named
 * artifact, play it, then release the player, delete the artifact and report back.
 *
 * - A request arriving while another is being admitted (synthesizing, or waiting for
 *   the playback it supersedes to stop) is rejected as busy. Nothing is queued.
 * - A request arriving while another is playing supersedes it: the active playback is
 *   stopped and fully cleaned up before the new request is synthesized.
 * - stop() also cancels a request still being admitted; its artifact is deleted and
 *   it never reaches the player.
 */

import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { mkdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type {
  AudioPlayer,
  PlaybackCompletion,
  SpeechControllerOptions,
  SpeechOutcome,
  SpeechRequest,
  SpeechState,
  SpeechSynthesizer,
} from "./types.js";
import type { SpeechOutput } from "../executor/capabilities.js";
import { ControllerBusyError, PlaybackError, SynthesisError } from "../utils/error-handler.js";
import { sleep } from "../utils/retry.js";

export const DEFAULT_SPEECH_CONTROLLER_OPTIONS: SpeechControllerOptions = {
  scratchDir: path.join(tmpdir(), "desk-assistant-speech"),
  pollIntervalMs: 33,
  postPlaybackDelayMs: 50,
};

/**
 * Controller event types
 */
export type SpeechEventType = "state_change" | "playback_start" | "playback_end" | "busy";

export interface SpeechEvent {
  type: SpeechEventType;
  data: Record<string, unknown>;
  timestamp: Date;
}

interface ActivePlayback {
  abort: AbortController;
  finished: Promise<PlaybackCompletion>;
}

interface PendingAdmission {
  abort: AbortController;
  done: Promise<ActivePlayback | PlaybackCompletion>;
}

function toSynthesisError(error: unknown): SynthesisError {
  if (error instanceof SynthesisError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SynthesisError(`Speech synthesis failed: ${message}`, error);
}

function toPlaybackError(error: unknown): PlaybackError {
  if (error instanceof PlaybackError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PlaybackError(`Audio playback failed: ${message}`, error);
}

/**
 * Speech Output Controller class
 */
export class SpeechOutputController extends EventEmitter implements SpeechOutput {
  private readonly synthesizer: SpeechSynthesizer;
  private readonly player: AudioPlayer;
  private readonly options: SpeechControllerOptions;

  private state: SpeechState = "idle";
  private admission: PendingAdmission | null = null;
  private active: ActivePlayback | null = null;

  constructor(
    synthesizer: SpeechSynthesizer,
    player: AudioPlayer,
    options: Partial<SpeechControllerOptions> = {}
  ) {
    super();
    this.synthesizer = synthesizer;
    this.player = player;
    this.options = { ...DEFAULT_SPEECH_CONTROLLER_OPTIONS, ...options };
  }

  getState(): SpeechState {
    return this.state;
  }

  /**
   * Whether a submit right now would be rejected
   */
  isBusy(): boolean {
    return this.admission !== null;
  }

  getSynthesizerName(): string {
    return this.synthesizer.name;
  }

  /**
   * Speak a request. Resolves when its cycle ends; never rejects.
   */
  async submit(request: SpeechRequest): Promise<SpeechOutcome> {
    const startTime = Date.now();

    if (this.admission) {
      console.warn("[TTS] Speech output busy, request dropped");
      this.emitEvent("busy", { text: request.text });
      return { status: "busy", error: new ControllerBusyError(), duration_ms: 0 };
    }

    const abort = new AbortController();
    const admission: PendingAdmission = { abort, done: this.admit(request, abort.signal) };
    this.admission = admission;
    let admitted: ActivePlayback | PlaybackCompletion;
    try {
      admitted = await admission.done;
    } finally {
      if (this.admission === admission) {
        this.admission = null;
      }
    }

    const completion = "finished" in admitted ? await admitted.finished : admitted;
    const duration_ms = Date.now() - startTime;

    if (completion.status === "failed") {
      const error = completion.error ?? new PlaybackError("Speech output failed");
      return { status: "failed", error, duration_ms };
    }
    return { status: completion.status, duration_ms };
  }

  /**
   * Cancel a pending admission and the active playback, and wait until both are
   * cleaned up
   */
  async stop(): Promise<void> {
    const admission = this.admission;
    if (admission) {
      admission.abort.abort();
      await admission.done;
    }
    await this.stopActive();
  }

  private async stopActive(): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    active.abort.abort();
    await active.finished;
  }

  /**
   * Supersede, synthesize and start playback. Resolves with the started playback,
   * or with the failed completion when synthesis did not produce an artifact.
   */
  private async admit(
    request: SpeechRequest,
    signal: AbortSignal
  ): Promise<ActivePlayback | PlaybackCompletion> {
    if (this.active) {
      console.log("[TTS] Superseding active playback");
      await this.stopActive();
    }
    if (signal.aborted) {
      return this.cancelAdmission(request, null);
    }

    this.setState("synthesizing");
    const artifactPath = this.createArtifactPath();

    try {
      await mkdir(this.options.scratchDir, { recursive: true });
      await this.synthesizer.synthesize(request.text, artifactPath);
    } catch (error) {
      if (signal.aborted) {
        return this.cancelAdmission(request, artifactPath);
      }
      const synthesisError = toSynthesisError(error);
      console.error(`[TTS] ${synthesisError.message}`);
      await this.removeArtifact(artifactPath);
      this.setState("idle");
      const completion: PlaybackCompletion = { status: "failed", error: synthesisError };
      this.notify(request, completion);
      return completion;
    }

    if (signal.aborted) {
      return this.cancelAdmission(request, artifactPath);
    }

    const abort = new AbortController();
    this.setState("playing");
    const playback: ActivePlayback = {
      abort,
      finished: this.runPlayback(request, artifactPath, abort),
    };
    this.active = playback;
    return playback;
  }

  private async runPlayback(
    request: SpeechRequest,
    artifactPath: string,
    abort: AbortController
  ): Promise<PlaybackCompletion> {
    this.emitEvent("playback_start", { path: artifactPath });

    const ticker = setInterval(() => {
      if (!abort.signal.aborted && !this.keepPlaying(request)) {
        console.log("[TTS] Playback stopped by caller");
        abort.abort();
      }
    }, this.options.pollIntervalMs);

    let completion: PlaybackCompletion;
    try {
      await this.player.play(artifactPath, abort.signal);
      completion = { status: abort.signal.aborted ? "cancelled" : "completed" };
    } catch (error) {
      if (abort.signal.aborted) {
        completion = { status: "cancelled" };
      } else {
        const playbackError = toPlaybackError(error);
        console.error(`[TTS] ${playbackError.message}`);
        completion = { status: "failed", error: playbackError };
      }
    } finally {
      clearInterval(ticker);
    }

    if (completion.status === "completed" && this.options.postPlaybackDelayMs > 0) {
      await sleep(this.options.postPlaybackDelayMs);
    }

    this.releasePlayer();
    await this.removeArtifact(artifactPath);

    if (this.active?.abort === abort) {
      this.active = null;
    }
    this.setState("idle");

    this.emitEvent("playback_end", { path: artifactPath, status: completion.status });
    this.notify(request, completion);
    return completion;
  }

  private async cancelAdmission(
    request: SpeechRequest,
    artifactPath: string | null
  ): Promise<PlaybackCompletion> {
    console.log("[TTS] Request cancelled before playback");
    if (artifactPath) {
      await this.removeArtifact(artifactPath);
    }
    this.setState("idle");
    const completion: PlaybackCompletion = { status: "cancelled" };
    this.notify(request, completion);
    return completion;
  }

  private keepPlaying(request: SpeechRequest): boolean {
    if (!request.keepPlaying) {
      return true;
    }
    try {
      return request.keepPlaying();
    } catch (error) {
      console.warn("[TTS] keepPlaying callback threw, stopping playback:", error);
      return false;
    }
  }

  private createArtifactPath(): string {
    const id = randomUUID().replace(/-/g, "");
    return path.join(this.options.scratchDir, `speech_${id}.${this.synthesizer.fileExtension}`);
  }

  private releasePlayer(): void {
    try {
      this.player.release?.();
    } catch (error) {
      console.warn("[TTS] Failed to release audio player:", error);
    }
  }

  private async removeArtifact(artifactPath: string): Promise<void> {
    try {
      await rm(artifactPath, { force: true });
    } catch (error) {
      console.warn(`[TTS] Failed to delete ${artifactPath}:`, error);
    }
  }

  private notify(request: SpeechRequest, completion: PlaybackCompletion): void {
    if (!request.onComplete) {
      return;
    }
    try {
      request.onComplete(completion);
    } catch (error) {
      console.warn("[TTS] onComplete callback threw:", error);
    }
  }

  private setState(next: SpeechState): void {
    if (this.state === next) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.emitEvent("state_change", { from: previous, to: next });
  }

  private emitEvent(type: SpeechEventType, data: Record<string, unknown>): void {
    const event: SpeechEvent = { type, data, timestamp: new Date() };
    this.emit(type, event);
  }
}

/**
 * Create a speech output controller
 */
export function createSpeechOutputController(
  synthesizer: SpeechSynthesizer,
  player: AudioPlayer,
  options: Partial<SpeechControllerOptions> = {}
): SpeechOutputController {
  return new SpeechOutputController(synthesizer, player, options);
}
