/**
 * Session Loop
 *
 * Reads one utterance per cycle from the active input source and hands it to the
 * assistant. Ends on the exit intent, end of typed input, or an aborted signal.
 */

import { EventEmitter } from "node:events";
import { INPUT_MODES, type InputMode, type UtteranceReport } from "../types.js";
import type { UtteranceSource } from "./input-source.js";

/**
 * Processes one utterance; implemented by Assistant
 */
export interface UtteranceHandler {
  handleUtterance(text: string, options?: { signal?: AbortSignal }): Promise<UtteranceReport>;
}

export interface StoppableSpeech {
  stop(): Promise<void>;
}

export interface SessionLoopOptions {
  handler: UtteranceHandler;

  /** Typed input; the loop owns it and closes it on exit */
  textInput: UtteranceSource;

  /** Spoken input; the loop owns it and closes it on exit */
  speechInput?: UtteranceSource | null;

  /** Stopped when the loop ends */
  speech?: StoppableSpeech | null;

  mode?: InputMode;
}

export type SessionEndReason = "halt" | "end-of-input" | "interrupted";

export interface SessionSummary {
  utterances: number;
  segments: number;
  failures: number;
  reason: SessionEndReason;
}

export type SessionEventType = "mode_change" | "utterance_start" | "utterance_complete" | "utterance_error";

export interface SessionEvent {
  type: SessionEventType;
  data: Record<string, unknown>;
  timestamp: Date;
}

const MODE_COMMAND = /^mode\s+(\S+)$/i;

function isInputMode(value: string): value is InputMode {
  return INPUT_MODES.some((mode) => mode === value);
}

/**
 * Parse "mode <name>". Returns the requested name, or null when the text is not a
 * mode command.
 */
export function parseModeCommand(text: string): string | null {
  const match = MODE_COMMAND.exec(text.trim());
  return match ? match[1].toLowerCase().replace(/[.?!]+$/, "") : null;
}

/**
 * Session Loop class
 */
export class SessionLoop extends EventEmitter {
  private readonly handler: UtteranceHandler;
  private readonly textInput: UtteranceSource;
  private readonly speechInput: UtteranceSource | null;
  private readonly speech: StoppableSpeech | null;
  private mode: InputMode = "text";
  private running = false;

  constructor(options: SessionLoopOptions) {
    super();
    this.handler = options.handler;
    this.textInput = options.textInput;
    this.speechInput = options.speechInput ?? null;
    this.speech = options.speech ?? null;
    this.setMode(options.mode ?? "text");
  }

  getMode(): InputMode {
    return this.mode;
  }

  /**
   * Switch input mode. Voice modes degrade to text without a speech input.
   */
  setMode(mode: InputMode): InputMode {
    let next = mode;
    if (mode !== "text" && !this.speechInput) {
      console.warn(`[Session] Voice input unavailable, staying in text mode`);
      next = "text";
    }

    if (next !== this.mode) {
      const previous = this.mode;
      this.mode = next;
      this.emitEvent("mode_change", { from: previous, to: next });
    }
    return this.mode;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run until halt, end of input or abort
   */
  async run(signal?: AbortSignal): Promise<SessionSummary> {
    if (this.running) {
      throw new Error("Session loop is already running");
    }
    this.running = true;

    const summary: SessionSummary = { utterances: 0, segments: 0, failures: 0, reason: "end-of-input" };
    console.log(`[Session] Started in ${this.mode} mode. Type "mode voice" or "mode text" to switch, "exit" to quit.`);

    try {
      while (true) {
        if (signal?.aborted) {
          summary.reason = "interrupted";
          break;
        }

        const utterance = await this.readNext(signal);
        if (signal?.aborted) {
          summary.reason = "interrupted";
          break;
        }
        if (utterance === null) {
          summary.reason = "end-of-input";
          break;
        }
        if (!utterance) {
          continue;
        }

        const requestedMode = parseModeCommand(utterance);
        if (requestedMode !== null) {
          this.applyModeCommand(requestedMode);
          continue;
        }

        summary.utterances++;
        this.emitEvent("utterance_start", { utterance });

        let report: UtteranceReport;
        try {
          report = await this.handler.handleUtterance(utterance, { signal });
        } catch (error) {
          summary.failures++;
          console.error("[Session] Failed to handle utterance:", error);
          this.emitEvent("utterance_error", { utterance, error });
          continue;
        }

        summary.segments += report.results.length;
        summary.failures += report.results.filter((result) => result.outcome.kind === "failure").length;
        this.emitEvent("utterance_complete", { report });

        if (report.halted) {
          summary.reason = "halt";
          break;
        }
      }
    } finally {
      await this.cleanup();
      this.running = false;
    }

    console.log(
      `[Session] Ended (${summary.reason}): ${summary.utterances} utterance(s), ${summary.segments} segment(s), ${summary.failures} failure(s)`
    );
    return summary;
  }

  /**
   * Speech first in voice modes, typed input as the fallback
   */
  private async readNext(signal?: AbortSignal): Promise<string | null> {
    if (this.mode !== "text" && this.speechInput) {
      const spoken = await this.speechInput.read(signal);
      if (spoken || signal?.aborted) {
        return spoken;
      }
    }
    return this.textInput.read(signal);
  }

  private applyModeCommand(requested: string): void {
    if (!isInputMode(requested)) {
      console.warn(`[Session] Unknown mode "${requested}". Available modes: ${INPUT_MODES.join(", ")}`);
      return;
    }
    const mode = this.setMode(requested);
    console.log(`[Session] Input mode: ${mode}`);
  }

  private async cleanup(): Promise<void> {
    for (const source of [this.speechInput, this.textInput]) {
      try {
        source?.close();
      } catch (error) {
        console.warn("[Session] Failed to close input source:", error);
      }
    }

    if (this.speech) {
      try {
        await this.speech.stop();
      } catch (error) {
        console.warn("[Session] Failed to stop speech output:", error);
      }
    }
  }

  private emitEvent(type: SessionEventType, data: Record<string, unknown>): void {
    const event: SessionEvent = { type, data, timestamp: new Date() };
    this.emit(type, event);
  }
}

export function createSessionLoop(options: SessionLoopOptions): SessionLoop {
  return new SessionLoop(options);
}
