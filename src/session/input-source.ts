/**
 * Utterance Sources
 *
 * Typed input via readline and spoken input via recorder + Whisper. Both resolve
 * null when they have nothing (end of input, silence, interruption).
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createInterface, type Interface } from "node:readline/promises";
import type { AudioRecorder } from "../stt/recorder.js";
import type { Transcriber } from "../stt/whisper-client.js";

export interface UtteranceSource {
  /** Next utterance, or null when there is none */
  read(signal?: AbortSignal): Promise<string | null>;

  close(): void;
}

const QUESTION_START =
  /^(?:what's|where's|how's|can you|what|which|whose|whom|who|where|when|why|how)\b/;

/**
 * Tidy a transcription: first letter capitalized, "?" after a question word,
 * "." otherwise, replacing any trailing sentence punctuation.
 */
export function normalizeSpokenQuery(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    return "";
  }

  const mark = QUESTION_START.test(trimmed.toLowerCase()) ? "?" : ".";
  const body = trimmed.replace(/[.?!]+$/, "");
  return `${body.charAt(0).toUpperCase()}${body.slice(1)}${mark}`;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Typed input from a stream (stdin by default)
 */
export class TextInputSource implements UtteranceSource {
  private readonly rl: Interface;
  private readonly prompt: string;
  private closed = false;

  constructor(
    options: { input?: NodeJS.ReadableStream; output?: NodeJS.WritableStream; prompt?: string } = {}
  ) {
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      terminal: false,
    });
    this.prompt = options.prompt ?? "You: ";
    this.rl.once("close", () => {
      this.closed = true;
    });
  }

  read(signal?: AbortSignal): Promise<string | null> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      this.rl.once("close", onClose);

      this.rl.question(this.prompt, { signal }).then(
        (answer) => {
          this.rl.off("close", onClose);
          resolve(answer.trim());
        },
        (error: unknown) => {
          this.rl.off("close", onClose);
          if (!isAbortError(error)) {
            console.warn("[Input] Failed to read typed input:", error);
          }
          resolve(null);
        }
      );
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

/**
 * Spoken input: record one utterance, transcribe it, delete the recording
 */
export class SpeechInputSource implements UtteranceSource {
  private readonly recorder: AudioRecorder;
  private readonly transcriber: Transcriber;
  private readonly scratchDir: string;

  constructor(recorder: AudioRecorder, transcriber: Transcriber, scratchDir?: string) {
    this.recorder = recorder;
    this.transcriber = transcriber;
    this.scratchDir = scratchDir ?? path.join(tmpdir(), "desk-assistant-recordings");
  }

  async read(signal?: AbortSignal): Promise<string | null> {
    const recordingPath = path.join(this.scratchDir, `recording_${randomUUID().replace(/-/g, "")}.wav`);

    try {
      await mkdir(this.scratchDir, { recursive: true });
      console.log("[Input] Listening...");
      await this.recorder.record(recordingPath, signal);
      if (signal?.aborted) {
        return null;
      }

      const audio = await readFile(recordingPath);
      const result = await this.transcriber.transcribe(audio, { signal });
      if (!result.success) {
        console.warn(`[Input] ${result.error ?? "Transcription failed"}`);
        return null;
      }

      const text = normalizeSpokenQuery(result.text);
      if (!text) {
        console.log("[Input] No speech detected");
        return null;
      }
      console.log(`[Input] Heard: ${text}`);
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Input] Speech capture failed: ${message}`);
      return null;
    } finally {
      await rm(recordingPath, { force: true });
    }
  }

  close(): void {
    // Nothing held between reads
  }
}
