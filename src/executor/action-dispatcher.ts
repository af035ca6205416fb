/**
 * Action Dispatcher
 *
 * Resolves each intent segment to a handler and runs it. Handler failures are caught
 * at the dispatch boundary and reported as failure results; only the exit intent
 * halts a batch. Replies are handed to the speech output without waiting for them.
 */

import { EventEmitter } from "node:events";
import type {
  DispatchOutcome,
  DispatchResult,
  IntentSegment,
  IntentTag,
} from "../types.js";
import type {
  ConversationalReply,
  OsActions,
  ReminderStore,
  SpeechOutput,
  WebAugmentedReply,
} from "./capabilities.js";
import type { SpeechOutcome } from "../tts/types.js";
import { googleSearchUrl, youtubeSearchUrl } from "./search-urls.js";
import {
  AssistantErrorCode,
  ErrorHandler,
  HandlerError,
  toAssistantError,
} from "../utils/error-handler.js";

/**
 * Handles one segment. Throwing is allowed; the dispatcher converts it to a failure.
 */
export type SegmentHandler = (
  segment: IntentSegment,
  originalUtterance: string
) => Promise<DispatchOutcome>;

/**
 * Dispatcher events
 */
export type DispatchEventType = "segment_start" | "segment_complete" | "speech_skipped";

export interface DispatchEvent {
  type: DispatchEventType;
  data: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Capabilities the dispatcher needs
 */
export interface DispatcherDependencies {
  conversational: ConversationalReply;
  webAugmented: WebAugmentedReply;
  osActions: OsActions;
  reminders: ReminderStore;

  /** Spoken output; replies are only printed when absent */
  speech?: SpeechOutput | null;

  errorHandler?: ErrorHandler;
}

function success(text: string): DispatchOutcome {
  return { kind: "success", text };
}

/**
 * Action Dispatcher class
 */
export class ActionDispatcher extends EventEmitter {
  private readonly handlers = new Map<IntentTag, SegmentHandler>();
  private readonly deps: DispatcherDependencies;
  private readonly errorHandler: ErrorHandler;

  constructor(deps: DispatcherDependencies) {
    super();
    this.deps = deps;
    this.errorHandler = deps.errorHandler ?? new ErrorHandler();

    this.handlers.set("exit", async () => ({ kind: "halt" }));
    this.handlers.set("general", (segment, utterance) =>
      this.replyWith(this.deps.conversational, segment, utterance)
    );
    this.handlers.set("realtime", (segment, utterance) =>
      this.replyWith(this.deps.webAugmented, segment, utterance)
    );
    this.handlers.set("google_search", (segment) => this.googleSearch(segment));
    this.handlers.set("youtube_search", (segment) => this.youtubeSearch(segment));
    this.handlers.set("open", (segment) => this.open(segment));
    this.handlers.set("close", (segment) => this.close(segment));
    this.handlers.set("play", (segment) => this.play(segment));
    this.handlers.set("system", (segment) => this.system(segment));
    this.handlers.set("reminder", (segment) => this.reminder(segment));
  }

  /**
   * Replace the handler for a tag
   */
  register(tag: IntentTag, handler: SegmentHandler): void {
    this.handlers.set(tag, handler);
  }

  /**
   * Remove the handler for a tag; the tag then falls back to a conversational reply
   */
  unregister(tag: IntentTag): void {
    this.handlers.delete(tag);
  }

  /**
   * Dispatch a single segment. Never throws.
   */
  async dispatch(segment: IntentSegment, originalUtterance: string): Promise<DispatchResult> {
    const startTime = Date.now();
    this.emitEvent("segment_start", { segment });

    let outcome: DispatchOutcome;
    try {
      const handler = this.handlers.get(segment.tag);
      outcome = handler
        ? await handler(segment, originalUtterance)
        : await this.replyWith(this.deps.conversational, segment, originalUtterance);
    } catch (error) {
      const entry = this.errorHandler.record(
        toAssistantError(error, AssistantErrorCode.HANDLER_FAILED),
        segment
      );
      console.error(`[Dispatcher] ${segment.tag} failed: ${this.errorHandler.formatError(entry)}`);
      outcome = { kind: "failure", reason: entry.message, code: entry.code };
    }

    const result: DispatchResult = {
      segment,
      outcome,
      duration_ms: Date.now() - startTime,
    };
    this.emitEvent("segment_complete", { result });
    return result;
  }

  /**
   * Run segments in order, one per pull. Stops after a halt.
   */
  async *runBatch(
    segments: readonly IntentSegment[],
    originalUtterance: string
  ): AsyncGenerator<DispatchResult, void, undefined> {
    const batch = [...segments];
    for (const segment of batch) {
      const result = await this.dispatch(segment, originalUtterance);
      yield result;
      if (result.outcome.kind === "halt") {
        return;
      }
    }
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  private async replyWith(
    capability: ConversationalReply,
    segment: IntentSegment,
    originalUtterance: string
  ): Promise<DispatchOutcome> {
    const query = segment.argument || originalUtterance;
    const reply = await capability.reply(query);
    this.speak(reply);
    return success(reply);
  }

  private async googleSearch(segment: IntentSegment): Promise<DispatchOutcome> {
    const query = segment.argument.trim();
    await this.openUrlOrFail(segment, googleSearchUrl(query));
    return success(query ? `Opened Google search for: ${query}` : "Opened Google");
  }

  private async youtubeSearch(segment: IntentSegment): Promise<DispatchOutcome> {
    const query = segment.argument.trim();
    await this.openUrlOrFail(segment, youtubeSearchUrl(query));
    return success(query ? `Searched YouTube: ${query}` : "Opened YouTube");
  }

  private async open(segment: IntentSegment): Promise<DispatchOutcome> {
    const target = this.requireTarget(segment);
    const issued = await this.deps.osActions.open(target);
    if (!issued) {
      throw new HandlerError(segment.tag, `Could not open ${target}`, {
        code: AssistantErrorCode.ACTION_NOT_ISSUED,
      });
    }
    return success(`Opened ${target}`);
  }

  private async close(segment: IntentSegment): Promise<DispatchOutcome> {
    const target = this.requireTarget(segment);
    const issued = await this.deps.osActions.close(target);
    if (!issued) {
      throw new HandlerError(segment.tag, `Could not close ${target}`, {
        code: AssistantErrorCode.ACTION_NOT_ISSUED,
      });
    }
    return success(`Closed ${target}`);
  }

  private async play(segment: IntentSegment): Promise<DispatchOutcome> {
    const target = this.requireTarget(segment);
    await this.openUrlOrFail(segment, youtubeSearchUrl(target));
    return success(`Playing ${target} on YouTube`);
  }

  private async system(segment: IntentSegment): Promise<DispatchOutcome> {
    const command = this.requireTarget(segment);
    const issued = await this.deps.osActions.runSystemCommand(command);
    if (!issued) {
      throw new HandlerError(segment.tag, `Unsupported system command: ${command}`, {
        code: AssistantErrorCode.UNSUPPORTED_COMMAND,
      });
    }
    const text = `Executing system command: ${command}`;
    this.speak(text);
    return success(text);
  }

  private async reminder(segment: IntentSegment): Promise<DispatchOutcome> {
    const text = this.requireTarget(segment);
    await this.deps.reminders.append(text);
    this.speak("Reminder saved.");
    return success(`Reminder saved: ${text}`);
  }

  private requireTarget(segment: IntentSegment): string {
    const target = segment.argument.trim();
    if (!target) {
      throw new HandlerError(segment.tag, `Missing argument for ${segment.tag}`, {
        code: AssistantErrorCode.INVALID_ARGUMENT,
      });
    }
    return target;
  }

  private async openUrlOrFail(segment: IntentSegment, url: string): Promise<void> {
    const issued = await this.deps.osActions.openUrl(url);
    if (!issued) {
      throw new HandlerError(segment.tag, `Could not open ${url}`, {
        code: AssistantErrorCode.ACTION_NOT_ISSUED,
      });
    }
  }

  /**
   * Fire-and-forget speech; the batch never waits for it
   */
  private speak(text: string): void {
    const speech = this.deps.speech;
    if (!speech || !text.trim()) {
      return;
    }

    void speech.submit({ text }).then(
      (outcome) => this.reportSpeech(outcome, text),
      (error: unknown) => {
        console.error("[Dispatcher] Speech output error:", error);
      }
    );
  }

  private reportSpeech(outcome: SpeechOutcome, text: string): void {
    if (outcome.status === "busy" || outcome.status === "failed") {
      console.warn(`[Dispatcher] Speech skipped (${outcome.status}): ${outcome.error.message}`);
      this.emitEvent("speech_skipped", { text, status: outcome.status });
    }
  }

  private emitEvent(type: DispatchEventType, data: Record<string, unknown>): void {
    const event: DispatchEvent = {
      type,
      data,
      timestamp: new Date(),
    };
    this.emit(type, event);
    this.emit("event", event);
  }
}

/**
 * Create an action dispatcher
 */
export function createActionDispatcher(deps: DispatcherDependencies): ActionDispatcher {
  return new ActionDispatcher(deps);
}
