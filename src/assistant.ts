/**
 * Assistant
 *
 * Composition root: builds every capability from configuration and exposes
 * handleUtterance() to the CLI and the session loop.
 */

import path from "node:path";
import type { AssistantConfig, InputMode, IntentSegment, UtteranceReport, DispatchResult } from "./types.js";
import { IntentClassifier } from "./intent/intent-classifier.js";
import { ActionDispatcher } from "./executor/action-dispatcher.js";
import { SystemExecutor } from "./executor/system-executor.js";
import { ChatClient } from "./llm/chat-client.js";
import { Chatbot } from "./llm/chatbot.js";
import { RealtimeSearchEngine } from "./llm/realtime-search.js";
import { createSearchProvider } from "./search/search-provider.js";
import { JsonTranscriptStore } from "./session/transcript-store.js";
import { FileReminderStore } from "./session/reminder-store.js";
import { SpeechInputSource, TextInputSource } from "./session/input-source.js";
import { SessionLoop, type UtteranceHandler } from "./session/session-loop.js";
import { SoxRecorder } from "./stt/recorder.js";
import { WhisperClient } from "./stt/whisper-client.js";
import { ProcessAudioPlayer } from "./tts/audio-player.js";
import { SpeechOutputController } from "./tts/speech-output-controller.js";
import { selectSynthesizer } from "./tts/tts-factory.js";
import { commandExists, processRunner, type CommandRunner } from "./utils/process-runner.js";
import { sleep } from "./utils/retry.js";

export interface AssistantComponents {
  config: AssistantConfig;
  classifier: IntentClassifier;
  dispatcher: ActionDispatcher;

  /** Null when speech output is disabled or no synthesizer is available */
  speech: SpeechOutputController | null;
}

export interface HandleUtteranceOptions {
  signal?: AbortSignal;

  /** Overrides session.segmentPacingMs */
  pacingMs?: number;
}

/**
 * Assistant class
 */
export class Assistant implements UtteranceHandler {
  private readonly config: AssistantConfig;
  private readonly classifier: IntentClassifier;
  private readonly dispatcher: ActionDispatcher;
  private readonly speech: SpeechOutputController | null;

  constructor(components: AssistantComponents) {
    this.config = components.config;
    this.classifier = components.classifier;
    this.dispatcher = components.dispatcher;
    this.speech = components.speech;
  }

  getConfig(): AssistantConfig {
    return this.config;
  }

  getDispatcher(): ActionDispatcher {
    return this.dispatcher;
  }

  getSpeech(): SpeechOutputController | null {
    return this.speech;
  }

  classify(utterance: string): IntentSegment[] {
    return this.classifier.classify(utterance);
  }

  /**
   * Classify an utterance and run its segments in order, pausing between them.
   * Stops early on exit or when the signal aborts.
   */
  async handleUtterance(text: string, options: HandleUtteranceOptions = {}): Promise<UtteranceReport> {
    const segments = this.classifier.classify(text);
    const pacingMs = options.pacingMs ?? this.config.session.segmentPacingMs;
    const results: DispatchResult[] = [];
    let halted = false;

    for await (const result of this.dispatcher.runBatch(segments, text)) {
      results.push(result);
      if (result.outcome.kind === "halt") {
        halted = true;
        break;
      }
      if (results.length < segments.length) {
        if (options.signal?.aborted) {
          break;
        }
        if (pacingMs > 0) {
          await sleep(pacingMs);
        }
      }
    }

    return { utterance: text, segments, results, halted };
  }

  /**
   * Build a session loop over stdin (and the microphone when SoX is installed)
   */
  async createSession(
    options: { mode?: InputMode; input?: NodeJS.ReadableStream; output?: NodeJS.WritableStream } = {}
  ): Promise<SessionLoop> {
    const textInput = new TextInputSource({ input: options.input, output: options.output });
    const mode = options.mode ?? this.config.input.mode;

    let speechInput: SpeechInputSource | null = null;
    if (mode !== "text") {
      if (await commandExists("rec")) {
        speechInput = new SpeechInputSource(
          new SoxRecorder(this.config.input),
          new WhisperClient(this.config.input),
          path.join(this.config.dataDir, "recordings")
        );
      } else {
        console.warn("[Assistant] SoX `rec` not found, voice input disabled");
      }
    }

    return new SessionLoop({
      handler: this,
      textInput,
      speechInput,
      speech: this.speech,
      mode,
    });
  }

  /**
   * Stop speech output and wait for its cleanup
   */
  async shutdown(): Promise<void> {
    await this.speech?.stop();
  }
}

/**
 * Build the speech output controller, or null when speech is off or unavailable
 */
async function createSpeechOutput(
  config: AssistantConfig,
  runner: CommandRunner
): Promise<SpeechOutputController | null> {
  if (!config.speech.enabled) {
    console.log("[Assistant] Speech output disabled");
    return null;
  }

  const selection = await selectSynthesizer(config.speech);
  if (!selection) {
    console.warn("[Assistant] No speech synthesizer available, replies will only be printed");
    return null;
  }

  const player = new ProcessAudioPlayer({ playerCommand: config.speech.playerCommand, runner });
  return new SpeechOutputController(selection.synthesizer, player, {
    scratchDir: path.join(config.dataDir, "speech"),
    pollIntervalMs: config.speech.pollIntervalMs,
    postPlaybackDelayMs: config.speech.postPlaybackDelayMs,
  });
}

/**
 * Wire every capability from configuration
 */
export async function createAssistant(
  config: AssistantConfig,
  options: { runner?: CommandRunner } = {}
): Promise<Assistant> {
  const runner = options.runner ?? processRunner;
  const transcript = new JsonTranscriptStore(config.dataDir);
  const client = new ChatClient(config.chat);

  if (!client.isConfigured()) {
    console.warn("[Assistant] GROQ_API_KEY not set, conversational replies will fail");
  }

  const chatbot = new Chatbot({
    client,
    transcript,
    assistantName: config.assistantName,
    userName: config.userName,
  });
  const realtime = new RealtimeSearchEngine({
    client,
    transcript,
    search: createSearchProvider(config.search),
    assistantName: config.assistantName,
    timeZone: config.timeZone,
    maxResults: config.search.maxResults,
  });

  const speech = await createSpeechOutput(config, runner);
  const dispatcher = new ActionDispatcher({
    conversational: chatbot,
    webAugmented: realtime,
    osActions: new SystemExecutor({ runner }),
    reminders: new FileReminderStore(config.dataDir),
    speech,
  });

  return new Assistant({
    config,
    classifier: new IntentClassifier(),
    dispatcher,
    speech,
  });
}
