/**
 * desk-assistant public API
 */

export * from "./types.js";
export * from "./assistant.js";
export * from "./config/config-manager.js";

export * from "./intent/vocabulary.js";
export * from "./intent/intent-classifier.js";

export * from "./executor/capabilities.js";
export * from "./executor/search-urls.js";
export * from "./executor/system-executor.js";
export * from "./executor/action-dispatcher.js";

export * from "./llm/chat-client.js";
export * from "./llm/chatbot.js";
export * from "./llm/realtime-search.js";
export * from "./search/search-provider.js";

export * from "./session/transcript-store.js";
export * from "./session/reminder-store.js";
export * from "./session/input-source.js";
export * from "./session/session-loop.js";

export * from "./stt/recorder.js";
export * from "./stt/whisper-client.js";

export * from "./tts/types.js";
export * from "./tts/speech-output-controller.js";
export * from "./tts/piper-synthesizer.js";
export * from "./tts/macos-synthesizer.js";
export * from "./tts/openai-synthesizer.js";
export * from "./tts/audio-player.js";
export * from "./tts/tts-factory.js";

export * from "./utils/error-handler.js";
export * from "./utils/retry.js";
export * from "./utils/process-runner.js";
export * from "./utils/format.js";
export * from "./utils/json.js";
