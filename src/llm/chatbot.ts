/**
 * Chatbot
 *
 * Conversational replies backed by the chat completion client. The transcript is
 * loaded before every request and saved after every answer.
 */

import type { ChatMessage } from "../types.js";
import type { ConversationalReply } from "../executor/capabilities.js";
import type { TranscriptStore } from "../session/transcript-store.js";
import type { ChatCompleter } from "./chat-client.js";

export const EMPTY_ANSWER = "Sorry, I couldn't generate a response. Please try again.";

export interface ChatbotOptions {
  client: ChatCompleter;
  transcript: TranscriptStore;
  assistantName: string;
  userName: string;
}

/**
 * System prompt for plain conversation
 */
export function buildChatbotSystemPrompt(userName: string, assistantName: string): string {
  return [
    `Hello, I am ${userName}. You are ${assistantName}, an accurate AI assistant with real-time information.`,
    "- Answer questions concisely",
    "- Reply only in English",
    "- No unnecessary notes or training data mentions",
  ].join("\n");
}

/**
 * Drop blank lines
 */
export function cleanResponse(answer: string): string {
  return answer
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .join("\n");
}

/**
 * Load the transcript, ask, record the answer. Shared by the chatbot and the
 * realtime search engine.
 */
export async function runTranscriptTurn(
  client: ChatCompleter,
  transcript: TranscriptStore,
  systemMessages: ChatMessage[],
  query: string
): Promise<string> {
  const history = await transcript.load();
  history.push({ role: "user", content: query });

  const completion = await client.complete([...systemMessages, ...history]);
  const answer = completion.text || EMPTY_ANSWER;

  history.push({ role: "assistant", content: answer });
  try {
    await transcript.save(history);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Chat] ${message}`);
  }

  return answer;
}

export class Chatbot implements ConversationalReply {
  private readonly options: ChatbotOptions;
  private readonly systemPrompt: string;

  constructor(options: ChatbotOptions) {
    this.options = options;
    this.systemPrompt = buildChatbotSystemPrompt(options.userName, options.assistantName);
  }

  async reply(query: string): Promise<string> {
    const answer = await runTranscriptTurn(
      this.options.client,
      this.options.transcript,
      [{ role: "system", content: this.systemPrompt }],
      query
    );
    return cleanResponse(answer);
  }
}

export function createChatbot(options: ChatbotOptions): Chatbot {
  return new Chatbot(options);
}
