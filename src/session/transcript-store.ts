/**
 * Transcript Store
 *
 * Persists the chat transcript as a JSON array in <dataDir>/ChatLog.json. The file is
 * shared by the chatbot and the realtime search engine.
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ChatMessage } from "../types.js";
import { AssistantError, AssistantErrorCode } from "../utils/error-handler.js";
import { isRecord } from "../utils/json.js";

export const TRANSCRIPT_FILE_NAME = "ChatLog.json";

/**
 * Loads and saves the chat transcript
 */
export interface TranscriptStore {
  /** Never throws; unreadable transcripts load as empty */
  load(): Promise<ChatMessage[]>;

  /** Throws AssistantError (TRANSCRIPT_IO_FAILED) */
  save(messages: ChatMessage[]): Promise<void>;
}

const ROLES: ReadonlyArray<ChatMessage["role"]> = ["system", "user", "assistant"];

/**
 * Narrow one parsed transcript entry
 */
export function toChatMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const role = ROLES.find((candidate) => candidate === value.role);
  if (!role || typeof value.content !== "string") {
    return null;
  }
  return { role, content: value.content };
}

export class JsonTranscriptStore implements TranscriptStore {
  private readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, TRANSCRIPT_FILE_NAME);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<ChatMessage[]> {
    try {
      if (!existsSync(this.filePath)) {
        await this.save([]);
        return [];
      }

      const content = await readFile(this.filePath, "utf-8");
      if (!content.trim()) {
        await this.save([]);
        return [];
      }

      const parsed: unknown = JSON.parse(content);
      if (!Array.isArray(parsed)) {
        console.warn(`[Transcript] ${this.filePath} is not a JSON array, starting empty`);
        return [];
      }

      const messages: ChatMessage[] = [];
      for (const entry of parsed) {
        const message = toChatMessage(entry);
        if (message) {
          messages.push(message);
        } else {
          console.warn("[Transcript] Skipping invalid entry:", JSON.stringify(entry));
        }
      }
      return messages;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Transcript] Error loading chat history: ${message}`);
      return [];
    }
  }

  async save(messages: ChatMessage[]): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(messages, null, 4), "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AssistantError(
        AssistantErrorCode.TRANSCRIPT_IO_FAILED,
        `Failed to save chat history: ${message}`,
        { cause: error }
      );
    }
  }
}

/**
 * Create a transcript store rooted at a data directory
 */
export function createTranscriptStore(dataDir: string): JsonTranscriptStore {
  return new JsonTranscriptStore(dataDir);
}
