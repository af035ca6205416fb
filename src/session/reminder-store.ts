/**
 * Reminder Store
 *
 * Appends one reminder per line to <dataDir>/reminders.txt.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { ReminderStore } from "../executor/capabilities.js";
import { ReminderStorageError } from "../utils/error-handler.js";

export const REMINDER_FILE_NAME = "reminders.txt";

export class FileReminderStore implements ReminderStore {
  private readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, REMINDER_FILE_NAME);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async append(text: string): Promise<void> {
    // One line per reminder
    const line = text.replace(/\s*[\r\n]+\s*/g, " ").trim();
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${line}\n`, "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ReminderStorageError(`Failed to save reminder: ${message}`, error);
    }
  }

  /**
   * All saved reminders, oldest first; empty when the file does not exist
   */
  async list(): Promise<string[]> {
    try {
      const content = await readFile(this.filePath, "utf-8");
      return content.split("\n").filter((line) => line.trim().length > 0);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ReminderStorageError(`Failed to read reminders: ${message}`, error);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createReminderStore(dataDir: string): FileReminderStore {
  return new FileReminderStore(dataDir);
}
