/**
 * Capabilities the dispatcher depends on. Concrete implementations live in
 * llm/, executor/ and session/; tests substitute fakes.
 */

import type { SpeechOutcome, SpeechRequest } from "../tts/types.js";

/**
 * Produces a reply to a free-form query. Throws ServiceError.
 */
export interface ConversationalReply {
  reply(query: string): Promise<string>;
}

/**
 * Produces a reply grounded in fresh web results. Throws ServiceError.
 */
export type WebAugmentedReply = ConversationalReply;

/**
 * Host operating system actions. Each resolves true when the action was issued.
 */
export interface OsActions {
  /** Open an application, file or URL-like target */
  open(target: string): Promise<boolean>;

  /** Close an application */
  close(target: string): Promise<boolean>;

  /** Open a URL in the default browser */
  openUrl(url: string): Promise<boolean>;

  /** Run a recognized system command (volume, mute); false when unsupported */
  runSystemCommand(command: string): Promise<boolean>;
}

/**
 * Persisted reminder list. Throws ReminderStorageError.
 */
export interface ReminderStore {
  append(text: string): Promise<void>;
}

/**
 * Spoken output, implemented by the speech output controller
 */
export interface SpeechOutput {
  submit(request: SpeechRequest): Promise<SpeechOutcome>;
}
