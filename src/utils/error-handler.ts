/**
 * Error Handler
 *
 * Error taxonomy and bookkeeping for the assistant. Segment handlers throw these
 * errors; the dispatcher records them here and turns them into failure results.
 */

import type { IntentSegment, IntentTag } from "../types.js";

/**
 * Assistant error codes
 */
export enum AssistantErrorCode {
  // Input Errors (1xx)
  STT_SERVER_UNAVAILABLE = 100,
  STT_TRANSCRIPTION_FAILED = 101,
  RECORDING_FAILED = 102,

  // Service Errors (2xx)
  SERVICE_UNAVAILABLE = 200,
  SERVICE_TIMEOUT = 201,
  SERVICE_BAD_RESPONSE = 202,
  SERVICE_NOT_CONFIGURED = 203,

  // Handler Errors (3xx)
  HANDLER_FAILED = 300,
  ACTION_NOT_ISSUED = 301,
  INVALID_ARGUMENT = 302,
  UNSUPPORTED_COMMAND = 303,

  // Storage Errors (4xx)
  REMINDER_WRITE_FAILED = 400,
  TRANSCRIPT_IO_FAILED = 401,

  // Speech Errors (5xx)
  SPEECH_BUSY = 500,
  SYNTHESIS_FAILED = 501,
  PLAYBACK_FAILED = 502,
  NO_SPEECH_PROVIDER = 503,

  // General Errors (9xx)
  UNKNOWN_ERROR = 900,
  INTERNAL_ERROR = 902,
}

/**
 * Base class for every error the assistant raises on purpose
 */
export class AssistantError extends Error {
  public readonly code: AssistantErrorCode;
  public readonly recoverable: boolean;

  constructor(
    code: AssistantErrorCode,
    message: string,
    options: { cause?: unknown; recoverable?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "AssistantError";
    this.code = code;
    this.recoverable = options.recoverable ?? isRecoverable(code);
  }
}

/**
 * A remote service (chat model, search, STT) failed or was unreachable
 */
export class ServiceError extends AssistantError {
  public readonly serviceName: string;

  constructor(
    serviceName: string,
    message: string,
    options: { code?: AssistantErrorCode; cause?: unknown } = {}
  ) {
    super(options.code ?? AssistantErrorCode.SERVICE_UNAVAILABLE, `${serviceName}: ${message}`, {
      cause: options.cause,
    });
    this.name = "ServiceError";
    this.serviceName = serviceName;
  }
}

/**
 * A segment handler failed; always downgraded to a failure result
 */
export class HandlerError extends AssistantError {
  public readonly tag: IntentTag;

  constructor(
    tag: IntentTag,
    message: string,
    options: { code?: AssistantErrorCode; cause?: unknown } = {}
  ) {
    super(options.code ?? AssistantErrorCode.HANDLER_FAILED, message, { cause: options.cause });
    this.name = "HandlerError";
    this.tag = tag;
  }
}

/**
 * Appending to the reminder file failed
 */
export class ReminderStorageError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(AssistantErrorCode.REMINDER_WRITE_FAILED, message, { cause });
    this.name = "ReminderStorageError";
  }
}

/**
 * The speech controller is admitting another request
 */
export class ControllerBusyError extends AssistantError {
  constructor() {
    super(AssistantErrorCode.SPEECH_BUSY, "Speech output is busy with another request", {
      recoverable: true,
    });
    this.name = "ControllerBusyError";
  }
}

export class SynthesisError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(AssistantErrorCode.SYNTHESIS_FAILED, message, { cause });
    this.name = "SynthesisError";
  }
}

export class PlaybackError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(AssistantErrorCode.PLAYBACK_FAILED, message, { cause });
    this.name = "PlaybackError";
  }
}

/**
 * Recorded error with metadata
 */
export interface ErrorRecord {
  code: AssistantErrorCode;
  message: string;
  segment?: IntentSegment;
  recovery?: RecoveryAction;
  recoverable: boolean;
  timestamp: Date;
}

/**
 * Recovery action suggestions
 */
export interface RecoveryAction {
  /** Type of recovery */
  type: "retry" | "modify" | "abort" | "fallback";

  /** Human-readable description */
  description: string;

  /** Suggested alternative if available */
  alternative?: string;
}

/**
 * Error statistics
 */
export interface ErrorStats {
  total: number;
  byCode: Partial<Record<AssistantErrorCode, number>>;
  byTag: Partial<Record<IntentTag, number>>;
  lastError?: Date;
}

const NON_RECOVERABLE_CODES: readonly AssistantErrorCode[] = [
  AssistantErrorCode.SERVICE_NOT_CONFIGURED,
  AssistantErrorCode.UNSUPPORTED_COMMAND,
  AssistantErrorCode.NO_SPEECH_PROVIDER,
];

/**
 * Check if an error code is recoverable
 */
export function isRecoverable(code: AssistantErrorCode): boolean {
  return !NON_RECOVERABLE_CODES.includes(code);
}

/**
 * Normalize anything thrown into an AssistantError
 */
export function toAssistantError(
  error: unknown,
  fallbackCode: AssistantErrorCode = AssistantErrorCode.UNKNOWN_ERROR
): AssistantError {
  if (error instanceof AssistantError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AssistantError(fallbackCode, message, { cause: error });
}

/**
 * Suggest recovery action based on error code
 */
export function suggestRecovery(code: AssistantErrorCode): RecoveryAction | undefined {
  switch (code) {
    case AssistantErrorCode.STT_SERVER_UNAVAILABLE:
      return {
        type: "fallback",
        description: "Start the Whisper STT server or switch to typed input",
        alternative: "mode text",
      };

    case AssistantErrorCode.RECORDING_FAILED:
      return {
        type: "fallback",
        description: "Install SoX so the rec command is available",
        alternative: "mode text",
      };

    case AssistantErrorCode.SERVICE_UNAVAILABLE:
    case AssistantErrorCode.SERVICE_TIMEOUT:
      return {
        type: "retry",
        description: "Check the network connection and try again",
      };

    case AssistantErrorCode.SERVICE_NOT_CONFIGURED:
      return {
        type: "abort",
        description: "Set the API key in the environment or the config file",
        alternative: "export GROQ_API_KEY=...",
      };

    case AssistantErrorCode.ACTION_NOT_ISSUED:
      return {
        type: "modify",
        description: "Check the application or site name",
      };

    case AssistantErrorCode.INVALID_ARGUMENT:
      return {
        type: "modify",
        description: "Say what to act on, for example \"open notes\"",
      };

    case AssistantErrorCode.UNSUPPORTED_COMMAND:
      return {
        type: "abort",
        description: "Supported system commands: volume up, volume down, mute, unmute",
      };

    case AssistantErrorCode.REMINDER_WRITE_FAILED:
      return {
        type: "abort",
        description: "Check that the data directory is writable",
      };

    case AssistantErrorCode.SPEECH_BUSY:
      return {
        type: "retry",
        description: "Wait for the current reply to finish speaking",
      };

    case AssistantErrorCode.NO_SPEECH_PROVIDER:
      return {
        type: "abort",
        description: "Install piper, run on macOS, or set OPENAI_API_KEY",
      };

    default:
      return undefined;
  }
}

/**
 * Error handler class
 */
export class ErrorHandler {
  private errorLog: ErrorRecord[] = [];
  private maxLogSize: number;

  constructor(options: { maxLogSize?: number } = {}) {
    this.maxLogSize = options.maxLogSize || 100;
  }

  /**
   * Record an error, optionally against the segment that raised it
   */
  record(error: unknown, segment?: IntentSegment): ErrorRecord {
    const assistantError = toAssistantError(error);
    const entry: ErrorRecord = {
      code: assistantError.code,
      message: assistantError.message,
      segment,
      recovery: suggestRecovery(assistantError.code),
      recoverable: assistantError.recoverable,
      timestamp: new Date(),
    };

    this.errorLog.push(entry);
    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    return entry;
  }

  /**
   * Get error statistics
   */
  getStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errorLog.length,
      byCode: {},
      byTag: {},
      lastError: this.errorLog.length > 0
        ? this.errorLog[this.errorLog.length - 1].timestamp
        : undefined,
    };

    for (const entry of this.errorLog) {
      stats.byCode[entry.code] = (stats.byCode[entry.code] ?? 0) + 1;
      if (entry.segment) {
        const tag = entry.segment.tag;
        stats.byTag[tag] = (stats.byTag[tag] ?? 0) + 1;
      }
    }

    return stats;
  }

  /**
   * Get recent errors
   */
  getRecentErrors(limit: number = 10): ErrorRecord[] {
    return this.errorLog.slice(-limit);
  }

  clearLog(): void {
    this.errorLog = [];
  }

  /**
   * Format error for display
   */
  formatError(entry: ErrorRecord): string {
    let message = `[${entry.code}] ${entry.message}`;

    if (entry.recovery) {
      message += `\n  Recovery: ${entry.recovery.description}`;
      if (entry.recovery.alternative) {
        message += `\n  Try: ${entry.recovery.alternative}`;
      }
    }

    return message;
  }
}

/**
 * Create error handler instance
 */
export function createErrorHandler(options: { maxLogSize?: number } = {}): ErrorHandler {
  return new ErrorHandler(options);
}
