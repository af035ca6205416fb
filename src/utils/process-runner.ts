/**
 * Process Runner
 *
 * Thin wrappers around child_process.spawn used by the OS executor, the speech
 * synthesizers and the recorder. Results are returned, never thrown.
 */

import { spawn } from "node:child_process";

/**
 * Result of running a command to completion
 */
export interface ProcessResult {
  /** Whether the command exited with code 0 */
  success: boolean;

  /** Whether the process could be started at all */
  started: boolean;

  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;

  /** Spawn error or timeout description */
  error?: string;

  timedOut: boolean;
  duration_ms: number;
}

export interface RunOptions {
  /** Text written to stdin, which is then closed */
  input?: string;

  /** Kill the process after this many milliseconds */
  timeout?: number;

  /** Kill the process when aborted */
  signal?: AbortSignal;
}

/**
 * Runs and launches host commands; replaced by a fake in tests
 */
export interface CommandRunner {
  /** Run a command to completion */
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;

  /** Start a detached command; resolves true once it has spawned */
  launch(command: string, args: string[]): Promise<boolean>;
}

const DEFAULT_TIMEOUT = 10000;

/**
 * Run a command to completion
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<ProcessResult> {
  const startTime = Date.now();
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return new Promise((resolve) => {
    let timedOut = false;
    let stdout = "";
    let stderr = "";

    if (options.signal?.aborted) {
      resolve({
        success: false,
        started: false,
        exitCode: null,
        signal: null,
        stdout,
        stderr,
        error: "Aborted before start",
        timedOut,
        duration_ms: 0,
      });
      return;
    }

    const child = spawn(command, args, {
      stdio: [options.input !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
    });

    const onAbort = () => {
      child.kill("SIGTERM");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
    }, timeout);

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    if (options.input !== undefined && child.stdin) {
      child.stdin.on("error", (error) => {
        stderr += `stdin: ${error.message}`;
      });
      child.stdin.end(options.input);
    }

    child.on("exit", (code, signal) => {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);

      resolve({
        success: !timedOut && code === 0,
        started: true,
        exitCode: code,
        signal,
        stdout,
        stderr,
        error: timedOut ? `${command} timed out after ${timeout}ms` : undefined,
        timedOut,
        duration_ms: Date.now() - startTime,
      });
    });

    child.on("error", (error) => {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);

      resolve({
        success: false,
        started: false,
        exitCode: null,
        signal: null,
        stdout,
        stderr,
        error: `${command}: ${error.message}`,
        timedOut,
        duration_ms: Date.now() - startTime,
      });
    });
  });
}

/**
 * Start a detached command (GUI apps) without waiting for it
 */
export function launchDetached(command: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { detached: true, stdio: "ignore" });

    child.once("spawn", () => {
      child.unref();
      resolve(true);
    });

    child.once("error", (error) => {
      console.warn(`[Process] Failed to launch ${command}: ${error.message}`);
      resolve(false);
    });
  });
}

/**
 * Check whether an executable is on the PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  const finder = process.platform === "win32" ? "where" : "which";
  const result = await runProcess(finder, [command], { timeout: 5000 });
  return result.success;
}

/**
 * Default runner backed by real processes
 */
export const processRunner: CommandRunner = {
  run: runProcess,
  launch: launchDetached,
};
