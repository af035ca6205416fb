/**
 * System Executor
 *
 * Best-effort host actions: open apps and URLs, close apps, volume control. A true
 * result means the command was issued, not that it had the intended effect.
 */

import type { OsActions } from "./capabilities.js";
import { googleSearchUrl } from "./search-urls.js";
import { processRunner, type CommandRunner } from "../utils/process-runner.js";

/**
 * Recognized system commands
 */
export const SYSTEM_COMMANDS = ["volume up", "volume down", "mute", "unmute"] as const;

export type SystemCommand = (typeof SYSTEM_COMMANDS)[number];

/**
 * Spoken app names -> macOS application names
 */
const MAC_APP_NAMES: Record<string, string> = {
  chrome: "Google Chrome",
  "google chrome": "Google Chrome",
  vscode: "Visual Studio Code",
  "vs code": "Visual Studio Code",
  code: "Visual Studio Code",
  settings: "System Settings",
  "system preferences": "System Settings",
  word: "Microsoft Word",
  excel: "Microsoft Excel",
  teams: "Microsoft Teams",
  iterm: "iTerm",
};

/**
 * Spoken app names -> Linux executables
 */
const LINUX_EXECUTABLES: Record<string, string> = {
  chrome: "google-chrome",
  "google chrome": "google-chrome",
  vscode: "code",
  "vs code": "code",
  "visual studio code": "code",
  files: "nautilus",
  "file manager": "nautilus",
  terminal: "gnome-terminal",
  calculator: "gnome-calculator",
  settings: "gnome-control-center",
  notes: "gnome-text-editor",
};

/**
 * Spoken app names -> Windows image names
 */
const WINDOWS_IMAGES: Record<string, string> = {
  chrome: "chrome.exe",
  "google chrome": "chrome.exe",
  edge: "msedge.exe",
  vscode: "Code.exe",
  "vs code": "Code.exe",
  word: "WINWORD.EXE",
  excel: "EXCEL.EXE",
  notes: "notepad.exe",
  "file explorer": "explorer.exe",
};

// Trailing sentence punctuation from dictation
const TRAILING_PUNCTUATION = /[.?!]+$/;

function stripTrailingPunctuation(target: string): string {
  return target.trim().replace(TRAILING_PUNCTUATION, "");
}

/**
 * Whether a target should open in the browser
 */
export function isUrlLike(target: string): boolean {
  const cleaned = stripTrailingPunctuation(target).toLowerCase();
  return (
    cleaned.startsWith("http://") ||
    cleaned.startsWith("https://") ||
    cleaned.includes(".") ||
    cleaned.includes("www")
  );
}

/**
 * URL for a URL-like target, https:// added when missing
 */
export function toUrl(target: string): string {
  const cleaned = stripTrailingPunctuation(target);
  return /^https?:\/\//i.test(cleaned) ? cleaned : `https://${cleaned}`;
}

/**
 * Match a spoken command against the recognized set
 */
export function parseSystemCommand(command: string): SystemCommand | null {
  const normalized = stripTrailingPunctuation(command).toLowerCase().replace(/\s+/g, " ");
  return SYSTEM_COMMANDS.find((candidate) => candidate === normalized) ?? null;
}

function escapeAppleScript(value: string): string {
  return value.replace(/["\\]/g, "\\$&");
}

function lookup(table: Record<string, string>, name: string): string | undefined {
  return table[name.toLowerCase()];
}

export function macAppName(name: string): string {
  return lookup(MAC_APP_NAMES, name) ?? name;
}

export function linuxExecutable(name: string): string {
  return lookup(LINUX_EXECUTABLES, name) ?? name.toLowerCase().replace(/\s+/g, "-");
}

export function windowsImageName(name: string): string {
  const image = lookup(WINDOWS_IMAGES, name) ?? name.replace(/\s+/g, "");
  return image.toLowerCase().endsWith(".exe") ? image : `${image}.exe`;
}

const MAC_VOLUME_SCRIPTS: Record<SystemCommand, string> = {
  "volume up": "set volume output volume ((output volume of (get volume settings)) + 10)",
  "volume down": "set volume output volume ((output volume of (get volume settings)) - 10)",
  mute: "set volume with output muted",
  unmute: "set volume without output muted",
};

const PACTL_ARGS: Record<SystemCommand, string[]> = {
  "volume up": ["set-sink-volume", "@DEFAULT_SINK@", "+10%"],
  "volume down": ["set-sink-volume", "@DEFAULT_SINK@", "-10%"],
  mute: ["set-sink-mute", "@DEFAULT_SINK@", "1"],
  unmute: ["set-sink-mute", "@DEFAULT_SINK@", "0"],
};

// Virtual key codes sent through WScript.Shell; mute is a toggle
const WINDOWS_VOLUME_KEYS: Record<SystemCommand, number> = {
  "volume up": 175,
  "volume down": 174,
  mute: 173,
  unmute: 173,
};

/**
 * System Executor class
 */
export class SystemExecutor implements OsActions {
  private readonly platform: NodeJS.Platform;
  private readonly runner: CommandRunner;
  private readonly timeout: number;

  constructor(options: { platform?: NodeJS.Platform; runner?: CommandRunner; timeout?: number } = {}) {
    this.platform = options.platform ?? process.platform;
    this.runner = options.runner ?? processRunner;
    this.timeout = options.timeout ?? 10000;
  }

  async open(target: string): Promise<boolean> {
    const cleaned = target.trim();
    console.log(`[System] open -> ${cleaned}`);

    if (isUrlLike(cleaned)) {
      return this.openUrl(toUrl(cleaned));
    }

    if (await this.launchApp(cleaned)) {
      return true;
    }

    console.warn(`[System] Could not launch ${cleaned}, searching the web instead`);
    return this.openUrl(googleSearchUrl(cleaned));
  }

  async close(target: string): Promise<boolean> {
    const name = stripTrailingPunctuation(target);
    console.log(`[System] close -> ${name}`);

    switch (this.platform) {
      case "darwin": {
        const script = `tell application "${escapeAppleScript(macAppName(name))}" to quit`;
        return this.issue("osascript", ["-e", script]);
      }
      case "win32":
        return this.issue("taskkill", ["/F", "/IM", windowsImageName(name)]);
      default:
        return this.issue("pkill", ["-f", linuxExecutable(name)]);
    }
  }

  async openUrl(url: string): Promise<boolean> {
    console.log(`[System] browse -> ${url}`);
    switch (this.platform) {
      case "darwin":
        return this.runner.launch("open", [url]);
      case "win32":
        return this.runner.launch("cmd", ["/c", "start", "", url]);
      default:
        return this.runner.launch("xdg-open", [url]);
    }
  }

  async runSystemCommand(command: string): Promise<boolean> {
    const parsed = parseSystemCommand(command);
    if (!parsed) {
      console.warn(`[System] Unsupported system command: ${command}`);
      return false;
    }

    switch (this.platform) {
      case "darwin":
        return this.issue("osascript", ["-e", MAC_VOLUME_SCRIPTS[parsed]]);
      case "win32":
        return this.issue("powershell", [
          "-NoProfile",
          "-Command",
          `(New-Object -ComObject WScript.Shell).SendKeys([char]${WINDOWS_VOLUME_KEYS[parsed]})`,
        ]);
      default:
        return this.issue("pactl", PACTL_ARGS[parsed]);
    }
  }

  private async launchApp(name: string): Promise<boolean> {
    switch (this.platform) {
      case "darwin": {
        // open -a exits non-zero when the application does not exist
        const result = await this.runner.run("open", ["-a", macAppName(name)], { timeout: this.timeout });
        return result.success;
      }
      case "win32":
        return this.runner.launch("cmd", ["/c", "start", "", name]);
      default:
        return this.runner.launch(linuxExecutable(name), []);
    }
  }

  /**
   * Run a command; true when it could be started
   */
  private async issue(command: string, args: string[]): Promise<boolean> {
    const result = await this.runner.run(command, args, { timeout: this.timeout });
    if (!result.started) {
      console.warn(`[System] ${result.error ?? `${command} could not be started`}`);
      return false;
    }
    if (!result.success) {
      console.warn(`[System] ${command} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return true;
  }
}

export function createSystemExecutor(
  options: { platform?: NodeJS.Platform; runner?: CommandRunner; timeout?: number } = {}
): SystemExecutor {
  return new SystemExecutor(options);
}
