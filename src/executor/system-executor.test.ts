import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  SystemExecutor,
  isUrlLike,
  parseSystemCommand,
  toUrl,
  windowsImageName,
} from "./system-executor.js";
import type { ProcessResult, RunOptions } from "../utils/process-runner.js";

const OK: ProcessResult = {
  success: true,
  started: true,
  exitCode: 0,
  signal: null,
  stdout: "",
  stderr: "",
  timedOut: false,
  duration_ms: 1,
};

function createRunner() {
  return {
    run: vi.fn(async (_command: string, _args: string[], _options?: RunOptions): Promise<ProcessResult> => OK),
    launch: vi.fn(async (_command: string, _args: string[]) => true),
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("target helpers", () => {
  it("detects URL-like targets", () => {
    expect(isUrlLike("github.com.")).toBe(true);
    expect(isUrlLike("www example")).toBe(true);
    expect(isUrlLike("HTTPS://Example")).toBe(true);
    expect(isUrlLike("Notes!")).toBe(false);
  });

  it("adds https and drops dictation punctuation", () => {
    expect(toUrl("github.com.")).toBe("https://github.com");
    expect(toUrl("http://example.org")).toBe("http://example.org");
  });

  it("recognizes system commands loosely", () => {
    expect(parseSystemCommand("  Volume   Up.")).toBe("volume up");
    expect(parseSystemCommand("reboot")).toBeNull();
  });

  it("maps Windows image names", () => {
    expect(windowsImageName("chrome")).toBe("chrome.exe");
    expect(windowsImageName("spotify")).toBe("spotify.exe");
    expect(windowsImageName("Word")).toBe("WINWORD.EXE");
  });
});

describe("SystemExecutor on macOS", () => {
  it("opens apps by name", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "darwin", runner });

    expect(await executor.open("Chrome")).toBe(true);
    expect(runner.run).toHaveBeenCalledWith("open", ["-a", "Google Chrome"], { timeout: 10000 });
    expect(runner.launch).not.toHaveBeenCalled();
  });

  it("falls back to a web search when the app is missing", async () => {
    const runner = createRunner();
    runner.run.mockResolvedValue({ ...OK, success: false, exitCode: 1 });
    const executor = new SystemExecutor({ platform: "darwin", runner });

    expect(await executor.open("Nonexistent App")).toBe(true);
    expect(runner.launch).toHaveBeenCalledWith("open", [
      "https://www.google.com/search?q=Nonexistent+App",
    ]);
  });

  it("opens URL-like targets in the browser", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "darwin", runner });

    await executor.open("youtube.com");

    expect(runner.launch).toHaveBeenCalledWith("open", ["https://youtube.com"]);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it("quits apps with AppleScript", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "darwin", runner });

    expect(await executor.close("Notes")).toBe(true);
    expect(runner.run).toHaveBeenCalledWith("osascript", ["-e", 'tell application "Notes" to quit'], {
      timeout: 10000,
    });
  });

  it("mutes through AppleScript", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "darwin", runner });

    expect(await executor.runSystemCommand("mute")).toBe(true);
    expect(runner.run).toHaveBeenCalledWith("osascript", ["-e", "set volume with output muted"], {
      timeout: 10000,
    });
  });
});

describe("SystemExecutor on Linux", () => {
  it("launches executables from the alias table", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "linux", runner });

    await executor.open("VS Code");

    expect(runner.launch).toHaveBeenCalledWith("code", []);
  });

  it("closes with pkill", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "linux", runner });

    await executor.close("firefox");

    expect(runner.run).toHaveBeenCalledWith("pkill", ["-f", "firefox"], { timeout: 10000 });
  });

  it("reports a close as issued even when nothing matched", async () => {
    const runner = createRunner();
    runner.run.mockResolvedValue({ ...OK, success: false, exitCode: 1 });
    const executor = new SystemExecutor({ platform: "linux", runner });

    expect(await executor.close("firefox")).toBe(true);
  });

  it("fails when the command cannot be started", async () => {
    const runner = createRunner();
    runner.run.mockResolvedValue({ ...OK, success: false, started: false, exitCode: null, error: "pactl: spawn pactl ENOENT" });
    const executor = new SystemExecutor({ platform: "linux", runner });

    expect(await executor.runSystemCommand("volume up")).toBe(false);
    expect(runner.run).toHaveBeenCalledWith("pactl", ["set-sink-volume", "@DEFAULT_SINK@", "+10%"], {
      timeout: 10000,
    });
  });

  it("rejects unknown system commands without running anything", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "linux", runner });

    expect(await executor.runSystemCommand("shutdown")).toBe(false);
    expect(runner.run).not.toHaveBeenCalled();
  });
});

describe("SystemExecutor on Windows", () => {
  it("kills by image name", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "win32", runner });

    await executor.close("chrome");

    expect(runner.run).toHaveBeenCalledWith("taskkill", ["/F", "/IM", "chrome.exe"], { timeout: 10000 });
  });

  it("opens URLs with start", async () => {
    const runner = createRunner();
    const executor = new SystemExecutor({ platform: "win32", runner });

    await executor.openUrl("https://example.com");

    expect(runner.launch).toHaveBeenCalledWith("cmd", ["/c", "start", "", "https://example.com"]);
  });
});
