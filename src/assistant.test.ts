import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Assistant } from "./assistant.js";
import { ActionDispatcher } from "./executor/action-dispatcher.js";
import { IntentClassifier } from "./intent/intent-classifier.js";
import { DEFAULT_ASSISTANT_CONFIG } from "./types.js";

function createAssistant() {
  const osActions = {
    open: vi.fn(async (_target: string) => true),
    close: vi.fn(async (_target: string) => true),
    openUrl: vi.fn(async (_url: string) => true),
    runSystemCommand: vi.fn(async (_command: string) => true),
  };
  const conversational = { reply: vi.fn(async (query: string) => `reply to ${query}`) };
  const dispatcher = new ActionDispatcher({
    conversational,
    webAugmented: { reply: vi.fn(async (query: string) => `live ${query}`) },
    osActions,
    reminders: { append: vi.fn(async () => undefined) },
    speech: null,
  });
  const assistant = new Assistant({
    config: DEFAULT_ASSISTANT_CONFIG,
    classifier: new IntentClassifier(),
    dispatcher,
    speech: null,
  });
  return { assistant, osActions, conversational };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Assistant.handleUtterance", () => {
  it("runs every segment of a batch in order", async () => {
    const { assistant, osActions } = createAssistant();

    const report = await assistant.handleUtterance("open Chrome, Firefox and Notes", { pacingMs: 0 });

    expect(report.segments).toEqual([
      { tag: "open", argument: "Chrome" },
      { tag: "open", argument: "Firefox" },
      { tag: "open", argument: "Notes" },
    ]);
    expect(report.results.map((result) => result.outcome)).toEqual([
      { kind: "success", text: "Opened Chrome" },
      { kind: "success", text: "Opened Firefox" },
      { kind: "success", text: "Opened Notes" },
    ]);
    expect(report.halted).toBe(false);
    expect(osActions.open.mock.calls.map((call) => call[0])).toEqual(["Chrome", "Firefox", "Notes"]);
  });

  it("halts on exit without side effects", async () => {
    const { assistant, conversational, osActions } = createAssistant();

    const report = await assistant.handleUtterance("goodbye");

    expect(report.halted).toBe(true);
    expect(report.results).toHaveLength(1);
    expect(conversational.reply).not.toHaveBeenCalled();
    expect(osActions.open).not.toHaveBeenCalled();
  });

  it("opens a Google search for the query", async () => {
    const { assistant, osActions } = createAssistant();

    const report = await assistant.handleUtterance("google who won the cricket match");

    expect(osActions.openUrl).toHaveBeenCalledWith("https://www.google.com/search?q=who+won+the+cricket+match");
    expect(report.results[0].outcome).toEqual({
      kind: "success",
      text: "Opened Google search for: who won the cricket match",
    });
  });

  it("pauses between segments", async () => {
    vi.useFakeTimers();
    try {
      const { assistant, osActions } = createAssistant();

      const pending = assistant.handleUtterance("close Mail and Notes", { pacingMs: 300 });
      await vi.advanceTimersByTimeAsync(0);
      expect(osActions.close).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(299);
      expect(osActions.close).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      const report = await pending;
      expect(osActions.close).toHaveBeenCalledTimes(2);
      expect(report.results).toHaveLength(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it("stops pacing once the signal aborts", async () => {
    const { assistant, osActions } = createAssistant();
    const abort = new AbortController();
    osActions.open.mockImplementation(async () => {
      abort.abort();
      return true;
    });

    const report = await assistant.handleUtterance("open A and B", { signal: abort.signal, pacingMs: 0 });

    expect(report.results).toHaveLength(1);
    expect(osActions.open).toHaveBeenCalledTimes(1);
  });
});
