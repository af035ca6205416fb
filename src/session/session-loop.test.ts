import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SessionLoop, parseModeCommand, type UtteranceHandler } from "./session-loop.js";
import type { UtteranceSource } from "./input-source.js";
import type { DispatchResult, UtteranceReport } from "../types.js";
import { AssistantErrorCode } from "../utils/error-handler.js";

class ScriptedSource implements UtteranceSource {
  readonly close = vi.fn();
  reads = 0;
  private readonly lines: Array<string | null>;

  constructor(lines: Array<string | null>) {
    this.lines = [...lines];
  }

  async read(): Promise<string | null> {
    this.reads++;
    return this.lines.length > 0 ? this.lines.shift() ?? null : null;
  }
}

function report(utterance: string, results: DispatchResult[], halted = false): UtteranceReport {
  return {
    utterance,
    segments: results.map((result) => result.segment),
    results,
    halted,
  };
}

function createHandler() {
  const handled: string[] = [];
  const handleUtterance = vi.fn(async (text: string): Promise<UtteranceReport> => {
    handled.push(text);
    if (text === "exit") {
      return report(text, [{ segment: { tag: "exit", argument: "" }, outcome: { kind: "halt" }, duration_ms: 0 }], true);
    }
    if (text === "broken") {
      throw new Error("classifier exploded");
    }
    if (text === "close Foo") {
      return report(text, [
        {
          segment: { tag: "close", argument: "Foo" },
          outcome: { kind: "failure", reason: "Could not close Foo", code: AssistantErrorCode.ACTION_NOT_ISSUED },
          duration_ms: 0,
        },
      ]);
    }
    return report(text, [
      { segment: { tag: "general", argument: text }, outcome: { kind: "success", text: "ok" }, duration_ms: 0 },
    ]);
  });
  const handler: UtteranceHandler = { handleUtterance };
  return { handler, handled, handleUtterance };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseModeCommand", () => {
  it("extracts the requested mode", () => {
    expect(parseModeCommand("Mode Voice.")).toBe("voice");
    expect(parseModeCommand("model trains")).toBeNull();
  });
});

describe("SessionLoop", () => {
  it("stops on halt and cleans up", async () => {
    const { handler, handled } = createHandler();
    const textInput = new ScriptedSource(["hello", "exit", "never read"]);
    const speech = { stop: vi.fn(async () => undefined) };
    const loop = new SessionLoop({ handler, textInput, speech });

    const summary = await loop.run();

    expect(summary).toEqual({ utterances: 2, segments: 2, failures: 0, reason: "halt" });
    expect(handled).toEqual(["hello", "exit"]);
    expect(textInput.close).toHaveBeenCalledTimes(1);
    expect(speech.stop).toHaveBeenCalledTimes(1);
  });

  it("ends at end of input and skips blank lines", async () => {
    const { handler, handled } = createHandler();
    const loop = new SessionLoop({ handler, textInput: new ScriptedSource(["", "hi"]) });

    const summary = await loop.run();

    expect(summary.reason).toBe("end-of-input");
    expect(handled).toEqual(["hi"]);
  });

  it("keeps going after a failing cycle and counts failures", async () => {
    const { handler, handled } = createHandler();
    const loop = new SessionLoop({ handler, textInput: new ScriptedSource(["broken", "close Foo", "hi"]) });

    const summary = await loop.run();

    expect(handled).toEqual(["broken", "close Foo", "hi"]);
    expect(summary).toEqual({ utterances: 3, segments: 2, failures: 2, reason: "end-of-input" });
  });

  it("switches modes without classifying the command", async () => {
    const { handler, handled } = createHandler();
    const speechInput = new ScriptedSource(["spoken words"]);
    const textInput = new ScriptedSource(["mode voice", "exit"]);
    const loop = new SessionLoop({ handler, textInput, speechInput });
    const modes: string[] = [];
    loop.on("mode_change", (event: { data: { to: string } }) => modes.push(event.data.to));

    await loop.run();

    expect(modes).toEqual(["voice"]);
    // voice first, then the typed fallback once speech yields nothing
    expect(handled).toEqual(["spoken words", "exit"]);
    expect(speechInput.close).toHaveBeenCalledTimes(1);
  });

  it("stays in text mode without speech input", async () => {
    const { handler } = createHandler();
    const loop = new SessionLoop({ handler, textInput: new ScriptedSource([]), mode: "voice" });

    expect(loop.getMode()).toBe("text");
  });

  it("ignores unknown modes", async () => {
    const { handler, handled } = createHandler();
    const loop = new SessionLoop({ handler, textInput: new ScriptedSource(["mode telepathy"]) });

    await loop.run();

    expect(loop.getMode()).toBe("text");
    expect(handled).toEqual([]);
  });

  it("reports interruption when aborted", async () => {
    const { handler, handled } = createHandler();
    const abort = new AbortController();
    abort.abort();
    const textInput = new ScriptedSource(["hello"]);
    const loop = new SessionLoop({ handler, textInput });

    const summary = await loop.run(abort.signal);

    expect(summary.reason).toBe("interrupted");
    expect(handled).toEqual([]);
    expect(textInput.reads).toBe(0);
    expect(textInput.close).toHaveBeenCalledTimes(1);
  });
});
