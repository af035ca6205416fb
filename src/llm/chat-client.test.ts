import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ChatClient, parseChatCompletion } from "./chat-client.js";
import { DEFAULT_ASSISTANT_CONFIG, type ChatSettings } from "../types.js";
import { AssistantErrorCode, ServiceError } from "../utils/error-handler.js";

const settings: ChatSettings = { ...DEFAULT_ASSISTANT_CONFIG.chat, apiKey: "test-secret" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const completionBody = {
  model: "llama-3.1-8b-instant",
  choices: [{ message: { role: "assistant", content: " Hi there </s>" } }],
  usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
};

describe("ChatClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("requires an API key", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const client = new ChatClient({ ...settings, apiKey: undefined });

    const error = await client.complete([{ role: "user", content: "hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.code).toBe(AssistantErrorCode.SERVICE_NOT_CONFIGURED);
    }
    expect(fetchMock).not.toHaveBeenCalled();
    expect(client.isConfigured()).toBe(false);
  });

  it("posts the conversation and returns the trimmed answer", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(completionBody));
    vi.stubGlobal("fetch", fetchMock);
    const client = new ChatClient(settings);

    const completion = await client.complete([{ role: "user", content: "hello" }]);

    expect(completion.text).toBe("Hi there");
    expect(completion.tokens).toEqual({ prompt: 12, completion: 3, total: 15 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.groq.com/openai/v1/chat/completions");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama-3.1-8b-instant",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.7,
      max_tokens: 1024,
      top_p: 1,
      stream: false,
    });
  });

  it("aborts the request when it times out", async () => {
    const signals: AbortSignal[] = [];
    const fetchMock = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signals.push(signal);
            signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
          }
        })
    );
    vi.stubGlobal("fetch", fetchMock);
    const client = new ChatClient({ ...settings, timeoutMs: 20 }, { maxAttempts: 1 });

    const error = await client.complete([{ role: "user", content: "hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.code).toBe(AssistantErrorCode.SERVICE_TIMEOUT);
    }
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it("retries server errors", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse(completionBody));
    vi.stubGlobal("fetch", fetchMock);
    const client = new ChatClient(settings, { initialDelayMs: 1 });

    const completion = await client.complete([{ role: "user", content: "hello" }]);

    expect(completion.text).toBe("Hi there");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const fetchMock = vi.fn(async () => new Response("bad key", { status: 401 }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new ChatClient(settings, { initialDelayMs: 1 });

    await expect(client.complete([{ role: "user", content: "hello" }])).rejects.toThrow(
      "Chat: Request failed: HTTP 401: bad key"
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed bodies as bad responses", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));
    const client = new ChatClient(settings, { initialDelayMs: 1 });

    const error = await client.complete([{ role: "user", content: "hello" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.code).toBe(AssistantErrorCode.SERVICE_BAD_RESPONSE);
      expect(error.message).toBe("Chat: Invalid response: no choices returned");
    }
  });
});

describe("parseChatCompletion", () => {
  it("treats missing content as an empty answer", () => {
    expect(parseChatCompletion({ choices: [{ message: {} }] }, "fallback-model")).toEqual({
      text: "",
      model: "fallback-model",
      tokens: undefined,
    });
  });
});
