import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { parse } from "yaml";
import {
  applyEnvOverrides,
  loadAssistantConfig,
  resolveConfigPath,
  saveAssistantConfig,
  validateAndMergeConfig,
} from "./config-manager.js";
import { DEFAULT_ASSISTANT_CONFIG } from "../types.js";

let workDir: string;

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  workDir = mkdtempSync(path.join(tmpdir(), "config-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("resolveConfigPath", () => {
  it("prefers the explicit path", () => {
    expect(
      resolveConfigPath({ configPath: "custom.yaml", env: { ASSISTANT_CONFIG: "env.yaml" }, cwd: workDir })
    ).toBe(path.join(workDir, "custom.yaml"));
  });

  it("falls back to ASSISTANT_CONFIG and then the default file", () => {
    expect(resolveConfigPath({ env: { ASSISTANT_CONFIG: "env.yaml" }, cwd: workDir })).toBe(
      path.join(workDir, "env.yaml")
    );
    expect(resolveConfigPath({ env: {}, cwd: workDir })).toBe(
      path.join(workDir, "assistant.config.yaml")
    );
  });
});

describe("validateAndMergeConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(validateAndMergeConfig(null)).toEqual(DEFAULT_ASSISTANT_CONFIG);
  });

  it("merges valid fields over the defaults", () => {
    const config = validateAndMergeConfig({
      assistantName: "Nova",
      chat: { model: "llama-3.3-70b-versatile", temperature: 0.2 },
      input: { mode: "both" },
    });

    expect(config.assistantName).toBe("Nova");
    expect(config.chat.model).toBe("llama-3.3-70b-versatile");
    expect(config.chat.temperature).toBe(0.2);
    expect(config.chat.maxTokens).toBe(DEFAULT_ASSISTANT_CONFIG.chat.maxTokens);
    expect(config.input.mode).toBe("both");
  });

  it("drops invalid fields with a warning", () => {
    const config = validateAndMergeConfig({
      chat: { temperature: 9 },
      input: { mode: "telepathy" },
      timeZone: "Mars/Olympus",
    });

    expect(config.chat.temperature).toBe(DEFAULT_ASSISTANT_CONFIG.chat.temperature);
    expect(config.input.mode).toBe("text");
    expect(config.timeZone).toBe(DEFAULT_ASSISTANT_CONFIG.timeZone);
    expect(console.warn).toHaveBeenCalledWith("[Config] Ignoring invalid chat.temperature: 9");
    expect(console.warn).toHaveBeenCalledWith('[Config] Ignoring invalid input.mode: "telepathy"');
  });

  it("keeps only known speech providers in the fallback chain", () => {
    const config = validateAndMergeConfig({
      speech: { fallbackChain: ["openai", "festival", "openai", "macos"] },
    });

    expect(config.speech.fallbackChain).toEqual(["openai", "macos"]);
  });

  it("ignores a section that is not a mapping", () => {
    const config = validateAndMergeConfig({ search: "brave" });

    expect(config.search).toEqual(DEFAULT_ASSISTANT_CONFIG.search);
    expect(console.warn).toHaveBeenCalledWith("[Config] Ignoring invalid search section");
  });
});

describe("applyEnvOverrides", () => {
  it("lets the environment win over the file", () => {
    const base = validateAndMergeConfig({ userName: "Sam", chat: { apiKey: "file-key" } });

    const config = applyEnvOverrides(base, {
      ASSISTANT_USER_NAME: "Robin",
      GROQ_API_KEY: "test-secret",
      BRAVE_SEARCH_API_KEY: "test-brave",
      OPENAI_API_KEY: "test-openai",
      STT_SERVER_URL: "http://127.0.0.1:9000",
      ASSISTANT_TIME_ZONE: "UTC",
    });

    expect(config.userName).toBe("Robin");
    expect(config.chat.apiKey).toBe("test-secret");
    expect(config.search.apiKey).toBe("test-brave");
    expect(config.speech.openaiApiKey).toBe("test-openai");
    expect(config.input.sttServerUrl).toBe("http://127.0.0.1:9000");
    expect(config.timeZone).toBe("UTC");
  });

  it("ignores blank values", () => {
    const base = validateAndMergeConfig({ chat: { apiKey: "file-key" } });

    expect(applyEnvOverrides(base, { GROQ_API_KEY: "  " }).chat.apiKey).toBe("file-key");
  });
});

describe("loadAssistantConfig", () => {
  it("reads YAML from the resolved path", () => {
    writeFileSync(
      path.join(workDir, "assistant.config.yaml"),
      ["assistantName: Nova", "search:", "  provider: brave", "  maxResults: 5", ""].join("\n")
    );

    const config = loadAssistantConfig({ cwd: workDir, env: {} });

    expect(config.assistantName).toBe("Nova");
    expect(config.search.provider).toBe("brave");
    expect(config.search.maxResults).toBe(5);
  });

  it("uses the defaults when the file is missing", () => {
    expect(loadAssistantConfig({ cwd: workDir, env: {} })).toEqual(DEFAULT_ASSISTANT_CONFIG);
  });

  it("uses the defaults when the YAML is malformed", () => {
    writeFileSync(path.join(workDir, "broken.yaml"), "chat: [unclosed");

    const config = loadAssistantConfig({ configPath: "broken.yaml", cwd: workDir, env: {} });

    expect(config).toEqual(DEFAULT_ASSISTANT_CONFIG);
    expect(console.warn).toHaveBeenCalled();
  });
});

describe("saveAssistantConfig", () => {
  it("writes YAML without API keys", () => {
    const target = path.join(workDir, "nested", "assistant.config.yaml");
    const config = applyEnvOverrides(validateAndMergeConfig({ userName: "Sam" }), {
      GROQ_API_KEY: "test-secret",
    });

    expect(saveAssistantConfig(config, target)).toBe(true);

    const written: unknown = parse(readFileSync(target, "utf-8"));
    expect(validateAndMergeConfig(written).userName).toBe("Sam");
    expect(readFileSync(target, "utf-8")).not.toContain("test-secret");
  });
});
