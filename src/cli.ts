#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { stringify as stringifyYaml } from "yaml";
import { createAssistant } from "./assistant.js";
import {
  defaultConfigPath,
  loadAssistantConfig,
  saveAssistantConfig,
} from "./config/config-manager.js";
import { classify, formatSegment } from "./intent/intent-classifier.js";
import type { SessionEvent } from "./session/session-loop.js";
import { INPUT_MODES, type AssistantConfig, type InputMode } from "./types.js";
import { formatReport, isUtteranceReport } from "./utils/format.js";
import { isRecord, readString } from "./utils/json.js";

interface RunOptions {
  mode?: string;
  config?: string;
  speech: boolean;
  once?: string;
}

interface ConfigOptions {
  config?: string;
  init?: boolean;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    return (isRecord(pkg) && readString(pkg, "version")) || "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function parseMode(value: string): InputMode {
  const mode = INPUT_MODES.find((candidate) => candidate === value.toLowerCase());
  if (!mode) {
    throw new Error(`Unknown mode "${value}". Available modes: ${INPUT_MODES.join(", ")}`);
  }
  return mode;
}

function redact(config: AssistantConfig): AssistantConfig {
  const mask = (value: string | undefined): string | undefined => (value ? "********" : undefined);
  return {
    ...config,
    chat: { ...config.chat, apiKey: mask(config.chat.apiKey) },
    search: { ...config.search, apiKey: mask(config.search.apiKey) },
    speech: { ...config.speech, openaiApiKey: mask(config.speech.openaiApiKey) },
  };
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

async function runAssistant(options: RunOptions): Promise<void> {
  const config = loadAssistantConfig({ configPath: options.config });
  if (!options.speech) {
    config.speech.enabled = false;
  }
  const mode = options.mode ? parseMode(options.mode) : config.input.mode;

  const assistant = await createAssistant(config);
  const controller = new AbortController();
  let interrupts = 0;

  const onInterrupt = (): void => {
    interrupts++;
    if (interrupts > 1) {
      process.exit(130);
    }
    console.log("\nStopping...");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    if (options.once !== undefined) {
      const report = await assistant.handleUtterance(options.once, { signal: controller.signal });
      printLines(formatReport(report, config.assistantName));
      return;
    }

    const session = await assistant.createSession({ mode });
    session.on("utterance_complete", (event: SessionEvent) => {
      const report = event.data.report;
      if (isUtteranceReport(report)) {
        printLines(formatReport(report, config.assistantName));
      }
    });
    await session.run(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
    await assistant.shutdown();
  }
}

const program = new Command();

program
  .name("desk-assistant")
  .description("Voice and text personal assistant with rule-based intent routing")
  .version(readVersion())
  .option("-m, --mode <mode>", `Input mode: ${INPUT_MODES.join(", ")}`)
  .option("-c, --config <path>", "Path to the YAML config file")
  .option("--no-speech", "Print replies without speaking them")
  .option("--once <utterance>", "Handle a single utterance and exit")
  .action(async (options: RunOptions) => {
    try {
      await runAssistant(options);
    } catch (error) {
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error("An unexpected error occurred");
      }
      process.exit(1);
    }
  });

program
  .command("classify")
  .description("Show how an utterance would be routed, without executing it")
  .argument("<utterance...>", "Utterance text")
  .action((words: string[]) => {
    const segments = classify(words.join(" "));
    printLines(segments.map(formatSegment));
  });

program
  .command("config")
  .description("Print the effective configuration")
  .option("-c, --config <path>", "Path to the YAML config file")
  .option("--init", "Write the effective configuration to the config file")
  .action((options: ConfigOptions) => {
    const config = loadAssistantConfig({ configPath: options.config });
    if (options.init) {
      const target = options.config ?? defaultConfigPath();
      if (!saveAssistantConfig(config, target)) {
        process.exit(1);
      }
      return;
    }
    process.stdout.write(stringifyYaml(redact(config)));
  });

await program.parseAsync(process.argv);
