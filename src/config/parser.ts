import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import type { InputMode, ParseResult } from "../types.js";
import {
  DEFAULT_COMMANDS_FILE,
  DEFAULT_INTERACTION_LOG,
  DEFAULT_WAKE_TOKEN,
  DEFAULT_WHISPER_URL,
  ENERGY_THRESHOLD,
  EXIT_SIMILARITY_THRESHOLD,
  LISTEN_TIMEOUT_MS,
  MIN_TRIGGER_LENGTH,
  MIN_TRIGGER_WORDS,
  PAUSE_THRESHOLD_MS,
  PHRASE_TIME_LIMIT_MS,
  SIMILARITY_THRESHOLD,
} from "./constants.js";

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function resolveFile(filePath: string): string {
  return path.isAbsolute(filePath)
    ? filePath
    : path.resolve(process.cwd(), filePath);
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function parseRatio(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed) || parsed <= 0) return defaultValue;
  return Math.min(parsed, 1);
}

function parseFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function parseInputMode(value: string): InputMode {
  const mode = value.toLowerCase();
  if (mode !== "keyboard" && mode !== "voice") {
    throw new ConfigError(
      `Unsupported input mode "${value}". Use "keyboard" or "voice".`
    );
  }
  return mode;
}

export function parseConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env
): ParseResult {
  const { values } = parseArgs({
    args: argv,
    options: {
      wake: { type: "string", default: env["WAKE_TOKEN"] ?? DEFAULT_WAKE_TOKEN },
      commands: {
        type: "string",
        default: env["COMMANDS_FILE"] ?? DEFAULT_COMMANDS_FILE,
      },
      interactions: {
        type: "string",
        default: env["INTERACTION_LOG"] ?? DEFAULT_INTERACTION_LOG,
      },
      logFile: { type: "string" },
      input: { type: "string", default: env["INPUT_MODE"] ?? "keyboard" },
      whisperUrl: {
        type: "string",
        default: env["WHISPER_URL"] ?? DEFAULT_WHISPER_URL,
      },
      speech: { type: "boolean", default: parseFlag(env["SPEECH_ENABLED"]) },
      debug: { type: "boolean", default: parseFlag(env["DEBUG"]) },
      minTriggerLength: { type: "string" },
      minTriggerWords: { type: "string" },
      listenTimeout: { type: "string" },
      phraseLimit: { type: "string" },
      pauseThreshold: { type: "string" },
      energyThreshold: { type: "string" },
      similarity: { type: "string" },
      exitSimilarity: { type: "string" },
      say: { type: "string", short: "s" },
    },
    allowPositionals: false,
  });

  const wakeToken = (values.wake ?? DEFAULT_WAKE_TOKEN).trim().toLowerCase();
  if (!wakeToken) {
    throw new ConfigError("Wake token must not be empty.");
  }

  const logFile = values.logFile ?? env["LOG_FILE"];

  return {
    config: {
      wakeToken,
      commandsFile: resolveFile(values.commands ?? DEFAULT_COMMANDS_FILE),
      interactionLogFile: resolveFile(
        values.interactions ?? DEFAULT_INTERACTION_LOG
      ),
      logFile: logFile ? resolveFile(logFile) : undefined,
      inputMode: parseInputMode(values.input ?? "keyboard"),
      whisperUrl: (values.whisperUrl ?? DEFAULT_WHISPER_URL).replace(/\/+$/, ""),
      speechEnabled: values.speech ?? false,
      debug: values.debug ?? false,
      minTriggerLength: parsePositiveInt(
        values.minTriggerLength ?? env["MIN_TRIGGER_LENGTH"],
        MIN_TRIGGER_LENGTH
      ),
      minTriggerWords: parsePositiveInt(
        values.minTriggerWords ?? env["MIN_TRIGGER_WORDS"],
        MIN_TRIGGER_WORDS
      ),
      listenTimeoutMs: parsePositiveInt(
        values.listenTimeout ?? env["LISTEN_TIMEOUT_MS"],
        LISTEN_TIMEOUT_MS
      ),
      phraseTimeLimitMs: parsePositiveInt(
        values.phraseLimit ?? env["PHRASE_TIME_LIMIT_MS"],
        PHRASE_TIME_LIMIT_MS
      ),
      pauseThresholdMs: parsePositiveInt(
        values.pauseThreshold ?? env["PAUSE_THRESHOLD_MS"],
        PAUSE_THRESHOLD_MS
      ),
      energyThreshold: parsePositiveInt(
        values.energyThreshold ?? env["ENERGY_THRESHOLD"],
        ENERGY_THRESHOLD
      ),
      similarityThreshold: parseRatio(
        values.similarity ?? env["SIMILARITY_THRESHOLD"],
        SIMILARITY_THRESHOLD
      ),
      exitSimilarityThreshold: parseRatio(
        values.exitSimilarity ?? env["EXIT_SIMILARITY_THRESHOLD"],
        EXIT_SIMILARITY_THRESHOLD
      ),
    },
    utterance: values.say,
  };
}
