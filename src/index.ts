#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";

import { ConfigError, parseConfig } from "./config/parser.js";
import { MESSAGES, TRIGGER_STOP_WORDS } from "./config/constants.js";
import { closeLogFile, createLoggers, describeError, openLogFile } from "./ui/logger.js";
import { createSpinner } from "./ui/spinner.js";
import { banner, blankLine } from "./ui/output.js";
import { ConsoleSpeaker } from "./ui/speaker.js";
import { KeyboardTranscriber } from "./ui/input.js";
import { createSystemActionRunner } from "./core/actions.js";
import { createPlatformSystemControls } from "./core/system.js";
import { CommandRegistry, JsonCommandStore } from "./core/registry.js";
import { Dispatcher } from "./core/dispatcher.js";
import { runSession } from "./core/session.js";
import { DispatcherState } from "./core/turn-types.js";
import type { TriggerRules } from "./core/validator.js";
import { SoxRecorder, VoiceTranscriber, WhisperClient } from "./stt/index.js";
import { JsonlInteractionLog } from "./utils/interaction-log.js";
import type { Config, Transcriber } from "./types.js";
import type { Loggers } from "./ui/logger.js";

function createTranscriber(config: Config, loggers: Loggers): Transcriber {
  if (config.inputMode === "keyboard") {
    return new KeyboardTranscriber();
  }
  const recorder = new SoxRecorder({
    listenTimeoutMs: config.listenTimeoutMs,
    phraseTimeLimitMs: config.phraseTimeLimitMs,
    pauseThresholdMs: config.pauseThresholdMs,
    energyThreshold: config.energyThreshold,
    systemLog: loggers.systemLog,
  });
  return new VoiceTranscriber(recorder, new WhisperClient({ baseUrl: config.whisperUrl }));
}

async function main(): Promise<void> {
  const { config, utterance } = parseConfig();
  const loggers = createLoggers(config.debug);
  openLogFile(config.logFile);

  const rules: TriggerRules = {
    minLength: config.minTriggerLength,
    minWords: config.minTriggerWords,
    stopWords: TRIGGER_STOP_WORDS,
  };

  const store = new JsonCommandStore({
    filePath: config.commandsFile,
    rules,
    warn: loggers.systemWarn,
  });
  const registry = CommandRegistry.load(store, { rules });
  loggers.systemLog(`[registry] Loaded ${registry.size} command(s) from ${config.commandsFile}`);

  const speaker = new ConsoleSpeaker({
    assistantLog: loggers.assistantLog,
    systemWarn: loggers.systemWarn,
    wakeToken: config.wakeToken,
    speech: config.speechEnabled,
  });

  const dispatcher = new Dispatcher(
    {
      registry,
      speaker,
      runner: createSystemActionRunner(),
      system: createPlatformSystemControls(),
      interactions: new JsonlInteractionLog(config.interactionLogFile, loggers.systemWarn),
      systemLog: loggers.systemLog,
      systemError: loggers.systemError,
      matchLog: loggers.matchLog,
      initialState: utterance ? DispatcherState.LISTENING : DispatcherState.IDLE,
    },
    {
      wakeToken: config.wakeToken,
      similarityThreshold: config.similarityThreshold,
      exitSimilarityThreshold: config.exitSimilarityThreshold,
      triggerRules: rules,
    }
  );

  // Single-utterance mode: dispatch once and exit
  if (utterance) {
    loggers.systemLog(`[nova] Single-utterance mode: "${utterance}"`);
    const outcome = await dispatcher.handle(utterance);
    loggers.systemLog(`[nova] Outcome: ${outcome.kind}`);
    try {
      registry.flush();
    } catch (error) {
      loggers.systemError(`[nova] ${describeError(error)}`);
    }
    await speaker.drain();
    return;
  }

  const transcriber = createTranscriber(config, loggers);
  const spinner = createSpinner(config.debug, loggers.systemLog);

  const shutdown = async (): Promise<void> => {
    spinner.stop();
    dispatcher.terminate("interrupt");
    transcriber.close?.();
    await speaker.drain();
    closeLogFile();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    loggers.systemLog("\n[nova] Caught Ctrl+C. Shutting down...");
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  banner(config.wakeToken, registry.size, config.inputMode);
  blankLine(config.debug);
  dispatcher.speak(MESSAGES.online);

  await runSession({
    transcriber,
    dispatcher,
    spinner,
    ...(config.inputMode === "voice" ? { echo: loggers.userLog } : {}),
    systemLog: loggers.systemLog,
    systemWarn: loggers.systemWarn,
    onOutcome: (outcome) => loggers.systemLog(`[nova] ${outcome.kind} → ${outcome.state}`),
  });

  await speaker.drain();
  closeLogFile();
}

try {
  await main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`[nova] ${error.message}`);
  } else {
    console.error("[nova] Fatal error:", error);
  }
  process.exit(1);
}
