import { spawn } from "node:child_process";
import process from "node:process";
import type { Speaker } from "../types.js";
import type { Logger } from "./logger.js";

const SPEECH_MAX_CHARS = 500;

export type SpeechCommand = (text: string) => [string, string[]] | undefined;

/** The text-to-speech program each platform ships with. */
export function platformSpeechCommand(
  platform: NodeJS.Platform = process.platform
): SpeechCommand {
  return (text) => {
    const speakable = text.slice(0, SPEECH_MAX_CHARS).trim();
    if (!speakable) return undefined;
    if (platform === "darwin") return ["say", [speakable]];
    if (platform === "win32") {
      const quoted = speakable.replaceAll("'", "''");
      return [
        "powershell",
        [
          "-NoProfile",
          "-NonInteractive",
          "-Command",
          `Add-Type -AssemblyName System.Speech; (New-Object System.Speech.Synthesis.SpeechSynthesizer).Speak('${quoted}')`,
        ],
      ];
    }
    return ["espeak", [speakable]];
  };
}

export interface ConsoleSpeakerOptions {
  assistantLog: Logger;
  systemWarn: Logger;
  wakeToken: string;
  /** Also read replies aloud. */
  speech?: boolean;
  speechCommand?: SpeechCommand;
}

/**
 * Prints every reply and, when speech is enabled, hands it to the system
 * speech program. Utterances are queued so replies never talk over each
 * other. A failing speech program is reported once and then silenced.
 */
export class ConsoleSpeaker implements Speaker {
  private readonly speechCommand: SpeechCommand | undefined;
  private queue: Promise<void> = Promise.resolve();
  private speechFailed = false;

  constructor(private readonly options: ConsoleSpeakerOptions) {
    this.speechCommand = options.speech
      ? (options.speechCommand ?? platformSpeechCommand())
      : undefined;
  }

  say(text: string): void {
    this.options.assistantLog(`${this.options.wakeToken}> ${text}`);
    const command = this.speechCommand?.(text);
    if (!command || this.speechFailed) return;

    this.queue = this.queue.then(() => this.speak(command));
  }

  /** Resolves once everything queued so far has been spoken. */
  async drain(): Promise<void> {
    await this.queue;
  }

  private speak([program, args]: [string, string[]]): Promise<void> {
    return new Promise((resolve) => {
      const child = spawn(program, args, { stdio: "ignore" });
      child.once("error", (error) => {
        if (!this.speechFailed) {
          this.speechFailed = true;
          this.options.systemWarn(`[speech] ${program} unavailable: ${error.message}`);
        }
        resolve();
      });
      child.once("exit", () => resolve());
    });
  }
}
