export type InputMode = "keyboard" | "voice";

export interface Config {
  wakeToken: string;
  commandsFile: string;
  interactionLogFile: string;
  logFile: string | undefined;
  inputMode: InputMode;
  whisperUrl: string;
  speechEnabled: boolean;
  debug: boolean;
  minTriggerLength: number;
  minTriggerWords: number;
  listenTimeoutMs: number;
  phraseTimeLimitMs: number;
  pauseThresholdMs: number;
  energyThreshold: number;
  similarityThreshold: number;
  exitSimilarityThreshold: number;
}

export interface ParseResult {
  config: Config;
  utterance: string | undefined;
}

// === Commands ===

export interface MatchResult {
  trigger: string;
  action: string;
  score: number;
}

// === Collaborators ===

export type TranscriptionFailure =
  | "timeout"
  | "unintelligible"
  | "service_unavailable"
  | "closed";

export type TranscriptionResult =
  | { ok: true; text: string }
  | { ok: false; failure: TranscriptionFailure; detail: string };

export interface Transcriber {
  capture(): Promise<TranscriptionResult>;
  close?(): void;
}

export interface Speaker {
  say(text: string): void;
}

export interface ActionRunner {
  run(action: string): Promise<void>;
}

export interface BatteryStatus {
  percent: number;
  plugged: boolean;
}

export type VolumeChange = "up" | "down" | "mute";

export interface SystemControls {
  battery(): Promise<BatteryStatus | undefined>;
  screenshot(): Promise<string>;
  volume(change: VolumeChange): Promise<void>;
  closeWindow(): Promise<void>;
  shutdown(): Promise<void>;
}

// === Interaction log ===

export type InteractionRole = "user" | "assistant" | "system";

export interface InteractionRecord {
  timestamp: string;
  role: InteractionRole;
  raw: string;
  normalized: string;
}
