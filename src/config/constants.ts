export const DEFAULT_WAKE_TOKEN = "nova";
export const DEFAULT_COMMANDS_FILE = "learned_commands.json";
export const DEFAULT_INTERACTION_LOG = "nova_interactions.jsonl";
export const DEFAULT_WHISPER_URL = "http://127.0.0.1:10300";

// Recognition settings
export const MIN_TRIGGER_LENGTH = 3;
export const MIN_TRIGGER_WORDS = 2;
export const LISTEN_TIMEOUT_MS = 10_000;
export const PHRASE_TIME_LIMIT_MS = 5_000;
export const PAUSE_THRESHOLD_MS = 800;
export const ENERGY_THRESHOLD = 300;
export const SIMILARITY_THRESHOLD = 0.75;
export const EXIT_SIMILARITY_THRESHOLD = 0.8;
export const CALIBRATION_DURATION_MS = 1_000;
export const TRANSCRIBE_TIMEOUT_MS = 30_000;

export const TRIGGER_STOP_WORDS = [
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "is", "of", "to",
];

// "{wake}" is replaced with the configured wake token.
export const EXIT_PATTERNS = [
  "stop",
  "exit",
  "quit",
  "goodbye",
  "bye",
  "shut down {wake}",
  "stop {wake}",
  "{wake} stop",
  "close {wake}",
  "turn off",
];

export const LEARN_PHRASES = [
  "learn new command",
  "learning mode",
  "teach you",
  "learn something",
];

export const MAX_TRIGGER_ATTEMPTS = 2;

export const CANCEL_PHRASES = ["cancel", "never mind", "forget it"];

// A decline word wins over a confirm word: "not sure" is a no.
export const CONFIRM_PHRASES = ["yes", "sure", "ok", "okay", "go ahead", "do it"];
export const DECLINE_PHRASES = ["no", "not", "cancel", "never mind", "stop"];

export const EXECUTABLE_EXTENSIONS = [
  ".exe", ".bat", ".cmd", ".com", ".msi", ".lnk", ".app", ".sh",
];

export const MESSAGES = {
  online: "Nova is online and ready.",
  wakeAck: "Yes?",
  farewell: "Goodbye",
  interrupted: "Shutting down",
  fallback: "I don't know that yet. You can teach me by saying learn new command.",
  learnStart: "Learning mode activated. What trigger phrase should I listen for?",
  learnNoTrigger: "I didn't hear a trigger phrase.",
  learnCancelled: "Okay, I stopped learning.",
  learnRetry: "Please say another trigger phrase.",
  learnGiveUp: "Leaving learning mode.",
  learnNoAction: "I didn't hear the action.",
  notSaved: "but I could not save it, so I will forget it when I stop.",
  flushFailed: "Some learned commands could not be saved.",
  actionShape:
    "The action should be a program path or web URL. For example, C:\\Windows\\System32\\notepad.exe",
  executing: "Executing learned command",
  executionFailed: "Sorry, I couldn't execute that command.",
  serviceUnavailable: "Sorry, my speech recognition service is unavailable.",
} as const;

export const COLOR_CODES = {
  reset: "\u001B[0m",
  user: "\u001B[34m", // blue - transcribed input
  assistant: "\u001B[32m", // green - spoken replies
  match: "\u001B[33m", // yellow - matcher decisions
  system: "\u001B[36m", // cyan - status for operator
  warn: "\u001B[35m",
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";

export const SPINNER_FRAMES = [
  "⠋",
  "⠙",
  "⠹",
  "⠸",
  "⠼",
  "⠴",
  "⠦",
  "⠧",
  "⠇",
  "⠏",
];
