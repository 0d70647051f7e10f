import fs from "node:fs";
import { COLOR_CODES, ENABLE_COLOR, type ColorCode } from "../config/constants.js";

let logStream: fs.WriteStream | undefined;

export function openLogFile(logFile: string | undefined): void {
  logStream?.end();
  if (!logFile) {
    logStream = undefined;
    return;
  }
  const stream = fs.createWriteStream(logFile, { flags: "a" });
  stream.on("error", (error) => {
    console.error(`[logger] Log file disabled: ${error.message}`);
    if (logStream === stream) logStream = undefined;
  });
  logStream = stream;
}

export function closeLogFile(): void {
  logStream?.end();
  logStream = undefined;
}

export function writeToLogFile(message: string): void {
  if (logStream) {
    const timestamp = new Date().toISOString();
    logStream.write(`[${timestamp}] ${message}\n`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function colorize(message: string, color: ColorCode | undefined): string {
  if (!ENABLE_COLOR || !color) {
    return message;
  }
  return `${color}${message}${COLOR_CODES.reset}`;
}

type ConsoleMethod = "log" | "warn" | "error";

export interface Logger {
  (message: string, ...rest: unknown[]): void;
}

export function makeLogger(
  method: ConsoleMethod,
  color: ColorCode | undefined,
  isDebugOnly: boolean,
  debugMode: boolean
): Logger {
  return (message: string, ...rest: unknown[]): void => {
    const fullMessage =
      rest.length > 0 ? `${message} ${rest.join(" ")}` : message;
    writeToLogFile(fullMessage);

    if (!isDebugOnly || debugMode) {
      if (rest.length > 0) {
        console[method](colorize(message, color), ...rest);
      } else {
        console[method](colorize(message, color));
      }
    }
  };
}

export interface Loggers {
  systemLog: Logger;
  systemWarn: Logger;
  systemError: Logger;
  matchLog: Logger;
  userLog: Logger;
  assistantLog: Logger;
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    systemLog: makeLogger("log", COLOR_CODES.system, true, debugMode),
    systemWarn: makeLogger("warn", COLOR_CODES.warn, false, debugMode),
    systemError: makeLogger("error", COLOR_CODES.error, false, debugMode),
    matchLog: makeLogger("log", COLOR_CODES.match, true, debugMode),
    userLog: makeLogger("log", COLOR_CODES.user, false, debugMode),
    assistantLog: makeLogger("log", COLOR_CODES.assistant, false, debugMode),
  };
}
