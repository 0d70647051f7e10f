import process from "node:process";
import { SPINNER_FRAMES } from "../config/constants.js";
import type { Logger } from "./logger.js";

export interface Spinner {
  start: (message?: string) => void;
  stop: () => void;
}

/**
 * Status line shown while waiting on the microphone. Only drawn on a TTY
 * outside debug mode; in debug mode the status goes to the system log.
 */
export function createSpinner(debugMode: boolean, systemLog: Logger): Spinner {
  let spinnerInterval: ReturnType<typeof setInterval> | undefined;
  let spinnerIndex = 0;

  function start(message = "Listening"): void {
    if (debugMode) {
      systemLog(`[status] ${message}`);
      return;
    }
    if (!process.stdout.isTTY) return;
    stop();
    spinnerIndex = 0;
    spinnerInterval = setInterval(() => {
      const frame = SPINNER_FRAMES[spinnerIndex++ % SPINNER_FRAMES.length] ?? "";
      process.stdout.write(`\r${frame} ${message}...`);
    }, 80);
  }

  function stop(): void {
    if (spinnerInterval) {
      clearInterval(spinnerInterval);
      spinnerInterval = undefined;
      process.stdout.write("\r\u001B[K");
    }
  }

  return { start, stop };
}
