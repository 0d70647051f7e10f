import process from "node:process";
import { COLOR_CODES } from "../config/constants.js";
import { colorize } from "./logger.js";

export function blankLine(debugMode: boolean): void {
  if (debugMode) {
    process.stdout.write("\n");
  }
}

export function banner(wakeToken: string, commandCount: number, inputMode: string): void {
  const line = "─".repeat(10);
  console.log(colorize(`${line} ${wakeToken.toUpperCase()} ${line}`, COLOR_CODES.system));
  console.log(
    colorize(
      `Say "${wakeToken}" to wake me. ${commandCount} learned command(s), ${inputMode} input.`,
      COLOR_CODES.system
    )
  );
}
