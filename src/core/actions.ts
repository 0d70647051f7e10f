import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { spawn } from "node:child_process";
import { EXECUTABLE_EXTENSIONS } from "../config/constants.js";
import type { ActionRunner } from "../types.js";
import { describeError } from "../ui/logger.js";
import { ExecutionError } from "./errors.js";

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export function isUrl(action: string): boolean {
  return URL_SCHEME.test(action.trim());
}

function hasExecutableExtension(action: string): boolean {
  const lower = action.toLowerCase();
  return EXECUTABLE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

/**
 * An action has to look like something runnable: a path, an executable
 * name, or a URL.
 */
export function isActionShaped(action: string): boolean {
  const text = action.trim();
  if (!text) return false;
  return (
    text.includes("/") ||
    text.includes("\\") ||
    hasExecutableExtension(text) ||
    isUrl(text)
  );
}

export type Launcher = (command: string, args: string[]) => Promise<void>;

/** Spawn a detached process and resolve once it has started. */
export const launchDetached: Launcher = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.once("error", (error) => {
      reject(
        new ExecutionError(`Could not run ${command}: ${describeError(error)}`, {
          cause: error,
        })
      );
    });
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });

export interface SystemActionRunnerOptions {
  platform?: NodeJS.Platform;
  launcher?: Launcher;
  exists?: (filePath: string) => boolean;
}

function openerFor(platform: NodeJS.Platform, target: string): [string, string[]] {
  if (platform === "darwin") return ["open", [target]];
  if (platform === "win32") return ["cmd", ["/c", "start", "", target]];
  return ["xdg-open", [target]];
}

/**
 * Runs learned and built-in actions: URLs and documents go through the
 * platform opener, executables are spawned directly.
 */
export function createSystemActionRunner(
  options: SystemActionRunnerOptions = {}
): ActionRunner {
  const platform = options.platform ?? process.platform;
  const launcher = options.launcher ?? launchDetached;
  const exists = options.exists ?? fs.existsSync;

  return {
    async run(action: string): Promise<void> {
      const target = action.trim();
      if (!target) {
        throw new ExecutionError("Nothing to run.");
      }

      if (isUrl(target)) {
        const [command, args] = openerFor(platform, target);
        await launcher(command, args);
        return;
      }

      const looksLikePath = target.includes("/") || target.includes("\\");
      if (looksLikePath && !exists(target)) {
        throw new ExecutionError(`Path not found: ${target}`);
      }

      const isProgram =
        hasExecutableExtension(target) || (!looksLikePath && !path.extname(target));
      if (isProgram && platform !== "darwin") {
        await launcher(target, []);
        return;
      }

      const [command, args] = openerFor(platform, target);
      await launcher(command, args);
    },
  };
}
