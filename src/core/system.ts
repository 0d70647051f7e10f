/**
 * Platform system controls used by the built-in commands. Each call shells
 * out to the tool the platform ships with.
 */

import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BatteryStatus, SystemControls, VolumeChange } from "../types.js";
import { describeError } from "../ui/logger.js";
import { ExecutionError } from "./errors.js";

const execFileAsync = promisify(execFile);

export type CommandExecutor = (command: string, args: string[]) => Promise<string>;

const defaultExecutor: CommandExecutor = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: 15_000 });
  return stdout;
};

// === Parsers ===

/** `pmset -g batt` → "-InternalBattery-0 (id=…)	87%; charging; …" */
export function parsePmsetBattery(output: string): BatteryStatus | undefined {
  const percent = /(\d{1,3})%/.exec(output);
  if (!percent?.[1]) return undefined;
  return {
    percent: Number.parseInt(percent[1], 10),
    plugged: output.includes("AC Power"),
  };
}

/** Contents of the sysfs battery `capacity` and `status` files. */
export function parseSysfsBattery(
  capacity: string,
  status: string
): BatteryStatus | undefined {
  const percent = Number.parseInt(capacity.trim(), 10);
  if (Number.isNaN(percent)) return undefined;
  return { percent, plugged: status.trim().toLowerCase() !== "discharging" };
}

/** "<charge> <BatteryStatus>" from Win32_Battery; status 2 means on AC. */
export function parseWindowsBattery(output: string): BatteryStatus | undefined {
  const [charge, status] = output.trim().split(/\s+/);
  const percent = Number.parseInt(charge ?? "", 10);
  if (Number.isNaN(percent)) return undefined;
  return { percent, plugged: status === "2" };
}

export function screenshotFileName(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `screenshot_${day}_${time}.png`;
}

// === Commands per platform ===

const POWERSHELL = ["-NoProfile", "-NonInteractive", "-Command"];

const WINDOWS_VOLUME_KEYS: Record<VolumeChange, number> = {
  up: 175,
  down: 174,
  mute: 173,
};

function volumeCommand(platform: NodeJS.Platform, change: VolumeChange): [string, string[]] {
  if (platform === "darwin") {
    const script =
      change === "mute"
        ? "set volume output muted not (output muted of (get volume settings))"
        : `set volume output volume ((output volume of (get volume settings)) ${change === "up" ? "+" : "-"} 6)`;
    return ["osascript", ["-e", script]];
  }
  if (platform === "win32") {
    return [
      "powershell",
      [...POWERSHELL, `(New-Object -ComObject WScript.Shell).SendKeys([char]${WINDOWS_VOLUME_KEYS[change]})`],
    ];
  }
  const level = change === "mute" ? "toggle" : change === "up" ? "5%+" : "5%-";
  return ["amixer", ["-q", "-D", "pulse", "sset", "Master", level]];
}

function screenshotCommand(platform: NodeJS.Platform, file: string): [string, string[]] {
  if (platform === "darwin") return ["screencapture", ["-x", file]];
  if (platform === "win32") {
    const script = [
      "Add-Type -AssemblyName System.Windows.Forms,System.Drawing",
      "$b=[System.Windows.Forms.Screen]::PrimaryScreen.Bounds",
      "$bmp=New-Object System.Drawing.Bitmap $b.Width,$b.Height",
      "$g=[System.Drawing.Graphics]::FromImage($bmp)",
      "$g.CopyFromScreen($b.Location,[System.Drawing.Point]::Empty,$b.Size)",
      `$bmp.Save('${file.replaceAll("'", "''")}')`,
    ].join("; ");
    return ["powershell", [...POWERSHELL, script]];
  }
  return ["gnome-screenshot", ["-f", file]];
}

function closeWindowCommand(platform: NodeJS.Platform): [string, string[]] {
  if (platform === "darwin") {
    return [
      "osascript",
      ["-e", 'tell application "System Events" to keystroke "w" using command down'],
    ];
  }
  if (platform === "win32") {
    return ["powershell", [...POWERSHELL, "(New-Object -ComObject WScript.Shell).SendKeys('%{F4}')"]];
  }
  return ["xdotool", ["key", "alt+F4"]];
}

function shutdownCommand(platform: NodeJS.Platform): [string, string[]] {
  if (platform === "darwin") {
    return ["osascript", ["-e", 'tell application "System Events" to shut down']];
  }
  if (platform === "win32") return ["shutdown", ["/s", "/t", "5"]];
  return ["systemctl", ["poweroff"]];
}

export interface PlatformSystemControlsOptions {
  platform?: NodeJS.Platform;
  exec?: CommandExecutor;
  screenshotDir?: string;
  now?: () => Date;
}

export function createPlatformSystemControls(
  options: PlatformSystemControlsOptions = {}
): SystemControls {
  const platform = options.platform ?? process.platform;
  const exec = options.exec ?? defaultExecutor;
  const screenshotDir = options.screenshotDir ?? process.cwd();
  const now = options.now ?? (() => new Date());

  async function run(command: string, args: string[]): Promise<string> {
    try {
      return await exec(command, args);
    } catch (error) {
      throw new ExecutionError(`${command} failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async function linuxBattery(): Promise<BatteryStatus | undefined> {
    const root = "/sys/class/power_supply";
    let supplies: string[];
    try {
      supplies = await fs.readdir(root);
    } catch {
      return undefined;
    }
    const battery = supplies.find((name) => name.startsWith("BAT"));
    if (!battery) return undefined;

    try {
      const [capacity, status] = await Promise.all([
        fs.readFile(path.join(root, battery, "capacity"), "utf8"),
        fs.readFile(path.join(root, battery, "status"), "utf8"),
      ]);
      return parseSysfsBattery(capacity, status);
    } catch (error) {
      throw new ExecutionError(`Could not read ${battery}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  return {
    async battery(): Promise<BatteryStatus | undefined> {
      if (platform === "darwin") {
        return parsePmsetBattery(await run("pmset", ["-g", "batt"]));
      }
      if (platform === "win32") {
        const output = await run("powershell", [
          ...POWERSHELL,
          "Get-CimInstance Win32_Battery | Select-Object -First 1 | ForEach-Object { \"$($_.EstimatedChargeRemaining) $($_.BatteryStatus)\" }",
        ]);
        return parseWindowsBattery(output);
      }
      return linuxBattery();
    },

    async screenshot(): Promise<string> {
      const file = path.join(screenshotDir, screenshotFileName(now()));
      const [command, args] = screenshotCommand(platform, file);
      await run(command, args);
      return file;
    },

    async volume(change: VolumeChange): Promise<void> {
      const [command, args] = volumeCommand(platform, change);
      await run(command, args);
    },

    async closeWindow(): Promise<void> {
      const [command, args] = closeWindowCommand(platform);
      await run(command, args);
    },

    async shutdown(): Promise<void> {
      const [command, args] = shutdownCommand(platform);
      await run(command, args);
    },
  };
}
