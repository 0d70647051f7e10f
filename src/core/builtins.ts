/**
 * Built-in commands, checked in table order after learned commands.
 *
 * Each entry lists literal phrasings matched by whole-word containment.
 * Entries that capture a query take the normalized text following the
 * phrase ("search for cheap flights" → "cheap flights").
 */

import type { ActionRunner, SystemControls } from "../types.js";
import { containsPhrase } from "./matcher.js";

export interface BuiltinContext {
  say: (text: string) => void;
  runner: ActionRunner;
  system: SystemControls;
  now: () => Date;
  platform: NodeJS.Platform;
}

/** Asked before running a command that cannot be undone. */
export interface Confirmation {
  prompt: string;
  declined: string;
}

export interface BuiltinCommand {
  id: string;
  phrases: string[];
  capturesQuery?: boolean;
  confirmation?: Confirmation;
  run: (ctx: BuiltinContext, query: string) => Promise<void>;
}

export interface BuiltinHit {
  command: BuiltinCommand;
  phrase: string;
  query: string;
}

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const CHROME_PATHS: Partial<Record<NodeJS.Platform, string>> = {
  win32: "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
  darwin: "/Applications/Google Chrome.app",
};

export function formatTime(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const suffix = date.getHours() < 12 ? "AM" : "PM";
  return `${String(hours).padStart(2, "0")}:${minutes} ${suffix}`;
}

export function formatDate(date: Date): string {
  return `${MONTHS[date.getMonth()] ?? ""} ${date.getDate()}, ${date.getFullYear()}`;
}

export function searchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
}

export function videoSearchUrl(query: string): string {
  return `https://www.youtube.com/results?search_query=${encodeURIComponent(query)}`;
}

function opener(label: string, action: string): BuiltinCommand["run"] {
  return async (ctx) => {
    ctx.say(`Opening ${label}`);
    await ctx.runner.run(action);
  };
}

export const BUILTIN_COMMANDS: readonly BuiltinCommand[] = [
  {
    id: "search",
    phrases: ["search for", "search", "google"],
    capturesQuery: true,
    run: async (ctx, query) => {
      if (!query) {
        ctx.say("What should I search for?");
        return;
      }
      await ctx.runner.run(searchUrl(query));
      ctx.say(`Searching for ${query}`);
    },
  },
  {
    id: "play",
    phrases: ["play"],
    capturesQuery: true,
    run: async (ctx, query) => {
      if (!query) {
        ctx.say("What should I play?");
        return;
      }
      await ctx.runner.run(videoSearchUrl(query));
      ctx.say(`Playing ${query}`);
    },
  },
  {
    id: "open_chrome",
    phrases: ["open chrome", "launch chrome", "start chrome"],
    run: async (ctx) => {
      ctx.say("Opening Chrome");
      await ctx.runner.run(CHROME_PATHS[ctx.platform] ?? "google-chrome");
    },
  },
  {
    id: "open_spotify",
    phrases: ["open spotify", "launch spotify", "start spotify"],
    run: opener("Spotify", "https://open.spotify.com"),
  },
  {
    id: "open_gmail",
    phrases: ["open gmail", "open email", "open my email", "write email", "write an email"],
    run: opener("Gmail", "https://mail.google.com"),
  },
  {
    id: "battery",
    phrases: ["battery"],
    run: async (ctx) => {
      const status = await ctx.system.battery();
      if (!status) {
        ctx.say("Battery info unavailable");
        return;
      }
      const plugged = status.plugged ? "plugged in" : "not plugged in";
      ctx.say(`Battery is at ${status.percent} percent and ${plugged}`);
    },
  },
  {
    id: "screenshot",
    phrases: ["screenshot", "screen shot"],
    run: async (ctx) => {
      ctx.say("Taking screenshot");
      await ctx.system.screenshot();
      ctx.say("Screenshot saved");
    },
  },
  {
    id: "volume_up",
    phrases: ["volume up", "increase volume", "turn up the volume"],
    run: async (ctx) => {
      await ctx.system.volume("up");
      ctx.say("Volume increased");
    },
  },
  {
    id: "volume_down",
    phrases: ["volume down", "decrease volume", "turn down the volume"],
    run: async (ctx) => {
      await ctx.system.volume("down");
      ctx.say("Volume decreased");
    },
  },
  {
    id: "mute",
    phrases: ["mute", "unmute"],
    run: async (ctx) => {
      await ctx.system.volume("mute");
      ctx.say("Mute toggled");
    },
  },
  {
    id: "close_window",
    phrases: ["close window", "close this"],
    run: async (ctx) => {
      await ctx.system.closeWindow();
      ctx.say("Window closed");
    },
  },
  {
    id: "shutdown",
    phrases: ["shutdown", "shut down"],
    confirmation: {
      prompt: "Are you sure you want to shut down?",
      declined: "Shutdown cancelled",
    },
    run: async (ctx) => {
      ctx.say("Shutting down the computer");
      await ctx.system.shutdown();
    },
  },
  {
    id: "time",
    phrases: ["time"],
    run: async (ctx) => {
      ctx.say(`The time is ${formatTime(ctx.now())}`);
    },
  },
  {
    id: "date",
    phrases: ["date", "today"],
    run: async (ctx) => {
      ctx.say(`Today is ${formatDate(ctx.now())}`);
    },
  },
  {
    id: "greeting",
    phrases: ["hello", "hi", "hey"],
    run: async (ctx) => {
      ctx.say("Hello! How can I help you?");
    },
  },
];

function trailingText(text: string, phrase: string): string {
  const padded = ` ${text} `;
  const marker = ` ${phrase} `;
  const index = padded.indexOf(marker);
  return padded.slice(index + marker.length).trim();
}

export function matchBuiltin(
  text: string,
  table: readonly BuiltinCommand[] = BUILTIN_COMMANDS
): BuiltinHit | undefined {
  for (const command of table) {
    const phrase = command.phrases.find((candidate) => containsPhrase(text, candidate));
    if (phrase === undefined) continue;

    return {
      command,
      phrase,
      query: command.capturesQuery ? trailingText(text, phrase) : "",
    };
  }
  return undefined;
}
