import { describe, expect, it, vi } from "vitest";
import {
  formatDate,
  formatTime,
  matchBuiltin,
  searchUrl,
  videoSearchUrl,
  type BuiltinContext,
} from "../../src/core/builtins.js";
import type { BatteryStatus, SystemControls } from "../../src/types.js";

function context(battery?: BatteryStatus): { ctx: BuiltinContext; spoken: string[]; ran: string[] } {
  const spoken: string[] = [];
  const ran: string[] = [];
  const system: SystemControls = {
    battery: async () => battery,
    screenshot: async () => "/tmp/screenshot.png",
    volume: vi.fn(async () => undefined),
    closeWindow: vi.fn(async () => undefined),
    shutdown: vi.fn(async () => undefined),
  };
  return {
    spoken,
    ran,
    ctx: {
      say: (text) => {
        spoken.push(text);
      },
      runner: {
        run: async (action) => {
          ran.push(action);
        },
      },
      system,
      now: () => new Date(2026, 9, 19, 15, 7),
      platform: "linux",
    },
  };
}

async function dispatch(text: string, ctx: BuiltinContext): Promise<string | undefined> {
  const hit = matchBuiltin(text);
  if (!hit) return undefined;
  await hit.command.run(ctx, hit.query);
  return hit.command.id;
}

describe("formatting", () => {
  it("formats a 12-hour clock", () => {
    expect(formatTime(new Date(2026, 9, 19, 15, 7))).toBe("03:07 PM");
    expect(formatTime(new Date(2026, 9, 19, 0, 5))).toBe("12:05 AM");
    expect(formatTime(new Date(2026, 9, 19, 12, 30))).toBe("12:30 PM");
  });

  it("formats a long date", () => {
    expect(formatDate(new Date(2026, 9, 19))).toBe("October 19, 2026");
  });

  it("encodes search queries", () => {
    expect(searchUrl("cheap flights")).toBe("https://www.google.com/search?q=cheap%20flights");
    expect(videoSearchUrl("lo-fi & jazz")).toBe(
      "https://www.youtube.com/results?search_query=lo-fi%20%26%20jazz"
    );
  });
});

describe("matchBuiltin", () => {
  it("captures the query after the phrase", () => {
    const hit = matchBuiltin("search for cheap flights");
    expect(hit?.command.id).toBe("search");
    expect(hit?.phrase).toBe("search for");
    expect(hit?.query).toBe("cheap flights");
  });

  it("leaves the query empty for commands without one", () => {
    const hit = matchBuiltin("what time is it");
    expect(hit?.command.id).toBe("time");
    expect(hit?.query).toBe("");
  });

  it("checks entries in table order", () => {
    expect(matchBuiltin("what is the date today")?.command.id).toBe("date");
    expect(matchBuiltin("turn up the volume")?.command.id).toBe("volume_up");
  });

  it("matches whole words only", () => {
    expect(matchBuiltin("open the pod bay doors")).toBeUndefined();
    expect(matchBuiltin("this is sometimes fine")).toBeUndefined();
  });
});

describe("built-in commands", () => {
  it("searches and confirms", async () => {
    const { ctx, spoken, ran } = context();
    expect(await dispatch("search for cheap flights", ctx)).toBe("search");
    expect(ran).toEqual(["https://www.google.com/search?q=cheap%20flights"]);
    expect(spoken).toEqual(["Searching for cheap flights"]);
  });

  it("asks for a query when none was given", async () => {
    const { ctx, spoken, ran } = context();
    await dispatch("search", ctx);
    expect(ran).toEqual([]);
    expect(spoken).toEqual(["What should I search for?"]);
  });

  it("plays a video search", async () => {
    const { ctx, spoken, ran } = context();
    await dispatch("play some jazz", ctx);
    expect(ran).toEqual(["https://www.youtube.com/results?search_query=some%20jazz"]);
    expect(spoken).toEqual(["Playing some jazz"]);
  });

  it("opens Chrome with the platform's program", async () => {
    const { ctx, spoken, ran } = context();
    await dispatch("open chrome", ctx);
    expect(spoken).toEqual(["Opening Chrome"]);
    expect(ran).toEqual(["google-chrome"]);
  });

  it("opens Gmail", async () => {
    const { ctx, spoken, ran } = context();
    await dispatch("write an email", ctx);
    expect(spoken).toEqual(["Opening Gmail"]);
    expect(ran).toEqual(["https://mail.google.com"]);
  });

  it("reports the battery", async () => {
    const charging = context({ percent: 80, plugged: true });
    await dispatch("battery status", charging.ctx);
    expect(charging.spoken).toEqual(["Battery is at 80 percent and plugged in"]);

    const missing = context();
    await dispatch("battery", missing.ctx);
    expect(missing.spoken).toEqual(["Battery info unavailable"]);
  });

  it("changes the volume", async () => {
    const { ctx, spoken } = context();
    await dispatch("mute", ctx);
    expect(ctx.system.volume).toHaveBeenCalledWith("mute");
    expect(spoken).toEqual(["Mute toggled"]);
  });

  it("closes the focused window", async () => {
    const { ctx, spoken } = context();
    expect(await dispatch("close this", ctx)).toBe("close_window");
    expect(ctx.system.closeWindow).toHaveBeenCalledTimes(1);
    expect(spoken).toEqual(["Window closed"]);
  });

  it("marks shutdown as needing confirmation", async () => {
    const hit = matchBuiltin("shut down the computer");
    expect(hit?.command.id).toBe("shutdown");
    expect(hit?.command.confirmation).toEqual({
      prompt: "Are you sure you want to shut down?",
      declined: "Shutdown cancelled",
    });
    expect(matchBuiltin("close window")?.command.confirmation).toBeUndefined();
  });

  it("takes a screenshot", async () => {
    const { ctx, spoken } = context();
    await dispatch("take a screenshot", ctx);
    expect(spoken).toEqual(["Taking screenshot", "Screenshot saved"]);
  });

  it("tells the time and date", async () => {
    const { ctx, spoken } = context();
    await dispatch("what time is it", ctx);
    await dispatch("what day is today", ctx);
    expect(spoken).toEqual(["The time is 03:07 PM", "Today is October 19, 2026"]);
  });

  it("greets", async () => {
    const { ctx, spoken } = context();
    await dispatch("hello there", ctx);
    expect(spoken).toEqual(["Hello! How can I help you?"]);
  });
});
