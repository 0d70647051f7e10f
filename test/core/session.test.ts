import { describe, expect, it, vi } from "vitest";
import { MESSAGES } from "../../src/config/constants.js";
import { Dispatcher } from "../../src/core/dispatcher.js";
import { CommandRegistry } from "../../src/core/registry.js";
import { runSession } from "../../src/core/session.js";
import { DispatcherState, type DispatchOutcome } from "../../src/core/turn-types.js";
import type { Transcriber, TranscriptionResult } from "../../src/types.js";

class ScriptedTranscriber implements Transcriber {
  closed = false;

  constructor(private readonly script: TranscriptionResult[]) {}

  async capture(): Promise<TranscriptionResult> {
    return this.script.shift() ?? { ok: false, failure: "closed", detail: "end of script" };
  }

  close(): void {
    this.closed = true;
  }
}

function createDispatcher(spoken: string[]): Dispatcher {
  const silent = (): void => undefined;
  return new Dispatcher({
    registry: CommandRegistry.load({ load: () => new Map(), save: () => undefined }),
    speaker: {
      say: (text) => {
        spoken.push(text);
      },
    },
    runner: { run: async () => undefined },
    system: {
      battery: async () => undefined,
      screenshot: async () => "/tmp/screenshot.png",
      volume: async () => undefined,
      closeWindow: async () => undefined,
      shutdown: async () => undefined,
    },
    interactions: { record: silent },
    systemLog: silent,
    systemError: silent,
    matchLog: silent,
  });
}

describe("runSession", () => {
  it("keeps listening through recognition failures until exit", async () => {
    const spoken: string[] = [];
    const dispatcher = createDispatcher(spoken);
    const transcriber = new ScriptedTranscriber([
      { ok: false, failure: "timeout", detail: "no speech" },
      { ok: true, text: "nova" },
      { ok: false, failure: "unintelligible", detail: "mumble" },
      { ok: false, failure: "service_unavailable", detail: "connection refused" },
      { ok: true, text: "stop" },
      { ok: true, text: "nova hello" },
    ]);
    const systemWarn = vi.fn();
    const echo = vi.fn();

    await runSession({ transcriber, dispatcher, systemLog: () => undefined, systemWarn, echo });

    expect(spoken).toEqual(["Yes?", MESSAGES.serviceUnavailable, MESSAGES.farewell]);
    expect(systemWarn).toHaveBeenCalledTimes(1);
    expect(echo.mock.calls).toEqual([["you> nova"], ["you> stop"]]);
    expect(dispatcher.state).toBe(DispatcherState.TERMINATED);
    expect(transcriber.closed).toBe(true);
  });

  it("terminates when the input closes", async () => {
    const spoken: string[] = [];
    const dispatcher = createDispatcher(spoken);
    const outcomes: DispatchOutcome[] = [];

    await runSession({
      transcriber: new ScriptedTranscriber([]),
      dispatcher,
      systemLog: () => undefined,
      systemWarn: () => undefined,
      onOutcome: (outcome) => outcomes.push(outcome),
    });

    expect(outcomes).toEqual([
      { state: DispatcherState.TERMINATED, kind: "terminated", detail: "end_of_input" },
    ]);
    expect(spoken).toEqual([MESSAGES.farewell]);
  });
});
