import readline, { type Interface as ReadlineInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { setTimeout as sleep } from "node:timers/promises";
import type { Transcriber, TranscriptionResult } from "../types.js";

export interface KeyboardTranscriberOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** 0 waits forever. */
  timeoutMs?: number;
  prompt?: string;
}

const CLOSED: TranscriptionResult = { ok: false, failure: "closed", detail: "Input closed" };

/**
 * Typed input standing in for the microphone. Each line is one utterance;
 * end of input (Ctrl+D or a closed pipe) reports "closed".
 *
 * Lines are read through the interface's async iterator so piped input is
 * buffered rather than dropped between prompts.
 */
export class KeyboardTranscriber implements Transcriber {
  private readonly rl: ReadlineInterface;
  private readonly lines: AsyncIterator<string>;
  private readonly timeoutMs: number;
  private pending: Promise<IteratorResult<string>> | undefined;
  private closed = false;

  constructor(options: KeyboardTranscriberOptions = {}) {
    this.rl = readline.createInterface({
      input: options.input ?? stdin,
      output: options.output ?? stdout,
      terminal: false,
    });
    this.rl.setPrompt(options.prompt ?? "you> ");
    this.lines = this.rl[Symbol.asyncIterator]();
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async capture(): Promise<TranscriptionResult> {
    if (this.closed) return CLOSED;

    if (!this.pending) {
      this.rl.prompt();
      this.pending = this.lines.next();
    }

    const next = await this.waitForLine(this.pending);
    if (next === "timeout") {
      return { ok: false, failure: "timeout", detail: `No input within ${this.timeoutMs}ms` };
    }
    this.pending = undefined;

    if (next.done) {
      this.closed = true;
      return CLOSED;
    }
    const text = next.value.trim();
    if (!text) {
      return { ok: false, failure: "unintelligible", detail: "Empty line" };
    }
    return { ok: true, text };
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.rl.close();
    }
  }

  private async waitForLine(
    line: Promise<IteratorResult<string>>
  ): Promise<IteratorResult<string> | "timeout"> {
    if (this.timeoutMs <= 0) return line;

    const controller = new AbortController();
    try {
      return await Promise.race([
        line,
        sleep<"timeout">(this.timeoutMs, "timeout", { signal: controller.signal }),
      ]);
    } finally {
      controller.abort();
    }
  }
}
