import fs from "node:fs";
import type { InteractionRecord, InteractionRole } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { describeError } from "../ui/logger.js";

export interface InteractionLog {
  record(role: InteractionRole, raw: string, normalized: string): void;
}

/**
 * Append-only JSON-lines transcript of every turn. A failed write is
 * reported once and never stops the assistant.
 */
export class JsonlInteractionLog implements InteractionLog {
  private readonly filePath: string;
  private readonly warn: Logger;
  private readonly now: () => Date;
  private warned = false;

  constructor(filePath: string, warn: Logger, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.warn = warn;
    this.now = now;
  }

  record(role: InteractionRole, raw: string, normalized: string): void {
    const entry: InteractionRecord = {
      timestamp: this.now().toISOString(),
      role,
      raw,
      normalized,
    };
    try {
      fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      if (!this.warned) {
        this.warned = true;
        this.warn(`[interactions] Could not write ${this.filePath}: ${describeError(error)}`);
      }
    }
  }
}
