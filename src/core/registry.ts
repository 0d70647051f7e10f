/**
 * Learned commands: an in-memory trigger → action map persisted as a JSON
 * object after every change.
 *
 * The file may be edited by hand between runs. Entries that no longer make
 * sense are skipped with a warning instead of failing startup.
 */

import fs from "node:fs";
import path from "node:path";
import type { MatchResult } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { describeError } from "../ui/logger.js";
import { normalize } from "../stt/normalizer.js";
import { errorCode, StorageError } from "./errors.js";
import { bestMatch } from "./matcher.js";
import {
  assertValidTrigger,
  DEFAULT_TRIGGER_RULES,
  validateTrigger,
  type TriggerRules,
} from "./validator.js";

export type CommandMap = Map<string, string>;

export interface CommandStore {
  load(): CommandMap;
  save(commands: ReadonlyMap<string, string>): void;
}

export interface JsonCommandStoreOptions {
  filePath: string;
  rules?: TriggerRules;
  warn?: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class JsonCommandStore implements CommandStore {
  private readonly filePath: string;
  private readonly rules: TriggerRules;
  private readonly warn: Logger;

  constructor(options: JsonCommandStoreOptions) {
    this.filePath = options.filePath;
    this.rules = options.rules ?? DEFAULT_TRIGGER_RULES;
    this.warn = options.warn ?? (() => undefined);
  }

  load(): CommandMap {
    const commands: CommandMap = new Map();

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, "utf8");
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.warn(`[registry] Could not read ${this.filePath}: ${describeError(error)}`);
      }
      return commands;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      this.warn(`[registry] ${this.filePath} is corrupted, starting empty: ${describeError(error)}`);
      return commands;
    }

    if (!isPlainObject(parsed)) {
      this.warn(`[registry] ${this.filePath} must contain a JSON object, starting empty`);
      return commands;
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string" || value.trim().length === 0) {
        this.warn(`[registry] Skipping "${key}": action must be a non-empty string`);
        continue;
      }
      const trigger = normalize(key);
      const verdict = validateTrigger(trigger, this.rules);
      if (!verdict.ok) {
        this.warn(`[registry] Skipping "${key}": ${verdict.reason}`);
        continue;
      }
      commands.set(trigger, value.trim());
    }
    return commands;
  }

  save(commands: ReadonlyMap<string, string>): void {
    const document = Object.fromEntries(commands);
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(document, null, 4)}\n`, "utf8");
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      this.removeTempFile(tempPath);
      throw new StorageError(
        `Could not save learned commands to ${this.filePath}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private removeTempFile(tempPath: string): void {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (error) {
      this.warn(`[registry] Could not remove ${tempPath}: ${describeError(error)}`);
    }
  }
}

export interface CommandRegistryOptions {
  rules?: TriggerRules;
}

export class CommandRegistry {
  private readonly commands: CommandMap;
  private readonly store: CommandStore;
  private readonly rules: TriggerRules;
  private dirty = false;

  private constructor(store: CommandStore, commands: CommandMap, rules: TriggerRules) {
    this.store = store;
    this.commands = commands;
    this.rules = rules;
  }

  /** Read the store once; the registry owns the map from then on. */
  static load(store: CommandStore, options: CommandRegistryOptions = {}): CommandRegistry {
    return new CommandRegistry(
      store,
      store.load(),
      options.rules ?? DEFAULT_TRIGGER_RULES
    );
  }

  get size(): number {
    return this.commands.size;
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  get(trigger: string): string | undefined {
    return this.commands.get(trigger);
  }

  all(): string[] {
    return [...this.commands.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.commands.entries()];
  }

  /**
   * Store a command and persist before returning. On a failed write the
   * command stays in memory and the StorageError propagates.
   */
  put(trigger: string, action: string): void {
    assertValidTrigger(trigger, this.rules);
    this.commands.set(trigger, action);
    this.dirty = true;
    this.store.save(this.commands);
    this.dirty = false;
  }

  /** Retry a write that failed earlier. No-op when nothing is pending. */
  flush(): void {
    if (!this.dirty) return;
    this.store.save(this.commands);
    this.dirty = false;
  }

  match(text: string, threshold: number): MatchResult | undefined {
    const hit = bestMatch(text, this.commands.keys(), { threshold });
    if (!hit) return undefined;

    const action = this.commands.get(hit.candidate);
    if (action === undefined) return undefined;
    return { trigger: hit.candidate, action, score: hit.score };
  }
}
