import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StorageError, ValidationError } from "../../src/core/errors.js";
import { CommandRegistry, JsonCommandStore, type CommandStore } from "../../src/core/registry.js";

const NOTEPAD = "C:\\Windows\\System32\\notepad.exe";

class MemoryStore implements CommandStore {
  saved: Array<Record<string, string>> = [];
  failing = false;

  constructor(private readonly initial: Record<string, string> = {}) {}

  load(): Map<string, string> {
    return new Map(Object.entries(this.initial));
  }

  save(commands: ReadonlyMap<string, string>): void {
    if (this.failing) throw new StorageError("disk full");
    this.saved.push(Object.fromEntries(commands));
  }
}

describe("JsonCommandStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "nova-registry-"));
    file = path.join(dir, "learned_commands.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty without a warning when the file is missing", () => {
    const warn = vi.fn();
    expect(new JsonCommandStore({ filePath: file, warn }).load().size).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });

  it("writes an indented JSON object and reads it back", () => {
    const store = new JsonCommandStore({ filePath: file });
    store.save(new Map([["open notepad", NOTEPAD]]));

    expect(fs.readFileSync(file, "utf8")).toBe(
      `${JSON.stringify({ "open notepad": NOTEPAD }, null, 4)}\n`
    );
    expect([...store.load()]).toEqual([["open notepad", NOTEPAD]]);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it("skips entries that fail validation and normalizes keys", () => {
    fs.writeFileSync(
      file,
      JSON.stringify({
        "open notepad": NOTEPAD,
        "89": "/usr/bin/true",
        "open mail": 5,
        "Open  Browser!": " https://example.com ",
      })
    );
    const warn = vi.fn();
    const commands = new JsonCommandStore({ filePath: file, warn }).load();

    expect([...commands]).toEqual([
      ["open notepad", NOTEPAD],
      ["open browser", "https://example.com"],
    ]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("starts empty when the file is corrupted", () => {
    fs.writeFileSync(file, "{ not json");
    const warn = vi.fn();
    expect(new JsonCommandStore({ filePath: file, warn }).load().size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("starts empty when the root is not an object", () => {
    fs.writeFileSync(file, JSON.stringify(["open notepad"]));
    const warn = vi.fn();
    expect(new JsonCommandStore({ filePath: file, warn }).load().size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("raises StorageError when the directory cannot be created", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const store = new JsonCommandStore({ filePath: path.join(blocker, "commands.json") });

    expect(() => store.save(new Map([["open notepad", NOTEPAD]]))).toThrow(StorageError);
  });

  it("removes the temp file when the rename fails", () => {
    fs.mkdirSync(file);
    const store = new JsonCommandStore({ filePath: file });

    expect(() => store.save(new Map([["open notepad", NOTEPAD]]))).toThrow(StorageError);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });
});

describe("CommandRegistry", () => {
  it("persists every successful put", () => {
    const store = new MemoryStore();
    const registry = CommandRegistry.load(store);

    registry.put("open notepad", NOTEPAD);

    expect(store.saved).toEqual([{ "open notepad": NOTEPAD }]);
    expect(registry.get("open notepad")).toBe(NOTEPAD);
    expect(registry.hasUnsavedChanges).toBe(false);
  });

  it("overwrites an existing trigger", () => {
    const registry = CommandRegistry.load(new MemoryStore({ "open notepad": NOTEPAD }));
    registry.put("open notepad", "/usr/bin/gedit");
    expect(registry.entries()).toEqual([["open notepad", "/usr/bin/gedit"]]);
  });

  it("rejects invalid triggers without touching the map", () => {
    const store = new MemoryStore();
    const registry = CommandRegistry.load(store);

    expect(() => registry.put("89", NOTEPAD)).toThrow(ValidationError);
    expect(registry.size).toBe(0);
    expect(store.saved).toEqual([]);
  });

  it("keeps a command in memory when the write fails", () => {
    const store = new MemoryStore();
    store.failing = true;
    const registry = CommandRegistry.load(store);

    expect(() => registry.put("open notepad", NOTEPAD)).toThrow(StorageError);
    expect(registry.get("open notepad")).toBe(NOTEPAD);
    expect(registry.hasUnsavedChanges).toBe(true);
  });

  it("flushes pending changes once storage recovers", () => {
    const store = new MemoryStore();
    store.failing = true;
    const registry = CommandRegistry.load(store);
    expect(() => registry.put("open notepad", NOTEPAD)).toThrow(StorageError);

    store.failing = false;
    registry.flush();
    registry.flush();

    expect(store.saved).toEqual([{ "open notepad": NOTEPAD }]);
    expect(registry.hasUnsavedChanges).toBe(false);
  });

  it("matches noisy text against learned triggers", () => {
    const registry = CommandRegistry.load(new MemoryStore({ "open notepad": NOTEPAD }));

    const hit = registry.match("open note", 0.75);
    expect(hit?.trigger).toBe("open notepad");
    expect(hit?.action).toBe(NOTEPAD);
    expect(hit?.score).toBeCloseTo(18 / 21, 10);
    expect(registry.match("play some music", 0.75)).toBeUndefined();
  });
});
