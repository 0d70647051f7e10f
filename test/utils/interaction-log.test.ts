import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JsonlInteractionLog } from "../../src/utils/interaction-log.js";

describe("JsonlInteractionLog", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "nova-interactions-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per turn", () => {
    const file = path.join(dir, "log.jsonl");
    const log = new JsonlInteractionLog(file, vi.fn(), () => new Date("2026-10-19T12:00:00.000Z"));

    log.record("user", "Nova!", "nova");
    log.record("assistant", "Yes?", "yes");

    expect(fs.readFileSync(file, "utf8")).toBe(
      '{"timestamp":"2026-10-19T12:00:00.000Z","role":"user","raw":"Nova!","normalized":"nova"}\n' +
        '{"timestamp":"2026-10-19T12:00:00.000Z","role":"assistant","raw":"Yes?","normalized":"yes"}\n'
    );
  });

  it("warns once when the file cannot be written", () => {
    const warn = vi.fn();
    const log = new JsonlInteractionLog(path.join(dir, "missing", "log.jsonl"), warn);

    log.record("user", "nova", "nova");
    log.record("user", "stop", "stop");

    expect(warn).toHaveBeenCalledTimes(1);
  });
});
