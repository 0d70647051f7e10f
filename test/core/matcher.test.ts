import { describe, expect, it } from "vitest";
import { bestMatch, containsPhrase, scoreCandidate, similarity } from "../../src/core/matcher.js";

describe("similarity", () => {
  it("scores a truncated phrase by matched characters", () => {
    expect(similarity("open note", "open notepad")).toBeCloseTo(18 / 21, 10);
  });

  it("is 1 for identical text and 0 for two empty strings", () => {
    expect(similarity("open notepad", "open notepad")).toBe(1);
    expect(similarity("", "")).toBe(0);
  });

  it("is 0 when nothing is shared", () => {
    expect(similarity("abc", "xyz")).toBe(0);
  });
});

describe("containsPhrase", () => {
  it("matches on word boundaries only", () => {
    expect(containsPhrase("please open notepad now", "open notepad")).toBe(true);
    expect(containsPhrase("opennotepad", "notepad")).toBe(false);
    expect(containsPhrase("open notepads", "open notepad")).toBe(false);
  });
});

describe("scoreCandidate", () => {
  it("treats multi-word containment as an exact hit in either direction", () => {
    expect(scoreCandidate("please open notepad", "open notepad")).toBe(1);
    expect(scoreCandidate("open notepad", "please open notepad")).toBe(1);
  });

  it("ignores single-word containment unless allowed", () => {
    expect(scoreCandidate("time now", "time")).toBeCloseTo(8 / 12, 10);
    expect(scoreCandidate("time now", "time", 1)).toBe(1);
  });

  it("scores a single word from a longer phrase by ratio only", () => {
    expect(scoreCandidate("nova", "shut down nova")).toBeCloseTo(8 / 18, 10);
    expect(scoreCandidate("nova", "shut down nova", 1, "candidate-in-text")).toBeCloseTo(
      8 / 18,
      10
    );
  });

  it("can limit containment to the candidate inside the text", () => {
    expect(scoreCandidate("new command", "learn new command", 1)).toBe(1);
    expect(
      scoreCandidate("new command", "learn new command", 1, "candidate-in-text")
    ).toBeCloseTo(22 / 28, 10);
    expect(scoreCandidate("nova stop", "stop", 1, "candidate-in-text")).toBe(1);
  });
});

describe("bestMatch", () => {
  it("short-circuits when the candidate sits inside the text", () => {
    expect(bestMatch("nova open notepad now", ["open notepad"], { threshold: 0.75 })).toEqual({
      candidate: "open notepad",
      score: 1,
    });
  });

  it("does not read a lone word as the phrase it belongs to", () => {
    const options = {
      threshold: 0.8,
      minContainmentWords: 1,
      containment: "candidate-in-text",
    } as const;
    expect(bestMatch("nova", ["stop", "shut down nova", "close nova"], options)).toBeUndefined();
    expect(bestMatch("down", ["shut down nova"], options)).toBeUndefined();
  });

  it("accepts a fuzzy hit above the threshold", () => {
    const hit = bestMatch("open note", ["open notepad", "play music"], { threshold: 0.75 });
    expect(hit?.candidate).toBe("open notepad");
    expect(hit?.score).toBeCloseTo(18 / 21, 10);
  });

  it("does not let a one-word trigger swallow a longer utterance", () => {
    expect(bestMatch("time now", ["time"], { threshold: 0.75 })).toBeUndefined();
  });

  it("returns nothing below the threshold", () => {
    expect(bestMatch("weather", ["open notepad"], { threshold: 0.75 })).toBeUndefined();
  });

  it("keeps the first candidate on ties", () => {
    expect(bestMatch("abc", ["abd", "abe"], { threshold: 0.5 })).toEqual({
      candidate: "abd",
      score: 4 / 6,
    });
  });

  it("returns nothing for empty input", () => {
    expect(bestMatch("", ["open notepad"], { threshold: 0 })).toBeUndefined();
  });
});
