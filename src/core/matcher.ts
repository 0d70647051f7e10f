/**
 * Fuzzy matching of utterances against known phrases.
 *
 * Scores use gestalt pattern matching (Ratcliff/Obershelp): the longest
 * common block is found, then the same search recurses on the text to its
 * left and right. The ratio is 2·M / (|a| + |b|) where M counts matched
 * characters, so it is character-level and order-sensitive.
 */

import { splitWords } from "../utils/strings.js";

export interface MatchOptions {
  threshold: number;
  /**
   * Smallest number of words the contained side needs before whole-word
   * containment counts as an exact hit. Single-word containment is too loose
   * for learned triggers ("time" inside "time now").
   */
  minContainmentWords?: number;
  /**
   * "either" also counts the text sitting inside a candidate. Fixed phrase
   * tables use "candidate-in-text" so a lone word of a phrase ("nova" from
   * "shut down nova") is not read as the phrase.
   */
  containment?: Containment;
}

export type Containment = "either" | "candidate-in-text";

export interface ScoredCandidate {
  candidate: string;
  score: number;
}

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function longestBlock(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  // Length of the common run ending at each index of b, for the previous row.
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRuns = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }
  return best;
}

function matchedCharacters(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): number {
  const block = longestBlock(a, aLo, aHi, b, bLo, bHi);
  if (block.size === 0) return 0;

  return (
    block.size +
    matchedCharacters(a, aLo, block.aStart, b, bLo, block.bStart) +
    matchedCharacters(
      a,
      block.aStart + block.size,
      aHi,
      b,
      block.bStart + block.size,
      bHi
    )
  );
}

/**
 * Similarity ratio in [0, 1]. Two empty strings score 0, not 1.
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  return (2 * matchedCharacters(a, 0, a.length, b, 0, b.length)) / total;
}

/** Whole-word containment: `phrase` appears in `text` on word boundaries. */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!text || !phrase) return false;
  return ` ${text} `.includes(` ${phrase} `);
}

export function scoreCandidate(
  text: string,
  candidate: string,
  minContainmentWords = 2,
  containment: Containment = "either"
): number {
  if (!text || !candidate) return 0;

  if (
    containsPhrase(text, candidate) &&
    splitWords(candidate).length >= minContainmentWords
  ) {
    return 1;
  }
  if (
    containment === "either" &&
    containsPhrase(candidate, text) &&
    splitWords(text).length >= minContainmentWords
  ) {
    return 1;
  }
  return similarity(text, candidate);
}

/**
 * Pick the best-scoring candidate at or above the threshold. Ties keep the
 * candidate that came first.
 */
export function bestMatch(
  text: string,
  candidates: Iterable<string>,
  options: MatchOptions
): ScoredCandidate | undefined {
  if (!text) return undefined;

  let best: ScoredCandidate | undefined;
  for (const candidate of candidates) {
    const score = scoreCandidate(
      text,
      candidate,
      options.minContainmentWords,
      options.containment
    );
    if (!best || score > best.score) {
      best = { candidate, score };
    }
    if (score === 1) break;
  }

  if (!best || best.score < options.threshold) return undefined;
  return best;
}
