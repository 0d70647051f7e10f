/**
 * Wake token detection.
 *
 * The token may appear anywhere in the utterance ("nova stop" and
 * "stop nova" are both woken). Words are compared exactly first, then by
 * Double Metaphone code plus edit similarity so STT near-misses such as
 * "novah" still wake the assistant.
 */

import { doubleMetaphone } from "double-metaphone";
import { editSimilarity, splitWords } from "../utils/strings.js";

// Phonetic hits must also look alike; "knife" and "nova" share a code.
const MIN_TEXT_SIMILARITY = 0.6;

export interface WakeResult {
  found: boolean;
  remainder: string;
}

function phoneticCodes(word: string): string[] {
  const [primary, secondary] = doubleMetaphone(word);
  return [primary, secondary].filter((code) => code.length > 0);
}

export function soundsLike(word: string, token: string): boolean {
  if (word === token) return true;
  if (word.length < 3) return false;

  const tokenCodes = phoneticCodes(token);
  const sharesCode = phoneticCodes(word).some((code) => tokenCodes.includes(code));
  return sharesCode && editSimilarity(word, token) >= MIN_TEXT_SIMILARITY;
}

/**
 * Locate the wake token in a normalized utterance and return the utterance
 * with every occurrence removed.
 */
export function detectWake(normalized: string, wakeToken: string): WakeResult {
  const words = splitWords(normalized);
  const tokenWords = splitWords(wakeToken.toLowerCase());
  if (tokenWords.length === 0) return { found: false, remainder: normalized };

  const kept: string[] = [];
  let found = false;

  for (let index = 0; index < words.length; ) {
    const window = words.slice(index, index + tokenWords.length);
    const matches =
      window.length === tokenWords.length &&
      window.every((word, offset) => soundsLike(word, tokenWords[offset] ?? ""));

    if (matches) {
      found = true;
      index += tokenWords.length;
    } else {
      kept.push(words[index] ?? "");
      index++;
    }
  }

  return { found, remainder: kept.join(" ") };
}
