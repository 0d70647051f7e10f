import { removeStopwords } from "stopword";
import {
  MIN_TRIGGER_LENGTH,
  MIN_TRIGGER_WORDS,
  TRIGGER_STOP_WORDS,
} from "../config/constants.js";
import { splitWords } from "../utils/strings.js";
import { ValidationError } from "./errors.js";

export interface TriggerRules {
  minLength: number;
  minWords: number;
  stopWords: string[];
}

export interface TriggerVerdict {
  ok: boolean;
  reason: string;
}

export const DEFAULT_TRIGGER_RULES: TriggerRules = {
  minLength: MIN_TRIGGER_LENGTH,
  minWords: MIN_TRIGGER_WORDS,
  stopWords: TRIGGER_STOP_WORDS,
};

function countDigits(text: string): number {
  return (text.match(/\d/g) ?? []).length;
}

/**
 * Decide whether a phrase may be taught as a trigger. The first rule that
 * fails supplies the reason.
 */
export function validateTrigger(
  trigger: string,
  rules: TriggerRules = DEFAULT_TRIGGER_RULES
): TriggerVerdict {
  const text = trigger.trim();
  const compact = text.replaceAll(/\s+/g, "");
  const words = splitWords(text);

  if (compact.length > 0 && /^\d+$/.test(compact)) {
    return { ok: false, reason: "Trigger cannot be only numbers." };
  }
  if (text.length < rules.minLength) {
    return {
      ok: false,
      reason: `Trigger too short. Minimum ${rules.minLength} characters.`,
    };
  }
  if (words.length < rules.minWords) {
    return {
      ok: false,
      reason: `Trigger needs at least ${rules.minWords} words.`,
    };
  }
  if (countDigits(text) > text.length / 2) {
    return { ok: false, reason: "Trigger contains too many numbers." };
  }
  if (removeStopwords(words, rules.stopWords).length === 0) {
    return { ok: false, reason: "Trigger cannot be only common words." };
  }
  return { ok: true, reason: "" };
}

export function assertValidTrigger(
  trigger: string,
  rules: TriggerRules = DEFAULT_TRIGGER_RULES
): void {
  const verdict = validateTrigger(trigger, rules);
  if (!verdict.ok) {
    throw new ValidationError(verdict.reason);
  }
}
