/**
 * Dispatcher state machine.
 *
 * One call to `handle` per utterance. Exit intent is checked against the
 * whole utterance; everything else sees the utterance with the wake token
 * removed. All phrase matching goes through the matcher module.
 */

import process from "node:process";
import {
  CANCEL_PHRASES,
  CONFIRM_PHRASES,
  DECLINE_PHRASES,
  EXIT_PATTERNS,
  LEARN_PHRASES,
  MAX_TRIGGER_ATTEMPTS,
  MESSAGES,
} from "../config/constants.js";
import type { ActionRunner, MatchResult, Speaker, SystemControls } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { describeError } from "../ui/logger.js";
import type { InteractionLog } from "../utils/interaction-log.js";
import { normalize } from "../stt/normalizer.js";
import { detectWake } from "../stt/wake.js";
import { isActionShaped } from "./actions.js";
import {
  BUILTIN_COMMANDS,
  matchBuiltin,
  type BuiltinCommand,
  type BuiltinContext,
  type BuiltinHit,
} from "./builtins.js";
import { StorageError, ValidationError } from "./errors.js";
import { bestMatch, type ScoredCandidate } from "./matcher.js";
import type { CommandRegistry } from "./registry.js";
import {
  DispatcherState,
  type DispatchOutcome,
  type OutcomeKind,
  type TerminationReason,
} from "./turn-types.js";
import { DEFAULT_TRIGGER_RULES, validateTrigger, type TriggerRules } from "./validator.js";

// === Settings & dependencies ===

export interface DispatcherSettings {
  wakeToken: string;
  similarityThreshold: number;
  exitSimilarityThreshold: number;
  triggerRules: TriggerRules;
}

export interface DispatcherDeps {
  registry: CommandRegistry;
  speaker: Speaker;
  runner: ActionRunner;
  system: SystemControls;
  interactions: InteractionLog;
  systemLog: Logger;
  systemError: Logger;
  matchLog: Logger;
  builtins?: readonly BuiltinCommand[];
  now?: () => Date;
  platform?: NodeJS.Platform;
  initialState?: DispatcherState;
}

export const DEFAULT_SETTINGS: DispatcherSettings = {
  wakeToken: "nova",
  similarityThreshold: 0.75,
  exitSimilarityThreshold: 0.8,
  triggerRules: DEFAULT_TRIGGER_RULES,
};

export class Dispatcher {
  private current: DispatcherState;
  private pendingTrigger: string | undefined;
  private pendingConfirmation: { hit: BuiltinHit; declined: string } | undefined;
  private triggerFailures = 0;
  private readonly exitPatterns: string[];
  private readonly builtins: readonly BuiltinCommand[];
  private readonly builtinContext: BuiltinContext;

  constructor(
    private readonly deps: DispatcherDeps,
    private readonly settings: DispatcherSettings = DEFAULT_SETTINGS
  ) {
    this.current = deps.initialState ?? DispatcherState.IDLE;
    this.exitPatterns = EXIT_PATTERNS.map((pattern) =>
      pattern.replaceAll("{wake}", settings.wakeToken)
    );
    this.builtins = deps.builtins ?? BUILTIN_COMMANDS;
    this.builtinContext = {
      say: (text) => this.speak(text),
      runner: deps.runner,
      system: deps.system,
      now: deps.now ?? (() => new Date()),
      platform: deps.platform ?? process.platform,
    };
  }

  get state(): DispatcherState {
    return this.current;
  }

  /** Speak through the Speaker and record the turn. */
  speak(text: string): void {
    this.deps.interactions.record("assistant", text, normalize(text));
    this.deps.speaker.say(text);
  }

  async handle(raw: string): Promise<DispatchOutcome> {
    const normalized = normalize(raw);
    this.deps.interactions.record("user", raw, normalized);
    this.deps.systemLog(`[dispatcher] ${this.current}: "${normalized}"`);

    switch (this.current) {
      case DispatcherState.IDLE:
        return this.handleIdle(normalized);
      case DispatcherState.LISTENING:
        return this.handleListening(normalized);
      case DispatcherState.TEACHING_TRIGGER:
        return this.handleTrigger(normalized);
      case DispatcherState.TEACHING_ACTION:
        return this.handleAction(raw, normalized);
      case DispatcherState.CONFIRMING:
        return this.handleConfirmation(normalized);
      case DispatcherState.TERMINATED:
        return this.outcome("ignored");
    }
  }

  /**
   * Stop for good. Pending registry writes are retried first; a failure is
   * reported but does not prevent termination.
   */
  terminate(reason: TerminationReason): DispatchOutcome {
    if (this.current === DispatcherState.TERMINATED) {
      return this.outcome("ignored");
    }

    try {
      this.deps.registry.flush();
    } catch (error) {
      this.deps.systemError(`[dispatcher] Flush failed: ${describeError(error)}`);
      this.speak(MESSAGES.flushFailed);
    }

    this.pendingTrigger = undefined;
    this.pendingConfirmation = undefined;
    this.current = DispatcherState.TERMINATED;
    this.speak(reason === "interrupt" ? MESSAGES.interrupted : MESSAGES.farewell);
    this.deps.systemLog(`[dispatcher] Terminated (${reason})`);
    return this.outcome(reason === "exit" ? "exit" : "terminated", reason);
  }

  isExitIntent(normalized: string): boolean {
    const hit = this.matchPhrase(
      normalized,
      this.exitPatterns,
      this.settings.exitSimilarityThreshold
    );
    if (hit) {
      this.deps.matchLog(`[match] exit "${hit.candidate}" (${hit.score.toFixed(2)})`);
    }
    return hit !== undefined;
  }

  // === States ===

  private async handleIdle(normalized: string): Promise<DispatchOutcome> {
    if (!normalized) return this.outcome("ignored");
    if (this.isExitIntent(normalized)) return this.terminate("exit");

    const wake = detectWake(normalized, this.settings.wakeToken);
    if (!wake.found) {
      this.deps.systemLog("[dispatcher] No wake token, ignoring");
      return this.outcome("ignored");
    }

    this.current = DispatcherState.LISTENING;
    if (!wake.remainder) {
      this.speak(MESSAGES.wakeAck);
      return this.outcome("wake");
    }
    return this.runCommand(wake.remainder);
  }

  private async handleListening(normalized: string): Promise<DispatchOutcome> {
    if (!normalized) return this.outcome("ignored");
    if (this.isExitIntent(normalized)) return this.terminate("exit");

    const command = detectWake(normalized, this.settings.wakeToken).remainder;
    if (!command) {
      this.speak(MESSAGES.wakeAck);
      return this.outcome("wake");
    }
    return this.runCommand(command);
  }

  private handleTrigger(normalized: string): DispatchOutcome {
    const trigger = detectWake(normalized, this.settings.wakeToken).remainder;
    if (this.isCancel(trigger)) return this.cancelTeaching();

    // Only the wake token was heard; ask again without using up an attempt.
    if (!trigger) {
      this.speak(`${MESSAGES.learnNoTrigger} ${MESSAGES.learnRetry}`);
      return this.outcome("trigger_rejected", MESSAGES.learnNoTrigger);
    }

    const verdict = validateTrigger(trigger, this.settings.triggerRules);
    if (!verdict.ok) {
      this.triggerFailures++;
      this.deps.systemLog(`[teach] Trigger rejected: ${verdict.reason}`);
      if (this.triggerFailures < MAX_TRIGGER_ATTEMPTS) {
        this.speak(`Invalid trigger. ${verdict.reason} ${MESSAGES.learnRetry}`);
      } else {
        this.current = DispatcherState.LISTENING;
        this.speak(`Invalid trigger. ${verdict.reason} ${MESSAGES.learnGiveUp}`);
      }
      return this.outcome("trigger_rejected", verdict.reason);
    }

    this.pendingTrigger = trigger;
    this.current = DispatcherState.TEACHING_ACTION;
    this.speak(`Got it. When you say ${trigger}, what action should I perform?`);
    return this.outcome("trigger_accepted", trigger);
  }

  private handleAction(raw: string, normalized: string): DispatchOutcome {
    const trigger = this.pendingTrigger;
    if (this.isCancel(normalized) || trigger === undefined) {
      return this.cancelTeaching();
    }

    const action = raw.trim();
    this.pendingTrigger = undefined;
    this.current = DispatcherState.LISTENING;

    if (!action) {
      this.speak(MESSAGES.learnNoAction);
      return this.outcome("action_rejected", MESSAGES.learnNoAction);
    }
    if (!isActionShaped(action)) {
      this.deps.systemLog(`[teach] Action rejected: "${action}"`);
      this.speak(MESSAGES.actionShape);
      return this.outcome("action_rejected", MESSAGES.actionShape);
    }

    try {
      this.deps.registry.put(trigger, action);
    } catch (error) {
      if (error instanceof StorageError) {
        this.deps.systemError(`[teach] ${error.message}`);
        this.speak(`I learned that ${trigger} means ${action}, ${MESSAGES.notSaved}`);
        return this.outcome("not_saved", trigger);
      }
      if (error instanceof ValidationError) {
        this.speak(`Invalid trigger. ${error.message}`);
        return this.outcome("trigger_rejected", error.message);
      }
      throw error;
    }

    this.deps.systemLog(`[teach] Learned: "${trigger}" -> "${action}"`);
    this.speak(`Perfect! I have learned that ${trigger} means ${action}`);
    return this.outcome("learned", trigger);
  }

  private async handleConfirmation(normalized: string): Promise<DispatchOutcome> {
    const pending = this.pendingConfirmation;
    this.pendingConfirmation = undefined;
    this.current = DispatcherState.LISTENING;
    if (!pending) return this.outcome("ignored");

    const answer = detectWake(normalized, this.settings.wakeToken).remainder;
    const threshold = this.settings.similarityThreshold;
    const confirmed =
      this.matchPhrase(answer, CONFIRM_PHRASES, threshold) !== undefined &&
      this.matchPhrase(answer, DECLINE_PHRASES, threshold) === undefined;

    if (confirmed) return this.runBuiltin(pending.hit, true);

    this.deps.systemLog(`[dispatcher] ${pending.hit.command.id} declined: "${answer}"`);
    this.speak(pending.declined);
    return this.outcome("confirm_declined", pending.hit.command.id);
  }

  // === Commands ===

  private async runCommand(command: string): Promise<DispatchOutcome> {
    if (this.isLearnIntent(command)) return this.startTeaching();

    const learned = this.deps.registry.match(command, this.settings.similarityThreshold);
    if (learned) return this.runLearned(learned);

    const builtin = matchBuiltin(command, this.builtins);
    if (builtin) return this.runBuiltin(builtin);

    this.speak(MESSAGES.fallback);
    return this.outcome("fallback");
  }

  private async runLearned(match: MatchResult): Promise<DispatchOutcome> {
    this.deps.matchLog(
      `[match] learned "${match.trigger}" (${match.score.toFixed(2)}) -> ${match.action}`
    );
    this.speak(MESSAGES.executing);
    try {
      await this.deps.runner.run(match.action);
    } catch (error) {
      return this.executionFailed(error);
    }
    return this.outcome("learned_command", match.trigger);
  }

  private async runBuiltin(hit: BuiltinHit, confirmed = false): Promise<DispatchOutcome> {
    this.deps.matchLog(`[match] builtin ${hit.command.id} via "${hit.phrase}"`);
    const confirmation = hit.command.confirmation;
    if (confirmation && !confirmed) {
      this.pendingConfirmation = { hit, declined: confirmation.declined };
      this.current = DispatcherState.CONFIRMING;
      this.speak(confirmation.prompt);
      return this.outcome("confirm_request", hit.command.id);
    }

    try {
      await hit.command.run(this.builtinContext, hit.query);
    } catch (error) {
      return this.executionFailed(error);
    }
    return this.outcome("builtin", hit.command.id);
  }

  private executionFailed(error: unknown): DispatchOutcome {
    this.deps.systemError(`[dispatcher] Execution error: ${describeError(error)}`);
    this.speak(MESSAGES.executionFailed);
    return this.outcome("execution_failed", describeError(error));
  }

  // === Teaching ===

  private startTeaching(): DispatchOutcome {
    this.current = DispatcherState.TEACHING_TRIGGER;
    this.pendingTrigger = undefined;
    this.triggerFailures = 0;
    this.speak(MESSAGES.learnStart);
    return this.outcome("teach_start");
  }

  private cancelTeaching(): DispatchOutcome {
    this.current = DispatcherState.LISTENING;
    this.pendingTrigger = undefined;
    this.speak(MESSAGES.learnCancelled);
    return this.outcome("teach_cancelled");
  }

  private isLearnIntent(command: string): boolean {
    return (
      this.matchPhrase(command, LEARN_PHRASES, this.settings.similarityThreshold) !==
      undefined
    );
  }

  private isCancel(text: string): boolean {
    return (
      this.matchPhrase(text, CANCEL_PHRASES, this.settings.similarityThreshold) !==
      undefined
    );
  }

  /**
   * Fixed phrase tables: a phrase inside the utterance is an exact hit, even a
   * single word, but a lone word of a longer phrase only gets the ratio.
   */
  private matchPhrase(
    text: string,
    phrases: readonly string[],
    threshold: number
  ): ScoredCandidate | undefined {
    return bestMatch(text, phrases, {
      threshold,
      minContainmentWords: 1,
      containment: "candidate-in-text",
    });
  }

  private outcome(kind: OutcomeKind, detail?: string): DispatchOutcome {
    const result: DispatchOutcome = { state: this.current, kind };
    if (detail !== undefined) {
      result.detail = detail;
    }
    return result;
  }
}
