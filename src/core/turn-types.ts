/**
 * Types for the dispatcher state machine.
 *
 * IDLE waits for the wake token, LISTENING handles commands, the two
 * TEACHING states collect a trigger and then its action. CONFIRMING holds a
 * built-in until the user says yes. TERMINATED is final.
 */

export enum DispatcherState {
  IDLE = "IDLE",
  LISTENING = "LISTENING",
  TEACHING_TRIGGER = "TEACHING_TRIGGER",
  TEACHING_ACTION = "TEACHING_ACTION",
  CONFIRMING = "CONFIRMING",
  TERMINATED = "TERMINATED",
}

export type OutcomeKind =
  | "ignored"
  | "wake"
  | "exit"
  | "teach_start"
  | "teach_cancelled"
  | "trigger_accepted"
  | "trigger_rejected"
  | "action_rejected"
  | "learned"
  | "not_saved"
  | "learned_command"
  | "builtin"
  | "confirm_request"
  | "confirm_declined"
  | "fallback"
  | "execution_failed"
  | "terminated";

export interface DispatchOutcome {
  state: DispatcherState;
  kind: OutcomeKind;
  /** Matched trigger, built-in id or rejection reason, when there is one. */
  detail?: string;
}

export type TerminationReason = "exit" | "interrupt" | "end_of_input";
