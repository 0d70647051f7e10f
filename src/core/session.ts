import { MESSAGES } from "../config/constants.js";
import type { Transcriber, TranscriptionResult } from "../types.js";
import type { Logger } from "../ui/logger.js";
import type { Spinner } from "../ui/spinner.js";
import type { Dispatcher } from "./dispatcher.js";
import { DispatcherState, type DispatchOutcome } from "./turn-types.js";

export interface SessionDeps {
  transcriber: Transcriber;
  dispatcher: Dispatcher;
  systemLog: Logger;
  systemWarn: Logger;
  spinner?: Spinner;
  /** Echoes recognized text; unset when the user typed it. */
  echo?: Logger;
  onOutcome?: (outcome: DispatchOutcome) => void;
}

/**
 * Capture → dispatch loop. Recognition failures are reported and the loop
 * keeps listening; a closed input source ends the session.
 */
export async function runSession(deps: SessionDeps): Promise<void> {
  const { transcriber, dispatcher, spinner } = deps;

  while (dispatcher.state !== DispatcherState.TERMINATED) {
    spinner?.start(dispatcher.state === DispatcherState.IDLE ? "Waiting" : "Listening");
    let result: TranscriptionResult;
    try {
      result = await transcriber.capture();
    } finally {
      spinner?.stop();
    }

    if (result.ok) {
      deps.echo?.(`you> ${result.text}`);
      const outcome = await dispatcher.handle(result.text);
      deps.onOutcome?.(outcome);
      continue;
    }

    switch (result.failure) {
      case "timeout":
      case "unintelligible":
        deps.systemLog(`[session] ${result.failure}: ${result.detail}`);
        break;
      case "service_unavailable":
        deps.systemWarn(`[session] Recognition service unavailable: ${result.detail}`);
        dispatcher.speak(MESSAGES.serviceUnavailable);
        break;
      case "closed":
        deps.systemLog("[session] Input closed");
        deps.onOutcome?.(dispatcher.terminate("end_of_input"));
        break;
    }
  }

  transcriber.close?.();
}
