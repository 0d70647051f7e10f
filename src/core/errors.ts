export type AssistantErrorKind =
  | "input"
  | "validation"
  | "service"
  | "storage"
  | "execution";

export abstract class AssistantError extends Error {
  abstract readonly kind: AssistantErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No speech, or speech that could not be understood. */
export class InputError extends AssistantError {
  readonly kind = "input";
}

/** A trigger or action rejected while teaching. */
export class ValidationError extends AssistantError {
  readonly kind = "validation";
}

/** The transcription backend is unreachable. */
export class ServiceError extends AssistantError {
  readonly kind = "service";
}

/** Learned commands could not be written. */
export class StorageError extends AssistantError {
  readonly kind = "storage";
}

/** An action or system control failed to run. */
export class ExecutionError extends AssistantError {
  readonly kind = "execution";
}

/** The `code` of a Node system error (ENOENT, EACCES, …), if any. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
