export type ReminderErrorKind =
  | "NotFound"
  | "InvalidInput"
  | "PersistenceFailure"
  | "PlaybackFailure";

/**
 * Base class for every error the reminder core reports.
 */
export class ReminderError extends Error {
  constructor(
    readonly kind: ReminderErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends ReminderError {
  constructor(readonly reminderId: string) {
    super("NotFound", `Reminder ${reminderId} not found`);
  }
}

/**
 * Rejected user input. The message is shown to the user as is.
 */
export class InvalidInputError extends ReminderError {
  constructor(message: string) {
    super("InvalidInput", message);
  }
}

export class PersistenceError extends ReminderError {
  constructor(message: string, cause?: unknown) {
    super("PersistenceFailure", message, { cause });
  }
}

export class PlaybackError extends ReminderError {
  constructor(readonly soundRef: string, cause?: unknown) {
    super("PlaybackFailure", `Failed to play ${soundRef}: ${describeError(cause)}`, { cause });
  }
}

/**
 * Renders an unknown thrown value for a log line or a chat message.
 */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
