import { type ReminderApp } from "../app";
import { InvalidInputError, NotFoundError, describeError } from "../reminders/errors";
import { INPUT_USAGE, parseReminderInput } from "../reminders/input";
import { formatForUserRelative, formatInputValue } from "../reminders/time";
import { reminderPicker } from "./picker";

export const EDIT_PREFIX = "edit:";

// Reminder waiting for its replacement line
let pendingEditId: string | null = null;

/**
 * Handles the /edit command.
 * Shows inline keyboard to select a reminder to edit.
 */
export function handleEdit(app: ReminderApp) {
  const reminders = app.store.listAll();

  if (reminders.length === 0) {
    app.ui.post("No reminders to edit.");
    return;
  }

  app.ui.post("Select a reminder to edit:", {
    reply_markup: reminderPicker(reminders, EDIT_PREFIX, "✏️", app.config.timezone),
  });
}

/**
 * Handles the callback for a picked reminder.
 * Remembers it and asks for the replacement line.
 */
export function handleEditStart(app: ReminderApp, reminderId: string, messageId?: number) {
  const reminder = app.store.get(reminderId);

  if (!reminder) {
    app.ui.post("Reminder not found.");
    return;
  }

  pendingEditId = reminderId;

  const current = [
    formatInputValue(reminder.triggerAtIso, app.config.timezone),
    reminder.title,
    reminder.description,
  ]
    .filter(Boolean)
    .join(" | ");
  const text =
    `Editing: ${reminder.title}\n\n` +
    `Current: ${current}\n\n` +
    `Please send the new line: ${INPUT_USAGE}`;

  if (messageId !== undefined) {
    app.ui.edit(messageId, text);
  } else {
    app.ui.post(text);
  }
}

/**
 * Applies the replacement line to the pending reminder.
 * Returns false when no edit is pending. Invalid input keeps the edit
 * pending so the user can try again.
 */
export function processEdit(app: ReminderApp, text: string): boolean {
  if (!pendingEditId) {
    return false;
  }

  const reminderId = pendingEditId;

  try {
    const input = parseReminderInput(text, app.config.timezone);
    pendingEditId = null;

    const updated = app.supervisor.update(reminderId, input);
    if (!updated) {
      throw new NotFoundError(reminderId);
    }

    const dueFormatted = formatForUserRelative(updated.triggerAtIso, app.config.timezone);
    app.ui.post(`Updated: ${updated.title}\nNew time: ${dueFormatted}`);
  } catch (e) {
    if (e instanceof NotFoundError) {
      app.ui.post("Reminder not found.");
      return true;
    }
    if (e instanceof InvalidInputError) {
      app.ui.post(`${e.message}\nSend the line again, or /cancel to stop editing.`);
      return true;
    }
    pendingEditId = null;
    console.error("[Bot] Edit error:", e);
    app.ui.post(`Failed to update reminder: ${describeError(e)}`);
  }

  return true;
}

/**
 * Cancels any pending edit flow. Returns whether one was pending.
 */
export function cancelPendingEdit(): boolean {
  const wasPending = pendingEditId !== null;
  pendingEditId = null;
  return wasPending;
}

/**
 * Checks if there's a pending edit.
 */
export function hasPendingEdit(): boolean {
  return pendingEditId !== null;
}
