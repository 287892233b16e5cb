import { type ReminderApp } from "../app";
import { InvalidInputError, describeError } from "../reminders/errors";
import { INPUT_USAGE, parseReminderInput } from "../reminders/input";
import { type Reminder } from "../reminders/schema";
import { formatForUserRelative } from "../reminders/time";

/**
 * Strips the leading "/command" (and an optional "@botname") from a message.
 */
export function commandArgs(text: string): string {
  return text.replace(/^\/\w+(@\w+)?\s*/, "").trim();
}

/**
 * Handles /add and plain text messages: creates a reminder from
 * "YYYY-MM-DD HH:MM | Title | Description".
 */
export function handleAdd(app: ReminderApp, text: string): Reminder | null {
  if (!text.trim()) {
    app.ui.post(`Usage: /add ${INPUT_USAGE}`);
    return null;
  }

  try {
    const input = parseReminderInput(text, app.config.timezone);
    const reminder = app.supervisor.create(input);

    const dueFormatted = formatForUserRelative(reminder.triggerAtIso, app.config.timezone);
    app.ui.post(`Ok, I'll remind you about "${reminder.title}" ${dueFormatted}`);
    return reminder;
  } catch (e) {
    if (e instanceof InvalidInputError) {
      app.ui.post(e.message);
      return null;
    }
    console.error("[Bot] Error adding reminder:", e);
    app.ui.post(`Failed to create reminder: ${describeError(e)}`);
    return null;
  }
}
