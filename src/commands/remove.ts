import { type ReminderApp } from "../app";
import { formatForUserNoYear } from "../reminders/time";
import { reminderPicker } from "./picker";

export const REMOVE_PREFIX = "remove:";

/**
 * Handles the /remove command.
 * Shows inline keyboard to select a reminder to remove.
 */
export function handleRemove(app: ReminderApp) {
  const reminders = app.store.listAll();

  if (reminders.length === 0) {
    app.ui.post("No reminders to remove.");
    return;
  }

  app.ui.post("Select a reminder to remove:", {
    reply_markup: reminderPicker(reminders, REMOVE_PREFIX, "❌", app.config.timezone),
  });
}

/**
 * Handles callback query for removing a reminder.
 */
export function handleRemoveCallback(app: ReminderApp, reminderId: string, messageId?: number) {
  const reminder = app.supervisor.remove(reminderId);

  if (!reminder) {
    app.ui.post("Reminder not found or already removed.");
    return;
  }

  const dueFormatted = formatForUserNoYear(reminder.triggerAtIso, app.config.timezone);
  const text = `❌ Removed: ${dueFormatted} — ${reminder.title}`;

  if (messageId !== undefined) {
    app.ui.edit(messageId, text);
  } else {
    app.ui.post(text);
  }
}
