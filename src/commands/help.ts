import { type ReminderApp } from "../app";
import { INPUT_USAGE } from "../reminders/input";

/**
 * Handles the /help command.
 * Lists all available slash commands and their descriptions.
 */
export function handleHelp(app: ReminderApp) {
  const helpMessage = `Available commands:

/help - Show this list of commands
/list - Show all reminders (the list stays up to date)
/add ${INPUT_USAGE} - Add a reminder
/edit - Change a reminder
/cancel - Stop an edit in progress
/remove - Remove a reminder

You can also send "${INPUT_USAGE}" without a command to add a reminder.`;

  app.ui.post(helpMessage);
}
