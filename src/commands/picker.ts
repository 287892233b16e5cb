import { Markup } from "telegraf";
import { type Reminder } from "../reminders/schema";
import { formatForUserNoYear } from "../reminders/time";

/**
 * One inline button per reminder, carrying `${prefix}${id}` as callback data.
 */
export function reminderPicker(
  reminders: Reminder[],
  prefix: string,
  icon: string,
  zone: string,
) {
  const buttons = reminders.map((reminder) => {
    const dueFormatted = formatForUserNoYear(reminder.triggerAtIso, zone);
    const label = `${dueFormatted} — ${reminder.title.substring(0, 30)}`;
    return [Markup.button.callback(`${icon} ${label}`, `${prefix}${reminder.id}`)];
  });

  return Markup.inlineKeyboard(buttons).reply_markup;
}
