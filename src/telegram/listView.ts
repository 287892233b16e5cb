import { type Reminder } from "../reminders/schema";
import { DEFAULT_TIMEZONE, formatTimeOnly, toZonedDateTime } from "../reminders/time";
import { type ChatApi } from "./ui";

/**
 * Renders reminders grouped by day, earliest first.
 */
export function formatReminderList(
  reminders: Reminder[],
  zone: string = DEFAULT_TIMEZONE,
): string {
  if (reminders.length === 0) {
    return "No reminders.";
  }

  const sorted = [...reminders].sort(
    (a, b) => Date.parse(a.triggerAtIso) - Date.parse(b.triggerAtIso),
  );

  const lines: string[] = [];
  let currentDay = "";

  for (const reminder of sorted) {
    const dayLabel = toZonedDateTime(reminder.triggerAtIso, zone).toFormat("cccc dd/MM/yyyy");

    if (dayLabel !== currentDay) {
      currentDay = dayLabel;
      if (lines.length > 0) {
        lines.push("");
      }
      lines.push(dayLabel);
    }

    const time = formatTimeOnly(reminder.triggerAtIso, zone);
    const status = reminder.active ? "Active" : "Expired";
    lines.push(`- ${time} — ${reminder.title} (${status})`);
    if (reminder.description) {
      lines.push(`  ${reminder.description}`);
    }
  }

  return lines.join("\n");
}

/**
 * The most recent /list message, kept in sync with the store.
 * Both methods must run on the UI thread.
 */
export class ListView {
  private message: { messageId: number; text: string } | null = null;

  constructor(
    private readonly api: ChatApi,
    private readonly chatId: number,
    private readonly zone: string = DEFAULT_TIMEZONE,
  ) {}

  async show(reminders: Reminder[]): Promise<void> {
    const text = formatReminderList(reminders, this.zone);
    const sent = await this.api.sendMessage(this.chatId, text);
    this.message = { messageId: sent.message_id, text };
  }

  async refresh(reminders: Reminder[]): Promise<void> {
    if (!this.message) {
      return;
    }

    const text = formatReminderList(reminders, this.zone);
    if (text === this.message.text) {
      return;
    }

    await this.api.editMessageText(this.chatId, this.message.messageId, undefined, text);
    this.message = { ...this.message, text };
  }
}
