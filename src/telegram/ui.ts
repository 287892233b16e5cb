import { nanoid } from "nanoid";
import { Markup } from "telegraf";
import { type UiCollaborator } from "../reminders/dispatcher";
import { UiThread } from "./uiThread";

type InlineKeyboardMarkup = ReturnType<typeof Markup.inlineKeyboard>["reply_markup"];

export type MessageExtra = { reply_markup?: InlineKeyboardMarkup };

/**
 * The subset of the Telegram Bot API the app talks to.
 * `bot.telegram` satisfies it; tests pass a fake.
 */
export interface ChatApi {
  sendMessage(chatId: number, text: string, extra?: MessageExtra): Promise<{ message_id: number }>;
  editMessageText(
    chatId: number,
    messageId: number,
    inlineMessageId: undefined,
    text: string,
    extra?: MessageExtra,
  ): Promise<unknown>;
  deleteMessage(chatId: number, messageId: number): Promise<unknown>;
  sendAudio(chatId: number, audio: { source: string }, extra?: { caption?: string }): Promise<unknown>;
}

export const DISMISS_PREFIX = "dismiss:";

/**
 * Formats the alert message body.
 */
export function formatAlert(title: string, description: string): string {
  const lines = [`🔔 ${title} 🔔`];
  if (description) {
    lines.push(description);
  }
  return lines.join("\n");
}

/**
 * Alerts are chat messages with a Dismiss button; the handle is an alert id
 * that the button's callback data carries. Ids are random so that buttons left
 * over from an earlier run never match a current alert.
 */
export class TelegramUi implements UiCollaborator<string> {
  private readonly openAlerts = new Map<string, number>();

  constructor(
    private readonly api: ChatApi,
    readonly chatId: number,
    private readonly thread: UiThread = new UiThread(),
  ) {}

  scheduleOnUIThread(task: () => void | Promise<void>): void {
    this.thread.schedule(task);
  }

  async presentAlert(title: string, description: string): Promise<string> {
    const alertId = `a_${nanoid(10)}`;
    const keyboard = Markup.inlineKeyboard([
      Markup.button.callback("Dismiss", `${DISMISS_PREFIX}${alertId}`),
    ]);

    const message = await this.api.sendMessage(this.chatId, formatAlert(title, description), {
      reply_markup: keyboard.reply_markup,
    });
    this.openAlerts.set(alertId, message.message_id);
    return alertId;
  }

  /**
   * Deletes the alert message. Unknown or already dismissed ids are ignored.
   */
  async dismiss(alertId: string): Promise<void> {
    const messageId = this.openAlerts.get(alertId);
    if (messageId === undefined) {
      return;
    }
    this.openAlerts.delete(alertId);
    await this.api.deleteMessage(this.chatId, messageId);
  }

  get openAlertCount(): number {
    return this.openAlerts.size;
  }

  /**
   * Sends a plain message through the UI thread.
   */
  post(text: string, extra?: MessageExtra): void {
    this.scheduleOnUIThread(async () => {
      await this.api.sendMessage(this.chatId, text, extra);
    });
  }

  /**
   * Replaces the text of one of the bot's messages through the UI thread.
   */
  edit(messageId: number, text: string, extra?: MessageExtra): void {
    this.scheduleOnUIThread(async () => {
      await this.api.editMessageText(this.chatId, messageId, undefined, text, extra);
    });
  }

  idle(): Promise<void> {
    return this.thread.idle();
  }
}
