import env, { optionalEnv } from "./env";
import { DEFAULT_ALERT_DISMISS_MS } from "./reminders/dispatcher";
import { MAX_POLL_INTERVAL_MS } from "./reminders/monitor";
import { DEFAULT_TIMEZONE } from "./reminders/time";

export type AppConfig = {
  botToken: string;
  chatId: number; // the only chat the bot serves and notifies
  remindersFile: string;
  soundFile?: string; // no audio alert when unset
  timezone: string;
  pollIntervalMs: number;
  alertDismissMs: number;
};

/**
 * Reads the configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const pollIntervalMs = env("REMINDER_POLL_INTERVAL_MS", "number", MAX_POLL_INTERVAL_MS);

  return {
    botToken: env("TELEGRAM_BOT_TOKEN"),
    chatId: env("TELEGRAM_CHAT_ID", "number"),
    remindersFile: env("REMINDERS_FILE", "string", "./reminders.json"),
    soundFile: optionalEnv("REMINDER_SOUND_FILE"),
    timezone: env("REMINDER_TIMEZONE", "string", DEFAULT_TIMEZONE),
    pollIntervalMs: Math.min(Math.max(pollIntervalMs, 1), MAX_POLL_INTERVAL_MS),
    alertDismissMs: env("ALERT_DISMISS_MS", "number", DEFAULT_ALERT_DISMISS_MS),
  };
}
