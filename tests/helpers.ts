import { vi } from "vitest";
import { type AppConfig } from "../src/config";
import { type UiCollaborator } from "../src/reminders/dispatcher";
import { type PersistenceCollaborator } from "../src/reminders/persistence";
import { type Reminder } from "../src/reminders/schema";
import { type ChatApi, type MessageExtra } from "../src/telegram/ui";
import { UiThread } from "../src/telegram/uiThread";

// Monday 19 October 2026, 12:00 in Paris
export const T0 = new Date("2026-10-19T10:00:00.000Z");
export const CHAT_ID = 4242;

export function isoIn(ms: number): string {
  return new Date(Date.now() + ms).toISOString();
}

export function makeReminder(overrides: Partial<Reminder> = {}): Reminder {
  return {
    id: "rem_test000001",
    title: "Water the plants",
    description: "",
    triggerAtIso: "2026-10-19T10:00:02.000Z",
    active: true,
    revision: 0,
    createdAtIso: "2026-10-19T09:00:00.000Z",
    updatedAtIso: "2026-10-19T09:00:00.000Z",
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    botToken: "test-token",
    chatId: CHAT_ID,
    remindersFile: "./reminders.test.json",
    soundFile: "bell.ogg",
    timezone: "Europe/Paris",
    pollIntervalMs: 1000,
    alertDismissMs: 5000,
    ...overrides,
  };
}

export function createFakeChatApi() {
  let nextMessageId = 100;
  return {
    sendMessage: vi.fn(async (_chatId: number, _text: string, _extra?: MessageExtra) => ({
      message_id: nextMessageId++,
    })),
    editMessageText: vi.fn(
      async (
        _chatId: number,
        _messageId: number,
        _inlineMessageId: undefined,
        _text: string,
        _extra?: MessageExtra,
      ) => true,
    ),
    deleteMessage: vi.fn(async (_chatId: number, _messageId: number) => true),
    sendAudio: vi.fn(async (_chatId: number, _audio: { source: string }) => true),
  } satisfies ChatApi;
}

/**
 * In-memory stand-in for the JSON file.
 */
export class MemoryPersistence implements PersistenceCollaborator {
  readonly saved: Reminder[][] = [];

  constructor(
    private readonly records: Reminder[] = [],
    private readonly failures: { load?: Error; save?: Error } = {},
  ) {}

  async loadAll(): Promise<Reminder[]> {
    if (this.failures.load) {
      throw this.failures.load;
    }
    return this.records.map((r) => ({ ...r }));
  }

  async saveAll(reminders: Reminder[]): Promise<void> {
    if (this.failures.save) {
      throw this.failures.save;
    }
    this.saved.push(reminders);
  }

  get lastSaved(): Reminder[] | undefined {
    return this.saved[this.saved.length - 1];
  }
}

/**
 * Records alerts instead of showing them. Runs UI work on a real UiThread.
 */
export class RecordingUi implements UiCollaborator<string> {
  readonly thread = new UiThread();
  readonly presented: Array<{ handle: string; title: string; description: string }> = [];
  readonly dismissed: string[] = [];

  scheduleOnUIThread(task: () => void | Promise<void>): void {
    this.thread.schedule(task);
  }

  async presentAlert(title: string, description: string): Promise<string> {
    const handle = `h${this.presented.length + 1}`;
    this.presented.push({ handle, title, description });
    return handle;
  }

  async dismiss(handle: string): Promise<void> {
    this.dismissed.push(handle);
  }
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
