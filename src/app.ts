import { type AppConfig } from "./config";
import { NotificationDispatcher } from "./reminders/dispatcher";
import { describeError } from "./reminders/errors";
import {
  JsonFilePersistence,
  PersistenceWriter,
  type PersistenceCollaborator,
} from "./reminders/persistence";
import { NotificationQueue } from "./reminders/queue";
import { type Reminder } from "./reminders/schema";
import { ReminderStore } from "./reminders/store";
import { SchedulerSupervisor, type LoadResult } from "./reminders/supervisor";
import { TelegramAudio } from "./telegram/audio";
import { ListView } from "./telegram/listView";
import { TelegramUi, type ChatApi } from "./telegram/ui";

export type ReminderApp = {
  config: AppConfig;
  store: ReminderStore;
  queue: NotificationQueue;
  supervisor: SchedulerSupervisor;
  dispatcher: NotificationDispatcher<string>;
  ui: TelegramUi;
  listView: ListView;
  writer: PersistenceWriter;
  start(): Promise<LoadResult>;
  stop(): Promise<void>;
};

export type AppDependencies = {
  api: ChatApi;
  persistence?: PersistenceCollaborator;
};

/**
 * Builds the scheduling core and its Telegram collaborators.
 */
export function createReminderApp(config: AppConfig, deps: AppDependencies): ReminderApp {
  const { api } = deps;
  const persistence = deps.persistence ?? new JsonFilePersistence(config.remindersFile, config.timezone);

  const store = new ReminderStore();
  const queue = new NotificationQueue();
  const ui = new TelegramUi(api, config.chatId);
  const listView = new ListView(api, config.chatId, config.timezone);
  const supervisor = new SchedulerSupervisor({
    store,
    queue,
    pollIntervalMs: config.pollIntervalMs,
  });
  const dispatcher = new NotificationDispatcher({
    queue,
    ui,
    audio: new TelegramAudio(api, config.chatId),
    soundRef: config.soundFile,
    alertDismissMs: config.alertDismissMs,
  });
  const writer = new PersistenceWriter(persistence, (error) => {
    ui.post(`⚠️ Reminders could not be saved: ${error.message}`);
  });

  /**
   * Loads saved reminders, then starts monitors and the dispatcher.
   */
  async function start(): Promise<LoadResult> {
    let records: Reminder[] = [];
    try {
      records = await persistence.loadAll();
    } catch (e) {
      const message = describeError(e);
      console.error(`[App] Error loading reminders: ${message}`);
      ui.post(`⚠️ Saved reminders could not be loaded, starting empty: ${message}`);
    }

    const result = supervisor.load(records);

    store.subscribe((snapshot) => writer.request(snapshot));
    store.subscribe((snapshot) => {
      ui.scheduleOnUIThread(() => listView.refresh(snapshot));
    });

    if (result.expired.length > 0) {
      writer.request(store.listAll());
    }

    supervisor.attach(dispatcher.start(supervisor.signal));
    return result;
  }

  async function stop(): Promise<void> {
    const clean = await supervisor.shutdown();
    if (!clean) {
      console.error("[App] Some tasks did not stop in time");
    }
    await writer.flush();
    await ui.idle();
  }

  return {
    config,
    store,
    queue,
    supervisor,
    dispatcher,
    ui,
    listView,
    writer,
    start,
    stop,
  };
}
