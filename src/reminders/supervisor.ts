import { nanoid } from "nanoid";
import { ReminderMonitor, toMonitorTarget, type MonitorOutcome } from "./monitor";
import { type NotificationQueue } from "./queue";
import { type Reminder, type ReminderInput } from "./schema";
import { type ReminderStore } from "./store";
import { getNowUtc, isDue } from "./time";

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

// In-memory registry of running monitors - single handle per reminder id
type MonitorHandle = {
  monitor: ReminderMonitor;
  controller: AbortController;
  done: Promise<MonitorOutcome>;
};

export type LoadResult = {
  loaded: number;
  expired: string[];
  scheduled: number;
};

export type SupervisorOptions = {
  store: ReminderStore;
  queue: NotificationQueue;
  pollIntervalMs?: number;
  onOutcome?: (id: string, outcome: MonitorOutcome) => void;
};

export function createReminderId(): string {
  return `rem_${nanoid(12)}`;
}

/**
 * Owns monitor lifecycles and is the only place reminders are created,
 * edited or removed.
 */
export class SchedulerSupervisor {
  private readonly handles = new Map<string, MonitorHandle>();
  private readonly shutdownController = new AbortController();
  private readonly attached: Promise<unknown>[] = [];
  private shutdownPromise: Promise<boolean> | null = null;

  constructor(private readonly options: SupervisorOptions) {}

  /**
   * Aborted once, at shutdown. Observed by every monitor and the dispatcher.
   */
  get signal(): AbortSignal {
    return this.shutdownController.signal;
  }

  get monitorCount(): number {
    return this.handles.size;
  }

  hasMonitor(id: string): boolean {
    return this.handles.has(id);
  }

  /**
   * Registers a long-running task (the dispatcher loop) that shutdown waits for.
   */
  attach(task: Promise<unknown>): void {
    this.attached.push(task);
  }

  /**
   * Inserts reminders read from disk. Past-due ones are turned inactive
   * before anything can schedule them.
   */
  load(records: Reminder[]): LoadResult {
    const { store } = this.options;
    const expired: string[] = [];
    let scheduled = 0;

    // A repeated id keeps its last record
    const byId = new Map<string, Reminder>();
    for (const record of records) {
      if (byId.has(record.id)) {
        console.log(`[Supervisor] Duplicate id on load, keeping the later record: ${record.id}`);
        byId.delete(record.id);
      }
      byId.set(record.id, record);
    }

    for (const record of byId.values()) {
      let reminder = record;
      if (reminder.active && isDue(reminder.triggerAtIso)) {
        reminder = { ...reminder, active: false, updatedAtIso: getNowUtc() };
        expired.push(reminder.id);
        console.log(`[Supervisor] Expired on load: ${reminder.id} (${reminder.triggerAtIso})`);
      }

      store.upsert(reminder);
      if (this.spawn(reminder)) {
        scheduled++;
      }
    }

    console.log(
      `[Supervisor] Loaded ${byId.size} reminders: ` +
        `${scheduled} scheduled, ${expired.length} expired`,
    );
    return { loaded: byId.size, expired, scheduled };
  }

  /**
   * Creates a new reminder. One that is already due is stored inactive.
   */
  create(input: ReminderInput): Reminder {
    const nowIso = getNowUtc();
    const reminder = this.options.store.upsert({
      id: createReminderId(),
      title: input.title,
      description: input.description,
      triggerAtIso: input.triggerAtIso,
      active: !isDue(input.triggerAtIso),
      revision: 0,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    });

    this.spawn(reminder);
    console.log(`[Supervisor] Created ${reminder.id} for ${reminder.triggerAtIso}`);
    return reminder;
  }

  /**
   * Replaces title, description and trigger of an existing reminder and
   * schedules it afresh. The previous monitor is cancelled first.
   */
  update(id: string, input: ReminderInput): Reminder | null {
    const { store } = this.options;
    const existing = store.get(id);
    if (!existing) {
      return null;
    }

    this.cancel(id);

    const reminder = store.upsert({
      ...existing,
      title: input.title,
      description: input.description,
      triggerAtIso: input.triggerAtIso,
      active: !isDue(input.triggerAtIso),
      revision: existing.revision + 1,
      updatedAtIso: getNowUtc(),
    });

    this.spawn(reminder);
    console.log(`[Supervisor] Updated ${id} (revision ${reminder.revision})`);
    return reminder;
  }

  /**
   * Cancels the monitor and deletes the reminder in one step.
   */
  remove(id: string): Reminder | null {
    this.cancel(id);
    const removed = this.options.store.remove(id);
    if (removed) {
      console.log(`[Supervisor] Removed ${id}`);
    }
    return removed;
  }

  /**
   * Starts a monitor for an active reminder. Refuses when one is already
   * running for that id, or after shutdown.
   */
  spawn(reminder: Reminder): boolean {
    if (!reminder.active || this.signal.aborted) {
      return false;
    }

    if (this.handles.has(reminder.id)) {
      console.log(`[Supervisor] Monitor already running for ${reminder.id}`);
      return false;
    }

    const controller = new AbortController();
    const monitor = new ReminderMonitor(toMonitorTarget(reminder), {
      store: this.options.store,
      queue: this.options.queue,
      signal: controller.signal,
      pollIntervalMs: this.options.pollIntervalMs,
    });

    const done = monitor.run().then((outcome) => {
      if (this.handles.get(reminder.id)?.monitor === monitor) {
        this.handles.delete(reminder.id);
      }
      this.options.onOutcome?.(reminder.id, outcome);
      return outcome;
    });

    this.handles.set(reminder.id, { monitor, controller, done });
    return true;
  }

  /**
   * Signals the monitor for `id` to stop and forgets its handle.
   */
  cancel(id: string): boolean {
    const handle = this.handles.get(id);
    if (!handle) {
      return false;
    }

    handle.controller.abort();
    this.handles.delete(id);
    return true;
  }

  /**
   * Broadcasts cancellation and waits up to `graceMs` for every monitor and
   * attached task to exit. Resolves false if the wait timed out.
   */
  shutdown(graceMs: number = DEFAULT_SHUTDOWN_GRACE_MS): Promise<boolean> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stopAll(graceMs);
    }
    return this.shutdownPromise;
  }

  private async stopAll(graceMs: number): Promise<boolean> {
    console.log(`[Supervisor] Shutting down ${this.handles.size} monitors`);
    this.shutdownController.abort();

    const running = [...this.handles.values()];
    for (const handle of running) {
      handle.controller.abort();
    }

    const settled = Promise.allSettled([
      ...running.map((handle) => handle.done),
      ...this.attached,
    ]).then(() => true);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const clean = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    this.handles.clear();

    console.log(
      clean ? "[Supervisor] Shutdown complete" : `[Supervisor] Shutdown timed out after ${graceMs}ms`,
    );
    return clean;
  }
}
