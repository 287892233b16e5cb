import { type Reminder } from "./schema";
import { type NotificationQueue } from "./queue";
import { type ReminderStore } from "./store";

// Monitors never sleep longer than this between checks
export const MAX_POLL_INTERVAL_MS = 1000;

export type MonitorOutcome = "fired" | "cancelled";

/**
 * What a monitor is bound to. Copied at spawn time; later edits to the
 * stored reminder do not change it.
 */
export type MonitorTarget = {
  id: string;
  triggerAtMs: number;
  revision: number;
};

export type MonitorOptions = {
  store: ReminderStore;
  queue: NotificationQueue;
  signal: AbortSignal;
  pollIntervalMs?: number;
};

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function toMonitorTarget(reminder: Reminder): MonitorTarget {
  return {
    id: reminder.id,
    triggerAtMs: Date.parse(reminder.triggerAtIso),
    revision: reminder.revision,
  };
}

/**
 * Watches one reminder until it is due, then fires it exactly once.
 *
 * The store's active flag is the arbiter: the monitor only enqueues a
 * notification if its own `setActive(id, false)` call flipped the flag for
 * the revision it was spawned with.
 */
export class ReminderMonitor {
  private readonly pollIntervalMs: number;

  constructor(
    readonly target: MonitorTarget,
    private readonly options: MonitorOptions,
  ) {
    this.pollIntervalMs = Math.min(
      Math.max(options.pollIntervalMs ?? MAX_POLL_INTERVAL_MS, 1),
      MAX_POLL_INTERVAL_MS,
    );
  }

  async run(): Promise<MonitorOutcome> {
    const { id } = this.target;
    try {
      return await this.watch();
    } catch (e) {
      console.error(`[Monitor] ${id} stopped on unexpected error:`, e);
      return "cancelled";
    }
  }

  private async watch(): Promise<MonitorOutcome> {
    const { id, triggerAtMs, revision } = this.target;
    const { store, signal } = this.options;

    if (Number.isNaN(triggerAtMs)) {
      console.error(`[Monitor] ${id} has no valid trigger time, stopping`);
      return "cancelled";
    }

    while (true) {
      if (signal.aborted) {
        console.log(`[Monitor] ${id} cancelled`);
        return "cancelled";
      }

      const current = store.get(id);
      if (!current || !current.active || current.revision !== revision) {
        console.log(`[Monitor] ${id} no longer scheduled, stopping`);
        return "cancelled";
      }

      const remainingMs = triggerAtMs - Date.now();
      if (remainingMs <= 0) {
        return this.fire();
      }

      await sleep(Math.min(remainingMs, this.pollIntervalMs), signal);
    }
  }

  private fire(): MonitorOutcome {
    const { id, revision } = this.target;
    const result = this.options.store.setActive(id, false, { revision });

    if (result.status !== "updated") {
      console.log(`[Monitor] ${id} not fired (${result.status})`);
      return "cancelled";
    }

    const { title, description } = result.reminder;
    this.options.queue.push({ title, description });
    console.log(`[Monitor] Fired ${id}`);
    return "fired";
  }
}
