import { PlaybackError } from "./errors";
import { type NotificationEvent } from "./schema";
import { type NotificationQueue } from "./queue";

export const DEFAULT_ALERT_DISMISS_MS = 5000;
export const DEFAULT_POP_TIMEOUT_MS = 1000;

/**
 * The single-writer surface alerts are shown on.
 * Abstracts away Telegram-specific details.
 */
export interface UiCollaborator<THandle> {
  /** Queues work on the UI context. Returns immediately. */
  scheduleOnUIThread(task: () => void | Promise<void>): void;
  presentAlert(title: string, description: string): Promise<THandle>;
  /** Must tolerate handles that were already dismissed. */
  dismiss(handle: THandle): Promise<void>;
}

export interface AudioCollaborator {
  playAsync(soundRef: string, signal?: AbortSignal): Promise<void>;
}

export type DispatcherOptions<THandle> = {
  queue: NotificationQueue;
  ui: UiCollaborator<THandle>;
  audio: AudioCollaborator;
  soundRef?: string;
  alertDismissMs?: number;
  popTimeoutMs?: number;
};

/**
 * Drains the notification queue and performs delivery.
 *
 * Delivery never blocks the drain: audio is started and left running, and the
 * alert is handed to the UI thread.
 */
export class NotificationDispatcher<THandle> {
  private readonly alertDismissMs: number;
  private readonly popTimeoutMs: number;
  private readonly pendingDismissals = new Map<ReturnType<typeof setTimeout>, THandle>();
  private delivered = 0;

  constructor(private readonly options: DispatcherOptions<THandle>) {
    this.alertDismissMs = options.alertDismissMs ?? DEFAULT_ALERT_DISMISS_MS;
    this.popTimeoutMs = options.popTimeoutMs ?? DEFAULT_POP_TIMEOUT_MS;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  /**
   * Runs until the signal aborts.
   */
  async start(signal: AbortSignal): Promise<void> {
    console.log("[Dispatcher] Started");
    while (!signal.aborted) {
      try {
        const event = await this.options.queue.pop(this.popTimeoutMs, signal);
        if (event) {
          this.deliver(event, signal);
        }
      } catch (e) {
        console.error("[Dispatcher] Delivery failed:", e);
      }
    }
    this.dismissPending();
    console.log(`[Dispatcher] Stopped after ${this.delivered} notifications`);
  }

  private deliver(event: NotificationEvent, signal: AbortSignal): void {
    this.delivered++;
    console.log(`[Dispatcher] Delivering "${event.title}"`);

    this.playSound(signal);

    const { ui } = this.options;
    ui.scheduleOnUIThread(async () => {
      const handle = await ui.presentAlert(event.title, event.description);
      if (signal.aborted) {
        await ui.dismiss(handle);
        return;
      }
      const timer = setTimeout(() => {
        this.pendingDismissals.delete(timer);
        ui.scheduleOnUIThread(() => ui.dismiss(handle));
      }, this.alertDismissMs);
      this.pendingDismissals.set(timer, handle);
    });
  }

  private playSound(signal: AbortSignal): void {
    const { soundRef, audio } = this.options;
    if (!soundRef) {
      return;
    }

    const report = (e: unknown) => {
      console.error(`[Dispatcher] ${new PlaybackError(soundRef, e).message}`);
    };

    try {
      audio.playAsync(soundRef, signal).catch(report);
    } catch (e) {
      report(e);
    }
  }

  private dismissPending(): void {
    const { ui } = this.options;
    for (const [timer, handle] of this.pendingDismissals) {
      clearTimeout(timer);
      ui.scheduleOnUIThread(() => ui.dismiss(handle));
    }
    this.pendingDismissals.clear();
  }
}
