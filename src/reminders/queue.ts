import { type NotificationEvent } from "./schema";

type Waiter = (event: NotificationEvent | null) => void;

/**
 * Unbounded FIFO between the monitors (producers) and the dispatcher
 * (consumer). Events come out in the order they were pushed, i.e. firing order.
 */
export class NotificationQueue {
  private readonly events: NotificationEvent[] = [];
  private readonly waiters: Waiter[] = [];

  /**
   * Never blocks. Hands the event straight to a waiting consumer if there is one.
   */
  push(event: NotificationEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    this.events.push(event);
  }

  /**
   * Resolves with the oldest event, or null once `timeoutMs` elapses or the
   * signal aborts.
   */
  pop(timeoutMs: number, signal?: AbortSignal): Promise<NotificationEvent | null> {
    const next = this.events.shift();
    if (next) {
      return Promise.resolve(next);
    }

    if (signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const settle: Waiter = (event) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };

      const withdraw = () => {
        const index = this.waiters.indexOf(settle);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        settle(null);
      };

      const onAbort = () => withdraw();
      const timer = setTimeout(withdraw, timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });

      this.waiters.push(settle);
    });
  }

  get size(): number {
    return this.events.length;
  }
}
