import { type Reminder } from "./schema";

export type SetActiveResult =
  | { status: "updated"; reminder: Reminder }
  | { status: "unchanged"; reminder: Reminder }
  | { status: "stale"; reminder: Reminder }
  | { status: "notFound" };

export type StoreListener = (snapshot: Reminder[]) => void;

/**
 * Single source of truth for reminders.
 *
 * Every operation runs synchronously to completion, so calls are totally
 * ordered on the event loop and nobody observes a half-applied mutation.
 * Records go in and come out as copies; callers never hold the stored object.
 * Successful mutations notify subscribers with a fresh snapshot.
 */
export class ReminderStore {
  private readonly reminders = new Map<string, Reminder>();
  private readonly listeners = new Set<StoreListener>();

  /**
   * Inserts or replaces a reminder by ID.
   */
  upsert(record: Reminder): Reminder {
    this.reminders.set(record.id, { ...record });
    this.notify();
    return { ...record };
  }

  /**
   * Gets a reminder by ID.
   */
  get(id: string): Reminder | null {
    const reminder = this.reminders.get(id);
    return reminder ? { ...reminder } : null;
  }

  /**
   * Removes a reminder by ID, returning what was removed.
   */
  remove(id: string): Reminder | null {
    const reminder = this.reminders.get(id);
    if (!reminder) {
      return null;
    }

    this.reminders.delete(id);
    this.notify();
    return { ...reminder };
  }

  /**
   * Point-in-time copy of all reminders, earliest trigger first.
   */
  listAll(): Reminder[] {
    return [...this.reminders.values()]
      .map((r) => ({ ...r }))
      .sort((a, b) => Date.parse(a.triggerAtIso) - Date.parse(b.triggerAtIso));
  }

  /**
   * Flips the active flag.
   *
   * With `revision`, the write only happens if the stored record still has
   * that revision; monitors use this so that a firing scheduled before an
   * edit cannot land on the edited record.
   */
  setActive(
    id: string,
    active: boolean,
    options: { revision?: number } = {},
  ): SetActiveResult {
    const reminder = this.reminders.get(id);
    if (!reminder) {
      return { status: "notFound" };
    }

    if (options.revision !== undefined && reminder.revision !== options.revision) {
      return { status: "stale", reminder: { ...reminder } };
    }

    if (reminder.active === active) {
      return { status: "unchanged", reminder: { ...reminder } };
    }

    const updated: Reminder = {
      ...reminder,
      active,
      updatedAtIso: new Date().toISOString(),
    };
    this.reminders.set(id, updated);
    this.notify();
    return { status: "updated", reminder: { ...updated } };
  }

  get size(): number {
    return this.reminders.size;
  }

  /**
   * Registers a change listener. Returns the unsubscribe function.
   */
  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) {
      return;
    }

    const snapshot = this.listAll();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (e) {
        console.error("[Store] Change listener failed:", e);
      }
    }
  }
}
