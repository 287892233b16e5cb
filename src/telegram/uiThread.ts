/**
 * Serial executor for everything that touches the chat.
 *
 * Tasks run one at a time in submission order, each starting only after the
 * previous one settled, so message edits never interleave. A failing task is
 * logged and the queue moves on.
 */
export class UiThread {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  schedule(task: () => void | Promise<void>): void {
    this.pending++;
    this.tail = this.tail
      .then(task)
      .catch((e) => {
        console.error("[UI] Task failed:", e);
      })
      .finally(() => {
        this.pending--;
      });
  }

  get pendingCount(): number {
    return this.pending;
  }

  /**
   * Resolves once every task scheduled so far has run.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
