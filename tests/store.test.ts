import { describe, expect, it, vi } from "vitest";
import { ReminderStore } from "../src/reminders/store";
import { makeReminder } from "./helpers";

describe("ReminderStore", () => {
  it("returns copies, never the stored record", () => {
    const store = new ReminderStore();
    store.upsert(makeReminder({ id: "rem_a" }));

    const fetched = store.get("rem_a");
    expect(fetched?.title).toBe("Water the plants");
    if (fetched) {
      fetched.title = "changed";
    }

    expect(store.get("rem_a")?.title).toBe("Water the plants");
  });

  it("reports missing ids as null", () => {
    const store = new ReminderStore();
    expect(store.get("rem_missing")).toBeNull();
    expect(store.remove("rem_missing")).toBeNull();
  });

  it("removes and returns the record", () => {
    const store = new ReminderStore();
    store.upsert(makeReminder({ id: "rem_a", title: "Pay rent" }));

    expect(store.remove("rem_a")?.title).toBe("Pay rent");
    expect(store.get("rem_a")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("hands out a copy of the removed record", () => {
    const store = new ReminderStore();
    store.upsert(makeReminder({ id: "rem_a" }));
    const mapGet = vi.spyOn(Map.prototype, "get");

    const removed = store.remove("rem_a");
    const stored: unknown = mapGet.mock.results[0]?.value;

    expect(removed).toEqual(stored);
    expect(removed).not.toBe(stored);
  });

  it("lists a sorted snapshot that later writes do not touch", () => {
    const store = new ReminderStore();
    store.upsert(makeReminder({ id: "rem_late", triggerAtIso: "2026-10-21T08:00:00.000Z" }));
    store.upsert(makeReminder({ id: "rem_early", triggerAtIso: "2026-10-20T08:00:00.000Z" }));

    const snapshot = store.listAll();
    store.remove("rem_late");
    store.upsert(makeReminder({ id: "rem_new" }));

    expect(snapshot.map((r) => r.id)).toEqual(["rem_early", "rem_late"]);
  });

  describe("setActive", () => {
    it("flips the flag once", () => {
      const store = new ReminderStore();
      store.upsert(makeReminder({ id: "rem_a" }));

      const first = store.setActive("rem_a", false);
      const second = store.setActive("rem_a", false);

      expect(first.status).toBe("updated");
      expect(first.status === "updated" && first.reminder.active).toBe(false);
      expect(second.status).toBe("unchanged");
      expect(store.get("rem_a")?.active).toBe(false);
    });

    it("returns notFound for an unknown id", () => {
      const store = new ReminderStore();
      expect(store.setActive("rem_missing", false)).toEqual({ status: "notFound" });
    });

    it("refuses a write for another revision", () => {
      const store = new ReminderStore();
      store.upsert(makeReminder({ id: "rem_a", revision: 2 }));

      const result = store.setActive("rem_a", false, { revision: 1 });

      expect(result.status).toBe("stale");
      expect(store.get("rem_a")?.active).toBe(true);
    });
  });

  describe("subscribe", () => {
    it("notifies on every successful mutation", () => {
      const store = new ReminderStore();
      const listener = vi.fn();
      store.subscribe(listener);

      store.upsert(makeReminder({ id: "rem_a" }));
      store.setActive("rem_a", false);
      store.setActive("rem_a", false); // unchanged
      store.remove("rem_missing");
      store.remove("rem_a");

      expect(listener).toHaveBeenCalledTimes(3);
      expect(listener).toHaveBeenLastCalledWith([]);
    });

    it("stops after unsubscribe", () => {
      const store = new ReminderStore();
      const listener = vi.fn();
      const unsubscribe = store.subscribe(listener);

      unsubscribe();
      store.upsert(makeReminder());

      expect(listener).not.toHaveBeenCalled();
    });

    it("keeps the mutation when a listener throws", () => {
      const store = new ReminderStore();
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const after = vi.fn();
      store.subscribe(() => {
        throw new Error("listener broke");
      });
      store.subscribe(after);

      store.upsert(makeReminder({ id: "rem_a" }));

      expect(store.get("rem_a")).not.toBeNull();
      expect(after).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
