import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidInputError } from "../src/reminders/errors";
import { parseReminderInput } from "../src/reminders/input";
import { T0 } from "./helpers";

describe("parseReminderInput", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reads time, title and description in the reminder timezone", () => {
    expect(parseReminderInput("2026-10-20 14:30 | Dentist | Bring the forms")).toEqual({
      title: "Dentist",
      description: "Bring the forms",
      triggerAtIso: "2026-10-20T12:30:00.000Z",
    });
  });

  it("uses winter time after the clocks go back", () => {
    expect(parseReminderInput("2026-10-26 09:00 | Standup").triggerAtIso).toBe(
      "2026-10-26T08:00:00.000Z",
    );
  });

  it("honours another zone", () => {
    expect(parseReminderInput("2026-10-20 09:00 | Call", "UTC").triggerAtIso).toBe(
      "2026-10-20T09:00:00.000Z",
    );
  });

  it("treats the description as optional", () => {
    expect(parseReminderInput("2026-10-20 14:30 | Dentist").description).toBe("");
  });

  it("keeps pipes inside the description", () => {
    expect(parseReminderInput("2026-10-20 14:30|Dentist|forms|ID card").description).toBe(
      "forms | ID card",
    );
  });

  it("rejects an empty title", () => {
    expect(() => parseReminderInput("2026-10-20 14:30 |   ")).toThrow(
      new InvalidInputError("Title cannot be empty"),
    );
  });

  it("rejects a malformed time", () => {
    expect(() => parseReminderInput("tomorrow 9am | Dentist")).toThrow(
      "Invalid time format. Use YYYY-MM-DD HH:MM | Title | Description (24-hour time)",
    );
    expect(() => parseReminderInput("2026-10-20 25:00 | Dentist")).toThrow(InvalidInputError);
  });

  it("rejects a time that is not in the future", () => {
    expect(() => parseReminderInput("2026-10-19 11:59 | Too late")).toThrow(
      "You cannot set a reminder in the past.",
    );
    expect(() => parseReminderInput("2026-10-19 12:00 | Right now")).toThrow(
      "You cannot set a reminder in the past.",
    );
  });
});
