import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config";
import { parseDotEnv } from "../src/env";

const VARS = [
  "TELEGRAM_BOT_TOKEN",
  "TELEGRAM_CHAT_ID",
  "REMINDERS_FILE",
  "REMINDER_SOUND_FILE",
  "REMINDER_TIMEZONE",
  "REMINDER_POLL_INTERVAL_MS",
  "ALERT_DISMISS_MS",
];

describe("loadConfig", () => {
  beforeEach(() => {
    for (const name of VARS) {
      vi.stubEnv(name, "");
    }
    vi.stubEnv("TELEGRAM_BOT_TOKEN", "test-token");
    vi.stubEnv("TELEGRAM_CHAT_ID", "4242");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("fills in defaults", () => {
    expect(loadConfig()).toEqual({
      botToken: "test-token",
      chatId: 4242,
      remindersFile: "./reminders.json",
      soundFile: undefined,
      timezone: "Europe/Paris",
      pollIntervalMs: 1000,
      alertDismissMs: 5000,
    });
  });

  it("reads overrides", () => {
    vi.stubEnv("REMINDERS_FILE", "/data/reminders.json");
    vi.stubEnv("REMINDER_SOUND_FILE", "./sounds/bell.ogg");
    vi.stubEnv("REMINDER_TIMEZONE", "UTC");
    vi.stubEnv("REMINDER_POLL_INTERVAL_MS", "250");
    vi.stubEnv("ALERT_DISMISS_MS", "8000");

    expect(loadConfig()).toMatchObject({
      remindersFile: "/data/reminders.json",
      soundFile: "./sounds/bell.ogg",
      timezone: "UTC",
      pollIntervalMs: 250,
      alertDismissMs: 8000,
    });
  });

  it("caps the poll interval at one second", () => {
    vi.stubEnv("REMINDER_POLL_INTERVAL_MS", "5000");
    expect(loadConfig().pollIntervalMs).toBe(1000);
  });

  it("requires the bot token", () => {
    vi.stubEnv("TELEGRAM_BOT_TOKEN", "");
    expect(() => loadConfig()).toThrow("Could not find env var 'TELEGRAM_BOT_TOKEN'");
  });

  it("requires a numeric chat id", () => {
    vi.stubEnv("TELEGRAM_CHAT_ID", "my-chat");
    expect(() => loadConfig()).toThrow(
      "Expected 'TELEGRAM_CHAT_ID' to be a number, but it's not: 'my-chat'",
    );
  });
});

describe("parseDotEnv", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reminders-env-"));
    vi.stubEnv("REMINDER_TIMEZONE", "UTC");
    vi.stubEnv("REMINDERS_FILE", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fills only variables that are not already set", () => {
    const file = path.join(dir, ".env");
    fs.writeFileSync(
      file,
      "# local settings\n\nREMINDER_TIMEZONE=Europe/Paris\nREMINDERS_FILE = ./data/reminders.json\n",
    );

    parseDotEnv(file);

    expect(process.env.REMINDER_TIMEZONE).toBe("UTC");
    expect(process.env.REMINDERS_FILE).toBe("./data/reminders.json");
  });

  it("rejects a line without a value", () => {
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, "REMINDER_TIMEZONE\n");

    expect(() => parseDotEnv(file)).toThrow("Invalid line in .env file: REMINDER_TIMEZONE");
  });
});
