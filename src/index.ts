import { Telegraf } from "telegraf";
import { createReminderApp } from "./app";
import { commandArgs, handleAdd } from "./commands/add";
import {
  EDIT_PREFIX,
  cancelPendingEdit,
  handleEdit,
  handleEditStart,
  hasPendingEdit,
  processEdit,
} from "./commands/edit";
import { handleHelp } from "./commands/help";
import { handleList } from "./commands/list";
import { REMOVE_PREFIX, handleRemove, handleRemoveCallback } from "./commands/remove";
import { loadConfig } from "./config";
import { loadDotEnvFiles } from "./env";
import { DISMISS_PREFIX } from "./telegram/ui";

// Initialize environment
loadDotEnvFiles();
const config = loadConfig();

const bot = new Telegraf(config.botToken);
const app = createReminderApp(config, { api: bot.telegram });

// Only the configured chat is served
bot.use(async (ctx, next) => {
  if (ctx.chat?.id !== config.chatId) {
    console.log(`[Bot] Ignoring update from chat ${ctx.chat?.id ?? "unknown"}`);
    return;
  }
  await next();
});

// Command handlers
bot.command("help", () => handleHelp(app));
bot.command("start", () => handleHelp(app));
bot.command("list", () => handleList(app));
bot.command("edit", () => handleEdit(app));
bot.command("remove", () => handleRemove(app));

bot.command("add", (ctx) => {
  handleAdd(app, commandArgs(ctx.message.text));
});

bot.command("cancel", () => {
  app.ui.post(cancelPendingEdit() ? "Edit cancelled." : "Nothing to cancel.");
});

// Handle text messages
bot.on("text", async (ctx, next) => {
  const text = ctx.message.text;

  // Pass to next middleware (command handlers) for messages starting with "/"
  if (text.startsWith("/")) {
    return next();
  }

  if (hasPendingEdit()) {
    processEdit(app, text);
    return;
  }

  handleAdd(app, text);
});

// Callback query handler for inline buttons
bot.on("callback_query", async (ctx) => {
  const callbackQuery = ctx.callbackQuery;

  // Handle only callback queries with data (not game queries)
  if (!("data" in callbackQuery) || !callbackQuery.data) {
    return;
  }

  await ctx.answerCbQuery();

  const data = callbackQuery.data;
  const messageId = callbackQuery.message?.message_id;

  if (data.startsWith(REMOVE_PREFIX)) {
    handleRemoveCallback(app, data.slice(REMOVE_PREFIX.length), messageId);
  } else if (data.startsWith(EDIT_PREFIX)) {
    handleEditStart(app, data.slice(EDIT_PREFIX.length), messageId);
  } else if (data.startsWith(DISMISS_PREFIX)) {
    const alertId = data.slice(DISMISS_PREFIX.length);
    app.ui.scheduleOnUIThread(() => app.ui.dismiss(alertId));
  }
});

/**
 * Catches middleware errors that aren't caught by specific handlers.
 */
bot.catch((err, ctx) => {
  console.error("[Bot] Telegraf error", err);
  if (ctx.chat?.id === config.chatId) {
    app.ui.post("An error occurred while processing your request.");
  }
});

/**
 * Wraps a promise with a timeout.
 */
function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    p.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

let stopping = false;

/**
 * Stops monitors and the dispatcher, flushes pending writes, then stops polling.
 */
async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;

  console.log(`Received ${signal}, shutting down...`);
  try {
    bot.stop(signal);
  } catch (e) {
    // Telegraf throws when polling never started
    console.error("Could not stop polling:", e);
  }
  await app.stop();
  console.log("Bye");
}

/**
 * Main async function that starts the bot with proper error handling and logging.
 */
async function main() {
  console.log("Starting bot...");

  // Step 1: Validate Telegram token by getting bot info
  console.log("Validating Telegram token...");
  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "getMe");
  console.log(`Token validated for @${botInfo.username}`);

  // Step 2: Load saved reminders and start the scheduling core
  const loaded = await app.start();
  console.log(
    `Scheduler initialized: ${loaded.scheduled} scheduled, ${loaded.expired.length} expired`,
  );

  // Step 3: Launch polling (DO NOT await - polling runs until bot.stop())
  console.log("Launching polling...");
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error("Failed to launch polling:", err);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exitCode = 1;
    shutdown("launch failure").catch(console.error);
  });

  process.once("SIGINT", () => {
    shutdown("SIGINT").catch(console.error);
  });
  process.once("SIGTERM", () => {
    shutdown("SIGTERM").catch(console.error);
  });
}

// Run main function - this will initialize everything
main().catch((err) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});
