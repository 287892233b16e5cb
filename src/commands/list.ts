import { type ReminderApp } from "../app";

/**
 * Handles the /list command.
 * Posts the reminder list; later store changes edit that message in place.
 */
export function handleList(app: ReminderApp) {
  app.ui.scheduleOnUIThread(() => app.listView.show(app.store.listAll()));
}
