import { z } from "zod";

/**
 * A single reminder as held by the store and written to disk.
 */
export const ReminderSchema = z.object({
  id: z.string().min(1), // stable identifier
  title: z.string().min(1),
  description: z.string(),
  triggerAtIso: z.string().datetime({ offset: true }), // instant the reminder fires
  active: z.boolean(),
  revision: z.number().int().nonnegative(), // bumped on every edit
  createdAtIso: z.string(),
  updatedAtIso: z.string(),
});

export type Reminder = z.infer<typeof ReminderSchema>;

/**
 * What the user supplies when creating or editing a reminder.
 */
export type ReminderInput = {
  title: string;
  description: string;
  triggerAtIso: string;
};

/**
 * Delivered once per firing. Carries no reference back to the reminder.
 */
export type NotificationEvent = Readonly<{
  title: string;
  description: string;
}>;

export const CURRENT_REMINDERS_VERSION = 1;

/**
 * The reminders file structure
 */
export const RemindersFileSchema = z.object({
  version: z.literal(CURRENT_REMINDERS_VERSION),
  timezone: z.string(),
  reminders: z.array(ReminderSchema),
});

export type RemindersFile = z.infer<typeof RemindersFileSchema>;
