import { InvalidInputError } from "./errors";
import { type ReminderInput } from "./schema";
import { DEFAULT_TIMEZONE, INPUT_FORMAT, isDue, parseLocalDateTime } from "./time";

export const INPUT_USAGE = `${INPUT_FORMAT.toUpperCase()} | Title | Description`;

/**
 * Parses "YYYY-MM-DD HH:MM | Title | Description" into a reminder input.
 * The description part is optional and may itself contain "|".
 * Throws InvalidInputError for an empty title, a malformed time or a time in the past.
 */
export function parseReminderInput(
  text: string,
  zone: string = DEFAULT_TIMEZONE,
): ReminderInput {
  const [when = "", title = "", ...rest] = text.split("|").map((part) => part.trim());
  const description = rest.join(" | ");

  if (!title) {
    throw new InvalidInputError("Title cannot be empty");
  }

  const triggerAtIso = parseLocalDateTime(when, zone);
  if (!triggerAtIso) {
    throw new InvalidInputError(
      `Invalid time format. Use ${INPUT_USAGE} (24-hour time)`,
    );
  }

  if (isDue(triggerAtIso)) {
    throw new InvalidInputError("You cannot set a reminder in the past.");
  }

  return { title, description, triggerAtIso };
}
