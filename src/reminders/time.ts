import { DateTime } from "luxon";

export const DEFAULT_TIMEZONE = "Europe/Paris";

// Bot replies are English whatever the host locale is
const LOCALE = "en-GB";

/**
 * Format users type trigger times in, e.g. "2026-10-20 14:30".
 */
export const INPUT_FORMAT = "yyyy-MM-dd HH:mm";

/**
 * Gets the current UTC time as ISO string.
 */
export function getNowUtc(): string {
  return new Date().toISOString();
}

/**
 * Parses a local "yyyy-MM-dd HH:mm" string in the given zone.
 * Returns the UTC ISO instant, or null when the text does not match.
 */
export function parseLocalDateTime(text: string, zone: string = DEFAULT_TIMEZONE): string | null {
  const dt = DateTime.fromFormat(text.trim(), INPUT_FORMAT, { zone });
  if (!dt.isValid) {
    return null;
  }
  return dt.toUTC().toISO();
}

/**
 * Converts an ISO string to a DateTime in the given zone.
 */
export function toZonedDateTime(isoString: string, zone: string = DEFAULT_TIMEZONE): DateTime {
  return DateTime.fromISO(isoString).setZone(zone).setLocale(LOCALE);
}

/**
 * Formats an ISO datetime back into the input format, for prefilling edits.
 */
export function formatInputValue(isoString: string, zone: string = DEFAULT_TIMEZONE): string {
  return toZonedDateTime(isoString, zone).toFormat(INPUT_FORMAT);
}

/**
 * Formats an ISO datetime without the year.
 * Shows: today HH:mm, tomorrow HH:mm or ccc dd/MM HH:mm
 */
export function formatForUserNoYear(isoString: string, zone: string = DEFAULT_TIMEZONE): string {
  const now = DateTime.now().setZone(zone);
  const dt = toZonedDateTime(isoString, zone);
  const time = dt.toFormat("HH:mm");

  if (dt.hasSame(now, "day")) {
    return `today ${time}`;
  }

  const tomorrow = now.plus({ days: 1 });
  if (dt.hasSame(tomorrow, "day")) {
    return `tomorrow ${time}`;
  }

  const weekday = dt.toFormat("ccc");
  const date = dt.toFormat("dd/MM");
  return `${weekday} ${date} ${time}`;
}

/**
 * Formats an ISO datetime for display with relative terms (today/tomorrow).
 * - same local day as now => "today at HH:mm"
 * - next local day => "tomorrow at HH:mm"
 * - otherwise => "on weekday dd/MM/yyyy at HH:mm"
 */
export function formatForUserRelative(isoString: string, zone: string = DEFAULT_TIMEZONE): string {
  const now = DateTime.now().setZone(zone);
  const dt = toZonedDateTime(isoString, zone);
  const time = dt.toFormat("HH:mm");

  if (dt.hasSame(now, "day")) {
    return `today at ${time}`;
  }

  if (dt.hasSame(now.plus({ days: 1 }), "day")) {
    return `tomorrow at ${time}`;
  }

  return `on ${dt.toFormat("cccc dd/MM/yyyy")} at ${time}`;
}

/**
 * Formats just the time portion (HH:mm).
 */
export function formatTimeOnly(isoString: string, zone: string = DEFAULT_TIMEZONE): string {
  return toZonedDateTime(isoString, zone).toFormat("HH:mm");
}

/**
 * Milliseconds until the given instant. Zero or negative once it has passed.
 */
export function getDelayMs(isoString: string): number {
  return Date.parse(isoString) - Date.now();
}

/**
 * True once the instant has been reached.
 */
export function isDue(isoString: string): boolean {
  return getDelayMs(isoString) <= 0;
}
