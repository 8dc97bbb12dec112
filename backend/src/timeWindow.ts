// backend/src/timeWindow.ts
// Calling-hours guard for the orchestration sweep

export interface CallWindow {
  start: string; // HH:mm
  end: string; // HH:mm
  timezone: string;
}

/**
 * Parse HH:mm time string to minutes from midnight
 * @returns minutes, or null if invalid
 */
export function parseTimeString(timeStr: string): number | null {
  const parts = timeStr.split(":");
  if (parts.length !== 2) return null;
  const hour = parseInt(parts[0], 10);
  const minute = parseInt(parts[1], 10);
  if (isNaN(hour) || isNaN(minute) || hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    return null;
  }
  return hour * 60 + minute;
}

function minutesInZone(now: Date, timezone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);
  const hour = Number(parts.find((part) => part.type === "hour")?.value ?? "0");
  const minute = Number(parts.find((part) => part.type === "minute")?.value ?? "0");
  return hour * 60 + minute;
}

/**
 * Check if a moment falls inside the configured call window.
 * A null window, or one with unparseable bounds, always allows calling.
 * Windows that cross midnight (e.g. 22:00-02:00) are supported.
 */
export function isWithinCallWindow(window: CallWindow | null, now: Date = new Date()): boolean {
  if (!window) return true;

  const start = parseTimeString(window.start);
  const end = parseTimeString(window.end);
  if (start === null || end === null) return true;

  const current = minutesInZone(now, window.timezone);
  if (start <= end) {
    return current >= start && current <= end;
  }
  return current >= start || current <= end;
}
