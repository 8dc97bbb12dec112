// backend/src/callbackTime.ts
// Callback intent detection and time-phrase parsing for post-call summaries

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const TOMORROW_AT = /\btomorrow\s+(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i;
const TODAY_AT = /\b(?:today\s+)?(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i;
const IN_DURATION = /\bin\s+(\d+)\s*(hours?|hrs?|minutes?|mins?)\b/i;
const WEEKDAY = new RegExp(`\\b(${WEEKDAYS.join("|")})\\b`, "i");

const DEFAULT_DELAY_MS = 24 * 60 * 60 * 1000;
const WEEKDAY_CALLBACK_HOUR = 10;

export type CallbackRule = "tomorrow_at" | "today_at" | "relative" | "weekday" | "default";

export interface CallbackTime {
  at: Date;
  rule: CallbackRule;
}

/**
 * Check whether free text asks for a callback.
 *
 * @param text - Call summary and structured field values
 * @param keywords - Lowercase phrases, e.g. "call me back"
 */
export function detectCallbackIntent(text: string, keywords: string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword));
}

function to24Hour(hour: number, meridiem: string): number | null {
  if (hour < 1 || hour > 12) {
    return null;
  }
  const base = hour % 12;
  return meridiem.toLowerCase() === "pm" ? base + 12 : base;
}

function atClock(day: Date, hours: number, minutes: number): Date {
  const result = new Date(day);
  result.setHours(hours, minutes, 0, 0);
  return result;
}

function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * Resolve a callback time from free text. First matching rule wins:
 * 1. "tomorrow [at] H[:MM] am|pm"
 * 2. "[today] [at] H[:MM] am|pm", rolled to tomorrow if already past
 * 3. "in N hours|minutes"
 * 4. a weekday name, next occurrence at 10:00 (a week ahead if it is today)
 * 5. now + 24h
 *
 * Never throws. Uses the local clock of `now`.
 */
export function parseCallbackTime(text: string, now: Date = new Date()): CallbackTime {
  const tomorrow = TOMORROW_AT.exec(text);
  if (tomorrow) {
    const hours = to24Hour(Number(tomorrow[1]), tomorrow[3]);
    const minutes = tomorrow[2] ? Number(tomorrow[2]) : 0;
    if (hours !== null && minutes < 60) {
      return { at: atClock(addDays(now, 1), hours, minutes), rule: "tomorrow_at" };
    }
  }

  const today = TODAY_AT.exec(text);
  if (today) {
    const hours = to24Hour(Number(today[1]), today[3]);
    const minutes = today[2] ? Number(today[2]) : 0;
    if (hours !== null && minutes < 60) {
      let at = atClock(now, hours, minutes);
      if (at.getTime() <= now.getTime()) {
        at = addDays(at, 1);
      }
      return { at, rule: "today_at" };
    }
  }

  const relative = IN_DURATION.exec(text);
  if (relative) {
    const amount = Number(relative[1]);
    const unitMs = relative[2].toLowerCase().startsWith("h") ? 60 * 60 * 1000 : 60 * 1000;
    return { at: new Date(now.getTime() + amount * unitMs), rule: "relative" };
  }

  const weekday = WEEKDAY.exec(text);
  if (weekday) {
    const target = WEEKDAYS.indexOf(weekday[1].toLowerCase());
    let daysAhead = (target - now.getDay() + 7) % 7;
    if (daysAhead === 0) {
      daysAhead = 7;
    }
    return { at: atClock(addDays(now, daysAhead), WEEKDAY_CALLBACK_HOUR, 0), rule: "weekday" };
  }

  return { at: new Date(now.getTime() + DEFAULT_DELAY_MS), rule: "default" };
}
