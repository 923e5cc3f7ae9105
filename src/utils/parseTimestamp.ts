import type { EpochSeconds } from "../types/labeling";
import type { TimeZoneMode } from "../types/labelingConfig";

// Log lines:       20230601_120005
// Segment stems:   2023-06-01 12:00:05.123456  (sub-second suffix dropped)
const LOG_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;
const FILE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function matchWallClock(pattern: RegExp, text: string): WallClock | null {
  const m = pattern.exec(text);
  if (!m) return null;
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  return { year, month, day, hour, minute, second };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toEpochSeconds(c: WallClock, timeZone: TimeZoneMode): EpochSeconds | null {
  if (c.month < 1 || c.month > 12) return null;
  if (c.day < 1 || c.day > daysInMonth(c.year, c.month)) return null;
  if (c.hour > 23 || c.minute > 59 || c.second > 59) return null;

  const ms =
    timeZone === "utc"
      ? Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second)
      : new Date(c.year, c.month - 1, c.day, c.hour, c.minute, c.second).getTime();
  return Math.floor(ms / 1000);
}

export function parseLogTimestamp(
  text: string,
  timeZone: TimeZoneMode,
): EpochSeconds | null {
  const clock = matchWallClock(LOG_TIMESTAMP, text.trim());
  return clock ? toEpochSeconds(clock, timeZone) : null;
}

/**
 * Start time encoded in a segment file name. Accepts a bare name or a path;
 * everything from the first "." of the base name on is ignored.
 */
export function parseSegmentStartTime(
  filename: string,
  timeZone: TimeZoneMode,
): EpochSeconds | null {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const stem = base.split(".")[0];
  const clock = matchWallClock(FILE_TIMESTAMP, stem);
  return clock ? toEpochSeconds(clock, timeZone) : null;
}

export function formatLogTimestamp(
  seconds: EpochSeconds,
  timeZone: TimeZoneMode,
): string {
  const d = new Date(seconds * 1000);
  const utc = timeZone === "utc";
  const pad = (n: number) => String(n).padStart(2, "0");
  const year = utc ? d.getUTCFullYear() : d.getFullYear();
  const month = utc ? d.getUTCMonth() + 1 : d.getMonth() + 1;
  const day = utc ? d.getUTCDate() : d.getDate();
  const hour = utc ? d.getUTCHours() : d.getHours();
  const minute = utc ? d.getUTCMinutes() : d.getMinutes();
  const second = utc ? d.getUTCSeconds() : d.getSeconds();
  return `${year}${pad(month)}${pad(day)}_${pad(hour)}${pad(minute)}${pad(second)}`;
}
