import type { EventRecord } from "../types/labeling";
import type { TimeZoneMode } from "../types/labelingConfig";
import { malformedInput } from "./labelingError";
import { parseLogTimestamp } from "./parseTimestamp";

/** One `YYYYMMDD_HHMMSS` timestamp per line; blank lines are ignored. */
export function parseEventLog(
  text: string,
  eventType: string,
  timeZone: TimeZoneMode,
): EventRecord[] {
  const records: EventRecord[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i].trim();
    if (raw === "") continue;
    const startTime = parseLogTimestamp(raw, timeZone);
    if (startTime == null) {
      throw malformedInput(
        `${eventType} line ${i + 1}: cannot parse timestamp "${raw}"`,
      );
    }
    records.push({ eventType, startTime });
  }
  return records;
}

/** Event type a log file stands for: its name without the extension. */
export function eventTypeFromLogName(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}
