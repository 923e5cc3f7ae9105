import fs from "fs/promises";
import path from "path";
import type { EventRecord } from "../types/labeling";
import type { TimeZoneMode } from "../types/labelingConfig";
import { eventTypeFromLogName, parseEventLog } from "../utils/parseEventLog";

const LOG_EXTENSION = ".txt";

/** Every `*.txt` file in the directory is one event type's log. */
export async function readEventLogs(
  filesDir: string,
  timeZone: TimeZoneMode,
): Promise<EventRecord[]> {
  const dirents = await fs.readdir(filesDir, { withFileTypes: true });
  const logNames = dirents
    .filter((d) => d.isFile() && path.extname(d.name).toLowerCase() === LOG_EXTENSION)
    .map((d) => d.name)
    .sort();

  const records: EventRecord[] = [];
  for (const name of logNames) {
    const text = await fs.readFile(path.join(filesDir, name), "utf8");
    records.push(...parseEventLog(text, eventTypeFromLogName(name), timeZone));
  }
  return records;
}
