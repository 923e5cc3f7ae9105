import fs from "fs/promises";
import path from "path";
import type { SegmentEntry } from "../types/labeling";
import type { LabelingConfig } from "../types/labelingConfig";
import { malformedInput } from "../utils/labelingError";
import { parseSegmentStartTime } from "../utils/parseTimestamp";

export async function listSegmentFiles(
  filesDir: string,
  extensions: readonly string[],
): Promise<string[]> {
  const dirents = await fs.readdir(filesDir, { withFileTypes: true });
  return dirents
    .filter((d) => d.isFile() && extensions.includes(path.extname(d.name).toLowerCase()))
    .map((d) => d.name)
    .sort();
}

/** Segment files in `filesDir` paired with the start time in their names. */
export async function discoverSegments(
  filesDir: string,
  config: Pick<LabelingConfig, "segmentExtensions" | "timeZone">,
): Promise<SegmentEntry[]> {
  const names = await listSegmentFiles(filesDir, config.segmentExtensions);
  return names.map((name) => {
    const startTime = parseSegmentStartTime(name, config.timeZone);
    if (startTime == null) {
      throw malformedInput(`cannot parse a start time from segment file name "${name}"`);
    }
    return { filename: path.join(filesDir, name), startTime };
  });
}
