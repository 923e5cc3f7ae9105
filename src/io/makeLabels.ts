import fs from "fs/promises";
import path from "path";
import type { LabelingConfig } from "../types/labelingConfig";
import { buildEventTimeline } from "../utils/eventTimeline";
import { alignEvents } from "../utils/frameAlignment";
import { assembleLabelTable, formatLabelCsv } from "../utils/labelTable";
import { malformedInput } from "../utils/labelingError";
import { parseFrameCounts } from "../utils/parseFrameCounts";
import { buildSegmentTimeline } from "../utils/segmentTimeline";
import { discoverSegments } from "./discoverSegments";
import { readEventLogs } from "./readEventLogs";

export interface MakeLabelsResult {
  segments: number;
  events: number;
  rows: number;
  outputPath: string;
}

async function fileExists(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function assertInputs(filesDir: string, config: LabelingConfig): Promise<void> {
  const required = [...config.requiredLogs, config.countsFile];
  const missing: string[] = [];
  for (const name of required) {
    if (!(await fileExists(path.join(filesDir, name)))) missing.push(name);
  }
  if (missing.length > 0) {
    throw malformedInput(`${filesDir} is missing ${missing.join(", ")}`);
  }
}

export function resolveOutputPath(filesDir: string, config: LabelingConfig): string {
  return path.isAbsolute(config.outputFile)
    ? config.outputFile
    : path.join(filesDir, config.outputFile);
}

/**
 * Read a capture directory (segment files, event logs, frame counts) and
 * write its label table. Every input is read and aligned before anything is
 * written; a failure leaves no output behind.
 */
export async function makeLabels(
  filesDir: string,
  config: LabelingConfig,
): Promise<MakeLabelsResult> {
  await assertInputs(filesDir, config);

  const counts = parseFrameCounts(
    await fs.readFile(path.join(filesDir, config.countsFile), "utf8"),
  );
  const entries = await discoverSegments(filesDir, config);
  const frameCounts = new Map<string, number>(
    entries.flatMap((entry) => {
      const frames = counts.get(path.basename(entry.filename));
      return frames === undefined ? [] : [[entry.filename, frames] as const];
    }),
  );
  const records = await readEventLogs(filesDir, config.timeZone);

  const segmentTimeline = buildSegmentTimeline(entries, frameCounts, config.frameRate);
  const eventTimeline = buildEventTimeline(records, segmentTimeline, config.timeZone);
  const rows = assembleLabelTable(
    alignEvents(eventTimeline, segmentTimeline, {
      spannedEndFrame: config.spannedEndFrame,
      timeZone: config.timeZone,
    }),
  );

  const outputPath = resolveOutputPath(filesDir, config);
  await fs.writeFile(outputPath, formatLabelCsv(rows), "utf8");

  return {
    segments: segmentTimeline.segments.length,
    events: eventTimeline.events.length,
    rows: rows.length,
    outputPath,
  };
}
