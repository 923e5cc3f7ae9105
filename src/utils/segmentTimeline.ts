import {
  ORDERED_TIMELINE,
  type FrameCountTable,
  type Segment,
  type SegmentEntry,
  type SegmentTimeline,
} from "../types/labeling";
import { malformedInput } from "./labelingError";

export function isValidFrameRate(frameRate: number): boolean {
  return Number.isFinite(frameRate) && frameRate > 0;
}

/**
 * Order segments by start time and derive each one's duration.
 *
 * Segment files carry no timestamps of their own, so a segment lasts until the
 * next one starts. Only the last segment needs its frame count, which is the
 * one place the recording's length is known.
 */
export function buildSegmentTimeline(
  entries: readonly SegmentEntry[],
  frameCounts: FrameCountTable,
  frameRate: number,
): SegmentTimeline {
  if (!isValidFrameRate(frameRate)) {
    throw malformedInput(`frame rate must be a positive number, got ${frameRate}`);
  }
  if (entries.length === 0) {
    throw malformedInput("no video segments found");
  }
  for (const entry of entries) {
    if (!Number.isFinite(entry.startTime)) {
      throw malformedInput(`segment ${entry.filename} has no parsable start time`);
    }
  }

  const sorted = [...entries].sort((a, b) => a.startTime - b.startTime);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].startTime === sorted[i - 1].startTime) {
      throw malformedInput(
        `segments ${sorted[i - 1].filename} and ${sorted[i].filename} share start time ${sorted[i].startTime}`,
      );
    }
  }

  const last = sorted[sorted.length - 1];
  const lastFrames = frameCounts.get(last.filename);
  if (lastFrames === undefined || !(lastFrames > 0)) {
    throw malformedInput(
      `frame count for last segment ${last.filename} is missing or not positive`,
    );
  }

  const segments = sorted.map((entry, i): Segment => {
    const durationSeconds =
      i < sorted.length - 1
        ? sorted[i + 1].startTime - entry.startTime
        : Math.floor(lastFrames / frameRate);
    const frameCount = frameCounts.get(entry.filename);
    return {
      filename: entry.filename,
      startTime: entry.startTime,
      durationSeconds,
      endTime: entry.startTime + durationSeconds,
      ...(frameCount !== undefined ? { frameCount } : {}),
    };
  });

  return { [ORDERED_TIMELINE]: true, segments, frameRate };
}

export function lastSegment(timeline: SegmentTimeline): Segment {
  return timeline.segments[timeline.segments.length - 1];
}
