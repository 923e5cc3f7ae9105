/**
 * Maps event intervals onto segment-relative frame ranges.
 *
 * An event belongs to the latest segment that had already started when the
 * event began. If the event outlasts that segment it is split: one row for
 * the owning segment, then one row per following segment until the event's
 * remaining duration runs out.
 */

import type {
  AlignmentOptions,
  EventTimeline,
  LabelEvent,
  LabelRow,
  Segment,
  SegmentTimeline,
} from "../types/labeling";
import { LabelingError } from "./labelingError";
import { formatLogTimestamp } from "./parseTimestamp";

/** Leading frames of a continuation segment left out of its label */
const OVERFLOW_START_FRAMES = 4;

/** The owning segment's row of an overflowing event stops this far before the segment's end */
const OVERFLOW_PULLBACK_SECONDS = 1;

// Same epsilon as frame-accurate timecode display: keeps N/fps from flooring to N-1
const FRAME_EPS = 1e-6;

function toFrames(seconds: number, frameRate: number): number {
  return Math.floor(seconds * frameRate + FRAME_EPS);
}

/**
 * Index of the segment with the greatest start time strictly before
 * `startTime`, or -1 if the event precedes every segment.
 */
export function findOwningSegmentIndex(
  startTime: number,
  timeline: SegmentTimeline,
): number {
  const { segments } = timeline;
  let lo = 0;
  let hi = segments.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (segments[mid].startTime < startTime) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

export function findOwningSegment(
  startTime: number,
  timeline: SegmentTimeline,
): Segment | null {
  const index = findOwningSegmentIndex(startTime, timeline);
  return index >= 0 ? timeline.segments[index] : null;
}

function labelRow(
  segment: Segment,
  event: LabelEvent,
  startFrame: number,
  endFrame: number,
): LabelRow {
  return {
    filename: segment.filename,
    className: event.eventType,
    startFrame,
    endFrame,
  };
}

/**
 * Label rows for a single event. Continuation rows come first, in timeline
 * order, followed by the owning segment's row.
 */
export function alignEvent(
  event: LabelEvent,
  timeline: SegmentTimeline,
  options: AlignmentOptions = {},
): LabelRow[] {
  const { segments, frameRate } = timeline;
  const spannedEndFrame = options.spannedEndFrame ?? "frames";
  const at = (seconds: number) => formatLogTimestamp(seconds, options.timeZone ?? "utc");

  const owningIndex = findOwningSegmentIndex(event.startTime, timeline);
  if (owningIndex < 0) {
    const first = segments[0];
    throw new LabelingError(
      "UnalignedEvent",
      `${event.eventType} event at ${at(event.startTime)} does not start after the first segment ${first.filename} (${at(first.startTime)})`,
    );
  }
  const owning = segments[owningIndex];
  const startFrame = toFrames(event.startTime - owning.startTime, frameRate);

  if (event.endTime <= owning.endTime) {
    const endFrame = toFrames(event.endTime - owning.startTime, frameRate);
    return [labelRow(owning, event, startFrame, endFrame)];
  }

  const rows: LabelRow[] = [];
  let leftover = event.endTime - owning.endTime;
  let index = owningIndex + 1;
  while (leftover > 0) {
    if (index >= segments.length) {
      throw new LabelingError(
        "SegmentExhausted",
        `${event.eventType} event at ${at(event.startTime)} runs ${leftover}s past the last segment`,
      );
    }
    const segment = segments[index];
    const leftoverFrames = toFrames(leftover, frameRate);
    if (leftover < segment.durationSeconds) {
      rows.push(
        labelRow(
          segment,
          event,
          Math.min(OVERFLOW_START_FRAMES, leftoverFrames),
          leftoverFrames,
        ),
      );
      leftover = 0;
    } else {
      const endFrame =
        spannedEndFrame === "frames"
          ? toFrames(segment.durationSeconds, frameRate)
          : segment.durationSeconds;
      rows.push(
        labelRow(
          segment,
          event,
          Math.min(OVERFLOW_START_FRAMES, leftoverFrames, endFrame),
          endFrame,
        ),
      );
      leftover -= segment.durationSeconds;
    }
    index++;
  }

  const pullbackFrame = toFrames(
    owning.durationSeconds - OVERFLOW_PULLBACK_SECONDS,
    frameRate,
  );
  rows.push(labelRow(owning, event, startFrame, Math.max(startFrame, pullbackFrame)));
  return rows;
}

/** Rows for every event, concatenated in event order. */
export function alignEvents(
  events: EventTimeline,
  timeline: SegmentTimeline,
  options: AlignmentOptions = {},
): LabelRow[] {
  return events.events.flatMap((event) => alignEvent(event, timeline, options));
}
