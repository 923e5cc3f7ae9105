import {
  ORDERED_TIMELINE,
  type EventRecord,
  type EventTimeline,
  type LabelEvent,
  type SegmentTimeline,
} from "../types/labeling";
import type { TimeZoneMode } from "../types/labelingConfig";
import { LabelingError, malformedInput } from "./labelingError";
import { formatLogTimestamp } from "./parseTimestamp";
import { lastSegment } from "./segmentTimeline";

/**
 * Order events by start time and give each one an end time: the next event's
 * start, or the end of the recording for the last event. Events with equal
 * start times keep their input order. `timeZone` only affects how times are
 * printed in error messages.
 */
export function buildEventTimeline(
  records: readonly EventRecord[],
  segmentTimeline: SegmentTimeline,
  timeZone: TimeZoneMode = "utc",
): EventTimeline {
  if (records.length === 0) {
    throw malformedInput("no events found in the event logs");
  }
  for (const record of records) {
    if (!Number.isFinite(record.startTime)) {
      throw malformedInput(`${record.eventType} event has no parsable start time`);
    }
  }

  // Array.prototype.sort is stable
  const sorted = [...records].sort((a, b) => a.startTime - b.startTime);
  const recordingEnd = lastSegment(segmentTimeline).endTime;
  const final = sorted[sorted.length - 1];
  if (final.startTime > recordingEnd) {
    throw new LabelingError(
      "SegmentExhausted",
      `${final.eventType} event at ${formatLogTimestamp(final.startTime, timeZone)} was logged after the recording ended at ${formatLogTimestamp(recordingEnd, timeZone)}`,
    );
  }

  const events = sorted.map(
    (record, i): LabelEvent => ({
      eventType: record.eventType,
      startTime: record.startTime,
      endTime: i < sorted.length - 1 ? sorted[i + 1].startTime : recordingEnd,
    }),
  );

  return { [ORDERED_TIMELINE]: true, events };
}
