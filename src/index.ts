export type {
  AlignmentOptions,
  EpochSeconds,
  EventRecord,
  EventTimeline,
  FrameCountTable,
  LabelEvent,
  LabelRow,
  Segment,
  SegmentEntry,
  SegmentTimeline,
  SpannedEndFrameMode,
} from "./types/labeling";
export type { LabelingConfig, TimeZoneMode } from "./types/labelingConfig";
export { LABELING_DEFAULTS } from "./types/labelingConfig";

export { LabelingError, isLabelingError } from "./utils/labelingError";
export type { LabelingErrorKind } from "./utils/labelingError";
export { buildSegmentTimeline, lastSegment } from "./utils/segmentTimeline";
export { buildEventTimeline } from "./utils/eventTimeline";
export {
  alignEvent,
  alignEvents,
  findOwningSegment,
  findOwningSegmentIndex,
} from "./utils/frameAlignment";
export { assembleLabelTable, formatLabelCsv } from "./utils/labelTable";
export {
  formatLogTimestamp,
  parseLogTimestamp,
  parseSegmentStartTime,
} from "./utils/parseTimestamp";
export { parseEventLog } from "./utils/parseEventLog";
export { formatFrameCountsCsv, parseFrameCounts } from "./utils/parseFrameCounts";
export { resolveConfig } from "./utils/resolveConfig";

export { countFrames, probeFrames } from "./io/countFrames";
export type { CountFramesOptions, FrameProbe } from "./io/countFrames";
export { discoverSegments } from "./io/discoverSegments";
export { loadSettings } from "./io/loadSettings";
export { makeLabels } from "./io/makeLabels";
export type { MakeLabelsResult } from "./io/makeLabels";
