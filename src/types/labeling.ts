import type { TimeZoneMode } from "./labelingConfig";

/** Whole seconds since the Unix epoch. */
export type EpochSeconds = number;

/** A discovered segment file before its place in the timeline is known. */
export interface SegmentEntry {
  filename: string;
  startTime: EpochSeconds;
}

/** filename → total decodable frames, as produced by the frame counter */
export type FrameCountTable = ReadonlyMap<string, number>;

export interface Segment {
  readonly filename: string;
  readonly startTime: EpochSeconds;
  /** Next segment's start minus this start; frame count / fps for the last segment */
  readonly durationSeconds: number;
  readonly endTime: EpochSeconds;
  readonly frameCount?: number;
}

/**
 * Marks a timeline that went through its builder and is therefore sorted.
 * Not re-exported from the package entry point, so callers cannot forge one.
 */
export const ORDERED_TIMELINE: unique symbol = Symbol("orderedTimeline");

export interface SegmentTimeline {
  readonly [ORDERED_TIMELINE]: true;
  readonly segments: readonly Segment[];
  readonly frameRate: number;
}

/** One parsed log line: the log it came from and when it was written. */
export interface EventRecord {
  eventType: string;
  startTime: EpochSeconds;
}

export interface LabelEvent {
  readonly eventType: string;
  readonly startTime: EpochSeconds;
  /** Next event's start; the recording's end for the last event */
  readonly endTime: EpochSeconds;
}

export interface EventTimeline {
  readonly [ORDERED_TIMELINE]: true;
  readonly events: readonly LabelEvent[];
}

export interface LabelRow {
  readonly filename: string;
  readonly className: string;
  readonly startFrame: number;
  readonly endFrame: number;
}

/**
 * How the end frame of a segment that an event spans completely is written.
 * "frames" multiplies the segment duration by the frame rate like every other
 * end frame; "legacySeconds" writes the bare duration, which is what datasets
 * produced by the earlier tooling contain.
 */
export type SpannedEndFrameMode = "frames" | "legacySeconds";

export interface AlignmentOptions {
  spannedEndFrame?: SpannedEndFrameMode;
  /** Zone used to print event times in error messages; defaults to UTC */
  timeZone?: TimeZoneMode;
}
