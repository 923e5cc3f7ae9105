import type { SpannedEndFrameMode } from "./labeling";

export type TimeZoneMode = "local" | "utc";

export interface LabelingConfig {
  /** Segments carry no frame-rate metadata, so this applies to all of them */
  frameRate: number;
  /** Zone the wall-clock timestamps in file names and logs were written in */
  timeZone: TimeZoneMode;
  segmentExtensions: string[];
  requiredLogs: string[];
  countsFile: string;
  /** Relative paths resolve against the input directory */
  outputFile: string;
  spannedEndFrame: SpannedEndFrameMode;
}

export const LABELING_DEFAULTS: LabelingConfig = {
  frameRate: 24,
  timeZone: "local",
  segmentExtensions: [".h264"],
  requiredLogs: ["logNeg.txt", "logNo.txt", "logPos.txt"],
  countsFile: "counts.csv",
  outputFile: "dataset.csv",
  spannedEndFrame: "frames",
};

export const TIME_ZONE_MODES: readonly TimeZoneMode[] = ["local", "utc"];

export const SPANNED_END_FRAME_MODES: readonly SpannedEndFrameMode[] = [
  "frames",
  "legacySeconds",
];
