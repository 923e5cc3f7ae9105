import type { LabelingConfig } from "../types/labelingConfig";
import {
  LABELING_DEFAULTS,
  SPANNED_END_FRAME_MODES,
  TIME_ZONE_MODES,
} from "../types/labelingConfig";
import { malformedInput } from "./labelingError";
import { isValidFrameRate } from "./segmentTimeline";

export type ConfigEnv = Record<string, string | undefined>;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Keep only the recognised keys of a parsed settings file. Values of the
 * wrong type are dropped here and fall back to the defaults.
 */
export function settingsFromJson(raw: unknown): Partial<LabelingConfig> {
  if (raw == null || typeof raw !== "object" || Array.isArray(raw)) return {};
  const settings: Partial<LabelingConfig> = {};
  if ("frameRate" in raw && typeof raw.frameRate === "number") {
    settings.frameRate = raw.frameRate;
  }
  if ("timeZone" in raw && (raw.timeZone === "local" || raw.timeZone === "utc")) {
    settings.timeZone = raw.timeZone;
  }
  if ("segmentExtensions" in raw && isStringArray(raw.segmentExtensions)) {
    settings.segmentExtensions = raw.segmentExtensions;
  }
  if ("requiredLogs" in raw && isStringArray(raw.requiredLogs)) {
    settings.requiredLogs = raw.requiredLogs;
  }
  if ("countsFile" in raw && typeof raw.countsFile === "string") {
    settings.countsFile = raw.countsFile;
  }
  if ("outputFile" in raw && typeof raw.outputFile === "string") {
    settings.outputFile = raw.outputFile;
  }
  if (
    "spannedEndFrame" in raw &&
    (raw.spannedEndFrame === "frames" || raw.spannedEndFrame === "legacySeconds")
  ) {
    settings.spannedEndFrame = raw.spannedEndFrame;
  }
  return settings;
}

function fromEnv(env: ConfigEnv): Partial<LabelingConfig> {
  const config: Partial<LabelingConfig> = {};
  const fps = env.LABELS_FPS?.trim();
  if (fps) {
    const frameRate = Number(fps);
    if (!isValidFrameRate(frameRate)) {
      throw malformedInput(`LABELS_FPS must be a positive number, got "${fps}"`);
    }
    config.frameRate = frameRate;
  }
  const zone = env.LABELS_TIMEZONE?.trim();
  if (zone) {
    const timeZone = TIME_ZONE_MODES.find((m) => m === zone);
    if (!timeZone) {
      throw malformedInput(
        `LABELS_TIMEZONE must be one of ${TIME_ZONE_MODES.join(", ")}, got "${zone}"`,
      );
    }
    config.timeZone = timeZone;
  }
  return config;
}

/**
 * Defaults, then the settings file, then the environment, then explicit
 * overrides (command-line flags). The result is validated as a whole.
 */
export function resolveConfig(
  settings: Partial<LabelingConfig> = {},
  env: ConfigEnv = {},
  overrides: Partial<LabelingConfig> = {},
): LabelingConfig {
  const config: LabelingConfig = {
    ...LABELING_DEFAULTS,
    ...settings,
    ...fromEnv(env),
    ...overrides,
  };

  if (!isValidFrameRate(config.frameRate)) {
    throw malformedInput(`frame rate must be a positive number, got ${config.frameRate}`);
  }
  if (!TIME_ZONE_MODES.includes(config.timeZone)) {
    throw malformedInput(`unknown time zone mode "${config.timeZone}"`);
  }
  if (!SPANNED_END_FRAME_MODES.includes(config.spannedEndFrame)) {
    throw malformedInput(`unknown spanned end frame mode "${config.spannedEndFrame}"`);
  }
  if (config.segmentExtensions.length === 0) {
    throw malformedInput("at least one segment file extension is required");
  }

  config.segmentExtensions = config.segmentExtensions.map((ext) => {
    const lower = ext.toLowerCase();
    return lower.startsWith(".") ? lower : `.${lower}`;
  });
  return config;
}
