/**
 * Build the per-frame label table for a capture directory.
 *
 * The directory must hold the .h264 segments (named by their start time),
 * logNeg.txt, logNo.txt, logPos.txt and counts.csv (see count-frames.ts).
 *
 * Usage:
 *   npx tsx scripts/make-labels.ts <files-dir> [--fps 24] [--output dataset.csv]
 *     [--config labeling.json] [--utc] [--legacy-spanned-end-frame]
 */

import type { LabelingConfig } from "../src/types/labelingConfig";
import { makeLabels } from "../src/io/makeLabels";
import { loadSettings } from "../src/io/loadSettings";
import { isLabelingError } from "../src/utils/labelingError";
import { resolveConfig } from "../src/utils/resolveConfig";

const USAGE =
  "Usage: npx tsx scripts/make-labels.ts <files-dir> [--fps N] [--output PATH] " +
  "[--config PATH] [--utc] [--legacy-spanned-end-frame]";

interface CliArgs {
  filesDir: string;
  configPath?: string;
  overrides: Partial<LabelingConfig>;
}

function parseArgs(args: string[]): CliArgs | null {
  const overrides: Partial<LabelingConfig> = {};
  let filesDir: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--fps") {
      const fps = Number(args[++i]);
      if (!Number.isFinite(fps) || fps <= 0) return null;
      overrides.frameRate = fps;
    } else if (arg === "--output") {
      const out = args[++i];
      if (!out) return null;
      overrides.outputFile = out;
    } else if (arg === "--config") {
      configPath = args[++i];
      if (!configPath) return null;
    } else if (arg === "--utc") {
      overrides.timeZone = "utc";
    } else if (arg === "--legacy-spanned-end-frame") {
      overrides.spannedEndFrame = "legacySeconds";
    } else if (arg.startsWith("--") || filesDir !== undefined) {
      return null;
    } else {
      filesDir = arg;
    }
  }
  return filesDir === undefined ? null : { filesDir, configPath, overrides };
}

async function main(): Promise<void> {
  const cli = parseArgs(process.argv.slice(2));
  if (!cli) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const settings = cli.configPath ? await loadSettings(cli.configPath) : {};
    const config = resolveConfig(settings, process.env, cli.overrides);
    console.log(
      `[make-labels] ${cli.filesDir} at ${config.frameRate} fps (${config.timeZone} time)`,
    );
    const result = await makeLabels(cli.filesDir, config);
    console.log(
      `[make-labels] ${result.events} events over ${result.segments} segments → ` +
        `${result.rows} label rows in ${result.outputPath}`,
    );
  } catch (err) {
    if (!isLabelingError(err)) throw err;
    console.error(`[make-labels] ${err.kind}: ${err.message}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("[make-labels] failed:", err);
  process.exit(1);
});
