/**
 * Write counts.csv (filename,frames) for every segment in a directory.
 *
 * Raw .h264 segments are counted with ffprobe (set FFPROBE to override the
 * binary); .mp4/.m4v/.mov are read with mp4box.
 *
 * Usage:
 *   npx tsx scripts/count-frames.ts <files-dir> [--jobs 8] [--output counts.csv]
 *     [--ext .h264]
 */

import fs from "fs/promises";
import path from "path";
import { countFrames, DEFAULT_JOBS } from "../src/io/countFrames";
import { listSegmentFiles } from "../src/io/discoverSegments";
import { LABELING_DEFAULTS } from "../src/types/labelingConfig";
import { formatFrameCountsCsv } from "../src/utils/parseFrameCounts";

const USAGE =
  "Usage: npx tsx scripts/count-frames.ts <files-dir> [--jobs N] [--output PATH] [--ext EXT]";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let filesDir: string | undefined;
  let jobs = DEFAULT_JOBS;
  let output: string | undefined;
  const extensions: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--jobs") {
      jobs = Number(args[++i]);
    } else if (arg === "--output") {
      output = args[++i];
    } else if (arg === "--ext") {
      const ext = (args[++i] ?? "").toLowerCase();
      extensions.push(ext.startsWith(".") ? ext : `.${ext}`);
    } else if (!arg.startsWith("--") && filesDir === undefined) {
      filesDir = arg;
    } else {
      filesDir = undefined;
      break;
    }
  }
  if (filesDir === undefined || !Number.isInteger(jobs) || jobs < 1 || output === "") {
    console.error(USAGE);
    process.exit(1);
  }

  const names = await listSegmentFiles(
    filesDir,
    extensions.length > 0 ? extensions : LABELING_DEFAULTS.segmentExtensions,
  );
  if (names.length === 0) {
    console.error(`[count-frames] no segment files in ${filesDir}`);
    process.exit(1);
  }

  const dir = filesDir;
  console.log(`[count-frames] probing ${names.length} files, ${jobs} at a time`);
  let done = 0;
  const counts = await countFrames(
    names.map((name) => path.join(dir, name)),
    {
      jobs,
      onCounted: (file, frames) => {
        done++;
        console.log(`  [${done}/${names.length}] ${path.basename(file)}: ${frames} frames`);
      },
    },
  );

  const outPath = output ?? path.join(dir, LABELING_DEFAULTS.countsFile);
  await fs.writeFile(outPath, formatFrameCountsCsv(counts), "utf8");
  console.log(`\nWrote ${counts.size} frame counts to ${outPath}`);
}

main().catch((err: unknown) => {
  console.error("[count-frames] failed:", err);
  process.exit(1);
});
