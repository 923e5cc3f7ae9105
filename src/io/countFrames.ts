/**
 * Frame counts for segment files, written out as the `filename,frames` table
 * the labeler reads.
 *
 * MP4-family containers are read with mp4box: the video track's sample count
 * is its frame count. Raw elementary streams (.h264) carry no index, so
 * ffprobe has to decode them with -count_frames.
 */

import { spawn } from "child_process";
import fs from "fs/promises";
import path from "path";
import { createFile, MP4BoxBuffer } from "mp4box";
import { parseFfprobeFrameCount } from "../utils/parseFfprobeFrameCount";

export type FrameProbe = (file: string) => Promise<number>;

export interface CountFramesOptions {
  /** Probes run at once */
  jobs?: number;
  probe?: FrameProbe;
  onCounted?: (file: string, frames: number) => void;
}

export const DEFAULT_JOBS = 8;

const CONTAINER_EXTENSIONS = new Set([".mp4", ".m4v", ".mov"]);

export interface ProbeExit {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: NodeJS.Signals | null;
}

function runFfprobe(file: string) {
  return new Promise<ProbeExit>((resolve) => {
    const ffprobe = process.env.FFPROBE || "ffprobe";
    const args = [
      "-v", "error",
      "-select_streams", "v:0",
      "-count_frames",
      "-show_entries", "stream=nb_read_frames",
      "-of", "csv=p=0",
      file,
    ];
    const child = spawn(ffprobe, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (d) => (stdout += d.toString()));
    child.stderr.on("data", (d) => (stderr += d.toString()));
    child.on("close", (code, signal) => resolve({ stdout, stderr, code, signal }));
    child.on("error", (err) =>
      resolve({ stdout: "", stderr: `spawn error: ${err.message}`, code: 1, signal: null }),
    );
  });
}

/**
 * Frame count from a finished ffprobe run. A child killed by a signal has no
 * exit code and counts as failed.
 */
export function frameCountFromProbeExit(file: string, exit: ProbeExit): number {
  const { stdout, stderr, code, signal } = exit;
  if (code !== 0) {
    const status = code === null ? `killed by ${signal ?? "signal"}` : `exit code ${code}`;
    const detail = stderr.trim();
    throw new Error(`ffprobe failed for ${file}: ${detail ? `${detail} (${status})` : status}`);
  }
  const frames = parseFfprobeFrameCount(stdout);
  if (frames == null) {
    throw new Error(`ffprobe reported no frame count for ${file}: "${stdout.trim()}"`);
  }
  return frames;
}

export async function probeWithFfprobe(file: string): Promise<number> {
  return frameCountFromProbeExit(file, await runFfprobe(file));
}

export async function probeWithMp4box(file: string): Promise<number> {
  const data = await fs.readFile(file);
  const arrayBuffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(arrayBuffer).set(data);

  return new Promise((resolve, reject) => {
    const mp4 = createFile();

    mp4.onReady = (info) => {
      const vt = info.videoTracks[0];
      if (vt) {
        resolve(vt.nb_samples);
      } else {
        reject(new Error(`no video track found in ${file}`));
      }
    };
    mp4.onError = (_mod: string, msg: string) => reject(new Error(`${file}: ${msg}`));

    try {
      mp4.appendBuffer(MP4BoxBuffer.fromArrayBuffer(arrayBuffer, 0));
      mp4.flush();
      mp4.stop();
    } catch (e) {
      reject(e);
      return;
    }
    // No-op once onReady has settled the promise
    reject(new Error(`${file} has no readable movie header`));
  });
}

export function probeFrames(file: string): Promise<number> {
  return CONTAINER_EXTENSIONS.has(path.extname(file).toLowerCase())
    ? probeWithMp4box(file)
    : probeWithFfprobe(file);
}

/**
 * Probe every file with at most `jobs` probes in flight. Keys of the result
 * are base names. The first failed probe rejects the whole count, and no
 * lane starts another probe after that.
 */
export async function countFrames(
  files: readonly string[],
  options: CountFramesOptions = {},
): Promise<Map<string, number>> {
  const jobs = Math.max(1, Math.floor(options.jobs ?? DEFAULT_JOBS));
  const probe = options.probe ?? probeFrames;
  const counts = new Map<string, number>();
  let next = 0;
  let failed = false;

  async function lane(): Promise<void> {
    while (!failed && next < files.length) {
      const file = files[next++];
      let frames: number;
      try {
        frames = await probe(file);
      } catch (err) {
        failed = true;
        throw err;
      }
      counts.set(path.basename(file), frames);
      options.onCounted?.(file, frames);
    }
  }

  await Promise.all(Array.from({ length: Math.min(jobs, files.length) }, () => lane()));
  return counts;
}
