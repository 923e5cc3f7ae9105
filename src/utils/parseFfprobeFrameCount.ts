/**
 * Frame count from `ffprobe -count_frames -show_entries stream=nb_read_frames
 * -of csv=p=0`. Some builds append a trailing comma; anything else is rejected.
 */
export function parseFfprobeFrameCount(stdout: string): number | null {
  const line = stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l !== "");
  if (line === undefined) return null;
  const m = /^(\d+),?$/.exec(line);
  return m ? Number(m[1]) : null;
}
