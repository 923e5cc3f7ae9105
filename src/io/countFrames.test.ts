import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createFile } from "mp4box";
import {
  countFrames,
  frameCountFromProbeExit,
  probeFrames,
  type ProbeExit,
} from "./countFrames";

/** A minimal MP4 holding one avc1 track with `sampleCount` samples. */
function buildMp4(sampleCount: number): Uint8Array {
  const mp4 = createFile();
  const trackId = mp4.addTrack({ type: "avc1", width: 64, height: 64, timescale: 1000 });
  for (let i = 0; i < sampleCount; i++) {
    mp4.addSample(trackId, new Uint8Array(16), { duration: 40, is_sync: i === 0 });
  }
  return new Uint8Array(mp4.getBuffer().buffer);
}

describe("countFrames", () => {
  it("keys counts by base name", async () => {
    const probe = vi.fn(async (file: string) => (file.endsWith("a.h264") ? 240 : 360));
    const counts = await countFrames(["data/a.h264", "data/b.h264"], { probe });
    expect(counts.get("a.h264")).toBe(240);
    expect(counts.get("b.h264")).toBe(360);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it("never runs more probes than jobs at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const probe = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return 1;
    };
    const files = Array.from({ length: 7 }, (_, i) => `seg${i}.h264`);
    const counts = await countFrames(files, { probe, jobs: 3 });
    expect(counts.size).toBe(7);
    expect(peak).toBe(3);
  });

  it("reports each counted file", async () => {
    const onCounted = vi.fn();
    await countFrames(["x.h264"], { probe: async () => 12, onCounted });
    expect(onCounted).toHaveBeenCalledWith("x.h264", 12);
  });

  it("rejects when a probe fails", async () => {
    const probe = async (file: string) => {
      if (file === "bad.h264") throw new Error("ffprobe failed for bad.h264");
      return 10;
    };
    await expect(countFrames(["ok.h264", "bad.h264"], { probe, jobs: 1 })).rejects.toThrow(
      "ffprobe failed for bad.h264",
    );
  });

  it("starts no further probes once one has failed", async () => {
    const probe = vi.fn(async (file: string) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      if (file === "f0.h264") throw new Error("ffprobe failed for f0.h264");
      return 10;
    });
    const files = Array.from({ length: 20 }, (_, i) => `f${i}.h264`);
    await expect(countFrames(files, { probe, jobs: 2 })).rejects.toThrow(
      "ffprobe failed for f0.h264",
    );
    await new Promise((resolve) => setTimeout(resolve, 50));
    // f0 and f1 start together; f1's lane stops once f0 has failed
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it("returns an empty table for no files", async () => {
    const probe = vi.fn(async () => 1);
    expect((await countFrames([], { probe })).size).toBe(0);
    expect(probe).not.toHaveBeenCalled();
  });
});

describe("probeFrames", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "labeling-frames-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("counts the video samples of an MP4 container", async () => {
    const file = path.join(dir, "2023-06-01 12:00:00.000000.mp4");
    await fs.writeFile(file, buildMp4(7));
    expect(await probeFrames(file)).toBe(7);
  });

  it("rejects an unreadable container file", async () => {
    await expect(probeFrames(path.join(dir, "missing.mp4"))).rejects.toThrow();
  });
});

describe("frameCountFromProbeExit", () => {
  const ok: ProbeExit = { stdout: "1438\n", stderr: "", code: 0, signal: null };

  it("reads the count from a clean exit", () => {
    expect(frameCountFromProbeExit("a.h264", ok)).toBe(1438);
  });

  it("fails a child killed by a signal", () => {
    expect(() =>
      frameCountFromProbeExit("a.h264", { ...ok, code: null, signal: "SIGKILL" }),
    ).toThrow("ffprobe failed for a.h264: killed by SIGKILL");
  });

  it("reports stderr with the exit code", () => {
    expect(() =>
      frameCountFromProbeExit("a.h264", { ...ok, stdout: "", stderr: "Invalid data\n", code: 1 }),
    ).toThrow("ffprobe failed for a.h264: Invalid data (exit code 1)");
  });

  it("fails when no count was printed", () => {
    expect(() => frameCountFromProbeExit("a.h264", { ...ok, stdout: "N/A\n" })).toThrow(
      'ffprobe reported no frame count for a.h264: "N/A"',
    );
  });
});
