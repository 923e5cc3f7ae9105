import { describe, it, expect } from "vitest";
import {
  alignEvent,
  alignEvents,
  findOwningSegment,
  findOwningSegmentIndex,
} from "./frameAlignment";
import { buildEventTimeline } from "./eventTimeline";
import { buildSegmentTimeline } from "./segmentTimeline";
import { errorKind } from "../test/helpers/errorKind";
import type { LabelEvent } from "../types/labeling";

// ── Fixture: three segments at 2 fps ───────────────────────────────
// a [0, 10)  b [10, 25)  c [25, 40)   (c: 30 frames / 2 fps = 15 s)
const FPS = 2;
const timeline = buildSegmentTimeline(
  [
    { filename: "a.h264", startTime: 0 },
    { filename: "b.h264", startTime: 10 },
    { filename: "c.h264", startTime: 25 },
  ],
  new Map([["c.h264", 30]]),
  FPS,
);

function event(startTime: number, endTime: number, eventType = "logPos"): LabelEvent {
  return { eventType, startTime, endTime };
}

function row(filename: string, startFrame: number, endFrame: number, className = "logPos") {
  return { filename, className, startFrame, endFrame };
}

describe("findOwningSegment", () => {
  it("picks the latest segment that started strictly before the event", () => {
    expect(findOwningSegment(5, timeline)?.filename).toBe("a.h264");
    expect(findOwningSegment(10.5, timeline)?.filename).toBe("b.h264");
    expect(findOwningSegment(26, timeline)?.filename).toBe("c.h264");
    expect(findOwningSegment(1000, timeline)?.filename).toBe("c.h264");
  });

  it("gives an event starting on a boundary to the previous segment", () => {
    expect(findOwningSegment(10, timeline)?.filename).toBe("a.h264");
    expect(findOwningSegment(25, timeline)?.filename).toBe("b.h264");
  });

  it("returns null before the first segment", () => {
    expect(findOwningSegment(0, timeline)).toBeNull();
    expect(findOwningSegmentIndex(-3, timeline)).toBe(-1);
  });
});

describe("alignEvent", () => {
  it("emits one row for an event inside its segment", () => {
    expect(alignEvent(event(12, 20), timeline)).toEqual([row("b.h264", 4, 20)]);
  });

  it("treats an event ending on its segment's end as contained", () => {
    expect(alignEvent(event(5, 10), timeline)).toEqual([row("a.h264", 10, 20)]);
  });

  it("emits a single empty row for a zero-length event", () => {
    expect(alignEvent(event(12, 12), timeline)).toEqual([row("b.h264", 4, 4)]);
  });

  it("splits an event crossing into the next segment", () => {
    const events = buildEventTimeline(
      [
        { eventType: "logPos", startTime: 5 },
        { eventType: "logNo", startTime: 12 },
      ],
      timeline,
    );
    expect(events.events[0]).toEqual(event(5, 12));
    // owning row stops one second early: (10 - 1) * 2 = 18
    // continuation: 2 s leftover → start min(4, 4) = 4, end 4
    expect(alignEvent(events.events[0], timeline)).toEqual([
      row("b.h264", 4, 4),
      row("a.h264", 10, 18),
    ]);
  });

  it("starts a short continuation at its leftover frame count", () => {
    // 1 s leftover = 2 frames, below the 4-frame floor
    expect(alignEvent(event(5, 11), timeline)).toEqual([
      row("b.h264", 2, 2),
      row("a.h264", 10, 18),
    ]);
  });

  it("walks through every segment the event spans", () => {
    // 20 s leftover: all 15 s of b, then 5 s of c
    expect(alignEvent(event(5, 30), timeline)).toEqual([
      row("b.h264", 4, 30),
      row("c.h264", 4, 10),
      row("a.h264", 10, 18),
    ]);
  });

  it("writes spanned segments in seconds in legacy mode", () => {
    expect(
      alignEvent(event(5, 30), timeline, { spannedEndFrame: "legacySeconds" }),
    ).toEqual([row("b.h264", 4, 15), row("c.h264", 4, 10), row("a.h264", 10, 18)]);
  });

  it("stops when the leftover exactly fills a segment", () => {
    expect(alignEvent(event(5, 25), timeline)).toEqual([
      row("b.h264", 4, 30),
      row("a.h264", 10, 18),
    ]);
  });

  it("never ends the owning row before it starts", () => {
    // starts on a's last second boundary: start frame 20 is past the pullback (18)
    expect(alignEvent(event(10, 12), timeline)).toEqual([
      row("b.h264", 4, 4),
      row("a.h264", 20, 20),
    ]);
  });

  it("fails for an event that precedes every segment", () => {
    expect(errorKind(() => alignEvent(event(0, 4), timeline))).toBe("UnalignedEvent");
    expect(errorKind(() => alignEvent(event(-3, 4), timeline))).toBe("UnalignedEvent");
  });

  it("names the event time in the log layout when it cannot be aligned", () => {
    expect(() => alignEvent(event(0, 4), timeline, { timeZone: "utc" })).toThrow(
      "logPos event at 19700101_000000 does not start after the first segment a.h264 (19700101_000000)",
    );
    expect(() => alignEvent(event(30, 50), timeline)).toThrow(
      "logPos event at 19700101_000030 runs 10s past the last segment",
    );
  });

  it("fails instead of truncating when the segments run out", () => {
    expect(errorKind(() => alignEvent(event(30, 50), timeline))).toBe("SegmentExhausted");
    expect(errorKind(() => alignEvent(event(5, 45), timeline))).toBe("SegmentExhausted");
  });
});

describe("alignEvents", () => {
  const events = buildEventTimeline(
    [
      { eventType: "logNeg", startTime: 30 },
      { eventType: "logPos", startTime: 5 },
      { eventType: "logNo", startTime: 12 },
    ],
    timeline,
  );

  it("concatenates rows in event order", () => {
    expect(alignEvents(events, timeline)).toEqual([
      row("b.h264", 4, 4, "logPos"),
      row("a.h264", 10, 18, "logPos"),
      row("c.h264", 4, 10, "logNo"),
      row("b.h264", 4, 28, "logNo"),
      row("c.h264", 10, 30, "logNeg"),
    ]);
  });

  it("is deterministic", () => {
    expect(alignEvents(events, timeline)).toEqual(alignEvents(events, timeline));
  });
});

describe("alignment properties", () => {
  // Five segments; the last has 24 frames → 12 s, recording ends at 59
  const segments = buildSegmentTimeline(
    [0, 10, 25, 40, 47].map((startTime, i) => ({
      filename: `seg${i}.h264`,
      startTime,
    })),
    new Map([["seg4.h264", 24]]),
    FPS,
  );
  const events = buildEventTimeline(
    [1, 3, 9, 10, 11, 26, 26, 39, 41, 48, 58].map((startTime, i) => ({
      eventType: ["logPos", "logNo", "logNeg"][i % 3],
      startTime,
    })),
    segments,
  );

  it("keeps every row inside its segment's frame range", () => {
    const byName = new Map(segments.segments.map((s) => [s.filename, s]));
    for (const r of alignEvents(events, segments)) {
      const seg = byName.get(r.filename);
      expect(seg).toBeDefined();
      expect(r.startFrame).toBeGreaterThanOrEqual(0);
      expect(r.startFrame).toBeLessThanOrEqual(r.endFrame);
      expect(r.endFrame).toBeLessThanOrEqual((seg?.durationSeconds ?? 0) * FPS);
    }
  });

  it("covers each segment from the event's start to its end exactly once", () => {
    for (const e of events.events) {
      const first = findOwningSegmentIndex(e.startTime, segments);
      const last = Math.max(first, findOwningSegmentIndex(e.endTime, segments));
      const expected = segments.segments
        .slice(first + 1, last + 1)
        .concat(segments.segments[first])
        .map((s) => s.filename);
      expect(alignEvent(e, segments).map((r) => r.filename)).toEqual(expected);
    }
  });
});
