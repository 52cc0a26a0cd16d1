import { describe, it, expect } from "vitest";
import { getCurrentSegment, SEGMENT_ORDER, segmentTimeline } from "@/renderer/timeline";
import { InvalidAudioError } from "@/lib/errors";

describe("segmentTimeline", () => {
  it("splits a 30s track 10/10/50/20/10", () => {
    const timeline = segmentTimeline(30);
    expect(timeline.intro.startSeconds).toBe(0);
    expect(timeline.intro.endSeconds).toBeCloseTo(3);
    expect(timeline.hookMoment.endSeconds).toBeCloseTo(6);
    expect(timeline.development.endSeconds).toBeCloseTo(21);
    expect(timeline.climax.endSeconds).toBeCloseTo(27);
    expect(timeline.closing.endSeconds).toBe(30);
  });

  it("produces contiguous segments that cover the track exactly", () => {
    for (const duration of [0.37, 7, 123.456]) {
      const timeline = segmentTimeline(duration);
      SEGMENT_ORDER.forEach((name, i) => {
        const previous = SEGMENT_ORDER[i - 1];
        if (previous) expect(timeline[name].startSeconds).toBe(timeline[previous].endSeconds);
        expect(timeline[name].endSeconds).toBeGreaterThanOrEqual(timeline[name].startSeconds);
      });
      expect(timeline.closing.endSeconds).toBe(duration);
    }
  });

  it("rejects zero and invalid durations", () => {
    expect(() => segmentTimeline(0)).toThrow(new InvalidAudioError("audio track has zero duration"));
    expect(() => segmentTimeline(-1)).toThrow(InvalidAudioError);
    expect(() => segmentTimeline(Number.NaN)).toThrow(InvalidAudioError);
  });

  it("returns a frozen timeline", () => {
    expect(Object.isFrozen(segmentTimeline(10))).toBe(true);
  });
});

describe("getCurrentSegment", () => {
  const timeline = segmentTimeline(10);

  it("returns the segment containing the time", () => {
    expect(getCurrentSegment(timeline, 0)).toBe("intro");
    expect(getCurrentSegment(timeline, 1.5)).toBe("hookMoment");
    expect(getCurrentSegment(timeline, 5)).toBe("development");
    expect(getCurrentSegment(timeline, 7.5)).toBe("climax");
    expect(getCurrentSegment(timeline, 9.5)).toBe("closing");
  });

  it("clamps outside the track", () => {
    expect(getCurrentSegment(timeline, -1)).toBe("intro");
    expect(getCurrentSegment(timeline, 50)).toBe("closing");
  });
});
