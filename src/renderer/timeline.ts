import { InvalidAudioError } from "@/lib/errors";
import type { SegmentName } from "@/types/concept";
import type { TimeRange, Timeline } from "@/types/render";

export const SEGMENT_ORDER: readonly SegmentName[] = ["intro", "hookMoment", "development", "climax", "closing"];

export const SEGMENT_PROPORTIONS: Readonly<Record<SegmentName, number>> = {
  intro: 0.1,
  hookMoment: 0.1,
  development: 0.5,
  climax: 0.2,
  closing: 0.1,
};

/**
 * Split the track into five contiguous narrative segments. Each segment starts
 * exactly where the previous one ends and the last one ends at `duration`.
 */
export function segmentTimeline(duration: number): Timeline {
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new InvalidAudioError(
      duration === 0 ? "audio track has zero duration" : `audio duration must be positive, got ${duration}`,
    );
  }

  const bounds = [0];
  let cursor = 0;
  SEGMENT_ORDER.forEach((name, i) => {
    cursor = i === SEGMENT_ORDER.length - 1 ? duration : cursor + duration * SEGMENT_PROPORTIONS[name];
    bounds.push(cursor);
  });

  const range = (i: number): TimeRange =>
    Object.freeze({ startSeconds: bounds[i] ?? 0, endSeconds: bounds[i + 1] ?? duration });

  return Object.freeze({
    intro: range(0),
    hookMoment: range(1),
    development: range(2),
    climax: range(3),
    closing: range(4),
  });
}

/**
 * Segment containing `time`. Times before the track map to the first segment,
 * times at or after the end to the last.
 */
export function getCurrentSegment(timeline: Timeline, time: number): SegmentName {
  for (let i = SEGMENT_ORDER.length - 1; i >= 0; i--) {
    const name = SEGMENT_ORDER[i];
    if (name && time >= timeline[name].startSeconds) return name;
  }
  return "intro";
}
