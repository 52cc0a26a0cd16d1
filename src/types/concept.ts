export type SegmentName = "intro" | "hookMoment" | "development" | "climax" | "closing";

export type StoryBeats = Partial<Record<SegmentName, string>>;

/**
 * Narrative metadata drafted upstream. Every field is optional; missing text
 * produces zero-duration layers rather than errors.
 */
export interface Concept {
  title?: string;
  story?: StoryBeats;
  hashtags?: readonly string[];
}
