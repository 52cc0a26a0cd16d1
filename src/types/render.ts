import type { SegmentName } from "@/types/concept";

export const VISUAL_STYLES = ["classic", "epic", "gradient"] as const;

export type VisualStyle = (typeof VISUAL_STYLES)[number];

export type LayerKind = "background" | "overlay" | "text" | "caption";

export interface CanvasSize {
  width: number;
  height: number;
}

export interface TimeRange {
  startSeconds: number;
  endSeconds: number;
}

export type Timeline = Readonly<Record<SegmentName, TimeRange>>;

/**
 * Pixels produced by one layer for one tick. The rectangle is placed at
 * (x, y) on the canvas and clipped to it. `pixels` is RGB, 3 bytes per pixel.
 * `coverage` is an optional per-pixel 0-255 mask, `alpha` a uniform multiplier.
 */
export interface LayerRaster {
  x: number;
  y: number;
  width: number;
  height: number;
  pixels: Uint8Array;
  coverage?: Uint8Array;
  alpha?: number;
}

export interface Layer {
  id: string;
  kind: LayerKind;
  zIndex: number;
  startSeconds: number;
  durationSeconds: number;
  opacity: number;
  /** Pure in `t` (seconds on the track timeline). `null` draws nothing. */
  render: (t: number) => LayerRaster | null;
}

export interface Frame {
  index: number;
  timestampSeconds: number;
  width: number;
  height: number;
  pixels: Uint8Array;
}

export type AspectRatio = "16:9" | "9:16" | "1:1";

export type ExportPreset = "tiktok" | "instagram" | "youtube" | "youtube-hd" | "twitter";

export interface ExportPresetConfig {
  label: string;
  resolution: [number, number];
  aspectRatio: AspectRatio;
  fps: 24 | 30 | 60;
  description: string;
}

export const EXPORT_PRESETS: Record<ExportPreset, ExportPresetConfig> = {
  tiktok: {
    label: "TikTok / Reels",
    resolution: [1080, 1920],
    aspectRatio: "9:16",
    fps: 30,
    description: "TikTok, Instagram Reels, Shorts",
  },
  instagram: {
    label: "Instagram Square",
    resolution: [1080, 1080],
    aspectRatio: "1:1",
    fps: 30,
    description: "Instagram Feed",
  },
  youtube: {
    label: "YouTube",
    resolution: [1920, 1080],
    aspectRatio: "16:9",
    fps: 30,
    description: "YouTube, Vimeo",
  },
  "youtube-hd": {
    label: "YouTube HD",
    resolution: [1920, 1080],
    aspectRatio: "16:9",
    fps: 60,
    description: "YouTube high frame rate",
  },
  twitter: {
    label: "Twitter / X",
    resolution: [1280, 720],
    aspectRatio: "16:9",
    fps: 30,
    description: "Twitter/X video",
  },
};

export type RenderStatus =
  | "idle"
  | "analyzing"
  | "assembling"
  | "rendering"
  | "encoding"
  | "complete"
  | "cancelled"
  | "error";

export interface RenderProgress {
  status: RenderStatus;
  currentFrame: number;
  totalFrames: number;
  percentage: number;
  message: string;
}
