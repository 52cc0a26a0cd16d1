export type * from "./audio";
export type { SegmentName, StoryBeats, Concept } from "./concept";
export type {
  VisualStyle,
  LayerKind,
  CanvasSize,
  TimeRange,
  Timeline,
  LayerRaster,
  Layer,
  Frame,
  AspectRatio,
  ExportPreset,
  ExportPresetConfig,
  RenderStatus,
  RenderProgress,
} from "./render";
export { EXPORT_PRESETS, VISUAL_STYLES } from "./render";
