import { MathUtils } from "three";
import { LayerInputMissing } from "@/lib/errors";
import type { CanvasSize, Layer, LayerKind, LayerRaster } from "@/types/render";
import type { RenderContext } from "@/renderer/text/render-context";
import {
  DEFAULT_TEXT_STYLE,
  formatHashtags,
  MAX_CAPTION_TEXT_LENGTH,
  MAX_STATIC_TEXT_LENGTH,
  MAX_TYPEWRITER_TEXT_LENGTH,
  splitCaptionChunks,
  truncateText,
  type TextRaster,
  type TextStyle,
} from "@/renderer/text/text-layout";

/** Where a text box sits, as fractions of the canvas plus a height at 1080 px width. */
export interface TextSlot {
  top: number;
  widthRatio: number;
  height: number;
  fontSize: number;
  color: TextStyle["color"];
}

export const TEXT_SLOTS = {
  title: { top: 0.18, widthRatio: 0.9, height: 280, fontSize: 80, color: [255, 240, 200] },
  story: { top: 0.42, widthRatio: 0.9, height: 300, fontSize: 64, color: [255, 255, 255] },
  caption: { top: 0.86, widthRatio: 0.9, height: 200, fontSize: 56, color: [255, 235, 140] },
  hashtags: { top: 0.92, widthRatio: 0.9, height: 160, fontSize: 44, color: [200, 220, 255] },
} as const satisfies Record<string, TextSlot>;

interface TextLayerOptions {
  id: string;
  context: RenderContext;
  text: string | undefined;
  startSeconds: number;
  durationSeconds: number;
  slot: TextSlot;
  kind?: LayerKind;
  zIndex?: number;
  opacity?: number;
}

interface TextBox {
  x: number;
  y: number;
  size: CanvasSize;
  style: TextStyle;
}

function resolveBox(canvas: CanvasSize, slot: TextSlot): TextBox {
  const scale = canvas.width / 1080;
  const width = Math.max(1, Math.round(canvas.width * slot.widthRatio));
  const height = Math.max(1, Math.round(slot.height * scale));
  return {
    x: Math.round((canvas.width - width) / 2),
    y: Math.round(canvas.height * slot.top),
    size: { width, height },
    style: {
      ...DEFAULT_TEXT_STYLE,
      fontSize: Math.max(8, Math.round(slot.fontSize * scale)),
      color: slot.color,
      strokeWidth: Math.max(1, Math.round(DEFAULT_TEXT_STYLE.strokeWidth * scale)),
      lineGap: Math.round(DEFAULT_TEXT_STYLE.lineGap * scale),
      margin: DEFAULT_TEXT_STYLE.margin,
    },
  };
}

const place = (raster: TextRaster, box: TextBox): LayerRaster => ({
  x: box.x,
  y: box.y,
  width: raster.width,
  height: raster.height,
  pixels: raster.pixels,
  coverage: raster.coverage,
});

/**
 * Layer with nothing to show. Kept in the layer set so callers can still see
 * it, but never active.
 */
function emptyTextLayer({ id, context, startSeconds, kind = "text", zIndex = 60 }: TextLayerOptions): Layer {
  context.logger.warn(new LayerInputMissing(id).message);
  return { id, kind, zIndex, startSeconds, durationSeconds: 0, opacity: 1, render: () => null };
}

/** Static text shown for its whole window. Rasterized once, on first use. */
export function createTextLayer(options: TextLayerOptions): Layer {
  const text = truncateText(options.text, MAX_STATIC_TEXT_LENGTH);
  if (!text || options.durationSeconds <= 0) return emptyTextLayer(options);

  const { context, slot } = options;
  const box = resolveBox(context.size, slot);
  let cached: LayerRaster | undefined;

  return {
    id: options.id,
    kind: options.kind ?? "text",
    zIndex: options.zIndex ?? 60,
    startSeconds: options.startSeconds,
    durationSeconds: options.durationSeconds,
    opacity: options.opacity ?? 1,
    render: () => {
      cached ??= place(context.rasterizer.rasterize(text, box.size, box.style), box);
      return cached;
    },
  };
}

/**
 * Number of characters a typewriter shows `localTime` seconds into a window of
 * `windowSeconds`: `floor(length · clamp(localTime / windowSeconds, 0, 1))`.
 */
export function typewriterLength(length: number, localTime: number, windowSeconds: number): number {
  if (windowSeconds <= 0) return length;
  return Math.floor(length * MathUtils.clamp(localTime / windowSeconds, 0, 1));
}

/** Text revealed character by character over its window. Draws nothing until the first character. */
export function createTypewriterLayer(options: TextLayerOptions): Layer {
  const text = truncateText(options.text, MAX_TYPEWRITER_TEXT_LENGTH);
  if (!text || options.durationSeconds <= 0) return emptyTextLayer(options);

  const { context, slot, startSeconds, durationSeconds } = options;
  const box = resolveBox(context.size, slot);
  // Code points, so a prefix never ends inside a surrogate pair.
  const chars = Array.from(text);
  const prefixes = new Map<number, LayerRaster>();

  return {
    id: options.id,
    kind: options.kind ?? "text",
    zIndex: options.zIndex ?? 70,
    startSeconds,
    durationSeconds,
    opacity: options.opacity ?? 1,
    render: (t) => {
      const shown = typewriterLength(chars.length, t - startSeconds, durationSeconds);
      if (shown === 0) return null;
      let raster = prefixes.get(shown);
      if (!raster) {
        raster = place(context.rasterizer.rasterize(chars.slice(0, shown).join(""), box.size, box.style), box);
        prefixes.set(shown, raster);
      }
      return raster;
    },
  };
}

/** Index of the caption chunk on screen `localTime` seconds into the window. */
export function captionChunkIndex(chunkCount: number, localTime: number, windowSeconds: number): number {
  if (chunkCount <= 0) return -1;
  const slice = windowSeconds / chunkCount;
  if (slice <= 0) return 0;
  return MathUtils.clamp(Math.floor(localTime / slice), 0, chunkCount - 1);
}

/** Sentence-by-sentence captions, each chunk taking an equal slice of the window. */
export function createCaptionLayer(options: TextLayerOptions): Layer {
  const text = truncateText(options.text, MAX_CAPTION_TEXT_LENGTH);
  const chunks = splitCaptionChunks(text);
  const kind = options.kind ?? "caption";
  if (chunks.length === 0 || options.durationSeconds <= 0) return emptyTextLayer({ ...options, kind });

  const { context, slot, startSeconds, durationSeconds } = options;
  const box = resolveBox(context.size, slot);
  const rendered = new Map<number, LayerRaster>();

  return {
    id: options.id,
    kind,
    zIndex: options.zIndex ?? 80,
    startSeconds,
    durationSeconds,
    opacity: options.opacity ?? 1,
    render: (t) => {
      const index = captionChunkIndex(chunks.length, t - startSeconds, durationSeconds);
      const chunk = chunks[index];
      if (chunk === undefined) return null;
      let raster = rendered.get(index);
      if (!raster) {
        raster = place(context.rasterizer.rasterize(chunk, box.size, box.style), box);
        rendered.set(index, raster);
      }
      return raster;
    },
  };
}

/** Hashtag strip along the bottom for the whole track. */
export function createHashtagLayer(
  context: RenderContext,
  hashtags: readonly string[] | undefined,
  durationSeconds: number,
): Layer {
  return createTextLayer({
    id: "hashtags",
    context,
    text: formatHashtags(hashtags),
    startSeconds: 0,
    durationSeconds,
    slot: TEXT_SLOTS.hashtags,
    zIndex: 65,
    opacity: 0.9,
  });
}
