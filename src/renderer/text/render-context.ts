import type { RenderConfig } from "@/lib/config";
import { createLogger, type Logger } from "@/lib/logger";
import type { CanvasSize } from "@/types/render";
import { CanvasTextRasterizer } from "@/renderer/text/canvas-rasterizer";
import type { TextRasterizer } from "@/renderer/text/text-layout";

/**
 * Everything layers share while rendering: canvas geometry, the loaded font,
 * and the seed for procedural randomness. Owned by one render job.
 */
export interface RenderContext {
  size: CanvasSize;
  fps: number;
  seed: number;
  rasterizer: TextRasterizer;
  logger: Logger;
}

export function createRenderContext(
  config: Pick<RenderConfig, "width" | "height" | "fps" | "seed" | "font">,
  overrides: { rasterizer?: TextRasterizer; logger?: Logger } = {},
): RenderContext {
  return {
    size: { width: config.width, height: config.height },
    fps: config.fps,
    seed: config.seed,
    rasterizer: overrides.rasterizer ?? new CanvasTextRasterizer(config.font),
    logger: overrides.logger ?? createLogger("render"),
  };
}
