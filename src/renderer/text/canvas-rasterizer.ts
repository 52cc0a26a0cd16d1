import { createCanvas, GlobalFonts, type SKRSContext2D } from "@napi-rs/canvas";
import type { FontResource } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import type { Rgb } from "@/lib/pixels";
import type { CanvasSize } from "@/types/render";
import { layoutText, type TextRaster, type TextRasterizer, type TextStyle } from "@/renderer/text/text-layout";

const css = (color: Rgb) => `rgb(${color[0]}, ${color[1]}, ${color[2]})`;

/**
 * Skia-backed rasterizer. The font file, when given, is registered once here
 * so nothing is looked up on disk while frames render.
 */
export class CanvasTextRasterizer implements TextRasterizer {
  readonly fontFamily: string;
  private readonly weight: FontResource["weight"];
  private readonly measureContext: SKRSContext2D;

  constructor(font: FontResource) {
    if (font.path && !GlobalFonts.registerFromPath(font.path, font.family)) {
      throw new ConfigError(`font file could not be registered: ${font.path}`);
    }
    this.fontFamily = font.family;
    this.weight = font.weight;
    this.measureContext = createCanvas(1, 1).getContext("2d");
  }

  private fontString(fontSize: number): string {
    return `${this.weight} ${fontSize}px ${this.fontFamily}`;
  }

  measureText(text: string, fontSize: number): number {
    this.measureContext.font = this.fontString(fontSize);
    return this.measureContext.measureText(text).width;
  }

  rasterize(text: string, box: CanvasSize, style: TextStyle): TextRaster {
    const canvas = createCanvas(box.width, box.height);
    const ctx = canvas.getContext("2d");
    ctx.font = this.fontString(style.fontSize);
    ctx.textAlign = "center";
    ctx.textBaseline = "top";
    ctx.lineJoin = "round";
    ctx.lineWidth = style.strokeWidth;
    ctx.strokeStyle = css(style.strokeColor);
    ctx.fillStyle = css(style.color);

    const lines = layoutText(text, box, style, (line) => ctx.measureText(line).width);
    for (const line of lines) {
      if (style.strokeWidth > 0) ctx.strokeText(line.text, line.x, line.y);
      ctx.fillText(line.text, line.x, line.y);
    }

    const rgba = ctx.getImageData(0, 0, box.width, box.height).data;
    const count = box.width * box.height;
    const pixels = new Uint8Array(count * 3);
    const coverage = new Uint8Array(count);
    for (let p = 0; p < count; p++) {
      pixels[p * 3] = rgba[p * 4] ?? 0;
      pixels[p * 3 + 1] = rgba[p * 4 + 1] ?? 0;
      pixels[p * 3 + 2] = rgba[p * 4 + 2] ?? 0;
      coverage[p] = rgba[p * 4 + 3] ?? 0;
    }
    return { width: box.width, height: box.height, pixels, coverage };
  }
}
