import type { TextRaster, TextRasterizer, TextStyle } from "@/renderer/text/text-layout";
import type { CanvasSize } from "@/types/render";

/**
 * Deterministic rasterizer for tests: every character is `fontSize / 2` wide,
 * and the drawn text is a solid block of `style.color`, one column per
 * character, across the top row of the box.
 */
export class StubRasterizer implements TextRasterizer {
  readonly fontFamily = "stub";
  readonly calls: string[] = [];

  measureText(text: string, fontSize: number): number {
    return (text.length * fontSize) / 2;
  }

  rasterize(text: string, box: CanvasSize, style: TextStyle): TextRaster {
    this.calls.push(text);
    const pixels = new Uint8Array(box.width * box.height * 3);
    const coverage = new Uint8Array(box.width * box.height);
    for (let x = 0; x < Math.min(box.width, text.length); x++) {
      coverage[x] = 255;
      pixels[x * 3] = style.color[0];
      pixels[x * 3 + 1] = style.color[1];
      pixels[x * 3 + 2] = style.color[2];
    }
    return { width: box.width, height: box.height, pixels, coverage };
  }
}
