import type { Rgb } from "@/lib/pixels";
import type { CanvasSize } from "@/types/render";

export const MAX_STATIC_TEXT_LENGTH = 220;
export const MAX_TYPEWRITER_TEXT_LENGTH = 160;
export const MAX_CAPTION_TEXT_LENGTH = 400;
export const MAX_HASHTAGS = 5;

export interface TextStyle {
  fontSize: number;
  color: Rgb;
  strokeColor: Rgb;
  strokeWidth: number;
  /** Extra pixels between wrapped lines. */
  lineGap: number;
  /** Horizontal margin kept free inside the box when wrapping. */
  margin: number;
}

export const DEFAULT_TEXT_STYLE: TextStyle = {
  fontSize: 64,
  color: [255, 255, 255],
  strokeColor: [0, 0, 0],
  strokeWidth: 4,
  lineGap: 8,
  margin: 20,
};

/** RGB pixels plus 0-255 coverage for a box of rasterized text. */
export interface TextRaster {
  width: number;
  height: number;
  pixels: Uint8Array;
  coverage: Uint8Array;
}

/**
 * Rasterizes text with a font that was loaded before rendering began.
 * Implementations must not touch the filesystem in `rasterize`.
 */
export interface TextRasterizer {
  readonly fontFamily: string;
  measureText: (text: string, fontSize: number) => number;
  rasterize: (text: string, box: CanvasSize, style: TextStyle) => TextRaster;
}

/**
 * Collapse newlines, trim, and cut to `maxLength` code points with a trailing
 * "..." so per-frame layout cost stays bounded.
 */
export function truncateText(text: string | undefined | null, maxLength: number): string {
  if (!text) return "";
  const flat = text.replace(/\r?\n/g, " ").trim();
  const chars = Array.from(flat);
  return chars.length > maxLength ? `${chars.slice(0, maxLength - 3).join("")}...` : flat;
}

/**
 * Greedy word wrap. A word wider than `maxWidth` sits on a line of its own.
 */
export function wrapText(text: string, maxWidth: number, measure: (line: string) => number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    const candidate = line ? `${line} ${word}` : word;
    if (measure(candidate) <= maxWidth) {
      line = candidate;
    } else {
      if (line) lines.push(line);
      line = word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

export interface LineLayout {
  text: string;
  /** Centre x inside the box. */
  x: number;
  /** Top y inside the box. */
  y: number;
  width: number;
}

/** Wrap and centre text both ways inside `box`. */
export function layoutText(
  text: string,
  box: CanvasSize,
  style: TextStyle,
  measure: (line: string) => number,
): LineLayout[] {
  const lines = wrapText(text, box.width - style.margin, measure);
  const totalHeight = lines.length * style.fontSize + Math.max(0, lines.length - 1) * style.lineGap;
  let y = Math.floor((box.height - totalHeight) / 2);
  return lines.map((line) => {
    const layout = { text: line, x: box.width / 2, y, width: measure(line) };
    y += style.fontSize + style.lineGap;
    return layout;
  });
}

/** "#tag" for the first five hashtags, joined by two spaces. */
export function formatHashtags(hashtags: readonly string[] | undefined): string {
  if (!hashtags) return "";
  return hashtags
    .map((tag) => tag.trim().replace(/^#+/, ""))
    .filter((tag) => tag.length > 0)
    .slice(0, MAX_HASHTAGS)
    .map((tag) => `#${tag}`)
    .join("  ");
}

/**
 * Sentence-like caption chunks: split on ".", keep pieces longer than three
 * characters. Falls back to the whole text when nothing qualifies.
 */
export function splitCaptionChunks(text: string): string[] {
  if (!text) return [];
  const parts = text
    .split(".")
    .map((part) => part.trim())
    .filter((part) => part.length > 3);
  return parts.length > 0 ? parts : [text];
}
