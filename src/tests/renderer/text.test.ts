import { describe, it, expect, vi } from "vitest";
import {
  captionChunkIndex,
  createCaptionLayer,
  createHashtagLayer,
  createTextLayer,
  createTypewriterLayer,
  TEXT_SLOTS,
  typewriterLength,
} from "@/renderer/layers/text-layers";
import {
  DEFAULT_TEXT_STYLE,
  formatHashtags,
  layoutText,
  splitCaptionChunks,
  truncateText,
  wrapText,
} from "@/renderer/text/text-layout";
import type { Logger } from "@/lib/logger";
import { makeContext } from "@/tests/helpers/fixtures";
import { StubRasterizer } from "@/tests/helpers/stub-rasterizer";

const size = { width: 108, height: 192 };

function setup() {
  const rasterizer = new StubRasterizer();
  const warn = vi.fn();
  const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: () => logger };
  return { rasterizer, warn, context: makeContext(size, { rasterizer, logger }) };
}

describe("truncateText", () => {
  it("collapses newlines and trims", () => {
    expect(truncateText("  one\ntwo\r\nthree ", 50)).toBe("one two three");
  });

  it("cuts overlong text with a trailing ellipsis", () => {
    expect(truncateText("abcdefghij", 8)).toBe("abcde...");
    expect(truncateText("abcdefgh", 8)).toBe("abcdefgh");
  });

  it("never cuts through an emoji", () => {
    expect(truncateText("🔥🔥🔥🔥🔥", 4)).toBe("🔥...");
    expect(truncateText("🔥🔥🔥🔥", 4)).toBe("🔥🔥🔥🔥");
  });

  it("returns an empty string for missing text", () => {
    expect(truncateText(undefined, 10)).toBe("");
  });
});

describe("wrapText", () => {
  const measure = (line: string) => line.length;

  it("wraps greedily at the width", () => {
    expect(wrapText("aa bb cc", 5, measure)).toEqual(["aa bb", "cc"]);
  });

  it("gives an overlong word its own line", () => {
    expect(wrapText("a verylongword b", 4, measure)).toEqual(["a", "verylongword", "b"]);
  });
});

describe("layoutText", () => {
  it("centres wrapped lines in the box", () => {
    const style = { ...DEFAULT_TEXT_STYLE, fontSize: 10, lineGap: 2, margin: 20 };
    const lines = layoutText("aaaa bbbb cccc dddd", { width: 100, height: 100 }, style, (line) => line.length * 5);
    expect(lines).toEqual([
      { text: "aaaa bbbb cccc", x: 50, y: 39, width: 70 },
      { text: "dddd", x: 50, y: 51, width: 20 },
    ]);
  });
});

describe("formatHashtags", () => {
  it("prefixes, dedupes hashes and keeps the first five", () => {
    expect(formatHashtags(["#lofi", " chill ", "", "##x", "a", "b", "c"])).toBe("#lofi  #chill  #x  #a  #b");
    expect(formatHashtags(undefined)).toBe("");
  });
});

describe("splitCaptionChunks", () => {
  it("keeps sentence pieces longer than three characters", () => {
    expect(splitCaptionChunks("First part. Second part. Ok.")).toEqual(["First part", "Second part"]);
  });

  it("falls back to the whole text", () => {
    expect(splitCaptionChunks("Hey. Yo.")).toEqual(["Hey. Yo."]);
    expect(splitCaptionChunks("")).toEqual([]);
  });
});

describe("createTextLayer", () => {
  it("gives empty text a zero duration and logs it", () => {
    const { context, warn } = setup();
    const layer = createTextLayer({
      id: "story:intro",
      context,
      text: "   ",
      startSeconds: 0,
      durationSeconds: 3,
      slot: TEXT_SLOTS.story,
    });
    expect(layer.durationSeconds).toBe(0);
    expect(layer.render(0)).toBeNull();
    expect(warn).toHaveBeenCalledWith('no text for layer "story:intro"; rendering it with zero duration');
  });

  it("rasterizes once and reuses the result", () => {
    const { context, rasterizer } = setup();
    const layer = createTextLayer({
      id: "story:climax",
      context,
      text: "Full speed",
      startSeconds: 2,
      durationSeconds: 3,
      slot: TEXT_SLOTS.story,
    });
    const first = layer.render(2);
    const second = layer.render(4);
    expect(second).toBe(first);
    expect(rasterizer.calls).toEqual(["Full speed"]);
  });
});

describe("createTypewriterLayer", () => {
  it("reveals characters over the window", () => {
    const { context, rasterizer } = setup();
    const layer = createTypewriterLayer({
      id: "title",
      context,
      text: "Hello",
      startSeconds: 0,
      durationSeconds: 2,
      slot: TEXT_SLOTS.title,
    });
    expect(layer.render(0)).toBeNull();
    const raster = layer.render(1);
    layer.render(1);
    layer.render(1.9);
    expect(rasterizer.calls).toEqual(["He", "Hell"]);
    expect(raster).toMatchObject({ x: 6, y: 35, width: 97, height: 28 });
  });

  it("reveals at most the truncated text", () => {
    const { context, rasterizer } = setup();
    const layer = createTypewriterLayer({
      id: "title",
      context,
      text: "a".repeat(200),
      startSeconds: 0,
      durationSeconds: 1,
      slot: TEXT_SLOTS.title,
    });
    layer.render(0.5);
    expect(rasterizer.calls[0]).toHaveLength(80);
  });

  it("reveals emoji whole", () => {
    const { context, rasterizer } = setup();
    const layer = createTypewriterLayer({
      id: "title",
      context,
      text: "🔥🔥🔥🔥",
      startSeconds: 0,
      durationSeconds: 2,
      slot: TEXT_SLOTS.title,
    });
    for (const t of [0.5, 1, 1.5, 2]) layer.render(t);
    expect(rasterizer.calls).toEqual(["🔥", "🔥🔥", "🔥🔥🔥", "🔥🔥🔥🔥"]);
  });

  it("counts characters with floor(len * clamp(t/d, 0, 1))", () => {
    expect(typewriterLength(10, 0.25, 1)).toBe(2);
    expect(typewriterLength(10, -1, 1)).toBe(0);
    expect(typewriterLength(10, 5, 1)).toBe(10);
    expect(typewriterLength(10, 5, 0)).toBe(10);
  });
});

describe("createCaptionLayer", () => {
  it("shows each chunk for an equal slice, in order", () => {
    const { context, rasterizer } = setup();
    const layer = createCaptionLayer({
      id: "captions",
      context,
      text: "First part. Second part. Ok.",
      startSeconds: 0,
      durationSeconds: 10,
      slot: TEXT_SLOTS.caption,
    });
    expect(layer.kind).toBe("caption");
    layer.render(2);
    layer.render(6);
    layer.render(9.99);
    expect(rasterizer.calls).toEqual(["First part", "Second part"]);
  });

  it("logs and disables itself without a transcript", () => {
    const { context, warn } = setup();
    const layer = createCaptionLayer({
      id: "captions",
      context,
      text: undefined,
      startSeconds: 0,
      durationSeconds: 10,
      slot: TEXT_SLOTS.caption,
    });
    expect(layer.durationSeconds).toBe(0);
    expect(layer.kind).toBe("caption");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("maps time to a chunk index and clamps at the end", () => {
    expect(captionChunkIndex(3, 0, 9)).toBe(0);
    expect(captionChunkIndex(3, 3, 9)).toBe(1);
    expect(captionChunkIndex(3, 10, 9)).toBe(2);
    expect(captionChunkIndex(0, 1, 9)).toBe(-1);
  });
});

describe("createHashtagLayer", () => {
  it("shows formatted tags for the whole track", () => {
    const { context, rasterizer } = setup();
    const layer = createHashtagLayer(context, ["#lofi", "chill"], 5);
    expect(layer).toMatchObject({ id: "hashtags", startSeconds: 0, durationSeconds: 5, opacity: 0.9 });
    layer.render(0);
    expect(rasterizer.calls).toEqual(["#lofi  #chill"]);
  });

  it("is zero-duration without hashtags", () => {
    const { context } = setup();
    expect(createHashtagLayer(context, [], 5).durationSeconds).toBe(0);
  });
});
