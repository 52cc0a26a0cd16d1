import { blendRaster, createRgbBuffer } from "@/lib/pixels";
import { CompositorStateError } from "@/lib/errors";
import type { AudioAnalysis } from "@/types/audio";
import type { CanvasSize, Frame, Layer, Timeline } from "@/types/render";

export type CompositorState = "assembling" | "rendering";

/** `ceil(D · fps)` ticks. The epsilon absorbs float error such as 0.1 · 30 = 3.0000000000000004. */
export function frameCountFor(durationSeconds: number, fps: number): number {
  return Math.max(0, Math.ceil(durationSeconds * fps - 1e-9));
}

export function isLayerActive(layer: Layer, time: number): boolean {
  return time >= layer.startSeconds && time < layer.startSeconds + layer.durationSeconds;
}

/**
 * Stacks layers into frames. Layers are added while assembling; after
 * `beginRendering()` the stack is frozen and any frame can be rendered on its
 * own, in any order.
 */
export class Compositor {
  private state: CompositorState = "assembling";
  private readonly pending: Layer[] = [];
  private stack: readonly Layer[] = [];
  private analysis: AudioAnalysis | null = null;
  private timeline: Timeline | null = null;

  constructor(
    readonly size: CanvasSize,
    readonly fps: number,
  ) {}

  get currentState(): CompositorState {
    return this.state;
  }

  get layers(): readonly Layer[] {
    return this.state === "rendering" ? this.stack : this.pending;
  }

  get frameCount(): number {
    return this.analysis ? frameCountFor(this.analysis.durationSeconds, this.fps) : 0;
  }

  setAnalysis(analysis: AudioAnalysis, timeline: Timeline): void {
    this.assertAssembling("setAnalysis");
    this.analysis = analysis;
    this.timeline = timeline;
  }

  addLayer(layer: Layer): void {
    this.assertAssembling("addLayer");
    this.pending.push(layer);
  }

  addLayers(layers: readonly Layer[]): void {
    for (const layer of layers) this.addLayer(layer);
  }

  beginRendering(): void {
    this.assertAssembling("beginRendering");
    if (!this.analysis || !this.timeline) {
      throw new CompositorStateError("cannot render before audio analysis and timeline are set");
    }
    if (this.pending.length === 0) {
      throw new CompositorStateError("cannot render without layers");
    }
    // Array.prototype.sort is stable, so equal zIndex keeps insertion order.
    this.stack = Object.freeze([...this.pending].sort((a, b) => a.zIndex - b.zIndex));
    this.state = "rendering";
  }

  renderFrame(index: number): Frame {
    if (this.state !== "rendering") {
      throw new CompositorStateError("renderFrame called before beginRendering");
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.frameCount) {
      throw new RangeError(`frame index ${index} outside [0, ${this.frameCount})`);
    }

    const time = index / this.fps;
    const canvas = createRgbBuffer(this.size.width, this.size.height);
    for (const layer of this.stack) {
      if (!isLayerActive(layer, time)) continue;
      const raster = layer.render(time);
      if (raster) blendRaster(canvas, this.size, raster, layer.opacity);
    }

    return Object.freeze({
      index,
      timestampSeconds: time,
      width: this.size.width,
      height: this.size.height,
      pixels: canvas,
    });
  }

  private assertAssembling(operation: string): void {
    if (this.state !== "assembling") {
      throw new CompositorStateError(`${operation} is only allowed while assembling`);
    }
  }
}
