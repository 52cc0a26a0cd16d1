import { MathUtils } from "three";
import { createCanvasRaster, stampDisc, type Rgb } from "@/lib/pixels";
import { createRandom, hashInts, randomRange } from "@/lib/random";
import type { AudioAnalysis } from "@/types/audio";
import type { CanvasSize, Layer } from "@/types/render";
import { envelopeValueAt } from "@/renderer/utils/audio-helpers";

interface ParticleOptions {
  size: CanvasSize;
  analysis: AudioAnalysis;
  seed: number;
  count?: number;
  zIndex?: number;
  opacity?: number;
}

interface ParticleState {
  x: number;
  y: number;
  /** Seconds of life left in the current cycle. */
  remaining: number;
  color: Rgb;
}

const GRAVITY = 50;
const MAX_SPEED = 200;
const MIN_LIFE = 0.5;
const MAX_LIFE = 2;

/**
 * Closed-form state of particle `index` at time `t`. Each particle lives in
 * cycles of a fixed lifetime; every cycle respawns it from parameters hashed
 * out of (seed, index, cycle), and within a cycle position follows
 * `p0 + v·age + ½·g·age²`. Nothing carries over from earlier frames.
 */
export function particleAt(seed: number, index: number, t: number, size: CanvasSize): ParticleState {
  const scale = size.width / 1080;
  const identity = createRandom(hashInts(seed, index));
  const lifetime = randomRange(identity, MIN_LIFE, MAX_LIFE);
  const offset = identity() * lifetime;

  const local = t + offset;
  const cycle = Math.floor(local / lifetime);
  const age = local - cycle * lifetime;

  const spawn = createRandom(hashInts(seed, index, cycle));
  const x0 = spawn() * size.width;
  const y0 = spawn() * size.height;
  const vx = randomRange(spawn, -MAX_SPEED, MAX_SPEED) * scale;
  const vy = randomRange(spawn, -MAX_SPEED, MAX_SPEED) * scale;
  const color: Rgb = [
    Math.floor(randomRange(spawn, 200, 256)),
    Math.floor(randomRange(spawn, 100, 256)),
    Math.floor(randomRange(spawn, 0, 256)),
  ];

  return {
    x: x0 + vx * age,
    y: y0 + vy * age + 0.5 * GRAVITY * scale * age * age,
    remaining: lifetime - age,
    color,
  };
}

/**
 * Seeded particle burst. Visual state comes from the loudness envelope at the
 * current index (louder passages draw bigger particles) and from `particleAt`,
 * so any frame can be rendered on its own and in any order.
 */
export function createParticleLayer({
  size,
  analysis,
  seed,
  count = 200,
  zIndex = 20,
  opacity = 0.9,
}: ParticleOptions): Layer {
  const scale = size.width / 1080;

  return {
    id: "particles",
    kind: "overlay",
    zIndex,
    startSeconds: 0,
    durationSeconds: analysis.durationSeconds,
    opacity,
    render: (t) => {
      const energy = envelopeValueAt(analysis, t);
      const raster = createCanvasRaster(size, { coverage: true });
      for (let i = 0; i < count; i++) {
        const particle = particleAt(seed, i, t, size);
        if (particle.x < 0 || particle.x >= size.width || particle.y < 0 || particle.y >= size.height) continue;
        const radius = Math.round(10 * scale * particle.remaining * (0.6 + 0.8 * energy));
        stampDisc(raster, particle.x, particle.y, radius, particle.color, MathUtils.clamp(particle.remaining, 0, 1));
      }
      return raster;
    },
  };
}
