import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import { LOG_LEVELS } from "@/lib/logger";
import { EXPORT_PRESETS, VISUAL_STYLES, type ExportPreset } from "@/types/render";

const logLevelSchema = z.enum(LOG_LEVELS);
const visualStyleSchema = z.enum(VISUAL_STYLES);

export const fontResourceSchema = z.object({
  family: z.string().min(1).default("sans-serif"),
  /** TrueType/OpenType file registered under `family` before rendering starts. */
  path: z.string().min(1).optional(),
  weight: z.enum(["normal", "bold"]).default("bold"),
});

export const renderConfigSchema = z.object({
  width: z.number().int().min(2).max(7680).default(1080),
  height: z.number().int().min(2).max(7680).default(1920),
  fps: z.number().int().min(1).max(120).default(30),
  style: visualStyleSchema.default("classic"),
  enhancedEffects: z.boolean().default(false),
  seed: z.number().int().nonnegative().default(42),
  font: fontResourceSchema.default({}),
  concurrency: z.number().int().min(1).max(64).default(4),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
  videoCodec: z.string().min(1).default("libx264"),
  audioCodec: z.string().min(1).default("aac"),
  audioBitrate: z.string().regex(/^\d+k$/).default("160k"),
  crf: z.number().int().min(0).max(51).default(20),
  preset: z
    .enum(["ultrafast", "superfast", "veryfast", "faster", "fast", "medium", "slow", "slower", "veryslow"])
    .default("medium"),
  logLevel: logLevelSchema.default("info"),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;
export type RenderConfigInput = z.input<typeof renderConfigSchema>;
export type FontResource = z.infer<typeof fontResourceSchema>;

type Env = Record<string, string | undefined>;

function envOverrides(env: Env) {
  return {
    ...(env.BEATREEL_FFMPEG_PATH ? { ffmpegPath: env.BEATREEL_FFMPEG_PATH } : {}),
    // Passed through as a plain string so zod reports an unknown level.
    ...(env.BEATREEL_LOG_LEVEL ? { logLevel: env.BEATREEL_LOG_LEVEL } : {}),
  };
}

/**
 * Resolve a full render configuration. Precedence, lowest first: schema
 * defaults, the named export preset, environment variables, explicit input.
 */
export function resolveRenderConfig(
  input: RenderConfigInput = {},
  options: { preset?: ExportPreset; env?: Env } = {},
): RenderConfig {
  const preset = options.preset ? EXPORT_PRESETS[options.preset] : undefined;
  const fromPreset: RenderConfigInput = preset
    ? { width: preset.resolution[0], height: preset.resolution[1], fps: preset.fps }
    : {};
  const env = options.env ?? process.env;
  const fontPath = env.BEATREEL_FONT_PATH;

  const merged = {
    ...fromPreset,
    ...envOverrides(env),
    ...input,
    font: { ...(fontPath ? { path: fontPath } : {}), ...input.font },
  };

  const parsed = renderConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`invalid render configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
