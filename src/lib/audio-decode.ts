import { describeError, InvalidAudioError } from "@/lib/errors";
import { runCommand } from "@/lib/ffmpeg";
import type { PcmAudio } from "@/types/audio";

export const DECODE_SAMPLE_RATE = 22050;

/** Reinterpret little-endian float32 bytes as samples, copying into an aligned buffer. */
export function float32FromBytes(bytes: Uint8Array): Float32Array {
  const count = Math.floor(bytes.byteLength / 4);
  const view = new DataView(bytes.buffer, bytes.byteOffset, count * 4);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) samples[i] = view.getFloat32(i * 4, true);
  return samples;
}

/**
 * Decode any file ffmpeg can read into mono float PCM at `sampleRate`.
 */
export async function decodeAudioFile(
  ffmpegPath: string,
  inputPath: string,
  sampleRate = DECODE_SAMPLE_RATE,
): Promise<PcmAudio> {
  const args = ["-v", "error", "-i", inputPath, "-vn", "-ac", "1", "-ar", String(sampleRate), "-f", "f32le", "-"];
  let stdout: Uint8Array;
  try {
    ({ stdout } = await runCommand(ffmpegPath, args));
  } catch (error) {
    throw new InvalidAudioError(`could not decode ${inputPath}: ${describeError(error)}`);
  }
  return { samples: float32FromBytes(stdout), sampleRate };
}
