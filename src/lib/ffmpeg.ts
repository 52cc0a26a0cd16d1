import { spawn } from "node:child_process";
import { EncodingError } from "@/lib/errors";

const UTF8_DECODER = new TextDecoder();
const STDERR_TAIL_BYTES = 2000;

export function concatChunks(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/** Last couple of kilobytes of a process's stderr, decoded. ffmpeg puts the actual error at the end. */
export function stderrTail(chunks: readonly Uint8Array[]): string {
  const all = concatChunks(chunks);
  return UTF8_DECODER.decode(all.subarray(Math.max(0, all.byteLength - STDERR_TAIL_BYTES))).trim();
}

/**
 * Run a command to completion, collecting stdout and stderr. Rejects with an
 * `EncodingError` when the binary cannot start or exits non-zero.
 */
export const runCommand = (
  command: string,
  args: readonly string[],
  stdin?: Uint8Array,
): Promise<{ stdout: Uint8Array; stderr: Uint8Array }> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdoutChunks: Uint8Array[] = [];
    const stderrChunks: Uint8Array[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));
    child.on("error", (error) => {
      reject(new EncodingError(`could not start ${command}: ${error.message}`, { cause: error }));
    });
    child.on("close", (code) => {
      if (code !== 0) {
        reject(new EncodingError(`${command} exited with code ${code}\n${stderrTail(stderrChunks)}`));
        return;
      }
      resolve({ stdout: concatChunks(stdoutChunks), stderr: concatChunks(stderrChunks) });
    });
    if (stdin && stdin.byteLength > 0) {
      child.stdin.write(stdin);
    }
    child.stdin.end();
  });
