/**
 * FFmpeg muxer — pipes PNG stills into `ffmpeg -f image2pipe` and produces
 * an H.264 / yuv420p MP4. Requires an ffmpeg binary on PATH (or an explicit
 * path).
 */

import { spawn } from 'child_process';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Writable } from 'stream';
import { AssemblyError, CancelledError } from '../errors/index.js';
import type { MuxInput, VideoMuxer } from './sequence-assembler.js';

export interface FfmpegMuxerOptions {
  /** ffmpeg executable (default: 'ffmpeg') */
  ffmpegPath?: string;
  /** libx264 preset (default: 'medium') */
  preset?: string;
}

const STDERR_TAIL = 2000;

/** Command-line arguments for one encode. */
export function buildFfmpegArgs(frameRate: number, outputPath: string, preset = 'medium'): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-y',
    '-f', 'image2pipe',
    '-framerate', String(frameRate),
    '-c:v', 'png',
    '-i', '-',
    '-c:v', 'libx264',
    '-preset', preset,
    '-pix_fmt', 'yuv420p',
    // libx264 with yuv420p needs even dimensions
    '-vf', 'pad=ceil(iw/2)*2:ceil(ih/2)*2',
    '-r', String(frameRate),
    '-movflags', '+faststart',
    outputPath,
  ];
}

function writeChunk(stream: Writable, chunk: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ok = stream.write(chunk, (err) => {
      if (err) reject(err);
    });
    if (ok) resolve();
    else stream.once('drain', resolve);
  });
}

export class FfmpegMuxer implements VideoMuxer {
  private readonly ffmpegPath: string;
  private readonly preset: string;

  constructor(options: FfmpegMuxerOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.preset = options.preset ?? 'medium';
  }

  async mux(input: MuxInput, signal?: AbortSignal): Promise<Buffer> {
    if (signal?.aborted) throw new CancelledError();

    const workDir = await mkdtemp(join(tmpdir(), 'deckmedia-mux-'));
    const outputPath = join(workDir, 'out.mp4');
    try {
      await this.run(input, outputPath, signal);
      return await readFile(outputPath);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private run(input: MuxInput, outputPath: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const proc = spawn(this.ffmpegPath, buildFfmpegArgs(input.frameRate, outputPath, this.preset), {
        stdio: ['pipe', 'ignore', 'pipe'],
      });

      let stderr = '';
      let settled = false;
      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (err) reject(err);
        else resolve();
      };
      const onAbort = (): void => {
        proc.kill('SIGKILL');
        finish(new CancelledError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stderr.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-STDERR_TAIL);
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        finish(new AssemblyError(
          error.code === 'ENOENT'
            ? `ffmpeg not found at "${this.ffmpegPath}"`
            : `ffmpeg failed to start: ${error.message}`
        ));
      });

      proc.on('close', (code) => {
        if (code === 0) finish();
        else finish(new AssemblyError(`ffmpeg exited with code ${code ?? 'null'}: ${stderr.trim()}`));
      });

      // EPIPE when ffmpeg exits early; the exit code is reported through 'close'.
      proc.stdin.on('error', (err: Error) => {
        stderr = (stderr + `\n[stdin] ${err.message}`).slice(-STDERR_TAIL);
      });

      this.feed(proc.stdin, input).catch((err: unknown) => {
        proc.kill('SIGKILL');
        finish(new AssemblyError(`Failed to stream frames to ffmpeg: ${err instanceof Error ? err.message : String(err)}`));
      });
    });
  }

  private async feed(stdin: Writable, input: MuxInput): Promise<void> {
    for (const [i, still] of input.stills.entries()) {
      const repeat = input.repeats[i] ?? 1;
      for (let r = 0; r < repeat; r++) {
        if (stdin.destroyed) return;
        await writeChunk(stdin, still);
      }
    }
    stdin.end();
  }
}
