/**
 * Sequence Assembler
 *
 * Turns ordered slide rasters plus per-slide display durations into a timed
 * video. Each slide contributes max(1, round(duration × fps)) copies of its
 * raster; frames are never interpolated. Container encoding is delegated to
 * a VideoMuxer.
 */

import { AssemblyError } from '../errors/index.js';
import type { RasterImage } from '../renderer/slide-renderer.js';
import { FormatTranscoder } from '../transcoder/format-transcoder.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface MuxInput {
  width: number;
  height: number;
  frameRate: number;
  /** One PNG-encoded still per slide */
  stills: Buffer[];
  /** How many consecutive video frames each still occupies */
  repeats: number[];
}

export interface VideoMuxer {
  mux(input: MuxInput, signal?: AbortSignal): Promise<Buffer>;
}

export interface AssembledVideo {
  bytes: Buffer;
  frameCount: number;
  /** frameCount / frameRate; may drift from the summed durations by under one frame per slide */
  durationSeconds: number;
}

/**
 * Per-slide frame counts for a frame rate. Rounds to nearest, never below 1.
 */
export function planFrames(durations: readonly number[], frameRate: number): number[] {
  return durations.map((d) => Math.max(1, Math.round(d * frameRate)));
}

// ─── SequenceAssembler ────────────────────────────────────────────────────────

export class SequenceAssembler {
  constructor(
    private readonly muxer: VideoMuxer,
    private readonly transcoder: FormatTranscoder = new FormatTranscoder()
  ) {}

  /**
   * Assemble slide rasters (already in slide order) into a video.
   * Throws AssemblyError for an empty sequence, mismatched durations, or
   * frames whose size differs from the first frame's.
   */
  async assemble(
    frames: readonly RasterImage[],
    durations: readonly number[],
    frameRate: number,
    signal?: AbortSignal
  ): Promise<AssembledVideo> {
    if (frames.length === 0) {
      throw new AssemblyError('Cannot assemble an empty frame sequence');
    }
    if (durations.length !== frames.length) {
      throw new AssemblyError(
        `Got ${frames.length} frames but ${durations.length} durations`,
        { frames: frames.length, durations: durations.length }
      );
    }
    if (!(frameRate > 0)) {
      throw new AssemblyError(`Frame rate must be positive, got ${frameRate}`);
    }
    for (const [i, d] of durations.entries()) {
      if (!(d > 0)) throw new AssemblyError(`Frame ${i} has a non-positive duration`);
    }

    const { width, height } = frames[0];
    frames.forEach((frame, i) => {
      if (frame.width !== width || frame.height !== height) {
        throw new AssemblyError(
          `Frame ${i} is ${frame.width}x${frame.height}, sequence is ${width}x${height}`,
          { index: i, expected: `${width}x${height}`, actual: `${frame.width}x${frame.height}` }
        );
      }
    });

    const repeats = planFrames(durations, frameRate);
    const frameCount = repeats.reduce((sum, r) => sum + r, 0);
    const stills = frames.map((frame) => this.transcoder.encode(frame, 'png'));

    const bytes = await this.muxer.mux({ width, height, frameRate, stills, repeats }, signal);

    return { bytes, frameCount, durationSeconds: frameCount / frameRate };
  }
}
