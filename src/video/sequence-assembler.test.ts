import { describe, it, expect, vi } from 'vitest';

vi.mock('@napi-rs/canvas', () => ({ createCanvas: vi.fn() }));

import { AssemblyError } from '../errors/index.js';
import type { RasterImage } from '../renderer/slide-renderer.js';
import { FormatTranscoder } from '../transcoder/format-transcoder.js';
import { planFrames, SequenceAssembler } from './sequence-assembler.js';
import type { MuxInput, VideoMuxer } from './sequence-assembler.js';

class StubTranscoder extends FormatTranscoder {
  override encode(raster: RasterImage, format: string): Buffer {
    return Buffer.from(`${format}:${raster.width}x${raster.height}:${raster.pixels[0]}`);
  }
}

class RecordingMuxer implements VideoMuxer {
  inputs: MuxInput[] = [];

  async mux(input: MuxInput): Promise<Buffer> {
    this.inputs.push(input);
    return Buffer.from('mp4');
  }
}

function frame(width: number, height: number, marker = 0): RasterImage {
  const pixels = new Uint8ClampedArray(width * height * 4);
  pixels[0] = marker;
  return { width, height, pixels };
}

describe('planFrames', () => {
  it('rounds duration × fps to the nearest frame', () => {
    expect(planFrames([2.5], 2)).toEqual([5]);
    expect(planFrames([3, 3], 24)).toEqual([72, 72]);
  });

  it('never drops a slide below one frame', () => {
    expect(planFrames([0.1], 1)).toEqual([1]);
  });
});

describe('SequenceAssembler', () => {
  it('encodes each slide once and hands repeat counts to the muxer', async () => {
    const muxer = new RecordingMuxer();
    const assembler = new SequenceAssembler(muxer, new StubTranscoder());

    const video = await assembler.assemble([frame(4, 2, 1), frame(4, 2, 2)], [2.5, 0.1], 2);

    expect(video).toEqual({ bytes: Buffer.from('mp4'), frameCount: 6, durationSeconds: 3 });
    expect(muxer.inputs).toHaveLength(1);
    expect(muxer.inputs[0].width).toBe(4);
    expect(muxer.inputs[0].height).toBe(2);
    expect(muxer.inputs[0].frameRate).toBe(2);
    expect(muxer.inputs[0].repeats).toEqual([5, 1]);
    expect(muxer.inputs[0].stills.map((s) => s.toString())).toEqual(['png:4x2:1', 'png:4x2:2']);
  });

  it('rejects frames of a different size', async () => {
    const assembler = new SequenceAssembler(new RecordingMuxer(), new StubTranscoder());

    await expect(assembler.assemble([frame(1920, 1080), frame(1280, 720)], [1, 1], 10))
      .rejects.toThrow('Frame 1 is 1280x720, sequence is 1920x1080');
  });

  it('rejects an empty sequence', async () => {
    const assembler = new SequenceAssembler(new RecordingMuxer(), new StubTranscoder());
    await expect(assembler.assemble([], [], 10)).rejects.toBeInstanceOf(AssemblyError);
  });

  it('rejects a duration count mismatch', async () => {
    const assembler = new SequenceAssembler(new RecordingMuxer(), new StubTranscoder());
    await expect(assembler.assemble([frame(1, 1)], [1, 2], 10)).rejects.toThrow('Got 1 frames but 2 durations');
  });

  it('rejects a non-positive duration or frame rate', async () => {
    const assembler = new SequenceAssembler(new RecordingMuxer(), new StubTranscoder());
    await expect(assembler.assemble([frame(1, 1)], [0], 10)).rejects.toThrow('Frame 0 has a non-positive duration');
    await expect(assembler.assemble([frame(1, 1)], [1], 0)).rejects.toThrow('Frame rate must be positive, got 0');
  });

  it('does not call the muxer when validation fails', async () => {
    const muxer = new RecordingMuxer();
    const assembler = new SequenceAssembler(muxer, new StubTranscoder());
    await expect(assembler.assemble([frame(2, 2), frame(3, 3)], [1, 1], 1)).rejects.toThrow(AssemblyError);
    expect(muxer.inputs).toEqual([]);
  });
});
