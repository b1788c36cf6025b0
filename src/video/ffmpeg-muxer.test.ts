import { describe, it, expect } from 'vitest';
import { AssemblyError, CancelledError } from '../errors/index.js';
import { buildFfmpegArgs, FfmpegMuxer } from './ffmpeg-muxer.js';

const INPUT = { width: 2, height: 2, frameRate: 24, stills: [Buffer.from('png')], repeats: [3] };

describe('buildFfmpegArgs', () => {
  it('reads PNG stills from stdin and writes H.264 yuv420p', () => {
    expect(buildFfmpegArgs(24, '/tmp/out.mp4')).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-y',
      '-f', 'image2pipe',
      '-framerate', '24',
      '-c:v', 'png',
      '-i', '-',
      '-c:v', 'libx264',
      '-preset', 'medium',
      '-pix_fmt', 'yuv420p',
      '-vf', 'pad=ceil(iw/2)*2:ceil(ih/2)*2',
      '-r', '24',
      '-movflags', '+faststart',
      '/tmp/out.mp4',
    ]);
  });

  it('uses the given preset', () => {
    const args = buildFfmpegArgs(10, 'out.mp4', 'veryfast');
    expect(args[args.indexOf('-preset') + 1]).toBe('veryfast');
  });
});

describe('FfmpegMuxer', () => {
  it('reports a missing binary as AssemblyError', async () => {
    const muxer = new FfmpegMuxer({ ffmpegPath: '/nonexistent/deckmedia-ffmpeg' });

    const err = await muxer.mux(INPUT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AssemblyError);
    expect(err instanceof AssemblyError ? err.message : '').toBe('ffmpeg not found at "/nonexistent/deckmedia-ffmpeg"');
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new FfmpegMuxer().mux(INPUT, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
