/**
 * FormatTranscoder tests — canvas encoders are mocked.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

const { mockCtx, mockCanvas } = vi.hoisted(() => {
  const mockCtx = {
    createImageData: vi.fn((w: number, h: number) => ({ width: w, height: h, data: new Uint8ClampedArray(w * h * 4) })),
    putImageData: vi.fn(),
  };
  const mockCanvas = {
    getContext: vi.fn(() => mockCtx),
    toBuffer: vi.fn((mime: string, quality?: number) => Buffer.from(`${mime}:${quality ?? ''}`)),
  };
  return { mockCtx, mockCanvas };
});

vi.mock('@napi-rs/canvas', () => ({
  createCanvas: vi.fn(() => mockCanvas),
}));

import { UnsupportedFormatError } from '../errors/index.js';
import type { Presentation, Slide } from '../model/types.js';
import type { RasterImage } from '../renderer/slide-renderer.js';
import { FormatTranscoder } from './format-transcoder.js';

const RASTER: RasterImage = { width: 2, height: 1, pixels: new Uint8ClampedArray([1, 2, 3, 4, 5, 6, 7, 8]) };

describe('FormatTranscoder', () => {
  const transcoder = new FormatTranscoder();

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('encodes PNG from the raster pixels', () => {
    const bytes = transcoder.encode(RASTER, 'png');

    expect(bytes.toString()).toBe('image/png:');
    const imageData = mockCtx.putImageData.mock.calls[0][0];
    expect(Array.from(imageData.data)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('encodes JPEG at quality 90 by default', () => {
    transcoder.encode(RASTER, 'jpeg');
    expect(mockCanvas.toBuffer).toHaveBeenCalledWith('image/jpeg', 90);
  });

  it('passes an explicit JPEG quality through', () => {
    expect(transcoder.encode(RASTER, 'jpeg', { jpegQuality: 55 }).toString()).toBe('image/jpeg:55');
  });

  it('refuses non-raster formats', () => {
    expect(() => transcoder.encode(RASTER, 'gif')).toThrow(UnsupportedFormatError);
    expect(() => transcoder.encode(RASTER, 'svg')).toThrow('Cannot encode a raster as "svg"');
  });

  it('encodes SVG without touching the canvas', () => {
    const bytes = transcoder.encodeSvg({ width: 1, height: 1, elements: [] });
    expect(bytes.toString('utf-8')).toMatch(/^<\?xml version="1.0" encoding="UTF-8"\?>\n<svg /);
    expect(mockCanvas.getContext).not.toHaveBeenCalled();
  });

  it('writes a metadata sidecar without image payloads', () => {
    const presentation: Presentation = {
      id: 'P1',
      parentPath: ['Team'],
      source: 'sourced',
      slides: [{ presentationId: 'P1', slideId: 's1' }],
      metadata: { title: 'Deck' },
    };
    const slides: Slide[] = [{
      index: 0,
      ref: { presentationId: 'P1', slideId: 's1' },
      durationSeconds: 3,
      document: {
        width: 720,
        height: 405,
        elements: [
          { kind: 'image', x: 0, y: 0, width: 1, height: 1, mimeType: 'image/png', data: 'AAAA' },
          { kind: 'group', transform: { translateX: 0, translateY: 0, scaleX: 1, scaleY: 1 }, children: [] },
        ],
      },
    }];

    const text = transcoder.encodeMetadata(presentation, slides).toString('utf-8');

    expect(text.endsWith('}\n')).toBe(true);
    expect(text).not.toContain('AAAA');
    expect(JSON.parse(text)).toEqual({
      id: 'P1',
      name: null,
      source: 'sourced',
      parentPath: ['Team'],
      slides: [{ index: 0, presentationId: 'P1', slideId: 's1', durationSeconds: 3, width: 720, height: 405, elementCount: 1 }],
      metadata: { title: 'Deck' },
    });
  });
});
