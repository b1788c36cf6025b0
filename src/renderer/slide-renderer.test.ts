/**
 * SlideRenderer tests
 *
 * @napi-rs/canvas is mocked; assertions are on the drawing calls issued.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// ─── Hoisted mock definitions ─────────────────────────────────────────────────

const { mockCtx, mockCanvas, mockLoadImage } = vi.hoisted(() => {
  const mockCtx = {
    fillStyle: '',
    strokeStyle: '',
    lineWidth: 0,
    lineCap: '',
    font: '',
    textAlign: '',
    textBaseline: '',
    fillRect: vi.fn(),
    beginPath: vi.fn(),
    closePath: vi.fn(),
    rect: vi.fn(),
    clip: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    arcTo: vi.fn(),
    ellipse: vi.fn(),
    fill: vi.fn(),
    stroke: vi.fn(),
    fillText: vi.fn(),
    drawImage: vi.fn(),
    save: vi.fn(),
    restore: vi.fn(),
    translate: vi.fn(),
    scale: vi.fn(),
    getImageData: vi.fn((_x: number, _y: number, w: number, h: number) => ({ data: new Uint8ClampedArray(w * h * 4) })),
  };

  const mockCanvas = {
    getContext: vi.fn(() => mockCtx),
  };

  const mockLoadImage = vi.fn();

  return { mockCtx, mockCanvas, mockLoadImage };
});

// ─── Module mocks ─────────────────────────────────────────────────────────────

vi.mock('@napi-rs/canvas', () => ({
  createCanvas: vi.fn(() => mockCanvas),
  loadImage: mockLoadImage,
}));

// ─── Imports (after mocks) ────────────────────────────────────────────────────

import { createCanvas } from '@napi-rs/canvas';
import { RenderError } from '../errors/index.js';
import type { VectorDocument } from '../model/vector-document.js';
import { fitViewport, SlideRenderer } from './slide-renderer.js';

describe('fitViewport', () => {
  it('scales to the tighter axis and centers the other', () => {
    expect(fitViewport(100, 50, 400, 400)).toEqual({ scale: 4, offsetX: 0, offsetY: 100 });
  });

  it('fills exactly when aspect ratios match', () => {
    expect(fitViewport(720, 405, 1440, 810)).toEqual({ scale: 2, offsetX: 0, offsetY: 0 });
  });
});

describe('SlideRenderer', () => {
  let renderer: SlideRenderer;
  const doc: VectorDocument = { width: 100, height: 50, elements: [] };

  beforeEach(() => {
    renderer = new SlideRenderer();
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('returns an RGBA raster of the target size', async () => {
    const raster = await renderer.render(doc, 400, 400);

    expect(createCanvas).toHaveBeenCalledWith(400, 400);
    expect(raster.width).toBe(400);
    expect(raster.height).toBe(400);
    expect(raster.pixels.length).toBe(400 * 400 * 4);
  });

  it('paints the letterbox first, then the slide background inside the viewport', async () => {
    await renderer.render({ ...doc, background: '#123456' }, 400, 400, { fillColor: '#ff00ff' });

    expect(mockCtx.fillRect.mock.calls).toEqual([
      [0, 0, 400, 400],
      [0, 0, 100, 50],
    ]);
    expect(mockCtx.translate).toHaveBeenCalledWith(0, 100);
    expect(mockCtx.scale).toHaveBeenCalledWith(4, 4);
    expect(mockCtx.rect).toHaveBeenCalledWith(0, 0, 100, 50);
    expect(mockCtx.clip).toHaveBeenCalledTimes(1);
    expect(mockCtx.fillStyle).toBe('#123456');
  });

  it('draws multi-line text one line per row', async () => {
    await renderer.render({
      ...doc,
      elements: [{
        kind: 'text', x: 5, y: 5, width: 50, height: 30, text: 'a\nb',
        fontSize: 10, fontFamily: 'sans-serif', color: '#000000', align: 'left',
      }],
    }, 100, 50);

    expect(mockCtx.font).toBe('10px sans-serif');
    expect(mockCtx.fillText.mock.calls).toEqual([
      ['a', 5, 5],
      ['b', 5, 17],
    ]);
  });

  it('anchors centered text at the box midpoint', async () => {
    await renderer.render({
      ...doc,
      elements: [{
        kind: 'text', x: 10, y: 0, width: 40, height: 10, text: 'x',
        fontSize: 8, fontFamily: 'serif', color: '#000000', align: 'center', bold: true,
      }],
    }, 100, 50);

    expect(mockCtx.font).toBe('bold 8px serif');
    expect(mockCtx.fillText).toHaveBeenCalledWith('x', 30, 0);
  });

  it('uses arcs for rounded rectangles', async () => {
    await renderer.render({
      ...doc,
      elements: [{ kind: 'rect', x: 0, y: 0, width: 20, height: 10, fill: '#ff0000', cornerRadius: 3 }],
    }, 100, 50);

    expect(mockCtx.arcTo).toHaveBeenCalledTimes(4);
    expect(mockCtx.fill).toHaveBeenCalledTimes(1);
    expect(mockCtx.stroke).not.toHaveBeenCalled();
  });

  it('applies group transforms around children', async () => {
    await renderer.render({
      ...doc,
      elements: [{
        kind: 'group',
        transform: { translateX: 7, translateY: 8, scaleX: 2, scaleY: 3 },
        children: [{ kind: 'line', x1: 0, y1: 0, x2: 1, y2: 1, stroke: '#000000', strokeWidth: 1 }],
      }],
    }, 100, 50);

    expect(mockCtx.translate).toHaveBeenLastCalledWith(7, 8);
    expect(mockCtx.scale).toHaveBeenLastCalledWith(2, 3);
    expect(mockCtx.lineTo).toHaveBeenCalledWith(1, 1);
    expect(mockCtx.save).toHaveBeenCalledTimes(2);
    expect(mockCtx.restore).toHaveBeenCalledTimes(2);
  });

  it('decodes and draws images', async () => {
    const image = { width: 1, height: 1 };
    mockLoadImage.mockResolvedValueOnce(image);

    await renderer.render({
      ...doc,
      elements: [{ kind: 'image', x: 1, y: 2, width: 3, height: 4, mimeType: 'image/png', data: 'aW1n' }],
    }, 100, 50);

    expect(mockLoadImage).toHaveBeenCalledWith(Buffer.from('img'));
    expect(mockCtx.drawImage).toHaveBeenCalledWith(image, 1, 2, 3, 4);
  });

  it('raises RenderError for undecodable image data', async () => {
    mockLoadImage.mockRejectedValueOnce(new Error('Unsupported image type'));

    await expect(renderer.render({
      ...doc,
      elements: [{ kind: 'image', x: 0, y: 0, width: 1, height: 1, mimeType: 'image/jpeg', data: 'AAAA' }],
    }, 100, 50)).rejects.toThrow('Undecodable image/jpeg image data');
  });

  it('rejects a non-positive target size', async () => {
    await expect(renderer.render(doc, 0, 10)).rejects.toThrow('Invalid target size 0x10');
  });

  it('rejects a malformed document', async () => {
    const broken: VectorDocument = { width: -1, height: 50, elements: [] };
    await expect(renderer.render(broken, 10, 10)).rejects.toBeInstanceOf(RenderError);
  });
});
