/**
 * Slide Renderer
 *
 * Rasterizes a VectorDocument to RGBA pixels with @napi-rs/canvas.
 * The document is scaled uniformly to fit the target size and centered;
 * the uncovered bands are painted with the letterbox fill color.
 */

import { createCanvas, loadImage, type Image, type SKRSContext2D } from '@napi-rs/canvas';
import { DeckMediaError, RenderError } from '../errors/index.js';
import { parseVectorDocument } from '../model/vector-document.js';
import type {
  EllipseElement,
  ImageElement,
  LineElement,
  RectElement,
  TextElement,
  VectorDocument,
  VectorElement,
} from '../model/vector-document.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RasterImage {
  width: number;
  height: number;
  /** RGBA, row-major, width × height × 4 bytes */
  pixels: Uint8ClampedArray;
}

export interface RenderOptions {
  /** Letterbox color (default: '#000000') */
  fillColor?: string;
}

/** Placement of the document inside the target raster. */
export interface Viewport {
  scale: number;
  offsetX: number;
  offsetY: number;
}

const DEFAULT_FILL = '#000000';
const DEFAULT_BACKGROUND = '#ffffff';
const LINE_HEIGHT = 1.2;

/**
 * Uniform scale and centering offsets that fit a docW×docH document into
 * a targetW×targetH raster.
 */
export function fitViewport(docW: number, docH: number, targetW: number, targetH: number): Viewport {
  const scale = Math.min(targetW / docW, targetH / docH);
  return {
    scale,
    offsetX: (targetW - docW * scale) / 2,
    offsetY: (targetH - docH * scale) / 2,
  };
}

// ─── SlideRenderer ────────────────────────────────────────────────────────────

export class SlideRenderer {
  /**
   * Render a document to a width×height RGBA raster.
   *
   * Same document and size always produce the same pixels. Throws
   * RenderError for a malformed document or undecodable image data.
   */
  async render(
    document: VectorDocument,
    width: number,
    height: number,
    options: RenderOptions = {}
  ): Promise<RasterImage> {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RenderError(`Invalid target size ${width}x${height}`);
    }
    // Re-validate: documents may be built by callers other than the remote normalizer.
    const doc = parseVectorDocument(document);
    const images = await this.decodeImages(doc.elements);

    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');

    ctx.fillStyle = options.fillColor ?? DEFAULT_FILL;
    ctx.fillRect(0, 0, width, height);

    const viewport = fitViewport(doc.width, doc.height, width, height);
    ctx.save();
    ctx.translate(viewport.offsetX, viewport.offsetY);
    ctx.scale(viewport.scale, viewport.scale);

    ctx.beginPath();
    ctx.rect(0, 0, doc.width, doc.height);
    ctx.clip();
    ctx.fillStyle = doc.background ?? DEFAULT_BACKGROUND;
    ctx.fillRect(0, 0, doc.width, doc.height);

    for (const element of doc.elements) {
      this.drawElement(ctx, element, images);
    }
    ctx.restore();

    const imageData = ctx.getImageData(0, 0, width, height);
    return { width, height, pixels: new Uint8ClampedArray(imageData.data) };
  }

  // ─── Images ─────────────────────────────────────────────────────────────────

  private async decodeImages(elements: readonly VectorElement[]): Promise<Map<ImageElement, Image>> {
    const decoded = new Map<ImageElement, Image>();
    const pending: ImageElement[] = [];
    collectImages(elements, pending);

    for (const el of pending) {
      try {
        decoded.set(el, await loadImage(Buffer.from(el.data, 'base64')));
      } catch (err) {
        if (err instanceof DeckMediaError) throw err;
        throw new RenderError(`Undecodable ${el.mimeType} image data`, {
          cause: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return decoded;
  }

  // ─── Drawing ────────────────────────────────────────────────────────────────

  private drawElement(ctx: SKRSContext2D, el: VectorElement, images: Map<ImageElement, Image>): void {
    switch (el.kind) {
      case 'rect':
        drawRect(ctx, el);
        break;
      case 'ellipse':
        drawEllipse(ctx, el);
        break;
      case 'line':
        drawLine(ctx, el);
        break;
      case 'text':
        drawText(ctx, el);
        break;
      case 'image': {
        const image = images.get(el);
        if (image) ctx.drawImage(image, el.x, el.y, el.width, el.height);
        break;
      }
      case 'group':
        ctx.save();
        ctx.translate(el.transform.translateX, el.transform.translateY);
        ctx.scale(el.transform.scaleX, el.transform.scaleY);
        for (const child of el.children) {
          this.drawElement(ctx, child, images);
        }
        ctx.restore();
        break;
    }
  }
}

function collectImages(elements: readonly VectorElement[], out: ImageElement[]): void {
  for (const el of elements) {
    if (el.kind === 'image') out.push(el);
    else if (el.kind === 'group') collectImages(el.children, out);
  }
}

function paint(ctx: SKRSContext2D, fill: string | undefined, stroke: string | undefined, strokeWidth?: number): void {
  if (fill) {
    ctx.fillStyle = fill;
    ctx.fill();
  }
  if (stroke) {
    ctx.strokeStyle = stroke;
    ctx.lineWidth = strokeWidth ?? 1;
    ctx.stroke();
  }
}

function drawRect(ctx: SKRSContext2D, el: RectElement): void {
  const r = Math.min(el.cornerRadius ?? 0, el.width / 2, el.height / 2);
  ctx.beginPath();
  if (r > 0) {
    ctx.moveTo(el.x + r, el.y);
    ctx.arcTo(el.x + el.width, el.y, el.x + el.width, el.y + el.height, r);
    ctx.arcTo(el.x + el.width, el.y + el.height, el.x, el.y + el.height, r);
    ctx.arcTo(el.x, el.y + el.height, el.x, el.y, r);
    ctx.arcTo(el.x, el.y, el.x + el.width, el.y, r);
    ctx.closePath();
  } else {
    ctx.rect(el.x, el.y, el.width, el.height);
  }
  paint(ctx, el.fill, el.stroke, el.strokeWidth);
}

function drawEllipse(ctx: SKRSContext2D, el: EllipseElement): void {
  ctx.beginPath();
  ctx.ellipse(el.x + el.width / 2, el.y + el.height / 2, el.width / 2, el.height / 2, 0, 0, Math.PI * 2);
  paint(ctx, el.fill, el.stroke, el.strokeWidth);
}

function drawLine(ctx: SKRSContext2D, el: LineElement): void {
  ctx.beginPath();
  ctx.moveTo(el.x1, el.y1);
  ctx.lineTo(el.x2, el.y2);
  ctx.strokeStyle = el.stroke;
  ctx.lineWidth = el.strokeWidth;
  ctx.lineCap = 'round';
  ctx.stroke();
}

function drawText(ctx: SKRSContext2D, el: TextElement): void {
  ctx.font = `${el.bold ? 'bold ' : ''}${el.fontSize}px ${el.fontFamily}`;
  ctx.fillStyle = el.color;
  ctx.textAlign = el.align;
  ctx.textBaseline = 'top';

  const x = el.align === 'center' ? el.x + el.width / 2 : el.align === 'right' ? el.x + el.width : el.x;
  const lines = el.text.split('\n');
  lines.forEach((line, i) => {
    ctx.fillText(line, x, el.y + i * el.fontSize * LINE_HEIGHT);
  });
}
