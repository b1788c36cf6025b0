/**
 * Format Transcoder
 *
 * raster  → PNG / JPEG bytes (@napi-rs/canvas encoders)
 * vector  → SVG bytes (re-serialized, never rasterized)
 * slides  → JSON metadata sidecar (no image bytes)
 */

import { createCanvas } from '@napi-rs/canvas';
import { UnsupportedFormatError } from '../errors/index.js';
import { countElements } from '../model/vector-document.js';
import type { VectorDocument } from '../model/vector-document.js';
import type { Presentation, Slide } from '../model/types.js';
import type { RasterImage } from '../renderer/slide-renderer.js';
import { serializeSvg } from '../renderer/svg-serializer.js';

export type RasterFormat = 'png' | 'jpeg';

export interface TranscodeOptions {
  /** JPEG quality 1–100 (default: 90) */
  jpegQuality?: number;
}

export const DEFAULT_JPEG_QUALITY = 90;

export class FormatTranscoder {
  /**
   * Encode an RGBA raster. Only 'png' and 'jpeg' are raster encodings;
   * any other tag is a programming error.
   */
  encode(raster: RasterImage, format: string, options: TranscodeOptions = {}): Buffer {
    if (format !== 'png' && format !== 'jpeg') {
      throw new UnsupportedFormatError(`Cannot encode a raster as "${format}"`, { format });
    }

    const canvas = createCanvas(raster.width, raster.height);
    const ctx = canvas.getContext('2d');
    const imageData = ctx.createImageData(raster.width, raster.height);
    imageData.data.set(raster.pixels);
    ctx.putImageData(imageData, 0, 0);

    return format === 'png'
      ? canvas.toBuffer('image/png')
      : canvas.toBuffer('image/jpeg', options.jpegQuality ?? DEFAULT_JPEG_QUALITY);
  }

  encodeSvg(document: VectorDocument): Buffer {
    return Buffer.from(serializeSvg(document), 'utf-8');
  }

  /**
   * Presentation metadata sidecar. Slide entries describe geometry and
   * element counts; image payloads are never included.
   */
  encodeMetadata(presentation: Presentation, slides: readonly Slide[]): Buffer {
    const sidecar = {
      id: presentation.id,
      name: presentation.name ?? null,
      source: presentation.source,
      parentPath: [...presentation.parentPath],
      slides: slides.map((slide) => ({
        index: slide.index,
        presentationId: slide.ref.presentationId,
        slideId: slide.ref.slideId,
        durationSeconds: slide.durationSeconds,
        width: slide.document.width,
        height: slide.document.height,
        elementCount: countElements(slide.document.elements),
      })),
      metadata: presentation.metadata ?? null,
    };
    return Buffer.from(JSON.stringify(sidecar, null, 2) + '\n', 'utf-8');
  }
}
