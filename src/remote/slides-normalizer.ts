/**
 * Slides page normalizer
 *
 * Converts Google Slides API page JSON (presentations.pages.get) into the
 * fixed VectorDocument schema. Unknown element types are dropped; geometry
 * is converted to points; shear is ignored.
 */

import { parseVectorDocument } from '../model/vector-document.js';
import type {
  Color,
  ImageMimeType,
  TextAlign,
  VectorDocument,
  VectorElement,
} from '../model/vector-document.js';

const EMU_PER_POINT = 12700;
const DEFAULT_FONT_SIZE_PT = 14;
const ROUND_RECT_RADIUS_RATIO = 0.1;

export interface FetchedImage {
  mimeType: ImageMimeType;
  data: Buffer;
}

/** Downloads an image referenced by a page element. */
export type ImageFetcher = (url: string) => Promise<FetchedImage>;

export interface PageSize {
  width: number;
  height: number;
}

// ─── Loose JSON access ───────────────────────────────────────────────────────

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(obj: unknown, ...path: string[]): unknown {
  let current: unknown = obj;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Convert a Slides Dimension ({ magnitude, unit }) to points. */
export function toPoints(dimension: unknown): number {
  const magnitude = num(child(dimension, 'magnitude'), 0);
  return child(dimension, 'unit') === 'PT' ? magnitude : magnitude / EMU_PER_POINT;
}

function hex2(channel: number): string {
  const clamped = Math.max(0, Math.min(1, channel));
  return Math.round(clamped * 255).toString(16).padStart(2, '0');
}

/** Read an OpaqueColor/SolidFill rgbColor into #rrggbb[aa]. Theme colors yield undefined. */
function solidFillColor(solidFill: unknown): Color | undefined {
  const rgb = child(solidFill, 'color', 'rgbColor');
  if (!isRecord(rgb)) return undefined;
  const alpha = num(child(solidFill, 'alpha'), 1);
  const base = `#${hex2(num(rgb.red, 0))}${hex2(num(rgb.green, 0))}${hex2(num(rgb.blue, 0))}`;
  return alpha < 1 ? base + hex2(alpha) : base;
}

function opaqueColor(color: unknown): Color | undefined {
  const rgb = child(color, 'opaqueColor', 'rgbColor');
  if (!isRecord(rgb)) return undefined;
  return `#${hex2(num(rgb.red, 0))}${hex2(num(rgb.green, 0))}${hex2(num(rgb.blue, 0))}`;
}

// ─── Geometry ────────────────────────────────────────────────────────────────

interface Frame {
  x: number;
  y: number;
  width: number;
  height: number;
  scaleX: number;
  scaleY: number;
}

function transformScale(transform: unknown): { scaleX: number; scaleY: number } {
  return {
    scaleX: num(child(transform, 'scaleX'), 1),
    scaleY: num(child(transform, 'scaleY'), 1),
  };
}

function translate(transform: unknown, axis: 'translateX' | 'translateY'): number {
  const value = num(child(transform, axis), 0);
  return child(transform, 'unit') === 'PT' ? value : value / EMU_PER_POINT;
}

function frameOf(element: Json): Frame {
  const transform = element.transform;
  const { scaleX, scaleY } = transformScale(transform);
  const width = toPoints(child(element, 'size', 'width'));
  const height = toPoints(child(element, 'size', 'height'));
  return {
    x: translate(transform, 'translateX'),
    y: translate(transform, 'translateY'),
    width: Math.abs(width * scaleX),
    height: Math.abs(height * scaleY),
    scaleX,
    scaleY,
  };
}

// ─── Element conversion ──────────────────────────────────────────────────────

function alignmentOf(textElements: unknown[]): TextAlign {
  for (const te of textElements) {
    const alignment = child(te, 'paragraphMarker', 'style', 'alignment');
    if (alignment === 'CENTER') return 'center';
    if (alignment === 'END') return 'right';
    if (alignment === 'START' || alignment === 'JUSTIFIED') return 'left';
  }
  return 'left';
}

function convertText(shape: unknown, frame: Frame): VectorElement | undefined {
  const textElements = list(child(shape, 'text', 'textElements'));
  const runs = textElements.map((te) => child(te, 'textRun')).filter(isRecord);
  const text = runs.map((run) => str(run.content) ?? '').join('').replace(/\n+$/, '');
  if (!text) return undefined;

  const style = child(runs[0], 'style');
  const fontSize = toPoints(child(style, 'fontSize')) || DEFAULT_FONT_SIZE_PT;

  return {
    kind: 'text',
    ...boxOf(frame),
    text,
    fontSize: fontSize * Math.abs(frame.scaleY),
    fontFamily: str(child(style, 'fontFamily')) ?? 'sans-serif',
    color: opaqueColor(child(style, 'foregroundColor')) ?? '#000000',
    align: alignmentOf(textElements),
    bold: child(style, 'bold') === true ? true : undefined,
  };
}

function boxOf(frame: Frame): { x: number; y: number; width: number; height: number } {
  return { x: frame.x, y: frame.y, width: frame.width, height: frame.height };
}

function convertShape(shape: Json, frame: Frame): VectorElement[] {
  const props = shape.shapeProperties;
  const fill = solidFillColor(child(props, 'shapeBackgroundFill', 'solidFill'));
  const outlineHidden = child(props, 'outline', 'propertyState') === 'NOT_RENDERED';
  const stroke = outlineHidden ? undefined : solidFillColor(child(props, 'outline', 'outlineFill', 'solidFill'));
  const strokeWidth = stroke ? toPoints(child(props, 'outline', 'weight')) || 1 : undefined;

  const out: VectorElement[] = [];
  if (fill || stroke) {
    switch (shape.shapeType) {
      case 'ELLIPSE':
        out.push({ kind: 'ellipse', ...boxOf(frame), fill, stroke, strokeWidth });
        break;
      case 'ROUND_RECTANGLE':
        out.push({
          kind: 'rect',
          ...boxOf(frame),
          fill,
          stroke,
          strokeWidth,
          cornerRadius: Math.min(frame.width, frame.height) * ROUND_RECT_RADIUS_RATIO,
        });
        break;
      default:
        out.push({ kind: 'rect', ...boxOf(frame), fill, stroke, strokeWidth });
    }
  }

  const text = convertText(shape, frame);
  if (text) out.push(text);
  return out;
}

function convertLine(line: Json, frame: Frame): VectorElement {
  const props = line.lineProperties;
  const stroke = solidFillColor(child(props, 'lineFill', 'solidFill')) ?? '#000000';
  const strokeWidth = toPoints(child(props, 'weight')) || 1;
  // Negative scale flips the line's direction within its bounding box.
  const x2 = frame.x + (frame.scaleX < 0 ? -frame.width : frame.width);
  const y2 = frame.y + (frame.scaleY < 0 ? -frame.height : frame.height);
  return { kind: 'line', x1: frame.x, y1: frame.y, x2, y2, stroke, strokeWidth };
}

async function convertElement(raw: unknown, fetchImage: ImageFetcher): Promise<VectorElement[]> {
  if (!isRecord(raw)) return [];

  if (isRecord(raw.elementGroup)) {
    const { scaleX, scaleY } = transformScale(raw.transform);
    const children: VectorElement[] = [];
    for (const c of list(raw.elementGroup.children)) {
      children.push(...(await convertElement(c, fetchImage)));
    }
    return [{
      kind: 'group',
      transform: {
        translateX: translate(raw.transform, 'translateX'),
        translateY: translate(raw.transform, 'translateY'),
        scaleX,
        scaleY,
      },
      children,
    }];
  }

  const frame = frameOf(raw);

  if (isRecord(raw.shape)) {
    return convertShape(raw.shape, frame);
  }

  if (isRecord(raw.line)) {
    return [convertLine(raw.line, frame)];
  }

  if (isRecord(raw.image)) {
    const url = str(raw.image.contentUrl);
    if (!url) return [];
    const image = await fetchImage(url);
    return [{ kind: 'image', ...boxOf(frame), mimeType: image.mimeType, data: image.data.toString('base64') }];
  }

  return [];
}

/**
 * Normalize one Slides page into a VectorDocument.
 *
 * @param page      Raw page JSON
 * @param pageSize  Presentation page size in points
 * @param fetchImage  Resolves image contentUrls to bytes
 */
export async function normalizeSlidesPage(
  page: unknown,
  pageSize: PageSize,
  fetchImage: ImageFetcher
): Promise<VectorDocument> {
  const elements: VectorElement[] = [];
  for (const raw of list(child(page, 'pageElements'))) {
    elements.push(...(await convertElement(raw, fetchImage)));
  }

  const background = solidFillColor(child(page, 'pageProperties', 'pageBackgroundFill', 'solidFill'));

  // Final structural check; anything odd left over surfaces as a RenderError.
  return parseVectorDocument({
    width: pageSize.width,
    height: pageSize.height,
    background,
    elements,
  });
}

/** Read the presentation's page size (presentations.get → pageSize) in points. */
export function pageSizeOf(presentation: unknown): PageSize {
  return {
    width: toPoints(child(presentation, 'pageSize', 'width')),
    height: toPoints(child(presentation, 'pageSize', 'height')),
  };
}
