/**
 * Slide vector document schema
 *
 * The fixed, tagged-union representation every slide is normalized into at
 * the RemoteSource boundary. Coordinates are in points, relative to the
 * slide's top-left corner (or the enclosing group's local space).
 */

import { RenderError } from '../errors/index.js';

/** CSS hex color: #rgb, #rrggbb or #rrggbbaa */
export type Color = string;

export type TextAlign = 'left' | 'center' | 'right';

export type ImageMimeType = 'image/png' | 'image/jpeg';

interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RectElement extends Box {
  kind: 'rect';
  fill?: Color;
  stroke?: Color;
  strokeWidth?: number;
  cornerRadius?: number;
}

export interface EllipseElement extends Box {
  kind: 'ellipse';
  fill?: Color;
  stroke?: Color;
  strokeWidth?: number;
}

export interface LineElement {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  stroke: Color;
  strokeWidth: number;
}

export interface TextElement extends Box {
  kind: 'text';
  text: string;
  fontSize: number;
  fontFamily: string;
  color: Color;
  align: TextAlign;
  bold?: boolean;
}

export interface ImageElement extends Box {
  kind: 'image';
  mimeType: ImageMimeType;
  /** Base64-encoded image bytes */
  data: string;
}

export interface GroupTransform {
  translateX: number;
  translateY: number;
  scaleX: number;
  scaleY: number;
}

export interface GroupElement {
  kind: 'group';
  transform: GroupTransform;
  children: VectorElement[];
}

export type VectorElement =
  | RectElement
  | EllipseElement
  | LineElement
  | TextElement
  | ImageElement
  | GroupElement;

export type VectorElementKind = VectorElement['kind'];

export interface VectorDocument {
  /** Intrinsic slide width in points */
  width: number;
  /** Intrinsic slide height in points */
  height: number;
  background?: Color;
  elements: VectorElement[];
}

// ─── Validation ───────────────────────────────────────────────────────────────

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;
const MAX_GROUP_DEPTH = 32;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class Reader {
  constructor(private readonly path: string) {}

  at(segment: string | number): Reader {
    return new Reader(typeof segment === 'number' ? `${this.path}[${segment}]` : `${this.path}.${segment}`);
  }

  error(message: string): RenderError {
    return new RenderError(`Malformed vector document at ${this.path}: ${message}`, { path: this.path });
  }

  record(value: unknown): Record<string, unknown> {
    if (!isRecord(value)) throw this.error('expected an object');
    return value;
  }

  number(value: unknown): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) throw this.error('expected a finite number');
    return value;
  }

  size(value: unknown): number {
    const n = this.number(value);
    if (n < 0) throw this.error('expected a non-negative size');
    return n;
  }

  positive(value: unknown): number {
    const n = this.number(value);
    if (n <= 0) throw this.error('expected a positive number');
    return n;
  }

  string(value: unknown): string {
    if (typeof value !== 'string') throw this.error('expected a string');
    return value;
  }

  color(value: unknown): Color {
    const s = this.string(value);
    if (!HEX_COLOR.test(s)) throw this.error(`invalid color "${s}"`);
    return s;
  }

  optionalColor(value: unknown): Color | undefined {
    return value === undefined ? undefined : this.color(value);
  }

  optionalSize(value: unknown): number | undefined {
    return value === undefined ? undefined : this.size(value);
  }
}

function readBox(obj: Record<string, unknown>, r: Reader): Box {
  return {
    x: r.at('x').number(obj.x),
    y: r.at('y').number(obj.y),
    width: r.at('width').size(obj.width),
    height: r.at('height').size(obj.height),
  };
}

function readElement(raw: unknown, r: Reader, depth: number): VectorElement {
  const obj = r.record(raw);
  const kind = obj.kind;

  switch (kind) {
    case 'rect':
      return {
        kind: 'rect',
        ...readBox(obj, r),
        fill: r.at('fill').optionalColor(obj.fill),
        stroke: r.at('stroke').optionalColor(obj.stroke),
        strokeWidth: r.at('strokeWidth').optionalSize(obj.strokeWidth),
        cornerRadius: r.at('cornerRadius').optionalSize(obj.cornerRadius),
      };

    case 'ellipse':
      return {
        kind: 'ellipse',
        ...readBox(obj, r),
        fill: r.at('fill').optionalColor(obj.fill),
        stroke: r.at('stroke').optionalColor(obj.stroke),
        strokeWidth: r.at('strokeWidth').optionalSize(obj.strokeWidth),
      };

    case 'line':
      return {
        kind: 'line',
        x1: r.at('x1').number(obj.x1),
        y1: r.at('y1').number(obj.y1),
        x2: r.at('x2').number(obj.x2),
        y2: r.at('y2').number(obj.y2),
        stroke: r.at('stroke').color(obj.stroke),
        strokeWidth: r.at('strokeWidth').size(obj.strokeWidth),
      };

    case 'text': {
      const align = obj.align ?? 'left';
      if (align !== 'left' && align !== 'center' && align !== 'right') {
        throw r.at('align').error(`unknown alignment "${String(align)}"`);
      }
      const bold = obj.bold;
      if (bold !== undefined && typeof bold !== 'boolean') {
        throw r.at('bold').error('expected a boolean');
      }
      return {
        kind: 'text',
        ...readBox(obj, r),
        text: r.at('text').string(obj.text),
        fontSize: r.at('fontSize').positive(obj.fontSize),
        fontFamily: r.at('fontFamily').string(obj.fontFamily ?? 'sans-serif'),
        color: r.at('color').color(obj.color ?? '#000000'),
        align,
        bold,
      };
    }

    case 'image': {
      const mimeType = obj.mimeType;
      if (mimeType !== 'image/png' && mimeType !== 'image/jpeg') {
        throw r.at('mimeType').error(`unsupported image type "${String(mimeType)}"`);
      }
      return {
        kind: 'image',
        ...readBox(obj, r),
        mimeType,
        data: r.at('data').string(obj.data),
      };
    }

    case 'group': {
      if (depth >= MAX_GROUP_DEPTH) throw r.error(`groups nested deeper than ${MAX_GROUP_DEPTH}`);
      const t = r.at('transform').record(obj.transform ?? {});
      const tr = r.at('transform');
      const children = obj.children;
      if (!Array.isArray(children)) throw r.at('children').error('expected an array');
      return {
        kind: 'group',
        transform: {
          translateX: tr.at('translateX').number(t.translateX ?? 0),
          translateY: tr.at('translateY').number(t.translateY ?? 0),
          scaleX: tr.at('scaleX').number(t.scaleX ?? 1),
          scaleY: tr.at('scaleY').number(t.scaleY ?? 1),
        },
        children: children.map((child, i) => readElement(child, r.at('children').at(i), depth + 1)),
      };
    }

    default:
      throw r.at('kind').error(`unknown element kind "${String(kind)}"`);
  }
}

/**
 * Validate an untrusted value as a VectorDocument.
 *
 * Returns a fresh object holding only known fields; throws RenderError
 * naming the offending path on the first problem found.
 */
export function parseVectorDocument(raw: unknown): VectorDocument {
  const r = new Reader('$');
  const obj = r.record(raw);
  const elements = obj.elements;
  if (!Array.isArray(elements)) throw r.at('elements').error('expected an array');

  return {
    width: r.at('width').positive(obj.width),
    height: r.at('height').positive(obj.height),
    background: r.at('background').optionalColor(obj.background),
    elements: elements.map((el, i) => readElement(el, r.at('elements').at(i), 0)),
  };
}

/** Count leaf elements, descending into groups. */
export function countElements(elements: readonly VectorElement[]): number {
  let total = 0;
  for (const el of elements) {
    total += el.kind === 'group' ? countElements(el.children) : 1;
  }
  return total;
}
