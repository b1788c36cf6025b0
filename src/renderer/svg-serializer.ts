/**
 * SVG serializer — writes a VectorDocument out as standalone SVG markup.
 * No rasterization happens here; the output keeps the document's own
 * coordinate space (points) as its viewBox.
 */

import type { VectorDocument, VectorElement } from '../model/vector-document.js';

const TEXT_ANCHOR = { left: 'start', center: 'middle', right: 'end' } as const;
const LINE_HEIGHT = 1.2;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Shortest stable decimal form: up to 3 fractional digits, no trailing zeros. */
function n(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function attrs(pairs: Array<[string, string | number | undefined]>): string {
  return pairs
    .filter((pair): pair is [string, string | number] => pair[1] !== undefined)
    .map(([k, v]) => ` ${k}="${typeof v === 'number' ? n(v) : escapeXml(v)}"`)
    .join('');
}

function paintAttrs(fill?: string, stroke?: string, strokeWidth?: number): Array<[string, string | number | undefined]> {
  return [
    ['fill', fill ?? 'none'],
    ['stroke', stroke],
    ['stroke-width', stroke ? strokeWidth ?? 1 : undefined],
  ];
}

function serializeElement(el: VectorElement, indent: string): string {
  switch (el.kind) {
    case 'rect':
      return `${indent}<rect${attrs([
        ['x', el.x], ['y', el.y], ['width', el.width], ['height', el.height],
        ['rx', el.cornerRadius || undefined],
        ...paintAttrs(el.fill, el.stroke, el.strokeWidth),
      ])}/>`;

    case 'ellipse':
      return `${indent}<ellipse${attrs([
        ['cx', el.x + el.width / 2], ['cy', el.y + el.height / 2],
        ['rx', el.width / 2], ['ry', el.height / 2],
        ...paintAttrs(el.fill, el.stroke, el.strokeWidth),
      ])}/>`;

    case 'line':
      return `${indent}<line${attrs([
        ['x1', el.x1], ['y1', el.y1], ['x2', el.x2], ['y2', el.y2],
        ['stroke', el.stroke], ['stroke-width', el.strokeWidth], ['stroke-linecap', 'round'],
      ])}/>`;

    case 'text': {
      const x = el.align === 'center' ? el.x + el.width / 2 : el.align === 'right' ? el.x + el.width : el.x;
      const lines = el.text.split('\n').map((line, i) =>
        `<tspan${attrs([['x', x], ['dy', i === 0 ? undefined : el.fontSize * LINE_HEIGHT]])}>${escapeXml(line)}</tspan>`
      );
      return `${indent}<text${attrs([
        ['x', x], ['y', el.y],
        ['font-family', el.fontFamily], ['font-size', el.fontSize],
        ['font-weight', el.bold ? 'bold' : undefined],
        ['fill', el.color], ['text-anchor', TEXT_ANCHOR[el.align]],
        ['dominant-baseline', 'hanging'],
      ])}>${lines.join('')}</text>`;
    }

    case 'image':
      return `${indent}<image${attrs([
        ['x', el.x], ['y', el.y], ['width', el.width], ['height', el.height],
        ['preserveAspectRatio', 'none'],
        ['href', `data:${el.mimeType};base64,${el.data}`],
      ])}/>`;

    case 'group': {
      const { translateX, translateY, scaleX, scaleY } = el.transform;
      const transform = `translate(${n(translateX)} ${n(translateY)}) scale(${n(scaleX)} ${n(scaleY)})`;
      if (el.children.length === 0) {
        return `${indent}<g transform="${transform}"/>`;
      }
      const children = el.children.map((c) => serializeElement(c, indent + '  '));
      return `${indent}<g transform="${transform}">\n${children.join('\n')}\n${indent}</g>`;
    }
  }
}

/**
 * Serialize a document to SVG. Output is deterministic for a given document.
 */
export function serializeSvg(doc: VectorDocument): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg"${attrs([
      ['width', doc.width], ['height', doc.height],
      ['viewBox', `0 0 ${n(doc.width)} ${n(doc.height)}`],
    ])}>`,
  ];
  if (doc.background) {
    lines.push(`  <rect${attrs([['width', '100%'], ['height', '100%'], ['fill', doc.background]])}/>`);
  }
  for (const el of doc.elements) {
    lines.push(serializeElement(el, '  '));
  }
  lines.push('</svg>', '');
  return lines.join('\n');
}
