/**
 * OptionsKey
 *
 * Deterministic fingerprint of a resolved export request, used as the
 * result-cache lookup key. Not a security token.
 *
 * Key = sha256(canonicalJson(normalized request)), where canonical JSON sorts
 * object keys recursively and the format set is sorted and de-duplicated.
 */

import { createHash } from 'crypto';
import { InvalidRequestError } from '../errors/index.js';
import { isExportFormat } from '../model/types.js';
import type { ExportFormat, ExportOptions, ExportRequest } from '../model/types.js';

/** Bumped when the normalized shape changes, so stale cache entries stop matching. */
const KEY_VERSION = 1;

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

/**
 * Serialize with object keys sorted at every level. Array order is kept:
 * it is significant for slide lists.
 */
export function canonicalJson(value: Canonical): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`);
  return `{${entries.join(',')}}`;
}

function hash(value: Canonical): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

// ─── Validation ───────────────────────────────────────────────────────────────

/**
 * Check the request's structure and return its de-duplicated, sorted
 * format list. Throws InvalidRequestError.
 */
export function validateRequest(request: ExportRequest): ExportFormat[] {
  const { presentation, options } = request;

  if (!presentation.id) {
    throw new InvalidRequestError('Presentation ID is empty');
  }
  if (presentation.source === 'explicit' && presentation.slides.length === 0) {
    throw new InvalidRequestError(
      `Explicit presentation "${presentation.id}" has no slides`,
      { presentationId: presentation.id }
    );
  }
  for (const [i, slide] of presentation.slides.entries()) {
    if (!slide.presentationId || !slide.slideId) {
      throw new InvalidRequestError(`Slide reference ${i} is missing an ID`, { presentationId: presentation.id });
    }
    if (slide.durationSeconds !== undefined && !(slide.durationSeconds > 0)) {
      throw new InvalidRequestError(`Slide ${slide.slideId} has a non-positive duration`);
    }
  }

  const formats = validateFormats(request.formats);
  validateOptions(options);
  return formats;
}

/**
 * Reject an empty format list or unknown tags; returns the sorted,
 * de-duplicated set.
 */
export function validateFormats(formats: readonly string[]): ExportFormat[] {
  if (formats.length === 0) {
    throw new InvalidRequestError('No export formats requested');
  }
  const unknown = formats.filter((f) => !isExportFormat(f));
  if (unknown.length > 0) {
    throw new InvalidRequestError(`Unknown export format(s): ${unknown.join(', ')}`, { formats: unknown });
  }
  return Array.from(new Set(formats.filter(isExportFormat))).sort();
}

export function validateOptions(options: ExportOptions): void {
  const { resolution, frameRate, slideDurationSeconds, jpegQuality } = options;
  if (!Number.isInteger(resolution.width) || !Number.isInteger(resolution.height)
    || resolution.width <= 0 || resolution.height <= 0) {
    throw new InvalidRequestError(
      `Resolution must be positive whole pixels, got ${resolution.width}x${resolution.height}`
    );
  }
  if (!(frameRate > 0)) {
    throw new InvalidRequestError(`Frame rate must be positive, got ${frameRate}`);
  }
  if (!(slideDurationSeconds > 0)) {
    throw new InvalidRequestError(`Slide duration must be positive, got ${slideDurationSeconds}`);
  }
  if (!Number.isInteger(jpegQuality) || jpegQuality < 1 || jpegQuality > 100) {
    throw new InvalidRequestError(`JPEG quality must be 1-100, got ${jpegQuality}`);
  }
}

// ─── Normalization ────────────────────────────────────────────────────────────

interface Relevance {
  raster: boolean;
  durations: boolean;
  frameRate: boolean;
  jpeg: boolean;
  naming: boolean;
}

const ALL_RELEVANT: Relevance = { raster: true, durations: true, frameRate: true, jpeg: true, naming: true };

const FORMAT_RELEVANCE: Record<ExportFormat, Relevance> = {
  svg: { raster: false, durations: false, frameRate: false, jpeg: false, naming: true },
  png: { raster: true, durations: false, frameRate: false, jpeg: false, naming: true },
  jpeg: { raster: true, durations: false, frameRate: false, jpeg: true, naming: true },
  // The sidecar lists each slide's duration.
  json: { raster: false, durations: true, frameRate: false, jpeg: false, naming: false },
  mp4: { raster: true, durations: true, frameRate: true, jpeg: false, naming: false },
};

function normalize(request: ExportRequest, formats: ExportFormat[], relevance: Relevance): Canonical {
  const { presentation, options } = request;

  return {
    v: KEY_VERSION,
    presentation: {
      id: presentation.id,
      source: presentation.source,
      // Output location is part of the result, so identical decks in two folders are distinct entries.
      parentPath: [...presentation.parentPath],
      name: presentation.name ?? null,
    },
    slides: presentation.slides.map((s) => ({
      presentationId: s.presentationId,
      slideId: s.slideId,
      durationSeconds: relevance.durations ? s.durationSeconds ?? options.slideDurationSeconds : null,
    })),
    formats,
    options: {
      resolution: relevance.raster ? { width: options.resolution.width, height: options.resolution.height } : null,
      fillColor: relevance.raster ? options.fillColor.toLowerCase() : null,
      frameRate: relevance.frameRate ? options.frameRate : null,
      jpegQuality: relevance.jpeg ? options.jpegQuality : null,
      naming: relevance.naming ? options.naming : null,
    },
  };
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Compute the OptionsKey of a fully resolved request.
 *
 * Pure and order-independent over the format set. Throws
 * InvalidRequestError for structurally invalid requests.
 */
export function computeOptionsKey(request: ExportRequest): string {
  const formats = validateRequest(request);
  return hash(normalize(request, formats, ALL_RELEVANT));
}

/**
 * Derive one cache key per requested format. Each key ignores options that
 * cannot change that format's output, so e.g. a frame-rate change leaves
 * cached PNGs valid.
 */
export function computeFormatKeys(request: ExportRequest): Map<ExportFormat, string> {
  const formats = validateRequest(request);
  const keys = new Map<ExportFormat, string>();
  for (const format of formats) {
    keys.set(format, hash(normalize(request, [format], FORMAT_RELEVANCE[format])));
  }
  return keys;
}
