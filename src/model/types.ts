/**
 * Core export model: formats, options, presentations and results.
 */

import type { DeckMediaError } from '../errors/index.js';
import type { VectorDocument } from './vector-document.js';

// ─── Formats ──────────────────────────────────────────────────────────────────

export const EXPORT_FORMATS = ['svg', 'png', 'jpeg', 'json', 'mp4'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/** Formats produced from a rasterized slide. */
export const RASTER_FORMATS: ReadonlySet<ExportFormat> = new Set<ExportFormat>(['png', 'jpeg', 'mp4']);

/** Formats written once per slide (as opposed to once per presentation). */
export const PER_SLIDE_FORMATS: ReadonlySet<ExportFormat> = new Set<ExportFormat>(['svg', 'png', 'jpeg']);

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

export const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  svg: 'svg',
  png: 'png',
  jpeg: 'jpg',
  json: 'json',
  mp4: 'mp4',
};

// ─── Options ──────────────────────────────────────────────────────────────────

export interface Resolution {
  width: number;
  height: number;
}

/**
 * Output file naming for per-slide artifacts.
 *  index  → 0.png, 1.png, …
 *  titled → <name>_slide_01_<slideId>.png, …
 */
export type NamingScheme = 'index' | 'titled';

/** Fully resolved rendering/export options. Defaults are applied by the caller. */
export interface ExportOptions {
  resolution: Resolution;
  /** Target video frame rate (frames per second) */
  frameRate: number;
  /** Display duration for slides that carry none of their own */
  slideDurationSeconds: number;
  /** JPEG quality 1–100 */
  jpegQuality: number;
  /** Letterbox fill color */
  fillColor: string;
  naming: NamingScheme;
}

// ─── Presentations ────────────────────────────────────────────────────────────

export interface SlideRef {
  presentationId: string;
  slideId: string;
  durationSeconds?: number;
}

/**
 * sourced  → the whole remote document, slide list discovered remotely
 * explicit → a hand-assembled slide list, possibly spanning documents
 */
export type PresentationSource = 'sourced' | 'explicit';

export interface Presentation {
  readonly id: string;
  readonly name?: string;
  /** Sanitized folder names from the export root down to the presentation's container */
  readonly parentPath: readonly string[];
  readonly source: PresentationSource;
  readonly slides: readonly SlideRef[];
  /** Raw remote description, dumped by the json format */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/** A slide whose vector data has been fetched. */
export interface Slide {
  index: number;
  ref: SlideRef;
  document: VectorDocument;
  durationSeconds: number;
}

// ─── Requests ─────────────────────────────────────────────────────────────────

/**
 * Export request as received from callers. Formats are plain strings so
 * that unknown tags can be rejected by the key computation.
 */
export interface ExportRequest {
  presentation: Presentation;
  formats: readonly string[];
  options: ExportOptions;
}

// ─── Results ──────────────────────────────────────────────────────────────────

export interface Artifact {
  format: ExportFormat;
  path: string;
  /** sha256 hex of the file contents */
  checksum: string;
  sizeBytes: number;
  /** Slide position for per-slide formats */
  slideIndex?: number;
  fromCache: boolean;
}

export type ExportSubject =
  | { kind: 'presentation'; id: string; name?: string; parentPath: readonly string[] }
  | { kind: 'container'; id: string; parentPath: readonly string[] };

export interface ExportIssue {
  error: DeckMediaError;
  format?: ExportFormat;
  slideIndex?: number;
  slideId?: string;
}

export interface ExportResult {
  subject: ExportSubject;
  /** OptionsKey of the full request, when one could be computed */
  key?: string;
  artifacts: Artifact[];
  errors: ExportIssue[];
  /** Formats served entirely from the cache */
  cachedFormats: ExportFormat[];
}
