/**
 * Presentation Exporter
 *
 * Export pipeline for one presentation:
 *   1. OptionsKey + per-format keys (InvalidRequestError propagates)
 *   2. Cache lookup per format, artifacts verified by path and checksum
 *   3. For missing formats only: fetch slides → render once → transcode
 *   4. Write artifacts atomically, then record one cache entry per
 *      complete format
 *
 * Every other failure is collected in ExportResult.errors. Fetch and
 * render/encode slots are limited per exporter instance, so concurrent
 * export() calls share the same caps.
 */

import os from 'os';
import { AssemblyError, CancelledError, ErrorHandler, StorageError } from '../errors/index.js';
import type { DeckMediaError } from '../errors/index.js';
import type { ILogger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { RASTER_FORMATS } from '../model/types.js';
import type {
  Artifact,
  ExportFormat,
  ExportIssue,
  ExportOptions,
  ExportRequest,
  ExportResult,
  Presentation,
  Slide,
} from '../model/types.js';
import { computeFormatKeys, computeOptionsKey, validateFormats, validateOptions } from '../options/options-key.js';
import { ConcurrencyLimiter } from '../performance/concurrency-limiter.js';
import { ParallelProcessor } from '../performance/parallel-processor.js';
import { DEFAULT_RETRY_POLICY, RetryingRemoteSource } from '../remote/retry.js';
import type { RetryPolicy } from '../remote/retry.js';
import type { RemoteSource } from '../remote/types.js';
import { SlideRenderer } from '../renderer/slide-renderer.js';
import type { RasterImage } from '../renderer/slide-renderer.js';
import { ArtifactWriter } from '../storage/artifact-writer.js';
import type { CacheEntry, CacheIndexStore, CachedArtifact } from '../storage/cache-index.js';
import { FormatTranscoder } from '../transcoder/format-transcoder.js';
import { SequenceAssembler } from '../video/sequence-assembler.js';
import { OutputLayout } from './output-layout.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PresentationExporterOptions {
  remote: RemoteSource;
  cache: CacheIndexStore;
  /** Export root directory */
  outputRoot: string;
  assembler: SequenceAssembler;
  renderer?: SlideRenderer;
  transcoder?: FormatTranscoder;
  writer?: ArtifactWriter;
  retryPolicy?: RetryPolicy;
  /** Concurrent slide fetches across all export() calls (default: 8) */
  fetchConcurrency?: number;
  /** Concurrent render/encode tasks across all export() calls (default: available parallelism) */
  renderConcurrency?: number;
  logger?: ILogger;
}

interface PlannedFile {
  path: string;
  slideIndex?: number;
}

interface FormatOutcome {
  artifacts: Artifact[];
  errors: ExportIssue[];
  complete: boolean;
}

export const DEFAULT_FETCH_CONCURRENCY = 8;

function toStorageError(what: string, err: unknown, key: string): DeckMediaError {
  if (err instanceof StorageError) return err;
  return new StorageError(`${what}: ${err instanceof Error ? err.message : String(err)}`, { key });
}

// ─── PresentationExporter ─────────────────────────────────────────────────────

export class PresentationExporter {
  readonly layout: OutputLayout;
  private readonly remote: RemoteSource;
  private readonly cache: CacheIndexStore;
  private readonly assembler: SequenceAssembler;
  private readonly renderer: SlideRenderer;
  private readonly transcoder: FormatTranscoder;
  private readonly writer: ArtifactWriter;
  private readonly fetchLimiter: ConcurrencyLimiter;
  private readonly workLimiter: ConcurrencyLimiter;
  private readonly logger: ILogger;

  constructor(options: PresentationExporterOptions) {
    this.remote = new RetryingRemoteSource(options.remote, options.retryPolicy ?? DEFAULT_RETRY_POLICY);
    this.cache = options.cache;
    this.layout = new OutputLayout(options.outputRoot);
    this.assembler = options.assembler;
    this.renderer = options.renderer ?? new SlideRenderer();
    this.transcoder = options.transcoder ?? new FormatTranscoder();
    this.writer = options.writer ?? new ArtifactWriter();
    this.fetchLimiter = new ConcurrencyLimiter(options.fetchConcurrency ?? DEFAULT_FETCH_CONCURRENCY);
    this.workLimiter = new ConcurrencyLimiter(options.renderConcurrency ?? os.availableParallelism());
    this.logger = (options.logger ?? silentLogger).child('export');
  }

  /**
   * Check a format set and options on their own, before any presentation
   * is known. Throws InvalidRequestError.
   */
  validate(formats: readonly string[], options: ExportOptions): void {
    validateFormats(formats);
    validateOptions(options);
  }

  /**
   * Export a fully resolved request.
   */
  exportRequest(request: ExportRequest, signal?: AbortSignal): Promise<ExportResult> {
    return this.export(request.presentation, request.formats, request.options, signal);
  }

  /**
   * Export one presentation in the given formats. Only InvalidRequestError
   * is thrown; all other failures are returned in the result.
   */
  async export(
    presentation: Presentation,
    formats: readonly string[],
    options: ExportOptions,
    signal?: AbortSignal
  ): Promise<ExportResult> {
    const request: ExportRequest = { presentation, formats, options };
    const key = computeOptionsKey(request);
    const formatKeys = computeFormatKeys(request);
    const log = this.logger.child(presentation.id);

    const result: ExportResult = {
      subject: {
        kind: 'presentation',
        id: presentation.id,
        name: presentation.name,
        parentPath: presentation.parentPath,
      },
      key,
      artifacts: [],
      errors: [],
      cachedFormats: [],
    };

    const byFormat = new Map<ExportFormat, Artifact[]>();
    const missing: ExportFormat[] = [];

    for (const [format, formatKey] of formatKeys) {
      const cached = await this.lookup(presentation, format, formatKey, options, log, result.errors);
      if (cached) {
        byFormat.set(format, cached);
        result.cachedFormats.push(format);
      } else {
        missing.push(format);
      }
    }

    if (missing.length > 0) {
      log.debug('Cache miss', { formats: missing });
      const produced = await this.produce(presentation, missing, options, signal, log);
      result.errors.push(...produced.errors);

      for (const format of missing) {
        const outcome = produced.outcomes.get(format);
        if (!outcome) continue;
        byFormat.set(format, outcome.artifacts);
        result.errors.push(...outcome.errors);
        const formatKey = formatKeys.get(format);
        if (outcome.complete && formatKey) {
          this.record(formatKey, presentation, format, outcome.artifacts, result.errors);
        }
      }
    }

    // Formats in sorted order, per-slide artifacts in slide order.
    for (const format of formatKeys.keys()) {
      const artifacts = byFormat.get(format) ?? [];
      result.artifacts.push(...[...artifacts].sort((a, b) => (a.slideIndex ?? 0) - (b.slideIndex ?? 0)));
    }

    for (const issue of result.errors) {
      log.warn(issue.error.message, {
        code: issue.error.code,
        format: issue.format,
        slideIndex: issue.slideIndex,
      });
    }
    return result;
  }

  // ─── Cache ──────────────────────────────────────────────────────────────────

  /** Files a format produces for this presentation, in slide order. */
  plannedFiles(presentation: Presentation, format: ExportFormat, options: ExportOptions): PlannedFile[] {
    switch (format) {
      case 'mp4':
        return [{ path: this.layout.videoPath(presentation) }];
      case 'json':
        return [{ path: this.layout.metadataPath(presentation) }];
      default:
        return presentation.slides.map((slide, i) => ({
          path: this.layout.slidePath(presentation, format, i, slide.slideId, options.naming),
          slideIndex: i,
        }));
    }
  }

  private async lookup(
    presentation: Presentation,
    format: ExportFormat,
    formatKey: string,
    options: ExportOptions,
    log: ILogger,
    errors: ExportIssue[]
  ): Promise<Artifact[] | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = this.cache.get(formatKey);
    } catch (err) {
      // Unreadable index: export as a miss.
      errors.push({ error: toStorageError('Cache lookup failed', err, formatKey), format });
      return undefined;
    }
    if (!entry) return undefined;

    // An entry written under another output root describes other files.
    const planned = this.plannedFiles(presentation, format, options).map((f) => f.path);
    const recorded = entry.artifacts.map((a) => a.path);
    if (planned.length !== recorded.length || planned.some((p, i) => p !== recorded[i])) {
      log.debug('Cache entry does not match output layout', { format });
      return undefined;
    }

    for (const artifact of entry.artifacts) {
      let valid: boolean;
      try {
        valid = await this.writer.verify(artifact.path, artifact.checksum);
      } catch (err) {
        log.warn('Cannot verify cached artifact', { path: artifact.path, error: ErrorHandler.toUserMessage(err) });
        valid = false;
      }
      if (!valid) {
        log.debug('Cache entry invalidated', { format, path: artifact.path });
        try {
          this.cache.invalidate(formatKey);
        } catch (err) {
          errors.push({ error: toStorageError('Cache invalidation failed', err, formatKey), format });
        }
        return undefined;
      }
    }

    log.debug('Cache hit', { format });
    return entry.artifacts.map((a) => ({
      format,
      path: a.path,
      checksum: a.checksum,
      sizeBytes: a.sizeBytes,
      slideIndex: a.slideIndex,
      fromCache: true,
    }));
  }

  private record(
    formatKey: string,
    presentation: Presentation,
    format: ExportFormat,
    artifacts: Artifact[],
    errors: ExportIssue[]
  ): void {
    const now = new Date().toISOString();
    const cachedArtifacts: CachedArtifact[] = [...artifacts]
      .sort((a, b) => (a.slideIndex ?? 0) - (b.slideIndex ?? 0))
      .map((a) => ({
        path: a.path,
        checksum: a.checksum,
        sizeBytes: a.sizeBytes,
        writtenAt: now,
        slideIndex: a.slideIndex,
      }));
    try {
      this.cache.put({ key: formatKey, presentationId: presentation.id, format, artifacts: cachedArtifacts, createdAt: now });
    } catch (err) {
      errors.push({ error: ErrorHandler.normalize(err), format });
    }
  }

  // ─── Production ─────────────────────────────────────────────────────────────

  private async produce(
    presentation: Presentation,
    formats: ExportFormat[],
    options: ExportOptions,
    signal: AbortSignal | undefined,
    log: ILogger
  ): Promise<{ outcomes: Map<ExportFormat, FormatOutcome>; errors: ExportIssue[] }> {
    const errors: ExportIssue[] = [];
    const outcomes = new Map<ExportFormat, FormatOutcome>();

    const slides = await this.fetchSlides(presentation, options, signal, errors);
    log.debug('Fetched slides', { fetched: slides.length, total: presentation.slides.length });

    const rasters = formats.some((f) => RASTER_FORMATS.has(f))
      ? await this.renderSlides(slides, options, signal, errors)
      : new Map<number, RasterImage>();

    for (const format of formats) {
      outcomes.set(format, await this.produceFormat(presentation, format, options, slides, rasters, signal));
    }
    return { outcomes, errors };
  }

  private async fetchSlides(
    presentation: Presentation,
    options: ExportOptions,
    signal: AbortSignal | undefined,
    errors: ExportIssue[]
  ): Promise<Slide[]> {
    const pool = new ParallelProcessor(
      (ref: Presentation['slides'][number], _i: number, s?: AbortSignal) =>
        this.fetchLimiter.run(() => this.remote.fetchSlideVector(ref.presentationId, ref.slideId, s), s),
      { concurrency: this.fetchLimiter.limit }
    );
    const fetched = await pool.processAll(presentation.slides, signal);

    const slides: Slide[] = [];
    fetched.forEach(({ input: ref, output: document, error }, index) => {
      if (document) {
        slides.push({
          index,
          ref,
          document,
          durationSeconds: ref.durationSeconds ?? options.slideDurationSeconds,
        });
      } else {
        errors.push({ error: error ?? new CancelledError(), slideIndex: index, slideId: ref.slideId });
      }
    });
    return slides;
  }

  private async renderSlides(
    slides: Slide[],
    options: ExportOptions,
    signal: AbortSignal | undefined,
    errors: ExportIssue[]
  ): Promise<Map<number, RasterImage>> {
    const { width, height } = options.resolution;
    const pool = new ParallelProcessor(
      (slide: Slide, _i: number, s?: AbortSignal) =>
        this.workLimiter.run(() => this.renderer.render(slide.document, width, height, { fillColor: options.fillColor }), s),
      { concurrency: this.workLimiter.limit }
    );
    const rendered = await pool.processAll(slides, signal);

    const rasters = new Map<number, RasterImage>();
    for (const { input: slide, output: raster, error } of rendered) {
      if (raster) {
        rasters.set(slide.index, raster);
      } else {
        errors.push({ error: error ?? new CancelledError(), slideIndex: slide.index, slideId: slide.ref.slideId });
      }
    }
    return rasters;
  }

  private async produceFormat(
    presentation: Presentation,
    format: ExportFormat,
    options: ExportOptions,
    slides: Slide[],
    rasters: Map<number, RasterImage>,
    signal: AbortSignal | undefined
  ): Promise<FormatOutcome> {
    const total = presentation.slides.length;

    switch (format) {
      case 'svg':
        return this.writePerSlide(presentation, format, options, slides, total, signal,
          (slide) => this.transcoder.encodeSvg(slide.document));

      case 'png':
      case 'jpeg': {
        const renderable = slides.filter((s) => rasters.has(s.index));
        return this.writePerSlide(presentation, format, options, renderable, total, signal, (slide) => {
          const raster = rasters.get(slide.index);
          if (!raster) throw new CancelledError();
          return this.transcoder.encode(raster, format, { jpegQuality: options.jpegQuality });
        });
      }

      case 'json':
        return this.writeSingle(format, this.layout.metadataPath(presentation), signal, slides.length === total,
          async () => this.transcoder.encodeMetadata(presentation, slides));

      case 'mp4': {
        const frames: RasterImage[] = [];
        const durations: number[] = [];
        const missing: number[] = [];
        for (let i = 0; i < total; i++) {
          const raster = rasters.get(i);
          const slide = slides.find((s) => s.index === i);
          if (raster && slide) {
            frames.push(raster);
            durations.push(slide.durationSeconds);
          } else {
            missing.push(i);
          }
        }
        if (missing.length > 0 && total > 0) {
          return {
            artifacts: [],
            errors: [{
              error: new AssemblyError(`Video skipped: slide(s) ${missing.join(', ')} unavailable`, { missing }),
              format,
            }],
            complete: false,
          };
        }
        return this.writeSingle(format, this.layout.videoPath(presentation), signal, true, async () => {
          const video = await this.assembler.assemble(frames, durations, options.frameRate, signal);
          this.logger.debug('Assembled video', {
            presentationId: presentation.id,
            frameCount: video.frameCount,
            durationSeconds: video.durationSeconds,
          });
          return video.bytes;
        });
      }
    }
  }

  private async writePerSlide(
    presentation: Presentation,
    format: 'svg' | 'png' | 'jpeg',
    options: ExportOptions,
    slides: Slide[],
    total: number,
    signal: AbortSignal | undefined,
    encode: (slide: Slide) => Buffer
  ): Promise<FormatOutcome> {
    const pool = new ParallelProcessor(
      async (slide: Slide, _i: number, s?: AbortSignal) => {
        const path = this.layout.slidePath(presentation, format, slide.index, slide.ref.slideId, options.naming);
        const written = await this.workLimiter.run(async () => this.writer.write(path, encode(slide), s), s);
        return { ...written, format, slideIndex: slide.index, fromCache: false };
      },
      { concurrency: this.workLimiter.limit }
    );
    const results = await pool.processAll(slides, signal);

    const artifacts: Artifact[] = [];
    const errors: ExportIssue[] = [];
    for (const { input: slide, output, error } of results) {
      if (output) artifacts.push(output);
      else errors.push({ error: error ?? new CancelledError(), format, slideIndex: slide.index, slideId: slide.ref.slideId });
    }
    return { artifacts, errors, complete: errors.length === 0 && artifacts.length === total };
  }

  private async writeSingle(
    format: ExportFormat,
    path: string,
    signal: AbortSignal | undefined,
    cacheable: boolean,
    build: () => Promise<Buffer>
  ): Promise<FormatOutcome> {
    try {
      const written = await this.writer.write(path, await build(), signal);
      return { artifacts: [{ ...written, format, fromCache: false }], errors: [], complete: cacheable };
    } catch (err) {
      const error: DeckMediaError = ErrorHandler.normalize(err);
      return { artifacts: [], errors: [{ error, format }], complete: false };
    }
  }
}
