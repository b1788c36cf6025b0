/**
 * deckmedia - export presentation slides to SVG, PNG, JPEG, JSON and MP4
 *
 * Main entry point for the library.
 */

// Model
export { EXPORT_FORMATS, FORMAT_EXTENSIONS, RASTER_FORMATS, PER_SLIDE_FORMATS, isExportFormat } from './model/types.js';
export type {
  ExportFormat,
  ExportOptions,
  ExportRequest,
  ExportResult,
  ExportIssue,
  ExportSubject,
  Artifact,
  Presentation,
  PresentationSource,
  Slide,
  SlideRef,
  Resolution,
  NamingScheme,
} from './model/types.js';
export { parseVectorDocument, countElements } from './model/vector-document.js';
export type { VectorDocument, VectorElement, VectorElementKind } from './model/vector-document.js';

// Options key
export { canonicalJson, computeOptionsKey, computeFormatKeys, validateRequest } from './options/options-key.js';

// Remote
export { ROOT_CONTAINER } from './remote/types.js';
export type { RemoteSource, RemoteEntry, ContainerListing, PresentationDescription } from './remote/types.js';
export { HttpRemoteSource } from './remote/http-remote-source.js';
export type { HttpRemoteSourceOptions } from './remote/http-remote-source.js';
export { RetryingRemoteSource, DEFAULT_RETRY_POLICY, withRetry } from './remote/retry.js';
export type { RetryPolicy } from './remote/retry.js';

// Rendering and encoding
export { SlideRenderer, fitViewport } from './renderer/slide-renderer.js';
export type { RasterImage, RenderOptions } from './renderer/slide-renderer.js';
export { serializeSvg } from './renderer/svg-serializer.js';
export { FormatTranscoder, DEFAULT_JPEG_QUALITY } from './transcoder/format-transcoder.js';

// Video
export { SequenceAssembler, planFrames } from './video/sequence-assembler.js';
export type { VideoMuxer, MuxInput, AssembledVideo } from './video/sequence-assembler.js';
export { FfmpegMuxer } from './video/ffmpeg-muxer.js';

// Storage
export { ArtifactWriter } from './storage/artifact-writer.js';
export { MemoryCacheIndex, SqliteCacheIndex } from './storage/cache-index.js';
export type { CacheEntry, CachedArtifact, CacheIndexStore } from './storage/cache-index.js';

// Export
export { PresentationExporter } from './exporter/presentation-exporter.js';
export type { PresentationExporterOptions } from './exporter/presentation-exporter.js';
export { FolderExporter, DEFAULT_MAX_DEPTH } from './exporter/folder-exporter.js';
export type { FolderExporterOptions, FolderOverrides } from './exporter/folder-exporter.js';
export { PresentationResolver, explicitPresentation } from './exporter/presentation-resolver.js';
export { OutputLayout, sanitizePathSegment } from './exporter/output-layout.js';

// Config, logging, errors
export { ConfigManager, exportOptionsFrom } from './config/config.js';
export type { DeckMediaConfig } from './config/config.js';
export { RESOLUTION_PRESETS, resolveResolution } from './config/presets.js';
export { Logger, createLogger, silentLogger } from './logging/logger.js';
export type { ILogger, LogLevel } from './logging/logger.js';
export * from './errors/index.js';

// CLI
export { DeckMediaCLI } from './cli/cli.js';
