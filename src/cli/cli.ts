/**
 * deckmedia CLI
 *
 * Commands:
 *   deckmedia export <presentationId> [--formats png,mp4] [--resolution 1280x720] [--slides s1,s2]
 *   deckmedia export-folder [folderId] [--folder <id>...] [--presentation <id>...]
 *   deckmedia cache list | clear
 *   deckmedia config show | set <key> <value>
 */

import { Command } from 'commander';
import { ConfigManager, exportOptionsFrom } from '../config/config.js';
import type { DeckMediaConfig } from '../config/config.js';
import { listPresets, resolveResolution } from '../config/presets.js';
import { ConfigurationError, InvalidRequestError } from '../errors/index.js';
import { FolderExporter } from '../exporter/folder-exporter.js';
import { PresentationExporter } from '../exporter/presentation-exporter.js';
import { explicitPresentation, PresentationResolver } from '../exporter/presentation-resolver.js';
import { createLogger } from '../logging/logger.js';
import type { ExportOptions, ExportResult, SlideRef } from '../model/types.js';
import { HttpRemoteSource } from '../remote/http-remote-source.js';
import { RetryingRemoteSource } from '../remote/retry.js';
import type { RetryPolicy } from '../remote/retry.js';
import { MemoryCacheIndex, SqliteCacheIndex } from '../storage/cache-index.js';
import type { CacheIndexStore } from '../storage/cache-index.js';
import { FfmpegMuxer } from '../video/ffmpeg-muxer.js';
import { SequenceAssembler } from '../video/sequence-assembler.js';
import { OutputFormatter } from './formatter.js';
import { ProgressReporter } from './progress.js';

// Spinner factory — lazily imported so tests can run without a real TTY.
async function spinner(text: string): Promise<{ stop: (ok?: boolean, text?: string) => void }> {
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (ok?: boolean, text?: string) => {
        if (ok === true) s.succeed(text);
        else if (ok === false) s.fail(text);
        else s.stop();
      },
    };
  } catch {
    // Fallback for environments without ora
    process.stdout.write(`${text}...\n`);
    return { stop: () => undefined };
  }
}

/** Collaborators one export run needs. */
export interface Pipeline {
  exporter: PresentationExporter;
  folders: FolderExporter;
  resolver: PresentationResolver;
  cache: CacheIndexStore;
}

interface ExportFlags {
  formats?: string;
  resolution?: string;
  preset?: string;
  fps?: string;
  duration?: string;
  jpegQuality?: string;
  naming?: string;
  out?: string;
  cache: boolean;
}

interface ExportCommandFlags extends ExportFlags {
  slides?: string;
}

interface ExportFolderFlags extends ExportFlags {
  folder: string[];
  presentation: string[];
  concurrency?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNumberFlag(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidRequestError(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse `--slides`: "s1,s2" refers to slides of the exported presentation,
 * "otherId:s3" to a slide of another one.
 */
export function parseSlideList(presentationId: string, raw: string): SlideRef[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((item) => {
      const sep = item.indexOf(':');
      return sep > 0
        ? { presentationId: item.slice(0, sep), slideId: item.slice(sep + 1) }
        : { presentationId, slideId: item };
    });
}

export class DeckMediaCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly reporter: ProgressReporter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter(),
    reporter: ProgressReporter = new ProgressReporter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.reporter = reporter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('deckmedia')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Export presentation slides to SVG, PNG, JPEG, JSON and MP4');

    const withExportOptions = (cmd: Command): Command => cmd
      .option('-f, --formats <list>', 'Comma-separated formats: svg,png,jpeg,json,mp4')
      .option('-r, --resolution <WxH>', 'Output resolution, e.g. 1280x720')
      .option('-p, --preset <name>', `Resolution preset: ${listPresets().join(', ')}`)
      .option('--fps <n>', 'Video frame rate')
      .option('--duration <seconds>', 'Display duration per slide')
      .option('--jpeg-quality <n>', 'JPEG quality 1-100')
      .option('--naming <scheme>', 'File naming: index | titled')
      .option('-o, --out <dir>', 'Output directory')
      .option('--no-cache', 'Ignore and do not update the persistent cache');

    // ── export ─────────────────────────────────────────────────────────────
    withExportOptions(
      program
        .command('export <presentationId>')
        .description('Export one presentation')
        .option('--slides <list>', 'Explicit slide list: id1,id2 or otherPresentation:id')
    ).action(async (presentationId: string, opts: ExportCommandFlags) => {
      await this.withAbort(async (signal) => {
        const { config, formats, options } = this.resolveExport(opts);
        const pipeline = this.createPipeline(config, { noCache: !opts.cache });
        try {
          pipeline.exporter.validate(formats, options);
          const spin = await spinner(`Exporting ${presentationId}`);
          let result: ExportResult;
          try {
            const presentation = opts.slides
              ? explicitPresentation({ id: presentationId, slides: parseSlideList(presentationId, opts.slides) })
              : await pipeline.resolver.fromRemote(presentationId, [], signal);
            result = await pipeline.exporter.export(presentation, formats, options, signal);
          } catch (err) {
            spin.stop(false, 'Export failed');
            throw err;
          }
          spin.stop(result.errors.length === 0, result.errors.length === 0 ? 'Export complete' : 'Export finished with errors');
          this.finish([result]);
        } finally {
          pipeline.cache.close();
        }
      });
    });

    // ── export-folder ──────────────────────────────────────────────────────
    withExportOptions(
      program
        .command('export-folder [folderId]')
        .description('Export every presentation in a folder tree (default: root)')
        .option('--folder <id>', 'Additional folder root (repeatable)', collect, [])
        .option('--presentation <id>', 'Additional presentation (repeatable)', collect, [])
        .option('-c, --concurrency <n>', 'Concurrent presentation exports')
    ).action(async (folderId: string | undefined, opts: ExportFolderFlags) => {
      await this.withAbort(async (signal) => {
        const { config, formats, options } = this.resolveExport(opts);
        if (opts.concurrency !== undefined) {
          config.performance.presentationConcurrency = parseNumberFlag('concurrency', opts.concurrency);
        }
        const pipeline = this.createPipeline(config, { noCache: !opts.cache });
        try {
          this.reporter.logInfo(`Writing to ${config.export.outputDir}`);
          this.reporter.startTask(`Exporting folder ${folderId ?? 'root'}`);
          const results = await pipeline.folders.exportTree(
            folderId ?? 'root',
            formats,
            options,
            { folderIds: opts.folder, presentationIds: opts.presentation },
            signal
          );
          results.forEach((r) => this.reporter.reportResult(r));
          this.finish(results);
        } finally {
          pipeline.cache.close();
        }
      });
    });

    // ── cache ──────────────────────────────────────────────────────────────
    const cache = program.command('cache').description('Inspect or clear the export cache');
    cache
      .command('list')
      .description('List cached exports')
      .action(() => {
        this.guard(() => {
          const index = this.openCache(this.configManager.loadWithEnvOverrides());
          try {
            console.log(this.formatter.formatCacheEntries(index.list()));
          } finally {
            index.close();
          }
        });
      });
    cache
      .command('clear')
      .description('Remove every cache entry (exported files are kept)')
      .action(() => {
        this.guard(() => {
          const index = this.openCache(this.configManager.loadWithEnvOverrides());
          try {
            this.reporter.completeTask(`Removed ${index.clear()} cache entr(y/ies)`);
          } finally {
            index.close();
          }
        });
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Show or change configuration');
    config
      .command('show')
      .description('Print the effective configuration')
      .action(() => {
        this.guard(() => {
          const effective = this.configManager.loadWithEnvOverrides();
          console.log(this.formatter.formatConfig(effective, this.configManager.configPath));
          const { errors } = this.configManager.validate(effective);
          errors.forEach((e) => this.reporter.warn(e));
        });
      });
    config
      .command('set <key> <value>')
      .description('Set a config value, e.g. `config set export.frameRate 24`')
      .action((key: string, value: string) => {
        this.guard(() => {
          const current = this.configManager.load();
          ConfigManager.setValue(current, key, value);
          const { valid, errors } = this.configManager.validate(current);
          if (!valid) {
            throw new ConfigurationError(errors.join('; '), { key });
          }
          this.configManager.save(current);
          this.reporter.completeTask(`Set ${key}`);
        });
      });

    return program;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  /**
   * Merge config and flags into a config, format list and export options.
   */
  resolveExport(opts: ExportFlags): { config: DeckMediaConfig; formats: string[]; options: ExportOptions } {
    const config = this.configManager.loadWithEnvOverrides();
    if (opts.out) config.export.outputDir = opts.out;

    const formats = opts.formats
      ? opts.formats.split(',').map((f) => f.trim().toLowerCase()).filter((f) => f.length > 0)
      : [...config.export.formats];

    const options = exportOptionsFrom(config);
    const sizeText = opts.resolution ?? opts.preset;
    if (sizeText !== undefined) {
      const resolution = resolveResolution(sizeText);
      if (!resolution) {
        throw new InvalidRequestError(`Unknown resolution or preset "${sizeText}"`);
      }
      options.resolution = resolution;
    }
    if (opts.fps !== undefined) options.frameRate = parseNumberFlag('fps', opts.fps);
    if (opts.duration !== undefined) options.slideDurationSeconds = parseNumberFlag('duration', opts.duration);
    if (opts.jpegQuality !== undefined) options.jpegQuality = parseNumberFlag('jpeg-quality', opts.jpegQuality);
    if (opts.naming !== undefined) {
      if (opts.naming !== 'index' && opts.naming !== 'titled') {
        throw new InvalidRequestError(`--naming must be index or titled, got "${opts.naming}"`);
      }
      options.naming = opts.naming;
    }
    return { config, formats, options };
  }

  private finish(results: ExportResult[]): void {
    console.log(this.formatter.formatExportResults(results));
    if (results.some((r) => r.errors.length > 0)) {
      process.exitCode = 1;
    }
  }

  /** Run an action with SIGINT wired to an AbortSignal. */
  private async withAbort(action: (signal: AbortSignal) => Promise<void>): Promise<void> {
    const controller = new AbortController();
    const onSigint = (): void => {
      this.reporter.warn('Cancelling — waiting for in-flight work to stop');
      controller.abort();
    };
    process.once('SIGINT', onSigint);
    try {
      await action(controller.signal);
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  private guard(action: () => void): void {
    try {
      action();
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected openCache(config: DeckMediaConfig): CacheIndexStore {
    return new SqliteCacheIndex(config.storage.cacheDbPath);
  }

  protected createPipeline(config: DeckMediaConfig, opts: { noCache: boolean }): Pipeline {
    const accessToken = config.remote.accessToken;
    if (!accessToken) {
      throw new ConfigurationError('No access token configured; set DECKMEDIA_ACCESS_TOKEN');
    }

    const logger = createLogger(config.logging.level, 'deckmedia');
    const retryPolicy: RetryPolicy = {
      attempts: config.remote.retries,
      baseDelayMs: config.remote.retryBaseDelayMs,
      maxDelayMs: config.remote.retryMaxDelayMs,
      timeoutMs: config.remote.timeoutMs,
    };
    const remote = new HttpRemoteSource({ accessToken, timeoutMs: config.remote.timeoutMs });
    const cache = opts.noCache ? new MemoryCacheIndex() : this.openCache(config);

    const exporter = new PresentationExporter({
      remote,
      cache,
      outputRoot: config.export.outputDir,
      assembler: new SequenceAssembler(new FfmpegMuxer({ ffmpegPath: config.video.ffmpegPath })),
      retryPolicy,
      fetchConcurrency: config.performance.fetchConcurrency,
      renderConcurrency: config.performance.renderConcurrency,
      logger,
    });
    const folders = new FolderExporter(remote, exporter, {
      maxDepth: config.export.maxDepth,
      presentationConcurrency: config.performance.presentationConcurrency,
      retryPolicy,
      logger,
    });
    const resolver = new PresentationResolver(new RetryingRemoteSource(remote, retryPolicy));

    return { exporter, folders, resolver, cache };
  }
}
