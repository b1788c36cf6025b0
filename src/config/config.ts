/**
 * deckmedia configuration
 *
 * Manages the config file at ~/.deckmedia/config.json.
 * Supports DECKMEDIA_* environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel, LOG_LEVELS } from '../logging/logger.js';
import type { LogLevel } from '../logging/logger.js';
import { EXPORT_FORMATS, isExportFormat } from '../model/types.js';
import type { ExportOptions, NamingScheme, Resolution } from '../model/types.js';
import { resolveResolution } from './presets.js';

export interface DeckMediaConfig {
  remote: {
    /** OAuth bearer token. Prefer DECKMEDIA_ACCESS_TOKEN over storing it here. */
    accessToken?: string;
    /** Default: 30000 */
    timeoutMs: number;
    /** Total attempts per remote call. Default: 3 */
    retries: number;
    /** Default: 250 */
    retryBaseDelayMs: number;
    /** Default: 4000 */
    retryMaxDelayMs: number;
  };
  export: {
    /** Default: ~/deckmedia-output */
    outputDir: string;
    /** Default: ['png'] */
    formats: string[];
    resolution: Resolution;
    frameRate: number;
    slideDurationSeconds: number;
    jpegQuality: number;
    fillColor: string;
    naming: NamingScheme;
    /** Default: 10 */
    maxDepth: number;
  };
  performance: {
    fetchConcurrency: number;
    renderConcurrency: number;
    presentationConcurrency: number;
  };
  storage: {
    /** Default: ~/.deckmedia/cache.db */
    cacheDbPath: string;
  };
  video: {
    /** Default: 'ffmpeg' (resolved on PATH) */
    ffmpegPath: string;
  };
  logging: {
    level: LogLevel;
  };
}

type Section = keyof DeckMediaConfig;

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

// ─── Settable keys ────────────────────────────────────────────────────────────

type Setter = (config: DeckMediaConfig, raw: string) => void;

function numberSetter(apply: (config: DeckMediaConfig, value: number) => void): Setter {
  return (config, raw) => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new ConfigurationError(`Expected a number, got "${raw}"`);
    }
    apply(config, value);
  };
}

const SETTERS: Record<string, Setter> = {
  'remote.accessToken': (c, v) => { c.remote.accessToken = v; },
  'remote.timeoutMs': numberSetter((c, v) => { c.remote.timeoutMs = v; }),
  'remote.retries': numberSetter((c, v) => { c.remote.retries = v; }),
  'remote.retryBaseDelayMs': numberSetter((c, v) => { c.remote.retryBaseDelayMs = v; }),
  'remote.retryMaxDelayMs': numberSetter((c, v) => { c.remote.retryMaxDelayMs = v; }),
  'export.outputDir': (c, v) => { c.export.outputDir = v; },
  'export.formats': (c, v) => { c.export.formats = splitList(v); },
  'export.resolution': (c, v) => {
    const resolution = resolveResolution(v);
    if (!resolution) throw new ConfigurationError(`Invalid resolution "${v}" (use WIDTHxHEIGHT or a preset name)`);
    c.export.resolution = resolution;
  },
  'export.frameRate': numberSetter((c, v) => { c.export.frameRate = v; }),
  'export.slideDurationSeconds': numberSetter((c, v) => { c.export.slideDurationSeconds = v; }),
  'export.jpegQuality': numberSetter((c, v) => { c.export.jpegQuality = v; }),
  'export.fillColor': (c, v) => { c.export.fillColor = v; },
  'export.naming': (c, v) => {
    if (v !== 'index' && v !== 'titled') throw new ConfigurationError(`export.naming must be index | titled, got: ${v}`);
    c.export.naming = v;
  },
  'export.maxDepth': numberSetter((c, v) => { c.export.maxDepth = v; }),
  'performance.fetchConcurrency': numberSetter((c, v) => { c.performance.fetchConcurrency = v; }),
  'performance.renderConcurrency': numberSetter((c, v) => { c.performance.renderConcurrency = v; }),
  'performance.presentationConcurrency': numberSetter((c, v) => { c.performance.presentationConcurrency = v; }),
  'storage.cacheDbPath': (c, v) => { c.storage.cacheDbPath = v; },
  'video.ffmpegPath': (c, v) => { c.video.ffmpegPath = v; },
  'logging.level': (c, v) => {
    if (!isLogLevel(v)) throw new ConfigurationError(`logging.level must be ${LOG_LEVELS.join(' | ')}, got: ${v}`);
    c.logging.level = v;
  },
};

export const SETTABLE_KEYS: readonly string[] = Object.keys(SETTERS);

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

// ─── ConfigManager ────────────────────────────────────────────────────────────

export class ConfigManager {
  readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.deckmedia', 'config.json');
  }

  /**
   * Load config from disk. Returns defaults if the file doesn't exist.
   */
  load(): DeckMediaConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config at ${this.configPath} is not a JSON object`, { path: this.configPath });
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: DeckMediaConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array — empty means valid.
   */
  validate(config: DeckMediaConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { remote, export: exp, performance } = config;

    if (!(remote.timeoutMs > 0)) errors.push('remote.timeoutMs must be positive');
    if (!isPositiveInt(remote.retries)) errors.push('remote.retries must be a positive integer');
    if (!(remote.retryBaseDelayMs >= 0)) errors.push('remote.retryBaseDelayMs must not be negative');
    if (!(remote.retryMaxDelayMs >= remote.retryBaseDelayMs)) {
      errors.push('remote.retryMaxDelayMs must be at least remote.retryBaseDelayMs');
    }

    if (!exp.outputDir) errors.push('export.outputDir is required');
    if (exp.formats.length === 0) errors.push('export.formats must name at least one format');
    const unknown = exp.formats.filter((f) => !isExportFormat(f));
    if (unknown.length > 0) {
      errors.push(`export.formats has unknown format(s): ${unknown.join(', ')} (expected ${EXPORT_FORMATS.join(' | ')})`);
    }
    if (!isPositiveInt(exp.resolution.width) || !isPositiveInt(exp.resolution.height)) {
      errors.push('export.resolution width and height must be positive integers');
    }
    if (!(exp.frameRate > 0)) errors.push('export.frameRate must be positive');
    if (!(exp.slideDurationSeconds > 0)) errors.push('export.slideDurationSeconds must be positive');
    if (!Number.isInteger(exp.jpegQuality) || exp.jpegQuality < 1 || exp.jpegQuality > 100) {
      errors.push('export.jpegQuality must be an integer from 1 to 100');
    }
    if (!HEX_COLOR.test(exp.fillColor)) errors.push(`export.fillColor must be a hex color, got: ${exp.fillColor}`);
    if (exp.naming !== 'index' && exp.naming !== 'titled') errors.push('export.naming must be index | titled');
    if (!isPositiveInt(exp.maxDepth)) errors.push('export.maxDepth must be a positive integer');

    for (const key of ['fetchConcurrency', 'renderConcurrency', 'presentationConcurrency'] as const) {
      if (!isPositiveInt(performance[key])) errors.push(`performance.${key} must be a positive integer`);
    }

    if (!isLogLevel(config.logging.level)) {
      errors.push(`logging.level must be ${LOG_LEVELS.join(' | ')}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   DECKMEDIA_ACCESS_TOKEN, DECKMEDIA_OUTPUT_DIR, DECKMEDIA_FORMATS,
   *   DECKMEDIA_RESOLUTION, DECKMEDIA_FRAME_RATE, DECKMEDIA_SLIDE_DURATION,
   *   DECKMEDIA_JPEG_QUALITY, DECKMEDIA_CACHE_DB, DECKMEDIA_LOG_LEVEL,
   *   DECKMEDIA_MAX_DEPTH
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): DeckMediaConfig {
    const config = this.load();
    const overrides: Array<[string, string]> = [
      ['DECKMEDIA_ACCESS_TOKEN', 'remote.accessToken'],
      ['DECKMEDIA_OUTPUT_DIR', 'export.outputDir'],
      ['DECKMEDIA_FORMATS', 'export.formats'],
      ['DECKMEDIA_RESOLUTION', 'export.resolution'],
      ['DECKMEDIA_FRAME_RATE', 'export.frameRate'],
      ['DECKMEDIA_SLIDE_DURATION', 'export.slideDurationSeconds'],
      ['DECKMEDIA_JPEG_QUALITY', 'export.jpegQuality'],
      ['DECKMEDIA_CACHE_DB', 'storage.cacheDbPath'],
      ['DECKMEDIA_LOG_LEVEL', 'logging.level'],
      ['DECKMEDIA_MAX_DEPTH', 'export.maxDepth'],
    ];

    for (const [name, key] of overrides) {
      const value = env[name];
      if (!value) continue;
      try {
        ConfigManager.setValue(config, key, value);
      } catch (err) {
        throw new ConfigurationError(`${name}: ${err instanceof Error ? err.message : String(err)}`, { variable: name });
      }
    }
    return config;
  }

  /**
   * Set one dotted key (e.g. "export.frameRate") from its string form.
   * Throws ConfigurationError for unknown keys or unparsable values.
   */
  static setValue(config: DeckMediaConfig, key: string, value: string): void {
    const setter = Object.prototype.hasOwnProperty.call(SETTERS, key) ? SETTERS[key] : undefined;
    if (!setter) {
      throw new ConfigurationError(`Unknown config key "${key}"`, { key });
    }
    setter(config, value);
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): DeckMediaConfig {
    const home = os.homedir();
    const cores = os.availableParallelism();
    return {
      remote: {
        timeoutMs: 30000,
        retries: 3,
        retryBaseDelayMs: 250,
        retryMaxDelayMs: 4000,
      },
      export: {
        outputDir: path.join(home, 'deckmedia-output'),
        formats: ['png'],
        resolution: { width: 1920, height: 1080 },
        frameRate: 10,
        slideDurationSeconds: 20,
        jpegQuality: 90,
        fillColor: '#000000',
        naming: 'index',
        maxDepth: 10,
      },
      performance: {
        fetchConcurrency: 8,
        renderConcurrency: cores,
        presentationConcurrency: cores,
      },
      storage: {
        cacheDbPath: path.join(home, '.deckmedia', 'cache.db'),
      },
      video: {
        ffmpegPath: 'ffmpeg',
      },
      logging: {
        level: 'warn',
      },
    };
  }

  /**
   * Copy recognized fields of a parsed file over the defaults. Values of
   * the wrong JSON type are ignored here and reported by validate().
   */
  private merge(target: DeckMediaConfig, source: Record<string, unknown>): DeckMediaConfig {
    const result = { ...target };

    const section = (name: Section): Record<string, unknown> => {
      const value = source[name];
      return isRecord(value) ? value : {};
    };
    const num = (value: unknown, fallback: number): number => (typeof value === 'number' ? value : fallback);
    const str = (value: unknown, fallback: string): string => (typeof value === 'string' ? value : fallback);

    const remote = section('remote');
    result.remote = {
      accessToken: typeof remote.accessToken === 'string' ? remote.accessToken : target.remote.accessToken,
      timeoutMs: num(remote.timeoutMs, target.remote.timeoutMs),
      retries: num(remote.retries, target.remote.retries),
      retryBaseDelayMs: num(remote.retryBaseDelayMs, target.remote.retryBaseDelayMs),
      retryMaxDelayMs: num(remote.retryMaxDelayMs, target.remote.retryMaxDelayMs),
    };

    const exp = section('export');
    const resolution = isRecord(exp.resolution) ? exp.resolution : {};
    const formats = Array.isArray(exp.formats)
      ? exp.formats.filter((f): f is string => typeof f === 'string')
      : target.export.formats;
    const naming = exp.naming === 'index' || exp.naming === 'titled' ? exp.naming : target.export.naming;
    result.export = {
      outputDir: str(exp.outputDir, target.export.outputDir),
      formats,
      resolution: {
        width: num(resolution.width, target.export.resolution.width),
        height: num(resolution.height, target.export.resolution.height),
      },
      frameRate: num(exp.frameRate, target.export.frameRate),
      slideDurationSeconds: num(exp.slideDurationSeconds, target.export.slideDurationSeconds),
      jpegQuality: num(exp.jpegQuality, target.export.jpegQuality),
      fillColor: str(exp.fillColor, target.export.fillColor),
      naming,
      maxDepth: num(exp.maxDepth, target.export.maxDepth),
    };

    const perf = section('performance');
    result.performance = {
      fetchConcurrency: num(perf.fetchConcurrency, target.performance.fetchConcurrency),
      renderConcurrency: num(perf.renderConcurrency, target.performance.renderConcurrency),
      presentationConcurrency: num(perf.presentationConcurrency, target.performance.presentationConcurrency),
    };

    result.storage = { cacheDbPath: str(section('storage').cacheDbPath, target.storage.cacheDbPath) };
    result.video = { ffmpegPath: str(section('video').ffmpegPath, target.video.ffmpegPath) };

    const level = section('logging').level;
    result.logging = { level: typeof level === 'string' && isLogLevel(level) ? level : target.logging.level };

    return result;
  }
}

/**
 * Fully resolved export options from a config.
 */
export function exportOptionsFrom(config: DeckMediaConfig): ExportOptions {
  return {
    resolution: { ...config.export.resolution },
    frameRate: config.export.frameRate,
    slideDurationSeconds: config.export.slideDurationSeconds,
    jpegQuality: config.export.jpegQuality,
    fillColor: config.export.fillColor,
    naming: config.export.naming,
  };
}
