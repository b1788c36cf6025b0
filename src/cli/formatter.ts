/**
 * deckmedia Output Formatter
 *
 * Formats export results, cache entries and configuration for CLI output.
 */

import type { DeckMediaConfig } from '../config/config.js';
import { ErrorHandler } from '../errors/index.js';
import type { ExportResult } from '../model/types.js';
import type { CacheEntry } from '../storage/cache-index.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function subjectLabel(result: ExportResult): string {
  const { subject } = result;
  // A container's parentPath already ends with the container itself.
  if (subject.kind === 'container') return `📁 ${subject.parentPath.join('/') || subject.id}`;
  const path = subject.parentPath.length > 0 ? `${subject.parentPath.join('/')}/` : '';
  return `📄 ${path}${subject.name ?? subject.id}`;
}

export class OutputFormatter {
  /**
   * One block per result: artifacts written or served from cache, then
   * any errors.
   */
  formatExportResults(results: ExportResult[]): string {
    if (!results.length) {
      return `${YELLOW}Nothing to export.${RESET}`;
    }

    const lines: string[] = [header(`Export Results (${results.length})`)];
    for (const result of results) {
      const status = result.errors.length === 0 ? `${GREEN}✓${RESET}` : `${RED}✗${RESET}`;
      lines.push(`  ${status} ${BOLD}${subjectLabel(result)}${RESET}`);
      if (result.cachedFormats.length > 0) {
        lines.push(`       ${DIM}Cached: ${result.cachedFormats.join(', ')}${RESET}`);
      }
      for (const artifact of result.artifacts) {
        const tag = artifact.fromCache ? ' (cached)' : '';
        lines.push(`       ${artifact.path} ${DIM}${formatBytes(artifact.sizeBytes)}${tag}${RESET}`);
      }
      for (const issue of result.errors) {
        const where = [
          issue.format,
          issue.slideIndex !== undefined ? `slide ${issue.slideIndex}` : undefined,
        ].filter(Boolean).join(', ');
        lines.push(`       ${RED}${where ? `[${where}] ` : ''}${ErrorHandler.toUserMessage(issue.error)}${RESET}`);
      }
    }

    lines.push(LINE);
    lines.push(this.formatSummary(results));
    return lines.join('\n');
  }

  /** Totals line, e.g. "3 artifact(s), 1 from cache, 0 error(s)". */
  formatSummary(results: ExportResult[]): string {
    let artifacts = 0;
    let cached = 0;
    let errors = 0;
    for (const r of results) {
      artifacts += r.artifacts.length;
      cached += r.artifacts.filter((a) => a.fromCache).length;
      errors += r.errors.length;
    }
    return `${artifacts} artifact(s), ${cached} from cache, ${errors} error(s)`;
  }

  formatCacheEntries(entries: CacheEntry[]): string {
    if (!entries.length) {
      return `${YELLOW}Cache is empty.${RESET}`;
    }
    const lines: string[] = [header(`Cache Entries (${entries.length})`)];
    entries.forEach((entry, i) => {
      const size = entry.artifacts.reduce((sum, a) => sum + a.sizeBytes, 0);
      lines.push(`  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${BOLD}${entry.presentationId}${RESET} ${entry.format}`);
      lines.push(`       ${DIM}Key: ${entry.key.slice(0, 16)} | Files: ${entry.artifacts.length} | ${formatBytes(size)} | ${entry.createdAt}${RESET}`);
    });
    return lines.join('\n');
  }

  /**
   * Config overview. The access token is never printed in full.
   */
  formatConfig(config: DeckMediaConfig, configPath: string): string {
    const token = config.remote.accessToken;
    const lines: string[] = [header('deckmedia Configuration')];
    lines.push(field('Config file', configPath));
    lines.push(field('Access token', token ? `${token.slice(0, 4)}…(${token.length} chars)` : 'not set'));
    lines.push(field('Output dir', config.export.outputDir));
    lines.push(field('Formats', config.export.formats.join(', ')));
    lines.push(field('Resolution', `${config.export.resolution.width}x${config.export.resolution.height}`));
    lines.push(field('Frame rate', `${config.export.frameRate} fps`));
    lines.push(field('Slide duration', `${config.export.slideDurationSeconds}s`));
    lines.push(field('JPEG quality', config.export.jpegQuality));
    lines.push(field('Fill color', config.export.fillColor));
    lines.push(field('Naming', config.export.naming));
    lines.push(field('Max depth', config.export.maxDepth));
    lines.push(field('Fetch concurrency', config.performance.fetchConcurrency));
    lines.push(field('Render concurrency', config.performance.renderConcurrency));
    lines.push(field('Export concurrency', config.performance.presentationConcurrency));
    lines.push(field('Retries', config.remote.retries));
    lines.push(field('Timeout', `${config.remote.timeoutMs}ms`));
    lines.push(field('Cache DB', config.storage.cacheDbPath));
    lines.push(field('ffmpeg', config.video.ffmpegPath));
    lines.push(field('Log level', config.logging.level));
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format an error into a friendly message with a hint where one applies.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
    if (msg.includes('access token')) {
      lines.push(`${YELLOW}Hint:${RESET} Set DECKMEDIA_ACCESS_TOKEN or run \`deckmedia config set remote.accessToken <token>\`.`);
    } else if (msg.includes('ffmpeg not found')) {
      lines.push(`${YELLOW}Hint:${RESET} Install ffmpeg or run \`deckmedia config set video.ffmpegPath <path>\`.`);
    } else if (msg.includes('eacces') || msg.includes('permission denied')) {
      lines.push(`${YELLOW}Hint:${RESET} Permission denied. Check the output directory permissions.`);
    }

    return lines.join('\n');
  }
}
