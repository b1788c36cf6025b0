/**
 * Resolution presets
 *
 * Named output sizes accepted by `--preset` and `export.resolution` in the
 * config file.
 */

import type { Resolution } from '../model/types.js';

export interface ResolutionPreset {
  name: string;
  description: string;
  resolution: Resolution;
}

export const RESOLUTION_PRESETS: Record<string, ResolutionPreset> = {
  '720p': {
    name: '720p',
    description: 'HD, 16:9',
    resolution: { width: 1280, height: 720 },
  },
  '1080p': {
    name: '1080p',
    description: 'Full HD, 16:9 (default)',
    resolution: { width: 1920, height: 1080 },
  },
  '1440p': {
    name: '1440p',
    description: 'QHD, 16:9',
    resolution: { width: 2560, height: 1440 },
  },
  '4k': {
    name: '4k',
    description: 'UHD, 16:9',
    resolution: { width: 3840, height: 2160 },
  },
  'square-1080': {
    name: 'square-1080',
    description: 'Square 1:1 for social feeds',
    resolution: { width: 1080, height: 1080 },
  },
  'portrait-1080': {
    name: 'portrait-1080',
    description: 'Portrait 9:16 for vertical displays',
    resolution: { width: 1080, height: 1920 },
  },
};

/**
 * Get a preset by name. Returns undefined for unknown names.
 */
export function getPreset(name: string): ResolutionPreset | undefined {
  return Object.prototype.hasOwnProperty.call(RESOLUTION_PRESETS, name) ? RESOLUTION_PRESETS[name] : undefined;
}

/** List all preset names. */
export function listPresets(): string[] {
  return Object.keys(RESOLUTION_PRESETS);
}

/**
 * Parse "WIDTHxHEIGHT" (e.g. "1280x720"). Returns undefined when the text
 * is not two positive integers.
 */
export function parseResolution(text: string): Resolution | undefined {
  const match = /^\s*(\d+)\s*[xX×]\s*(\d+)\s*$/.exec(text);
  if (!match) return undefined;
  const width = parseInt(match[1], 10);
  const height = parseInt(match[2], 10);
  return width > 0 && height > 0 ? { width, height } : undefined;
}

/** Resolve a preset name or a WxH string. */
export function resolveResolution(text: string): Resolution | undefined {
  const preset = getPreset(text.trim().toLowerCase());
  return preset ? { ...preset.resolution } : parseResolution(text);
}
