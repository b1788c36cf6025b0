/**
 * Output layout
 *
 *   <root>/<parent-path...>/<name-or-id>/<slide-index>.<ext>     still formats
 *   <root>/<parent-path...>/<name-or-id>/<name-or-id>.mp4        assembled video
 *   <root>/<parent-path...>/<name-or-id>/<name-or-id>.json       metadata sidecar
 */

import { join } from 'path';
import { FORMAT_EXTENSIONS } from '../model/types.js';
import type { ExportFormat, NamingScheme, Presentation } from '../model/types.js';

const UNSAFE_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Make a display name usable as one path segment: trimmed, whitespace runs
 * collapsed to '-', separators and reserved characters removed.
 */
export function sanitizePathSegment(name: string): string {
  const cleaned = name.trim().replace(/\s+/g, '-').replace(UNSAFE_CHARS, '');
  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    return '_';
  }
  return cleaned;
}

export class OutputLayout {
  constructor(readonly root: string) {}

  /** Sanitized directory/file stem for a presentation. */
  displayName(presentation: Presentation): string {
    return sanitizePathSegment(presentation.name ?? presentation.id);
  }

  presentationDir(presentation: Presentation): string {
    return join(
      this.root,
      ...presentation.parentPath.map(sanitizePathSegment),
      this.displayName(presentation)
    );
  }

  slidePath(
    presentation: Presentation,
    format: Exclude<ExportFormat, 'mp4' | 'json'>,
    slideIndex: number,
    slideId: string,
    naming: NamingScheme
  ): string {
    const ext = FORMAT_EXTENSIONS[format];
    const file = naming === 'titled'
      ? `${this.displayName(presentation)}_slide_${String(slideIndex + 1).padStart(2, '0')}_${sanitizePathSegment(slideId)}.${ext}`
      : `${slideIndex}.${ext}`;
    return join(this.presentationDir(presentation), file);
  }

  videoPath(presentation: Presentation): string {
    return join(this.presentationDir(presentation), `${this.displayName(presentation)}.${FORMAT_EXTENSIONS.mp4}`);
  }

  metadataPath(presentation: Presentation): string {
    return join(this.presentationDir(presentation), `${this.displayName(presentation)}.${FORMAT_EXTENSIONS.json}`);
  }
}
