/**
 * Google Drive / Slides REST client
 *
 * Implements RemoteSource over Drive v3 (container listing) and Slides v1
 * (presentation descriptions and pages). Takes an already-acquired OAuth
 * bearer token; acquiring and refreshing it is the caller's concern.
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import {
  DeckMediaError,
  NotFoundError,
  PermissionDeniedError,
  RenderError,
  TransientError,
  CancelledError,
} from '../errors/index.js';
import { sanitizePathSegment } from '../exporter/output-layout.js';
import type { VectorDocument } from '../model/vector-document.js';
import { normalizeSlidesPage, pageSizeOf } from './slides-normalizer.js';
import type { FetchedImage, PageSize } from './slides-normalizer.js';
import { ROOT_CONTAINER } from './types.js';
import type { ContainerListing, PresentationDescription, RemoteEntry, RemoteSource } from './types.js';

const DRIVE_FILES_URL = 'https://www.googleapis.com/drive/v3/files';
const SLIDES_URL = 'https://slides.googleapis.com/v1/presentations';

const FOLDER_MIME = 'application/vnd.google-apps.folder';
const PRESENTATION_MIME = 'application/vnd.google-apps.presentation';

const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);

export interface HttpRemoteSourceOptions {
  accessToken: string;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Drive listing page size (default: 100) */
  pageSize?: number;
}

interface DriveFile {
  id: string;
  name?: string;
  mimeType?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDriveFiles(data: unknown): { files: DriveFile[]; nextPageToken?: string } {
  if (!isRecord(data)) return { files: [] };
  const files: DriveFile[] = [];
  for (const f of Array.isArray(data.files) ? data.files : []) {
    if (isRecord(f) && typeof f.id === 'string') {
      files.push({
        id: f.id,
        name: typeof f.name === 'string' ? f.name : undefined,
        mimeType: typeof f.mimeType === 'string' ? f.mimeType : undefined,
      });
    }
  }
  const token = data.nextPageToken;
  return { files, nextPageToken: typeof token === 'string' && token ? token : undefined };
}

function toEntry(file: DriveFile): RemoteEntry {
  return { id: file.id, name: file.name ? sanitizePathSegment(file.name) : undefined };
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function errorReason(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.error)) return undefined;
  const errors = data.error.errors;
  if (!Array.isArray(errors)) return undefined;
  const first: unknown = errors[0];
  return isRecord(first) && typeof first.reason === 'string' ? first.reason : undefined;
}

/**
 * Map a failed request to the remote error taxonomy.
 */
export function toRemoteError(error: unknown, what: string): DeckMediaError {
  if (error instanceof DeckMediaError) {
    return error;
  }
  if (error instanceof AxiosError) {
    if (error.code === AxiosError.ERR_CANCELED) {
      return new CancelledError(`${what}: request aborted`);
    }
    const status = error.response?.status;
    const context = { status, resource: what };
    if (status === undefined) {
      return new TransientError(`${what}: ${error.message}`, undefined, context);
    }
    if (status === 404) {
      return new NotFoundError(`${what} not found`, context);
    }
    if (status === 403 && RATE_LIMIT_REASONS.has(errorReason(error.response?.data) ?? '')) {
      return new TransientError(`${what}: rate limited`, parseRetryAfter(error.response?.headers['retry-after']), context);
    }
    if (status === 401 || status === 403) {
      return new PermissionDeniedError(`${what}: access denied (HTTP ${status})`, context);
    }
    if (status === 408 || status === 429 || status >= 500) {
      return new TransientError(
        `${what}: HTTP ${status}`,
        parseRetryAfter(error.response?.headers['retry-after']),
        context
      );
    }
    return new DeckMediaError(`${what}: HTTP ${status}`, 'UNKNOWN_ERROR', context);
  }
  return new DeckMediaError(
    `${what}: ${error instanceof Error ? error.message : String(error)}`,
    'UNKNOWN_ERROR'
  );
}

export class HttpRemoteSource implements RemoteSource {
  private httpClient: AxiosInstance;
  private readonly pageSize: number;
  private pageSizes = new Map<string, PageSize>();

  constructor(options: HttpRemoteSourceOptions) {
    this.pageSize = options.pageSize ?? 100;
    this.httpClient = axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'User-Agent': 'deckmedia/0.1.0',
        Authorization: `Bearer ${options.accessToken}`,
      },
    });
  }

  // ─── Containers ────────────────────────────────────────────────────────────

  async listContainer(containerId: string, signal?: AbortSignal): Promise<ContainerListing> {
    const scope = `'${containerId.replace(/'/g, "\\'")}' in parents`;
    const files = await this.listFiles(`${scope} and trashed = false`, `Folder ${containerId}`, signal);
    if (containerId === ROOT_CONTAINER) {
      files.push(...await this.listFiles('sharedWithMe = true and trashed = false', 'Shared items', signal));
    }

    const listing: ContainerListing = { presentations: [], containers: [] };
    const seen = new Set<string>();
    for (const file of files) {
      if (seen.has(file.id)) continue;
      seen.add(file.id);
      if (file.mimeType === FOLDER_MIME) {
        listing.containers.push(toEntry(file));
      } else if (file.mimeType === PRESENTATION_MIME) {
        listing.presentations.push(toEntry(file));
      }
    }
    return listing;
  }

  private async listFiles(query: string, what: string, signal?: AbortSignal): Promise<DriveFile[]> {
    const q = `${query} and (mimeType = '${FOLDER_MIME}' or mimeType = '${PRESENTATION_MIME}')`;
    const all: DriveFile[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.httpClient.get(DRIVE_FILES_URL, {
          params: {
            q,
            pageSize: this.pageSize,
            pageToken,
            fields: 'nextPageToken, files(id, name, mimeType)',
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
          },
          signal,
        });
        const page = readDriveFiles(response.data);
        all.push(...page.files);
        pageToken = page.nextPageToken;
      } while (pageToken);
    } catch (error) {
      throw toRemoteError(error, what);
    }

    return all;
  }

  // ─── Presentations ─────────────────────────────────────────────────────────

  async describePresentation(presentationId: string, signal?: AbortSignal): Promise<PresentationDescription> {
    const what = `Presentation ${presentationId}`;
    let data: unknown;
    try {
      const response = await this.httpClient.get(`${SLIDES_URL}/${encodeURIComponent(presentationId)}`, { signal });
      data = response.data;
    } catch (error) {
      throw toRemoteError(error, what);
    }

    if (!isRecord(data)) {
      throw new DeckMediaError(`${what}: unexpected response`, 'UNKNOWN_ERROR');
    }
    this.pageSizes.set(presentationId, pageSizeOf(data));

    const slideIds: string[] = [];
    for (const slide of Array.isArray(data.slides) ? data.slides : []) {
      if (isRecord(slide) && typeof slide.objectId === 'string') {
        slideIds.push(slide.objectId);
      }
    }

    return {
      id: presentationId,
      name: sanitizePathSegment(typeof data.title === 'string' && data.title ? data.title : presentationId),
      slideIds,
      metadata: data,
    };
  }

  async fetchSlideVector(presentationId: string, slideId: string, signal?: AbortSignal): Promise<VectorDocument> {
    const pageSize = await this.getPageSize(presentationId, signal);
    const what = `Slide ${slideId} of ${presentationId}`;

    let page: unknown;
    try {
      const response = await this.httpClient.get(
        `${SLIDES_URL}/${encodeURIComponent(presentationId)}/pages/${encodeURIComponent(slideId)}`,
        { signal }
      );
      page = response.data;
    } catch (error) {
      throw toRemoteError(error, what);
    }

    return normalizeSlidesPage(page, pageSize, (url) => this.fetchImage(url, signal));
  }

  private async getPageSize(presentationId: string, signal?: AbortSignal): Promise<PageSize> {
    const cached = this.pageSizes.get(presentationId);
    if (cached) return cached;

    try {
      const response = await this.httpClient.get(`${SLIDES_URL}/${encodeURIComponent(presentationId)}`, {
        params: { fields: 'pageSize' },
        signal,
      });
      const size = pageSizeOf(response.data);
      this.pageSizes.set(presentationId, size);
      return size;
    } catch (error) {
      throw toRemoteError(error, `Presentation ${presentationId}`);
    }
  }

  private async fetchImage(url: string, signal?: AbortSignal): Promise<FetchedImage> {
    let data: unknown;
    let contentType: string;
    try {
      const response = await this.httpClient.get(url, { responseType: 'arraybuffer', signal });
      data = response.data;
      contentType = String(response.headers['content-type'] ?? '');
    } catch (error) {
      throw toRemoteError(error, 'Slide image');
    }

    if (!(data instanceof ArrayBuffer) && !Buffer.isBuffer(data)) {
      throw new RenderError('Slide image download returned no bytes');
    }
    const bytes = Buffer.isBuffer(data) ? data : Buffer.from(data);

    if (contentType.startsWith('image/png')) return { mimeType: 'image/png', data: bytes };
    if (contentType.startsWith('image/jpeg')) return { mimeType: 'image/jpeg', data: bytes };
    throw new RenderError(`Unsupported slide image type "${contentType}"`, { url });
  }
}
