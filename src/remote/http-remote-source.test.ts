/**
 * HttpRemoteSource tests
 *
 * axios.create is mocked; AxiosError stays real so error mapping is exercised
 * against the same class the client checks for.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance } from 'axios';
import {
  CancelledError,
  DeckMediaError,
  NotFoundError,
  PermissionDeniedError,
  RenderError,
  TransientError,
} from '../errors/index.js';
import { HttpRemoteSource, toRemoteError } from './http-remote-source.js';

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, create: vi.fn() } };
});

const FOLDER_MIME = 'application/vnd.google-apps.folder';
const PRESENTATION_MIME = 'application/vnd.google-apps.presentation';
const PAGE_SIZE = {
  width: { magnitude: 9144000, unit: 'EMU' },
  height: { magnitude: 5143500, unit: 'EMU' },
};

function httpError(status: number, data: unknown = {}, headers: Record<string, string> = {}): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, {
    status,
    statusText: '',
    data,
    headers,
    config: { headers: new AxiosHeaders() },
  });
}

describe('HttpRemoteSource', () => {
  let mockHttpClient: { get: ReturnType<typeof vi.fn> };
  let remote: HttpRemoteSource;

  beforeEach(() => {
    mockHttpClient = { get: vi.fn() };
    vi.mocked(axios.create).mockReturnValue(mockHttpClient as unknown as AxiosInstance);
    remote = new HttpRemoteSource({ accessToken: 'test-token' });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('sends the bearer token on every request', () => {
    expect(axios.create).toHaveBeenCalledWith({
      timeout: 30000,
      headers: { 'User-Agent': 'deckmedia/0.1.0', Authorization: 'Bearer test-token' },
    });
  });

  describe('listContainer', () => {
    it('splits folders from presentations and sanitizes names', async () => {
      mockHttpClient.get.mockResolvedValueOnce({
        data: {
          files: [
            { id: 'f1', name: 'Sub Folder', mimeType: FOLDER_MIME },
            { id: 'p1', name: 'Deck', mimeType: PRESENTATION_MIME },
            { id: 'p1', name: 'Deck', mimeType: PRESENTATION_MIME },
            { id: 'd1', name: 'Notes', mimeType: 'application/vnd.google-apps.document' },
          ],
        },
      });

      const listing = await remote.listContainer('F1');

      expect(listing).toEqual({
        containers: [{ id: 'f1', name: 'Sub-Folder' }],
        presentations: [{ id: 'p1', name: 'Deck' }],
      });
      expect(mockHttpClient.get).toHaveBeenCalledWith('https://www.googleapis.com/drive/v3/files', {
        params: expect.objectContaining({
          q: `'F1' in parents and trashed = false and (mimeType = '${FOLDER_MIME}' or mimeType = '${PRESENTATION_MIME}')`,
          pageSize: 100,
          pageToken: undefined,
        }),
        signal: undefined,
      });
    });

    it('follows nextPageToken until exhausted', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { files: [{ id: 'p1', mimeType: PRESENTATION_MIME }], nextPageToken: 't2' } })
        .mockResolvedValueOnce({ data: { files: [{ id: 'p2', mimeType: PRESENTATION_MIME }] } });

      const listing = await remote.listContainer('F1');

      expect(listing.presentations).toEqual([{ id: 'p1', name: undefined }, { id: 'p2', name: undefined }]);
      expect(mockHttpClient.get).toHaveBeenCalledTimes(2);
      expect(mockHttpClient.get.mock.calls[1][1].params.pageToken).toBe('t2');
    });

    it('adds shared items when listing the root', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { files: [{ id: 'p1', mimeType: PRESENTATION_MIME }] } })
        .mockResolvedValueOnce({ data: { files: [{ id: 'p9', mimeType: PRESENTATION_MIME }] } });

      const listing = await remote.listContainer('root');

      expect(listing.presentations.map((p) => p.id)).toEqual(['p1', 'p9']);
      expect(mockHttpClient.get.mock.calls[1][1].params.q).toMatch(/^sharedWithMe = true and trashed = false/);
    });

    it('maps a 404 to NotFoundError', async () => {
      mockHttpClient.get.mockRejectedValueOnce(httpError(404));
      await expect(remote.listContainer('gone')).rejects.toThrow(NotFoundError);
    });
  });

  describe('describePresentation', () => {
    it('returns slide IDs in order with a sanitized title', async () => {
      const data = { title: 'Q3 Review', pageSize: PAGE_SIZE, slides: [{ objectId: 's1' }, { objectId: 's2' }] };
      mockHttpClient.get.mockResolvedValueOnce({ data });

      const description = await remote.describePresentation('P1');

      expect(description).toEqual({ id: 'P1', name: 'Q3-Review', slideIds: ['s1', 's2'], metadata: data });
      expect(mockHttpClient.get).toHaveBeenCalledWith('https://slides.googleapis.com/v1/presentations/P1', { signal: undefined });
    });

    it('falls back to the ID when the title is empty', async () => {
      mockHttpClient.get.mockResolvedValueOnce({ data: { title: '', slides: [] } });
      const description = await remote.describePresentation('P2');
      expect(description.name).toBe('P2');
    });
  });

  describe('fetchSlideVector', () => {
    it('reuses the page size learned from describePresentation', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { title: 'Deck', pageSize: PAGE_SIZE, slides: [{ objectId: 's1' }] } })
        .mockResolvedValueOnce({ data: { pageElements: [] } });

      await remote.describePresentation('P1');
      const doc = await remote.fetchSlideVector('P1', 's1');

      expect(doc).toEqual({ width: 720, height: 405, elements: [] });
      expect(mockHttpClient.get).toHaveBeenCalledTimes(2);
      expect(mockHttpClient.get.mock.calls[1][0]).toBe('https://slides.googleapis.com/v1/presentations/P1/pages/s1');
    });

    it('fetches only the page size when the presentation was not described', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { pageSize: PAGE_SIZE } })
        .mockResolvedValueOnce({ data: { pageElements: [] } });

      await remote.fetchSlideVector('P1', 's1');

      expect(mockHttpClient.get.mock.calls[0][1]).toEqual({ params: { fields: 'pageSize' }, signal: undefined });
    });

    it('rejects images that are neither PNG nor JPEG', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { pageSize: PAGE_SIZE } })
        .mockResolvedValueOnce({
          data: {
            pageElements: [{
              size: { width: { magnitude: 10, unit: 'PT' }, height: { magnitude: 10, unit: 'PT' } },
              transform: { unit: 'PT' },
              image: { contentUrl: 'https://images.example.test/a.gif' },
            }],
          },
        })
        .mockResolvedValueOnce({ data: Buffer.from('GIF89a'), headers: { 'content-type': 'image/gif' } });

      await expect(remote.fetchSlideVector('P1', 's1')).rejects.toThrow('Unsupported slide image type "image/gif"');
    });

    it('inlines PNG images', async () => {
      mockHttpClient.get
        .mockResolvedValueOnce({ data: { pageSize: PAGE_SIZE } })
        .mockResolvedValueOnce({
          data: {
            pageElements: [{
              size: { width: { magnitude: 10, unit: 'PT' }, height: { magnitude: 10, unit: 'PT' } },
              transform: { unit: 'PT' },
              image: { contentUrl: 'https://images.example.test/a.png' },
            }],
          },
        })
        .mockResolvedValueOnce({ data: Buffer.from('img'), headers: { 'content-type': 'image/png' } });

      const doc = await remote.fetchSlideVector('P1', 's1');

      expect(doc.elements).toEqual([
        { kind: 'image', x: 0, y: 0, width: 10, height: 10, mimeType: 'image/png', data: 'aW1n' },
      ]);
    });
  });
});

describe('toRemoteError', () => {
  it('passes typed errors through', () => {
    const err = new RenderError('bad');
    expect(toRemoteError(err, 'x')).toBe(err);
  });

  it('maps a cancelled request', () => {
    expect(toRemoteError(new AxiosError('canceled', AxiosError.ERR_CANCELED), 'Slide s1')).toBeInstanceOf(CancelledError);
  });

  it('treats a network failure as transient', () => {
    const mapped = toRemoteError(new AxiosError('socket hang up', 'ECONNRESET'), 'Folder F1');
    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped.message).toBe('Folder F1: socket hang up');
  });

  it('maps 401 and 403 to PermissionDeniedError', () => {
    expect(toRemoteError(httpError(401), 'P')).toBeInstanceOf(PermissionDeniedError);
    expect(toRemoteError(httpError(403), 'P').message).toBe('P: access denied (HTTP 403)');
  });

  it('treats a rate-limited 403 as transient with its retry-after', () => {
    const mapped = toRemoteError(
      httpError(403, { error: { errors: [{ reason: 'userRateLimitExceeded' }] } }, { 'retry-after': '2' }),
      'P'
    );
    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped instanceof TransientError ? mapped.retryAfterMs : undefined).toBe(2000);
  });

  it('treats 429 and 5xx as transient', () => {
    expect(toRemoteError(httpError(429), 'P')).toBeInstanceOf(TransientError);
    expect(toRemoteError(httpError(503), 'P')).toBeInstanceOf(TransientError);
  });

  it('maps other statuses to an unknown error', () => {
    const mapped = toRemoteError(httpError(400), 'P');
    expect(mapped).toBeInstanceOf(DeckMediaError);
    expect(mapped.code).toBe('UNKNOWN_ERROR');
    expect(mapped.message).toBe('P: HTTP 400');
  });
});
