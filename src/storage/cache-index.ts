/**
 * Export cache index
 *
 * Maps a format key to the artifacts it produced. The index only records
 * what was written; artifact verification (existence + checksum) is done by
 * the exporter on lookup.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { StorageError } from '../errors/index.js';
import { isExportFormat } from '../model/types.js';
import type { ExportFormat } from '../model/types.js';

export interface CachedArtifact {
  path: string;
  checksum: string;
  sizeBytes: number;
  writtenAt: string;   // ISO string
  slideIndex?: number;
}

export interface CacheEntry {
  key: string;
  presentationId: string;
  format: ExportFormat;
  artifacts: CachedArtifact[];
  createdAt: string;   // ISO string
}

export interface CacheIndexStore {
  get(key: string): CacheEntry | undefined;
  /** Insert or overwrite; last writer wins. */
  put(entry: CacheEntry): void;
  invalidate(key: string): void;
  list(): CacheEntry[];
  /** Remove every entry; returns how many were removed. */
  clear(): number;
  close(): void;
}

// ─── In-memory ────────────────────────────────────────────────────────────────

export class MemoryCacheIndex implements CacheIndexStore {
  private entries = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? cloneEntry(entry) : undefined;
  }

  put(entry: CacheEntry): void {
    this.entries.set(entry.key, cloneEntry(entry));
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  list(): CacheEntry[] {
    return [...this.entries.values()].map(cloneEntry);
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  close(): void {
    // nothing to release
  }
}

function cloneEntry(entry: CacheEntry): CacheEntry {
  return { ...entry, artifacts: entry.artifacts.map((a) => ({ ...a })) };
}

// ─── SQLite ───────────────────────────────────────────────────────────────────

interface CacheRow {
  key: string;
  presentation_id: string;
  format: string;
  artifacts: string;
  created_at: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArtifacts(json: string): CachedArtifact[] | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (!Array.isArray(raw)) return undefined;

  const artifacts: CachedArtifact[] = [];
  for (const item of raw) {
    if (
      !isRecord(item)
      || typeof item.path !== 'string'
      || typeof item.checksum !== 'string'
      || typeof item.sizeBytes !== 'number'
      || typeof item.writtenAt !== 'string'
    ) {
      return undefined;
    }
    artifacts.push({
      path: item.path,
      checksum: item.checksum,
      sizeBytes: item.sizeBytes,
      writtenAt: item.writtenAt,
      slideIndex: typeof item.slideIndex === 'number' ? item.slideIndex : undefined,
    });
  }
  return artifacts;
}

export class SqliteCacheIndex implements CacheIndexStore {
  private db: Database.Database;

  /**
   * @param dbPath  File path, or ':memory:' for a throwaway index
   */
  constructor(dbPath: string) {
    try {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.migrate();
    } catch (err) {
      throw new StorageError(
        `Cannot open cache index at ${dbPath}: ${err instanceof Error ? err.message : String(err)}`,
        { dbPath }
      );
    }
  }

  // ─── Migration ──────────────────────────────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        presentation_id TEXT NOT NULL,
        format TEXT NOT NULL,
        artifacts TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_cache_entries_presentation_id
        ON cache_entries(presentation_id);
    `);
  }

  // ─── Entry operations ───────────────────────────────────────────────────────

  get(key: string): CacheEntry | undefined {
    const row = this.db
      .prepare<[string], CacheRow>('SELECT * FROM cache_entries WHERE key = ?')
      .get(key);
    if (!row) return undefined;

    const entry = this.rowToEntry(row);
    if (!entry) {
      // Unreadable row: drop it so the next export rewrites it.
      this.invalidate(key);
    }
    return entry;
  }

  put(entry: CacheEntry): void {
    this.db.prepare(`
      INSERT INTO cache_entries (key, presentation_id, format, artifacts, created_at)
      VALUES (@key, @presentationId, @format, @artifacts, @createdAt)
      ON CONFLICT(key) DO UPDATE SET
        presentation_id = excluded.presentation_id,
        format          = excluded.format,
        artifacts       = excluded.artifacts,
        created_at      = excluded.created_at
    `).run({
      key: entry.key,
      presentationId: entry.presentationId,
      format: entry.format,
      artifacts: JSON.stringify(entry.artifacts),
      createdAt: entry.createdAt,
    });
  }

  invalidate(key: string): void {
    this.db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key);
  }

  list(): CacheEntry[] {
    const rows = this.db
      .prepare<[], CacheRow>('SELECT * FROM cache_entries ORDER BY created_at DESC, key')
      .all();
    const entries: CacheEntry[] = [];
    for (const row of rows) {
      const entry = this.rowToEntry(row);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  clear(): number {
    return this.db.prepare('DELETE FROM cache_entries').run().changes;
  }

  close(): void {
    this.db.close();
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private rowToEntry(row: CacheRow): CacheEntry | undefined {
    const artifacts = parseArtifacts(row.artifacts);
    if (!artifacts || !isExportFormat(row.format)) return undefined;
    return {
      key: row.key,
      presentationId: row.presentation_id,
      format: row.format,
      artifacts,
      createdAt: row.created_at,
    };
  }
}
