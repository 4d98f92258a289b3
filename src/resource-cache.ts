/**
 * Resource Cache Store
 *
 * Persistent mapping from content hash to a locally materialized file plus
 * its metadata. Records live in a JSON index next to the cached files:
 *
 * - Keys are the SHA-1 of the file content, computed on insert
 * - The store only grows; existing records are never rewritten
 * - A record whose file disappeared from disk reads as absent
 */

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import type { CacheStore, CacheStoreRecord } from './types.js';

export interface ResourceCacheOptions {
  cacheDir?: string;
  debug?: boolean;
}

export interface IndexedRecord extends CacheStoreRecord {
  hash: string;
  addedAt: number;  // Unix timestamp ms
}

function isStringMap(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(v => typeof v === 'string');
}

function parseIndexRecord(hash: string, raw: unknown): IndexedRecord | null {
  if (typeof raw !== 'object' || raw === null) return null;
  if (!('localPath' in raw) || !('metaData' in raw)) return null;

  const { localPath, metaData } = raw;
  const addedAt = 'addedAt' in raw && typeof raw.addedAt === 'number' ? raw.addedAt : 0;
  if (typeof localPath !== 'string' || !isStringMap(metaData)) return null;

  return { hash, localPath, metaData, addedAt };
}

/**
 * SHA-1 of a file's content, hex encoded
 */
export function hashFile(filePath: string): string {
  return crypto.createHash('sha1').update(fs.readFileSync(filePath)).digest('hex');
}

export class ResourceCache implements CacheStore {
  private cacheDir: string;
  private debug: boolean;
  private records = new Map<string, IndexedRecord>();

  constructor(options: ResourceCacheOptions = {}) {
    // cwd-relative so the cache sits in the project root, not dist/
    this.cacheDir = options.cacheDir || path.join(process.cwd(), '.cache', 'resources');
    this.debug = options.debug || false;

    this._ensureCacheDir();
    this.loadIndex();
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[ResourceCache] ${msg}`);
  }

  private indexPath(): string {
    return path.join(this.cacheDir, 'index.json');
  }

  private _ensureCacheDir(): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true });
    }
  }

  // ============================================================================
  // Index Persistence
  // ============================================================================

  private loadIndex(): void {
    const indexFile = this.indexPath();
    if (!fs.existsSync(indexFile)) return;

    try {
      const data: unknown = JSON.parse(fs.readFileSync(indexFile, 'utf8'));
      if (typeof data !== 'object' || data === null) {
        this.log('Index is not an object, starting empty');
        return;
      }

      for (const [hash, raw] of Object.entries(data)) {
        const record = parseIndexRecord(hash, raw);
        if (record) {
          this.records.set(hash, record);
        } else {
          this.log(`Dropping malformed index record ${hash}`);
        }
      }
      this.log(`Loaded ${this.records.size} records`);
    } catch (err) {
      this.log(`Failed to load index: ${(err as Error).message}`);
    }
  }

  private saveIndex(): void {
    const out: Record<string, Omit<IndexedRecord, 'hash'>> = {};
    for (const record of this.records.values()) {
      out[record.hash] = { localPath: record.localPath, metaData: record.metaData, addedAt: record.addedAt };
    }

    // Temp file then rename, so readers never see a half-written index
    const tmp = `${this.indexPath()}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(out, null, 2));
      fs.renameSync(tmp, this.indexPath());
    } catch (err) {
      this.log(`Failed to save index: ${(err as Error).message}`);
    }
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Directory new cache files are written to, with a trailing separator
   */
  getCachePath(): string {
    return this.cacheDir.endsWith(path.sep) ? this.cacheDir : this.cacheDir + path.sep;
  }

  getEntryFor(hash: string): CacheStoreRecord | null {
    const record = this.records.get(hash);
    if (!record) return null;

    if (!fs.existsSync(record.localPath)) {
      this.log(`Cached file for ${hash} is gone: ${record.localPath}`);
      return null;
    }

    return { localPath: record.localPath, metaData: { ...record.metaData } };
  }

  /**
   * Add a file to the cache. Returns the content hash it is stored under.
   */
  addEntry(localPath: string, metaData: Record<string, string>): string {
    const hash = hashFile(localPath);

    const existing = this.records.get(hash);
    if (existing && fs.existsSync(existing.localPath)) {
      this.log(`Already cached ${hash} at ${existing.localPath}`);
      return hash;
    }

    this.records.set(hash, {
      hash,
      localPath,
      metaData: { ...metaData },
      addedAt: Date.now()
    });
    this.saveIndex();
    this.log(`Added ${hash} -> ${localPath}`);

    return hash;
  }

  listEntries(): IndexedRecord[] {
    return Array.from(this.records.values())
      .map(r => ({ ...r, metaData: { ...r.metaData } }))
      .sort((a, b) => a.addedAt - b.addedAt);
  }

  get size(): number {
    return this.records.size;
  }
}
