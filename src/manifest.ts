/**
 * Manifest-backed resource lookup
 *
 * Holds the entry lists of the currently known resources in memory. A
 * manifest file looks like:
 *
 *   {
 *     "resources": {
 *       "props": {
 *         "stream/bench.ydr": { "hash": "…", "url": "https://…", "size": 1234,
 *                               "extData": { "rscVersion": "165" } }
 *       }
 *     }
 *   }
 */

import fs from 'fs';
import type { CacheEntry } from './types.js';
import type { ResourceEntryList, ResourceLookup } from './entry-resolver.js';

export interface ManifestEntry {
  hash: string;
  url: string;
  size: number;
  extData?: Record<string, string>;
}

export interface ManifestLookupOptions {
  debug?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringMap(value: unknown): Record<string, string> | null {
  if (value === undefined) return {};
  if (!isRecord(value)) return null;

  const result: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === 'string') {
      result[key] = v;
    } else if (typeof v === 'number') {
      result[key] = String(v);
    } else {
      return null;
    }
  }
  return result;
}

/**
 * Validate one raw manifest entry. Returns the reason on failure.
 */
export function parseManifestEntry(raw: unknown): ManifestEntry | string {
  if (!isRecord(raw)) return 'entry is not an object';

  const { hash, url, size } = raw;
  if (typeof hash !== 'string' || hash.length === 0) return 'missing hash';
  if (typeof url !== 'string' || url.length === 0) return 'missing url';
  if (typeof size !== 'number' || !Number.isFinite(size) || size < 0) return 'invalid size';

  const extData = toStringMap(raw.extData);
  if (!extData) return 'extData must map names to strings';

  return { hash, url, size, extData };
}

class MapEntryList implements ResourceEntryList {
  private entries: Map<string, CacheEntry>;

  constructor(entries: Map<string, CacheEntry>) {
    this.entries = entries;
  }

  getEntry(itemName: string): CacheEntry | null {
    return this.entries.get(itemName) ?? null;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class ManifestResourceLookup implements ResourceLookup {
  private resources = new Map<string, MapEntryList>();
  private debug: boolean;

  constructor(options: ManifestLookupOptions = {}) {
    this.debug = options.debug || false;
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[Manifest] ${msg}`);
  }

  static fromFile(manifestPath: string, options: ManifestLookupOptions = {}): ManifestResourceLookup {
    const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
    const lookup = new ManifestResourceLookup(options);
    lookup.load(raw);
    return lookup;
  }

  /**
   * Load every resource of a parsed manifest document.
   * Malformed entries are skipped, the rest of the resource still loads.
   */
  load(document: unknown): void {
    if (!isRecord(document) || !isRecord(document.resources)) {
      throw new Error('Manifest must contain a "resources" object');
    }

    for (const [resourceName, rawEntries] of Object.entries(document.resources)) {
      if (!isRecord(rawEntries)) {
        this.log(`Skipping resource ${resourceName}: entries must be an object`);
        continue;
      }

      const entries: Record<string, ManifestEntry> = {};
      for (const [itemName, rawEntry] of Object.entries(rawEntries)) {
        const parsed = parseManifestEntry(rawEntry);
        if (typeof parsed === 'string') {
          this.log(`Skipping ${resourceName}/${itemName}: ${parsed}`);
          continue;
        }
        entries[itemName] = parsed;
      }

      this.addResource(resourceName, entries);
    }
  }

  addResource(resourceName: string, entries: Record<string, ManifestEntry>): void {
    const map = new Map<string, CacheEntry>();
    for (const [itemName, entry] of Object.entries(entries)) {
      map.set(itemName, {
        referenceHash: entry.hash,
        basename: itemName,
        resourceName,
        remoteUrl: entry.url,
        size: entry.size,
        extData: { ...(entry.extData ?? {}) }
      });
    }

    this.resources.set(resourceName, new MapEntryList(map));
    this.log(`Loaded ${resourceName} (${map.size} entries)`);
  }

  removeResource(resourceName: string): boolean {
    return this.resources.delete(resourceName);
  }

  getEntryList(resourceName: string): ResourceEntryList | null {
    return this.resources.get(resourceName) ?? null;
  }

  listResources(): string[] {
    return Array.from(this.resources.keys()).sort();
  }
}
