/**
 * CacheEntry Resolver
 * Maps a virtual path of the form `{prefix}{resourceName}/{itemPath}` to the
 * manifest entry describing it.
 */

import type { CacheEntry } from './types.js';

/** Entry list of one resource */
export interface ResourceEntryList {
  getEntry(itemName: string): CacheEntry | null;
}

/** Source of per-resource entry lists, e.g. the running resource set */
export interface ResourceLookup {
  getEntryList(resourceName: string): ResourceEntryList | null;
}

export interface SplitPath {
  resourceName: string;
  itemName: string;
}

/**
 * Split a prefix-relative name at its first separator.
 * Returns null when there is no separator or either side is empty.
 */
export function splitResourcePath(relativeName: string): SplitPath | null {
  const slashOffset = relativeName.indexOf('/');
  if (slashOffset <= 0 || slashOffset === relativeName.length - 1) {
    return null;
  }

  return {
    resourceName: relativeName.slice(0, slashOffset),
    itemName: relativeName.slice(slashOffset + 1)
  };
}

export class CacheEntryResolver {
  private lookup: ResourceLookup;
  private pathPrefix: string;

  constructor(lookup: ResourceLookup, pathPrefix = '') {
    this.lookup = lookup;
    this.pathPrefix = pathPrefix;
  }

  getPathPrefix(): string {
    return this.pathPrefix;
  }

  setPathPrefix(pathPrefix: string): void {
    this.pathPrefix = pathPrefix;
  }

  /**
   * Unknown prefixes, resources and entries are all plain misses.
   */
  resolve(fileName: string): CacheEntry | null {
    if (!fileName.startsWith(this.pathPrefix)) {
      return null;
    }

    const split = splitResourcePath(fileName.slice(this.pathPrefix.length));
    if (!split) {
      return null;
    }

    const entryList = this.lookup.getEntryList(split.resourceName);
    if (!entryList) {
      return null;
    }

    return entryList.getEntry(split.itemName);
  }
}
