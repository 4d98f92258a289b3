/**
 * Registers the resource cache devices on a virtual filesystem
 */

import type { CacheStore, FileDownloader, LogCallback } from './types.js';
import type { ResourceLookup } from './entry-resolver.js';
import type { VirtualFileSystem } from './vfs.js';
import { SessionContext } from './session-context.js';
import { getSharedDownloadStatus, getSharedDownloadedSet, type DownloadStatusEvents } from './download-status.js';
import { ResourceCacheDevice } from './resource-cache-device.js';

export const BLOCKING_MOUNT = 'cache:/';
export const NON_BLOCKING_MOUNT = 'cache_nb:/';

export interface MountOptions {
  lookup: ResourceLookup;
  downloader: FileDownloader;
  session?: SessionContext;
  statusEvents?: DownloadStatusEvents;
  downloadedSet?: Set<string>;
  handleCapacity?: number;
  authHeader?: string;
  logCallback?: LogCallback | null;
  debug?: boolean;
}

export interface MountedDevices {
  blocking: ResourceCacheDevice;
  nonBlocking: ResourceCacheDevice;
}

/**
 * Mount a blocking device at `cache:/` and a non-blocking one at
 * `cache_nb:/`. Both share the cache store, transport, session and status
 * emitter; each resolves names relative to its own mount point.
 */
export function mountResourceCacheDevice(
  vfs: VirtualFileSystem,
  cache: CacheStore,
  options: MountOptions
): MountedDevices {
  const shared = {
    cache,
    vfs,
    lookup: options.lookup,
    downloader: options.downloader,
    session: options.session ?? new SessionContext(),
    statusEvents: options.statusEvents ?? getSharedDownloadStatus(),
    downloadedSet: options.downloadedSet ?? getSharedDownloadedSet(),
    handleCapacity: options.handleCapacity,
    authHeader: options.authHeader,
    logCallback: options.logCallback,
    debug: options.debug
  };

  const blocking = new ResourceCacheDevice({ ...shared, blocking: true, pathPrefix: BLOCKING_MOUNT });
  vfs.mount(blocking, BLOCKING_MOUNT);

  const nonBlocking = new ResourceCacheDevice({ ...shared, blocking: false, pathPrefix: NON_BLOCKING_MOUNT });
  vfs.mount(nonBlocking, NON_BLOCKING_MOUNT);

  return { blocking, nonBlocking };
}
