/**
 * Download Execution
 *
 * Starts the transport download for a handle that just moved to 'fetching'
 * and owns the completion handler that publishes the result into the cache
 * store and the handle.
 */

import { INVALID_HANDLE, LENGTH_UNKNOWN } from './types.js';
import type {
  CacheEntry,
  CacheStore,
  DeviceHandle,
  DownloadOptions,
  DownloadRequest,
  DownloadResult,
  FileDownloader,
  LogCallback
} from './types.js';
import type { FetchSignal, HandleData } from './handle-table.js';
import type { VirtualFileSystem } from './vfs.js';
import type { DownloadStatusEvents } from './download-status.js';
import { SessionKeys, type SessionContext } from './session-context.js';

// ============================================================================
// Pure Helpers
// ============================================================================

export const RequestWeight = {
  WORLD_DATA: 255,   // collisions, map placements, archetypes
  MODEL: 128,
  TEXTURE: 64,
  DEFAULT: 32,
  HIGH_DETAIL: 16
} as const;

const WEIGHT_BY_EXTENSION: Record<string, number> = {
  '.ybn': RequestWeight.WORLD_DATA,
  '.ymap': RequestWeight.WORLD_DATA,
  '.ytyp': RequestWeight.WORLD_DATA,
  '.ydd': RequestWeight.MODEL,
  '.ydr': RequestWeight.MODEL,
  '.ytd': RequestWeight.TEXTURE,
  '.rpf': RequestWeight.TEXTURE,
  '.gfx': RequestWeight.TEXTURE
};

/**
 * Transport weight for a file. Extension tiers win over the high-detail
 * suffix check.
 */
export function getWeightForFileName(fileName: string): number {
  const dot = fileName.lastIndexOf('.');
  const ext = dot === -1 ? '' : fileName.slice(dot);

  const byExtension = WEIGHT_BY_EXTENSION[ext];
  if (byExtension !== undefined) {
    return byExtension;
  }

  if (fileName.includes('+hi') || fileName.includes('_hi')) {
    return RequestWeight.HIGH_DETAIL;
  }

  return RequestWeight.DEFAULT;
}

/**
 * `{cachePath}{extension}_{referenceHash}`; a basename without a dot uses
 * the whole basename as its extension.
 */
export function getCacheFileName(cachePath: string, entry: CacheEntry): string {
  const extension = entry.basename.slice(entry.basename.lastIndexOf('.') + 1);
  return `${cachePath}${extension}_${entry.referenceHash}`;
}

// ============================================================================
// Executor
// ============================================================================

export const DEFAULT_AUTH_HEADER = 'X-Connection-Token';

export interface DownloadExecutorOptions {
  cache: CacheStore;
  vfs: VirtualFileSystem;
  downloader: FileDownloader;
  session: SessionContext;
  statusEvents: DownloadStatusEvents;
  downloadedSet: Set<string>;
  cachePath: string;
  getPathPrefix: () => string;
  authHeader?: string;
  logCallback?: LogCallback | null;
  debug?: boolean;
}

interface PendingFetch {
  data: HandleData;
  generation: number;
  signal: FetchSignal | null;
  entry: CacheEntry;
  outFileName: string;
  startedAt: number;
}

export class DownloadExecutor {
  private cache: CacheStore;
  private vfs: VirtualFileSystem;
  private downloader: FileDownloader;
  private session: SessionContext;
  private statusEvents: DownloadStatusEvents;
  private downloadedSet: Set<string>;
  private cachePath: string;
  private getPathPrefix: () => string;
  private authHeader: string;
  private logCallback: LogCallback | null;
  private debug: boolean;

  constructor(options: DownloadExecutorOptions) {
    this.cache = options.cache;
    this.vfs = options.vfs;
    this.downloader = options.downloader;
    this.session = options.session;
    this.statusEvents = options.statusEvents;
    this.downloadedSet = options.downloadedSet;
    this.cachePath = options.cachePath;
    this.getPathPrefix = options.getPathPrefix;
    this.authHeader = options.authHeader || DEFAULT_AUTH_HEADER;
    this.logCallback = options.logCallback || null;
    this.debug = options.debug || false;
  }

  private log(message: string): void {
    if (this.debug) {
      console.error(`[DownloadExecutor] ${message}`);
    }
  }

  /**
   * Without a log callback, warnings and errors still reach stderr.
   */
  private report(type: string, message: string): void {
    if (this.logCallback) {
      this.logCallback(type, message);
      this.log(message);
    } else if (type === 'warn' || type === 'error') {
      console.error(`[DownloadExecutor] ${message}`);
    } else {
      this.log(message);
    }
  }

  /**
   * Kick off the download for a handle already marked 'fetching'.
   * Returns as soon as the transport has the request.
   */
  start(data: HandleData): void {
    const entry = data.entry;
    if (!entry) {
      data.status = 'error';
      data.completion?.resolve();
      return;
    }

    const pending: PendingFetch = {
      data,
      generation: data.generation,
      signal: data.completion,
      entry,
      outFileName: getCacheFileName(this.cachePath, entry),
      startedAt: Date.now()
    };

    const virtualPath = `${this.getPathPrefix()}${entry.resourceName}/${entry.basename}`;

    this.report('download', `downloading ${entry.basename} (hash ${entry.referenceHash}) from ${entry.remoteUrl}`);

    const headers: Record<string, string> = {};
    const connectionToken = this.session.getData(SessionKeys.CONNECTION_TOKEN);
    if (connectionToken) {
      headers[this.authHeader] = connectionToken;
    }

    const options: DownloadOptions = {
      headers,
      weight: getWeightForFileName(entry.basename),
      onProgress: (info) => {
        if (data.generation === pending.generation) {
          data.downloadProgress = info.downloadNow;
          data.downloadSize = info.downloadTotal;
        }

        if (info.downloadTotal !== 0) {
          try {
            this.statusEvents.emit(virtualPath, info.downloadNow, info.downloadTotal);
          } catch (err) {
            this.report('warn', `Download status listener failed for ${virtualPath}: ${(err as Error).message}`);
          }
        }
      }
    };

    let request: DownloadRequest;
    try {
      request = this.downloader.downloadFile(
        entry.remoteUrl,
        pending.outFileName,
        options,
        (result) => this.complete(pending, result)
      );
    } catch (err) {
      this.reportFailure(pending, `could not start download: ${(err as Error).message}`, LENGTH_UNKNOWN);
      if (data.generation === pending.generation && data.status === 'fetching') {
        data.status = 'error';
        data.getRequest = null;
      }
      pending.signal?.resolve();
      return;
    }

    // A transport may complete synchronously; only keep the request while it runs
    if (data.generation === pending.generation && data.status === 'fetching') {
      data.getRequest = request;
    }
  }

  private complete(pending: PendingFetch, result: DownloadResult): void {
    const { data, entry, outFileName } = pending;
    const live = data.generation === pending.generation && data.status === 'fetching';

    let outSize = result.size;
    if (result.ok) {
      const device = this.vfs.getDevice(outFileName);
      outSize = device ? device.getFileLength(outFileName) : LENGTH_UNKNOWN;
    }

    if (!result.ok || outSize <= 0) {
      this.reportFailure(pending, result.error, result.ok ? outSize : LENGTH_UNKNOWN);
      if (live) {
        data.status = 'error';
        data.getRequest = null;
      }
    } else {
      this.report('downloaded', `downloaded ${entry.basename} in ${Date.now() - pending.startedAt} msec (size ${outSize})`);

      if (this.downloadedSet.has(entry.referenceHash)) {
        this.report('warn', `Downloaded the same asset (${entry.basename}) twice in the same run`);
      }
      this.downloadedSet.add(entry.referenceHash);

      const metaData: Record<string, string> = {
        filename: entry.basename,
        resource: entry.resourceName,
        from: entry.remoteUrl
      };

      try {
        this.cache.addEntry(outFileName, metaData);
      } catch (err) {
        this.report('warn', `Failed to add ${entry.basename} to the cache: ${(err as Error).message}`);
      }

      if (live) {
        this.openDownloaded(pending, metaData);
      } else {
        this.log(`${entry.basename} finished after its handle was closed`);
      }
    }

    // Wake every waiter only once the handle is final
    pending.signal?.resolve();
  }

  private openDownloaded(pending: PendingFetch, metaData: Record<string, string>): void {
    const { data, outFileName } = pending;
    const device = this.vfs.getDevice(outFileName);

    let handle: DeviceHandle = INVALID_HANDLE;
    let bulkBase = 0;
    if (device) {
      if (data.bulkHandle) {
        const opened = device.openBulk(outFileName);
        handle = opened.handle;
        bulkBase = opened.bulkBase;
      } else {
        handle = device.open(outFileName, true);
      }
    }

    if (!device || handle === INVALID_HANDLE) {
      this.reportFailure(pending, `could not open downloaded file ${outFileName}`, LENGTH_UNKNOWN);
      data.status = 'error';
      data.getRequest = null;
      return;
    }

    data.parentDevice = device;
    data.parentHandle = handle;
    data.bulkBase = bulkBase;
    data.metaData = metaData;
    data.getRequest = null;
    data.status = 'fetched';
  }

  private reportFailure(pending: PendingFetch, errorData: string | null, outSize: number): void {
    const { entry } = pending;
    let reason = '';

    const caller = this.session.getData(SessionKeys.LOAD_CALLER);
    if (caller) {
      const rawStart = this.session.getData(SessionKeys.LOAD_START_TIME);
      const loadStart = rawStart === null ? NaN : Number(rawStart);
      const loadTime = Number.isFinite(loadStart) ? Date.now() - loadStart : 0;
      reason = `\nThis happened during a load requested by ${caller}, which by now took ${loadTime} msec.`;
    }

    if (outSize === 0) {
      reason += '\nThe file was empty.';
    }

    const elapsed = Date.now() - pending.startedAt;
    const message = `Failed to fetch ${entry.basename} from ${entry.remoteUrl} after ${elapsed} msec: ${errorData ?? 'no error reported'}${reason}`;

    this.report('error', message);
    this.session.setData(SessionKeys.FETCH_ERROR, message);
  }
}
