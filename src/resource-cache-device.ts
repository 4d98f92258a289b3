/**
 * ResourceCacheDevice - read-only device serving manifest-described resource
 * files out of the local cache, downloading them on first access.
 *
 * Key behaviors:
 * - Open never touches the network; a cache hit opens the local copy at once
 * - The first read of a missing file starts its download
 * - Blocking devices make reads wait for the download, non-blocking devices
 *   return 0 bytes until it is done and the caller polls
 * - Fetch failures are terminal for the handle and surface as READ_FAILED
 */

import {
  INVALID_FILE_ATTRIBUTES,
  INVALID_HANDLE,
  LENGTH_UNKNOWN,
  READ_FAILED,
  SEEK_FAILED
} from './types.js';
import type {
  BulkOpenResult,
  CacheEntry,
  CacheStore,
  Device,
  DeviceHandle,
  ExtensionRequest,
  ExtensionResult,
  FileDownloader,
  FindData,
  FindResult,
  LogCallback,
  SeekOrigin
} from './types.js';
import { HandleTable, type HandleData, type HandleStatus } from './handle-table.js';
import { CacheEntryResolver, type ResourceLookup } from './entry-resolver.js';
import { FetchOrchestrator } from './fetch-orchestrator.js';
import { DownloadExecutor } from './download-executor.js';
import { SessionContext } from './session-context.js';
import {
  getSharedDownloadStatus,
  getSharedDownloadedSet,
  type DownloadStatusEvents
} from './download-status.js';
import type { VirtualFileSystem } from './vfs.js';

/** Control code returning format version and page flags from entry metadata */
export const GET_PAGE_FLAGS_CONTROL = 0x20001;

/**
 * Legacy bulk-read sizes that are priority requests rather than reads.
 * New callers use setDownloadPriority.
 */
export const BULK_ACTIVE_SENTINEL = 0xFFFFFFFE;
export const BULK_INACTIVE_SENTINEL = 0xFFFFFFFD;

/** Answer to a priority request once the file is fetched */
export const PRIORITY_ACK_SIZE = 2048;

/** Above every static weight tier */
export const ACTIVE_REQUEST_WEIGHT = 1024;
/** Below every static weight tier */
export const INACTIVE_REQUEST_WEIGHT = 1;

export type DownloadPriority = 'active' | 'inactive';

export interface ResourceCacheDeviceOptions {
  cache: CacheStore;
  lookup: ResourceLookup;
  vfs: VirtualFileSystem;
  downloader: FileDownloader;
  blocking: boolean;
  /** Defaults to the cache store's own path */
  cachePath?: string;
  pathPrefix?: string;
  session?: SessionContext;
  statusEvents?: DownloadStatusEvents;
  downloadedSet?: Set<string>;
  handleCapacity?: number;
  onHandlesExhausted?: (capacity: number) => never;
  authHeader?: string;
  logCallback?: LogCallback | null;
  debug?: boolean;
}

export interface HandleInfo {
  status: HandleStatus;
  bulk: boolean;
  referenceHash: string | null;
  declaredSize: number;
  downloadProgress: number;
  downloadSize: number;
  downloadWeight: number | null;
  metaData: Record<string, string>;
}

type Gate = 'ready' | 'pending' | 'failed';

function parseLeadingInt(value: string | undefined): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export class ResourceCacheDevice implements Device {
  private cache: CacheStore;
  private vfs: VirtualFileSystem;
  private resolver: CacheEntryResolver;
  private handles: HandleTable;
  private orchestrator: FetchOrchestrator;
  private downloadedSet: Set<string>;
  private logCallback: LogCallback | null;
  private debug: boolean;
  readonly blocking: boolean;

  constructor(options: ResourceCacheDeviceOptions) {
    this.cache = options.cache;
    this.vfs = options.vfs;
    this.blocking = options.blocking;
    this.debug = options.debug || false;
    this.logCallback = options.logCallback || null;
    this.downloadedSet = options.downloadedSet ?? getSharedDownloadedSet();
    this.resolver = new CacheEntryResolver(options.lookup, options.pathPrefix ?? '');
    this.handles = new HandleTable(options.handleCapacity, options.onHandlesExhausted);

    const executor = new DownloadExecutor({
      cache: options.cache,
      vfs: options.vfs,
      downloader: options.downloader,
      session: options.session ?? new SessionContext(),
      statusEvents: options.statusEvents ?? getSharedDownloadStatus(),
      downloadedSet: this.downloadedSet,
      cachePath: options.cachePath ?? options.cache.getCachePath(),
      getPathPrefix: () => this.resolver.getPathPrefix(),
      authHeader: options.authHeader,
      logCallback: this.logCallback,
      debug: this.debug
    });
    this.orchestrator = new FetchOrchestrator(executor, options.blocking);
  }

  private log(message: string): void {
    if (this.debug) {
      console.error(`[ResourceCacheDevice${this.blocking ? '' : ' nb'}] ${message}`);
    }
  }

  private warn(message: string): void {
    if (this.logCallback) {
      this.logCallback('warn', message);
    } else {
      console.error(`[ResourceCacheDevice] ${message}`);
    }
  }

  setPathPrefix(pathPrefix: string): void {
    this.resolver.setPathPrefix(pathPrefix);
  }

  getPathPrefix(): string {
    return this.resolver.getPathPrefix();
  }

  resolveEntry(fileName: string): CacheEntry | null {
    return this.resolver.resolve(fileName);
  }

  // ============================================================================
  // Open
  // ============================================================================

  private openInternal(fileName: string, bulk: boolean): DeviceHandle {
    const entry = this.resolver.resolve(fileName);
    if (!entry) {
      return INVALID_HANDLE;
    }

    const { handle, data } = this.handles.allocate();
    data.bulkHandle = bulk;
    data.entry = { ...entry, extData: { ...entry.extData } };
    data.status = 'not-fetched';

    // Cache hit: serve the local copy without going near the network
    const cached = this.cache.getEntryFor(entry.referenceHash);
    if (cached) {
      const device = this.vfs.getDevice(cached.localPath);
      if (device) {
        let parentHandle: DeviceHandle;
        let bulkBase = 0;
        if (bulk) {
          const opened = device.openBulk(cached.localPath);
          parentHandle = opened.handle;
          bulkBase = opened.bulkBase;
        } else {
          parentHandle = device.open(cached.localPath, true);
        }

        if (parentHandle !== INVALID_HANDLE) {
          data.parentDevice = device;
          data.parentHandle = parentHandle;
          data.bulkBase = bulkBase;
          data.metaData = { ...cached.metaData };
          data.status = 'fetched';
          this.log(`cache hit for ${entry.basename} (${cached.localPath})`);
          return handle;
        }
      }
    }

    if (this.downloadedSet.has(entry.referenceHash)) {
      this.warn(`We fetched ${entry.basename} already, and it isn't in the cache now`);
    }

    return handle;
  }

  /**
   * Read-only device: any write-mode open fails.
   */
  open(fileName: string, readOnly: boolean): DeviceHandle {
    if (!readOnly) {
      return INVALID_HANDLE;
    }
    return this.openInternal(fileName, false);
  }

  openBulk(fileName: string): BulkOpenResult {
    return { handle: this.openInternal(fileName, true), bulkBase: 0 };
  }

  // ============================================================================
  // Reads
  // ============================================================================

  /**
   * Where a handle stands after ensureFetched. A handle closed (and possibly
   * reused) while the caller waited counts as failed.
   */
  private gate(data: HandleData, generation: number): Gate {
    if (data.generation !== generation) return 'failed';

    switch (data.status) {
      case 'fetched':
        return data.parentDevice ? 'ready' : 'failed';
      case 'not-fetched':
      case 'fetching':
        return 'pending';
      case 'error':
      case 'empty':
        return 'failed';
    }
  }

  async read(handle: DeviceHandle, buffer: Uint8Array, size: number): Promise<number> {
    const data = this.handles.get(handle);
    if (!data) return READ_FAILED;

    const generation = data.generation;
    await this.orchestrator.ensureFetched(data);

    const gate = this.gate(data, generation);
    if (gate === 'pending') return 0;
    if (gate === 'failed' || !data.parentDevice) return READ_FAILED;

    return data.parentDevice.read(data.parentHandle, buffer, size);
  }

  async readBulk(handle: DeviceHandle, offset: number, buffer: Uint8Array, size: number): Promise<number> {
    if (size === BULK_ACTIVE_SENTINEL || size === BULK_INACTIVE_SENTINEL) {
      return this.setDownloadPriority(handle, size === BULK_ACTIVE_SENTINEL ? 'active' : 'inactive');
    }

    const data = this.handles.get(handle);
    if (!data) return READ_FAILED;

    const generation = data.generation;
    await this.orchestrator.ensureFetched(data);

    const gate = this.gate(data, generation);
    if (gate === 'pending') return 0;
    if (gate === 'failed' || !data.parentDevice) return READ_FAILED;

    return data.parentDevice.readBulk(data.parentHandle, offset + data.bulkBase, buffer, size);
  }

  /**
   * Mark a file as needed right now, or as not needed yet. Re-weights the
   * in-flight download, if any, and answers PRIORITY_ACK_SIZE once the file
   * is fetched, 0 before that. Like a read, it starts the fetch if needed.
   */
  async setDownloadPriority(handle: DeviceHandle, priority: DownloadPriority): Promise<number> {
    const data = this.handles.get(handle);
    if (!data) return 0;

    const generation = data.generation;
    await this.orchestrator.ensureFetched(data);
    if (data.generation !== generation) return 0;

    const request = data.getRequest;
    if (request) {
      const weight = priority === 'active' ? ACTIVE_REQUEST_WEIGHT : INACTIVE_REQUEST_WEIGHT;
      request.setRequestWeight(weight);
      this.log(`${data.entry?.basename ?? handle} marked ${priority} (weight ${weight})`);
    }

    return this.gate(data, generation) === 'ready' ? PRIORITY_ACK_SIZE : 0;
  }

  seek(handle: DeviceHandle, offset: number, origin: SeekOrigin): number {
    const data = this.handles.get(handle);
    if (!data || data.status !== 'fetched' || !data.parentDevice) {
      return SEEK_FAILED;
    }
    return data.parentDevice.seek(data.parentHandle, offset, origin);
  }

  // ============================================================================
  // Close
  // ============================================================================

  private closeInternal(handle: DeviceHandle, bulk: boolean): boolean {
    const data = this.handles.get(handle);
    if (!data) return false;

    let result = true;
    if (data.status === 'fetched' && data.parentDevice) {
      result = bulk
        ? data.parentDevice.closeBulk(data.parentHandle)
        : data.parentDevice.close(data.parentHandle);
    }

    // The slot is freed whatever the parent said
    this.handles.release(handle);
    return result;
  }

  close(handle: DeviceHandle): boolean {
    return this.closeInternal(handle, false);
  }

  closeBulk(handle: DeviceHandle): boolean {
    return this.closeInternal(handle, true);
  }

  // ============================================================================
  // Metadata
  // ============================================================================

  /**
   * Before the fetch completes this is the declared manifest size, which
   * need not match the file that eventually arrives.
   */
  getLength(handle: DeviceHandle): number {
    const data = this.handles.get(handle);
    if (!data) return LENGTH_UNKNOWN;

    if (data.status === 'fetched' && data.parentDevice) {
      return data.parentDevice.getLength(data.parentHandle);
    }

    return data.entry ? data.entry.size : LENGTH_UNKNOWN;
  }

  getFileLength(fileName: string): number {
    const entry = this.resolver.resolve(fileName);
    return entry ? entry.size : LENGTH_UNKNOWN;
  }

  /** Existence is the only attribute this device knows about */
  getAttributes(fileName: string): number {
    return this.resolver.resolve(fileName) ? 0 : INVALID_FILE_ATTRIBUTES;
  }

  // Flat namespace: nothing to enumerate
  findFirst(_folder: string): FindResult | null {
    return null;
  }

  findNext(_handle: DeviceHandle): FindData | null {
    return null;
  }

  findClose(_handle: DeviceHandle): void {}

  extensionCtl(controlCode: number, request: ExtensionRequest): ExtensionResult {
    if (controlCode !== GET_PAGE_FLAGS_CONTROL) {
      return { status: 'unsupported' };
    }

    const entry = this.resolver.resolve(request.fileName);
    if (!entry) {
      return { status: 'not-found' };
    }

    return {
      status: 'ok',
      version: parseLeadingInt(entry.extData.rscVersion),
      flags: {
        virtualPages: parseLeadingInt(entry.extData.rscPagesVirtual),
        physicalPages: parseLeadingInt(entry.extData.rscPagesPhysical)
      }
    };
  }

  /**
   * Snapshot of a handle for progress displays; null for unknown handles.
   */
  getHandleInfo(handle: DeviceHandle): HandleInfo | null {
    const data = this.handles.get(handle);
    if (!data) return null;

    return {
      status: data.status,
      bulk: data.bulkHandle,
      referenceHash: data.entry ? data.entry.referenceHash : null,
      declaredSize: data.entry ? data.entry.size : LENGTH_UNKNOWN,
      downloadProgress: data.downloadProgress,
      downloadSize: data.downloadSize,
      downloadWeight: data.getRequest ? data.getRequest.getRequestWeight() : null,
      metaData: { ...data.metaData }
    };
  }

  get openHandleCount(): number {
    return this.handles.inUse;
  }
}
