/**
 * Shared type definitions for the resource cache device
 */

// ============================================================================
// Device Types
// ============================================================================

/** Opaque per-device file handle. */
export type DeviceHandle = number;

export const INVALID_HANDLE: DeviceHandle = -1;

/** Returned by read/readBulk when the handle is in a failed state. */
export const READ_FAILED = -1;

/** Returned by seek when the handle is not backed by fetched bytes. */
export const SEEK_FAILED = -1;

/** Returned by length queries for unknown files or handles. */
export const LENGTH_UNKNOWN = -1;

/** Returned by getAttributes when the file does not exist. */
export const INVALID_FILE_ATTRIBUTES = -1;

export type SeekOrigin = 'set' | 'current' | 'end';

export interface BulkOpenResult {
  handle: DeviceHandle;
  /** Offset added to every bulk read on this handle */
  bulkBase: number;
}

export interface FindData {
  name: string;
  attributes: number;
  length: number;
}

export interface FindResult {
  handle: DeviceHandle;
  data: FindData;
}

/**
 * Out-of-band control request addressed by path
 */
export interface ExtensionRequest {
  fileName: string;
}

export interface ResourceFlags {
  virtualPages: number;
  physicalPages: number;
}

export type ExtensionResult =
  | { status: 'ok'; version: number; flags: ResourceFlags }
  | { status: 'not-found' }
  | { status: 'unsupported' };

/**
 * A virtual-filesystem device. Paths handed to a device still carry the
 * prefix the device is mounted under.
 */
export interface Device {
  open(fileName: string, readOnly: boolean): DeviceHandle;
  openBulk(fileName: string): BulkOpenResult;
  read(handle: DeviceHandle, buffer: Uint8Array, size: number): Promise<number>;
  readBulk(handle: DeviceHandle, offset: number, buffer: Uint8Array, size: number): Promise<number>;
  seek(handle: DeviceHandle, offset: number, origin: SeekOrigin): number;
  close(handle: DeviceHandle): boolean;
  closeBulk(handle: DeviceHandle): boolean;
  getLength(handle: DeviceHandle): number;
  getFileLength(fileName: string): number;
  getAttributes(fileName: string): number;
  findFirst(folder: string): FindResult | null;
  findNext(handle: DeviceHandle): FindData | null;
  findClose(handle: DeviceHandle): void;
  extensionCtl(controlCode: number, request: ExtensionRequest): ExtensionResult;
}

// ============================================================================
// Cache Types
// ============================================================================

/**
 * Manifest record describing one content-addressed resource file
 */
export interface CacheEntry {
  /** Content hash identifying the artifact */
  referenceHash: string;
  /** File name within the resource, e.g. `stream/props.ydr` */
  basename: string;
  resourceName: string;
  remoteUrl: string;
  /** Declared size from the manifest; may differ from the downloaded file */
  size: number;
  extData: Record<string, string>;
}

export interface CacheStoreRecord {
  localPath: string;
  metaData: Record<string, string>;
}

/**
 * The persistent hash → local file store the device reads and appends to
 */
export interface CacheStore {
  getCachePath(): string;
  getEntryFor(hash: string): CacheStoreRecord | null;
  addEntry(localPath: string, metaData: Record<string, string>): string;
}

// ============================================================================
// Download Types
// ============================================================================

export interface ProgressInfo {
  downloadNow: number;
  /** 0 while the total is unknown */
  downloadTotal: number;
}

export interface DownloadOptions {
  headers?: Record<string, string>;
  /** Scheduling hint, higher is more urgent */
  weight?: number;
  onProgress?: (info: ProgressInfo) => void;
}

export interface DownloadResult {
  ok: boolean;
  error: string | null;
  /** Bytes written to the destination */
  size: number;
}

export type DownloadCallback = (result: DownloadResult) => void;

/**
 * A handle on an in-flight download
 */
export interface DownloadRequest {
  readonly url: string;
  getRequestWeight(): number;
  setRequestWeight(weight: number): void;
}

export interface FileDownloader {
  downloadFile(
    url: string,
    outPath: string,
    options: DownloadOptions,
    onComplete: DownloadCallback
  ): DownloadRequest;
}

export interface DownloaderStats {
  requests: number;
  bytesDownloaded: number;
  active: number;
  queued: number;
  failures: number;
}

// ============================================================================
// Misc
// ============================================================================

/**
 * Receives diagnostics regardless of the debug flag.
 * Types: 'download', 'downloaded', 'warn', 'error'
 */
export type LogCallback = (type: string, message: string) => void;

export interface CliOptionsData {
  nonBlocking: boolean;
  bulk: boolean;
  help: boolean;
  statusPort: number | null;
  manifestPath: string | null;
  virtualPath: string | null;
  outFile: string | null;
  errors: string[];
}
