export * from './types.js';
export { HandleTable, FatalError, HandleTableExhaustedError, DEFAULT_HANDLE_CAPACITY } from './handle-table.js';
export type { HandleStatus, HandleData } from './handle-table.js';
export { CacheEntryResolver, splitResourcePath } from './entry-resolver.js';
export type { ResourceLookup, ResourceEntryList } from './entry-resolver.js';
export { ManifestResourceLookup, parseManifestEntry } from './manifest.js';
export type { ManifestEntry } from './manifest.js';
export { VirtualFileSystem } from './vfs.js';
export { LocalDevice, FILE_ATTRIBUTE_DIRECTORY } from './local-device.js';
export { ResourceCache, hashFile } from './resource-cache.js';
export { HttpClient, HttpStatusError } from './http-client.js';
export { SessionContext, SessionKeys } from './session-context.js';
export { DownloadStatusEvents, getSharedDownloadStatus } from './download-status.js';
export type { DownloadStatus } from './download-status.js';
export { RequestWeight, getWeightForFileName, getCacheFileName, DEFAULT_AUTH_HEADER } from './download-executor.js';
export {
  ResourceCacheDevice,
  GET_PAGE_FLAGS_CONTROL,
  ACTIVE_REQUEST_WEIGHT,
  INACTIVE_REQUEST_WEIGHT,
  PRIORITY_ACK_SIZE
} from './resource-cache-device.js';
export type { DownloadPriority, HandleInfo } from './resource-cache-device.js';
export { mountResourceCacheDevice, BLOCKING_MOUNT, NON_BLOCKING_MOUNT } from './mount.js';
export { DownloadStatusFeed, STATUS_FEED_PATH } from './status-feed.js';
export { loadConfig } from './config.js';
