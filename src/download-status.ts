/**
 * Process-wide download notifications and bookkeeping
 */

import { EventEmitter } from 'events';

export interface DownloadStatus {
  /** Virtual path of the file, e.g. `cache:/props/stream/bench.ydr` */
  path: string;
  downloaded: number;
  total: number;
}

export type DownloadStatusListener = (status: DownloadStatus) => void;

/**
 * Broadcast of download progress for UI and telemetry consumers
 */
export class DownloadStatusEvents {
  private emitter = new EventEmitter();

  constructor() {
    // One listener per subscribed UI or feed client
    this.emitter.setMaxListeners(0);
  }

  on(listener: DownloadStatusListener): () => void {
    this.emitter.on('status', listener);
    return () => this.emitter.off('status', listener);
  }

  emit(path: string, downloaded: number, total: number): void {
    const status: DownloadStatus = { path, downloaded, total };
    this.emitter.emit('status', status);
  }

  listenerCount(): number {
    return this.emitter.listenerCount('status');
  }
}

// ============================================================================
// Singletons for shared access
// ============================================================================

let sharedStatusEvents: DownloadStatusEvents | null = null;

export function getSharedDownloadStatus(): DownloadStatusEvents {
  if (!sharedStatusEvents) {
    sharedStatusEvents = new DownloadStatusEvents();
  }
  return sharedStatusEvents;
}

/**
 * Hashes downloaded during this process lifetime. Only consulted for
 * diagnostics, never to decide whether something is cached.
 */
let sharedDownloadedSet: Set<string> | null = null;

export function getSharedDownloadedSet(): Set<string> {
  if (!sharedDownloadedSet) {
    sharedDownloadedSet = new Set<string>();
  }
  return sharedDownloadedSet;
}

export function resetSharedDownloadState(): void {
  sharedStatusEvents = null;
  sharedDownloadedSet = null;
}
