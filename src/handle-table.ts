/**
 * Handle Table
 *
 * Fixed-capacity pool of per-open-file state records. Slots are addressed by
 * integer index and never grow; running out of slots means a caller is
 * leaking handles and is treated as fatal.
 */

import { INVALID_HANDLE } from './types.js';
import type { CacheEntry, Device, DeviceHandle, DownloadRequest } from './types.js';

export type HandleStatus = 'empty' | 'not-fetched' | 'fetching' | 'fetched' | 'error';

/**
 * One-shot signal for a fetch cycle. Every waiter awaits the same promise,
 * so resolving it wakes all of them at once.
 */
export interface FetchSignal {
  promise: Promise<void>;
  resolve: () => void;
}

export function createFetchSignal(): FetchSignal {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface HandleData {
  status: HandleStatus;
  entry: CacheEntry | null;
  bulkHandle: boolean;

  // Set only while status === 'fetched'
  parentDevice: Device | null;
  parentHandle: DeviceHandle;
  bulkBase: number;

  // Advisory counters from the progress callback
  downloadProgress: number;
  downloadSize: number;

  getRequest: DownloadRequest | null;
  metaData: Record<string, string>;
  completion: FetchSignal | null;

  /** Bumped on every allocation so late completions can spot a reused slot */
  generation: number;
}

export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

export class HandleTableExhaustedError extends FatalError {
  capacity: number;

  constructor(capacity: number) {
    super(`failed to allocate file handle (all ${capacity} slots in use)`);
    this.name = 'HandleTableExhaustedError';
    this.capacity = capacity;
  }
}

export const DEFAULT_HANDLE_CAPACITY = 512;

function createEmptyHandle(): HandleData {
  return {
    status: 'empty',
    entry: null,
    bulkHandle: false,
    parentDevice: null,
    parentHandle: INVALID_HANDLE,
    bulkBase: 0,
    downloadProgress: 0,
    downloadSize: 0,
    getRequest: null,
    metaData: {},
    completion: null,
    generation: 0
  };
}

export class HandleTable {
  private slots: HandleData[];
  private onExhausted: (capacity: number) => never;
  private used = 0;

  constructor(
    capacity = DEFAULT_HANDLE_CAPACITY,
    onExhausted?: (capacity: number) => never
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Handle table capacity must be a positive integer, got ${capacity}`);
    }

    this.slots = Array.from({ length: capacity }, () => createEmptyHandle());
    this.onExhausted = onExhausted ?? ((cap: number): never => {
      throw new HandleTableExhaustedError(cap);
    });
  }

  get capacity(): number {
    return this.slots.length;
  }

  get inUse(): number {
    return this.used;
  }

  /**
   * Claim the lowest free slot. The scan and claim run without yielding to
   * the event loop, so two opens can never take the same slot.
   */
  allocate(): { handle: DeviceHandle; data: HandleData } {
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.status === 'empty') {
        // Claimed but not yet populated
        slot.status = 'error';
        slot.generation++;
        this.used++;
        return { handle: i, data: slot };
      }
    }

    return this.onExhausted(this.slots.length);
  }

  get(handle: DeviceHandle): HandleData | null {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.slots.length) {
      return null;
    }
    const slot = this.slots[handle];
    return slot.status === 'empty' ? null : slot;
  }

  /**
   * Return a slot to the pool. The caller closes any parent handle first.
   */
  release(handle: DeviceHandle): void {
    const slot = this.get(handle);
    if (!slot) return;

    const pending = slot.completion;

    slot.status = 'empty';
    slot.entry = null;
    slot.bulkHandle = false;
    slot.parentDevice = null;
    slot.parentHandle = INVALID_HANDLE;
    slot.bulkBase = 0;
    slot.downloadProgress = 0;
    slot.downloadSize = 0;
    slot.getRequest = null;
    slot.metaData = {};
    slot.completion = null;
    this.used--;

    // Anyone still parked on this slot sees 'empty' and gives up
    pending?.resolve();
  }
}
