/**
 * Virtual filesystem mount table
 * Dispatches path-prefixed requests to registered devices.
 */

import type { Device } from './types.js';

interface MountEntry {
  prefix: string;
  device: Device;
}

export class VirtualFileSystem {
  /** Kept sorted longest-prefix-first so the first match is the most specific */
  private mounts: MountEntry[] = [];
  private fallback: Device | null;

  constructor(fallback: Device | null = null) {
    this.fallback = fallback;
  }

  /**
   * Mount a device under a prefix such as `cache:/`. Mounting the same
   * prefix again replaces the previous device.
   */
  mount(device: Device, prefix: string): void {
    if (prefix.length === 0) {
      throw new Error('Mount prefix must not be empty');
    }

    const idx = this.mounts.findIndex(m => m.prefix === prefix);
    if (idx !== -1) {
      this.mounts[idx] = { prefix, device };
    } else {
      this.mounts.push({ prefix, device });
    }

    this.mounts.sort((a, b) => b.prefix.length - a.prefix.length);
  }

  unmount(prefix: string): boolean {
    const idx = this.mounts.findIndex(m => m.prefix === prefix);
    if (idx === -1) return false;
    this.mounts.splice(idx, 1);
    return true;
  }

  /**
   * Device responsible for a path; unprefixed paths go to the fallback device.
   */
  getDevice(path: string): Device | null {
    for (const entry of this.mounts) {
      if (path.startsWith(entry.prefix)) {
        return entry.device;
      }
    }
    return this.fallback;
  }

  getMountPrefixes(): string[] {
    return this.mounts.map(m => m.prefix);
  }
}
