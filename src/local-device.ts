/**
 * LocalDevice - virtual-filesystem device over the host filesystem
 *
 * Serves the files the resource cache materializes on disk. Mounted without
 * a prefix it takes host paths as-is; with a prefix and root it maps
 * `{prefix}{relative}` to `{root}/{relative}`.
 */

import fs from 'fs';
import path from 'path';
import {
  INVALID_HANDLE,
  INVALID_FILE_ATTRIBUTES,
  LENGTH_UNKNOWN,
  READ_FAILED,
  SEEK_FAILED
} from './types.js';
import type {
  BulkOpenResult,
  Device,
  DeviceHandle,
  ExtensionResult,
  FindData,
  FindResult,
  SeekOrigin
} from './types.js';

export const FILE_ATTRIBUTE_DIRECTORY = 0x10;

interface OpenFile {
  fd: number;
  position: number;
  hostPath: string;
}

interface FindState {
  folder: string;
  names: string[];
  index: number;
}

export interface LocalDeviceOptions {
  prefix?: string;
  root?: string;
  debug?: boolean;
}

export class LocalDevice implements Device {
  private prefix: string;
  private root: string | null;
  private debug: boolean;
  private files = new Map<DeviceHandle, OpenFile>();
  private finds = new Map<DeviceHandle, FindState>();
  private nextHandle = 1;

  constructor(options: LocalDeviceOptions = {}) {
    this.prefix = options.prefix || '';
    this.root = options.root || null;
    this.debug = options.debug || false;
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[LocalDevice] ${msg}`);
  }

  toHostPath(fileName: string): string {
    const relative = fileName.startsWith(this.prefix) ? fileName.slice(this.prefix.length) : fileName;
    return this.root ? path.join(this.root, relative) : relative;
  }

  private allocateHandle(): DeviceHandle {
    return this.nextHandle++;
  }

  open(fileName: string, readOnly: boolean): DeviceHandle {
    const hostPath = this.toHostPath(fileName);
    try {
      const fd = fs.openSync(hostPath, readOnly ? 'r' : 'r+');
      const handle = this.allocateHandle();
      this.files.set(handle, { fd, position: 0, hostPath });
      return handle;
    } catch (err) {
      this.log(`open ${hostPath} failed: ${(err as Error).message}`);
      return INVALID_HANDLE;
    }
  }

  openBulk(fileName: string): BulkOpenResult {
    return { handle: this.open(fileName, true), bulkBase: 0 };
  }

  async read(handle: DeviceHandle, buffer: Uint8Array, size: number): Promise<number> {
    const file = this.files.get(handle);
    if (!file) return READ_FAILED;

    try {
      const length = Math.min(size, buffer.length);
      const bytesRead = fs.readSync(file.fd, buffer, 0, length, file.position);
      file.position += bytesRead;
      return bytesRead;
    } catch (err) {
      this.log(`read ${file.hostPath} failed: ${(err as Error).message}`);
      return READ_FAILED;
    }
  }

  async readBulk(handle: DeviceHandle, offset: number, buffer: Uint8Array, size: number): Promise<number> {
    const file = this.files.get(handle);
    if (!file || offset < 0) return READ_FAILED;

    try {
      const length = Math.min(size, buffer.length);
      return fs.readSync(file.fd, buffer, 0, length, offset);
    } catch (err) {
      this.log(`bulk read ${file.hostPath} failed: ${(err as Error).message}`);
      return READ_FAILED;
    }
  }

  seek(handle: DeviceHandle, offset: number, origin: SeekOrigin): number {
    const file = this.files.get(handle);
    if (!file) return SEEK_FAILED;

    let base: number;
    if (origin === 'set') {
      base = 0;
    } else if (origin === 'current') {
      base = file.position;
    } else {
      base = fs.fstatSync(file.fd).size;
    }

    const next = base + offset;
    if (next < 0) return SEEK_FAILED;

    file.position = next;
    return next;
  }

  close(handle: DeviceHandle): boolean {
    const file = this.files.get(handle);
    if (!file) return false;

    this.files.delete(handle);
    try {
      fs.closeSync(file.fd);
      return true;
    } catch (err) {
      this.log(`close ${file.hostPath} failed: ${(err as Error).message}`);
      return false;
    }
  }

  closeBulk(handle: DeviceHandle): boolean {
    return this.close(handle);
  }

  getLength(handle: DeviceHandle): number {
    const file = this.files.get(handle);
    if (!file) return LENGTH_UNKNOWN;

    try {
      return fs.fstatSync(file.fd).size;
    } catch {
      return LENGTH_UNKNOWN;
    }
  }

  getFileLength(fileName: string): number {
    try {
      const stat = fs.statSync(this.toHostPath(fileName));
      return stat.isFile() ? stat.size : LENGTH_UNKNOWN;
    } catch {
      return LENGTH_UNKNOWN;
    }
  }

  getAttributes(fileName: string): number {
    try {
      const stat = fs.statSync(this.toHostPath(fileName));
      return stat.isDirectory() ? FILE_ATTRIBUTE_DIRECTORY : 0;
    } catch {
      return INVALID_FILE_ATTRIBUTES;
    }
  }

  private findData(state: FindState, name: string): FindData {
    const full = path.join(this.toHostPath(state.folder), name);
    try {
      const stat = fs.statSync(full);
      return {
        name,
        attributes: stat.isDirectory() ? FILE_ATTRIBUTE_DIRECTORY : 0,
        length: stat.isFile() ? stat.size : 0
      };
    } catch {
      return { name, attributes: 0, length: 0 };
    }
  }

  findFirst(folder: string): FindResult | null {
    let names: string[];
    try {
      names = fs.readdirSync(this.toHostPath(folder)).sort();
    } catch {
      return null;
    }
    if (names.length === 0) return null;

    const state: FindState = { folder, names, index: 1 };
    const handle = this.allocateHandle();
    this.finds.set(handle, state);
    return { handle, data: this.findData(state, names[0]) };
  }

  findNext(handle: DeviceHandle): FindData | null {
    const state = this.finds.get(handle);
    if (!state || state.index >= state.names.length) return null;

    const name = state.names[state.index++];
    return this.findData(state, name);
  }

  findClose(handle: DeviceHandle): void {
    this.finds.delete(handle);
  }

  extensionCtl(): ExtensionResult {
    return { status: 'unsupported' };
  }

  get openFileCount(): number {
    return this.files.size;
  }
}
