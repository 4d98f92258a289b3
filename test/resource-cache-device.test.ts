/**
 * Tests for ResourceCacheDevice
 *
 * Test categories:
 * 1. Open and metadata without any fetch
 * 2. Blocking fetch-then-read
 * 3. Non-blocking polling
 * 4. Failure paths (transport error, empty file, closed while waiting)
 * 5. Priority control and the legacy bulk sentinels
 * 6. Close and slot reuse
 * 7. Cache store round trip and diagnostics
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { fileURLToPath } from 'url';
import {
  ResourceCacheDevice,
  GET_PAGE_FLAGS_CONTROL,
  BULK_ACTIVE_SENTINEL,
  BULK_INACTIVE_SENTINEL,
  PRIORITY_ACK_SIZE,
  ACTIVE_REQUEST_WEIGHT,
  INACTIVE_REQUEST_WEIGHT
} from '../src/resource-cache-device.js';
import { ResourceCache } from '../src/resource-cache.js';
import { ManifestResourceLookup } from '../src/manifest.js';
import { VirtualFileSystem } from '../src/vfs.js';
import { LocalDevice } from '../src/local-device.js';
import { SessionContext, SessionKeys } from '../src/session-context.js';
import { DownloadStatusEvents, type DownloadStatus } from '../src/download-status.js';
import { HandleTableExhaustedError } from '../src/handle-table.js';
import {
  INVALID_FILE_ATTRIBUTES,
  INVALID_HANDLE,
  LENGTH_UNKNOWN,
  READ_FAILED,
  SEEK_FAILED
} from '../src/types.js';
import type {
  Device,
  DeviceHandle,
  DownloadCallback,
  DownloadOptions,
  DownloadRequest,
  FileDownloader
} from '../src/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEST_CACHE_DIR = path.join(__dirname, '..', '.test-cache-device');

const BENCH = 'bench model data';
const LAMP = 'lamp texture bytes';

function sha1(content: string): string {
  return crypto.createHash('sha1').update(content).digest('hex');
}

const tick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Download that only finishes when the test says so
 */
class MockRequest implements DownloadRequest {
  readonly url: string;
  outPath: string;
  options: DownloadOptions;
  weights: number[] = [];
  private weight: number;
  private onComplete: DownloadCallback;

  constructor(url: string, outPath: string, options: DownloadOptions, onComplete: DownloadCallback) {
    this.url = url;
    this.outPath = outPath;
    this.options = options;
    this.onComplete = onComplete;
    this.weight = options.weight ?? 32;
  }

  getRequestWeight(): number {
    return this.weight;
  }

  setRequestWeight(weight: number): void {
    this.weight = weight;
    this.weights.push(weight);
  }

  progress(now: number, total: number): void {
    this.options.onProgress?.({ downloadNow: now, downloadTotal: total });
  }

  complete(content: string): void {
    fs.mkdirSync(path.dirname(this.outPath), { recursive: true });
    fs.writeFileSync(this.outPath, content);
    this.progress(content.length, content.length);
    this.onComplete({ ok: true, error: null, size: content.length });
  }

  fail(error: string): void {
    this.onComplete({ ok: false, error, size: 0 });
  }
}

class MockDownloader implements FileDownloader {
  calls: MockRequest[] = [];
  startError: Error | null = null;

  downloadFile(url: string, outPath: string, options: DownloadOptions, onComplete: DownloadCallback): DownloadRequest {
    if (this.startError) throw this.startError;
    const request = new MockRequest(url, outPath, options, onComplete);
    this.calls.push(request);
    return request;
  }

  last(): MockRequest {
    const request = this.calls[this.calls.length - 1];
    if (!request) throw new Error('no download was started');
    return request;
  }
}

/** Parent device whose close always reports failure */
class FailingCloseDevice extends LocalDevice {
  close(handle: DeviceHandle): boolean {
    super.close(handle);
    return false;
  }
}

interface Fixture {
  cache: ResourceCache;
  vfs: VirtualFileSystem;
  downloader: MockDownloader;
  session: SessionContext;
  events: DownloadStatusEvents;
  downloadedSet: Set<string>;
  logs: Array<{ type: string; message: string }>;
  device(blocking: boolean, extra?: { handleCapacity?: number }): ResourceCacheDevice;
}

function createLookup(): ManifestResourceLookup {
  const lookup = new ManifestResourceLookup();
  lookup.addResource('props', {
    'bench.ydr': {
      hash: sha1(BENCH),
      url: 'http://files.test/bench.ydr',
      size: BENCH.length,
      extData: { rscVersion: '165', rscPagesVirtual: '3', rscPagesPhysical: '7' }
    },
    'lamp.ytd': { hash: sha1(LAMP), url: 'http://files.test/lamp.ytd', size: 999 },
    'empty.ydr': { hash: sha1(''), url: 'http://files.test/empty.ydr', size: 10 },
    'broken.ydr': { hash: 'deadbeef', url: 'http://files.test/broken.ydr', size: 10 }
  });
  return lookup;
}

function createFixture(parent: Device = new LocalDevice()): Fixture {
  const cache = new ResourceCache({ cacheDir: TEST_CACHE_DIR });
  const vfs = new VirtualFileSystem(parent);
  const downloader = new MockDownloader();
  const session = new SessionContext();
  const events = new DownloadStatusEvents();
  const downloadedSet = new Set<string>();
  const logs: Array<{ type: string; message: string }> = [];
  const lookup = createLookup();

  return {
    cache, vfs, downloader, session, events, downloadedSet, logs,
    device(blocking, extra = {}) {
      const prefix = blocking ? 'cache:/' : 'cache_nb:/';
      const device = new ResourceCacheDevice({
        cache,
        lookup,
        vfs,
        downloader,
        blocking,
        pathPrefix: prefix,
        session,
        statusEvents: events,
        downloadedSet,
        handleCapacity: extra.handleCapacity,
        logCallback: (type, message) => logs.push({ type, message })
      });
      vfs.mount(device, prefix);
      return device;
    }
  };
}

function seedCache(cache: ResourceCache, content: string): string {
  const file = path.join(TEST_CACHE_DIR, `seed_${sha1(content)}`);
  fs.writeFileSync(file, content);
  cache.addEntry(file, { filename: 'seeded' });
  return file;
}

async function readString(device: ResourceCacheDevice, handle: DeviceHandle, size = 64): Promise<string | number> {
  const buffer = Buffer.alloc(size);
  const n = await device.read(handle, buffer, size);
  return n < 0 ? n : buffer.subarray(0, n).toString();
}

// ============================================================================
// Tests
// ============================================================================

describe('ResourceCacheDevice', () => {
  beforeEach(() => {
    fs.rmSync(TEST_CACHE_DIR, { recursive: true, force: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_CACHE_DIR, { recursive: true, force: true });
  });

  describe('open and metadata', () => {
    it('refuses write access and unknown names', () => {
      const device = createFixture().device(true);
      assert.strictEqual(device.open('cache:/props/bench.ydr', false), INVALID_HANDLE);
      assert.strictEqual(device.open('cache:/props/nope.ydr', true), INVALID_HANDLE);
      assert.strictEqual(device.open('cache:/props', true), INVALID_HANDLE);
      assert.strictEqual(device.openBulk('cache:/vehicles/car.yft').handle, INVALID_HANDLE);
    });

    it('opens without touching the network', () => {
      const fixture = createFixture();
      const device = fixture.device(true);

      const handle = device.open('cache:/props/bench.ydr', true);
      assert.notStrictEqual(handle, INVALID_HANDLE);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'not-fetched');
      assert.strictEqual(fixture.downloader.calls.length, 0);
    });

    it('reports the declared size until the file is fetched', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/lamp.ytd', true);

      assert.strictEqual(device.getLength(handle), 999);

      const read = readString(device, handle);
      fixture.downloader.last().complete(LAMP);
      assert.strictEqual(await read, LAMP);
      assert.strictEqual(device.getLength(handle), LAMP.length);
    });

    it('answers name queries from the manifest', () => {
      const device = createFixture().device(true);
      assert.strictEqual(device.getFileLength('cache:/props/lamp.ytd'), 999);
      assert.strictEqual(device.getFileLength('cache:/props/nope'), LENGTH_UNKNOWN);
      assert.strictEqual(device.getAttributes('cache:/props/lamp.ytd'), 0);
      assert.strictEqual(device.getAttributes('cache:/props/nope'), INVALID_FILE_ATTRIBUTES);
      assert.strictEqual(device.getLength(7), LENGTH_UNKNOWN);
    });

    it('has nothing to enumerate', () => {
      const device = createFixture().device(true);
      assert.strictEqual(device.findFirst('cache:/props/'), null);
      assert.strictEqual(device.findNext(0), null);
      device.findClose(0);
    });

    it('answers page flag queries from entry metadata', () => {
      const device = createFixture().device(true);

      assert.deepStrictEqual(device.extensionCtl(GET_PAGE_FLAGS_CONTROL, { fileName: 'cache:/props/bench.ydr' }), {
        status: 'ok',
        version: 165,
        flags: { virtualPages: 3, physicalPages: 7 }
      });
      assert.deepStrictEqual(device.extensionCtl(GET_PAGE_FLAGS_CONTROL, { fileName: 'cache:/props/lamp.ytd' }), {
        status: 'ok',
        version: 0,
        flags: { virtualPages: 0, physicalPages: 0 }
      });
      assert.deepStrictEqual(
        device.extensionCtl(GET_PAGE_FLAGS_CONTROL, { fileName: 'cache:/props/nope' }),
        { status: 'not-found' }
      );
      assert.deepStrictEqual(
        device.extensionCtl(0x20002, { fileName: 'cache:/props/bench.ydr' }),
        { status: 'unsupported' }
      );
    });

    it('throws once every handle slot is taken', () => {
      const device = createFixture().device(true, { handleCapacity: 1 });
      device.open('cache:/props/bench.ydr', true);
      assert.throws(() => device.open('cache:/props/lamp.ytd', true), HandleTableExhaustedError);
    });
  });

  describe('blocking reads', () => {
    it('waits for the download and then reads the file', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      let settled = false;
      const read = readString(device, handle).then(result => {
        settled = true;
        return result;
      });

      await tick();
      assert.strictEqual(settled, false);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'fetching');

      fixture.downloader.last().complete(BENCH);
      assert.strictEqual(await read, BENCH);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'fetched');
    });

    it('starts exactly one download for concurrent readers', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const reads = [0, 1, 2].map(() => device.read(handle, Buffer.alloc(64), 64));
      assert.strictEqual(fixture.downloader.calls.length, 1);

      fixture.downloader.last().complete(BENCH);
      const results = await Promise.all(reads);

      assert.ok(results.every(n => n >= 0));
      assert.strictEqual(results.reduce((sum, n) => sum + n, 0), BENCH.length);
      assert.strictEqual(fixture.downloader.calls.length, 1);
    });

    it('downloads into the cache directory with the file weight and token', async () => {
      const fixture = createFixture();
      fixture.session.setData(SessionKeys.CONNECTION_TOKEN, 'test-secret');
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const read = readString(device, handle);
      const request = fixture.downloader.last();

      assert.strictEqual(request.url, 'http://files.test/bench.ydr');
      assert.strictEqual(request.outPath, `${fixture.cache.getCachePath()}ydr_${sha1(BENCH)}`);
      assert.strictEqual(request.getRequestWeight(), 128);
      assert.deepStrictEqual(request.options.headers, { 'X-Connection-Token': 'test-secret' });

      request.complete(BENCH);
      await read;
    });

    it('seeks only once fetched', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      assert.strictEqual(device.seek(handle, 0, 'set'), SEEK_FAILED);

      const first = device.read(handle, Buffer.alloc(1), 1);
      fixture.downloader.last().complete(BENCH);
      assert.strictEqual(await first, 1);

      assert.strictEqual(device.seek(handle, 6, 'set'), 6);
      assert.strictEqual(await readString(device, handle), 'model data');
    });

    it('reads bulk handles at absolute offsets', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const { handle, bulkBase } = device.openBulk('cache:/props/bench.ydr');
      assert.strictEqual(bulkBase, 0);

      const buffer = Buffer.alloc(5);
      const read = device.readBulk(handle, 6, buffer, 5);
      fixture.downloader.last().complete(BENCH);

      assert.strictEqual(await read, 5);
      assert.strictEqual(buffer.toString(), 'model');
      assert.strictEqual(device.closeBulk(handle), true);
    });

    it('reports progress on the handle and the status emitter', async () => {
      const fixture = createFixture();
      const statuses: DownloadStatus[] = [];
      fixture.events.on(status => statuses.push(status));
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const read = readString(device, handle);
      const request = fixture.downloader.last();

      request.progress(4, 0);
      request.progress(8, BENCH.length);
      assert.strictEqual(device.getHandleInfo(handle)?.downloadProgress, 8);
      assert.strictEqual(device.getHandleInfo(handle)?.downloadSize, BENCH.length);
      assert.strictEqual(device.getHandleInfo(handle)?.downloadWeight, 128);

      request.complete(BENCH);
      await read;

      assert.deepStrictEqual(statuses, [
        { path: 'cache:/props/bench.ydr', downloaded: 8, total: BENCH.length },
        { path: 'cache:/props/bench.ydr', downloaded: BENCH.length, total: BENCH.length }
      ]);
      assert.strictEqual(device.getHandleInfo(handle)?.downloadWeight, null);
    });
  });

  describe('non-blocking reads', () => {
    it('returns 0 while the download runs and data once it lands', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);
      const handle = device.open('cache_nb:/props/bench.ydr', true);

      assert.strictEqual(await readString(device, handle), '');
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'fetching');
      assert.strictEqual(await readString(device, handle), '');
      assert.strictEqual(fixture.downloader.calls.length, 1);

      fixture.downloader.last().complete(BENCH);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'fetched');
      assert.strictEqual(await readString(device, handle), BENCH);
    });

    it('reports the failure on the next poll', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);
      const handle = device.open('cache_nb:/props/broken.ydr', true);

      assert.strictEqual(await readString(device, handle), '');
      fixture.downloader.last().fail('HTTP 404');

      assert.strictEqual(await readString(device, handle), READ_FAILED);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'error');
      assert.strictEqual(fixture.downloader.calls.length, 1);
    });
  });

  describe('failures', () => {
    it('treats an empty download as a failure', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/empty.ydr', true);

      const read = readString(device, handle);
      fixture.downloader.last().complete('');

      assert.strictEqual(await read, READ_FAILED);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'error');
      assert.match(
        fixture.session.getData(SessionKeys.FETCH_ERROR) ?? '',
        /^Failed to fetch empty\.ydr from http:\/\/files\.test\/empty\.ydr after \d+ msec: no error reported\nThe file was empty\.$/
      );
      assert.strictEqual(fixture.cache.getEntryFor(sha1('')), null);
    });

    it('names the transport error and the requesting loader', async () => {
      const fixture = createFixture();
      fixture.session.setData(SessionKeys.LOAD_CALLER, 'streamer');
      fixture.session.setData(SessionKeys.LOAD_START_TIME, String(Date.now()));
      const device = fixture.device(true);
      const handle = device.open('cache:/props/broken.ydr', true);

      const read = readString(device, handle);
      fixture.downloader.last().fail('HTTP 404');

      assert.strictEqual(await read, READ_FAILED);
      const message = fixture.session.getData(SessionKeys.FETCH_ERROR) ?? '';
      assert.match(
        message,
        /^Failed to fetch broken\.ydr from http:\/\/files\.test\/broken\.ydr after \d+ msec: HTTP 404\nThis happened during a load requested by streamer, which by now took \d+ msec\.$/
      );
      assert.deepStrictEqual(fixture.logs.map(l => l.type), ['download', 'error']);
      assert.strictEqual(fixture.logs[1].message, message);
    });

    it('fails the handle when the transport refuses the download', async () => {
      const fixture = createFixture();
      fixture.downloader.startError = new Error('queue closed');
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      assert.strictEqual(await readString(device, handle), READ_FAILED);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'error');
      assert.strictEqual(await readString(device, handle), READ_FAILED);
      assert.match(
        fixture.session.getData(SessionKeys.FETCH_ERROR) ?? '',
        /^Failed to fetch bench\.ydr from http:\/\/files\.test\/bench\.ydr after \d+ msec: could not start download: queue closed$/
      );
      assert.deepStrictEqual(fixture.logs.map(l => l.type), ['download', 'error']);
    });

    it('keeps downloading when a status listener throws', async () => {
      const fixture = createFixture();
      fixture.events.on(() => {
        throw new Error('listener broke');
      });
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const read = readString(device, handle);
      const request = fixture.downloader.last();
      request.progress(8, BENCH.length);
      request.complete(BENCH);

      assert.strictEqual(await read, BENCH);
      const warnings = fixture.logs.filter(l => l.type === 'warn').map(l => l.message);
      assert.deepStrictEqual(warnings, [
        'Download status listener failed for cache:/props/bench.ydr: listener broke',
        'Download status listener failed for cache:/props/bench.ydr: listener broke'
      ]);
    });

    it('stays failed without retrying', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/broken.ydr', true);

      const read = readString(device, handle);
      fixture.downloader.last().fail('HTTP 500');
      await read;

      assert.strictEqual(await readString(device, handle), READ_FAILED);
      assert.strictEqual(fixture.downloader.calls.length, 1);
    });

    it('wakes a blocked reader when its handle is closed', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const read = readString(device, handle);
      assert.strictEqual(device.close(handle), true);

      assert.strictEqual(await read, READ_FAILED);
    });

    it('keeps a late completion away from a reused slot', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);

      const first = device.open('cache_nb:/props/bench.ydr', true);
      await readString(device, first);
      device.close(first);

      const second = device.open('cache_nb:/props/bench.ydr', true);
      assert.strictEqual(second, first);

      fixture.downloader.calls[0].complete(BENCH);
      assert.strictEqual(device.getHandleInfo(second)?.status, 'not-fetched');

      // The file still made it into the cache
      const third = device.open('cache_nb:/props/bench.ydr', true);
      assert.strictEqual(device.getHandleInfo(third)?.status, 'fetched');
      assert.strictEqual(await readString(device, third), BENCH);
    });
  });

  describe('download priority', () => {
    it('re-weights the running download without touching the buffer', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);
      const { handle } = device.openBulk('cache_nb:/props/bench.ydr');
      const buffer = Buffer.alloc(8, 0xab);

      assert.strictEqual(await device.readBulk(handle, 0, buffer, BULK_ACTIVE_SENTINEL), 0);
      const request = fixture.downloader.last();
      assert.strictEqual(request.getRequestWeight(), ACTIVE_REQUEST_WEIGHT);

      assert.strictEqual(await device.readBulk(handle, 0, buffer, BULK_INACTIVE_SENTINEL), 0);
      assert.deepStrictEqual(request.weights, [ACTIVE_REQUEST_WEIGHT, INACTIVE_REQUEST_WEIGHT]);

      request.complete(BENCH);
      assert.strictEqual(await device.readBulk(handle, 0, buffer, BULK_ACTIVE_SENTINEL), PRIORITY_ACK_SIZE);
      assert.deepStrictEqual(request.weights, [ACTIVE_REQUEST_WEIGHT, INACTIVE_REQUEST_WEIGHT]);
      assert.ok(buffer.equals(Buffer.alloc(8, 0xab)));
    });

    it('offers the same control as an explicit call', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);
      const handle = device.open('cache_nb:/props/lamp.ytd', true);

      assert.strictEqual(await device.setDownloadPriority(handle, 'inactive'), 0);
      assert.strictEqual(fixture.downloader.last().getRequestWeight(), INACTIVE_REQUEST_WEIGHT);
      assert.strictEqual(device.getHandleInfo(handle)?.downloadWeight, INACTIVE_REQUEST_WEIGHT);

      fixture.downloader.last().complete(LAMP);
      assert.strictEqual(await device.setDownloadPriority(handle, 'active'), PRIORITY_ACK_SIZE);
    });

    it('answers 0 for unknown handles and failed fetches', async () => {
      const fixture = createFixture();
      const device = fixture.device(false);
      assert.strictEqual(await device.setDownloadPriority(5, 'active'), 0);

      const handle = device.open('cache_nb:/props/broken.ydr', true);
      await device.setDownloadPriority(handle, 'active');
      fixture.downloader.last().fail('HTTP 404');
      assert.strictEqual(await device.setDownloadPriority(handle, 'active'), 0);
    });

    it('acknowledges on a blocking device once the fetch is done', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const { handle } = device.openBulk('cache:/props/bench.ydr');

      const ack = device.readBulk(handle, 0, Buffer.alloc(1), BULK_ACTIVE_SENTINEL);
      fixture.downloader.last().complete(BENCH);
      assert.strictEqual(await ack, PRIORITY_ACK_SIZE);
    });
  });

  describe('close', () => {
    it('frees the slot for the next open', async () => {
      const fixture = createFixture();
      const device = fixture.device(true, { handleCapacity: 1 });
      const handle = device.open('cache:/props/bench.ydr', true);
      const read = readString(device, handle);
      fixture.downloader.last().complete(BENCH);
      await read;

      assert.strictEqual(device.close(handle), true);
      assert.strictEqual(device.getHandleInfo(handle), null);
      assert.strictEqual(device.openHandleCount, 0);
      assert.strictEqual(device.open('cache:/props/lamp.ytd', true), handle);
    });

    it('frees the slot even when the parent close fails', () => {
      const fixture = createFixture(new FailingCloseDevice());
      seedCache(fixture.cache, BENCH);
      const device = fixture.device(true, { handleCapacity: 1 });

      const handle = device.open('cache:/props/bench.ydr', true);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'fetched');
      assert.strictEqual(device.close(handle), false);
      assert.strictEqual(device.getHandleInfo(handle), null);
      assert.strictEqual(device.open('cache:/props/bench.ydr', true), handle);
    });

    it('returns false for handles that are not open', () => {
      const device = createFixture().device(true);
      assert.strictEqual(device.close(3), false);
      assert.strictEqual(device.closeBulk(-1), false);
    });
  });

  describe('cache store integration', () => {
    it('serves cached files without downloading', async () => {
      const fixture = createFixture();
      const seeded = seedCache(fixture.cache, BENCH);
      const device = fixture.device(true);

      const handle = device.open('cache:/props/bench.ydr', true);
      const info = device.getHandleInfo(handle);
      assert.strictEqual(info?.status, 'fetched');
      assert.deepStrictEqual(info?.metaData, { filename: 'seeded' });
      assert.strictEqual(await readString(device, handle), BENCH);
      assert.strictEqual(fixture.downloader.calls.length, 0);
      assert.strictEqual(device.getLength(handle), fs.statSync(seeded).size);
    });

    it('records where each download came from', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const handle = device.open('cache:/props/bench.ydr', true);

      const read = readString(device, handle);
      fixture.downloader.last().complete(BENCH);
      await read;

      const expected = {
        filename: 'bench.ydr',
        resource: 'props',
        from: 'http://files.test/bench.ydr'
      };
      assert.deepStrictEqual(fixture.cache.getEntryFor(sha1(BENCH)), {
        localPath: `${fixture.cache.getCachePath()}ydr_${sha1(BENCH)}`,
        metaData: expected
      });
      assert.deepStrictEqual(device.getHandleInfo(handle)?.metaData, expected);
      assert.ok(fixture.downloadedSet.has(sha1(BENCH)));
      assert.deepStrictEqual(fixture.logs.map(l => l.type), ['download', 'downloaded']);

      // A second open is a cache hit
      const again = device.open('cache:/props/bench.ydr', true);
      assert.strictEqual(device.getHandleInfo(again)?.status, 'fetched');
      assert.strictEqual(fixture.downloader.calls.length, 1);
    });

    it('warns when a downloaded file went missing from the cache', () => {
      const fixture = createFixture();
      fixture.downloadedSet.add(sha1(BENCH));
      const device = fixture.device(true);

      const handle = device.open('cache:/props/bench.ydr', true);
      assert.strictEqual(device.getHandleInfo(handle)?.status, 'not-fetched');
      assert.deepStrictEqual(fixture.logs, [
        { type: 'warn', message: "We fetched bench.ydr already, and it isn't in the cache now" }
      ]);
    });

    it('warns when the same asset is downloaded twice', async () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      const first = device.open('cache:/props/bench.ydr', true);
      const second = device.open('cache:/props/bench.ydr', true);

      const reads = [readString(device, first), readString(device, second)];
      assert.strictEqual(fixture.downloader.calls.length, 2);
      fixture.downloader.calls[0].complete(BENCH);
      fixture.downloader.calls[1].complete(BENCH);

      assert.deepStrictEqual(await Promise.all(reads), [BENCH, BENCH]);
      assert.deepStrictEqual(
        fixture.logs.filter(l => l.type === 'warn').map(l => l.message),
        ['Downloaded the same asset (bench.ydr) twice in the same run']
      );
    });

    it('resolves names under a changed prefix', () => {
      const fixture = createFixture();
      const device = fixture.device(true);
      device.setPathPrefix('assets:/');

      assert.strictEqual(device.getPathPrefix(), 'assets:/');
      assert.strictEqual(device.resolveEntry('assets:/props/bench.ydr')?.basename, 'bench.ydr');
      assert.strictEqual(device.open('cache:/props/bench.ydr', true), INVALID_HANDLE);
    });
  });
});
