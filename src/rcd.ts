#!/usr/bin/env node

import fs from 'fs';
import http from 'http';
import { fileURLToPath } from 'url';
import { CliOptions } from './cli-options.js';
import { loadConfig } from './config.js';
import { ManifestResourceLookup } from './manifest.js';
import { ResourceCache } from './resource-cache.js';
import { VirtualFileSystem } from './vfs.js';
import { LocalDevice } from './local-device.js';
import { HttpClient } from './http-client.js';
import { SessionContext, SessionKeys } from './session-context.js';
import { getSharedDownloadStatus } from './download-status.js';
import { DownloadStatusFeed, STATUS_FEED_PATH } from './status-feed.js';
import { mountResourceCacheDevice } from './mount.js';
import type { ResourceCacheDevice } from './resource-cache-device.js';
import { INVALID_HANDLE, READ_FAILED } from './types.js';

const READ_CHUNK_SIZE = 64 * 1024;
const POLL_INTERVAL_MS = 50;

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Read a whole file through the device. A non-blocking device answers 0
 * until the download lands, so 0 only means end of file once fetched.
 */
export async function readWholeFile(
  device: ResourceCacheDevice,
  fileName: string,
  bulk: boolean,
  pollIntervalMs: number = POLL_INTERVAL_MS
): Promise<Buffer> {
  const handle = bulk ? device.openBulk(fileName).handle : device.open(fileName, true);
  if (handle === INVALID_HANDLE) {
    throw new Error(`No such resource file: ${fileName}`);
  }

  const chunks: Buffer[] = [];
  let offset = 0;

  try {
    for (;;) {
      const buffer = Buffer.alloc(READ_CHUNK_SIZE);
      const n = bulk
        ? await device.readBulk(handle, offset, buffer, buffer.length)
        : await device.read(handle, buffer, buffer.length);

      if (n === READ_FAILED) {
        throw new Error(`Could not read ${fileName}`);
      }

      if (n === 0) {
        if (device.getHandleInfo(handle)?.status === 'fetched') break;
        await sleep(pollIntervalMs);
        continue;
      }

      chunks.push(buffer.subarray(0, n));
      offset += n;
    }
  } finally {
    if (bulk) {
      device.closeBulk(handle);
    } else {
      device.close(handle);
    }
  }

  return Buffer.concat(chunks);
}

function startStatusServer(feed: DownloadStatusFeed, port: number): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer((_req, res) => {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end(`Connect with a WebSocket client to ${STATUS_FEED_PATH}\n`);
    });
    feed.attach(server);
    server.once('error', reject);
    server.listen(port, () => resolve(server));
  });
}

async function main(): Promise<void> {
  const options = new CliOptions();

  if (options.help) {
    console.log(options.getUsageMessage());
    return;
  }

  if (!options.isValid() || options.manifestPath === null || options.virtualPath === null) {
    console.error(options.getErrorMessage());
    console.error(options.getUsageMessage());
    process.exit(1);
  }

  const config = loadConfig();
  const lookup = ManifestResourceLookup.fromFile(options.manifestPath, { debug: config.debug });
  const cache = new ResourceCache({ cacheDir: config.cacheDir, debug: config.debug });
  const vfs = new VirtualFileSystem(new LocalDevice({ debug: config.debug }));
  const downloader = new HttpClient({
    maxConcurrent: config.maxDownloads,
    timeout: config.requestTimeoutMs,
    retries: config.downloadRetries,
    debug: config.debug
  });

  const session = new SessionContext();
  if (config.connectionToken) {
    session.setData(SessionKeys.CONNECTION_TOKEN, config.connectionToken);
  }
  session.setData(SessionKeys.LOAD_CALLER, 'rcd');
  session.setData(SessionKeys.LOAD_START_TIME, String(Date.now()));

  const statusEvents = getSharedDownloadStatus();
  const devices = mountResourceCacheDevice(vfs, cache, {
    lookup,
    downloader,
    session,
    statusEvents,
    handleCapacity: config.handleCapacity,
    debug: config.debug,
    logCallback: (type, message) => {
      if (type === 'download' || type === 'downloaded') {
        console.error(`⬇️  ${message}`);
      } else {
        console.error(`⚠️  ${message}`);
      }
    }
  });

  let feed: DownloadStatusFeed | null = null;
  let server: http.Server | null = null;
  if (options.statusPort !== null) {
    feed = new DownloadStatusFeed(statusEvents, { debug: config.debug });
    server = await startStatusServer(feed, options.statusPort);
    console.error(`📡 Download status at ws://localhost:${options.statusPort}${STATUS_FEED_PATH}`);
  }

  const device = options.nonBlocking ? devices.nonBlocking : devices.blocking;
  const fileName = `${device.getPathPrefix()}${options.virtualPath}`;

  try {
    const contents = await readWholeFile(device, fileName, options.bulk);
    if (options.outFile) {
      fs.writeFileSync(options.outFile, contents);
      console.error(`✅ Wrote ${contents.length} bytes to ${options.outFile}`);
    } else {
      process.stdout.write(contents);
    }
  } catch (err) {
    const detail = session.getData(SessionKeys.FETCH_ERROR);
    if (detail) {
      console.error(detail);
    }
    throw err;
  } finally {
    feed?.close();
    server?.close();
  }
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath.endsWith(scriptPath) || scriptPath.endsWith('rcd') || scriptPath.endsWith('rcd.js'))) {
  main().catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Fatal error: ${message}\n`);
    if (process.env.DEBUG === '1' && err instanceof Error) {
      console.error(err.stack);
    }
    process.exit(1);
  });
}

export { main };
