/**
 * HTTP file transport
 *
 * Downloads whole files to disk over a small number of transfer slots.
 * Requests waiting for a slot start in weight order (higher first, FIFO
 * among equal weights); a request's weight can change while it waits.
 */

import https from 'https';
import http from 'http';
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream';
import type {
  DownloadCallback,
  DownloadOptions,
  DownloadRequest,
  DownloadResult,
  DownloaderStats,
  FileDownloader
} from './types.js';

export interface HttpClientOptions {
  maxConcurrent?: number;
  timeout?: number;        // Socket idle timeout per attempt (ms)
  retries?: number;        // Extra attempts after the first
  retryDelayMs?: number;
  maxRedirects?: number;
  debug?: boolean;
}

export const DEFAULT_REQUEST_WEIGHT = 32;

export class HttpStatusError extends Error {
  statusCode: number;

  constructor(statusCode: number) {
    super(`HTTP ${statusCode}`);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

class QueuedDownload implements DownloadRequest {
  readonly url: string;
  readonly outPath: string;
  readonly options: DownloadOptions;
  readonly onComplete: DownloadCallback;
  readonly seq: number;
  private weight: number;
  private client: HttpClient;
  started = false;

  constructor(
    client: HttpClient,
    seq: number,
    url: string,
    outPath: string,
    options: DownloadOptions,
    onComplete: DownloadCallback
  ) {
    this.client = client;
    this.seq = seq;
    this.url = url;
    this.outPath = outPath;
    this.options = options;
    this.onComplete = onComplete;
    this.weight = options.weight ?? DEFAULT_REQUEST_WEIGHT;
  }

  getRequestWeight(): number {
    return this.weight;
  }

  setRequestWeight(weight: number): void {
    if (weight === this.weight) return;
    this.weight = weight;
    this.client.onWeightChanged(this);
  }
}

export class HttpClient implements FileDownloader {
  private maxConcurrent: number;
  private timeout: number;
  private retries: number;
  private retryDelayMs: number;
  private maxRedirects: number;
  private debug: boolean;

  private queue: QueuedDownload[] = [];
  private active = 0;
  private nextSeq = 0;

  public requestCount = 0;
  public totalBytesDownloaded = 0;
  public failureCount = 0;

  constructor(options: HttpClientOptions = {}) {
    this.maxConcurrent = options.maxConcurrent || 4;
    this.timeout = options.timeout || 30000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.debug = options.debug || false;
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[HttpClient] ${msg}`);
  }

  downloadFile(
    url: string,
    outPath: string,
    options: DownloadOptions,
    onComplete: DownloadCallback
  ): DownloadRequest {
    const request = new QueuedDownload(this, this.nextSeq++, url, outPath, options, onComplete);
    this.queue.push(request);
    this.log(`Queued ${url} (weight ${request.getRequestWeight()})`);
    this._pump();
    return request;
  }

  /** @internal */
  onWeightChanged(request: QueuedDownload): void {
    if (request.started) {
      this.log(`Weight of running ${request.url} set to ${request.getRequestWeight()}`);
    } else {
      this.log(`Re-weighted queued ${request.url} to ${request.getRequestWeight()}`);
    }
  }

  private _takeNext(): QueuedDownload | null {
    if (this.queue.length === 0) return null;

    let best = 0;
    for (let i = 1; i < this.queue.length; i++) {
      const candidate = this.queue[i];
      const current = this.queue[best];
      const cw = candidate.getRequestWeight();
      const bw = current.getRequestWeight();
      if (cw > bw || (cw === bw && candidate.seq < current.seq)) {
        best = i;
      }
    }

    return this.queue.splice(best, 1)[0];
  }

  private _pump(): void {
    while (this.active < this.maxConcurrent) {
      const request = this._takeNext();
      if (!request) return;

      request.started = true;
      this.active++;
      this.requestCount++;

      this._run(request).then(
        result => this._finish(request, result),
        err => this._finish(request, { ok: false, error: (err as Error).message, size: 0 })
      );
    }
  }

  private _finish(request: QueuedDownload, result: DownloadResult): void {
    this.active--;
    if (!result.ok) this.failureCount++;

    try {
      request.onComplete(result);
    } catch (err) {
      this.log(`Completion handler for ${request.url} threw: ${(err as Error).message}`);
    }

    this._pump();
  }

  private async _run(request: QueuedDownload): Promise<DownloadResult> {
    let lastError: Error = new Error('Download failed');

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const size = await this._downloadWithRedirects(request, request.url, 0);
        this.log(`Finished ${request.url} (${size} bytes)`);
        return { ok: true, error: null, size };
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        this.log(`Attempt ${attempt + 1} for ${request.url} failed: ${lastError.message}`);

        // No retry on 4xx
        if (lastError instanceof HttpStatusError && lastError.statusCode < 500) break;
        if (attempt < this.retries) await this._sleep(this.retryDelayMs * (attempt + 1));
      }
    }

    return { ok: false, error: lastError.message, size: 0 };
  }

  private _downloadWithRedirects(
    request: QueuedDownload,
    url: string,
    redirectCount: number
  ): Promise<number> {
    return new Promise((resolve, reject) => {
      if (redirectCount > this.maxRedirects) {
        reject(new Error(`Too many redirects for ${request.url}`));
        return;
      }

      const protocol = url.startsWith('https') ? https : http;
      const req = protocol.get(url, { headers: request.options.headers ?? {}, timeout: this.timeout }, (res) => {
        // Follow redirects
        if (res.statusCode && res.statusCode >= 300 && res.statusCode < 400 && res.headers.location) {
          const newUrl = new URL(res.headers.location, url).toString();
          this.log(`Redirect ${res.statusCode}: ${url} -> ${newUrl}`);
          res.resume();
          this._downloadWithRedirects(request, newUrl, redirectCount + 1).then(resolve, reject);
          return;
        }

        if (res.statusCode !== 200) {
          res.resume();
          reject(new HttpStatusError(res.statusCode ?? 0));
          return;
        }

        const total = parseInt(res.headers['content-length'] || '0', 10) || 0;
        // Per-request temp file; concurrent requests may share an outPath
        const partPath = `${request.outPath}.${request.seq}.part`;
        let received = 0;

        try {
          fs.mkdirSync(path.dirname(request.outPath), { recursive: true });
        } catch (err) {
          res.resume();
          reject(err);
          return;
        }

        res.on('data', (chunk: Buffer) => {
          received += chunk.length;
          this.totalBytesDownloaded += chunk.length;
          request.options.onProgress?.({ downloadNow: received, downloadTotal: total });
        });

        pipeline(res, fs.createWriteStream(partPath), (err) => {
          if (err) {
            fs.rm(partPath, { force: true }, () => reject(err));
            return;
          }

          try {
            fs.renameSync(partPath, request.outPath);
            resolve(received);
          } catch (renameErr) {
            reject(renameErr);
          }
        });
      });

      req.on('error', reject);
      req.on('timeout', () => {
        req.destroy(new Error('Request timeout'));
      });
    });
  }

  private _sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getStats(): DownloaderStats {
    return {
      requests: this.requestCount,
      bytesDownloaded: this.totalBytesDownloaded,
      active: this.active,
      queued: this.queue.length,
      failures: this.failureCount
    };
  }
}
