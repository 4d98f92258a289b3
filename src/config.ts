/**
 * Environment configuration
 */

import path from 'path';
import { DEFAULT_HANDLE_CAPACITY } from './handle-table.js';

export interface ResourceCacheConfig {
  cacheDir: string;
  maxDownloads: number;
  handleCapacity: number;
  requestTimeoutMs: number;
  downloadRetries: number;
  connectionToken: string | null;
  debug: boolean;
}

export const DEFAULT_MAX_DOWNLOADS = 4;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_DOWNLOAD_RETRIES = 2;

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.error(`[config] Ignoring ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): ResourceCacheConfig {
  return {
    cacheDir: env.RCD_CACHE_DIR || path.join(process.cwd(), '.cache', 'resources'),
    maxDownloads: readInt(env, 'RCD_MAX_DOWNLOADS', DEFAULT_MAX_DOWNLOADS, 1),
    handleCapacity: readInt(env, 'RCD_HANDLE_CAPACITY', DEFAULT_HANDLE_CAPACITY, 1),
    requestTimeoutMs: readInt(env, 'RCD_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS, 1),
    downloadRetries: readInt(env, 'RCD_DOWNLOAD_RETRIES', DEFAULT_DOWNLOAD_RETRIES, 0),
    connectionToken: env.RCD_CONNECTION_TOKEN || null,
    debug: env.DEBUG === '1'
  };
}
