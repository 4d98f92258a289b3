/**
 * Fetch Orchestrator
 *
 * Drives a handle from 'not-fetched' through 'fetching' to 'fetched' or
 * 'error'. The status field is the only coordination point: the caller
 * that sees 'not-fetched' flips it to 'fetching' before anything can yield,
 * so a second caller can only ever wait or poll, never start another fetch.
 */

import { createFetchSignal, type HandleData } from './handle-table.js';

/** Starts the transfer for a handle already marked 'fetching' */
export interface FetchStarter {
  start(data: HandleData): void;
}

// Re-reads the status after an await; the switch narrowing no longer holds
function isFetched(data: HandleData): boolean {
  return data.status === 'fetched';
}

export class FetchOrchestrator {
  private starter: FetchStarter;
  readonly blocking: boolean;

  constructor(starter: FetchStarter, blocking: boolean) {
    this.starter = starter;
    this.blocking = blocking;
  }

  /**
   * Resolves true once the handle is backed by fetched bytes. Blocking mode
   * waits for a running fetch; non-blocking mode answers immediately and
   * the caller polls.
   */
  async ensureFetched(data: HandleData): Promise<boolean> {
    switch (data.status) {
      case 'fetched':
        return true;

      case 'fetching':
        if (this.blocking && data.completion) {
          await data.completion.promise;
          return isFetched(data);
        }
        return false;

      case 'not-fetched': {
        const signal = createFetchSignal();
        data.completion = signal;
        data.status = 'fetching';

        this.starter.start(data);

        if (this.blocking) {
          await signal.promise;
          return isFetched(data);
        }
        return false;
      }

      case 'error':
      case 'empty':
        return false;
    }
  }
}
