/**
 * Download status feed
 * WebSocket relay of download progress events at /ws/downloads
 */

import { WebSocketServer, WebSocket } from 'ws';
import http from 'http';
import crypto from 'crypto';
import type { DownloadStatus, DownloadStatusEvents } from './download-status.js';

export const STATUS_FEED_PATH = '/ws/downloads';

export type StatusFeedMessage =
  | { type: 'hello'; clientId: string }
  | ({ type: 'download-status' } & DownloadStatus);

export class DownloadStatusFeed {
  private wss: WebSocketServer | null = null;
  private events: DownloadStatusEvents;
  private unsubscribe: (() => void) | null = null;
  private clientIds = new Map<WebSocket, string>();
  private debug: boolean;

  constructor(events: DownloadStatusEvents, options: { debug?: boolean } = {}) {
    this.events = events;
    this.debug = options.debug || false;
  }

  private log(msg: string): void {
    if (this.debug) console.error(`[StatusFeed] ${msg}`);
  }

  get clientCount(): number {
    return this.clientIds.size;
  }

  /**
   * Attach the feed to an existing HTTP server
   */
  attach(server: http.Server): void {
    const wss = new WebSocketServer({ noServer: true });
    this.wss = wss;

    wss.on('connection', (ws: WebSocket) => {
      const clientId = crypto.randomBytes(8).toString('hex');
      this.clientIds.set(ws, clientId);
      this.send(ws, { type: 'hello', clientId });
      this.log(`client ${clientId} connected`);

      ws.on('close', () => {
        this.clientIds.delete(ws);
      });

      ws.on('error', (err: Error) => {
        this.log(`client ${clientId} error: ${err.message}`);
        this.clientIds.delete(ws);
      });
    });

    server.on('upgrade', (request, socket, head) => {
      const pathname = new URL(request.url || '', `http://${request.headers.host}`).pathname;

      if (pathname === STATUS_FEED_PATH) {
        wss.handleUpgrade(request, socket, head, (ws) => {
          wss.emit('connection', ws, request);
        });
      }
      // Other paths are left to other upgrade handlers
    });

    this.unsubscribe = this.events.on((status) => this.broadcast(status));
    this.log(`attached at ${STATUS_FEED_PATH}`);
  }

  private send(ws: WebSocket, message: StatusFeedMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private broadcast(status: DownloadStatus): void {
    const message: StatusFeedMessage = { type: 'download-status', ...status };
    for (const ws of this.clientIds.keys()) {
      this.send(ws, message);
    }
  }

  close(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }

    if (this.wss) {
      for (const client of this.wss.clients) {
        if (client.readyState === WebSocket.OPEN) {
          client.close();
        }
      }
      this.wss.close();
      this.wss = null;
    }
    this.clientIds.clear();
  }
}
