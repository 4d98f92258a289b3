/**
 * Session context: a shared key/value bag of process-wide facts.
 * The device reads the connection token and loader provenance from it and
 * writes fetch failure descriptions into it.
 */

export const SessionKeys = {
  CONNECTION_TOKEN: 'connectionToken',
  LOAD_CALLER: 'loader:caller',
  LOAD_START_TIME: 'loader:startTime',
  FETCH_ERROR: 'cacheDevice:error'
} as const;

export class SessionContext {
  private data = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.data.set(key, value);
    }
  }

  getData(key: string): string | null {
    return this.data.get(key) ?? null;
  }

  setData(key: string, value: string): void {
    this.data.set(key, value);
  }

  clearData(key: string): void {
    this.data.delete(key);
  }
}
