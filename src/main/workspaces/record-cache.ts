/**
 * Versioned in-memory view over records read from disk.
 *
 * The cache is either unloaded or holds the result of one complete read; it
 * is never patched in place. Reloads compare the fresh read against the
 * cached list field by field and in order. Only a real difference bumps the
 * version and reaches `onChanged`.
 */

import { AsyncLock } from '../actions/async-lock';

export interface CachedRecord {
  id: string;
  name: string;
  iconSignature: string;
  enabled: boolean;
  sortOrder: number | null;
}

export type CacheState<T> =
  | { status: 'unloaded' }
  | { status: 'loaded'; version: number; records: T[] };

export type RecordsChangedHandler<T> = (records: T[], version: number) => void;

export function haveRecordsChanged(previous: CachedRecord[], next: CachedRecord[]): boolean {
  if (previous.length !== next.length) return true;
  for (let i = 0; i < previous.length; i++) {
    const a = previous[i];
    const b = next[i];
    if (a.id !== b.id) return true;
    if (a.name !== b.name) return true;
    if (a.iconSignature !== b.iconSignature) return true;
    if (a.enabled !== b.enabled) return true;
    if (a.sortOrder !== b.sortOrder) return true;
  }
  return false;
}

export class RecordCache<T extends CachedRecord> {
  private state: CacheState<T> = { status: 'unloaded' };
  private inflight: Promise<T[]> | null = null;
  private readonly lock = new AsyncLock();

  constructor(
    private readonly read: () => Promise<T[]>,
    private readonly onChanged: RecordsChangedHandler<T>
  ) {}

  /** 0 while unloaded; starts at 1 after the first read. */
  get version(): number {
    return this.state.status === 'loaded' ? this.state.version : 0;
  }

  get isLoaded(): boolean {
    return this.state.status === 'loaded';
  }

  /**
   * Returns the cached records, loading them on first use. Concurrent first
   * calls share a single read.
   */
  async getRecords(): Promise<T[]> {
    if (this.state.status === 'loaded') return [...this.state.records];
    if (!this.inflight) {
      this.inflight = this.lock
        .run(async () => {
          if (this.state.status === 'loaded') return this.state.records;
          const records = await this.read();
          this.state = { status: 'loaded', version: 1, records };
          return records;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return [...(await this.inflight)];
  }

  /**
   * Re-reads the backing stores. Returns true when the records differed and
   * the version moved. An unloaded cache stays unloaded.
   */
  async reloadIfChanged(): Promise<boolean> {
    return this.lock.run(async () => {
      if (this.state.status !== 'loaded') return false;
      const next = await this.read();
      const current = this.state;
      if (current.status !== 'loaded') return false;
      if (!haveRecordsChanged(current.records, next)) return false;

      const version = current.version + 1;
      this.state = { status: 'loaded', version, records: next };
      this.onChanged([...next], version);
      return true;
    });
  }

  reset(): void {
    this.state = { status: 'unloaded' };
  }
}
