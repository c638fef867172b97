/**
 * In-memory snapshot cache for upstream records.
 * Staleness is checked lazily on read; a failed refresh never touches the snapshot.
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('record_cache');

export interface RecordSnapshot<T> {
  records: T[];
  /** Epoch ms at which the fetch that produced this snapshot completed */
  capturedAt: number;
}

export interface RecordCacheOptions<T> {
  fetchRecords: () => Promise<T[]>;
  now?: () => number;
}

export interface GetRecordsOptions {
  forceRefresh?: boolean;
}

export class RecordCache<T> {
  private snapshot: RecordSnapshot<T> | null = null;
  private inFlight: Promise<RecordSnapshot<T>> | null = null;
  private readonly fetchRecords: () => Promise<T[]>;
  private readonly now: () => number;

  constructor(options: RecordCacheOptions<T>) {
    this.fetchRecords = options.fetchRecords;
    this.now = options.now ?? Date.now;
  }

  peek(): RecordSnapshot<T> | null {
    return this.snapshot;
  }

  clear(): void {
    this.snapshot = null;
  }

  isFresh(ttlSeconds: number): boolean {
    const current = this.snapshot;
    if (!current || current.records.length === 0) return false;
    return this.now() - current.capturedAt < ttlSeconds * 1000;
  }

  async getRecords(ttlSeconds: number, options: GetRecordsOptions = {}): Promise<T[]> {
    return (await this.getSnapshot(ttlSeconds, options)).records;
  }

  /**
   * Same freshness rules as getRecords, but returns the snapshot the records
   * came from so callers see a matching capturedAt.
   */
  async getSnapshot(ttlSeconds: number, options: GetRecordsOptions = {}): Promise<RecordSnapshot<T>> {
    const current = this.snapshot;
    if (!options.forceRefresh && current && this.isFresh(ttlSeconds)) {
      logger.debug({ ageMs: this.now() - current.capturedAt }, 'Serving cached records');
      return current;
    }

    return this.refresh();
  }

  // Concurrent callers share one upstream fetch
  private refresh(): Promise<RecordSnapshot<T>> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const run = (async () => {
      const records = await this.fetchRecords();
      const next: RecordSnapshot<T> = { records, capturedAt: this.now() };
      this.snapshot = next;
      logger.info({ records: records.length }, 'Record cache refreshed');
      return next;
    })();

    this.inFlight = run;
    const release = () => {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    };
    void run.then(release, release);

    return run;
  }
}
