import { MergeConflictError } from '../core/errors';
import { DateKey, HistoryQuery, HistoryRow, TrendRow } from '../core/types';
import { HistoryStore, HistoryTransaction, TrendStore, UpsertOutcome } from './types';

function byTechnologyAndDate(a: HistoryRow, b: HistoryRow): number {
  if (a.technology_name !== b.technology_name) return a.technology_name < b.technology_name ? -1 : 1;
  if (a.snapshot_date === b.snapshot_date) return 0;
  return a.snapshot_date < b.snapshot_date ? -1 : 1;
}

/**
 * Process-local history store. Backs dry runs (seeded from the database) and
 * the test suite.
 */
export class MemoryHistoryStore implements HistoryStore {
  private rows = new Map<string, Map<DateKey, HistoryRow>>();
  private locked = new Set<string>();

  constructor(seed: Iterable<HistoryRow> = []) {
    for (const row of seed) {
      this.bucket(row.technology_name).set(row.snapshot_date, { ...row });
    }
  }

  private bucket(technology: string): Map<DateKey, HistoryRow> {
    let bucket = this.rows.get(technology);
    if (!bucket) {
      bucket = new Map();
      this.rows.set(technology, bucket);
    }
    return bucket;
  }

  public async transaction<T>(technology: string, work: (tx: HistoryTransaction) => Promise<T>): Promise<T> {
    if (this.locked.has(technology)) {
      throw new MergeConflictError([technology], 'history key is locked by another writer');
    }
    this.locked.add(technology);

    const committed = this.rows.get(technology) ?? new Map<DateKey, HistoryRow>();
    const pending = new Map<DateKey, HistoryRow>();

    const tx: HistoryTransaction = {
      findPrior: async (snapshotDate) => {
        let prior: HistoryRow | null = null;
        for (const source of [committed, pending]) {
          for (const row of source.values()) {
            if (row.snapshot_date < snapshotDate && (!prior || row.snapshot_date > prior.snapshot_date)) {
              prior = row;
            }
          }
        }
        return prior ? { ...prior } : null;
      },
      upsert: async (row): Promise<UpsertOutcome> => {
        if (row.technology_name !== technology) {
          throw new Error(`Row for ${row.technology_name} written inside transaction for ${technology}`);
        }
        const existed = committed.has(row.snapshot_date) || pending.has(row.snapshot_date);
        pending.set(row.snapshot_date, { ...row });
        return existed ? 'replaced' : 'inserted';
      },
    };

    try {
      const result = await work(tx);
      const bucket = this.bucket(technology);
      for (const [date, row] of pending) bucket.set(date, row);
      return result;
    } finally {
      this.locked.delete(technology);
    }
  }

  public async query(filter: HistoryQuery = {}): Promise<HistoryRow[]> {
    const result: HistoryRow[] = [];
    for (const [technology, bucket] of this.rows) {
      if (filter.technology !== undefined && technology !== filter.technology) continue;
      for (const row of bucket.values()) {
        if (filter.from !== undefined && row.snapshot_date < filter.from) continue;
        if (filter.to !== undefined && row.snapshot_date > filter.to) continue;
        result.push({ ...row });
      }
    }
    return result.sort(byTechnologyAndDate);
  }

  public async latest(): Promise<HistoryRow[]> {
    const result: HistoryRow[] = [];
    for (const bucket of this.rows.values()) {
      let newest: HistoryRow | null = null;
      for (const row of bucket.values()) {
        if (!newest || row.snapshot_date > newest.snapshot_date) newest = row;
      }
      if (newest) result.push({ ...newest });
    }
    return result.sort(byTechnologyAndDate);
  }
}

export class MemoryTrendStore implements TrendStore {
  public rows: TrendRow[] = [];

  public async replaceAll(rows: readonly TrendRow[]): Promise<void> {
    this.rows = rows.map((row) => ({ ...row }));
  }
}
