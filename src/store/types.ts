import { DateKey, HistoryQuery, HistoryRow, RawRecord, SourceName, TrendRow } from '../core/types';

export type UpsertOutcome = 'inserted' | 'replaced';

/** Read-then-write view of one technology's history, committed atomically. */
export interface HistoryTransaction {
  /** Latest row strictly before `snapshotDate`, if any. */
  findPrior(snapshotDate: DateKey): Promise<HistoryRow | null>;
  upsert(row: HistoryRow): Promise<UpsertOutcome>;
}

export interface HistoryStore {
  /**
   * Runs `work` with exclusive access to `technology`'s rows. Writes become
   * visible only if `work` resolves; a technology already held by another
   * writer fails with MergeConflictError.
   */
  transaction<T>(technology: string, work: (tx: HistoryTransaction) => Promise<T>): Promise<T>;
  /** Rows ordered by technology_name, then snapshot_date. Date bounds are inclusive. */
  query(filter?: HistoryQuery): Promise<HistoryRow[]>;
  /** Current state: each technology's most recent row, ordered by technology_name. */
  latest(): Promise<HistoryRow[]>;
}

export interface TrendStore {
  /** Replaces the previous run's trend rows in one step. */
  replaceAll(rows: readonly TrendRow[]): Promise<void>;
}

export interface RawRecordSource {
  /** Raw payloads for `source` extracted strictly before `until`, when given. */
  read(source: SourceName, until?: Date): AsyncIterable<RawRecord>;
}
