import { Pool, PoolClient } from 'pg';
import Cursor from 'pg-cursor';
import { from as copyFrom } from 'pg-copy-streams';
import { createObjectCsvStringifier } from 'csv-writer';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { HISTORY_TABLE, RAW_GITHUB_TABLE, RAW_PYPI_TABLE, TRENDS_TABLE } from '../config/database';
import { MergeConflictError, toError } from '../core/errors';
import { DateKey, HistoryQuery, HistoryRow, RawRecord, SourceName, TrendRow } from '../core/types';
import { HistoryStore, HistoryTransaction, RawRecordSource, TrendStore, UpsertOutcome } from './types';

const CURSOR_BATCH_SIZE = 500;

export const HISTORY_COLUMNS = [
  'technology_name',
  'snapshot_date',
  'github_repo',
  'pypi_package',
  'github_stars',
  'github_forks',
  'github_watchers',
  'pypi_downloads_daily',
  'pypi_downloads_weekly',
  'pypi_downloads_monthly',
  'open_issues',
  'contributors_count',
  'github_releases',
  'pypi_release_count',
  'weekly_to_daily_ratio',
  'monthly_to_weekly_ratio',
  'fork_to_star_ratio',
  'stars_per_contributor',
  'popularity_tier',
  'usage_tier',
  'github_created_at',
  'github_updated_at',
  'latest_release_published_at',
  'latest_release_upload_time',
  'last_updated_at',
  'stars_change',
  'forks_change',
  'downloads_change',
  'issues_change',
  'history_created_at',
] as const satisfies ReadonlyArray<keyof HistoryRow>;

export const TREND_COLUMNS = [
  'technology_name',
  'snapshot_date',
  'github_stars',
  'github_forks',
  'pypi_downloads_daily',
  'stars_7day_avg',
  'downloads_7day_avg',
  'stars_30day_avg',
  'daily_popularity_rank',
  'stars_7day_growth_pct',
  'stars_30day_growth_pct',
  'downloads_7day_growth_pct',
  'stars_trend_indicator',
  'downloads_trend_indicator',
] as const satisfies ReadonlyArray<keyof TrendRow>;

// BIGINT arrives as a string from pg; DATE is selected as text.
const bigint = z
  .union([z.string(), z.number()])
  .nullable()
  .transform((v) => (v === null ? null : Number(v)));
const requiredNumber = z.union([z.string(), z.number()]).transform((v) => Number(v));
const timestamp = z.date().nullable();

const historyDbRow = z.object({
  technology_name: z.string(),
  snapshot_date: z.string(),
  github_repo: z.string(),
  pypi_package: z.string(),
  github_stars: bigint,
  github_forks: bigint,
  github_watchers: bigint,
  pypi_downloads_daily: bigint,
  pypi_downloads_weekly: bigint,
  pypi_downloads_monthly: bigint,
  open_issues: bigint,
  contributors_count: bigint,
  github_releases: bigint,
  pypi_release_count: bigint,
  weekly_to_daily_ratio: requiredNumber,
  monthly_to_weekly_ratio: requiredNumber,
  fork_to_star_ratio: requiredNumber,
  stars_per_contributor: requiredNumber,
  popularity_tier: z.enum(['Very Popular', 'Popular', 'Moderate', 'Emerging']),
  usage_tier: z.enum(['High Usage', 'Medium Usage', 'Low Usage', 'Minimal Usage']),
  github_created_at: timestamp,
  github_updated_at: timestamp,
  latest_release_published_at: timestamp,
  latest_release_upload_time: timestamp,
  last_updated_at: z.date(),
  stars_change: bigint,
  forks_change: bigint,
  downloads_change: bigint,
  issues_change: bigint,
  history_created_at: z.date(),
});

const rawDbRow = z.object({
  natural_key: z.string(),
  extracted_at: z.date(),
  raw_data: z.unknown(),
});

const HISTORY_SELECT = HISTORY_COLUMNS.map((c) =>
  c === 'snapshot_date' ? `to_char(snapshot_date, 'YYYY-MM-DD') AS snapshot_date` : c
).join(', ');

async function* readCursor(client: PoolClient, text: string, values: unknown[]): AsyncGenerator<unknown> {
  const cursor = client.query(new Cursor(text, values));
  try {
    for (;;) {
      const rows: unknown[] = await cursor.read(CURSOR_BATCH_SIZE);
      if (rows.length === 0) return;
      yield* rows;
    }
  } finally {
    await cursor.close();
  }
}

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * BEGIN/COMMIT around `work`, ROLLBACK on failure. Always releases the client;
 * a client whose ROLLBACK failed is released with that error so the pool
 * discards it, and the caller still sees the error `work` raised.
 */
export async function withTransaction<C extends TransactionClient, T>(
  client: C,
  work: (client: C) => Promise<T>
): Promise<T> {
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = toError(rollbackError);
    }
    throw error;
  } finally {
    client.release(broken);
  }
}

export class PgHistoryStore implements HistoryStore {
  constructor(private pool: Pool) {}

  public async transaction<T>(technology: string, work: (tx: HistoryTransaction) => Promise<T>): Promise<T> {
    return withTransaction(await this.pool.connect(), async (client) => {
      const lock = await client.query<{ locked: boolean }>(
        `SELECT pg_try_advisory_xact_lock(hashtext($1), hashtext($2)) AS locked`,
        [HISTORY_TABLE, technology]
      );
      if (!lock.rows[0]?.locked) {
        throw new MergeConflictError([technology], 'history key is locked by a concurrent run');
      }
      return work(this.bindTransaction(client, technology));
    });
  }

  private bindTransaction(client: PoolClient, technology: string): HistoryTransaction {
    return {
      findPrior: async (snapshotDate: DateKey) => {
        const result = await client.query(
          `SELECT ${HISTORY_SELECT} FROM ${HISTORY_TABLE}
           WHERE technology_name = $1 AND snapshot_date < $2::date
           ORDER BY snapshot_date DESC
           LIMIT 1`,
          [technology, snapshotDate]
        );
        return result.rows.length ? historyDbRow.parse(result.rows[0]) : null;
      },

      upsert: async (row: HistoryRow): Promise<UpsertOutcome> => {
        if (row.technology_name !== technology) {
          throw new Error(`Row for ${row.technology_name} written inside transaction for ${technology}`);
        }
        const placeholders = HISTORY_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
        const updates = HISTORY_COLUMNS.filter((c) => c !== 'technology_name' && c !== 'snapshot_date')
          .map((c) => `${c} = EXCLUDED.${c}`)
          .join(', ');

        const result = await client.query<{ inserted: boolean }>(
          `INSERT INTO ${HISTORY_TABLE} (${HISTORY_COLUMNS.join(', ')})
           VALUES (${placeholders})
           ON CONFLICT (technology_name, snapshot_date) DO UPDATE SET ${updates}
           RETURNING (xmax = 0) AS inserted`,
          HISTORY_COLUMNS.map((c) => row[c])
        );
        return result.rows[0]?.inserted ? 'inserted' : 'replaced';
      },
    };
  }

  public async query(filter: HistoryQuery = {}): Promise<HistoryRow[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    if (filter.technology !== undefined) {
      values.push(filter.technology);
      conditions.push(`technology_name = $${values.length}`);
    }
    if (filter.from !== undefined) {
      values.push(filter.from);
      conditions.push(`snapshot_date >= $${values.length}::date`);
    }
    if (filter.to !== undefined) {
      values.push(filter.to);
      conditions.push(`snapshot_date <= $${values.length}::date`);
    }
    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';

    const client = await this.pool.connect();
    try {
      const rows: HistoryRow[] = [];
      const text = `SELECT ${HISTORY_SELECT} FROM ${HISTORY_TABLE} ${where} ORDER BY technology_name, snapshot_date`;
      for await (const raw of readCursor(client, text, values)) {
        rows.push(historyDbRow.parse(raw));
      }
      return rows;
    } finally {
      client.release();
    }
  }

  public async latest(): Promise<HistoryRow[]> {
    const result = await this.pool.query(
      `SELECT DISTINCT ON (technology_name) ${HISTORY_SELECT} FROM ${HISTORY_TABLE}
       ORDER BY technology_name, snapshot_date DESC`
    );
    return result.rows.map((row: unknown) => historyDbRow.parse(row));
  }
}

export class PgTrendStore implements TrendStore {
  constructor(private pool: Pool) {}

  public async replaceAll(rows: readonly TrendRow[]): Promise<void> {
    const stringifier = createObjectCsvStringifier({
      header: TREND_COLUMNS.map((c) => ({ id: c, title: c })),
    });
    const records = rows.map((row) => Object.fromEntries(TREND_COLUMNS.map((c) => [c, row[c]])));

    await withTransaction(await this.pool.connect(), async (client) => {
      await client.query(`DELETE FROM ${TRENDS_TABLE}`);
      if (records.length) {
        const stream = client.query(
          copyFrom(`COPY ${TRENDS_TABLE} (${TREND_COLUMNS.join(',')}) FROM STDIN WITH (FORMAT csv, HEADER false)`)
        );
        await pipeline(Readable.from([stringifier.stringifyRecords(records)]), stream);
      }
    });
  }
}

const RAW_QUERIES: Record<SourceName, string> = {
  github: `SELECT repo_name AS natural_key, extracted_at, raw_data FROM ${RAW_GITHUB_TABLE}`,
  pypi: `SELECT package_name AS natural_key, extracted_at, raw_data FROM ${RAW_PYPI_TABLE}`,
};

export class PgRawRecordSource implements RawRecordSource {
  constructor(private pool: Pool) {}

  public async *read(source: SourceName, until?: Date): AsyncGenerator<RawRecord> {
    const values: unknown[] = [];
    let text = RAW_QUERIES[source];
    if (until) {
      values.push(until);
      text += ' WHERE extracted_at < $1';
    }

    const client = await this.pool.connect();
    try {
      for await (const raw of readCursor(client, text, values)) {
        const row = rawDbRow.parse(raw);
        yield { natural_key: row.natural_key, extracted_at: row.extracted_at, raw_data: row.raw_data };
      }
    } finally {
      client.release();
    }
  }
}
