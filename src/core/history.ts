import PQueue from 'p-queue';
import { MergeConflictError, StoreIntegrityError, toError } from './errors';
import { PipelineLogger } from './logger';
import { HistoryStore } from '../store/types';
import { DerivedMetricRow, HistoryRow, MergeResult } from './types';

export interface HistoryMergeOptions {
  concurrency?: number;
  now?: () => Date;
}

function change(current: number | null, previous: number | null): number | null {
  if (current === null || previous === null) return null;
  return current - previous;
}

/** Builds today's history row from the derived metrics and the technology's prior row. */
export function buildHistoryRow(today: DerivedMetricRow, prior: HistoryRow | null, createdAt: Date): HistoryRow {
  if (!prior) {
    return {
      ...today,
      stars_change: 0,
      forks_change: 0,
      downloads_change: 0,
      issues_change: 0,
      history_created_at: createdAt,
    };
  }

  return {
    ...today,
    stars_change: change(today.github_stars, prior.github_stars),
    forks_change: change(today.github_forks, prior.github_forks),
    downloads_change: change(today.pypi_downloads_daily, prior.pypi_downloads_daily),
    issues_change: change(today.open_issues, prior.open_issues),
    history_created_at: createdAt,
  };
}

export class HistoryMergeEngine {
  private queue: PQueue;
  private now: () => Date;

  constructor(
    private store: HistoryStore,
    private logger: PipelineLogger,
    options: HistoryMergeOptions = {}
  ) {
    this.queue = new PQueue({ concurrency: options.concurrency ?? 4 });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Upserts each row under its own per-technology transaction. Every
   * technology settles before the outcome is decided; any failure rejects
   * with the full list of rolled-back technologies.
   */
  public async merge(rows: readonly DerivedMetricRow[]): Promise<MergeResult> {
    const duplicates = [
      ...new Set(rows.map((r) => r.technology_name).filter((name, i, all) => all.indexOf(name) !== i)),
    ];
    if (duplicates.length) {
      throw new MergeConflictError(duplicates, 'technology appears more than once in one merge batch');
    }

    const createdAt = this.now();
    const result: MergeResult = { inserted: [], replaced: [] };
    const failures: Array<{ technology: string; error: Error }> = [];

    await Promise.all(
      rows.map((row) =>
        this.queue.add(async () => {
          try {
            const outcome = await this.store.transaction(row.technology_name, async (tx) => {
              const prior = await tx.findPrior(row.snapshot_date);
              return tx.upsert(buildHistoryRow(row, prior, createdAt));
            });
            result[outcome].push(row.technology_name);
          } catch (error) {
            const err = toError(error);
            this.logger.logError(err, { technology: row.technology_name, snapshot_date: row.snapshot_date });
            failures.push({ technology: row.technology_name, error: err });
          }
        })
      )
    );

    if (failures.length) {
      const conflicts = failures.filter((f) => f.error instanceof MergeConflictError).map((f) => f.technology);
      if (conflicts.length) {
        throw new MergeConflictError(conflicts, 'history key is locked by a concurrent run');
      }
      throw new StoreIntegrityError(failures);
    }

    result.inserted.sort();
    result.replaced.sort();
    return result;
  }
}
