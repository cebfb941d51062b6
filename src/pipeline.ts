import * as crypto from 'crypto';
import { Settings } from './config/settings';
import { addDays, isDateKey, toDateKey } from './core/dates';
import { StaleDataError, toError } from './core/errors';
import { HistoryMergeEngine } from './core/history';
import { PipelineLogger } from './core/logger';
import { joinCatalog, TechnologyCatalog } from './core/registry';
import { resolveCanonical } from './core/resolver';
import { stageGithubRecord, stagePypiRecord, StageResult } from './core/staging';
import { MetricsTransformer } from './core/transformer';
import { computeTrends, TrendResultSet } from './core/trends';
import { DateKey, ExtractedRecord, RawRecord, RunSummary, SourceName } from './core/types';
import { HistoryStore, RawRecordSource, TrendStore } from './store/types';

export interface PipelineDependencies {
  source: RawRecordSource;
  history: HistoryStore;
  trends: TrendStore;
  catalog: TechnologyCatalog;
  settings: Pick<Settings, 'retentionDays' | 'mergeConcurrency' | 'tiers' | 'requireFreshData'>;
  runId?: string;
  logger?: PipelineLogger;
  now?: () => Date;
  dryRun?: boolean;
}

export interface PipelineResult {
  summary: RunSummary;
  trends: TrendResultSet;
}

interface StagedSource<T extends ExtractedRecord> {
  raw: number;
  rejected: number;
  /** Accepted records extracted on the processing date. */
  fresh: number;
  records: T[];
}

export function generateRunId(processingDate: DateKey): string {
  return `run_${processingDate.replace(/-/g, '')}_${Date.now()}_${crypto.randomBytes(4).toString('hex')}`;
}

export class MetricsPipeline {
  public readonly runId: string;
  private logger: PipelineLogger;
  private transformer: MetricsTransformer;
  private now: () => Date;

  constructor(private deps: PipelineDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.runId = deps.runId ?? generateRunId(toDateKey(this.now()));
    this.logger = deps.logger ?? new PipelineLogger(this.runId);
    this.transformer = new MetricsTransformer(deps.settings.tiers);
  }

  /**
   * Runs one batch: stage and resolve both sources, join the catalog, derive
   * metrics, merge into history and recompute trends. Raw payloads extracted
   * after the processing date are ignored, so a past date can be replayed.
   * Fails with StaleDataError, before writing, when either source has no
   * payload extracted on the processing date and fresh data is required.
   */
  public async execute(processingDate: DateKey = toDateKey(this.now())): Promise<PipelineResult> {
    if (!isDateKey(processingDate)) {
      throw new RangeError(`Invalid processing date "${processingDate}", expected YYYY-MM-DD`);
    }
    const until = new Date(`${addDays(processingDate, 1)}T00:00:00.000Z`);
    const { history, trends, catalog, settings } = this.deps;

    try {
      this.logger.logPhaseStart('extract');
      const github = await this.stage('github', processingDate, until, stageGithubRecord);
      const pypi = await this.stage('pypi', processingDate, until, stagePypiRecord);
      this.logger.logPhaseEnd('extract', github.records.length + pypi.records.length);

      const freshRecords = { github: github.fresh, pypi: pypi.fresh };
      if (github.fresh === 0 || pypi.fresh === 0) {
        if (settings.requireFreshData) {
          throw new StaleDataError(processingDate, freshRecords);
        }
        this.logger.warn('No raw data extracted on the processing date; reusing earlier snapshots', {
          processing_date: processingDate,
          fresh_records: freshRecords,
        });
      }

      this.logger.logPhaseStart('resolve');
      const githubResolved = resolveCanonical(github.records);
      const pypiResolved = resolveCanonical(pypi.records);
      for (const [source, keys] of [
        ['github', githubResolved.ambiguous],
        ['pypi', pypiResolved.ambiguous],
      ] as const) {
        for (const key of keys) {
          this.logger.warn('Ambiguous duplicate snapshot resolved by tie-break', { source, natural_key: key });
        }
      }
      this.logger.logPhaseEnd('resolve', githubResolved.snapshots.size + pypiResolved.snapshots.size);

      this.logger.logPhaseStart('join');
      const unified = joinCatalog(catalog, githubResolved.snapshots, pypiResolved.snapshots);
      this.logger.logPhaseEnd('join', unified.length);

      this.logger.logPhaseStart('transform');
      const derived = this.transformer.transformBatch(unified);
      for (const technology of derived.skipped) {
        this.logger.warn('Technology not observed in either source; skipped', { technology });
      }
      this.logger.logPhaseEnd('transform', derived.rows.length);

      this.logger.logPhaseStart('load history');
      const merger = new HistoryMergeEngine(history, this.logger, {
        concurrency: settings.mergeConcurrency,
        now: this.now,
      });
      const merged = await merger.merge(derived.rows);
      this.logger.logPhaseEnd('load history', merged.inserted.length + merged.replaced.length);

      this.logger.logPhaseStart('trends');
      const trendRows = computeTrends(await history.query(), {
        processingDate,
        retentionDays: settings.retentionDays,
      });
      this.logger.logPhaseEnd('trends', trendRows.length);

      this.logger.logPhaseStart('load trends');
      await trends.replaceAll(trendRows);
      this.logger.logPhaseEnd('load trends', trendRows.length);

      const summary = this.logger.finalizeRun({
        run_id: this.runId,
        processing_date: processingDate,
        dry_run: this.deps.dryRun ?? false,
        raw_records: { github: github.raw, pypi: pypi.raw },
        rejected_records: { github: github.rejected, pypi: pypi.rejected },
        fresh_records: freshRecords,
        ambiguous_duplicates: {
          github: githubResolved.ambiguous.length,
          pypi: pypiResolved.ambiguous.length,
        },
        canonical_snapshots: {
          github: githubResolved.snapshots.size,
          pypi: pypiResolved.snapshots.size,
        },
        unified_rows: unified.length,
        derived_rows: derived.rows.length,
        skipped_technologies: derived.skipped,
        history_inserted: merged.inserted.length,
        history_replaced: merged.replaced.length,
        trend_rows: trendRows.length,
      });

      return { summary, trends: new TrendResultSet(trendRows) };
    } catch (error) {
      this.logger.logError(toError(error), { processing_date: processingDate });
      throw error;
    }
  }

  private async stage<T extends ExtractedRecord>(
    source: SourceName,
    processingDate: DateKey,
    until: Date,
    parse: (raw: RawRecord) => StageResult<T>
  ): Promise<StagedSource<T>> {
    const staged: StagedSource<T> = { raw: 0, rejected: 0, fresh: 0, records: [] };
    for await (const raw of this.deps.source.read(source, until)) {
      staged.raw++;
      const result = parse(raw);
      if (result.ok) {
        staged.records.push(result.record);
        if (toDateKey(result.record.extracted_at) === processingDate) staged.fresh++;
      } else {
        staged.rejected++;
        this.logger.warn('Rejected unparseable raw payload', {
          source,
          natural_key: result.natural_key,
          reason: result.reason,
        });
      }
    }
    return staged;
  }
}
