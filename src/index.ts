import { createPool, initializeSchema } from './config/database';
import { loadSettings } from './config/settings';
import { toDateKey } from './core/dates';
import { PipelineLogger } from './core/logger';
import { loadCatalog } from './core/registry';
import { generateRunId, MetricsPipeline } from './pipeline';
import { MemoryHistoryStore, MemoryTrendStore } from './store/memory';
import { PgHistoryStore, PgRawRecordSource, PgTrendStore } from './store/postgres';

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const dateArg = args.find((arg) => arg.startsWith('--date='));
  const dryRun = args.includes('--dry-run');
  const initSchema = args.includes('--init-schema');

  const processingDate = dateArg ? dateArg.split('=')[1] : toDateKey(new Date());

  const settings = loadSettings();
  const catalog = loadCatalog(settings.catalogPath);
  const pool = createPool();

  console.log('\n===========================================');
  console.log('Technology Adoption Metrics - Daily Run');
  console.log('===========================================');
  console.log(`Processing date: ${processingDate}`);
  console.log(`Technologies: ${catalog.length}`);
  console.log(`Mode: ${dryRun ? 'dry run (nothing written)' : 'write'}`);
  console.log('===========================================\n');

  try {
    if (initSchema) {
      await initializeSchema(pool);
    }

    const pgHistory = new PgHistoryStore(pool);
    const history = dryRun ? new MemoryHistoryStore(await pgHistory.query()) : pgHistory;
    const trends = dryRun ? new MemoryTrendStore() : new PgTrendStore(pool);

    const runId = generateRunId(processingDate);
    const pipeline = new MetricsPipeline({
      source: new PgRawRecordSource(pool),
      history,
      trends,
      catalog,
      settings,
      runId,
      logger: new PipelineLogger(runId, { level: settings.logLevel, logDir: settings.logDir }),
      dryRun,
    });

    const result = await pipeline.execute(processingDate);

    const ranking = result.trends.ranking(processingDate);
    if (ranking.length) {
      console.log(`\nPopularity ranking for ${processingDate}:`);
      console.table(
        ranking.map((r) => ({
          Rank: r.daily_popularity_rank,
          Technology: r.technology_name,
          Stars: r.github_stars,
          '7d Growth %': r.stars_7day_growth_pct.toFixed(2),
          'Daily Downloads': r.pypi_downloads_daily,
          Trend: r.stars_trend_indicator,
        }))
      );
    }

    const current = await history.latest();
    if (current.length) {
      console.log('\nCurrent state:');
      console.table(
        current.map((r) => ({
          Technology: r.technology_name,
          'As of': r.snapshot_date,
          Popularity: r.popularity_tier,
          Usage: r.usage_tier,
        }))
      );
    }

    const { summary } = result;
    console.log('\nRun summary:');
    console.log(`  Fresh payloads: github ${summary.fresh_records.github}, pypi ${summary.fresh_records.pypi}`);
    console.log(`  History rows inserted: ${summary.history_inserted}`);
    console.log(`  History rows replaced: ${summary.history_replaced}`);
    console.log(`  Trend rows: ${summary.trend_rows}`);
    if (summary.skipped_technologies.length) {
      console.log(`  Skipped (no source data): ${summary.skipped_technologies.join(', ')}`);
    }
    return 0;
  } catch (error) {
    console.error('Error in main execution:', error);
    return 1;
  } finally {
    await pool.end();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
);
