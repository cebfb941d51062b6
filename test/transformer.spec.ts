import { describe, expect, it } from 'vitest';
import { MetricsTransformer, safeRatio } from '../src/core/transformer';
import { Technology, UnifiedMetricRecord } from '../src/core/types';
import { githubSnapshot, pypiSnapshot } from './fixtures';

const airflow: Technology = { name: 'Apache Airflow', github_repo: 'apache/airflow', pypi_package: 'apache-airflow' };

function unified(overrides: Partial<UnifiedMetricRecord> = {}): UnifiedMetricRecord {
  const github = githubSnapshot();
  const pypi = pypiSnapshot();
  return { technology: airflow, github, pypi, last_updated_at: pypi.extracted_at, ...overrides };
}

describe('safeRatio', () => {
  it('returns 0 for zero, negative or missing denominators', () => {
    expect(safeRatio(10, 0)).toBe(0);
    expect(safeRatio(10, -5)).toBe(0);
    expect(safeRatio(10, null)).toBe(0);
    expect(safeRatio(null, 4)).toBe(0);
    expect(safeRatio(10, 4)).toBe(2.5);
  });
});

describe('MetricsTransformer', () => {
  const transformer = new MetricsTransformer();

  it('assigns popularity tiers with inclusive lower bounds', () => {
    expect(transformer.popularityTier(4999)).toBe('Emerging');
    expect(transformer.popularityTier(5000)).toBe('Moderate');
    expect(transformer.popularityTier(14999)).toBe('Moderate');
    expect(transformer.popularityTier(15000)).toBe('Popular');
    expect(transformer.popularityTier(30000)).toBe('Very Popular');
    expect(transformer.popularityTier(null)).toBe('Emerging');
  });

  it('assigns usage tiers with inclusive lower bounds', () => {
    expect(transformer.usageTier(99_999)).toBe('Minimal Usage');
    expect(transformer.usageTier(100_000)).toBe('Low Usage');
    expect(transformer.usageTier(1_000_000)).toBe('Medium Usage');
    expect(transformer.usageTier(10_000_000)).toBe('High Usage');
    expect(transformer.usageTier(null)).toBe('Minimal Usage');
  });

  it('honours configured thresholds', () => {
    const custom = new MetricsTransformer({ popularity: [10, 20, 30], usage: [1, 2, 3] });
    expect(custom.popularityTier(20)).toBe('Popular');
    expect(custom.usageTier(3)).toBe('High Usage');
  });

  it('derives ratios, tiers and the snapshot date', () => {
    const row = transformer.transform(
      unified({ last_updated_at: new Date('2026-03-01T23:30:00Z') })
    );

    expect(row).not.toBeNull();
    expect(row?.technology_name).toBe('Apache Airflow');
    expect(row?.github_stars).toBe(20000);
    expect(row?.pypi_downloads_monthly).toBe(3000000);
    expect(row?.weekly_to_daily_ratio).toBe(7);
    expect(row?.monthly_to_weekly_ratio).toBeCloseTo(4.285714, 5);
    expect(row?.fork_to_star_ratio).toBe(0.4);
    expect(row?.stars_per_contributor).toBe(50);
    expect(row?.popularity_tier).toBe('Popular');
    expect(row?.usage_tier).toBe('Medium Usage');
    expect(row?.snapshot_date).toBe('2026-03-01');
  });

  it('zeroes every ratio when denominators are zero', () => {
    const row = transformer.transform(
      unified({
        github: githubSnapshot({ stars: 0, forks: 12, contributors_count: 0 }),
        pypi: pypiSnapshot({ downloads_last_day: 0, downloads_last_week: 0, downloads_last_month: 50 }),
      })
    );

    expect(row?.weekly_to_daily_ratio).toBe(0);
    expect(row?.monthly_to_weekly_ratio).toBe(0);
    expect(row?.fork_to_star_ratio).toBe(0);
    expect(row?.stars_per_contributor).toBe(0);
  });

  it('keeps a row observed by only one source with the other side null', () => {
    const row = transformer.transform(unified({ pypi: null, last_updated_at: githubSnapshot().extracted_at }));

    expect(row?.github_stars).toBe(20000);
    expect(row?.pypi_downloads_daily).toBeNull();
    expect(row?.pypi_release_count).toBeNull();
    expect(row?.weekly_to_daily_ratio).toBe(0);
    expect(row?.usage_tier).toBe('Minimal Usage');
    expect(row?.snapshot_date).toBe('2026-03-01');
  });

  it('drops technologies missing from both sources and reports them', () => {
    const { rows, skipped } = transformer.transformBatch([
      unified(),
      { technology: { name: 'Ghost', github_repo: 'ghost/ghost', pypi_package: 'ghost' }, github: null, pypi: null, last_updated_at: null },
    ]);

    expect(rows.map((r) => r.technology_name)).toEqual(['Apache Airflow']);
    expect(skipped).toEqual(['Ghost']);
  });
});
