import { describe, expect, it } from 'vitest';
import {
  computeTrends,
  indicator,
  laggedGrowth,
  rankByStars,
  trailingAverage,
  TrendResultSet,
} from '../src/core/trends';
import { HistoryRow } from '../src/core/types';
import { dateRange, historyRow } from './fixtures';

function series(technology: string, start: string, stars: Array<number | null>, downloads?: number[]): HistoryRow[] {
  return dateRange(start, stars.length).map((date, i) =>
    historyRow({
      technology_name: technology,
      snapshot_date: date,
      github_stars: stars[i],
      pypi_downloads_daily: downloads ? downloads[i] : 1000,
    })
  );
}

describe('window helpers', () => {
  it('averages the trailing rows and narrows when fewer exist', () => {
    const values = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    expect(trailingAverage(values, 9, 7)).toBe(7);
    expect(trailingAverage(values, 1, 7)).toBe(1.5);
    expect(trailingAverage(values, 9, 30)).toBe(5.5);
  });

  it('skips missing values and returns null when the window has none', () => {
    expect(trailingAverage([null, 4, null, 8], 3, 7)).toBe(6);
    expect(trailingAverage([null, null], 1, 7)).toBeNull();
  });

  it('returns 0 growth without enough history or a positive past value', () => {
    expect(laggedGrowth([1, 2, 3], 2, 7)).toBe(0);
    expect(laggedGrowth([0, 5], 1, 1)).toBe(0);
    expect(laggedGrowth([null, 5], 1, 1)).toBe(0);
    expect(laggedGrowth([4, 5], 1, 1)).toBe(25);
    expect(laggedGrowth([4, 2], 1, 1)).toBe(-50);
  });

  it('compares a value with its average', () => {
    expect(indicator(10, 7)).toBe('Above Average');
    expect(indicator(5, 7)).toBe('Below Average');
    expect(indicator(7, 7)).toBe('Average');
    expect(indicator(null, 7)).toBe('Average');
  });
});

describe('rankByStars', () => {
  it('gives tied values the same rank and skips past them', () => {
    const ranks = rankByStars([
      { github_stars: 500 },
      { github_stars: 900 },
      { github_stars: 900 },
      { github_stars: 900 },
    ]);
    expect(ranks).toEqual([4, 1, 1, 1]);
  });

  it('ranks missing stars after every known value', () => {
    expect(rankByStars([{ github_stars: null }, { github_stars: 0 }, { github_stars: null }])).toEqual([2, 1, 2]);
  });
});

describe('computeTrends', () => {
  it('computes row-count windows on a ten-row history', () => {
    const history = series('Pandas', '2026-03-01', [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    const trends = computeTrends(history, { processingDate: '2026-03-10', retentionDays: 90 });

    expect(trends).toHaveLength(10);
    const last = trends[9];
    expect(last.snapshot_date).toBe('2026-03-10');
    expect(last.stars_7day_avg).toBe(7);
    expect(last.stars_30day_avg).toBe(5.5);
    expect(last.stars_7day_growth_pct).toBeCloseTo(((10 - 3) / 3) * 100, 10);
    expect(last.stars_30day_growth_pct).toBe(0);
    expect(last.stars_trend_indicator).toBe('Above Average');
    expect(last.downloads_trend_indicator).toBe('Average');
    expect(trends[6].stars_7day_growth_pct).toBe(0);
    expect(trends[7].stars_7day_growth_pct).toBe(700);
  });

  it('counts rows rather than calendar days across gaps', () => {
    const history = series('Pandas', '2026-03-01', [10, 20, 30]).map((row, i) => ({
      ...row,
      snapshot_date: ['2026-01-01', '2026-02-01', '2026-03-01'][i],
    }));
    const trends = computeTrends(history, { processingDate: '2026-03-01', retentionDays: 90 });

    expect(trends.map((t) => t.stars_7day_avg)).toEqual([10, 15, 20]);
  });

  it('orders each technology by date even when history arrives unsorted', () => {
    const history = series('Pandas', '2026-03-01', [1, 2, 3]).reverse();
    const trends = computeTrends(history, { processingDate: '2026-03-03', retentionDays: 90 });

    expect(trends.map((t) => t.stars_7day_avg)).toEqual([1, 1.5, 2]);
  });

  it('computes download averages and growth', () => {
    const history = series('Pandas', '2026-03-01', [1, 1, 1, 1, 1, 1, 1, 1], [100, 100, 100, 100, 100, 100, 100, 150]);
    const last = computeTrends(history, { processingDate: '2026-03-08', retentionDays: 90 })[7];

    expect(last.downloads_7day_avg).toBeCloseTo(750 / 7, 10);
    expect(last.downloads_7day_growth_pct).toBe(50);
    expect(last.downloads_trend_indicator).toBe('Above Average');
    expect(last.stars_trend_indicator).toBe('Average');
  });

  it('ranks technologies sharing a date with gaps after ties', () => {
    const history = [
      historyRow({ technology_name: 'A', snapshot_date: '2026-03-01', github_stars: 1000 }),
      historyRow({ technology_name: 'B', snapshot_date: '2026-03-01', github_stars: 1000 }),
      historyRow({ technology_name: 'C', snapshot_date: '2026-03-01', github_stars: 1000 }),
      historyRow({ technology_name: 'D', snapshot_date: '2026-03-01', github_stars: 10 }),
      historyRow({ technology_name: 'D', snapshot_date: '2026-03-02', github_stars: 10 }),
    ];
    const trends = computeTrends(history, { processingDate: '2026-03-02', retentionDays: 90 });

    expect(trends.map((t) => [t.snapshot_date, t.technology_name, t.daily_popularity_rank])).toEqual([
      ['2026-03-01', 'A', 1],
      ['2026-03-01', 'B', 1],
      ['2026-03-01', 'C', 1],
      ['2026-03-01', 'D', 4],
      ['2026-03-02', 'D', 1],
    ]);
  });

  it('keeps rows exactly 90 days old and drops rows 91 days old', () => {
    const history = [
      historyRow({ snapshot_date: '2026-01-09', github_stars: 100 }),
      historyRow({ snapshot_date: '2026-01-10', github_stars: 110 }),
      historyRow({ snapshot_date: '2026-04-10', github_stars: 120 }),
    ];
    const trends = computeTrends(history, { processingDate: '2026-04-10', retentionDays: 90 });

    expect(trends.map((t) => t.snapshot_date)).toEqual(['2026-01-10', '2026-04-10']);
    // The dropped row still feeds the window of the rows that remain.
    expect(trends[0].stars_7day_avg).toBe(105);
  });
});

describe('TrendResultSet', () => {
  const rows = computeTrends(
    [
      historyRow({ technology_name: 'A', snapshot_date: '2026-03-01', github_stars: 50 }),
      historyRow({ technology_name: 'B', snapshot_date: '2026-03-01', github_stars: 70 }),
      historyRow({ technology_name: 'C', snapshot_date: '2026-03-01', github_stars: 60 }),
      historyRow({ technology_name: 'A', snapshot_date: '2026-03-02', github_stars: 55 }),
    ],
    { processingDate: '2026-03-02', retentionDays: 90 }
  );
  const result = new TrendResultSet(rows);

  it('answers by technology, date and rank', () => {
    expect(result.size).toBe(4);
    expect(result.forTechnology('A').map((r) => r.snapshot_date)).toEqual(['2026-03-01', '2026-03-02']);
    expect(result.forDate('2026-03-01')).toHaveLength(3);
    expect(result.ranking('2026-03-01').map((r) => r.technology_name)).toEqual(['B', 'C', 'A']);
    expect(result.ranking('2026-03-01', 2).map((r) => r.technology_name)).toEqual(['B', 'C']);
    expect(result.find('C', '2026-03-01')?.daily_popularity_rank).toBe(2);
    expect(result.find('C', '2026-03-02')).toBeUndefined();
    expect(result.latestDate()).toBe('2026-03-02');
  });
});
