import { addDays } from './dates';
import { DateKey, HistoryRow, TrendIndicator, TrendRow } from './types';

export const SHORT_WINDOW = 7;
export const LONG_WINDOW = 30;

export interface TrendOptions {
  processingDate: DateKey;
  retentionDays: number;
}

/** Mean of the non-null values among the last `size` entries ending at `index`. */
export function trailingAverage(values: ReadonlyArray<number | null>, index: number, size: number): number | null {
  let sum = 0;
  let count = 0;
  for (let i = Math.max(0, index - size + 1); i <= index; i++) {
    const v = values[i];
    if (v !== null && v !== undefined) {
      sum += v;
      count++;
    }
  }
  return count ? sum / count : null;
}

/** Percent change against the value `lag` rows back; 0 without a positive past value. */
export function laggedGrowth(values: ReadonlyArray<number | null>, index: number, lag: number): number {
  if (index - lag < 0) return 0;
  const current = values[index];
  const past = values[index - lag];
  if (current === null || current === undefined || past === null || past === undefined || past <= 0) return 0;
  return ((current - past) / past) * 100;
}

export function indicator(value: number | null, average: number | null): TrendIndicator {
  if (value === null || average === null) return 'Average';
  if (value > average) return 'Above Average';
  if (value < average) return 'Below Average';
  return 'Average';
}

/**
 * Competition ranking by stars descending: tied values share a rank and the
 * next value skips past them (1, 1, 1, 4). Missing stars rank last.
 */
export function rankByStars(rows: ReadonlyArray<{ github_stars: number | null }>): number[] {
  const order = rows
    .map((row, i) => ({ stars: row.github_stars, i }))
    .sort((a, b) => {
      if (a.stars === b.stars) return 0;
      if (a.stars === null) return 1;
      if (b.stars === null) return -1;
      return b.stars - a.stars;
    });

  const ranks = new Array<number>(rows.length);
  order.forEach((entry, position) => {
    const previous = position > 0 ? order[position - 1] : undefined;
    ranks[entry.i] = previous && previous.stars === entry.stars ? ranks[previous.i] : position + 1;
  });
  return ranks;
}

function compareTrendRows(a: TrendRow, b: TrendRow): number {
  if (a.snapshot_date !== b.snapshot_date) return a.snapshot_date < b.snapshot_date ? -1 : 1;
  if (a.daily_popularity_rank !== b.daily_popularity_rank) return a.daily_popularity_rank - b.daily_popularity_rank;
  return a.technology_name < b.technology_name ? -1 : a.technology_name > b.technology_name ? 1 : 0;
}

/**
 * Recomputes every trend row from the full history. Windows count rows, not
 * calendar days: a technology with gaps still averages its last 7 stored rows.
 * Rows older than `retentionDays` before the processing date are dropped
 * after the windows are computed.
 */
export function computeTrends(history: readonly HistoryRow[], options: TrendOptions): TrendRow[] {
  const byTechnology = new Map<string, HistoryRow[]>();
  for (const row of history) {
    const rows = byTechnology.get(row.technology_name);
    if (rows) rows.push(row);
    else byTechnology.set(row.technology_name, [row]);
  }

  const trends: TrendRow[] = [];
  for (const rows of byTechnology.values()) {
    rows.sort((a, b) => (a.snapshot_date < b.snapshot_date ? -1 : a.snapshot_date > b.snapshot_date ? 1 : 0));
    const stars = rows.map((r) => r.github_stars);
    const downloads = rows.map((r) => r.pypi_downloads_daily);

    rows.forEach((row, i) => {
      const stars7 = trailingAverage(stars, i, SHORT_WINDOW);
      const downloads7 = trailingAverage(downloads, i, SHORT_WINDOW);
      trends.push({
        technology_name: row.technology_name,
        snapshot_date: row.snapshot_date,
        github_stars: row.github_stars,
        github_forks: row.github_forks,
        pypi_downloads_daily: row.pypi_downloads_daily,
        stars_7day_avg: stars7,
        downloads_7day_avg: downloads7,
        stars_30day_avg: trailingAverage(stars, i, LONG_WINDOW),
        daily_popularity_rank: 0,
        stars_7day_growth_pct: laggedGrowth(stars, i, SHORT_WINDOW),
        stars_30day_growth_pct: laggedGrowth(stars, i, LONG_WINDOW),
        downloads_7day_growth_pct: laggedGrowth(downloads, i, SHORT_WINDOW),
        stars_trend_indicator: indicator(row.github_stars, stars7),
        downloads_trend_indicator: indicator(row.pypi_downloads_daily, downloads7),
      });
    });
  }

  const byDate = new Map<DateKey, TrendRow[]>();
  for (const trend of trends) {
    const rows = byDate.get(trend.snapshot_date);
    if (rows) rows.push(trend);
    else byDate.set(trend.snapshot_date, [trend]);
  }
  for (const rows of byDate.values()) {
    const ranks = rankByStars(rows);
    rows.forEach((row, i) => {
      row.daily_popularity_rank = ranks[i];
    });
  }

  const cutoff = addDays(options.processingDate, -options.retentionDays);
  return trends.filter((t) => t.snapshot_date >= cutoff).sort(compareTrendRows);
}

/** Read-side access to one run's trend output. */
export class TrendResultSet {
  private rows: readonly TrendRow[];

  constructor(rows: readonly TrendRow[]) {
    this.rows = rows;
  }

  public get size(): number {
    return this.rows.length;
  }

  public all(): readonly TrendRow[] {
    return this.rows;
  }

  public forTechnology(technology: string): TrendRow[] {
    return this.rows.filter((r) => r.technology_name === technology);
  }

  public forDate(date: DateKey): TrendRow[] {
    return this.rows.filter((r) => r.snapshot_date === date);
  }

  public find(technology: string, date: DateKey): TrendRow | undefined {
    return this.rows.find((r) => r.technology_name === technology && r.snapshot_date === date);
  }

  /** Rows for `date` ordered by rank, optionally only those ranked `maxRank` or better. */
  public ranking(date: DateKey, maxRank?: number): TrendRow[] {
    return this.forDate(date)
      .filter((r) => maxRank === undefined || r.daily_popularity_rank <= maxRank)
      .sort(compareTrendRows);
  }

  public latestDate(): DateKey | null {
    let latest: DateKey | null = null;
    for (const row of this.rows) {
      if (latest === null || row.snapshot_date > latest) latest = row.snapshot_date;
    }
    return latest;
  }
}
