import { DEFAULT_TIER_THRESHOLDS, TierThresholds } from '../config/settings';
import { toDateKey } from './dates';
import { DerivedMetricRow, PopularityTier, UnifiedMetricRecord, UsageTier } from './types';

export interface DerivedBatch {
  rows: DerivedMetricRow[];
  /** Technologies in the catalog that neither source reported this run. */
  skipped: string[];
}

/** `numerator / denominator`, or 0 when either side is missing or the denominator is not positive. */
export function safeRatio(numerator: number | null, denominator: number | null): number {
  if (numerator === null || denominator === null || denominator <= 0) return 0;
  return numerator / denominator;
}

export class MetricsTransformer {
  private popularityTiers: Array<{ min: number; tier: PopularityTier }>;
  private usageTiers: Array<{ min: number; tier: UsageTier }>;

  constructor(thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS) {
    const [moderate, popular, veryPopular] = thresholds.popularity;
    const [low, medium, high] = thresholds.usage;

    // Highest bound first; the first match wins.
    this.popularityTiers = [
      { min: veryPopular, tier: 'Very Popular' },
      { min: popular, tier: 'Popular' },
      { min: moderate, tier: 'Moderate' },
    ];
    this.usageTiers = [
      { min: high, tier: 'High Usage' },
      { min: medium, tier: 'Medium Usage' },
      { min: low, tier: 'Low Usage' },
    ];
  }

  public popularityTier(stars: number | null): PopularityTier {
    if (stars === null) return 'Emerging';
    return this.popularityTiers.find((t) => stars >= t.min)?.tier ?? 'Emerging';
  }

  public usageTier(monthlyDownloads: number | null): UsageTier {
    if (monthlyDownloads === null) return 'Minimal Usage';
    return this.usageTiers.find((t) => monthlyDownloads >= t.min)?.tier ?? 'Minimal Usage';
  }

  /** Returns null for a technology with no observation from either source. */
  public transform(record: UnifiedMetricRecord): DerivedMetricRow | null {
    const { technology, github: gh, pypi: py, last_updated_at } = record;
    if ((gh === null && py === null) || last_updated_at === null) return null;

    const stars = gh?.stars ?? null;
    const forks = gh?.forks ?? null;
    const contributors = gh?.contributors_count ?? null;
    const daily = py?.downloads_last_day ?? null;
    const weekly = py?.downloads_last_week ?? null;
    const monthly = py?.downloads_last_month ?? null;

    return {
      technology_name: technology.name,
      github_repo: technology.github_repo,
      pypi_package: technology.pypi_package,

      // Popularity metrics
      github_stars: stars,
      github_forks: forks,
      github_watchers: gh?.watchers ?? null,
      pypi_downloads_daily: daily,
      pypi_downloads_weekly: weekly,
      pypi_downloads_monthly: monthly,

      // Activity metrics
      open_issues: gh?.open_issues ?? null,
      contributors_count: contributors,
      github_releases: gh?.releases_count ?? null,
      pypi_release_count: py?.release_count ?? null,

      weekly_to_daily_ratio: safeRatio(weekly, daily),
      monthly_to_weekly_ratio: safeRatio(monthly, weekly),
      fork_to_star_ratio: safeRatio(forks, stars),
      stars_per_contributor: safeRatio(stars, contributors),

      popularity_tier: this.popularityTier(stars),
      usage_tier: this.usageTier(monthly),

      github_created_at: gh?.created_at ?? null,
      github_updated_at: gh?.updated_at ?? null,
      latest_release_published_at: gh?.latest_release_published_at ?? null,
      latest_release_upload_time: py?.latest_release_upload_time ?? null,
      last_updated_at,
      snapshot_date: toDateKey(last_updated_at),
    };
  }

  public transformBatch(records: UnifiedMetricRecord[]): DerivedBatch {
    const rows: DerivedMetricRow[] = [];
    const skipped: string[] = [];
    for (const record of records) {
      const row = this.transform(record);
      if (row) rows.push(row);
      else skipped.push(record.technology.name);
    }
    return { rows, skipped };
  }
}
