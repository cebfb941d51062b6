export type SourceName = 'github' | 'pypi';

/** Calendar date in `YYYY-MM-DD` form, always UTC. */
export type DateKey = string;

export interface RawRecord {
  natural_key: string;
  extracted_at: Date;
  raw_data: unknown;
}

export interface ExtractedRecord {
  natural_key: string;
  extracted_at: Date;
}

export interface GithubRepoSnapshot extends ExtractedRecord {
  repo_name: string;
  full_name: string | null;
  description: string | null;
  language: string | null;
  stars: number;
  forks: number;
  watchers: number;
  open_issues: number;
  size: number;
  created_at: Date | null;
  updated_at: Date | null;
  pushed_at: Date | null;
  default_branch: string | null;
  contributors_count: number;
  releases_count: number;
  latest_release_tag: string | null;
  latest_release_published_at: Date | null;
  topics: string[];
  license: string | null;
}

export interface PypiPackageSnapshot extends ExtractedRecord {
  package_name: string;
  version: string | null;
  summary: string | null;
  description_content_type: string | null;
  home_page: string | null;
  author: string | null;
  author_email: string | null;
  maintainer: string | null;
  license: string | null;
  keywords: string | null;
  classifiers: string[];
  requires_dist: string[];
  requires_python: string | null;
  project_urls: Record<string, string>;
  release_count: number;
  latest_release_upload_time: Date | null;
  latest_python_version: string | null;
  latest_release_size: number;
  latest_filename: string | null;
  downloads_last_day: number;
  downloads_last_week: number;
  downloads_last_month: number;
}

export interface Technology {
  readonly name: string;
  readonly github_repo: string;
  readonly pypi_package: string;
}

export interface UnifiedMetricRecord {
  technology: Technology;
  github: GithubRepoSnapshot | null;
  pypi: PypiPackageSnapshot | null;
  last_updated_at: Date | null;
}

export type PopularityTier = 'Very Popular' | 'Popular' | 'Moderate' | 'Emerging';
export type UsageTier = 'High Usage' | 'Medium Usage' | 'Low Usage' | 'Minimal Usage';
export type TrendIndicator = 'Above Average' | 'Below Average' | 'Average';

export interface DerivedMetricRow {
  technology_name: string;
  github_repo: string;
  pypi_package: string;

  github_stars: number | null;
  github_forks: number | null;
  github_watchers: number | null;
  pypi_downloads_daily: number | null;
  pypi_downloads_weekly: number | null;
  pypi_downloads_monthly: number | null;

  open_issues: number | null;
  contributors_count: number | null;
  github_releases: number | null;
  pypi_release_count: number | null;

  weekly_to_daily_ratio: number;
  monthly_to_weekly_ratio: number;
  fork_to_star_ratio: number;
  stars_per_contributor: number;

  popularity_tier: PopularityTier;
  usage_tier: UsageTier;

  github_created_at: Date | null;
  github_updated_at: Date | null;
  latest_release_published_at: Date | null;
  latest_release_upload_time: Date | null;
  last_updated_at: Date;
  snapshot_date: DateKey;
}

export interface HistoryRow extends DerivedMetricRow {
  stars_change: number | null;
  forks_change: number | null;
  downloads_change: number | null;
  issues_change: number | null;
  history_created_at: Date;
}

export interface TrendRow {
  technology_name: string;
  snapshot_date: DateKey;
  github_stars: number | null;
  github_forks: number | null;
  pypi_downloads_daily: number | null;

  stars_7day_avg: number | null;
  downloads_7day_avg: number | null;
  stars_30day_avg: number | null;
  daily_popularity_rank: number;

  stars_7day_growth_pct: number;
  stars_30day_growth_pct: number;
  downloads_7day_growth_pct: number;

  stars_trend_indicator: TrendIndicator;
  downloads_trend_indicator: TrendIndicator;
}

export interface HistoryQuery {
  technology?: string;
  from?: DateKey;
  to?: DateKey;
}

export interface MergeResult {
  inserted: string[];
  replaced: string[];
}

export interface PhaseTiming {
  phase: string;
  duration_ms: number;
  records?: number;
  timestamp: Date;
}

export interface RunSummary {
  run_id: string;
  processing_date: DateKey;
  dry_run: boolean;
  start_time: Date;
  end_time: Date;
  total_duration_ms: number;

  raw_records: Record<SourceName, number>;
  rejected_records: Record<SourceName, number>;
  /** Accepted payloads extracted on the processing date itself. */
  fresh_records: Record<SourceName, number>;
  ambiguous_duplicates: Record<SourceName, number>;
  canonical_snapshots: Record<SourceName, number>;

  unified_rows: number;
  derived_rows: number;
  skipped_technologies: string[];

  history_inserted: number;
  history_replaced: number;
  trend_rows: number;

  detailed_timings: PhaseTiming[];
}
