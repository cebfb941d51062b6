import { PipelineLogger } from '../src/core/logger';
import {
  DerivedMetricRow,
  GithubRepoSnapshot,
  HistoryRow,
  PypiPackageSnapshot,
  RawRecord,
  SourceName,
} from '../src/core/types';
import { RawRecordSource } from '../src/store/types';

export const silentLogger = (): PipelineLogger => new PipelineLogger('test-run', { silent: true });

export function githubSnapshot(overrides: Partial<GithubRepoSnapshot> = {}): GithubRepoSnapshot {
  return {
    natural_key: 'apache/airflow',
    extracted_at: new Date('2026-03-01T06:00:00Z'),
    repo_name: 'apache/airflow',
    full_name: 'apache/airflow',
    description: null,
    language: 'Python',
    stars: 20000,
    forks: 8000,
    watchers: 20000,
    open_issues: 900,
    size: 0,
    created_at: null,
    updated_at: null,
    pushed_at: null,
    default_branch: 'main',
    contributors_count: 400,
    releases_count: 100,
    latest_release_tag: null,
    latest_release_published_at: null,
    topics: [],
    license: null,
    ...overrides,
  };
}

export function pypiSnapshot(overrides: Partial<PypiPackageSnapshot> = {}): PypiPackageSnapshot {
  return {
    natural_key: 'apache-airflow',
    extracted_at: new Date('2026-03-01T07:00:00Z'),
    package_name: 'apache-airflow',
    version: '2.9.0',
    summary: null,
    description_content_type: null,
    home_page: null,
    author: null,
    author_email: null,
    maintainer: null,
    license: null,
    keywords: null,
    classifiers: [],
    requires_dist: [],
    requires_python: null,
    project_urls: {},
    release_count: 300,
    latest_release_upload_time: null,
    latest_python_version: null,
    latest_release_size: 0,
    latest_filename: null,
    downloads_last_day: 100000,
    downloads_last_week: 700000,
    downloads_last_month: 3000000,
    ...overrides,
  };
}

export function derivedRow(overrides: Partial<DerivedMetricRow> = {}): DerivedMetricRow {
  return {
    technology_name: 'Apache Airflow',
    github_repo: 'apache/airflow',
    pypi_package: 'apache-airflow',
    github_stars: 20000,
    github_forks: 8000,
    github_watchers: 20000,
    pypi_downloads_daily: 100000,
    pypi_downloads_weekly: 700000,
    pypi_downloads_monthly: 3000000,
    open_issues: 900,
    contributors_count: 400,
    github_releases: 100,
    pypi_release_count: 300,
    weekly_to_daily_ratio: 7,
    monthly_to_weekly_ratio: 3000000 / 700000,
    fork_to_star_ratio: 0.4,
    stars_per_contributor: 50,
    popularity_tier: 'Popular',
    usage_tier: 'Medium Usage',
    github_created_at: null,
    github_updated_at: null,
    latest_release_published_at: null,
    latest_release_upload_time: null,
    last_updated_at: new Date('2026-03-01T07:00:00Z'),
    snapshot_date: '2026-03-01',
    ...overrides,
  };
}

export function historyRow(overrides: Partial<HistoryRow> = {}): HistoryRow {
  return {
    ...derivedRow(),
    stars_change: 0,
    forks_change: 0,
    downloads_change: 0,
    issues_change: 0,
    history_created_at: new Date('2026-03-01T08:00:00Z'),
    ...overrides,
  };
}

/** Consecutive date keys starting at `start`. */
export function dateRange(start: string, count: number): string[] {
  const base = Date.parse(`${start}T00:00:00Z`);
  return Array.from({ length: count }, (_, i) => new Date(base + i * 86_400_000).toISOString().slice(0, 10));
}

export class MemoryRawSource implements RawRecordSource {
  constructor(private records: Record<SourceName, RawRecord[]>) {}

  public async *read(source: SourceName, until?: Date): AsyncGenerator<RawRecord> {
    for (const record of this.records[source]) {
      if (until && record.extracted_at.getTime() >= until.getTime()) continue;
      yield record;
    }
  }
}
