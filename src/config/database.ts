import { Pool, PoolConfig } from 'pg';
import { Env } from './settings';

export const RAW_GITHUB_TABLE = 'raw_github_repos';
export const RAW_PYPI_TABLE = 'raw_pypi_packages';
export const HISTORY_TABLE = 'technology_history';
export const TRENDS_TABLE = 'technology_trends';

export function databaseConfig(env: Env = process.env): PoolConfig {
  return {
    host: env.DATABASE_HOST || 'localhost',
    port: parseInt(env.DATABASE_PORT || '5432', 10),
    database: env.DATABASE_NAME || 'adoption_metrics',
    user: env.DATABASE_USER || 'postgres',
    password: env.DATABASE_PASSWORD || 'password',
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: parseInt(env.DATABASE_CONN_TIMEOUT_MS || '10000', 10),
  };
}

export function createPool(env: Env = process.env): Pool {
  return new Pool(databaseConfig(env));
}

// Raw tables belong to the extractors; they are created here so a fresh
// database can be bootstrapped in one step.
export async function initializeSchema(pool: Pool): Promise<void> {
  const createTablesQuery = `
    CREATE TABLE IF NOT EXISTS ${RAW_GITHUB_TABLE} (
      extracted_at TIMESTAMPTZ NOT NULL,
      repo_name TEXT NOT NULL,
      raw_data JSONB NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ${RAW_PYPI_TABLE} (
      extracted_at TIMESTAMPTZ NOT NULL,
      package_name TEXT NOT NULL,
      raw_data JSONB NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ${HISTORY_TABLE} (
      technology_name TEXT NOT NULL,
      snapshot_date DATE NOT NULL,
      github_repo TEXT NOT NULL,
      pypi_package TEXT NOT NULL,

      github_stars BIGINT,
      github_forks BIGINT,
      github_watchers BIGINT,
      pypi_downloads_daily BIGINT,
      pypi_downloads_weekly BIGINT,
      pypi_downloads_monthly BIGINT,

      open_issues BIGINT,
      contributors_count BIGINT,
      github_releases BIGINT,
      pypi_release_count BIGINT,

      weekly_to_daily_ratio DOUBLE PRECISION NOT NULL,
      monthly_to_weekly_ratio DOUBLE PRECISION NOT NULL,
      fork_to_star_ratio DOUBLE PRECISION NOT NULL,
      stars_per_contributor DOUBLE PRECISION NOT NULL,

      popularity_tier VARCHAR(20) NOT NULL,
      usage_tier VARCHAR(20) NOT NULL,

      github_created_at TIMESTAMPTZ,
      github_updated_at TIMESTAMPTZ,
      latest_release_published_at TIMESTAMPTZ,
      latest_release_upload_time TIMESTAMPTZ,
      last_updated_at TIMESTAMPTZ NOT NULL,

      stars_change BIGINT,
      forks_change BIGINT,
      downloads_change BIGINT,
      issues_change BIGINT,
      history_created_at TIMESTAMPTZ NOT NULL,

      PRIMARY KEY (technology_name, snapshot_date)
    );

    CREATE TABLE IF NOT EXISTS ${TRENDS_TABLE} (
      technology_name TEXT NOT NULL,
      snapshot_date DATE NOT NULL,
      github_stars BIGINT,
      github_forks BIGINT,
      pypi_downloads_daily BIGINT,
      stars_7day_avg DOUBLE PRECISION,
      downloads_7day_avg DOUBLE PRECISION,
      stars_30day_avg DOUBLE PRECISION,
      daily_popularity_rank INTEGER NOT NULL,
      stars_7day_growth_pct DOUBLE PRECISION NOT NULL,
      stars_30day_growth_pct DOUBLE PRECISION NOT NULL,
      downloads_7day_growth_pct DOUBLE PRECISION NOT NULL,
      stars_trend_indicator VARCHAR(20) NOT NULL,
      downloads_trend_indicator VARCHAR(20) NOT NULL,
      PRIMARY KEY (technology_name, snapshot_date)
    );

    CREATE INDEX IF NOT EXISTS idx_raw_github_repo ON ${RAW_GITHUB_TABLE}(repo_name, extracted_at);
    CREATE INDEX IF NOT EXISTS idx_raw_pypi_package ON ${RAW_PYPI_TABLE}(package_name, extracted_at);
    CREATE INDEX IF NOT EXISTS idx_history_snapshot_date ON ${HISTORY_TABLE}(snapshot_date);
    CREATE INDEX IF NOT EXISTS idx_trends_rank ON ${TRENDS_TABLE}(snapshot_date, daily_popularity_rank);
  `;

  await pool.query(createTablesQuery);
}
