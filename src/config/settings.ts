import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigurationError } from '../core/errors';

dotenv.config();

export type Env = Record<string, string | undefined>;

export interface TierThresholds {
  /** Ascending lower bounds, lowest tier first. */
  readonly popularity: readonly [number, number, number];
  readonly usage: readonly [number, number, number];
}

export interface Settings {
  readonly catalogPath: string;
  readonly retentionDays: number;
  readonly mergeConcurrency: number;
  readonly tiers: TierThresholds;
  /** Fail the run when either source has no payload extracted on the processing date. */
  readonly requireFreshData: boolean;
  readonly logLevel: string;
  readonly logDir: string | null;
}

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  popularity: [5_000, 15_000, 30_000],
  usage: [100_000, 1_000_000, 10_000_000],
};

export const DEFAULT_RETENTION_DAYS = 90;

function parseIntEnv(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${raw}"`);
  }
}

export function parseThresholds(
  name: string,
  raw: string | undefined,
  fallback: readonly [number, number, number]
): readonly [number, number, number] {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parts = raw.split(',').map((p) => Number(p.trim()));
  if (parts.length !== 3 || parts.some((p) => !Number.isFinite(p) || p < 0)) {
    throw new ConfigurationError(`${name} must be three comma separated non-negative numbers, got "${raw}"`);
  }
  const [low, mid, high] = parts;
  if (!(low < mid && mid < high)) {
    throw new ConfigurationError(`${name} must be strictly ascending, got "${raw}"`);
  }
  return [low, mid, high];
}

export function loadSettings(env: Env = process.env): Settings {
  return {
    catalogPath: path.resolve(env.CATALOG_PATH || path.join('config', 'technologies.json')),
    retentionDays: parseIntEnv(env, 'RETENTION_DAYS', DEFAULT_RETENTION_DAYS, 1),
    mergeConcurrency: parseIntEnv(env, 'MERGE_CONCURRENCY', 4, 1),
    tiers: {
      popularity: parseThresholds(
        'POPULARITY_TIER_THRESHOLDS',
        env.POPULARITY_TIER_THRESHOLDS,
        DEFAULT_TIER_THRESHOLDS.popularity
      ),
      usage: parseThresholds('USAGE_TIER_THRESHOLDS', env.USAGE_TIER_THRESHOLDS, DEFAULT_TIER_THRESHOLDS.usage),
    },
    requireFreshData: parseBoolEnv(env, 'REQUIRE_FRESH_DATA', true),
    logLevel: env.LOG_LEVEL || 'info',
    logDir: env.LOG_DIR ? path.resolve(env.LOG_DIR) : null,
  };
}
