import { DateKey, SourceName } from './types';

export type PipelineErrorCode =
  | 'CONFIGURATION'
  | 'CATALOG'
  | 'STALE_DATA'
  | 'MERGE_CONFLICT'
  | 'STORE_INTEGRITY';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class CatalogError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CATALOG', message, options);
  }
}

/** A source delivered nothing extracted on the processing date. */
export class StaleDataError extends PipelineError {
  public readonly freshRecords: Readonly<Record<SourceName, number>>;

  constructor(processingDate: DateKey, freshRecords: Readonly<Record<SourceName, number>>) {
    super(
      'STALE_DATA',
      `No raw data extracted on ${processingDate} (github: ${freshRecords.github}, pypi: ${freshRecords.pypi})`
    );
    this.freshRecords = freshRecords;
  }
}

/**
 * Raised when two writers target the same (technology, snapshot_date) key,
 * either inside one batch or across concurrently running merges.
 */
export class MergeConflictError extends PipelineError {
  public readonly technologies: string[];

  constructor(technologies: string[], detail: string) {
    super('MERGE_CONFLICT', `Merge conflict for ${technologies.join(', ')}: ${detail}`);
    this.technologies = technologies;
  }
}

/** One or more per-technology history transactions rolled back. */
export class StoreIntegrityError extends PipelineError {
  public readonly failures: ReadonlyArray<{ technology: string; error: Error }>;

  constructor(failures: ReadonlyArray<{ technology: string; error: Error }>) {
    super(
      'STORE_INTEGRITY',
      `History merge failed for ${failures.length} technolog${failures.length === 1 ? 'y' : 'ies'}: ` +
        failures.map((f) => `${f.technology} (${f.error.message})`).join('; ')
    );
    this.failures = failures;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
