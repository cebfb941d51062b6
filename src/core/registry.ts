import * as fs from 'fs';
import { z } from 'zod';
import { CatalogError } from './errors';
import { laterOf } from './dates';
import { normalizePackageKey, normalizeRepoKey } from './staging';
import { GithubRepoSnapshot, PypiPackageSnapshot, Technology, UnifiedMetricRecord } from './types';

const catalogSchema = z
  .array(
    z.object({
      name: z.string().trim().min(1),
      github_repo: z.string().trim().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo'),
      pypi_package: z.string().trim().min(1),
    })
  )
  .min(1);

export type TechnologyCatalog = readonly Technology[];

function assertUnique(catalog: readonly Technology[], key: (t: Technology) => string, label: string): void {
  const seen = new Set<string>();
  for (const technology of catalog) {
    const value = key(technology);
    if (seen.has(value)) {
      throw new CatalogError(`Duplicate ${label} "${value}" in technology catalog`);
    }
    seen.add(value);
  }
}

export function buildCatalog(entries: unknown): TechnologyCatalog {
  const parsed = catalogSchema.safeParse(entries);
  if (!parsed.success) {
    throw new CatalogError(`Invalid technology catalog: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  assertUnique(parsed.data, (t) => t.name, 'technology name');
  assertUnique(parsed.data, (t) => normalizeRepoKey(t.github_repo), 'GitHub repository');
  assertUnique(parsed.data, (t) => normalizePackageKey(t.pypi_package), 'PyPI package');

  return Object.freeze(parsed.data.map((t) => Object.freeze({ ...t })));
}

export function loadCatalog(filePath: string): TechnologyCatalog {
  let contents: unknown;
  try {
    contents = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new CatalogError(`Unable to read technology catalog at ${filePath}`, { cause: error });
  }
  return buildCatalog(contents);
}

/**
 * Left-outer-joins both sources onto the catalog. Always returns exactly one
 * record per technology, in catalog order.
 */
export function joinCatalog(
  catalog: TechnologyCatalog,
  github: ReadonlyMap<string, GithubRepoSnapshot>,
  pypi: ReadonlyMap<string, PypiPackageSnapshot>
): UnifiedMetricRecord[] {
  return catalog.map((technology) => {
    const gh = github.get(normalizeRepoKey(technology.github_repo)) ?? null;
    const py = pypi.get(normalizePackageKey(technology.pypi_package)) ?? null;

    return {
      technology,
      github: gh,
      pypi: py,
      last_updated_at: laterOf(gh?.extracted_at ?? null, py?.extracted_at ?? null),
    };
  });
}
