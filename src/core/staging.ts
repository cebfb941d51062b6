import { z } from 'zod';
import { GithubRepoSnapshot, PypiPackageSnapshot, RawRecord } from './types';

const count = z
  .number()
  .int()
  .nullish()
  .transform((v) => v ?? 0);

const text = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

// Date-times without an offset (PyPI's upload_time) are UTC.
const NAIVE_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

export function parseTimestamp(value: string | number): Date {
  if (typeof value === 'string') {
    const naive = NAIVE_DATE_TIME.exec(value.trim());
    if (naive) return new Date(`${naive[1]}T${naive[2]}Z`);
  }
  return new Date(value);
}

const timestamp = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined) return null;
    const parsed = parseTimestamp(v);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${v}"` });
      return z.NEVER;
    }
    return parsed;
  });

const stringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

const githubPayload = z.object({
  repo_name: text,
  full_name: text,
  description: text,
  language: text,
  stars: count,
  forks: count,
  watchers: count,
  open_issues: count,
  size: count,
  created_at: timestamp,
  updated_at: timestamp,
  pushed_at: timestamp,
  default_branch: text,
  contributors_count: count,
  releases_count: count,
  latest_release: z
    .object({ tag_name: text, published_at: timestamp })
    .nullish()
    .transform((v) => v ?? { tag_name: null, published_at: null }),
  topics: stringList,
  license: text,
});

const pypiPayload = z.object({
  package_name: text,
  version: text,
  summary: text,
  description_content_type: text,
  home_page: text,
  author: text,
  author_email: text,
  maintainer: text,
  license: text,
  keywords: text,
  classifiers: stringList,
  requires_dist: stringList,
  requires_python: text,
  project_urls: z
    .record(z.string())
    .nullish()
    .transform((v) => v ?? {}),
  release_count: count,
  latest_release_info: z
    .object({ upload_time: timestamp, python_version: text, size: count, filename: text })
    .nullish()
    .transform((v) => v ?? { upload_time: null, python_version: null, size: 0, filename: null }),
  downloads_last_day: count,
  downloads_last_week: count,
  downloads_last_month: count,
});

export function normalizeRepoKey(name: string): string {
  return name.trim().toLowerCase();
}

/** PEP 503 name normalization: lowercase, runs of `-`, `_`, `.` become one `-`. */
export function normalizePackageKey(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

export type StageResult<T> = { ok: true; record: T } | { ok: false; natural_key: string; reason: string };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function stageGithubRecord(raw: RawRecord): StageResult<GithubRepoSnapshot> {
  const parsed = githubPayload.safeParse(raw.raw_data);
  if (!parsed.success) {
    return { ok: false, natural_key: raw.natural_key, reason: describeIssues(parsed.error) };
  }
  const p = parsed.data;
  const repoName = p.repo_name ?? raw.natural_key;

  return {
    ok: true,
    record: {
      natural_key: normalizeRepoKey(repoName),
      extracted_at: raw.extracted_at,
      repo_name: repoName,
      full_name: p.full_name,
      description: p.description,
      language: p.language,
      stars: p.stars,
      forks: p.forks,
      watchers: p.watchers,
      open_issues: p.open_issues,
      size: p.size,
      created_at: p.created_at,
      updated_at: p.updated_at,
      pushed_at: p.pushed_at,
      default_branch: p.default_branch,
      contributors_count: p.contributors_count,
      releases_count: p.releases_count,
      latest_release_tag: p.latest_release.tag_name,
      latest_release_published_at: p.latest_release.published_at,
      topics: p.topics,
      license: p.license,
    },
  };
}

export function stagePypiRecord(raw: RawRecord): StageResult<PypiPackageSnapshot> {
  const parsed = pypiPayload.safeParse(raw.raw_data);
  if (!parsed.success) {
    return { ok: false, natural_key: raw.natural_key, reason: describeIssues(parsed.error) };
  }
  const p = parsed.data;
  const packageName = p.package_name ?? raw.natural_key;

  return {
    ok: true,
    record: {
      natural_key: normalizePackageKey(packageName),
      extracted_at: raw.extracted_at,
      package_name: packageName,
      version: p.version,
      summary: p.summary,
      description_content_type: p.description_content_type,
      home_page: p.home_page,
      author: p.author,
      author_email: p.author_email,
      maintainer: p.maintainer,
      license: p.license,
      keywords: p.keywords,
      classifiers: p.classifiers,
      requires_dist: p.requires_dist,
      requires_python: p.requires_python,
      project_urls: p.project_urls,
      release_count: p.release_count,
      latest_release_upload_time: p.latest_release_info.upload_time,
      latest_python_version: p.latest_release_info.python_version,
      latest_release_size: p.latest_release_info.size,
      latest_filename: p.latest_release_info.filename,
      downloads_last_day: p.downloads_last_day,
      downloads_last_week: p.downloads_last_week,
      downloads_last_month: p.downloads_last_month,
    },
  };
}
