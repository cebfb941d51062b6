import { ExtractedRecord } from './types';

export interface Resolution<T extends ExtractedRecord> {
  /** One canonical record per natural key. */
  snapshots: Map<string, T>;
  /** Natural keys whose latest extraction timestamp was shared by more than one record. */
  ambiguous: string[];
}

/**
 * JSON with object keys sorted, so two structurally equal records always
 * serialize identically regardless of property insertion order.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return v;
    const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  });
}

/**
 * Picks the record with the latest `extracted_at` per natural key. When the
 * latest timestamp is tied, the record with the lexically greatest stable
 * serialization wins, which makes the choice independent of input order.
 */
export function resolveCanonical<T extends ExtractedRecord>(records: Iterable<T>): Resolution<T> {
  const winners = new Map<string, { record: T; fingerprint: string | null; tied: boolean }>();

  for (const record of records) {
    const current = winners.get(record.natural_key);
    if (!current) {
      winners.set(record.natural_key, { record, fingerprint: null, tied: false });
      continue;
    }

    const diff = record.extracted_at.getTime() - current.record.extracted_at.getTime();
    if (diff > 0) {
      winners.set(record.natural_key, { record, fingerprint: null, tied: false });
    } else if (diff === 0) {
      const currentFingerprint = current.fingerprint ?? stableStringify(current.record);
      const candidateFingerprint = stableStringify(record);
      if (candidateFingerprint > currentFingerprint) {
        winners.set(record.natural_key, { record, fingerprint: candidateFingerprint, tied: true });
      } else {
        current.fingerprint = currentFingerprint;
        current.tied = true;
      }
    }
  }

  const snapshots = new Map<string, T>();
  const ambiguous: string[] = [];
  for (const [key, winner] of winners) {
    snapshots.set(key, winner.record);
    if (winner.tied) ambiguous.push(key);
  }
  ambiguous.sort();

  return { snapshots, ambiguous };
}
