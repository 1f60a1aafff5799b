import { DedupStats, ResultSet, SearchResult } from '../types.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Reduces a URL (or bare host) to its comparable domain: lower-case host with
 * scheme, `www.` prefix and path removed. Returns '' for unparsable input.
 */
export function normalizeDomain(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    return '';
  }
  try {
    const parsed = new URL(SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`);
    return parsed.hostname.toLowerCase().replace(/^www\./, '').replace(/\.$/, '');
  } catch {
    return '';
  }
}

function businessKey(record: SearchResult): string {
  const name = (record.place?.businessName ?? record.title).trim().toLowerCase();
  const address = (record.place?.address ?? '').trim().toLowerCase();
  return `${name}|${address}`;
}

/**
 * Key a record is merged under. Web records and maps records with a website
 * use their domain; maps records without one fall back to the place identity.
 */
export function dedupKey(record: SearchResult): string {
  const domain = record.domain ? normalizeDomain(record.domain) : normalizeDomain(record.url);
  if (domain) {
    return domain;
  }
  if (record.sourceType === 'maps') {
    const placeId = record.place?.placeId.trim();
    if (placeId) {
      return `place:${placeId}`;
    }
    const key = businessKey(record);
    return key === '|' ? '' : `place:${key}`;
  }
  return '';
}

/** Drops repeated URLs (exact, case-sensitive); records without a URL pass through. */
export function dedupeByUrl(records: readonly SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];
  for (const record of records) {
    if (record.url) {
      if (seen.has(record.url)) continue;
      seen.add(record.url);
    }
    unique.push(record);
  }
  return unique;
}

/** Drops repeated (business name, address) pairs within the maps phase. */
export function dedupeByBusiness(records: readonly SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];
  for (const record of records) {
    const key = businessKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}

/**
 * Merges result sequences into one set, web phase before maps phase, keeping
 * the first record seen for every key.
 */
export function deduplicate(...sequences: ReadonlyArray<readonly SearchResult[]>): ResultSet {
  const all = sequences.flat();
  const web = dedupeByUrl(all.filter((record) => record.sourceType === 'web'));
  const maps = dedupeByBusiness(all.filter((record) => record.sourceType === 'maps'));

  const records = new Map<string, SearchResult>();
  let withoutKey = 0;
  for (const record of [...web, ...maps]) {
    const key = dedupKey(record);
    if (!key) {
      withoutKey += 1;
      continue;
    }
    if (!records.has(key)) {
      records.set(key, record);
    }
  }

  const stats: DedupStats = {
    input: all.length,
    unique: records.size,
    duplicates: all.length - records.size - withoutKey,
    withoutKey
  };
  return { records, stats };
}
