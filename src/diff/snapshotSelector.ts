import { SearchQuery, SnapshotPair } from '../types/listing';

function distinctDescending(timestamps: Iterable<string>): string[] {
  return [...new Set(timestamps)].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

/**
 * Pick the two most recent distinct snapshot timestamps.
 * Returns null when fewer than two exist: the run only establishes a baseline.
 */
export function selectSnapshotPair(timestamps: Iterable<string>): SnapshotPair | null {
  const [latest, previous] = distinctDescending(timestamps);
  if (latest === undefined || previous === undefined) {
    return null;
  }
  return { latest, previous };
}

export function selectLatestSnapshot(timestamps: Iterable<string>): string | null {
  const [latest] = distinctDescending(timestamps);
  return latest ?? null;
}

/**
 * The query flagged as primary, or null when none is.
 * Several primaries mean the query table is misconfigured.
 */
export function requirePrimaryQuery(queries: readonly SearchQuery[]): SearchQuery | null {
  const primaries = queries.filter(query => query.isPrimary);
  if (primaries.length > 1) {
    throw new Error(
      `Expected exactly one primary query, found ${primaries.length} (${primaries.map(q => q.queryId).join(', ')})`
    );
  }
  return primaries[0] ?? null;
}

/**
 * Compare against the last snapshot whose changes went out when it is older
 * than the pair's previous one, so a failed delivery is reported again on
 * the next run rather than lost.
 */
export function withAlertBaseline(pair: SnapshotPair, lastAlerted: string | null): SnapshotPair {
  if (lastAlerted !== null && lastAlerted < pair.previous) {
    return { latest: pair.latest, previous: lastAlerted };
  }
  return pair;
}
