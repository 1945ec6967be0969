import { PropertyId, PropertySnapshotRow } from '../types/listing';

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Properties in the latest snapshot whose id never appeared before it
 */
export function findNewProperties(
  latest: Iterable<PropertySnapshotRow>,
  earlierPropertyIds: ReadonlySet<PropertyId>
): PropertySnapshotRow[] {
  const seen = new Set<PropertyId>();
  const fresh: PropertySnapshotRow[] = [];

  for (const property of latest) {
    if (earlierPropertyIds.has(property.propertyId) || seen.has(property.propertyId)) continue;
    seen.add(property.propertyId);
    fresh.push(property);
  }

  return fresh.sort((a, b) => a.propertyId - b.propertyId);
}

/**
 * Snapshots taken before this instant form the baseline for "opened this week"
 */
export function weeklyCutoff(now: Date): string {
  return new Date(now.getTime() - WEEK_MS).toISOString();
}
