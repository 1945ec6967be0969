import { AvailabilityRow, ChangeSet, PriceChange, PriceDelta, UnitId } from '../types/listing';

export type SnapshotIndex<T extends AvailabilityRow = AvailabilityRow> = ReadonlyMap<UnitId, T>;

export function indexByUnitId<T extends AvailabilityRow>(rows: Iterable<T>): Map<UnitId, T> {
  const index = new Map<UnitId, T>();
  for (const row of rows) {
    index.set(row.unitId, row);
  }
  return index;
}

/**
 * Exact price comparison. A missing price differs from any real price;
 * two missing prices are not a change.
 */
export function pricesDiffer(a: number | null, b: number | null): boolean {
  return a !== b;
}

/**
 * Compare two primary-query snapshots by unit id.
 * The three partitions are disjoint: new and removed are set differences,
 * price changes only look at the intersection.
 */
export function comparePrimarySnapshots(latest: SnapshotIndex, previous: SnapshotIndex): ChangeSet {
  const newIds = new Set<UnitId>();
  const removedIds = new Set<UnitId>();
  const priceChanged = new Map<UnitId, PriceDelta>();

  for (const [unitId, row] of latest) {
    const before = previous.get(unitId);
    if (!before) {
      newIds.add(unitId);
    } else if (pricesDiffer(row.price, before.price)) {
      priceChanged.set(unitId, { oldPrice: before.price, newPrice: row.price });
    }
  }

  for (const unitId of previous.keys()) {
    if (!latest.has(unitId)) {
      removedIds.add(unitId);
    }
  }

  return { newIds, removedIds, priceChanged };
}

export interface ResolvedPrimaryChanges {
  newUnits: AvailabilityRow[];
  removedUnits: AvailabilityRow[];
  priceChanges: PriceChange[];
}

function lookup(index: SnapshotIndex, unitId: UnitId): AvailabilityRow {
  const row = index.get(unitId);
  if (!row) {
    throw new Error(`Unit ${unitId} missing from snapshot index`);
  }
  return row;
}

/**
 * Attach rows to a change set, ordered by unit id ascending.
 * New units come from the latest snapshot, removed units from the previous one.
 */
export function resolvePrimaryChanges(
  changes: ChangeSet,
  latest: SnapshotIndex,
  previous: SnapshotIndex
): ResolvedPrimaryChanges {
  const ascending = (ids: Iterable<UnitId>) => [...ids].sort((a, b) => a - b);

  return {
    newUnits: ascending(changes.newIds).map(id => lookup(latest, id)),
    removedUnits: ascending(changes.removedIds).map(id => lookup(previous, id)),
    priceChanges: ascending(changes.priceChanged.keys()).map(id => ({
      latest: lookup(latest, id),
      previous: lookup(previous, id),
    })),
  };
}
