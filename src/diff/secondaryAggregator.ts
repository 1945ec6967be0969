import { AvailabilityRow, SuggestionRow, UnitId } from '../types/listing';

/**
 * Whether `candidate` should replace `current` as a unit's best secondary row.
 * Later check-in wins (closest to the primary date); on equal dates the
 * lower query id wins so the result does not depend on row order.
 */
function isBetter(candidate: AvailabilityRow, current: AvailabilityRow): boolean {
  if (candidate.checkInDate !== current.checkInDate) {
    return candidate.checkInDate > current.checkInDate;
  }
  return candidate.queryId < current.queryId;
}

/**
 * Collapse secondary-query rows of one snapshot into one suggestion per unit.
 *
 * Units present in the primary query at the same snapshot never qualify.
 * Each remaining unit keeps the row of the secondary query with the latest
 * check-in date, with that query's price and size.
 */
export function aggregateSecondaryRows(
  secondaryRows: Iterable<AvailabilityRow>,
  primaryUnitIds: ReadonlySet<UnitId>
): SuggestionRow[] {
  const best = new Map<UnitId, AvailabilityRow>();

  for (const row of secondaryRows) {
    if (primaryUnitIds.has(row.unitId)) continue;

    const current = best.get(row.unitId);
    if (!current || isBetter(row, current)) {
      best.set(row.unitId, row);
    }
  }

  return [...best.values()].sort((a, b) => a.unitId - b.unitId);
}
