import { PriceChange, SuggestionRow, UnitId } from '../types/listing';
import { indexByUnitId, pricesDiffer } from './primaryDiff';
import { sortSuggestionPriceChanges, sortSuggestions } from './ordering';

export interface SuggestionDiffInput {
  latest: Iterable<SuggestionRow>;
  previous: Iterable<SuggestionRow>;
  /** Units in the latest primary result, after any floor filtering */
  latestPrimaryUnitIds: ReadonlySet<UnitId>;
  primaryCheckIn: string;
}

export interface SuggestionDiff {
  newSuggestions: SuggestionRow[];
  removedSuggestions: SuggestionRow[];
  priceChanges: PriceChange<SuggestionRow>[];
}

/**
 * Diff two suggestion sets.
 *
 * A suggestion that disappeared because the unit is now available for the
 * primary dates is not reported as removed: the primary diff already reports
 * it as new. All collections come back in presentation order.
 */
export function diffSuggestions(input: SuggestionDiffInput): SuggestionDiff {
  const latest = indexByUnitId(input.latest);
  const previous = indexByUnitId(input.previous);

  const newSuggestions: SuggestionRow[] = [];
  const priceChanges: PriceChange<SuggestionRow>[] = [];
  for (const [unitId, row] of latest) {
    const before = previous.get(unitId);
    if (!before) {
      newSuggestions.push(row);
    } else if (pricesDiffer(row.price, before.price)) {
      priceChanges.push({ latest: row, previous: before });
    }
  }

  const removedSuggestions: SuggestionRow[] = [];
  for (const [unitId, row] of previous) {
    if (!latest.has(unitId) && !input.latestPrimaryUnitIds.has(unitId)) {
      removedSuggestions.push(row);
    }
  }

  return {
    newSuggestions: sortSuggestions(newSuggestions, input.primaryCheckIn),
    removedSuggestions: sortSuggestions(removedSuggestions, input.primaryCheckIn),
    priceChanges: sortSuggestionPriceChanges(priceChanges, input.primaryCheckIn),
  };
}
