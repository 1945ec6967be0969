import { AvailabilityRow, PriceChange, SuggestionRow } from '../types/listing';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function parseIsoDate(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (!match) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  const [, year, month, day] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day));
}

/**
 * Whole days between a suggestion's check-in and the primary check-in
 */
export function daysEarlier(primaryCheckIn: string, suggestedCheckIn: string): number {
  return Math.round((parseIsoDate(primaryCheckIn) - parseIsoDate(suggestedCheckIn)) / MS_PER_DAY);
}

export function addDays(isoDate: string, days: number): string {
  return new Date(parseIsoDate(isoDate) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Ascending price order with unknown prices after every known price.
 * Two unknown prices compare equal here so the next sort key decides.
 */
export function comparePrices(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

/**
 * Larger units first; a missing size counts as 0
 */
export function compareSizesDescending(a: number | null, b: number | null): number {
  return (b ?? 0) - (a ?? 0);
}

/**
 * Presentation order for suggestions: fewest days earlier first, then
 * cheapest (unknown price last), then largest, then unit id.
 */
export function compareSuggestions(primaryCheckIn: string) {
  return (a: SuggestionRow, b: SuggestionRow): number =>
    daysEarlier(primaryCheckIn, a.checkInDate) - daysEarlier(primaryCheckIn, b.checkInDate) ||
    comparePrices(a.price, b.price) ||
    compareSizesDescending(a.sizeSquareMeters, b.sizeSquareMeters) ||
    a.unitId - b.unitId;
}

export function sortSuggestions(rows: Iterable<SuggestionRow>, primaryCheckIn: string): SuggestionRow[] {
  return [...rows].sort(compareSuggestions(primaryCheckIn));
}

export function sortSuggestionPriceChanges(
  changes: Iterable<PriceChange<SuggestionRow>>,
  primaryCheckIn: string
): PriceChange<SuggestionRow>[] {
  const compare = compareSuggestions(primaryCheckIn);
  return [...changes].sort((a, b) => compare(a.latest, b.latest));
}

/**
 * Roundup order for primary units: cheapest first, then largest
 */
export function sortByPriceThenSize<T extends AvailabilityRow>(rows: Iterable<T>): T[] {
  return [...rows].sort(
    (a, b) =>
      comparePrices(a.price, b.price) ||
      compareSizesDescending(a.sizeSquareMeters, b.sizeSquareMeters) ||
      a.unitId - b.unitId
  );
}

export function byUnitId<T extends { unitId: number }>(a: T, b: T): number {
  return a.unitId - b.unitId;
}
