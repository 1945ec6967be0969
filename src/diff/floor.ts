import { AvailabilityRow } from '../types/listing';

/**
 * Infer the floor from a unit number.
 *
 * Unit numbers follow the building's display convention, so this is a
 * heuristic: one digit is the ground floor (1), three or more digits drop the
 * last two (502 -> 5, 1003 -> 10). Two digits, non-numeric or missing values
 * have no known floor and yield null.
 */
export function unitFloor(unitNumber: string | number | null | undefined): number | null {
  if (unitNumber === null || unitNumber === undefined) return null;

  const digits = String(unitNumber).trim();
  if (!/^\d+$/.test(digits)) return null;

  if (digits.length <= 1) return 1;
  if (digits.length === 2) return null;

  return parseInt(digits.slice(0, -2), 10);
}

/**
 * Drop first-floor units. Units with an unknown floor are kept.
 */
export function filterOutFirstFloor<T extends Pick<AvailabilityRow, 'unitNumber'>>(rows: readonly T[]): T[] {
  return rows.filter(row => unitFloor(row.unitNumber) !== 1);
}

export function ordinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return `${n}th`;

  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * "5th floor", or "Unknown floor" when the floor cannot be inferred
 */
export function floorLabel(unitNumber: string | null): string {
  const floor = unitFloor(unitNumber);
  return floor === null ? 'Unknown floor' : `${ordinal(floor)} floor`;
}
