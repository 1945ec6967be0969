export type UnitId = number;
export type PropertyId = number;

/**
 * Rental unit metadata as stored in the units table
 */
export interface Unit {
  unitId: UnitId;
  propertyId: PropertyId;
  propertyName: string;
  layout: string;
  city: string;
  sizeSquareMeters: number | null;
  unitNumber: string | null;
}

/**
 * Named date-range filter. Secondary queries carry earlier check-in dates
 * than the primary one.
 */
export interface SearchQuery {
  queryId: number;
  checkInDate: string;
  checkOutDate: string;
  isPrimary: boolean;
}

/**
 * One unit seen under one query at one snapshot.
 * `checkInDate` is the check-in date of the query the row was captured for.
 */
export interface AvailabilityRow extends Unit {
  queryId: number;
  price: number | null;
  checkInDate: string;
}

/**
 * A unit only available for an earlier move-in than the primary query,
 * reduced to its closest-to-primary secondary row.
 */
export type SuggestionRow = AvailabilityRow;

export interface SnapshotPair {
  latest: string;
  previous: string;
}

export interface PriceDelta {
  oldPrice: number | null;
  newPrice: number | null;
}

/**
 * Unordered result of comparing two primary-query snapshots
 */
export interface ChangeSet {
  newIds: Set<UnitId>;
  removedIds: Set<UnitId>;
  priceChanged: Map<UnitId, PriceDelta>;
}

export interface PriceChange<T extends AvailabilityRow = AvailabilityRow> {
  latest: T;
  previous: T;
}

export interface PropertySnapshotRow {
  propertyId: PropertyId;
  propertyName: string;
  propertyNameLocal: string | null;
  availableRoomCount: number;
  minimumListPrice: number | null;
}

/**
 * Database record structures matching Supabase tables
 */
export interface UnitRecord {
  unit_id: number;
  property_id: number;
  property_name_en: string;
  property_name_ja: string | null;
  unit_number: string | null;
  layout: string;
  size_square_meters: number | null;
  city_en: string;
  city_ja: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface QueryRecord {
  query_id: number;
  check_in_date: string;
  check_out_date: string;
  is_primary: boolean;
}

export interface AvailabilityRecord {
  snapshot_datetime: string;
  query_id: number;
  unit_id: number;
  price_jpy: number | null;
  earliest_move_in_date: string | null;
}

export interface PropertySnapshotRecord {
  snapshot_datetime: string;
  property_id: number;
  property_name_en: string;
  property_name_ja: string | null;
  available_room_count: number;
  minimum_list_price: number | null;
}

export type SnapshotKind = 'units' | 'properties';

export interface SnapshotRunRecord {
  snapshot_datetime: string;
  kind: SnapshotKind;
  /** Set once the run's changes were delivered or found empty */
  alerted_at?: string | null;
}

/**
 * Job run log record
 */
export interface RunLog {
  id?: string;
  job_name: string;
  started_at: string;
  completed_at?: string;
  units_found: number;
  changes_found: number;
  errors?: string;
  status: 'running' | 'completed' | 'failed';
  created_at?: string;
}
