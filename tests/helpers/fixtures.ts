import {
  AvailabilityRecord,
  AvailabilityRow,
  PropertyId,
  PropertySnapshotRecord,
  PropertySnapshotRow,
  RunLog,
  SearchQuery,
  SnapshotKind,
  UnitRecord,
} from '../../src/types/listing';
import { QueryDefinition, SnapshotStore } from '../../src/types/store';
import { AppConfig, loadConfig } from '../../src/config';
import { MarketplaceProperty, MarketplaceUnit } from '../../src/services/marketplace';

/**
 * Configuration built from the test environment plus overrides
 */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...process.env, ...overrides });
}

export const PRIMARY: SearchQuery = {
  queryId: 1,
  checkInDate: '2026-09-29',
  checkOutDate: '2027-03-28',
  isPrimary: true,
};

export const ONE_DAY_EARLIER: SearchQuery = {
  queryId: 2,
  checkInDate: '2026-09-28',
  checkOutDate: '2027-03-28',
  isPrimary: false,
};

export const THREE_DAYS_EARLIER: SearchQuery = {
  queryId: 3,
  checkInDate: '2026-09-26',
  checkOutDate: '2027-03-28',
  isPrimary: false,
};

export function row(unitId: number, overrides: Partial<AvailabilityRow> = {}): AvailabilityRow {
  return {
    unitId,
    propertyId: 10,
    propertyName: 'Maple Court',
    layout: '1LDK',
    city: 'Shibuya',
    sizeSquareMeters: 30,
    unitNumber: '502',
    queryId: PRIMARY.queryId,
    price: 100000,
    checkInDate: PRIMARY.checkInDate,
    ...overrides,
  };
}

/**
 * Row captured for a secondary query
 */
export function secondaryRow(unitId: number, query: SearchQuery, overrides: Partial<AvailabilityRow> = {}): AvailabilityRow {
  return row(unitId, { queryId: query.queryId, checkInDate: query.checkInDate, ...overrides });
}

export function property(propertyId: PropertyId, overrides: Partial<PropertySnapshotRow> = {}): PropertySnapshotRow {
  return {
    propertyId,
    propertyName: `Building ${propertyId}`,
    propertyNameLocal: null,
    availableRoomCount: 2,
    minimumListPrice: 120000,
    ...overrides,
  };
}

export function marketplaceUnit(unitId: number, overrides: Partial<MarketplaceUnit> = {}): MarketplaceUnit {
  return {
    unit_id: unitId,
    property_id: 10,
    property_name_en: 'Maple Court',
    property_name_ja: null,
    unit_number: '502',
    layout: '1LDK',
    size_square_meters: 30,
    city_en: 'Shibuya',
    city_ja: null,
    coordinates: 'POINT(35.66 139.7)',
    list_price: 100000,
    earliest_move_in_date: '2026-09-20T00:00:00+09:00',
    ...overrides,
  };
}

export function marketplaceProperty(propertyId: number, overrides: Partial<MarketplaceProperty> = {}): MarketplaceProperty {
  return {
    property_id: propertyId,
    property_name_en: `Building ${propertyId}`,
    property_name_ja: null,
    available_room_count: 2,
    minimum_list_price: 120000,
    ...overrides,
  };
}

interface StoredAvailability {
  snapshotDatetime: string;
  row: AvailabilityRow;
}

interface StoredSnapshotRun {
  snapshotDatetime: string;
  kind: SnapshotKind;
  alertedAt: string | null;
}

/**
 * In-memory snapshot store for tests. Written records become readable rows,
 * so several job runs can share one store.
 */
export class MemoryStore implements SnapshotStore {
  queries: SearchQuery[] = [];
  availability: StoredAvailability[] = [];
  properties: Array<{ snapshotDatetime: string; row: PropertySnapshotRow }> = [];
  snapshotRuns: StoredSnapshotRun[] = [];
  units: UnitRecord[] = [];
  availabilityRecords: AvailabilityRecord[] = [];
  propertyRecords: PropertySnapshotRecord[] = [];
  runLogs: Array<Omit<RunLog, 'id' | 'created_at'>> = [];

  addSnapshot(snapshotDatetime: string, rows: AvailabilityRow[]): this {
    this.snapshotRuns.push({ snapshotDatetime, kind: 'units', alertedAt: null });
    this.availability.push(...rows.map(r => ({ snapshotDatetime, row: r })));
    return this;
  }

  addPropertySnapshot(snapshotDatetime: string, rows: PropertySnapshotRow[]): this {
    this.snapshotRuns.push({ snapshotDatetime, kind: 'properties', alertedAt: null });
    this.properties.push(...rows.map(r => ({ snapshotDatetime, row: r })));
    return this;
  }

  async getQueries(): Promise<SearchQuery[]> {
    return [...this.queries];
  }

  private timestamps(kind: SnapshotKind): string[] {
    return this.snapshotRuns
      .filter(run => run.kind === kind)
      .map(run => run.snapshotDatetime)
      .sort()
      .reverse();
  }

  async getRecentSnapshotTimestamps(kind: SnapshotKind, limit: number): Promise<string[]> {
    return this.timestamps(kind).slice(0, limit);
  }

  async getLatestSnapshotBefore(kind: SnapshotKind, snapshotDatetime: string): Promise<string | null> {
    return this.timestamps(kind).find(timestamp => timestamp < snapshotDatetime) ?? null;
  }

  async getLastAlertedSnapshot(kind: SnapshotKind): Promise<string | null> {
    const alerted = this.snapshotRuns
      .filter(run => run.kind === kind && run.alertedAt !== null)
      .map(run => run.snapshotDatetime)
      .sort();
    return alerted[alerted.length - 1] ?? null;
  }

  async fetchAvailability(snapshotDatetime: string, queryId: number): Promise<AvailabilityRow[]> {
    return this.availability
      .filter(entry => entry.snapshotDatetime === snapshotDatetime && entry.row.queryId === queryId)
      .map(entry => entry.row);
  }

  async fetchSecondaryAvailability(snapshotDatetime: string, primaryQuery: SearchQuery): Promise<AvailabilityRow[]> {
    const earlierQueryIds = new Set(
      this.queries
        .filter(
          query =>
            query.queryId !== primaryQuery.queryId &&
            query.checkInDate < primaryQuery.checkInDate &&
            query.checkOutDate === primaryQuery.checkOutDate
        )
        .map(query => query.queryId)
    );
    return this.availability
      .filter(entry => entry.snapshotDatetime === snapshotDatetime && earlierQueryIds.has(entry.row.queryId))
      .map(entry => entry.row);
  }

  async fetchPropertiesForSnapshot(snapshotDatetime: string): Promise<PropertySnapshotRow[]> {
    return this.properties.filter(entry => entry.snapshotDatetime === snapshotDatetime).map(entry => entry.row);
  }

  async fetchPropertyIdsSeenThrough(
    snapshotDatetime: string,
    propertyIds: readonly PropertyId[]
  ): Promise<Set<PropertyId>> {
    const wanted = new Set(propertyIds);
    return new Set(
      this.properties
        .filter(entry => entry.snapshotDatetime <= snapshotDatetime && wanted.has(entry.row.propertyId))
        .map(entry => entry.row.propertyId)
    );
  }

  async syncQueries(definitions: QueryDefinition[]): Promise<SearchQuery[]> {
    this.queries = definitions.map((definition, index) => ({
      queryId: index + 1,
      checkInDate: definition.check_in_date,
      checkOutDate: definition.check_out_date,
      isPrimary: definition.is_primary,
    }));
    return [...this.queries];
  }

  async upsertUnits(units: UnitRecord[]): Promise<void> {
    for (const unit of units) {
      const index = this.units.findIndex(existing => existing.unit_id === unit.unit_id);
      if (index === -1) {
        this.units.push(unit);
      } else {
        this.units[index] = unit;
      }
    }
  }

  async insertAvailability(records: AvailabilityRecord[]): Promise<void> {
    this.availabilityRecords.push(...records);
    this.availability.push(...records.map(record => this.toStoredAvailability(record)));
  }

  private toStoredAvailability(record: AvailabilityRecord): StoredAvailability {
    const unit = this.units.find(candidate => candidate.unit_id === record.unit_id);
    const query = this.queries.find(candidate => candidate.queryId === record.query_id);
    if (!unit || !query) {
      throw new Error(`Availability row references unknown unit ${record.unit_id} or query ${record.query_id}`);
    }
    return {
      snapshotDatetime: record.snapshot_datetime,
      row: {
        unitId: record.unit_id,
        queryId: record.query_id,
        price: record.price_jpy,
        checkInDate: query.checkInDate,
        propertyId: unit.property_id,
        propertyName: unit.property_name_en,
        layout: unit.layout,
        city: unit.city_en,
        sizeSquareMeters: unit.size_square_meters,
        unitNumber: unit.unit_number,
      },
    };
  }

  async insertPropertySnapshot(records: PropertySnapshotRecord[]): Promise<void> {
    this.propertyRecords.push(...records);
    this.properties.push(
      ...records.map(record => ({
        snapshotDatetime: record.snapshot_datetime,
        row: {
          propertyId: record.property_id,
          propertyName: record.property_name_en,
          propertyNameLocal: record.property_name_ja,
          availableRoomCount: record.available_room_count,
          minimumListPrice: record.minimum_list_price,
        },
      }))
    );
  }

  async recordSnapshotRun(snapshotDatetime: string, kind: SnapshotKind): Promise<void> {
    this.snapshotRuns.push({ snapshotDatetime, kind, alertedAt: null });
  }

  async markSnapshotAlerted(snapshotDatetime: string, kind: SnapshotKind, alertedAt: string): Promise<void> {
    for (const run of this.snapshotRuns) {
      if (run.snapshotDatetime === snapshotDatetime && run.kind === kind) {
        run.alertedAt = alertedAt;
      }
    }
  }

  async logRun(log: Omit<RunLog, 'id' | 'created_at'>): Promise<void> {
    this.runLogs.push(log);
  }
}
