import { SearchConfig } from '../config';
import { addDays } from '../diff/ordering';
import { MarketplaceUnit, toAvailabilityRecord, toPropertySnapshotRecord, toUnitRecord } from '../services/marketplace';
import { QueryDefinition } from '../types/store';
import { JobContext } from './context';

/**
 * The primary query plus one secondary query per earlier check-in offset.
 * Secondary queries share the primary check-out date.
 */
export function buildQueryDefinitions(search: SearchConfig): QueryDefinition[] {
  const primary: QueryDefinition = {
    check_in_date: search.checkIn,
    check_out_date: search.checkOut,
    is_primary: true,
  };

  const secondary = search.earlierCheckInOffsets.map(offset => ({
    check_in_date: addDays(search.checkIn, -offset),
    check_out_date: search.checkOut,
    is_primary: false,
  }));

  return [primary, ...secondary];
}

export interface UnitSnapshotSummary {
  /** Null when nothing was recorded */
  snapshotDatetime: string | null;
  unitsFound: number;
  rowsStored: number;
}

/**
 * Fetch every query's availability and persist it as one snapshot.
 * The snapshot run is recorded only after all rows are stored.
 */
export async function captureUnitSnapshot(context: JobContext): Promise<UnitSnapshotSummary> {
  const { store, marketplace, config } = context;
  const snapshotDatetime = context.now().toISOString();

  const queries = await store.syncQueries(buildQueryDefinitions(config.search));

  const results: Array<{ queryId: number; units: MarketplaceUnit[] }> = [];
  for (const query of queries) {
    console.log(`Fetching units for ${query.isPrimary ? 'primary' : 'secondary'} query ${query.checkInDate} -> ${query.checkOutDate}...`);
    const units = await marketplace.fetchAllUnits({ checkIn: query.checkInDate, checkOut: query.checkOutDate });
    console.log(`Found ${units.length} units for query ${query.queryId}`);
    results.push({ queryId: query.queryId, units });
  }

  const uniqueUnits = new Map<number, MarketplaceUnit>();
  for (const { units } of results) {
    for (const unit of units) {
      uniqueUnits.set(unit.unit_id, unit);
    }
  }

  const availability = results.flatMap(({ queryId, units }) =>
    units.map(unit => toAvailabilityRecord(snapshotDatetime, queryId, unit))
  );

  // Empty fetches are never recorded as snapshots
  if (uniqueUnits.size === 0) {
    console.warn('No units found for any query - snapshot not recorded');
    return { snapshotDatetime: null, unitsFound: 0, rowsStored: 0 };
  }

  await store.upsertUnits([...uniqueUnits.values()].map(toUnitRecord));
  await store.insertAvailability(availability);
  await store.recordSnapshotRun(snapshotDatetime, 'units');

  return { snapshotDatetime, unitsFound: uniqueUnits.size, rowsStored: availability.length };
}

export interface PropertySnapshotSummary {
  snapshotDatetime: string | null;
  propertiesFound: number;
}

export async function capturePropertySnapshot(context: JobContext): Promise<PropertySnapshotSummary> {
  const { store, marketplace } = context;
  const snapshotDatetime = context.now().toISOString();

  const properties = await marketplace.fetchProperties();
  console.log(`Found ${properties.length} properties`);

  if (properties.length === 0) {
    console.warn('No properties found - snapshot not recorded');
    return { snapshotDatetime: null, propertiesFound: 0 };
  }

  await store.insertPropertySnapshot(properties.map(property => toPropertySnapshotRecord(snapshotDatetime, property)));
  await store.recordSnapshotRun(snapshotDatetime, 'properties');

  return { snapshotDatetime, propertiesFound: properties.length };
}
