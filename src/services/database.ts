import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppConfig } from '../config';
import {
  AvailabilityRecord,
  AvailabilityRow,
  PropertyId,
  PropertySnapshotRecord,
  PropertySnapshotRow,
  RunLog,
  SearchQuery,
  SnapshotKind,
  SnapshotRunRecord,
  UnitRecord,
} from '../types/listing';
import { QueryDefinition, SnapshotStore } from '../types/store';

const AVAILABILITY_COLUMNS =
  'unit_id, query_id, price_jpy, ' +
  'units!inner(property_id, property_name_en, layout, city_en, size_square_meters, unit_number), ' +
  'queries!inner(check_in_date, check_out_date, is_primary)';

const QUERY_COLUMNS = 'query_id, check_in_date, check_out_date, is_primary';

const PROPERTY_COLUMNS =
  'property_id, property_name_en, property_name_ja, available_room_count, minimum_list_price';

const queryRecordSchema = z.object({
  query_id: z.number().int(),
  check_in_date: z.string(),
  check_out_date: z.string(),
  is_primary: z.boolean(),
});

const availabilityJoinSchema = z.object({
  unit_id: z.number().int(),
  query_id: z.number().int(),
  price_jpy: z.number().int().nullable(),
  units: z.object({
    property_id: z.number().int(),
    property_name_en: z.string(),
    layout: z.string(),
    city_en: z.string(),
    size_square_meters: z.number().nullable(),
    unit_number: z.union([z.string(), z.number()]).nullable(),
  }),
  queries: z.object({
    check_in_date: z.string(),
    check_out_date: z.string(),
    is_primary: z.boolean(),
  }),
});

const propertySnapshotSchema = z.object({
  property_id: z.number().int(),
  property_name_en: z.string(),
  property_name_ja: z.string().nullable(),
  available_room_count: z.number().int(),
  minimum_list_price: z.number().int().nullable(),
});

/**
 * PostgREST caps every response at this many rows; larger reads are paged
 */
export const STORE_PAGE_SIZE = 1000;

interface PageResponse {
  data: unknown;
  error: { message: string } | null;
}

/**
 * Read `fetchPage(from, to)` ranges until a short page comes back.
 * Callers order the query so pages do not overlap.
 */
async function selectAllPages(
  fetchPage: (from: number, to: number) => PromiseLike<PageResponse>,
  action: string
): Promise<unknown[]> {
  const rows: unknown[] = [];

  for (let from = 0; ; from += STORE_PAGE_SIZE) {
    const { data, error } = await fetchPage(from, from + STORE_PAGE_SIZE - 1);
    if (error) {
      throw new Error(`Failed to ${action}: ${error.message}`);
    }

    const page = Array.isArray(data) ? data : [];
    rows.push(...page);
    if (page.length < STORE_PAGE_SIZE) {
      return rows;
    }
  }
}

/**
 * Availability row joined with its unit and query
 */
export type AvailabilityJoinRecord = z.infer<typeof availabilityJoinSchema>;

/**
 * Validate rows returned by Supabase, naming the table on failure
 */
function parseRows<T extends z.ZodTypeAny>(schema: T, data: unknown, table: string): z.infer<T>[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new Error(`Unexpected ${table} rows: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  return parsed.data;
}

export function toSearchQuery(record: z.infer<typeof queryRecordSchema>): SearchQuery {
  return {
    queryId: record.query_id,
    checkInDate: record.check_in_date,
    checkOutDate: record.check_out_date,
    isPrimary: record.is_primary,
  };
}

export function toAvailabilityRow(record: AvailabilityJoinRecord): AvailabilityRow {
  return {
    unitId: record.unit_id,
    queryId: record.query_id,
    price: record.price_jpy,
    checkInDate: record.queries.check_in_date,
    propertyId: record.units.property_id,
    propertyName: record.units.property_name_en,
    layout: record.units.layout,
    city: record.units.city_en,
    sizeSquareMeters: record.units.size_square_meters,
    unitNumber: record.units.unit_number === null ? null : String(record.units.unit_number),
  };
}

export function toPropertySnapshotRow(record: z.infer<typeof propertySnapshotSchema>): PropertySnapshotRow {
  return {
    propertyId: record.property_id,
    propertyName: record.property_name_en,
    propertyNameLocal: record.property_name_ja,
    availableRoomCount: record.available_room_count,
    minimumListPrice: record.minimum_list_price,
  };
}

/**
 * Snapshot store backed by Supabase
 */
export class DatabaseService implements SnapshotStore {
  private supabase: SupabaseClient;

  constructor(config: Pick<AppConfig, 'supabase'>) {
    this.supabase = createClient(config.supabase.url, config.supabase.serviceKey);
    console.log('Database service initialized with Supabase');
  }

  /**
   * All configured search queries, latest check-in first
   */
  async getQueries(): Promise<SearchQuery[]> {
    const { data, error } = await this.supabase
      .from('queries')
      .select(QUERY_COLUMNS)
      .order('check_in_date', { ascending: false });

    if (error) {
      throw new Error(`Failed to fetch queries: ${error.message}`);
    }

    return parseRows(queryRecordSchema, data, 'queries').map(toSearchQuery);
  }

  /**
   * Make `definitions` the active query set. Previous primaries are demoted
   * first so only the definition flagged primary stays primary.
   */
  async syncQueries(definitions: QueryDefinition[]): Promise<SearchQuery[]> {
    const { error: demoteError } = await this.supabase
      .from('queries')
      .update({ is_primary: false })
      .eq('is_primary', true);

    if (demoteError) {
      throw new Error(`Failed to reset primary query: ${demoteError.message}`);
    }

    const { data, error } = await this.supabase
      .from('queries')
      .upsert(definitions, {
        onConflict: 'check_in_date,check_out_date',
        ignoreDuplicates: false
      })
      .select(QUERY_COLUMNS);

    if (error) {
      throw new Error(`Failed to sync queries: ${error.message}`);
    }

    const queries = parseRows(queryRecordSchema, data, 'queries').map(toSearchQuery);
    console.log(`Synced ${queries.length} search queries`);
    return queries;
  }

  /**
   * Most recent snapshot timestamps of one kind, newest first
   */
  async getRecentSnapshotTimestamps(kind: SnapshotKind, limit: number): Promise<string[]> {
    const { data, error } = await this.supabase
      .from('snapshot_runs')
      .select('snapshot_datetime')
      .eq('kind', kind)
      .order('snapshot_datetime', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to fetch snapshot timestamps: ${error.message}`);
    }

    const records = parseRows(z.object({ snapshot_datetime: z.string() }), data, 'snapshot_runs');
    return records.map(record => record.snapshot_datetime);
  }

  /**
   * Most recent snapshot of one kind strictly before `snapshotDatetime`
   */
  async getLatestSnapshotBefore(kind: SnapshotKind, snapshotDatetime: string): Promise<string | null> {
    const { data, error } = await this.supabase
      .from('snapshot_runs')
      .select('snapshot_datetime')
      .eq('kind', kind)
      .lt('snapshot_datetime', snapshotDatetime)
      .order('snapshot_datetime', { ascending: false })
      .limit(1);

    if (error) {
      throw new Error(`Failed to fetch earlier snapshot: ${error.message}`);
    }

    const [record] = parseRows(z.object({ snapshot_datetime: z.string() }), data, 'snapshot_runs');
    return record?.snapshot_datetime ?? null;
  }

  async getLastAlertedSnapshot(kind: SnapshotKind): Promise<string | null> {
    const { data, error } = await this.supabase
      .from('snapshot_runs')
      .select('snapshot_datetime')
      .eq('kind', kind)
      .not('alerted_at', 'is', null)
      .order('snapshot_datetime', { ascending: false })
      .limit(1);

    if (error) {
      throw new Error(`Failed to fetch last alerted snapshot: ${error.message}`);
    }

    const [record] = parseRows(z.object({ snapshot_datetime: z.string() }), data, 'snapshot_runs');
    return record?.snapshot_datetime ?? null;
  }

  async fetchAvailability(snapshotDatetime: string, queryId: number): Promise<AvailabilityRow[]> {
    const data = await selectAllPages(
      (from, to) =>
        this.supabase
          .from('availability_snapshots')
          .select(AVAILABILITY_COLUMNS)
          .eq('snapshot_datetime', snapshotDatetime)
          .eq('query_id', queryId)
          .order('unit_id')
          .range(from, to),
      `fetch availability for query ${queryId}`
    );

    return parseRows(availabilityJoinSchema, data, 'availability_snapshots').map(toAvailabilityRow);
  }

  async fetchSecondaryAvailability(snapshotDatetime: string, primaryQuery: SearchQuery): Promise<AvailabilityRow[]> {
    const data = await selectAllPages(
      (from, to) =>
        this.supabase
          .from('availability_snapshots')
          .select(AVAILABILITY_COLUMNS)
          .eq('snapshot_datetime', snapshotDatetime)
          .neq('query_id', primaryQuery.queryId)
          .lt('queries.check_in_date', primaryQuery.checkInDate)
          .eq('queries.check_out_date', primaryQuery.checkOutDate)
          .order('query_id')
          .order('unit_id')
          .range(from, to),
      'fetch secondary availability'
    );

    return parseRows(availabilityJoinSchema, data, 'availability_snapshots').map(toAvailabilityRow);
  }

  async fetchPropertiesForSnapshot(snapshotDatetime: string): Promise<PropertySnapshotRow[]> {
    const data = await selectAllPages(
      (from, to) =>
        this.supabase
          .from('property_snapshots')
          .select(PROPERTY_COLUMNS)
          .eq('snapshot_datetime', snapshotDatetime)
          .order('property_id')
          .range(from, to),
      'fetch property snapshot'
    );

    return parseRows(propertySnapshotSchema, data, 'property_snapshots').map(toPropertySnapshotRow);
  }

  /**
   * Which of `propertyIds` any snapshot up to and including `snapshotDatetime` lists
   */
  async fetchPropertyIdsSeenThrough(
    snapshotDatetime: string,
    propertyIds: readonly PropertyId[]
  ): Promise<Set<PropertyId>> {
    if (propertyIds.length === 0) {
      return new Set();
    }

    const data = await selectAllPages(
      (from, to) =>
        this.supabase
          .from('property_snapshots')
          .select('property_id, snapshot_datetime')
          .lte('snapshot_datetime', snapshotDatetime)
          .in('property_id', [...propertyIds])
          .order('property_id')
          .order('snapshot_datetime')
          .range(from, to),
      'fetch earlier properties'
    );

    const records = parseRows(z.object({ property_id: z.number().int() }), data, 'property_snapshots');
    return new Set(records.map(record => record.property_id));
  }

  /**
   * Insert or refresh unit metadata
   */
  async upsertUnits(units: UnitRecord[]): Promise<void> {
    const { error } = await this.supabase
      .from('units')
      .upsert(units, {
        onConflict: 'unit_id',
        ignoreDuplicates: false
      });

    if (error) {
      throw new Error(`Failed to update units: ${error.message}`);
    }

    console.log(`Updated ${units.length} unit records`);
  }

  async insertAvailability(records: AvailabilityRecord[]): Promise<void> {
    const { error } = await this.supabase
      .from('availability_snapshots')
      .upsert(records, {
        onConflict: 'snapshot_datetime,query_id,unit_id',
        ignoreDuplicates: false
      });

    if (error) {
      throw new Error(`Failed to store availability snapshot: ${error.message}`);
    }

    console.log(`Stored ${records.length} availability rows`);
  }

  async insertPropertySnapshot(records: PropertySnapshotRecord[]): Promise<void> {
    const { error } = await this.supabase
      .from('property_snapshots')
      .upsert(records, {
        onConflict: 'snapshot_datetime,property_id',
        ignoreDuplicates: false
      });

    if (error) {
      throw new Error(`Failed to store property snapshot: ${error.message}`);
    }

    console.log(`Stored ${records.length} property rows`);
  }

  /**
   * Mark a snapshot as complete. Written last, so readers never pick up a
   * half-written snapshot.
   */
  async recordSnapshotRun(snapshotDatetime: string, kind: SnapshotKind): Promise<void> {
    const record: SnapshotRunRecord = { snapshot_datetime: snapshotDatetime, kind };
    const { error } = await this.supabase
      .from('snapshot_runs')
      .insert(record);

    if (error) {
      throw new Error(`Failed to record snapshot run: ${error.message}`);
    }
  }

  async markSnapshotAlerted(snapshotDatetime: string, kind: SnapshotKind, alertedAt: string): Promise<void> {
    const { error } = await this.supabase
      .from('snapshot_runs')
      .update({ alerted_at: alertedAt })
      .eq('snapshot_datetime', snapshotDatetime)
      .eq('kind', kind);

    if (error) {
      throw new Error(`Failed to mark snapshot alerted: ${error.message}`);
    }
  }

  /**
   * Log job run results
   */
  async logRun(log: Omit<RunLog, 'id' | 'created_at'>): Promise<void> {
    const { error } = await this.supabase
      .from('run_logs')
      .insert(log);

    if (error) {
      throw new Error(`Failed to log run: ${error.message}`);
    }

    console.log(`Logged ${log.job_name} run: ${log.status} - ${log.units_found} units found, ${log.changes_found} changes`);
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const { error } = await this.supabase
        .from('queries')
        .select('query_id')
        .limit(1);

      if (error) {
        console.error('Database connection test failed:', error.message);
        return false;
      }

      console.log('Database connection test successful');
      return true;
    } catch (error) {
      console.error('Database connection test failed:', error);
      return false;
    }
  }
}
