import { DatabaseService, STORE_PAGE_SIZE } from '../../src/services/database';
import { AvailabilityRecord } from '../../src/types/listing';

interface QueryResult {
  data?: unknown;
  error: { message: string } | null;
}

// Results handed out to awaited query chains, in order
let queuedResults: QueryResult[] = [];

// Mock Supabase client: every builder method chains, awaiting the chain yields the next queued result
const mockSupabaseClient = {
  from: jest.fn().mockReturnThis(),
  select: jest.fn().mockReturnThis(),
  eq: jest.fn().mockReturnThis(),
  neq: jest.fn().mockReturnThis(),
  lt: jest.fn().mockReturnThis(),
  lte: jest.fn().mockReturnThis(),
  in: jest.fn().mockReturnThis(),
  not: jest.fn().mockReturnThis(),
  order: jest.fn().mockReturnThis(),
  limit: jest.fn().mockReturnThis(),
  range: jest.fn().mockReturnThis(),
  upsert: jest.fn().mockReturnThis(),
  update: jest.fn().mockReturnThis(),
  insert: jest.fn().mockReturnThis(),
  then<T>(onFulfilled: (result: QueryResult) => T, onRejected?: (reason: unknown) => T): Promise<T> {
    const next = queuedResults.shift() ?? { data: [], error: null };
    return Promise.resolve(next).then(onFulfilled, onRejected);
  },
};

// Mock the createClient function
jest.mock('@supabase/supabase-js', () => ({
  createClient: jest.fn(() => mockSupabaseClient)
}));

const config = { supabase: { url: 'https://test-project.supabase.co', serviceKey: 'test-service-key' } };

const joinedRow = {
  unit_id: 501,
  query_id: 1,
  price_jpy: 182000,
  units: {
    property_id: 12,
    property_name_en: 'Maple Court',
    layout: '1LDK',
    city_en: 'Meguro',
    size_square_meters: 34.5,
    unit_number: 1203,
  },
  queries: { check_in_date: '2026-09-29', check_out_date: '2027-03-28', is_primary: true },
};

describe('DatabaseService', () => {
  let databaseService: DatabaseService;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    queuedResults = [];
    databaseService = new DatabaseService(config);
  });

  describe('getQueries', () => {
    it('should return search queries', async () => {
      queuedResults.push({
        data: [{ query_id: 1, check_in_date: '2026-09-29', check_out_date: '2027-03-28', is_primary: true }],
        error: null,
      });

      const result = await databaseService.getQueries();

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('queries');
      expect(mockSupabaseClient.order).toHaveBeenCalledWith('check_in_date', { ascending: false });
      expect(result).toEqual([{ queryId: 1, checkInDate: '2026-09-29', checkOutDate: '2027-03-28', isPrimary: true }]);
    });

    it('should throw error on database failure', async () => {
      queuedResults.push({ data: null, error: { message: 'Database error' } });

      await expect(databaseService.getQueries()).rejects.toThrow('Failed to fetch queries: Database error');
    });
  });

  describe('syncQueries', () => {
    const definitions = [
      { check_in_date: '2026-09-29', check_out_date: '2027-03-28', is_primary: true },
      { check_in_date: '2026-09-28', check_out_date: '2027-03-28', is_primary: false },
    ];

    it('should demote the old primary before upserting', async () => {
      queuedResults.push(
        { error: null },
        {
          data: [
            { query_id: 1, check_in_date: '2026-09-29', check_out_date: '2027-03-28', is_primary: true },
            { query_id: 2, check_in_date: '2026-09-28', check_out_date: '2027-03-28', is_primary: false },
          ],
          error: null,
        }
      );

      const result = await databaseService.syncQueries(definitions);

      expect(mockSupabaseClient.update).toHaveBeenCalledWith({ is_primary: false });
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('is_primary', true);
      expect(mockSupabaseClient.upsert).toHaveBeenCalledWith(definitions, {
        onConflict: 'check_in_date,check_out_date',
        ignoreDuplicates: false
      });
      expect(result.map(query => query.queryId)).toEqual([1, 2]);
    });

    it('should stop when the primary cannot be reset', async () => {
      queuedResults.push({ error: { message: 'permission denied' } });

      await expect(databaseService.syncQueries(definitions)).rejects.toThrow(
        'Failed to reset primary query: permission denied'
      );
      expect(mockSupabaseClient.upsert).not.toHaveBeenCalled();
    });
  });

  describe('getRecentSnapshotTimestamps', () => {
    it('should return timestamps of one snapshot kind', async () => {
      queuedResults.push({
        data: [{ snapshot_datetime: '2026-10-18T08:00:00+00:00' }, { snapshot_datetime: '2026-10-18T06:00:00+00:00' }],
        error: null,
      });

      const result = await databaseService.getRecentSnapshotTimestamps('units', 2);

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('snapshot_runs');
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('kind', 'units');
      expect(mockSupabaseClient.limit).toHaveBeenCalledWith(2);
      expect(result).toEqual(['2026-10-18T08:00:00+00:00', '2026-10-18T06:00:00+00:00']);
    });

    it('should find the latest snapshot before an instant', async () => {
      queuedResults.push({ data: [{ snapshot_datetime: '2026-10-11T08:00:00+00:00' }], error: null });

      const result = await databaseService.getLatestSnapshotBefore('properties', '2026-10-12T09:00:00.000Z');

      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('kind', 'properties');
      expect(mockSupabaseClient.lt).toHaveBeenCalledWith('snapshot_datetime', '2026-10-12T09:00:00.000Z');
      expect(mockSupabaseClient.limit).toHaveBeenCalledWith(1);
      expect(result).toBe('2026-10-11T08:00:00+00:00');
    });

    it('should return null when no earlier snapshot exists', async () => {
      queuedResults.push({ data: [], error: null });

      expect(await databaseService.getLatestSnapshotBefore('properties', '2026-10-12T09:00:00.000Z')).toBeNull();
    });
  });

  describe('alerted snapshots', () => {
    it('should read the latest snapshot with an alert time', async () => {
      queuedResults.push({ data: [{ snapshot_datetime: '2026-10-18T06:00:00+00:00' }], error: null });

      const result = await databaseService.getLastAlertedSnapshot('units');

      expect(mockSupabaseClient.not).toHaveBeenCalledWith('alerted_at', 'is', null);
      expect(mockSupabaseClient.order).toHaveBeenCalledWith('snapshot_datetime', { ascending: false });
      expect(result).toBe('2026-10-18T06:00:00+00:00');
    });

    it('should stamp one snapshot run as alerted', async () => {
      await databaseService.markSnapshotAlerted('2026-10-18T08:00:00.000Z', 'units', '2026-10-18T08:00:05.000Z');

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('snapshot_runs');
      expect(mockSupabaseClient.update).toHaveBeenCalledWith({ alerted_at: '2026-10-18T08:00:05.000Z' });
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('snapshot_datetime', '2026-10-18T08:00:00.000Z');
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('kind', 'units');
    });

    it('should throw when the alert time cannot be stored', async () => {
      queuedResults.push({ error: { message: 'row level security' } });

      await expect(
        databaseService.markSnapshotAlerted('2026-10-18T08:00:00.000Z', 'units', '2026-10-18T08:00:05.000Z')
      ).rejects.toThrow('Failed to mark snapshot alerted: row level security');
    });
  });

  describe('fetchAvailability', () => {
    it('should map joined rows', async () => {
      queuedResults.push({ data: [joinedRow], error: null });

      const result = await databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 1);

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('availability_snapshots');
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('snapshot_datetime', '2026-10-18T08:00:00+00:00');
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('query_id', 1);
      expect(result).toEqual([
        {
          unitId: 501,
          queryId: 1,
          price: 182000,
          checkInDate: '2026-09-29',
          propertyId: 12,
          propertyName: 'Maple Court',
          layout: '1LDK',
          city: 'Meguro',
          sizeSquareMeters: 34.5,
          unitNumber: '1203',
        },
      ]);
    });

    it('should read past the row cap page by page', async () => {
      const firstPage = Array.from({ length: STORE_PAGE_SIZE }, (_, index) => ({ ...joinedRow, unit_id: index + 1 }));
      queuedResults.push({ data: firstPage, error: null }, { data: [{ ...joinedRow, unit_id: 1001 }], error: null });

      const result = await databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 1);

      expect(result).toHaveLength(1001);
      expect(result[1000].unitId).toBe(1001);
      expect(mockSupabaseClient.order).toHaveBeenCalledWith('unit_id');
      expect(mockSupabaseClient.range.mock.calls).toEqual([
        [0, 999],
        [1000, 1999],
      ]);
    });

    it('should stop after a short first page', async () => {
      queuedResults.push({ data: [joinedRow], error: null });

      await databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 1);

      expect(mockSupabaseClient.range.mock.calls).toEqual([[0, 999]]);
    });

    it('should throw when a later page fails', async () => {
      const firstPage = Array.from({ length: STORE_PAGE_SIZE }, (_, index) => ({ ...joinedRow, unit_id: index + 1 }));
      queuedResults.push({ data: firstPage, error: null }, { data: null, error: { message: 'timeout' } });

      await expect(databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 1)).rejects.toThrow(
        'Failed to fetch availability for query 1: timeout'
      );
    });

    it('should reject malformed rows', async () => {
      queuedResults.push({ data: [{ ...joinedRow, price_jpy: 'cheap' }], error: null });

      await expect(databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 1)).rejects.toThrow(
        'Unexpected availability_snapshots rows: Expected number, received string'
      );
    });

    it('should throw error on database failure', async () => {
      queuedResults.push({ data: null, error: { message: 'timeout' } });

      await expect(databaseService.fetchAvailability('2026-10-18T08:00:00+00:00', 3)).rejects.toThrow(
        'Failed to fetch availability for query 3: timeout'
      );
    });
  });

  describe('fetchSecondaryAvailability', () => {
    const primary = { queryId: 1, checkInDate: '2026-09-29', checkOutDate: '2027-03-28', isPrimary: true };

    it('should read earlier check-ins sharing the primary check-out', async () => {
      queuedResults.push({
        data: [
          { ...joinedRow, query_id: 2, queries: { check_in_date: '2026-09-28', check_out_date: '2027-03-28', is_primary: false } },
        ],
        error: null,
      });

      const result = await databaseService.fetchSecondaryAvailability('2026-10-18T08:00:00+00:00', primary);

      expect(mockSupabaseClient.neq).toHaveBeenCalledWith('query_id', 1);
      expect(mockSupabaseClient.lt).toHaveBeenCalledWith('queries.check_in_date', '2026-09-29');
      expect(mockSupabaseClient.eq).toHaveBeenCalledWith('queries.check_out_date', '2027-03-28');
      expect(result[0].checkInDate).toBe('2026-09-28');
    });
  });

  describe('property snapshots', () => {
    it('should map the properties of one snapshot', async () => {
      queuedResults.push({
        data: [
          {
            property_id: 12,
            property_name_en: 'Maple Court',
            property_name_ja: null,
            available_room_count: 3,
            minimum_list_price: 150000,
          },
        ],
        error: null,
      });

      const result = await databaseService.fetchPropertiesForSnapshot('2026-10-18T08:00:00+00:00');

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('property_snapshots');
      expect(result).toEqual([
        { propertyId: 12, propertyName: 'Maple Court', propertyNameLocal: null, availableRoomCount: 3, minimumListPrice: 150000 },
      ]);
    });

    it('should collect which of the given properties were seen up to a snapshot', async () => {
      queuedResults.push({ data: [{ property_id: 12 }, { property_id: 14 }, { property_id: 12 }], error: null });

      const result = await databaseService.fetchPropertyIdsSeenThrough('2026-10-17T08:00:00+00:00', [12, 14, 30]);

      expect(mockSupabaseClient.lte).toHaveBeenCalledWith('snapshot_datetime', '2026-10-17T08:00:00+00:00');
      expect(mockSupabaseClient.in).toHaveBeenCalledWith('property_id', [12, 14, 30]);
      expect(mockSupabaseClient.range).toHaveBeenCalledWith(0, 999);
      expect(result).toEqual(new Set([12, 14]));
    });

    it('should page through earlier property rows', async () => {
      const firstPage = Array.from({ length: STORE_PAGE_SIZE }, () => ({ property_id: 12 }));
      queuedResults.push({ data: firstPage, error: null }, { data: [{ property_id: 14 }], error: null });

      const result = await databaseService.fetchPropertyIdsSeenThrough('2026-10-17T08:00:00+00:00', [12, 14]);

      expect(mockSupabaseClient.range).toHaveBeenCalledTimes(2);
      expect(result).toEqual(new Set([12, 14]));
    });

    it('should not query for an empty property list', async () => {
      expect(await databaseService.fetchPropertyIdsSeenThrough('2026-10-17T08:00:00+00:00', [])).toEqual(new Set());
      expect(mockSupabaseClient.from).not.toHaveBeenCalled();
    });
  });

  describe('writes', () => {
    it('should upsert availability rows on their natural key', async () => {
      const records: AvailabilityRecord[] = [
        { snapshot_datetime: '2026-10-18T08:00:00.000Z', query_id: 1, unit_id: 501, price_jpy: 182000, earliest_move_in_date: null },
      ];

      await databaseService.insertAvailability(records);

      expect(mockSupabaseClient.upsert).toHaveBeenCalledWith(records, {
        onConflict: 'snapshot_datetime,query_id,unit_id',
        ignoreDuplicates: false
      });
    });

    it('should throw when units cannot be stored', async () => {
      queuedResults.push({ error: { message: 'constraint violation' } });

      await expect(databaseService.upsertUnits([])).rejects.toThrow('Failed to update units: constraint violation');
    });

    it('should record a finished snapshot run', async () => {
      await databaseService.recordSnapshotRun('2026-10-18T08:00:00.000Z', 'properties');

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('snapshot_runs');
      expect(mockSupabaseClient.insert).toHaveBeenCalledWith({
        snapshot_datetime: '2026-10-18T08:00:00.000Z',
        kind: 'properties',
      });
    });

    it('should log job runs', async () => {
      const log = {
        job_name: 'snapshot-and-alert',
        started_at: '2026-10-18T08:00:00.000Z',
        completed_at: '2026-10-18T08:01:00.000Z',
        units_found: 40,
        changes_found: 2,
        status: 'completed' as const,
      };

      await databaseService.logRun(log);

      expect(mockSupabaseClient.from).toHaveBeenCalledWith('run_logs');
      expect(mockSupabaseClient.insert).toHaveBeenCalledWith(log);
    });
  });

  describe('testConnection', () => {
    it('should return true on success', async () => {
      expect(await databaseService.testConnection()).toBe(true);
    });

    it('should return false on error', async () => {
      queuedResults.push({ error: { message: 'Connection failed' } });

      expect(await databaseService.testConnection()).toBe(false);
    });
  });
});
