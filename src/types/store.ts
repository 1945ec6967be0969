import {
  AvailabilityRecord,
  AvailabilityRow,
  PropertyId,
  PropertySnapshotRecord,
  PropertySnapshotRow,
  QueryRecord,
  RunLog,
  SearchQuery,
  SnapshotKind,
  UnitRecord,
} from './listing';

/**
 * Read side of the snapshot store, all the diff core needs
 */
export interface SnapshotReader {
  getQueries(): Promise<SearchQuery[]>;
  getRecentSnapshotTimestamps(kind: SnapshotKind, limit: number): Promise<string[]>;
  /** Most recent snapshot strictly older than `snapshotDatetime`, or null */
  getLatestSnapshotBefore(kind: SnapshotKind, snapshotDatetime: string): Promise<string | null>;
  /** Most recent snapshot whose changes were delivered (or had none) */
  getLastAlertedSnapshot(kind: SnapshotKind): Promise<string | null>;
  fetchAvailability(snapshotDatetime: string, queryId: number): Promise<AvailabilityRow[]>;
  /**
   * Rows of the earlier check-in queries of `primaryQuery` at the snapshot:
   * check-in before the primary's, same check-out
   */
  fetchSecondaryAvailability(snapshotDatetime: string, primaryQuery: SearchQuery): Promise<AvailabilityRow[]>;
  fetchPropertiesForSnapshot(snapshotDatetime: string): Promise<PropertySnapshotRow[]>;
  /** Which of `propertyIds` appear in a snapshot at or before `snapshotDatetime` */
  fetchPropertyIdsSeenThrough(snapshotDatetime: string, propertyIds: readonly PropertyId[]): Promise<Set<PropertyId>>;
}

export type QueryDefinition = Omit<QueryRecord, 'query_id'>;

export interface SnapshotWriter {
  syncQueries(definitions: QueryDefinition[]): Promise<SearchQuery[]>;
  upsertUnits(units: UnitRecord[]): Promise<void>;
  insertAvailability(records: AvailabilityRecord[]): Promise<void>;
  insertPropertySnapshot(records: PropertySnapshotRecord[]): Promise<void>;
  recordSnapshotRun(snapshotDatetime: string, kind: SnapshotKind): Promise<void>;
  markSnapshotAlerted(snapshotDatetime: string, kind: SnapshotKind, alertedAt: string): Promise<void>;
  logRun(log: Omit<RunLog, 'id' | 'created_at'>): Promise<void>;
}

export type SnapshotStore = SnapshotReader & SnapshotWriter;
