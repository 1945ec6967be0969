import {
  AvailabilityRow,
  PriceChange,
  PropertySnapshotRow,
  SearchQuery,
  SnapshotPair,
  SuggestionRow,
  UnitId,
} from '../types/listing';
import { SnapshotReader } from '../types/store';
import { filterOutFirstFloor } from './floor';
import { comparePrices, sortByPriceThenSize, sortSuggestions } from './ordering';
import { comparePrimarySnapshots, indexByUnitId, resolvePrimaryChanges } from './primaryDiff';
import { findNewProperties, weeklyCutoff } from './propertyNovelty';
import { aggregateSecondaryRows } from './secondaryAggregator';
import { requirePrimaryQuery, selectLatestSnapshot, selectSnapshotPair, withAlertBaseline } from './snapshotSelector';
import { diffSuggestions } from './suggestionDiff';

export interface ViewOptions {
  excludeFirstFloor: boolean;
}

/**
 * Everything the unit alert message needs, in presentation order
 */
export interface UnitAlertReport {
  primaryQuery: SearchQuery;
  snapshots: SnapshotPair;
  newUnits: AvailabilityRow[];
  removedUnits: AvailabilityRow[];
  priceChanges: PriceChange[];
  newSuggestions: SuggestionRow[];
  removedSuggestions: SuggestionRow[];
  suggestionPriceChanges: PriceChange<SuggestionRow>[];
  hasChanges: boolean;
}

export type UnitAlertOutcome =
  | { status: 'no-primary-query' }
  | { status: 'insufficient-history'; latestSnapshot: string | null }
  | { status: 'already-alerted'; latestSnapshot: string }
  | { status: 'compared'; report: UnitAlertReport };

export interface SnapshotViews {
  primary: AvailabilityRow[];
  secondary: AvailabilityRow[];
}

export interface UnitComparisonInput extends ViewOptions {
  primaryQuery: SearchQuery;
  snapshots: SnapshotPair;
  latest: SnapshotViews;
  previous: SnapshotViews;
}

type ChangeCollections = Omit<UnitAlertReport, 'primaryQuery' | 'snapshots' | 'hasChanges'>;

/**
 * True when any of the six change collections is non-empty
 */
export function hasAnyChanges(changes: ChangeCollections): boolean {
  return [
    changes.newUnits,
    changes.removedUnits,
    changes.priceChanges,
    changes.newSuggestions,
    changes.removedSuggestions,
    changes.suggestionPriceChanges,
  ].some(collection => collection.length > 0);
}

function primaryIds(rows: readonly AvailabilityRow[]): Set<UnitId> {
  return new Set(rows.map(row => row.unitId));
}

/**
 * Primary rows and suggestions of one snapshot, with the first-floor filter
 * applied when configured. Suggestions exclude every unit in the primary
 * result, filtered or not.
 */
export function buildSnapshotView(
  views: SnapshotViews,
  options: ViewOptions
): { primary: AvailabilityRow[]; suggestions: SuggestionRow[] } {
  const suggestions = aggregateSecondaryRows(views.secondary, primaryIds(views.primary));

  if (!options.excludeFirstFloor) {
    return { primary: [...views.primary], suggestions };
  }
  return {
    primary: filterOutFirstFloor(views.primary),
    suggestions: filterOutFirstFloor(suggestions),
  };
}

/**
 * Diff two fully loaded snapshots
 */
export function compareUnitSnapshots(input: UnitComparisonInput): UnitAlertReport {
  const latestView = buildSnapshotView(input.latest, input);
  const previousView = buildSnapshotView(input.previous, input);

  const latest = indexByUnitId(latestView.primary);
  const previous = indexByUnitId(previousView.primary);
  const primary = resolvePrimaryChanges(comparePrimarySnapshots(latest, previous), latest, previous);

  const suggestions = diffSuggestions({
    latest: latestView.suggestions,
    previous: previousView.suggestions,
    latestPrimaryUnitIds: new Set(latest.keys()),
    primaryCheckIn: input.primaryQuery.checkInDate,
  });

  const changes: ChangeCollections = {
    newUnits: primary.newUnits,
    removedUnits: primary.removedUnits,
    priceChanges: primary.priceChanges,
    newSuggestions: suggestions.newSuggestions,
    removedSuggestions: suggestions.removedSuggestions,
    suggestionPriceChanges: suggestions.priceChanges,
  };

  return {
    primaryQuery: input.primaryQuery,
    snapshots: input.snapshots,
    ...changes,
    hasChanges: hasAnyChanges(changes),
  };
}

async function loadViews(store: SnapshotReader, snapshot: string, primaryQuery: SearchQuery): Promise<SnapshotViews> {
  const [primary, secondary] = await Promise.all([
    store.fetchAvailability(snapshot, primaryQuery.queryId),
    store.fetchSecondaryAvailability(snapshot, primaryQuery),
  ]);
  return { primary, secondary };
}

/**
 * Load the latest unit snapshot and diff it against the previous one, or
 * against the last alerted one when deliveries were missed since.
 * No store reads happen past a failed precondition.
 */
export async function buildUnitAlertReport(store: SnapshotReader, options: ViewOptions): Promise<UnitAlertOutcome> {
  const primaryQuery = requirePrimaryQuery(await store.getQueries());
  if (!primaryQuery) {
    return { status: 'no-primary-query' };
  }

  const timestamps = await store.getRecentSnapshotTimestamps('units', 2);
  const pair = selectSnapshotPair(timestamps);
  if (!pair) {
    return { status: 'insufficient-history', latestSnapshot: selectLatestSnapshot(timestamps) };
  }

  const lastAlerted = await store.getLastAlertedSnapshot('units');
  if (lastAlerted === pair.latest) {
    return { status: 'already-alerted', latestSnapshot: pair.latest };
  }
  const snapshots = withAlertBaseline(pair, lastAlerted);

  const [latest, previous] = await Promise.all([
    loadViews(store, snapshots.latest, primaryQuery),
    loadViews(store, snapshots.previous, primaryQuery),
  ]);

  return {
    status: 'compared',
    report: compareUnitSnapshots({ ...options, primaryQuery, snapshots, latest, previous }),
  };
}

export interface RoundupReport {
  primaryQuery: SearchQuery;
  snapshotDatetime: string;
  /** Cheapest first, then largest */
  primaryUnits: AvailabilityRow[];
  suggestions: SuggestionRow[];
  /** Cheapest first */
  newPropertiesThisWeek: PropertySnapshotRow[];
}

export type RoundupOutcome =
  | { status: 'no-primary-query' }
  | { status: 'no-snapshots' }
  | { status: 'ready'; report: RoundupReport };

/**
 * Properties in the latest property snapshot that no snapshot older than a
 * week contains. Without such a baseline nothing counts as new.
 */
export async function findPropertiesOpenedThisWeek(store: SnapshotReader, now: Date): Promise<PropertySnapshotRow[]> {
  const latest = selectLatestSnapshot(await store.getRecentSnapshotTimestamps('properties', 1));
  if (!latest) return [];

  const baseline = await store.getLatestSnapshotBefore('properties', weeklyCutoff(now));
  if (!baseline) return [];

  const current = await store.fetchPropertiesForSnapshot(latest);
  const seen = await store.fetchPropertyIdsSeenThrough(
    baseline,
    current.map(property => property.propertyId)
  );
  const fresh = findNewProperties(current, seen);
  return fresh.sort((a, b) => comparePrices(a.minimumListPrice, b.minimumListPrice) || a.propertyId - b.propertyId);
}

/**
 * Current availability for the primary dates plus suggestions, from the
 * latest snapshot only
 */
export async function buildRoundupReport(
  store: SnapshotReader,
  options: ViewOptions & { now: Date }
): Promise<RoundupOutcome> {
  const primaryQuery = requirePrimaryQuery(await store.getQueries());
  if (!primaryQuery) {
    return { status: 'no-primary-query' };
  }

  const snapshotDatetime = selectLatestSnapshot(await store.getRecentSnapshotTimestamps('units', 1));
  if (!snapshotDatetime) {
    return { status: 'no-snapshots' };
  }

  const views = await loadViews(store, snapshotDatetime, primaryQuery);
  const view = buildSnapshotView(views, options);

  return {
    status: 'ready',
    report: {
      primaryQuery,
      snapshotDatetime,
      primaryUnits: sortByPriceThenSize(view.primary),
      suggestions: sortSuggestions(view.suggestions, primaryQuery.checkInDate),
      newPropertiesThisWeek: await findPropertiesOpenedThisWeek(store, options.now),
    },
  };
}

export interface PropertyAlertReport {
  snapshots: SnapshotPair;
  latest: PropertySnapshotRow[];
  newProperties: PropertySnapshotRow[];
}

export type PropertyAlertOutcome =
  | { status: 'insufficient-history'; latestSnapshot: string | null }
  | { status: 'already-alerted'; latestSnapshot: string }
  | { status: 'compared'; report: PropertyAlertReport };

/**
 * Properties in the latest property snapshot absent from every snapshot up
 * to the comparison baseline
 */
export async function buildPropertyAlertReport(store: SnapshotReader): Promise<PropertyAlertOutcome> {
  const timestamps = await store.getRecentSnapshotTimestamps('properties', 2);
  const pair = selectSnapshotPair(timestamps);
  if (!pair) {
    return { status: 'insufficient-history', latestSnapshot: selectLatestSnapshot(timestamps) };
  }

  const lastAlerted = await store.getLastAlertedSnapshot('properties');
  if (lastAlerted === pair.latest) {
    return { status: 'already-alerted', latestSnapshot: pair.latest };
  }
  const snapshots = withAlertBaseline(pair, lastAlerted);

  const latest = await store.fetchPropertiesForSnapshot(snapshots.latest);
  const earlierIds = await store.fetchPropertyIdsSeenThrough(
    snapshots.previous,
    latest.map(property => property.propertyId)
  );

  return {
    status: 'compared',
    report: { snapshots, latest, newProperties: findNewProperties(latest, earlierIds) },
  };
}
