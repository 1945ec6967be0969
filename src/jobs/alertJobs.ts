import { buildPropertyAlertReport, buildRoundupReport, buildUnitAlertReport, UnitAlertReport } from '../diff/reports';
import { MarketplaceUnit } from '../services/marketplace';
import { buildPropertyAlertMessage, buildRoundupMessage, buildUnitAlertMessage, ComposedMessage } from '../services/messages';
import { NotificationOptions } from '../services/notifications';
import { PropertyId, SnapshotKind } from '../types/listing';
import { JobContext } from './context';

export interface AlertResult {
  changesFound: number;
  notified: boolean;
}

export function countChanges(report: UnitAlertReport): number {
  return (
    report.newUnits.length +
    report.removedUnits.length +
    report.priceChanges.length +
    report.newSuggestions.length +
    report.removedSuggestions.length +
    report.suggestionPriceChanges.length
  );
}

async function deliver(context: JobContext, composed: ComposedMessage, options: NotificationOptions): Promise<boolean> {
  console.log(`\n${composed.title}\n${composed.message}`);

  if (!context.notifications) {
    console.log('Dry run - notification not sent');
    return false;
  }

  await context.notifications.sendAlert(composed, options);
  return true;
}

/**
 * Record that a snapshot's changes are dealt with. Later runs diff against
 * it until a newer snapshot is marked.
 */
async function markAlerted(context: JobContext, snapshotDatetime: string, kind: SnapshotKind): Promise<void> {
  await context.store.markSnapshotAlerted(snapshotDatetime, kind, context.now().toISOString());
}

/**
 * Diff the latest unit snapshot against the last alerted one and notify when
 * anything changed
 */
export async function runUnitAlerts(context: JobContext): Promise<AlertResult> {
  const { store, config } = context;
  const outcome = await buildUnitAlertReport(store, { excludeFirstFloor: config.excludeFirstFloor });

  if (outcome.status === 'no-primary-query') {
    throw new Error('No primary query defined');
  }
  if (outcome.status === 'insufficient-history') {
    console.log('Only one snapshot exists - baseline established, nothing to compare yet');
    if (outcome.latestSnapshot) {
      await markAlerted(context, outcome.latestSnapshot, 'units');
    }
    return { changesFound: 0, notified: false };
  }
  if (outcome.status === 'already-alerted') {
    console.log(`Snapshot ${outcome.latestSnapshot} was already alerted - nothing new to report`);
    return { changesFound: 0, notified: false };
  }

  const { report } = outcome;
  const changesFound = countChanges(report);
  console.log(
    `Compared ${report.snapshots.previous} -> ${report.snapshots.latest}: ` +
      `${report.newUnits.length} new, ${report.removedUnits.length} removed, ${report.priceChanges.length} price changes, ` +
      `${report.newSuggestions.length} new suggestions, ${report.removedSuggestions.length} removed suggestions, ` +
      `${report.suggestionPriceChanges.length} suggestion price changes`
  );

  if (!report.hasChanges) {
    console.log('✅ No changes detected - notification not sent');
    await markAlerted(context, report.snapshots.latest, 'units');
    return { changesFound, notified: false };
  }

  const composed = buildUnitAlertMessage(report, config.marketplace.unitUrlBase);
  const notified = await deliver(context, composed, { tags: ['house'], priority: 4 });
  if (notified) {
    await markAlerted(context, report.snapshots.latest, 'units');
  }
  return { changesFound, notified };
}

/**
 * Summarise the latest snapshot, whether or not anything changed
 */
export async function runWeeklyRoundup(context: JobContext): Promise<AlertResult> {
  const { store, config, marketplace } = context;
  const outcome = await buildRoundupReport(store, { excludeFirstFloor: config.excludeFirstFloor, now: context.now() });

  if (outcome.status === 'no-primary-query') {
    throw new Error('No primary query defined');
  }
  if (outcome.status === 'no-snapshots') {
    console.log('No snapshots exist yet - nothing to summarise');
    return { changesFound: 0, notified: false };
  }

  const { report } = outcome;
  const propertyUnits = new Map<PropertyId, MarketplaceUnit[]>();
  for (const property of report.newPropertiesThisWeek) {
    propertyUnits.set(property.propertyId, await marketplace.fetchUnitsForProperty(property.propertyId));
  }

  const composed = buildRoundupMessage(report, config.marketplace.unitUrlBase, propertyUnits);
  const notified = await deliver(context, composed, { tags: ['calendar'], priority: 3 });
  return { changesFound: report.newPropertiesThisWeek.length, notified };
}

/**
 * Notify about properties appearing for the first time
 */
export async function runPropertyAlerts(context: JobContext): Promise<AlertResult> {
  const outcome = await buildPropertyAlertReport(context.store);

  if (outcome.status === 'insufficient-history') {
    console.log('Only one property snapshot exists - baseline established');
    if (outcome.latestSnapshot) {
      await markAlerted(context, outcome.latestSnapshot, 'properties');
    }
    return { changesFound: 0, notified: false };
  }
  if (outcome.status === 'already-alerted') {
    console.log(`Property snapshot ${outcome.latestSnapshot} was already alerted`);
    return { changesFound: 0, notified: false };
  }

  const { report } = outcome;
  if (report.newProperties.length === 0) {
    console.log('✅ No new properties detected');
    await markAlerted(context, report.snapshots.latest, 'properties');
    return { changesFound: 0, notified: false };
  }

  const notified = await deliver(context, buildPropertyAlertMessage(report), { tags: ['sparkles'], priority: 4 });
  if (notified) {
    await markAlerted(context, report.snapshots.latest, 'properties');
  }
  return { changesFound: report.newProperties.length, notified };
}
