import { floorLabel } from '../diff/floor';
import { daysEarlier } from '../diff/ordering';
import { PropertyAlertReport, RoundupReport, UnitAlertReport } from '../diff/reports';
import { AvailabilityRow, PropertyId, SuggestionRow } from '../types/listing';
import { MarketplaceUnit } from './marketplace';

export const SECTION_SEPARATOR = '· · · · · · · · · · · · · · · · · · · ·\n';
export const PROPERTY_SEPARATOR = '────────────────────────\n';

export interface ComposedMessage {
  title: string;
  message: string;
}

export function buildUnitUrl(
  unitUrlBase: string,
  propertyId: number,
  unitId: number,
  checkIn: string,
  checkOut: string
): string {
  return `${unitUrlBase}/${propertyId}/units/${unitId}/detail?check_in=${checkIn}&check_out=${checkOut}`;
}

export function formatYen(price: number | null | undefined): string {
  return price === null || price === undefined ? '¥ -' : `¥${price.toLocaleString('en-US')}`;
}

function formatSize(size: number | null | undefined): string {
  return size === null || size === undefined ? '? m²' : `${size} m²`;
}

function unitLine(row: AvailabilityRow, marker = '▪'): string {
  return (
    `${marker} [Unit ${row.unitId}] ${row.propertyName} | ${row.layout} | ${floorLabel(row.unitNumber)} | ` +
    `${formatSize(row.sizeSquareMeters)} | ${row.city} | 💴 ${formatYen(row.price)}`
  );
}

function priceArrow(latest: number | null, previous: number | null): string {
  if (latest === null || previous === null) return '🔄';
  return latest > previous ? '⬆️' : '⬇️';
}

/**
 * Render a unit alert report. Sections appear in the order the report
 * carries them; nothing is re-sorted here.
 */
export function buildUnitAlertMessage(report: UnitAlertReport, unitUrlBase: string): ComposedMessage {
  const { checkInDate: checkIn, checkOutDate: checkOut } = report.primaryQuery;
  const primaryUrl = (row: AvailabilityRow) => buildUnitUrl(unitUrlBase, row.propertyId, row.unitId, checkIn, checkOut);
  const suggestionUrl = (row: SuggestionRow) =>
    buildUnitUrl(unitUrlBase, row.propertyId, row.unitId, row.checkInDate, checkOut);

  const lines: string[] = [];
  lines.push('🗼 Rental Alerts');
  lines.push('Here are the latest updates on the properties for your filters:\n');

  const primaryChanged =
    report.newUnits.length > 0 || report.removedUnits.length > 0 || report.priceChanges.length > 0;

  if (primaryChanged) {
    lines.push(SECTION_SEPARATOR);
  }

  if (report.newUnits.length > 0) {
    lines.push('✨ New units have been detected in your time range ✨\n');
    for (const row of report.newUnits) {
      lines.push(`${unitLine(row)}\n  ➡️ ${primaryUrl(row)}\n`);
    }
  }

  if (report.removedUnits.length > 0) {
    lines.push('❌ Removed units have been detected in your time range:\n');
    for (const row of report.removedUnits) {
      lines.push(`${unitLine(row)}\n  ➡️ ${primaryUrl(row)}\n`);
    }
  }

  if (report.priceChanges.length > 0) {
    lines.push('💰 Price changes have been detected in your time range:\n');
    for (const { latest, previous } of report.priceChanges) {
      lines.push(
        `${priceArrow(latest.price, previous.price)} [Unit ${latest.unitId}] ${latest.propertyName} | ${latest.layout} | ` +
          `${floorLabel(latest.unitNumber)} | ${formatSize(latest.sizeSquareMeters)} | ` +
          `💴 ${formatYen(previous.price)} → ${formatYen(latest.price)}\n  ➡️ ${primaryUrl(latest)}\n`
      );
    }
  }

  if (!primaryChanged) {
    lines.push('✅ No changes in your main search\n');
  }

  const suggestionsChanged =
    report.newSuggestions.length > 0 ||
    report.removedSuggestions.length > 0 ||
    report.suggestionPriceChanges.length > 0;

  if (suggestionsChanged) {
    lines.push(SECTION_SEPARATOR);
  }

  if (report.newSuggestions.length > 0) {
    lines.push('💡 Have you also considered these properties?');
    lines.push('They are available if you start your lease slightly earlier!');
    lines.push('ℹ️ You can pay for the extra days at the start of the lease, but physically move in on your preferred date.\n');
    for (const row of report.newSuggestions) {
      const delta = daysEarlier(checkIn, row.checkInDate);
      lines.push(`${unitLine(row)}\n  → ${delta} days earlier (${row.checkInDate})\n  ➡️ ${suggestionUrl(row)}\n`);
    }
  }

  if (report.removedSuggestions.length > 0) {
    lines.push('❌ Removed properties detected from earlier move-in options:\n');
    for (const row of report.removedSuggestions) {
      lines.push(`${unitLine(row)}\n  ➡️ ${suggestionUrl(row)}\n`);
    }
  }

  if (report.suggestionPriceChanges.length > 0) {
    lines.push('💰 Price changes detected for earlier move-in options:\n');
    for (const { latest, previous } of report.suggestionPriceChanges) {
      lines.push(
        `${priceArrow(latest.price, previous.price)} [Unit ${latest.unitId}] ${latest.propertyName} | ${latest.layout} | ` +
          `${floorLabel(latest.unitNumber)} | ${formatSize(latest.sizeSquareMeters)}\n` +
          `  💴 ${formatYen(previous.price)} → ${formatYen(latest.price)}\n  ➡️ ${suggestionUrl(latest)}\n`
      );
    }
  }

  lines.push(SECTION_SEPARATOR);
  lines.push(`Snapshot taken at: ${report.snapshots.latest}\n`);

  const total =
    report.newUnits.length + report.removedUnits.length + report.priceChanges.length +
    report.newSuggestions.length + report.removedSuggestions.length + report.suggestionPriceChanges.length;

  return {
    title: `🏠 ${total} rental update${total === 1 ? '' : 's'}`,
    message: lines.join('\n'),
  };
}

export function buildRoundupMessage(
  report: RoundupReport,
  unitUrlBase: string,
  propertyUnits: ReadonlyMap<PropertyId, MarketplaceUnit[]> = new Map()
): ComposedMessage {
  const { checkInDate: checkIn, checkOutDate: checkOut } = report.primaryQuery;
  const lines: string[] = [];

  lines.push('🗼 Your Weekly Roundup\n');
  lines.push('A summary of availability for your preferred and alternative dates.\n');
  lines.push(`Query dates: ${checkIn} → ${checkOut}\n`);
  lines.push(SECTION_SEPARATOR);

  lines.push('🏠 Available units in your primary time range:\n');
  if (report.primaryUnits.length === 0) {
    lines.push('  (No units available for the primary dates in this snapshot.)\n');
  }
  for (const row of report.primaryUnits) {
    const url = buildUnitUrl(unitUrlBase, row.propertyId, row.unitId, checkIn, checkOut);
    lines.push(`${unitLine(row)}\n  ➡️ ${url}\n`);
  }

  lines.push(SECTION_SEPARATOR);
  lines.push('💡 Have you also considered these properties?');
  lines.push('They are available if you start your lease slightly earlier!\n');
  if (report.suggestions.length === 0) {
    lines.push('  (No earlier move-in suggestions in this snapshot.)\n');
  }
  for (const row of report.suggestions) {
    const delta = daysEarlier(checkIn, row.checkInDate);
    const url = buildUnitUrl(unitUrlBase, row.propertyId, row.unitId, row.checkInDate, checkOut);
    lines.push(`${unitLine(row)}\n  📆 ${delta} days earlier (${row.checkInDate})\n  ➡️ ${url}\n`);
  }

  if (report.newPropertiesThisWeek.length > 0) {
    lines.push(SECTION_SEPARATOR);
    lines.push('🎉 New buildings opened this week:\n');
    for (const property of report.newPropertiesThisWeek) {
      lines.push(`🏢 [Property ${property.propertyId}] ${property.propertyName}\n💴 From ${formatYen(property.minimumListPrice)}\n`);

      const units = [...(propertyUnits.get(property.propertyId) ?? [])].sort(
        (a, b) => (a.list_price ?? Number.MAX_SAFE_INTEGER) - (b.list_price ?? Number.MAX_SAFE_INTEGER)
      );
      if (units.length === 0) {
        lines.push('  (No units currently available)\n');
      }
      for (const unit of units) {
        const url = buildUnitUrl(unitUrlBase, unit.property_id, unit.unit_id, checkIn, checkOut);
        lines.push(
          `▪ [Unit ${unit.unit_id}] ${unit.layout} | 🔑 ${unit.unit_number ?? '-'} | ` +
            `${formatSize(unit.size_square_meters)} | 💴 ${formatYen(unit.list_price)}\n  ➡️ ${url}\n`
        );
      }
      lines.push(PROPERTY_SEPARATOR);
    }
  }

  lines.push(SECTION_SEPARATOR);
  lines.push(`Snapshot taken at: ${report.snapshotDatetime}\n`);

  return { title: '📬 Weekly Roundup', message: lines.join('\n') };
}

export function buildPropertyAlertMessage(report: PropertyAlertReport): ComposedMessage {
  const lines: string[] = ['🗼 New Properties Detected!\n', SECTION_SEPARATOR];

  for (const property of report.newProperties) {
    const localName = property.propertyNameLocal ? ` (${property.propertyNameLocal})` : '';
    lines.push(
      `▪ ${property.propertyName}${localName}\n` +
        `  🏠 Rooms Available: ${property.availableRoomCount}\n` +
        `  💴 From ${formatYen(property.minimumListPrice)}\n`
    );
  }

  const count = report.newProperties.length;
  return {
    title: count === 1 ? '✨ New Property!' : `✨ ${count} New Properties!`,
    message: lines.join('\n'),
  };
}
