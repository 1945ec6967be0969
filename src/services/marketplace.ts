import { z } from 'zod';
import { AppConfig } from '../config';
import { AvailabilityRecord, PropertySnapshotRecord, UnitRecord } from '../types/listing';

const unitSchema = z.object({
  unit_id: z.number().int(),
  property_id: z.number().int(),
  property_name_en: z.string(),
  property_name_ja: z.string().nullish(),
  unit_number: z.union([z.string(), z.number()]).nullish(),
  layout: z.string(),
  size_square_meters: z.number().nullish(),
  city_en: z.string(),
  city_ja: z.string().nullish(),
  coordinates: z.string().nullish(),
  list_price: z.number().int().nullish(),
  earliest_move_in_date: z.string().nullish(),
});

const propertySchema = z.object({
  property_id: z.number().int(),
  property_name_en: z.string(),
  property_name_ja: z.string().nullish(),
  available_room_count: z.number().int().default(0),
  minimum_list_price: z.number().int().nullish(),
});

const pageSchema = <T extends z.ZodTypeAny>(item: T) => z.object({ items: z.array(item).default([]) });

export type MarketplaceUnit = z.infer<typeof unitSchema>;
export type MarketplaceProperty = z.infer<typeof propertySchema>;

export interface DateRange {
  checkIn: string;
  checkOut: string;
}

export interface MarketplaceClientOptions {
  /** Resolves after `ms`; replaced in tests */
  delay?: (ms: number) => Promise<void>;
  random?: () => number;
  maxRetries?: number;
}

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Parse a WKT point such as "POINT(35.66 139.70)" into latitude and longitude
 */
export function parseLatLon(wkt: string | null | undefined): { latitude: number | null; longitude: number | null } {
  const match = wkt ? /POINT\s*\(\s*(-?[\d.]+)\s+(-?[\d.]+)\s*\)/i.exec(wkt) : null;
  if (!match) {
    return { latitude: null, longitude: null };
  }
  return { latitude: parseFloat(match[1]), longitude: parseFloat(match[2]) };
}

export function toUnitRecord(unit: MarketplaceUnit): UnitRecord {
  const { latitude, longitude } = parseLatLon(unit.coordinates);
  return {
    unit_id: unit.unit_id,
    property_id: unit.property_id,
    property_name_en: unit.property_name_en,
    property_name_ja: unit.property_name_ja ?? null,
    unit_number: unit.unit_number === null || unit.unit_number === undefined ? null : String(unit.unit_number),
    layout: unit.layout,
    size_square_meters: unit.size_square_meters ?? null,
    city_en: unit.city_en,
    city_ja: unit.city_ja ?? null,
    latitude,
    longitude,
  };
}

export function toAvailabilityRecord(snapshotDatetime: string, queryId: number, unit: MarketplaceUnit): AvailabilityRecord {
  return {
    snapshot_datetime: snapshotDatetime,
    query_id: queryId,
    unit_id: unit.unit_id,
    price_jpy: unit.list_price ?? null,
    earliest_move_in_date: unit.earliest_move_in_date ? unit.earliest_move_in_date.slice(0, 10) : null,
  };
}

export function toPropertySnapshotRecord(snapshotDatetime: string, property: MarketplaceProperty): PropertySnapshotRecord {
  return {
    snapshot_datetime: snapshotDatetime,
    property_id: property.property_id,
    property_name_en: property.property_name_en,
    property_name_ja: property.property_name_ja ?? null,
    available_room_count: property.available_room_count,
    minimum_list_price: property.minimum_list_price ?? null,
  };
}

/**
 * Client for the marketplace's public listing API
 */
export class MarketplaceClient {
  private readonly delay: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly maxRetries: number;

  constructor(
    private readonly config: Pick<AppConfig, 'marketplace' | 'search'>,
    options: MarketplaceClientOptions = {}
  ) {
    this.delay = options.delay ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
    this.maxRetries = options.maxRetries ?? 3;
  }

  buildUnitSearchParams(range: DateRange, offset: number): URLSearchParams {
    const { search, marketplace } = this.config;
    return new URLSearchParams({
      layouts: search.layouts.join(','),
      check_in: range.checkIn,
      check_out: range.checkOut,
      min_price: String(search.minPrice),
      max_price: String(search.maxPrice),
      gcc_id: String(search.areaId),
      limit: String(marketplace.pageSize),
      offset: String(offset),
    });
  }

  async fetchUnitsPage(range: DateRange, offset: number): Promise<MarketplaceUnit[]> {
    const url = `${this.config.marketplace.apiUrl}/units?${this.buildUnitSearchParams(range, offset)}`;
    return this.getItems(url, unitSchema);
  }

  /**
   * Page through every unit for a date range. Units repeated across pages
   * are kept once.
   */
  async fetchAllUnits(range: DateRange): Promise<MarketplaceUnit[]> {
    const { pageSize, maxPages } = this.config.marketplace;
    const units = new Map<number, MarketplaceUnit>();
    let offset = 0;

    for (let page = 1; page <= maxPages; page++) {
      const items = await this.fetchUnitsPage(range, offset);
      if (items.length === 0) {
        console.log(`Page ${page}: 0 units - stopping`);
        break;
      }

      for (const item of items) {
        if (!units.has(item.unit_id)) {
          units.set(item.unit_id, item);
        }
      }
      console.log(`Page ${page}: ${items.length} units, total ${units.size} (${range.checkIn} -> ${range.checkOut})`);

      if (items.length < pageSize) break;

      offset += pageSize;
      await this.politePause();
    }

    return [...units.values()];
  }

  async fetchProperties(): Promise<MarketplaceProperty[]> {
    const params = new URLSearchParams({ gcc_id: String(this.config.search.areaId) });
    return this.getItems(`${this.config.marketplace.apiUrl}/properties?${params}`, propertySchema);
  }

  async fetchUnitsForProperty(propertyId: number): Promise<MarketplaceUnit[]> {
    const params = new URLSearchParams({ property_id: String(propertyId) });
    return this.getItems(`${this.config.marketplace.apiUrl}/units?${params}`, unitSchema);
  }

  private async politePause(): Promise<void> {
    const { min, max } = this.config.marketplace.requestDelayMs;
    await this.delay(Math.round(min + this.random() * (max - min)));
  }

  /**
   * GET a page of items, retrying failed requests with a growing wait
   */
  private async getItems<T extends z.ZodTypeAny>(url: string, item: T): Promise<z.infer<T>[]> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await fetch(url, {
          headers: {
            'User-Agent': USER_AGENT,
            'Accept': 'application/json, text/plain, */*',
          },
          signal: AbortSignal.timeout(30000),
        });

        if (!response.ok) {
          throw new Error(`Marketplace request failed: ${response.status} ${response.statusText}`);
        }

        const parsed = pageSchema(item).safeParse(await response.json());
        if (!parsed.success) {
          throw new Error(`Unexpected marketplace response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        }
        return parsed.data.items;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.log(`Marketplace request attempt ${attempt}/${this.maxRetries} failed: ${lastError.message}`);

        if (attempt < this.maxRetries) {
          await this.delay(attempt * 5000);
        }
      }
    }

    throw lastError || new Error('All marketplace request attempts failed');
  }
}
