import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value => value.split(',').map(part => part.trim()).filter(Boolean));

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  // Supabase
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  // Redis / BullMQ
  REDIS_URL: z.string().default('redis://localhost:6379'),
  SCHEDULE_TZ: z.string().default('Asia/Tokyo'),

  // ntfy
  NTFY_TOPIC: z.string().min(1),
  NTFY_SERVER: z.string().url().default('https://ntfy.sh'),

  // Marketplace
  MARKETPLACE_API_URL: z.string().url().default('https://ywzjnepacv.ap-northeast-1.awsapprunner.com/v1'),
  MARKETPLACE_UNIT_URL: z.string().url().default('https://hmlet.com/en/property'),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(12),
  MAX_PAGES: z.coerce.number().int().min(1).default(50),
  REQUEST_DELAY_MIN_MS: z.coerce.number().int().min(0).default(1000),
  REQUEST_DELAY_MAX_MS: z.coerce.number().int().min(0).default(2500),

  // Search filters
  SEARCH_CHECK_IN: isoDate,
  SEARCH_CHECK_OUT: isoDate,
  SEARCH_LAYOUTS: csv('1DK,1LDK,1LDKS,2K,2DK,2LDK,3DK,3LDK'),
  SEARCH_MIN_PRICE: z.coerce.number().int().min(0).default(95_000),
  SEARCH_MAX_PRICE: z.coerce.number().int().min(0).default(380_000),
  SEARCH_AREA_ID: z.coerce.number().int().default(101),
  EARLIER_CHECK_IN_OFFSETS: csv('1,3,7,14'),
  EXCLUDE_FIRST_FLOOR: flag,
});

export interface SearchConfig {
  readonly checkIn: string;
  readonly checkOut: string;
  readonly layouts: readonly string[];
  readonly minPrice: number;
  readonly maxPrice: number;
  readonly areaId: number;
  /** Days before the primary check-in, one secondary query per entry */
  readonly earlierCheckInOffsets: readonly number[];
}

export interface MarketplaceConfig {
  readonly apiUrl: string;
  readonly unitUrlBase: string;
  readonly pageSize: number;
  readonly maxPages: number;
  readonly requestDelayMs: { readonly min: number; readonly max: number };
}

/**
 * Immutable application configuration, passed explicitly to every component
 */
export interface AppConfig {
  readonly supabase: { readonly url: string; readonly serviceKey: string };
  readonly redis: { readonly url: string; readonly timezone: string };
  readonly ntfy: { readonly topic: string; readonly server: string };
  readonly marketplace: MarketplaceConfig;
  readonly search: SearchConfig;
  readonly excludeFirstFloor: boolean;
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable application configuration from environment variables.
 * Throws with every invalid variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const offsets = vars.EARLIER_CHECK_IN_OFFSETS.map(Number);
  if (offsets.some(offset => !Number.isInteger(offset) || offset <= 0)) {
    throw new Error('Invalid configuration: EARLIER_CHECK_IN_OFFSETS must be positive whole days');
  }
  if (vars.SEARCH_CHECK_OUT <= vars.SEARCH_CHECK_IN) {
    throw new Error('Invalid configuration: SEARCH_CHECK_OUT must be after SEARCH_CHECK_IN');
  }
  if (vars.REQUEST_DELAY_MAX_MS < vars.REQUEST_DELAY_MIN_MS) {
    throw new Error('Invalid configuration: REQUEST_DELAY_MAX_MS must not be below REQUEST_DELAY_MIN_MS');
  }

  return deepFreeze<AppConfig>({
    supabase: { url: vars.SUPABASE_URL, serviceKey: vars.SUPABASE_SERVICE_ROLE_KEY },
    redis: { url: vars.REDIS_URL, timezone: vars.SCHEDULE_TZ },
    ntfy: { topic: vars.NTFY_TOPIC, server: vars.NTFY_SERVER },
    marketplace: {
      apiUrl: vars.MARKETPLACE_API_URL.replace(/\/+$/, ''),
      unitUrlBase: vars.MARKETPLACE_UNIT_URL.replace(/\/+$/, ''),
      pageSize: vars.PAGE_SIZE,
      maxPages: vars.MAX_PAGES,
      requestDelayMs: { min: vars.REQUEST_DELAY_MIN_MS, max: vars.REQUEST_DELAY_MAX_MS },
    },
    search: {
      checkIn: vars.SEARCH_CHECK_IN,
      checkOut: vars.SEARCH_CHECK_OUT,
      layouts: vars.SEARCH_LAYOUTS,
      minPrice: vars.SEARCH_MIN_PRICE,
      maxPrice: vars.SEARCH_MAX_PRICE,
      areaId: vars.SEARCH_AREA_ID,
      earlierCheckInOffsets: [...new Set(offsets)].sort((a, b) => a - b),
    },
    excludeFirstFloor: vars.EXCLUDE_FIRST_FLOOR,
  });
}
