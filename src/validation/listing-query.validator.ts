import {
  INSTANCE_SORT_FIELDS,
  InstanceQuery,
  PLATFORM_FLAG_FILTERS,
  PLATFORM_STRING_FILTERS,
  PlatformQuery,
  SORT_ORDERS
} from '@/types/listing.types.js';
import {
  RawQuery,
  readBoundedInteger,
  readEnum,
  readFlag,
  readSingle
} from '@/validation/query-params.js';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 1000;
/** Keeps `(page - 1) * page_size` a safe integer */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE) + 1;

/**
 * Normalize the legacy page/page_size instance listing query
 */
export function normalizeInstanceQuery(raw: RawQuery): InstanceQuery {
  const platformId = readSingle(raw, 'platform_id');
  const isAvailable = readFlag(raw, 'is_available');
  const sortBy = readEnum(raw, 'sort_by', INSTANCE_SORT_FIELDS);

  return {
    page: readBoundedInteger(raw, 'page', 1, MAX_PAGE, 1),
    pageSize: readBoundedInteger(raw, 'page_size', 1, MAX_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    ...(platformId !== undefined && { platformId }),
    ...(isAvailable !== undefined && { isAvailable }),
    ...(sortBy !== undefined && { sortBy }),
    sortOrder: readEnum(raw, 'sort_order', SORT_ORDERS) ?? 'desc'
  };
}

/**
 * Pick the platform filters the job service understands.
 * Unknown parameters are ignored; flags must be booleans.
 */
export function normalizePlatformQuery(raw: RawQuery): PlatformQuery {
  const query: PlatformQuery = {};

  for (const name of PLATFORM_STRING_FILTERS) {
    const value = readSingle(raw, name);
    if (value !== undefined) {
      query[name] = value;
    }
  }

  for (const name of PLATFORM_FLAG_FILTERS) {
    const value = readFlag(raw, name);
    if (value !== undefined) {
      query[name] = value;
    }
  }

  return query;
}
