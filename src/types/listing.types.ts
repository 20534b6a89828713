/**
 * Instance and platform listing types
 */

export const INSTANCE_SORT_FIELDS = ['name', 'status', 'platform_id', 'created_at'] as const;
export type InstanceSortField = typeof INSTANCE_SORT_FIELDS[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = typeof SORT_ORDERS[number];

/**
 * Normalized instance listing query (page/offset convention)
 */
export interface InstanceQuery {
  page: number;
  pageSize: number;
  platformId?: string;
  isAvailable?: boolean;
  sortBy?: InstanceSortField;
  sortOrder: SortOrder;
}

export interface InstanceRecord {
  instance_id: string;
  name: string | null;
  platform_id: string | null;
  platform_name: string | null;
  status: string | null;
  is_available: boolean | null;
  attributes: Record<string, unknown>;
}

export interface InstancePage {
  instances: InstanceRecord[];
  /** Upstream total when it reports one */
  total: number | null;
}

/**
 * Platform filters passed through to the job service.
 * String filters are matched by the job service; flags are booleans.
 */
export const PLATFORM_STRING_FILTERS = ['PlatformType', 'PlatformName'] as const;
export const PLATFORM_FLAG_FILTERS = [
  'IWPS',
  'ISIM',
  'NovaIWPS',
  'Traces',
  'Instance',
  'IWPSEnabled',
  'NovaCoho'
] as const;

export type PlatformFilterName =
  | typeof PLATFORM_STRING_FILTERS[number]
  | typeof PLATFORM_FLAG_FILTERS[number];

export type PlatformQuery = Partial<Record<PlatformFilterName, string | boolean>>;

export interface PlatformRecord {
  platform_id: string;
  name: string | null;
  platform_type: string | null;
  description: string | null;
  attributes: Record<string, unknown>;
}
