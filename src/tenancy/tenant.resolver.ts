import { ApiError } from '@/api/middleware/error.handler.js';

/**
 * A tenant id becomes a DNS label in the file service host name
 */
export const TENANT_ID_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;

export interface TenantResolverConfig {
  /** Host template containing `{tenant}` */
  urlTemplate: string;
  /** Explicit tenant → base URL, checked before the template */
  overrides: Readonly<Record<string, string>>;
}

/**
 * Check a job's tenant id. Throws INVALID_TENANT for anything that cannot
 * name a file service host.
 */
export function assertTenantId(tenantId: unknown, jobId?: string): string {
  if (typeof tenantId !== 'string' || !TENANT_ID_PATTERN.test(tenantId)) {
    throw ApiError.invalidTenant(tenantId, jobId);
  }
  return tenantId;
}

/**
 * Maps a tenant id to the base URL of its file service.
 *
 * The tenant always comes from the job record being served. There is no
 * default tenant and no cache: the host is a function of the id alone.
 */
export class TenantResolver {
  constructor(private readonly config: TenantResolverConfig) {}

  /**
   * An override may name any tenant id; only ids that go through the
   * template have to be DNS labels.
   */
  resolveFileServiceHost(tenantId: unknown, jobId?: string): string {
    if (typeof tenantId !== 'string' || tenantId.trim() === '') {
      throw ApiError.invalidTenant(tenantId, jobId);
    }

    if (Object.prototype.hasOwnProperty.call(this.config.overrides, tenantId)) {
      return this.config.overrides[tenantId].replace(/\/+$/, '');
    }

    const tenant = assertTenantId(tenantId, jobId);
    return this.config.urlTemplate.split('{tenant}').join(tenant).replace(/\/+$/, '');
  }
}
