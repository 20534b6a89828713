/**
 * Tenant Resolver Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { assertTenantId, TenantResolver } from '../tenant.resolver.js';
import { ApiError, ApiErrorCode } from '@/api/middleware/error.handler.js';

const resolver = new TenantResolver({
  urlTemplate: 'https://gw-{tenant}.files.test',
  overrides: { lab: 'http://localhost:9000/', acme_eu: 'https://eu.files.test' }
});

describe('TenantResolver', () => {
  it('should fill the template with the tenant id', () => {
    expect(resolver.resolveFileServiceHost('acme')).toBe('https://gw-acme.files.test');
  });

  it('should prefer an explicit override', () => {
    expect(resolver.resolveFileServiceHost('lab')).toBe('http://localhost:9000');
  });

  it('should use an override whose key is not a DNS label', () => {
    expect(resolver.resolveFileServiceHost('acme_eu')).toBe('https://eu.files.test');
  });

  it.each([null, undefined, '', ' ', 'acme_us', 'ac.me'])(
    'should reject %p when no override matches',
    (tenantId) => {
      expect(() => resolver.resolveFileServiceHost(tenantId, 'J1')).toThrow(ApiError);
    }
  );

  it('should resolve each call from its own tenant', () => {
    expect(resolver.resolveFileServiceHost('acme')).toBe('https://gw-acme.files.test');
    expect(resolver.resolveFileServiceHost('globex')).toBe('https://gw-globex.files.test');
    expect(resolver.resolveFileServiceHost('acme')).toBe('https://gw-acme.files.test');
  });

  it('should replace every placeholder', () => {
    const twice = new TenantResolver({ urlTemplate: 'https://{tenant}.files.test/{tenant}', overrides: {} });

    expect(twice.resolveFileServiceHost('acme')).toBe('https://acme.files.test/acme');
  });

  it('should not treat inherited object keys as overrides', () => {
    expect(resolver.resolveFileServiceHost('constructor')).toBe('https://gw-constructor.files.test');
  });
});

describe('assertTenantId', () => {
  it.each(['acme', 'a', 'tenant-01', 'ABC123'])('should accept %p', (tenantId) => {
    expect(assertTenantId(tenantId)).toBe(tenantId);
  });

  it.each([null, undefined, '', ' ', '-acme', 'acme-', 'ac.me', 'ac/me', 42, 'x'.repeat(64)])(
    'should reject %p',
    (tenantId) => {
      expect(() => assertTenantId(tenantId, 'J1')).toThrow(ApiError);
    }
  );

  it('should name the job whose tenant is invalid', () => {
    let caught: unknown;
    try {
      assertTenantId(null, 'J1');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ApiError);
    expect(caught).toMatchObject({
      code: ApiErrorCode.INVALID_TENANT,
      statusCode: 400,
      details: { job_id: 'J1' }
    });
  });
});
