/**
 * Platforms API Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import request from 'supertest';
import { json } from '@/api/client/__tests__/fake-upstream.js';
import type { FakeReply, FakeRequest } from '@/api/client/__tests__/fake-upstream.js';
import { createTestGateway } from '../../__tests__/test-gateway.js';

const AUTH = { Authorization: 'Bearer test-secret' };

function upstreams(call: FakeRequest): FakeReply {
  if (call.url === 'http://jobs.test/v1/platforms') {
    return json(200, { Platforms: [{ PlatformID: 'p1', PlatformName: 'Alpha', PlatformType: 'Simics' }] });
  }
  if (call.url === 'http://jobs.test/v1/platforms/platform/p1') {
    return json(200, { PlatformID: 'p1', PlatformName: 'Alpha', Description: 'reference board' });
  }
  return json(404, {});
}

describe('Platforms API Integration Tests', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass known filters and drop unknown ones', async () => {
    const { app, calls } = createTestGateway(upstreams);

    const response = await request(app)
      .get('/api/v1/platforms?PlatformType=Simics&IWPS=true&color=blue')
      .set(AUTH);

    expect(response.status).toBe(200);
    expect(calls[0].params).toEqual({ PlatformType: 'Simics', IWPS: true });
    expect(response.body).toEqual({
      platforms: [{
        platform_id: 'p1',
        name: 'Alpha',
        platform_type: 'Simics',
        description: null,
        attributes: {}
      }]
    });
  });

  it('should reject a flag that is not a boolean', async () => {
    const { app, calls } = createTestGateway(upstreams);

    const response = await request(app).get('/api/v1/platforms?ISIM=sometimes').set(AUTH);

    expect(response.status).toBe(400);
    expect(response.body.error.details).toEqual({
      parameter: 'ISIM',
      invalid_values: ['sometimes'],
      accepted_values: ['true', 'false', '1', '0']
    });
    expect(calls).toHaveLength(0);
  });

  it('should return a single platform', async () => {
    const { app } = createTestGateway(upstreams);

    const response = await request(app).get('/api/v1/platforms/p1').set(AUTH);

    expect(response.status).toBe(200);
    expect(response.body.platform).toEqual({
      platform_id: 'p1',
      name: 'Alpha',
      platform_type: null,
      description: 'reference board',
      attributes: {}
    });
  });
});
