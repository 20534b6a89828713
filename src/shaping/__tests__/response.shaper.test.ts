/**
 * Response Shaper Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildPageMeta,
  continuationPage,
  legacyPage,
  renderPaginated,
  shapeFileListing,
  shapeJobDetail
} from '../response.shaper.js';
import { normalizeInstanceQuery } from '@/validation/listing-query.validator.js';
import { JobRecord } from '@/types/job.types.js';

function job(id: string): JobRecord {
  return {
    job_id: id,
    name: null,
    status: 'done',
    job_type: 'IWPS',
    tenant_id: 'acme',
    platform_id: null,
    owner: null,
    queue: null,
    created_at: null,
    completed_at: null,
    last_updated_at: null,
    description: null,
    attributes: {}
  };
}

describe('buildPageMeta', () => {
  it('should describe a middle page', () => {
    expect(buildPageMeta(45, 2, 20)).toEqual({
      total: 45,
      page: 2,
      page_size: 20,
      total_pages: 3,
      has_next: true,
      has_previous: true
    });
  });

  it('should describe an empty listing', () => {
    expect(buildPageMeta(0, 1, 50)).toEqual({
      total: 0,
      page: 1,
      page_size: 50,
      total_pages: 0,
      has_next: false,
      has_previous: false
    });
  });
});

describe('renderPaginated', () => {
  it('should render job listings with the continuation token', () => {
    const rendered = renderPaginated(continuationPage({
      jobs: [job('J1')],
      count: 1,
      continuationToken: 'next'
    }));

    expect(rendered).toEqual({ jobs: [job('J1')], count: 1, continuation_token: 'next' });
  });

  it('should omit the token on the last page', () => {
    const rendered = renderPaginated(continuationPage({ jobs: [], count: 0, continuationToken: null }));

    expect(rendered).toEqual({ jobs: [], count: 0 });
    expect('continuation_token' in rendered).toBe(false);
  });

  it('should render legacy pages with metadata and sorting', () => {
    const query = normalizeInstanceQuery({ page: '2', page_size: '10', sort_by: 'name', sort_order: 'asc' });

    const rendered = renderPaginated(legacyPage(['a', 'b'], 12, query, { is_available: true }));

    expect(rendered).toEqual({
      items: ['a', 'b'],
      meta: {
        total: 12,
        page: 2,
        page_size: 10,
        total_pages: 2,
        has_next: false,
        has_previous: true
      },
      filters_applied: { is_available: true },
      sort_by: 'name',
      sort_order: 'asc'
    });
  });
});

describe('legacyPage', () => {
  it('should count what has been seen when the upstream has no total', () => {
    const query = normalizeInstanceQuery({ page: '3', page_size: '5' });

    const page = legacyPage(['x', 'y'], null, query, {});

    expect(page).toMatchObject({
      kind: 'page',
      meta: { total: 12, total_pages: 3, has_next: false },
      sortBy: null,
      sortOrder: 'desc'
    });
  });
});

describe('shapeFileListing', () => {
  it('should keep the upstream order and count', () => {
    expect(shapeFileListing('J1', ['b.log', 'a.log'])).toEqual({
      files: ['b.log', 'a.log'],
      total_files: 2,
      job_id: 'J1'
    });
  });
});

describe('shapeJobDetail', () => {
  it('should pair the job with its file count', () => {
    expect(shapeJobDetail(job('J1'), 3)).toEqual({ job: job('J1'), file_count: 3 });
    expect(shapeJobDetail(job('J1'), null)).toEqual({ job: job('J1'), file_count: null });
  });
});
