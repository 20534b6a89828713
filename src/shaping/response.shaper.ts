import type { FileListResponse, JobDetailResponse } from '@/api/routes/jobs/jobs.types.js';
import { JobPage, JobRecord } from '@/types/job.types.js';
import { InstanceQuery, SortOrder } from '@/types/listing.types.js';

/**
 * Page metadata of the legacy page/page_size listings
 */
export interface PageMeta {
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
  has_next: boolean;
  has_previous: boolean;
}

/**
 * The two pagination conventions the gateway serves.
 *
 * Job listings keep the job service's continuation token; legacy listings
 * carry page metadata. Neither is ever converted into the other.
 */
export type Paginated<T> =
  | {
    kind: 'continuation';
    itemsKey: string;
    items: T[];
    count: number;
    continuationToken: string | null;
  }
  | {
    kind: 'page';
    items: T[];
    meta: PageMeta;
    filtersApplied: Record<string, unknown>;
    sortBy: string | null;
    sortOrder: SortOrder;
  };

export function buildPageMeta(total: number, page: number, pageSize: number): PageMeta {
  const totalPages = Math.ceil(total / pageSize);
  return {
    total,
    page,
    page_size: pageSize,
    total_pages: totalPages,
    has_next: page < totalPages,
    has_previous: page > 1
  };
}

export function continuationPage(page: JobPage): Paginated<JobRecord> {
  return {
    kind: 'continuation',
    itemsKey: 'jobs',
    items: page.jobs,
    count: page.count,
    continuationToken: page.continuationToken
  };
}

/**
 * Legacy page for an instance-style listing.
 *
 * When the upstream reports no total, the total is what has been seen so
 * far: everything before this page plus this page.
 */
export function legacyPage<T>(
  items: T[],
  upstreamTotal: number | null,
  query: InstanceQuery,
  filtersApplied: Record<string, unknown>
): Paginated<T> {
  const offset = (query.page - 1) * query.pageSize;
  const total = upstreamTotal ?? offset + items.length;

  return {
    kind: 'page',
    items,
    meta: buildPageMeta(total, query.page, query.pageSize),
    filtersApplied,
    sortBy: query.sortBy ?? null,
    sortOrder: query.sortOrder
  };
}

/**
 * Wire form of a paginated result; the tag is not part of the contract
 */
export function renderPaginated<T>(paginated: Paginated<T>): Record<string, unknown> {
  switch (paginated.kind) {
    case 'continuation':
      return {
        [paginated.itemsKey]: paginated.items,
        count: paginated.count,
        ...(paginated.continuationToken !== null && { continuation_token: paginated.continuationToken })
      };
    case 'page':
      return {
        items: paginated.items,
        meta: paginated.meta,
        filters_applied: paginated.filtersApplied,
        sort_by: paginated.sortBy,
        sort_order: paginated.sortOrder
      };
  }
}

export function shapeFileListing(jobId: string, files: string[]): FileListResponse {
  return {
    files,
    total_files: files.length,
    job_id: jobId
  };
}

export function shapeJobDetail(job: JobRecord, fileCount: number | null): JobDetailResponse {
  return {
    job,
    file_count: fileCount
  };
}
