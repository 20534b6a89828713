import { ApiError } from '@/api/middleware/error.handler.js';
import {
  JOB_STATUSES,
  JOB_TYPES,
  JobQuery,
  JobType,
  isJobType
} from '@/types/job.types.js';
import {
  RawQuery,
  readBoundedInteger,
  readEnum,
  readFlag,
  readSingle
} from '@/validation/query-params.js';

export const MIN_JOB_LIMIT = 1;
export const MAX_JOB_LIMIT = 100;
export const DEFAULT_JOB_LIMIT = 100;

/**
 * Split a comma-separated job type list.
 *
 * Tokens are trimmed, empty tokens dropped, duplicates removed keeping the
 * first occurrence. Every token must be a known job type; all unknown
 * tokens are reported together.
 */
export function parseJobTypes(value: string | undefined): JobType[] {
  if (value === undefined) {
    return [];
  }

  const tokens = value
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0);

  const accepted: JobType[] = [];
  const rejected: string[] = [];

  for (const token of tokens) {
    if (isJobType(token)) {
      if (!accepted.includes(token)) {
        accepted.push(token);
      }
    } else if (!rejected.includes(token)) {
      rejected.push(token);
    }
  }

  if (rejected.length > 0) {
    throw ApiError.invalidFilter(
      'job_type',
      `Invalid job_type ${rejected.map(token => `'${token}'`).join(', ')}. Accepted values: ${JOB_TYPES.join(', ')}`,
      rejected,
      JOB_TYPES
    );
  }

  return accepted;
}

/**
 * Validate and normalize job listing filters before anything is sent upstream.
 *
 * Pure: the same input always gives the same JobQuery or the same error.
 */
export function normalizeJobQuery(raw: RawQuery): JobQuery {
  const status = readEnum(raw, 'status', JOB_STATUSES);
  const jobTypes = parseJobTypes(readSingle(raw, 'job_type'));
  const limit = readBoundedInteger(raw, 'limit', MIN_JOB_LIMIT, MAX_JOB_LIMIT, DEFAULT_JOB_LIMIT);

  // Opaque: only emptiness is checked, never trimmed or decoded
  const rawToken = raw.continuation_token;
  let continuationToken: string | undefined;
  if (typeof rawToken === 'string') {
    continuationToken = rawToken.length > 0 ? rawToken : undefined;
  } else if (rawToken !== undefined) {
    throw ApiError.invalidFilter(
      'continuation_token',
      "Parameter 'continuation_token' must be given at most once",
      [],
      []
    );
  }

  return {
    ...(status !== undefined && { status }),
    jobTypes,
    limit,
    ...(continuationToken !== undefined && { continuationToken }),
    ...optional('jobRequestId', readSingle(raw, 'job_request_id')),
    ...optional('queue', readSingle(raw, 'queue')),
    ...optional('requestedBy', readSingle(raw, 'requested_by')),
    ...optional('parentInstanceId', readSingle(raw, 'parent_instance_id')),
    ...optional('workloadJobRoiId', readSingle(raw, 'workload_job_roi_id')),
    summarize: readFlag(raw, 'summarize') ?? false
  };
}

function optional<K extends string>(key: K, value: string | undefined): Partial<Record<K, string>> {
  if (value === undefined) {
    return {};
  }
  const entry: Partial<Record<K, string>> = {};
  entry[key] = value;
  return entry;
}
