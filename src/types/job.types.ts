/**
 * Job types
 *
 * Job status and type vocabularies recognized by the job service, plus the
 * structured job record the gateway exposes.
 */

/**
 * Job request status values, case-sensitive
 */
export const JOB_STATUSES = [
  'requested',
  'queued',
  'allocating',
  'allocated',
  'booting',
  'inprogress',
  'checkpointing',
  'done',
  'error',
  'releasing',
  'released',
  'complete'
] as const;

export type JobStatus = typeof JOB_STATUSES[number];

/**
 * Job types; the job service may add more, in which case this list grows
 */
export const JOB_TYPES = [
  'Instance',
  'WorkloadJob',
  'WorkloadJobROI',
  'IWPS',
  'ISIM',
  'Coho',
  'NovaCoho',
  'Custom'
] as const;

export type JobType = typeof JOB_TYPES[number];

export function isJobType(value: string): value is JobType {
  return JOB_TYPES.some(type => type === value);
}

/**
 * Normalized job listing filters
 */
export interface JobQuery {
  status?: JobStatus;
  jobTypes: JobType[];
  limit: number;
  continuationToken?: string;
  jobRequestId?: string;
  queue?: string;
  requestedBy?: string;
  parentInstanceId?: string;
  workloadJobRoiId?: string;
  summarize: boolean;
}

/**
 * Job record as exposed to callers
 *
 * `status` and `job_type` keep the upstream string as-is: records are
 * reported faithfully even if the job service starts emitting a value this
 * gateway does not filter on yet.
 */
export interface JobRecord {
  job_id: string;
  name: string | null;
  status: string | null;
  job_type: string | null;
  /** Authoritative per job; used only for file routing */
  tenant_id: string | null;
  platform_id: string | null;
  owner: string | null;
  queue: string | null;
  created_at: string | null;
  completed_at: string | null;
  last_updated_at: string | null;
  description: string | null;
  /** Every other upstream field, untouched */
  attributes: Record<string, unknown>;
}

/**
 * Native job listing page from the job service
 */
export interface JobPage {
  jobs: JobRecord[];
  count: number;
  continuationToken: string | null;
}
