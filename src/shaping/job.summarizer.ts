import { JobPage, JobRecord } from '@/types/job.types.js';

export interface SummaryLimits {
  maxJobs: number;
  maxChars: number;
}

export const DEFAULT_SUMMARY_LIMITS: SummaryLimits = {
  maxJobs: 50,
  maxChars: 50000
};

/**
 * Compact job for callers with a small context budget
 */
export interface JobSummary {
  job_id: string;
  name: string | null;
  job_type: string | null;
  status: string | null;
  queue: string | null;
  tenant_id: string | null;
  owner: string | null;
  created_at: string | null;
}

export interface SummarizedJobs {
  jobs: JobSummary[];
  count: number;
  total_available: number;
  continuation_token?: string;
  summary: {
    original_count: number;
    summarized_count: number;
    approximate_chars: number;
    truncated: boolean;
  };
}

export function summarizeJob(job: JobRecord): JobSummary {
  return {
    job_id: job.job_id,
    name: job.name,
    job_type: job.job_type,
    status: job.status,
    queue: job.queue,
    tenant_id: job.tenant_id,
    owner: job.owner,
    created_at: job.created_at
  };
}

/**
 * Reduce a job page to at most `maxJobs` summaries totalling at most
 * `maxChars` serialized characters. Jobs are taken in order; the first one
 * that does not fit ends the summary. The continuation token is unchanged.
 */
export function summarizeJobPage(page: JobPage, limits: SummaryLimits = DEFAULT_SUMMARY_LIMITS): SummarizedJobs {
  const jobs: JobSummary[] = [];
  let chars = 0;

  for (const job of page.jobs) {
    if (jobs.length >= limits.maxJobs) {
      break;
    }

    const summary = summarizeJob(job);
    const size = JSON.stringify(summary).length;
    if (chars + size > limits.maxChars) {
      break;
    }

    jobs.push(summary);
    chars += size;
  }

  if (jobs.length < page.jobs.length) {
    console.warn(`[JobSummarizer] Truncated to ${jobs.length} of ${page.jobs.length} jobs (${chars} chars)`);
  }

  return {
    jobs,
    count: jobs.length,
    total_available: page.jobs.length,
    ...(page.continuationToken !== null && { continuation_token: page.continuationToken }),
    summary: {
      original_count: page.jobs.length,
      summarized_count: jobs.length,
      approximate_chars: chars,
      truncated: jobs.length < page.jobs.length
    }
  };
}
