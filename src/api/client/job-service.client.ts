import { AxiosInstance } from 'axios';
import { getHttpPool } from '@/api/client/http-pool.js';
import { RetryPolicy, executeUpstream } from '@/api/client/upstream-request.js';
import {
  parseInstancePage,
  parseInstanceRecord,
  parseJobPage,
  parseJobRecord,
  parsePlatformList,
  parsePlatformRecord
} from '@/api/client/job-service.records.js';
import { JobPage, JobQuery, JobRecord } from '@/types/job.types.js';
import {
  InstancePage,
  InstanceQuery,
  InstanceRecord,
  PlatformQuery,
  PlatformRecord
} from '@/types/listing.types.js';

/**
 * Job service client configuration
 */
export interface JobServiceClientConfig {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

/**
 * Per-call context. The credential is passed on every call and never kept.
 */
export interface CallOptions {
  signal?: AbortSignal;
  correlationId?: string;
}

const COMPONENT = 'JobServiceClient';

/**
 * Translate normalized filters into the job service's query parameters
 */
export function toJobServiceParams(query: JobQuery): Record<string, string | number> {
  const params: Record<string, string | number> = { Limit: query.limit };

  if (query.status !== undefined) params.JobRequestStatus = query.status;
  if (query.jobTypes.length > 0) params.Type = query.jobTypes.join(',');
  if (query.jobRequestId !== undefined) params.JobRequestID = query.jobRequestId;
  if (query.queue !== undefined) params.Queue = query.queue;
  if (query.requestedBy !== undefined) params.RequestedBy = query.requestedBy;
  if (query.parentInstanceId !== undefined) params.ParentInstanceID = query.parentInstanceId;
  if (query.workloadJobRoiId !== undefined) params.WorkloadJobROIID = query.workloadJobRoiId;
  if (query.continuationToken !== undefined) params.ContinuationToken = query.continuationToken;

  return params;
}

/**
 * Client for the job service's read endpoints
 *
 * Stateless apart from its configuration: every call receives the caller's
 * credential and signal, so one instance serves all requests.
 */
export class JobServiceClient {
  constructor(
    private readonly config: JobServiceClientConfig,
    private readonly httpProvider: () => AxiosInstance = getHttpPool
  ) {}

  /**
   * One page of jobs in the job service's native continuation-token form
   */
  async listJobs(query: JobQuery, credential: string, options: CallOptions = {}): Promise<JobPage> {
    const response = await this.get('/v1/jobs', credential, options, {
      params: toJobServiceParams(query),
      notFoundMessage: 'Job listing not found'
    });

    const page = parseJobPage(response);
    console.log(
      `[${COMPONENT}]${options.correlationId ? ` [${options.correlationId}]` : ''} Listed ${page.jobs.length} job(s), more=${page.continuationToken !== null}`
    );
    return page;
  }

  async getJob(jobId: string, credential: string, options: CallOptions = {}): Promise<JobRecord> {
    const response = await this.get(`/v1/jobs/job/${encodeURIComponent(jobId)}`, credential, options, {
      notFoundMessage: `Job '${jobId}' not found`,
      details: { job_id: jobId }
    });
    return parseJobRecord(response);
  }

  /**
   * Instances with limit/offset derived from the page query
   */
  async listInstances(query: InstanceQuery, credential: string, options: CallOptions = {}): Promise<InstancePage> {
    const params: Record<string, string | number> = {
      limit: query.pageSize,
      offset: (query.page - 1) * query.pageSize
    };
    if (query.platformId !== undefined) params.platform_id = query.platformId;
    if (query.isAvailable !== undefined) params.available = String(query.isAvailable);
    if (query.sortBy !== undefined) {
      params.sort_by = query.sortBy;
      params.sort_order = query.sortOrder;
    }

    const response = await this.get('/v1/instances', credential, options, {
      params,
      notFoundMessage: 'Instance listing not found'
    });
    return parseInstancePage(response);
  }

  async getInstance(instanceId: string, credential: string, options: CallOptions = {}): Promise<InstanceRecord> {
    const response = await this.get(`/v1/instances/${encodeURIComponent(instanceId)}`, credential, options, {
      notFoundMessage: `Instance '${instanceId}' not found`,
      details: { instance_id: instanceId }
    });
    return parseInstanceRecord(response);
  }

  /**
   * Platforms, with filters passed through as the job service names them
   */
  async listPlatforms(query: PlatformQuery, credential: string, options: CallOptions = {}): Promise<PlatformRecord[]> {
    const params: Record<string, string | boolean> = {};
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        params[name] = value;
      }
    }

    const response = await this.get('/v1/platforms', credential, options, {
      params,
      notFoundMessage: 'Platform listing not found'
    });
    return parsePlatformList(response);
  }

  async getPlatform(platformId: string, credential: string, options: CallOptions = {}): Promise<PlatformRecord> {
    const response = await this.get(
      `/v1/platforms/platform/${encodeURIComponent(platformId)}`,
      credential,
      options,
      {
        notFoundMessage: `Platform '${platformId}' not found`,
        details: { platform_id: platformId }
      }
    );
    return parsePlatformRecord(response);
  }

  /**
   * Cheap reachability probe for /health: any HTTP answer means reachable
   */
  async probe(timeoutMs: number): Promise<{ reachable: boolean; status?: number; error?: string }> {
    try {
      const response = await this.httpProvider().request({
        method: 'GET',
        url: `${this.config.baseUrl}/v1/platforms`,
        params: { Limit: 1 },
        timeout: timeoutMs,
        validateStatus: () => true
      });
      return { reachable: true, status: response.status };
    } catch (error) {
      return { reachable: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async get(
    path: string,
    credential: string,
    options: CallOptions,
    request: {
      params?: Record<string, string | number | boolean>;
      notFoundMessage: string;
      details?: Record<string, unknown>;
    }
  ): Promise<unknown> {
    const response = await executeUpstream(
      this.httpProvider(),
      {
        component: COMPONENT,
        url: `${this.config.baseUrl}${path}`,
        params: request.params,
        credential,
        timeoutMs: this.config.timeoutMs,
        signal: options.signal,
        correlationId: options.correlationId,
        notFoundMessage: request.notFoundMessage,
        details: request.details
      },
      this.config.retry
    );
    return response.data;
  }
}
