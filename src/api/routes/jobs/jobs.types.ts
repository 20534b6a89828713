/**
 * Job API Types
 *
 * Request parameters and response bodies of the /jobs endpoints.
 */

import type { FileServiceClient } from '@/api/client/file-service.client.js';
import type { JobServiceClient } from '@/api/client/job-service.client.js';
import type { JobRecord } from '@/types/job.types.js';

/**
 * Upstream clients the job routes depend on
 */
export interface JobRouteServices {
  jobService: JobServiceClient;
  fileService: FileServiceClient;
}

/**
 * Path parameters of /jobs/:jobId
 */
export type JobParams = {
  jobId: string;
};

/**
 * Path parameters of /jobs/:jobId/files/:filename.
 * A nested path arrives as one segment with `/` encoded as %2F.
 */
export type JobFileParams = JobParams & {
  filename: string;
};

/**
 * GET /jobs/:jobId response
 */
export interface JobDetailResponse {
  job: JobRecord;
  /** null when the job has no tenant and so no file service */
  file_count: number | null;
}

/**
 * GET /jobs/:jobId/files response
 */
export interface FileListResponse {
  files: string[];
  total_files: number;
  job_id: string;
}
