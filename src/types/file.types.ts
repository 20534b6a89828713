import type { Readable } from 'stream';

/**
 * Artifact areas on the file service, selected by job type
 */
export type ArtifactArea = 'iwps' | 'isim' | 'coho' | 'workloadjob' | 'workloadjobroi';

/**
 * Log archives served for workload jobs
 */
export const WORKLOAD_LOG_ARCHIVES = ['simics', 'serialconsole'] as const;
export type WorkloadLogArchive = typeof WORKLOAD_LOG_ARCHIVES[number];

/**
 * A download in progress. The stream yields upstream bytes in order and is
 * destroyed with STREAM_INTERRUPTED if the upstream fails mid-body.
 */
export interface FileDownload {
  stream: Readable;
  contentType: string | null;
  contentLength: number | null;
}

/**
 * Per-call options for file operations
 */
export interface FileRequestOptions {
  /** Job type from the job record; selects the artifact area */
  jobType?: string | null;
  signal?: AbortSignal;
  correlationId?: string;
}
