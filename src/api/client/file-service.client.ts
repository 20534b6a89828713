import { PassThrough, Readable } from 'stream';
import { AxiosInstance } from 'axios';
import { getHttpPool } from '@/api/client/http-pool.js';
import { RetryPolicy, executeUpstream } from '@/api/client/upstream-request.js';
import { isRecord } from '@/api/client/job-service.records.js';
import { ApiError } from '@/api/middleware/error.handler.js';
import { TenantResolver } from '@/tenancy/tenant.resolver.js';
import {
  ArtifactArea,
  FileDownload,
  FileRequestOptions,
  WORKLOAD_LOG_ARCHIVES,
  WorkloadLogArchive
} from '@/types/file.types.js';

export interface FileServiceClientConfig {
  /** Response-head timeout; also the longest a download body may stall */
  timeoutMs: number;
  retry: RetryPolicy;
  resolver: TenantResolver;
}

const COMPONENT = 'FileServiceClient';

const AREA_BY_JOB_TYPE: Readonly<Record<string, ArtifactArea>> = {
  ISIM: 'isim',
  NovaCoho: 'coho',
  IWPS: 'iwps',
  WorkloadJob: 'workloadjob',
  WorkloadJobROI: 'workloadjobroi'
};

/**
 * Artifact area for a job type; unknown or missing types use `iwps`
 */
export function artifactAreaFor(jobType: string | null | undefined): ArtifactArea {
  if (jobType && Object.prototype.hasOwnProperty.call(AREA_BY_JOB_TYPE, jobType)) {
    return AREA_BY_JOB_TYPE[jobType];
  }
  return 'iwps';
}

function isWorkloadArea(area: ArtifactArea): boolean {
  return area === 'workloadjob' || area === 'workloadjobroi';
}

/**
 * Workload jobs expose their logs as two archives; the filename picks one
 */
export function workloadArchiveFor(filename: string): WorkloadLogArchive | null {
  if (filename.includes('serialconsole')) {
    return 'serialconsole';
  }
  if (filename.includes('simics')) {
    return 'simics';
  }
  return null;
}

/**
 * URL-encode each segment of a relative file path.
 * Empty paths and `.`/`..` segments are rejected before anything is sent.
 */
export function encodeFilePath(filename: string): string {
  const segments = filename.split('/').filter(segment => segment.length > 0);

  if (segments.length === 0 || segments.some(segment => segment === '.' || segment === '..')) {
    throw ApiError.invalidFilter(
      'filename',
      `Invalid filename '${filename}': must be a relative path without '.' or '..' segments`,
      [filename],
      []
    );
  }

  return segments.map(encodeURIComponent).join('/');
}

function readEntryNames(body: unknown, key: 'files' | 'children', jobId: string): string[] {
  if (!isRecord(body)) {
    throw ApiError.upstreamError('File service returned a malformed listing: expected a JSON object', undefined, { job_id: jobId });
  }

  const entries = body[key];
  if (entries === undefined || entries === null) {
    return [];
  }
  if (!Array.isArray(entries)) {
    throw ApiError.upstreamError(`File service returned a malformed listing: ${key} is not a list`, undefined, { job_id: jobId });
  }

  return entries.map((entry: unknown) => {
    if (typeof entry === 'string') {
      return entry;
    }
    if (isRecord(entry) && typeof entry.name === 'string') {
      return entry.name;
    }
    throw ApiError.upstreamError('File service returned a malformed listing entry without a name', undefined, { job_id: jobId });
  });
}

function headerValue(headers: Record<string, unknown>, name: string): string | null {
  const value = headers[name];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * Relay upstream bytes in order.
 *
 * An upstream error, or no data for `idleTimeoutMs`, destroys the returned
 * stream with STREAM_INTERRUPTED. Destroying the returned stream releases
 * the upstream connection.
 */
export function relayDownload(
  source: Readable,
  idleTimeoutMs: number,
  details: Record<string, unknown>
): Readable {
  const relay = new PassThrough();
  let timer: NodeJS.Timeout | null = null;

  const disarm = (): void => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const interrupt = (message: string): void => {
    disarm();
    source.unpipe(relay);
    source.destroy();
    relay.destroy(ApiError.streamInterrupted(message, details));
  };

  const arm = (): void => {
    disarm();
    timer = setTimeout(() => interrupt(`File service sent no data for ${idleTimeoutMs}ms`), idleTimeoutMs);
  };

  source.on('data', arm);
  relay.on('drain', arm);
  source.on('error', (error: Error) => interrupt(`File service stream failed: ${error.message}`));
  source.on('end', disarm);
  relay.on('close', () => {
    disarm();
    if (!source.destroyed) {
      source.destroy();
    }
  });

  source.pipe(relay);
  arm();

  return relay;
}

/**
 * Client for the per-tenant file services
 *
 * The tenant is an argument of every call and always comes from the job
 * record; it is validated before any network traffic.
 */
export class FileServiceClient {
  constructor(
    private readonly config: FileServiceClientConfig,
    private readonly httpProvider: () => AxiosInstance = getHttpPool
  ) {}

  /**
   * Artifact names in upstream order
   */
  async listFiles(
    tenantId: unknown,
    jobId: string,
    credential: string,
    options: FileRequestOptions = {}
  ): Promise<string[]> {
    const host = this.config.resolver.resolveFileServiceHost(tenantId, jobId);
    const area = artifactAreaFor(options.jobType);
    const job = encodeURIComponent(jobId);
    const workload = isWorkloadArea(area);
    const path = workload ? `fs/files/${job}/logs` : `fs/files/${job}/${area}/artifacts/out`;

    const response = await executeUpstream(
      this.httpProvider(),
      {
        component: COMPONENT,
        url: `${host}/${path}`,
        credential,
        timeoutMs: this.config.timeoutMs,
        signal: options.signal,
        correlationId: options.correlationId,
        notFoundMessage: `No artifacts found for job '${jobId}'`,
        details: { job_id: jobId }
      },
      this.config.retry
    );

    return readEntryNames(response.data, workload ? 'children' : 'files', jobId);
  }

  /**
   * Open a download. Resolves once the upstream answered with a 2xx head;
   * the body is streamed, never buffered.
   */
  async downloadFile(
    tenantId: unknown,
    jobId: string,
    filename: string,
    credential: string,
    options: FileRequestOptions = {}
  ): Promise<FileDownload> {
    const host = this.config.resolver.resolveFileServiceHost(tenantId, jobId);
    const encodedPath = encodeFilePath(filename);
    const area = artifactAreaFor(options.jobType);
    const job = encodeURIComponent(jobId);
    const details = { job_id: jobId, filename };

    let path: string;
    if (isWorkloadArea(area)) {
      const archive = workloadArchiveFor(filename);
      if (!archive) {
        throw ApiError.notFound(
          `Workload job logs are served as ${WORKLOAD_LOG_ARCHIVES.join(' or ')} archives; '${filename}' names neither`,
          details
        );
      }
      path = `fs/files/${job}/logs/all/${archive}`;
    } else {
      path = `fs/files/${job}/${area}/artifacts/out/${encodedPath}`;
    }

    const response = await executeUpstream(
      this.httpProvider(),
      {
        component: COMPONENT,
        url: `${host}/${path}`,
        credential,
        timeoutMs: this.config.timeoutMs,
        signal: options.signal,
        correlationId: options.correlationId,
        responseType: 'stream',
        accept: '*/*',
        notFoundMessage: `File '${filename}' not found for job '${jobId}'`,
        details
      },
      this.config.retry
    );

    const source = response.data instanceof Readable
      ? response.data
      : Readable.from([response.data]);

    const contentLength = headerValue(response.headers, 'content-length');
    const parsedLength = contentLength !== null ? parseInt(contentLength, 10) : NaN;

    console.log(`[${COMPONENT}]${options.correlationId ? ` [${options.correlationId}]` : ''} Streaming '${filename}' for job '${jobId}'`);

    return {
      stream: relayDownload(source, this.config.timeoutMs, details),
      contentType: headerValue(response.headers, 'content-type'),
      contentLength: Number.isFinite(parsedLength) ? parsedLength : null
    };
  }
}
