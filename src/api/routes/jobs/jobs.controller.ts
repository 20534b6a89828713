/**
 * Jobs Controller
 *
 * Job discovery, job detail and artifact access. Every handler validates
 * its input before the first upstream call and hands failures to the error
 * middleware through `next`.
 */

import { pipeline } from 'stream/promises';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CallOptions } from '@/api/client/job-service.client.js';
import { encodeFilePath } from '@/api/client/file-service.client.js';
import { ApiError, ApiErrorCode } from '@/api/middleware/error.handler.js';
import { getCredential } from '@/api/middleware/bearer.middleware.js';
import { formatLogWithCorrelation } from '@/api/middleware/request-context.middleware.js';
import { normalizeJobQuery } from '@/validation/job-query.validator.js';
import {
  continuationPage,
  renderPaginated,
  shapeFileListing,
  shapeJobDetail
} from '@/shaping/response.shaper.js';
import { summarizeJobPage } from '@/shaping/job.summarizer.js';
import type { JobRecord } from '@/types/job.types.js';
import type { JobFileParams, JobParams, JobRouteServices } from './jobs.types.js';

export interface JobsController {
  listJobs: RequestHandler;
  getJobDetail: RequestHandler<JobParams>;
  listJobFiles: RequestHandler<JobParams>;
  downloadJobFile: RequestHandler<JobFileParams>;
}

function callOptions<P>(req: Request<P>): CallOptions {
  return {
    signal: req.abortSignal,
    correlationId: req.correlationId
  };
}

/**
 * Quote a filename for Content-Disposition
 */
export function attachmentDisposition(filename: string): string {
  const base = filename.split('/').filter(segment => segment.length > 0).pop() ?? 'download';
  const ascii = base.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(base)}`;
}

export function createJobsController(services: JobRouteServices): JobsController {
  const { jobService, fileService } = services;

  /**
   * Files of a job, resolved at the job's own tenant
   */
  async function countFiles(job: JobRecord, credential: string, req: Request<JobParams>): Promise<number | null> {
    if (job.tenant_id === null) {
      return null;
    }

    try {
      const files = await fileService.listFiles(job.tenant_id, job.job_id, credential, {
        ...callOptions(req),
        jobType: job.job_type
      });
      return files.length;
    } catch (error) {
      if (error instanceof ApiError) {
        // No artifact directory yet
        if (error.code === ApiErrorCode.NOT_FOUND) {
          return 0;
        }
        // Detail still renders when the tenant cannot name a file service
        if (error.code === ApiErrorCode.INVALID_TENANT) {
          return null;
        }
      }
      throw error;
    }
  }

  return {
    /**
     * GET /jobs
     *
     * One page in the job service's continuation-token form, or a compact
     * summary when `summarize=true`.
     */
    async listJobs(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = normalizeJobQuery(req.query);
        const credential = getCredential(req);
        const page = await jobService.listJobs(query, credential, callOptions(req));

        if (query.summarize) {
          res.status(200).json(summarizeJobPage(page));
          return;
        }

        res.status(200).json(renderPaginated(continuationPage(page)));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs/:jobId
     */
    async getJobDetail(req: Request<JobParams>, res: Response, next: NextFunction): Promise<void> {
      try {
        const credential = getCredential(req);
        const job = await jobService.getJob(req.params.jobId, credential, callOptions(req));
        const fileCount = await countFiles(job, credential, req);

        res.status(200).json(shapeJobDetail(job, fileCount));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs/:jobId/files
     *
     * The tenant comes from the job record, never from the caller.
     */
    async listJobFiles(req: Request<JobParams>, res: Response, next: NextFunction): Promise<void> {
      try {
        const credential = getCredential(req);
        const job = await jobService.getJob(req.params.jobId, credential, callOptions(req));
        const files = await fileService.listFiles(job.tenant_id, job.job_id, credential, {
          ...callOptions(req),
          jobType: job.job_type
        });

        res.status(200).json(shapeFileListing(job.job_id, files));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /jobs/:jobId/files/:filename
     *
     * Streams the artifact. Once the first byte is written the status is
     * committed; a later upstream failure can only cut the connection.
     */
    async downloadJobFile(req: Request<JobFileParams>, res: Response, next: NextFunction): Promise<void> {
      try {
        const { jobId, filename } = req.params;
        encodeFilePath(filename);

        const credential = getCredential(req);
        const job = await jobService.getJob(jobId, credential, callOptions(req));
        const download = await fileService.downloadFile(job.tenant_id, job.job_id, filename, credential, {
          ...callOptions(req),
          jobType: job.job_type
        });

        res.status(200);
        res.setHeader('Content-Type', download.contentType ?? 'application/octet-stream');
        res.setHeader('Content-Disposition', attachmentDisposition(filename));
        if (download.contentLength !== null) {
          res.setHeader('Content-Length', String(download.contentLength));
        }

        await pipeline(download.stream, res);
        console.log(formatLogWithCorrelation(req, `[Gateway] Delivered '${filename}' for job '${jobId}'`));
      } catch (error) {
        if (req.abortSignal?.aborted) {
          next(ApiError.requestCancelled());
          return;
        }
        next(error);
      }
    }
  };
}
