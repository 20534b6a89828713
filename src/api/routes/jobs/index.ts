/**
 * Job Routes
 *
 * Job discovery, detail and artifact endpoints.
 */

import type { Router } from 'express';
import { requireBearerToken } from '@/api/middleware/bearer.middleware.js';
import { createJobsController } from './jobs.controller.js';
import type { JobRouteServices } from './jobs.types.js';

/**
 * Configure job routes
 *
 * Routes:
 * - GET /jobs - List jobs (continuation-token pagination)
 * - GET /jobs/:jobId - Job detail with artifact count
 * - GET /jobs/:jobId/files - Artifact names
 * - GET /jobs/:jobId/files/:filename - Artifact download (streamed)
 *
 * SECURITY:
 * - Bearer credential required on every route; it is forwarded, not verified
 * - Filters and filenames are validated before any upstream call
 * - File service host is derived from the job's own tenant
 *
 * @param router - Express router instance
 * @param services - Upstream clients
 */
export function configureJobRoutes(router: Router, services: JobRouteServices): void {
  const controller = createJobsController(services);

  router.get('/jobs', requireBearerToken, controller.listJobs);
  router.get('/jobs/:jobId', requireBearerToken, controller.getJobDetail);
  router.get('/jobs/:jobId/files', requireBearerToken, controller.listJobFiles);
  router.get('/jobs/:jobId/files/:filename', requireBearerToken, controller.downloadJobFile);
}

export type { JobRouteServices } from './jobs.types.js';
