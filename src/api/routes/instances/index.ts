import type { Router } from 'express';
import type { JobServiceClient } from '@/api/client/job-service.client.js';
import { requireBearerToken } from '@/api/middleware/bearer.middleware.js';
import { createInstancesController } from './instances.controller.js';

/**
 * Configure instance routes
 *
 * Routes:
 * - GET /instances - Paged instance listing
 * - GET /instances/:instanceId - Instance detail
 */
export function configureInstanceRoutes(router: Router, jobService: JobServiceClient): void {
  const controller = createInstancesController(jobService);

  router.get('/instances', requireBearerToken, controller.listInstances);
  router.get('/instances/:instanceId', requireBearerToken, controller.getInstance);
}
