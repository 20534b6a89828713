import type { Router } from 'express';
import type { JobServiceClient } from '@/api/client/job-service.client.js';
import { requireBearerToken } from '@/api/middleware/bearer.middleware.js';
import { createPlatformsController } from './platforms.controller.js';

/**
 * Configure platform routes
 *
 * Routes:
 * - GET /platforms - Platform listing with pass-through filters
 * - GET /platforms/:platformId - Platform detail
 */
export function configurePlatformRoutes(router: Router, jobService: JobServiceClient): void {
  const controller = createPlatformsController(jobService);

  router.get('/platforms', requireBearerToken, controller.listPlatforms);
  router.get('/platforms/:platformId', requireBearerToken, controller.getPlatform);
}
