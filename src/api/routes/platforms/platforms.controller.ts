/**
 * Platforms Controller
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { JobServiceClient } from '@/api/client/job-service.client.js';
import { getCredential } from '@/api/middleware/bearer.middleware.js';
import { normalizePlatformQuery } from '@/validation/listing-query.validator.js';

export type PlatformParams = {
  platformId: string;
};

export interface PlatformsController {
  listPlatforms: RequestHandler;
  getPlatform: RequestHandler<PlatformParams>;
}

export function createPlatformsController(jobService: JobServiceClient): PlatformsController {
  return {
    /**
     * GET /platforms
     *
     * Filters are passed to the job service under their own names.
     */
    async listPlatforms(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = normalizePlatformQuery(req.query);
        const credential = getCredential(req);
        const platforms = await jobService.listPlatforms(query, credential, {
          signal: req.abortSignal,
          correlationId: req.correlationId
        });

        res.status(200).json({ platforms });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /platforms/:platformId
     */
    async getPlatform(req: Request<PlatformParams>, res: Response, next: NextFunction): Promise<void> {
      try {
        const credential = getCredential(req);
        const platform = await jobService.getPlatform(req.params.platformId, credential, {
          signal: req.abortSignal,
          correlationId: req.correlationId
        });

        res.status(200).json({ platform });
      } catch (error) {
        next(error);
      }
    }
  };
}
