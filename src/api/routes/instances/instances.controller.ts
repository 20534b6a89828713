/**
 * Instances Controller
 *
 * Instance listings keep the legacy page/page_size contract.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { JobServiceClient } from '@/api/client/job-service.client.js';
import { getCredential } from '@/api/middleware/bearer.middleware.js';
import { normalizeInstanceQuery } from '@/validation/listing-query.validator.js';
import { legacyPage, renderPaginated } from '@/shaping/response.shaper.js';
import type { InstanceQuery } from '@/types/listing.types.js';

export type InstanceParams = {
  instanceId: string;
};

export interface InstancesController {
  listInstances: RequestHandler;
  getInstance: RequestHandler<InstanceParams>;
}

function filtersApplied(query: InstanceQuery): Record<string, unknown> {
  return {
    ...(query.platformId !== undefined && { platform_id: query.platformId }),
    ...(query.isAvailable !== undefined && { is_available: query.isAvailable })
  };
}

export function createInstancesController(jobService: JobServiceClient): InstancesController {
  return {
    /**
     * GET /instances
     */
    async listInstances(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = normalizeInstanceQuery(req.query);
        const credential = getCredential(req);
        const page = await jobService.listInstances(query, credential, {
          signal: req.abortSignal,
          correlationId: req.correlationId
        });

        res.status(200).json(renderPaginated(legacyPage(page.instances, page.total, query, filtersApplied(query))));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /instances/:instanceId
     */
    async getInstance(req: Request<InstanceParams>, res: Response, next: NextFunction): Promise<void> {
      try {
        const credential = getCredential(req);
        const instance = await jobService.getInstance(req.params.instanceId, credential, {
          signal: req.abortSignal,
          correlationId: req.correlationId
        });

        res.status(200).json({ instance });
      } catch (error) {
        next(error);
      }
    }
  };
}
