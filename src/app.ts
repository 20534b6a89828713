import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { JobServiceClient } from '@/api/client/job-service.client.js';
import { FileServiceClient } from '@/api/client/file-service.client.js';
import { describeConfig, GatewayConfig } from '@/config/gateway.config.js';
import { TenantResolver } from '@/tenancy/tenant.resolver.js';
import { ApiError, errorMiddleware, notFoundHandler } from '@/api/middleware/error.handler.js';
import { requestContextMiddleware } from '@/api/middleware/request-context.middleware.js';
import { requestLoggerMiddleware } from '@/api/middleware/request-logger.middleware.js';
import { configureJobRoutes } from '@/api/routes/jobs/index.js';
import { configureInstanceRoutes } from '@/api/routes/instances/index.js';
import { configurePlatformRoutes } from '@/api/routes/platforms/index.js';
import { HealthCheckService } from '@/health/index.js';

/**
 * Everything the app needs, built once at startup
 */
export interface GatewayDependencies {
  jobService: JobServiceClient;
  fileService: FileServiceClient;
  healthService: HealthCheckService;
  apiPrefix: string;
  allowedOrigins: string[];
  rateLimitPerMinute: number;
}

/**
 * Build the Express application
 *
 * MIDDLEWARE CHAIN ORDER:
 * 1. helmet / cors - Security headers and origin check
 * 2. requestContextMiddleware - Correlation id and cancellation signal
 * 3. requestLoggerMiddleware - One log line per request
 * 4. apiLimiter - Per-IP rate limit on API routes
 * 5. routes - Each API route requires a bearer credential
 * 6. notFoundHandler / errorMiddleware - Uniform error envelope
 */
export function createApp(deps: GatewayDependencies): Express {
  const app = express();

  app.use(helmet({
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true
    },
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        scriptSrc: ["'none'"]
      }
    },
    noSniff: true,
    xssFilter: true
  }));
  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl)
      if (!origin) {
        return callback(null, true);
      }
      if (deps.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(ApiError.forbidden('Origin not allowed'));
      }
    },
    credentials: true
  }));

  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: deps.rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req: Request, res: Response) => {
      const error = ApiError.rateLimited();
      res.status(error.statusCode).json(error.toJSON());
    }
  });

  // Health check endpoint
  // Returns 503 when the job service cannot be reached
  app.get('/health', async (_req, res, next) => {
    try {
      const health = await deps.healthService.getHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    } catch (error) {
      next(error);
    }
  });

  // Gateway info endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Simulation Job Gateway',
      version: '1.0.0',
      description: 'Read-only gateway for simulation jobs, their artifacts, instances and platforms',
      api_prefix: deps.apiPrefix,
      endpoints: [
        'GET /jobs',
        'GET /jobs/:jobId',
        'GET /jobs/:jobId/files',
        'GET /jobs/:jobId/files/:filename',
        'GET /instances',
        'GET /instances/:instanceId',
        'GET /platforms',
        'GET /platforms/:platformId'
      ]
    });
  });

  const api = express.Router();
  configureJobRoutes(api, { jobService: deps.jobService, fileService: deps.fileService });
  configureInstanceRoutes(api, deps.jobService);
  configurePlatformRoutes(api, deps.jobService);
  app.use(deps.apiPrefix, apiLimiter, api);

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}

/**
 * Wire clients and the app from configuration
 */
export function buildGateway(config: GatewayConfig): Express {
  const retry = {
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs
  };

  const jobService = new JobServiceClient({
    baseUrl: config.jobServiceUrl,
    timeoutMs: config.jobServiceTimeoutMs,
    retry
  });

  const fileService = new FileServiceClient({
    timeoutMs: config.fileServiceTimeoutMs,
    retry,
    resolver: new TenantResolver({
      urlTemplate: config.fileServiceUrlTemplate,
      overrides: config.fileServiceTenantUrls
    })
  });

  const healthService = new HealthCheckService(jobService, describeConfig(config), {
    timeoutMs: Math.min(config.jobServiceTimeoutMs, 5000)
  });

  return createApp({
    jobService,
    fileService,
    healthService,
    apiPrefix: config.apiPrefix,
    allowedOrigins: config.allowedOrigins,
    rateLimitPerMinute: config.rateLimitPerMinute
  });
}
