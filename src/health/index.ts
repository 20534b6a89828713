export { HealthCheckService } from './services/health-check.service.js';
export type { JobServiceProbe } from './services/health-check.service.js';
export type {
  HealthStatus,
  HealthResponse,
  DependencyHealth,
  HealthCheckConfig,
  ProbeResult
} from './types/health.types.js';
