import type { HttpPoolStats } from '@/api/client/http-pool.js';

/**
 * Health status levels
 * - healthy: All systems operational
 * - degraded: The job service answers but reports server errors
 * - unhealthy: The job service cannot be reached
 */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Individual dependency health check result
 */
export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latency?: number;
  error?: string;
}

/**
 * Overall health response
 */
export interface HealthResponse {
  status: HealthStatus;
  version: string;
  uptime: number;
  timestamp: string;
  dependencies: {
    job_service: DependencyHealth;
  };
  http_pool: HttpPoolStats;
  configuration: Record<string, unknown>;
}

/**
 * Result of a reachability probe: any HTTP answer counts as reachable
 */
export interface ProbeResult {
  reachable: boolean;
  status?: number;
  error?: string;
}

/**
 * Health check configuration
 */
export interface HealthCheckConfig {
  timeoutMs: number;
  cacheTtlMs: number;
}
