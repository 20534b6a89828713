import { getHttpPoolStats } from '@/api/client/http-pool.js';
import type {
  HealthStatus,
  HealthResponse,
  DependencyHealth,
  HealthCheckConfig,
  ProbeResult
} from '../types/health.types.js';

/**
 * Default health check configuration
 */
const DEFAULT_CONFIG: HealthCheckConfig = {
  timeoutMs: 5000,
  cacheTtlMs: 10000
};

/**
 * What the health check needs from the job service
 */
export interface JobServiceProbe {
  probe(timeoutMs: number): Promise<ProbeResult>;
}

/**
 * Health check service monitors the gateway and the job service
 *
 * Checks:
 * - Job service: reachability probe without a credential. A 401 still
 *   proves the service is up; a 5xx means degraded.
 * - HTTP pool: socket counts, informational only
 *
 * Results are cached so health polling never floods the job service
 */
export class HealthCheckService {
  private config: HealthCheckConfig;
  private cachedHealth: HealthResponse | null = null;
  private cacheExpiry: number = 0;

  constructor(
    private readonly jobService: JobServiceProbe,
    private readonly configuration: Record<string, unknown>,
    config?: Partial<HealthCheckConfig>
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get the current health status
   * Returns cached result if available and not expired
   */
  async getHealth(): Promise<HealthResponse> {
    const now = Date.now();

    if (this.cachedHealth && now < this.cacheExpiry) {
      return this.cachedHealth;
    }

    const jobServiceHealth = await this.checkJobService();

    const healthResponse: HealthResponse = {
      status: this.calculateOverallStatus([jobServiceHealth]),
      version: '1.0.0',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      dependencies: {
        job_service: jobServiceHealth
      },
      http_pool: getHttpPoolStats(),
      configuration: this.configuration
    };

    this.cachedHealth = healthResponse;
    this.cacheExpiry = now + this.config.cacheTtlMs;

    return healthResponse;
  }

  /**
   * Probe the job service
   */
  private async checkJobService(): Promise<DependencyHealth> {
    const startTime = Date.now();
    const result = await this.jobService.probe(this.config.timeoutMs);
    const latency = Date.now() - startTime;

    if (!result.reachable) {
      // Log detailed error for monitoring
      console.error('[HealthCheck] Job service unreachable:', result.error ?? 'Unknown error');
      // Return generic error to prevent information leakage
      return {
        name: 'job_service',
        status: 'unhealthy',
        latency,
        error: 'Service unavailable'
      };
    }

    if (result.status !== undefined && result.status >= 500) {
      return {
        name: 'job_service',
        status: 'degraded',
        latency,
        error: `Upstream status ${result.status}`
      };
    }

    return {
      name: 'job_service',
      status: 'healthy',
      latency
    };
  }

  /**
   * Returns unhealthy if any dependency is unhealthy,
   * degraded if any is degraded, healthy otherwise
   */
  private calculateOverallStatus(dependencies: DependencyHealth[]): HealthStatus {
    if (dependencies.some(dep => dep.status === 'unhealthy')) {
      return 'unhealthy';
    }

    if (dependencies.some(dep => dep.status === 'degraded')) {
      return 'degraded';
    }

    return 'healthy';
  }

  /**
   * Clear cached health status
   * Useful for testing or forcing a fresh health check
   */
  clearCache(): void {
    this.cachedHealth = null;
    this.cacheExpiry = 0;
  }

  /**
   * Get cache configuration
   */
  getConfig(): HealthCheckConfig {
    return { ...this.config };
  }
}
