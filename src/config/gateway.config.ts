/**
 * Gateway configuration
 *
 * Read once from the environment at startup. Invalid values throw so the
 * process refuses to start instead of running with a half-valid setup.
 */

export interface GatewayConfig {
  port: number;
  apiPrefix: string;
  allowedOrigins: string[];
  jobServiceUrl: string;
  jobServiceTimeoutMs: number;
  fileServiceTimeoutMs: number;
  fileServiceUrlTemplate: string;
  fileServiceTenantUrls: Readonly<Record<string, string>>;
  maxRetries: number;
  retryBaseDelayMs: number;
  proxyUrl: string | null;
  rateLimitPerMinute: number;
}

export const DEFAULT_FILE_SERVICE_URL_TEMPLATE = 'https://gw-{tenant}.files.workloadmgr.local';

/**
 * Error thrown for invalid configuration values
 */
export class ConfigError extends Error {
  constructor(public readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(name, `expected a non-negative integer, got '${raw}'`);
  }

  const value = parseInt(raw.trim(), 10);
  if (value < min) {
    throw new ConfigError(name, `must be at least ${min}`);
  }
  return value;
}

function readUrl(name: string, raw: string): string {
  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError(name, `unsupported protocol '${url.protocol}'`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(name, `not a valid URL: '${raw}'`);
  }
  return raw.replace(/\/+$/, '');
}

function readTenantUrls(env: Env): Record<string, string> {
  const raw = env.FILE_SERVICE_TENANT_URLS;
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError('FILE_SERVICE_TENANT_URLS', 'not valid JSON');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('FILE_SERVICE_TENANT_URLS', 'expected a JSON object of tenant to URL');
  }

  const urls: Record<string, string> = {};
  for (const [tenant, url] of Object.entries(parsed)) {
    if (typeof url !== 'string') {
      throw new ConfigError('FILE_SERVICE_TENANT_URLS', `URL for tenant '${tenant}' must be a string`);
    }
    urls[tenant] = readUrl('FILE_SERVICE_TENANT_URLS', url);
  }
  return urls;
}

/**
 * Proxy for all outbound traffic, in the order curl and most HTTP clients
 * look for it
 */
export function readProxyUrl(env: Env): string | null {
  const candidates: Array<[string, string | undefined]> = [
    ['HTTPS_PROXY', env.HTTPS_PROXY],
    ['https_proxy', env.https_proxy],
    ['HTTP_PROXY', env.HTTP_PROXY],
    ['http_proxy', env.http_proxy]
  ];

  for (const [name, value] of candidates) {
    if (value !== undefined && value.trim() !== '') {
      return readUrl(name, value.trim());
    }
  }
  return null;
}

/**
 * Load and validate the gateway configuration
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const jobServiceUrl = env.JOB_SERVICE_URL;
  if (!jobServiceUrl || jobServiceUrl.trim() === '') {
    throw new ConfigError('JOB_SERVICE_URL', 'required');
  }

  const template = env.FILE_SERVICE_URL_TEMPLATE?.trim() || DEFAULT_FILE_SERVICE_URL_TEMPLATE;
  if (!template.includes('{tenant}')) {
    throw new ConfigError('FILE_SERVICE_URL_TEMPLATE', "must contain the '{tenant}' placeholder");
  }

  const apiPrefix = env.API_PREFIX?.trim() || '/api/v1';
  if (!apiPrefix.startsWith('/')) {
    throw new ConfigError('API_PREFIX', "must start with '/'");
  }

  const config: GatewayConfig = {
    port: readInteger(env, 'GATEWAY_PORT', 8080, 1),
    apiPrefix: apiPrefix.replace(/\/+$/, '') || '/',
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:3000')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    jobServiceUrl: readUrl('JOB_SERVICE_URL', jobServiceUrl.trim()),
    jobServiceTimeoutMs: readInteger(env, 'JOB_SERVICE_TIMEOUT_MS', 30000, 1),
    fileServiceTimeoutMs: readInteger(env, 'FILE_SERVICE_TIMEOUT_MS', 300000, 1),
    fileServiceUrlTemplate: template.replace(/\/+$/, ''),
    fileServiceTenantUrls: Object.freeze(readTenantUrls(env)),
    maxRetries: readInteger(env, 'UPSTREAM_MAX_RETRIES', 2, 0),
    retryBaseDelayMs: readInteger(env, 'UPSTREAM_RETRY_BASE_DELAY_MS', 200, 0),
    proxyUrl: readProxyUrl(env),
    rateLimitPerMinute: readInteger(env, 'RATE_LIMIT_PER_MINUTE', 60, 1)
  };

  return Object.freeze(config);
}

/**
 * Summary safe to log or expose on /health: no proxy credentials
 */
export function describeConfig(config: GatewayConfig): Record<string, unknown> {
  return {
    apiPrefix: config.apiPrefix,
    jobServiceUrl: config.jobServiceUrl,
    jobServiceTimeoutMs: config.jobServiceTimeoutMs,
    fileServiceTimeoutMs: config.fileServiceTimeoutMs,
    fileServiceUrlTemplate: config.fileServiceUrlTemplate,
    tenantOverrides: Object.keys(config.fileServiceTenantUrls).length,
    maxRetries: config.maxRetries,
    proxy: config.proxyUrl ? redactProxy(config.proxyUrl) : null
  };
}

function redactProxy(proxyUrl: string): string {
  try {
    const url = new URL(proxyUrl);
    if (url.username || url.password) {
      url.username = '***';
      url.password = '';
    }
    return url.toString().replace(/\/$/, '');
  } catch {
    return 'invalid';
  }
}
