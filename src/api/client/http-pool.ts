import http from 'http';
import https from 'https';
import axios, { AxiosInstance, AxiosProxyConfig } from 'axios';

/**
 * Shared HTTP pool configuration
 */
export interface HttpPoolOptions {
  proxyUrl: string | null;
  maxSockets: number;
  keepAliveMs: number;
}

/**
 * Socket counts per agent, for /health
 */
export interface HttpPoolStats {
  created: boolean;
  proxy: boolean;
  activeSockets: number;
  freeSockets: number;
  pendingRequests: number;
}

const DEFAULT_POOL_OPTIONS: HttpPoolOptions = {
  proxyUrl: null,
  maxSockets: 64,
  keepAliveMs: 1000
};

/**
 * Convert a proxy URL into axios's proxy settings
 */
export function parseProxyUrl(proxyUrl: string): AxiosProxyConfig {
  const url = new URL(proxyUrl);
  const protocol = url.protocol.replace(/:$/, '');
  const port = url.port
    ? parseInt(url.port, 10)
    : protocol === 'https' ? 443 : 80;

  return {
    protocol,
    host: url.hostname,
    port,
    ...(url.username ? {
      auth: {
        username: decodeURIComponent(url.username),
        password: decodeURIComponent(url.password)
      }
    } : {})
  };
}

interface HttpPool {
  client: AxiosInstance;
  httpAgent: http.Agent;
  httpsAgent: https.Agent;
  proxy: boolean;
}

let poolOptions: HttpPoolOptions = DEFAULT_POOL_OPTIONS;
let poolInstance: HttpPool | null = null;

/**
 * Set the options the pool is created with.
 * Takes effect on the next creation; an existing pool is left alone.
 */
export function configureHttpPool(options: Partial<HttpPoolOptions>): void {
  poolOptions = { ...DEFAULT_POOL_OPTIONS, ...options };
}

/**
 * Get the process-wide axios instance, creating it on first use.
 *
 * Carries connection reuse and the proxy only: no credential, tenant or
 * per-request header is ever set on it.
 */
export function getHttpPool(): AxiosInstance {
  if (poolInstance) {
    return poolInstance.client;
  }

  const agentOptions = {
    keepAlive: true,
    keepAliveMsecs: poolOptions.keepAliveMs,
    maxSockets: poolOptions.maxSockets
  };
  const httpAgent = new http.Agent(agentOptions);
  const httpsAgent = new https.Agent(agentOptions);

  const client = axios.create({
    httpAgent,
    httpsAgent,
    proxy: poolOptions.proxyUrl ? parseProxyUrl(poolOptions.proxyUrl) : false
  });

  poolInstance = { client, httpAgent, httpsAgent, proxy: poolOptions.proxyUrl !== null };

  console.log('[HttpPool] Created', {
    maxSockets: poolOptions.maxSockets,
    proxy: poolInstance.proxy
  });

  return client;
}

function countSockets(table: NodeJS.ReadOnlyDict<unknown[]>): number {
  return Object.values(table).reduce<number>((total, list) => total + (list ? list.length : 0), 0);
}

export function getHttpPoolStats(): HttpPoolStats {
  if (!poolInstance) {
    return { created: false, proxy: poolOptions.proxyUrl !== null, activeSockets: 0, freeSockets: 0, pendingRequests: 0 };
  }

  const agents = [poolInstance.httpAgent, poolInstance.httpsAgent];
  return {
    created: true,
    proxy: poolInstance.proxy,
    activeSockets: agents.reduce((total, agent) => total + countSockets(agent.sockets), 0),
    freeSockets: agents.reduce((total, agent) => total + countSockets(agent.freeSockets), 0),
    pendingRequests: agents.reduce((total, agent) => total + countSockets(agent.requests), 0)
  };
}

/**
 * Destroy the pool's sockets. The next getHttpPool() creates a fresh pool.
 */
export function closeHttpPool(): void {
  if (!poolInstance) {
    return;
  }

  poolInstance.httpAgent.destroy();
  poolInstance.httpsAgent.destroy();
  poolInstance = null;

  console.log('[HttpPool] Closed');
}
