import type { Server } from 'http';
import { loadGatewayConfig, describeConfig } from '@/config/gateway.config.js';
import { configureHttpPool, closeHttpPool } from '@/api/client/http-pool.js';
import { buildGateway } from '@/app.js';

let server: Server | null = null;

async function start(): Promise<void> {
  console.log('[Gateway] Starting simulation job gateway...');

  const config = loadGatewayConfig();
  configureHttpPool({ proxyUrl: config.proxyUrl });

  const app = buildGateway(config);

  await new Promise<void>((resolve) => {
    server = app.listen(config.port, () => resolve());
  });

  console.log('[Gateway] Listening', {
    port: config.port,
    ...describeConfig(config)
  });
}

function shutdown(signal: string): void {
  console.log(`[Gateway] ${signal} received, shutting down gracefully...`);
  closeHttpPool();

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      console.error('[Gateway] Error while closing server:', error.message);
      process.exit(1);
    }
    process.exit(0);
  });
}

// Handle graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start the server
start().catch((error) => {
  console.error('[Gateway] Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
