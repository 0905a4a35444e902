/**
 * stop-departures-proxy service entry point
 * Proxies stop departure lookups to the HSL (Digitransit) routing API
 */

import type { Server } from 'http';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { DepartureService } from './services/departure-service.js';
import { TransitApiClient } from './services/transit-api-client.js';
import { createLogger } from './utils/logger.js';

// Environment configuration
const config = loadConfig();

const logger = createLogger({
  serviceName: config.serviceName,
  level: config.logLevel,
  environment: config.environment,
});

const transitClient = new TransitApiClient({
  url: config.transitApi.url,
  timeoutMs: config.transitApi.timeoutMs,
  apiKey: config.transitApi.apiKey,
});

const app = createApp({
  departureService: new DepartureService({ client: transitClient, logger }),
  logger,
});

let server: Server | undefined;

function start(): void {
  server = app.listen(config.port, () => {
    logger.info(`${config.serviceName} listening`, {
      port: config.port,
      environment: config.environment,
      transitApiUrl: config.transitApi.url,
    });
  });

  server.on('error', (error: Error) => {
    logger.error('Failed to start service', { error: error.message });
    process.exit(1);
  });
}

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down gracefully...');

  if (!server) {
    process.exit(0);
  }

  server.close((error?: Error) => {
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('Shutdown complete');
    process.exit(0);
  });
});

// Start the service
start();
