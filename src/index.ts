import http from 'http';
import { pathToFileURL } from 'url';
import { createApp } from './app.js';
import { PROXY_OVERRIDE_ENV } from './config/config.js';
import { getProxyOverride, getServerHost, getServerPort } from './config/relayConfig.js';
import { createLogger, logLoggerSettings } from './logger/index.js';

// Create loggers for different functional modules to improve log distinction
const appLogger = createLogger('App'); // Application startup/initialization
const serverLogger = createLogger('Server'); // Server startup/shutdown

/**
 * Shutdown flag - prevents duplicate shutdown process triggering
 */
let isShuttingDown = false;

/**
 * Application main entry point
 */
export async function startApplication(): Promise<http.Server> {
  logLoggerSettings(appLogger);
  appLogger.info('Initializing fetch relay...');

  const proxyOverride = getProxyOverride();
  if (proxyOverride) {
    appLogger.info({ envKey: PROXY_OVERRIDE_ENV }, 'Proxy override set, request proxies will be ignored');
  }

  const app = createApp({ proxyOverride });

  const host = getServerHost();
  const port = getServerPort();

  const server = http.createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  serverLogger.info({ host, port, protocol: 'http' }, `Starting server on http://${host}:${port}`);

  // Graceful shutdown handling
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      serverLogger.debug({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;
    serverLogger.info({ signal }, 'Shutting down gracefully...');

    // Set forced exit timeout (10 seconds)
    const forceExitTimer = setTimeout(() => {
      serverLogger.error('Shutdown timeout exceeded, forcing exit...');
      process.exit(1);
    }, 10000);

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        // Relayed fetches in flight are dropped with their connections
        server.closeAllConnections();
      });
      serverLogger.info('HTTP server closed');
    } catch (error) {
      serverLogger.error({ error }, 'Error closing HTTP server');
    } finally {
      clearTimeout(forceExitTimer);
      serverLogger.info('Shutdown complete');
      process.exit(0);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    appLogger.error({ error }, 'Uncaught Exception');
    void shutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    appLogger.error({ reason }, 'Unhandled Rejection');
    void shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

process.title = 'fetch-relay';

// If this file is run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startApplication().catch((error: unknown) => {
    appLogger.error({ error }, 'Failed to start application');
    process.exit(1);
  });
}
