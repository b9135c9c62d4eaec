import pino, { type Logger } from 'pino';
import { loggerConfig, loggingConfig } from './LoggerConfig.js';

/**
 * Root logger instance
 */
export const rootLogger: Logger = pino(loggerConfig);

/**
 * Create a child logger with a specific name and optional context
 *
 * @param name - Logger name (e.g., 'ScrapeService', 'App')
 * @param context - Optional bindings added to every entry (e.g., { url })
 *
 * @example
 * const logger = createLogger('ScrapeService', { url: 'https://example.com' });
 * logger.info('Successfully scraped URL');
 * // Output: {"level":"info","name":"ScrapeService","url":"https://example.com","msg":"Successfully scraped URL"}
 */
export function createLogger(name: string, context?: Record<string, unknown>): Logger {
  return rootLogger.child({
    name,
    ...context,
  });
}

/**
 * Log the effective logging setup once, at startup
 */
export function logLoggerSettings(logger: Logger = rootLogger): void {
  logger.info(
    {
      level: loggingConfig.level,
      pretty: loggingConfig.prettyPrint,
      env: loggingConfig.isDevelopment ? 'development' : 'production',
    },
    'Logger initialized'
  );
}

export type { Logger };
