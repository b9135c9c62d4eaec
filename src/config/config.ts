import dotenv from "dotenv";
import packageJson from '../../package.json' with { type: "json" };

// Must run before any module reads process.env (the logger reads LOG_LEVEL on import)
dotenv.config();
export const ENV = process.env;

/**
 * Service identity reported at GET /
 */
export const APP_INFO = {
  name: packageJson.name,
  version: packageJson.version,
  description: packageJson.description || ''
} as const;

export const RELAY_DEFAULTS = {
  host: '0.0.0.0',
  port: 8282,
  /**
   * Applied when a request omits timeout_seconds
   */
  timeoutSeconds: 30,
} as const;

/**
 * Largest timeout a Node timer can hold, in whole seconds.
 * Longer request timeouts are clamped to it.
 */
export const MAX_TIMEOUT_SECONDS = Math.floor(2147483647 / 1000);

/**
 * Environment variable holding the deployment-wide proxy.
 * When set it wins over the "proxy" field of every request.
 */
export const PROXY_OVERRIDE_ENV = 'SCRAPE_PROXY';
