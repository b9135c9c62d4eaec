/**
 * Relay runtime configuration
 *
 * Values come from the environment (after dotenv has loaded .env) and are read
 * on each call, so a changed environment takes effect without a restart of the
 * importing module.
 */

import { ENV, PROXY_OVERRIDE_ENV, RELAY_DEFAULTS } from './config.js';
import { createLogger } from '../logger/index.js';

const logger = createLogger('relayConfig');

export function getServerHost(): string {
  return ENV.HOST?.trim() || RELAY_DEFAULTS.host;
}

export function getServerPort(): number {
  const envValue = ENV.PORT;

  if (envValue) {
    const parsed = parseInt(envValue, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed < 65536) {
      return parsed;
    }
    logger.warn({
      envKey: 'PORT',
      envValue,
      defaultValue: RELAY_DEFAULTS.port
    }, 'Invalid port value, using default');
  }

  return RELAY_DEFAULTS.port;
}

/**
 * Proxy override from the environment; empty or blank values count as unset
 */
export function getProxyOverride(): string | undefined {
  const value = ENV[PROXY_OVERRIDE_ENV]?.trim();
  return value ? value : undefined;
}
