import type { ScrapeRequest } from '../types/scrape.types.js';
import { ScrapeError } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a POST /scrape body. `null` optional fields count as omitted.
 *
 * @throws ScrapeError (invalid_request)
 */
export function parseScrapeRequest(body: unknown): ScrapeRequest {
  if (!isRecord(body)) {
    throw ScrapeError.invalidRequest('expected a JSON object');
  }

  const { url, proxy, timeout_seconds: timeoutSeconds } = body;

  if (typeof url !== 'string') {
    throw ScrapeError.invalidRequest('missing required field: url');
  }

  if (proxy !== undefined && proxy !== null && typeof proxy !== 'string') {
    throw ScrapeError.invalidRequest('proxy must be a string');
  }

  if (timeoutSeconds !== undefined && timeoutSeconds !== null) {
    if (typeof timeoutSeconds !== 'number' || !Number.isInteger(timeoutSeconds) || timeoutSeconds < 0) {
      throw ScrapeError.invalidRequest('timeout_seconds must be a non-negative integer');
    }
  }

  return {
    url,
    ...(typeof proxy === 'string' && { proxy }),
    ...(typeof timeoutSeconds === 'number' && { timeoutSeconds }),
  };
}
