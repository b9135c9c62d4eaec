/**
 * Scrape endpoint type definitions
 */

/**
 * Validated POST /scrape body; wire field timeout_seconds becomes timeoutSeconds
 */
export interface ScrapeRequest {
  url: string;
  proxy?: string;
  timeoutSeconds?: number;
}

/**
 * Response envelope: exactly one of the fields is set, the other is left out of the JSON
 */
export interface ScrapeResponse {
  content?: string;
  error?: string;
}
