import { describe, it, expect } from 'vitest';
import { MAX_TIMEOUT_SECONDS } from '../../config/config.js';
import { ScrapeService } from '../../scrape/ScrapeService.js';

describe('ScrapeService.resolveTimeoutSeconds', () => {
  it('defaults to 30 seconds', () => {
    expect(new ScrapeService().resolveTimeoutSeconds({ url: 'https://example.com' })).toBe(30);
  });

  it('uses the request timeout when given', () => {
    expect(new ScrapeService().resolveTimeoutSeconds({ url: 'https://example.com', timeoutSeconds: 5 })).toBe(5);
  });

  it('keeps an explicit zero', () => {
    expect(new ScrapeService({ defaultTimeoutSeconds: 10 }).resolveTimeoutSeconds({ url: 'https://example.com', timeoutSeconds: 0 })).toBe(0);
  });

  it('clamps timeouts to what a timer can hold', () => {
    expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
    expect(new ScrapeService().resolveTimeoutSeconds({ url: 'https://example.com', timeoutSeconds: 3000000 })).toBe(2147483);
  });
});
