/**
 * Scrape Controller
 * Handles POST /scrape
 */

import type { Request, Response } from 'express';
import { createLogger } from '../logger/index.js';
import type { ScrapeResponse } from '../types/scrape.types.js';
import { ScrapeError } from './errors.js';
import { ScrapeService } from './ScrapeService.js';
import { parseScrapeRequest } from './validation.js';

export class ScrapeController {
  // Logger for ScrapeController
  private logger = createLogger('ScrapeController');

  constructor(private scrapeService: ScrapeService) {}

  /**
   * POST /scrape
   * 200 with { content } on success, otherwise { error } with the status of the failure
   */
  scrape = async (req: Request, res: Response): Promise<void> => {
    try {
      const request = parseScrapeRequest(req.body);
      const content = await this.scrapeService.scrape(request);
      this.send(res, 200, { content });
    } catch (error) {
      if (error instanceof ScrapeError) {
        this.logger.debug({ type: error.type, status: error.status }, 'Scrape failed');
        this.send(res, error.status, { error: error.message });
        return;
      }
      this.logger.error({ error }, 'Unexpected scrape error');
      this.send(res, 500, { error: 'Internal server error' });
    }
  };

  private send(res: Response, status: number, body: ScrapeResponse): void {
    res.status(status).json(body);
  }
}
