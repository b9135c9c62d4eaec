/**
 * Scrape Router
 * Registers the relay endpoint
 */

import type { Express } from 'express';
import { ScrapeController } from './ScrapeController.js';
import { ScrapeService } from './ScrapeService.js';
import { createLogger } from '../logger/index.js';

export class ScrapeRouter {
  private scrapeController: ScrapeController;

  // Logger for ScrapeRouter
  private logger = createLogger('ScrapeRouter');

  constructor(scrapeService: ScrapeService) {
    this.scrapeController = new ScrapeController(scrapeService);
  }

  registerRoutes(app: Express): void {
    app.post('/scrape', this.scrapeController.scrape);

    this.logger.info('Scrape routes registered successfully');
  }
}
