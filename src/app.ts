import express, { type Express } from 'express';
import cors from 'cors';
import { APP_INFO } from './config/config.js';
import { createLogger } from './logger/index.js';
import { errorMiddleware } from './middleware/ErrorMiddleware.js';
import { ScrapeRouter } from './scrape/ScrapeRouter.js';
import { ScrapeService, type ScrapeServiceOptions } from './scrape/ScrapeService.js';

const NODE_ENV = process.env.NODE_ENV || 'development';
const isDevelopment = NODE_ENV === 'development';

const requestLogger = createLogger('Request'); // HTTP request debugging

// CORS configuration constants
const CORS_CONFIG = {
  ALLOW_ORIGIN: '*',
  ALLOW_METHODS: 'GET, POST',
  ALLOW_HEADERS_DEFAULT: 'Content-Type, Accept',
  MAX_AGE: 86400, // Preflight cache time: 24 hours
};

/**
 * Build the Express application
 */
export function createApp(options: ScrapeServiceOptions = {}): Express {
  const app = express();

  // ==================== General middleware ====================

  // Body parser middleware - must be before routes that read req.body
  app.use(express.json());

  app.use((req, res, next) => {
    if (isDevelopment) {
      requestLogger.debug({
        method: req.method,
        url: req.url,
        body: req.body,
      }, 'Received request');
    }
    next();
  });

  app.use(cors({
    origin: CORS_CONFIG.ALLOW_ORIGIN,
    methods: CORS_CONFIG.ALLOW_METHODS,
    allowedHeaders: CORS_CONFIG.ALLOW_HEADERS_DEFAULT,
    maxAge: CORS_CONFIG.MAX_AGE,
  }));

  // ==================== Scrape route registration ====================

  const scrapeRouter = new ScrapeRouter(new ScrapeService(options));
  scrapeRouter.registerRoutes(app);

  // Root path handler - returns basic service information
  app.get('/', (req, res) => {
    res.json({
      service: APP_INFO.name,
      version: APP_INFO.version,
      status: 'running',
      endpoints: {
        health: '/health',
        scrape: '/scrape'
      }
    });
  });

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  app.use(errorMiddleware);

  return app;
}
