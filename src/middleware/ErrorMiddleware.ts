import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../logger/index.js';
import type { ScrapeResponse } from '../types/scrape.types.js';

// Logger for ErrorMiddleware
const logger = createLogger('ErrorMiddleware');

/**
 * Shape of errors raised by express.json() (body-parser)
 */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return error instanceof Error
    && 'type' in error && typeof error.type === 'string'
    && 'status' in error && typeof error.status === 'number';
}

/**
 * Final error handler: answers in the same { error } envelope as the routes.
 * Express identifies error handlers by arity, so all four parameters stay.
 */
export function errorMiddleware(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  let status = 500;
  let body: ScrapeResponse = { error: 'Internal server error' };

  if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
    status = 400;
    body = { error: `Invalid JSON body: ${error.message}` };
  } else if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    status = error.status;
    body = { error: error.message };
  } else {
    logger.error({ error, method: req.method, url: req.url }, 'Unhandled request error');
  }

  res.status(status).json(body);
}
