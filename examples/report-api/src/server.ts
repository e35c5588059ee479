import express, {type NextFunction, type Request, type Response} from 'express';

import {isCancellation, makeLogger, useTimeoutLink, type TimeoutLinkOptions} from '../../../src';

import {buildReport} from './report';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

const logger = makeLogger({component: 'report-api'});

/**
 * Wrapper for async handlers in Express.
 * Forwards rejections to error middleware through next().
 */
function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function createApp(options: TimeoutLinkOptions = {}) {
  const app = express();

  // Must come first: everything below sees the linked req.signal
  useTimeoutLink(app, {logger, ...options});

  // GET /api/reports?rows=10&stepMs=5
  app.get('/api/reports', asyncHandler(async (req: Request, res: Response) => {
    const rows = Number(req.query.rows ?? 10);
    const stepMs = Number(req.query.stepMs ?? 5);

    if (!Number.isInteger(rows) || rows < 0 || !Number.isFinite(stepMs) || stepMs < 0) {
      throw new BadRequestError('rows and stepMs must be non-negative numbers');
    }

    const report = await buildReport({rows, stepMs, signal: req.signal});
    res.json(report);
  }));

  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    // The timeout gate answers for cancelled requests
    if (isCancellation(err)) {
      return;
    }

    if (res.headersSent) {
      return next(err);
    }

    if (err instanceof BadRequestError) {
      res.status(400).json({error: err.message});
      return;
    }

    logger.error({err, path: req.path}, 'Unhandled error');
    res.status(500).json({error: 'Internal server error'});
  });

  return app;
}

const PORT = process.env.PORT || 3000;

if (process.env.NODE_ENV !== 'test' && !process.env.VITEST) {
  createApp().listen(PORT, () => {
    logger.info({port: PORT}, 'Report API listening');
  });
}
