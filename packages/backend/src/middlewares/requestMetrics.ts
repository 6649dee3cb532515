import { Request, Response, NextFunction } from 'express';

import { MetricsRecorder } from '../metrics/MetricsRecorder';

function routeLabel(req: Request, res: Response): string {
  if (res.statusCode === 404) {
    return 'unmatched';
  }
  const [path] = req.originalUrl.split('?');
  return path ?? req.originalUrl;
}

/**
 * Record one observation per finished response
 */
export function requestMetrics(
  recorder: MetricsRecorder
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      recorder.recordRequest({
        method: req.method,
        route: routeLabel(req, res),
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}
