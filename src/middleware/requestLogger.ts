import { Request, Response, NextFunction } from 'express';
import { performance } from 'perf_hooks';
import { componentLogger } from '../config/logger';

const log = componentLogger('http');

// Request logger middleware with timing
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = performance.now();

  res.on('finish', () => {
    const duration = performance.now() - startTime;
    const logData = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(duration)
    };

    // Longer than the default LLM timeout
    if (duration > 30000) {
      log.warn('Slow request detected', logData);
    } else {
      log.http('Request completed', logData);
    }
  });

  next();
};
