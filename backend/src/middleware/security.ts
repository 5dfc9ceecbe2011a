import { Request, Response, NextFunction, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { Logger } from '../../../shared/src/utils/logger';

export interface FormRateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

/**
 * Request logging middleware. Paths carry session capabilities, so only the
 * route template is logged.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const statusCode = res.statusCode;
      const route = typeof req.route?.path === 'string' ? req.route.path : req.path;
      const meta = { method: req.method, route, statusCode, duration, ip: req.ip };

      // Log based on status code severity
      if (statusCode >= 500) {
        logger.warn('Server error response', meta);
      } else if (statusCode >= 400) {
        logger.info('Client error response', meta);
      } else {
        logger.debug('Request completed', meta);
      }
    });

    next();
  };
}

/**
 * Rate limiter for form submissions. GETs are never limited.
 */
export function formRateLimiter(options: FormRateLimitOptions, logger: Logger): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method !== 'POST',
    handler: (req, res, _next, limitOptions) => {
      logger.warn('Form rate limit exceeded', {
        ip: req.ip,
        method: req.method,
        limit: limitOptions.max,
      });
      res.status(429).type('text').send('Too many requests, please try again later.');
    },
  });
}
