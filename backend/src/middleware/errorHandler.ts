import { ErrorRequestHandler, RequestHandler } from 'express';
import { Logger } from '../../../shared/src/utils/logger';
import { toError } from '../../../shared/src/utils/errors';
import { errorPage, notFoundPage } from '../views/pages';

export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    res.status(404).type('html').send(notFoundPage());
  };
}

/**
 * Last-resort handler. Details stay in the log; the client gets a generic page.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err, req, res, next) => {
    logger.error('Request error', toError(err), {
      method: req.method,
      path: req.path,
    });

    if (res.headersSent) {
      next(err);
      return;
    }

    res.status(500).type('html').send(errorPage());
  };
}
