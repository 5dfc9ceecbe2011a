import express, { Express } from 'express';
import helmet from 'helmet';
import { SessionEngine } from '../../shared/src/services/sessionEngine';
import { Logger } from '../../shared/src/utils/logger';
import { Mailer } from './services/mailer';
import { createVerificationRouter } from './routes/verification';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { formRateLimiter, requestLogger, FormRateLimitOptions } from './middleware/security';
import { failurePage, indexPage, successPage } from './views/pages';

export interface AppDependencies {
  engine: SessionEngine;
  mailer: Mailer;
  logger: Logger;
  allowedEmailDomain: string;
  rateLimiting: FormRateLimitOptions;
  trustProxy?: boolean;
  payloadLimit?: string;
}

export function createApp(deps: AppDependencies): Express {
  const { engine, mailer, logger } = deps;
  const app = express();

  if (deps.trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security headers; the pages carry no scripts
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'none'"],
        formAction: ["'self'"],
        frameAncestors: ["'none'"],
      },
    },
  }));

  app.use(express.urlencoded({ limit: deps.payloadLimit ?? '10kb', extended: false }));
  app.use(requestLogger(logger));

  // Health check endpoint
  app.get('/health', (_req, res, next) => {
    engine.healthCheck()
      .then(healthy => {
        res.status(healthy ? 200 : 503).json({
          status: healthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
        });
      })
      .catch(next);
  });

  app.get('/', (_req, res) => {
    res.type('html').send(indexPage());
  });

  app.get('/success', (_req, res) => {
    res.type('html').send(successPage());
  });

  app.get('/failure', (_req, res) => {
    res.type('html').send(failurePage());
  });

  app.use(createVerificationRouter({
    engine,
    mailer,
    logger,
    allowedEmailDomain: deps.allowedEmailDomain,
    formRateLimiter: formRateLimiter(deps.rateLimiting, logger),
  }));

  // 404 handler
  app.use(notFoundHandler());

  // Error handling middleware (must be last)
  app.use(errorHandler(logger));

  return app;
}
