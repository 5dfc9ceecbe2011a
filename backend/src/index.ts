import { Server } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { createMailer } from './services/mailer';
import { openSessionStore, SessionStore } from '../../shared/src/database';
import { SessionEngine } from '../../shared/src/services';
import { toError } from '../../shared/src/utils/errors';
import { TEST_SESSION } from '../../shared/src/config/verification';

let store: SessionStore;
try {
  store = openSessionStore(config.database.file, logger);
} catch (error) {
  logger.error('Failed to open session store', toError(error), { databaseFile: config.database.file });
  process.exit(1);
}

const engine = new SessionEngine(store, logger, { expirySeconds: config.database.expirySeconds });
const mailer = createMailer(config.smtp, logger);

const app = createApp({
  engine,
  mailer,
  logger,
  allowedEmailDomain: config.verification.allowedEmailDomain,
  rateLimiting: config.rateLimiting,
  trustProxy: config.server.trustProxy,
  payloadLimit: config.server.payloadLimit,
});

let server: Server | null = null;
let shuttingDown = false;

const gracefulShutdown = async (exitCode: number) => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Graceful shutdown initiated');

  try {
    const listening = server;
    if (listening) {
      await new Promise<void>((resolve, reject) => {
        listening.close(error => (error ? reject(error) : resolve()));
      });
    }
    await store.close();
    logger.info('Graceful shutdown completed');
  } catch (error) {
    logger.error('Error during graceful shutdown', toError(error));
  } finally {
    process.exit(exitCode);
  }
};

async function main() {
  try {
    logger.info('Starting email verification web server...', { environment: config.server.env });

    if (config.server.env === 'development') {
      // Reachable at /start/0/<TEST_SESSION.secondaryId> with code TESTING_VERIFICATION_CODE
      await engine.createTestSession();
      logger.debug('Test session seeded', { userId: TEST_SESSION.userId });
    }

    server = app.listen(config.server.port, () => {
      logger.info(`Web server listening on port ${config.server.port}`, {
        allowedEmailDomain: config.verification.allowedEmailDomain,
        mailer: config.smtp ? 'smtp' : 'console',
      });
    });
  } catch (error) {
    logger.error('Failed to start web server', toError(error));
    await gracefulShutdown(1);
  }
}

process.on('SIGINT', () => {
  logger.info('SIGINT signal received');
  void gracefulShutdown(0);
});

process.on('SIGTERM', () => {
  logger.info('SIGTERM signal received');
  void gracefulShutdown(0);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', toError(reason));
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

void main();
