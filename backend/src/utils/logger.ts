import { config } from '../config';
import { createLogger } from '../../../shared/src/utils/logger';

export const logger = createLogger({
  service: 'web',
  level: config.logging.level,
  format: config.logging.format,
  environment: config.server.env,
});
