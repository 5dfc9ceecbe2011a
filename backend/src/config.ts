import 'dotenv/config';
import { envsafe, str, bool, num } from 'envsafe';
import { ENVIRONMENTS, LOG_FORMATS, LOG_LEVELS } from '../../shared/src/utils/logger';
import type { Environment, LogFormat, LogLevel } from '../../shared/src/utils/logger';
import { parseChoice } from '../../shared/src/utils';
import { DEFAULT_EXPIRY_SECONDS } from '../../shared/src/config/verification';

interface ServerConfig {
  port: number;
  env: Environment;
  trustProxy: boolean;
  payloadLimit: string;
}

interface DatabaseConfig {
  file: string;
  expirySeconds: number;
}

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

interface VerificationConfig {
  allowedEmailDomain: string;
}

interface RateLimitingConfig {
  windowMs: number;
  maxRequests: number;
}

interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface WebConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  verification: VerificationConfig;
  smtp: SmtpConfig | null;
  rateLimiting: RateLimitingConfig;
  logging: LoggingConfig;
}

// Environment validation
const env = envsafe({
  // Server configuration
  NODE_ENV: str({
    devDefault: 'development',
    choices: [...ENVIRONMENTS],
  }),
  PORT: num({
    default: 5000,
  }),
  TRUST_PROXY: bool({
    default: false,
    desc: 'Honour X-Forwarded-For when running behind a reverse proxy.',
  }),
  MAX_PAYLOAD_SIZE: str({
    default: '10kb',
  }),

  // Session store
  DATABASE_FILE: str({
    default: './database/sessions.sqlite',
  }),
  SESSION_EXPIRY_SECONDS: num({
    default: DEFAULT_EXPIRY_SECONDS,
  }),

  // Verification
  ALLOWED_EMAIL_DOMAIN: str({
    desc: 'Only addresses at this domain (or its subdomains) may verify.',
    devDefault: 'example.com',
  }),

  // Mail. Without SMTP_HOST codes are written to the log.
  SMTP_HOST: str({
    allowEmpty: true,
    default: '',
  }),
  SMTP_PORT: num({
    default: 587,
  }),
  SMTP_USER: str({
    allowEmpty: true,
    default: '',
  }),
  SMTP_PASS: str({
    allowEmpty: true,
    default: '',
  }),
  SMTP_FROM: str({
    allowEmpty: true,
    default: '',
  }),

  // Rate limiting for form submissions
  RATE_LIMIT_WINDOW_MS: num({
    default: 900000, // 15 minutes
  }),
  RATE_LIMIT_MAX_REQUESTS: num({
    default: 30,
  }),

  // Logging configuration
  LOG_LEVEL: str({
    devDefault: 'debug',
    choices: [...LOG_LEVELS],
    default: 'info',
  }),
  LOG_FORMAT: str({
    devDefault: 'text',
    choices: [...LOG_FORMATS],
    default: 'json',
  }),
});

const allowedEmailDomain = env.ALLOWED_EMAIL_DOMAIN.trim().replace(/^@/, '').toLowerCase();

const config: WebConfig = {
  server: {
    port: env.PORT,
    env: parseChoice('NODE_ENV', env.NODE_ENV, ENVIRONMENTS),
    trustProxy: env.TRUST_PROXY,
    payloadLimit: env.MAX_PAYLOAD_SIZE,
  },
  database: {
    file: env.DATABASE_FILE,
    expirySeconds: env.SESSION_EXPIRY_SECONDS,
  },
  verification: {
    allowedEmailDomain,
  },
  smtp: env.SMTP_HOST
    ? {
        host: env.SMTP_HOST,
        port: env.SMTP_PORT,
        user: env.SMTP_USER,
        pass: env.SMTP_PASS,
        from: env.SMTP_FROM || env.SMTP_USER,
      }
    : null,
  rateLimiting: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
  },
  logging: {
    level: parseChoice('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS),
    format: parseChoice('LOG_FORMAT', env.LOG_FORMAT, LOG_FORMATS),
  },
};

const validateConfig = (config: WebConfig): void => {
  if (!config.verification.allowedEmailDomain) {
    throw new Error('ALLOWED_EMAIL_DOMAIN must not be empty');
  }

  if (config.database.expirySeconds < 60) {
    throw new Error('SESSION_EXPIRY_SECONDS must be at least 60');
  }

  if (config.smtp && !config.smtp.from) {
    throw new Error('SMTP_FROM or SMTP_USER must be set when SMTP_HOST is set');
  }

  if (config.server.env === 'production' && !config.smtp) {
    throw new Error(
      'Production environment detected but SMTP_HOST is not set. ' +
      'Verification codes would only be written to the log.'
    );
  }
};

// Run validations
validateConfig(config);

export { config };
