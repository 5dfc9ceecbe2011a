import 'dotenv/config';
import { envsafe, str, num } from 'envsafe';
import { ENVIRONMENTS, LOG_FORMATS, LOG_LEVELS } from '../../shared/src/utils/logger';
import type { Environment, LogFormat, LogLevel } from '../../shared/src/utils/logger';
import { parseChoice } from '../../shared/src/utils';
import { DEFAULT_CHECK_INTERVAL_SECONDS, DEFAULT_EXPIRY_SECONDS } from '../../shared/src/config/verification';

interface BotConfig {
  discordBotToken: string;
  clientId: string;
  webUrl: string;
  verifiedRoleName: string;
  checkIntervalSeconds: number;
  verifyChannelKeyword: string;
}

interface DatabaseConfig {
  file: string;
  expirySeconds: number;
}

interface AppConfig {
  env: Environment;
  bot: BotConfig;
  database: DatabaseConfig;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

// Environment validation
const env = envsafe({
  NODE_ENV: str({
    devDefault: 'development',
    choices: [...ENVIRONMENTS],
  }),
  DISCORD_BOT_TOKEN: str({
    desc: 'Bot token from the Discord developer portal.',
  }),
  CLIENT_ID: str({
    desc: 'Application id used to register slash commands.',
  }),
  WEB_URL: str({
    desc: 'Public base URL of the web form, used to build verification links.',
    devDefault: 'http://localhost:5000',
  }),
  VERIFIED_ROLE_NAME: str({
    default: 'Verified',
  }),
  CHECK_INTERVAL_SECONDS: num({
    default: DEFAULT_CHECK_INTERVAL_SECONDS,
  }),
  VERIFY_CHANNEL_KEYWORD: str({
    default: 'verification',
  }),
  DATABASE_FILE: str({
    default: './database/sessions.sqlite',
  }),
  SESSION_EXPIRY_SECONDS: num({
    default: DEFAULT_EXPIRY_SECONDS,
  }),
  LOG_LEVEL: str({
    choices: [...LOG_LEVELS],
    default: 'info',
  }),
  LOG_FORMAT: str({
    devDefault: 'text',
    choices: [...LOG_FORMATS],
    default: 'json',
  }),
});

// Configuration object
export const config: AppConfig = {
  env: parseChoice('NODE_ENV', env.NODE_ENV, ENVIRONMENTS),
  bot: {
    discordBotToken: env.DISCORD_BOT_TOKEN,
    clientId: env.CLIENT_ID,
    webUrl: env.WEB_URL.replace(/\/+$/, ''),
    verifiedRoleName: env.VERIFIED_ROLE_NAME,
    checkIntervalSeconds: env.CHECK_INTERVAL_SECONDS,
    verifyChannelKeyword: env.VERIFY_CHANNEL_KEYWORD,
  },
  database: {
    file: env.DATABASE_FILE,
    expirySeconds: env.SESSION_EXPIRY_SECONDS,
  },
  logging: {
    level: parseChoice('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS),
    format: parseChoice('LOG_FORMAT', env.LOG_FORMAT, LOG_FORMATS),
  },
};

// Validate configuration
if (config.bot.checkIntervalSeconds < 5) {
  throw new Error('CHECK_INTERVAL_SECONDS must be at least 5');
}

if (config.database.expirySeconds < 60) {
  throw new Error('SESSION_EXPIRY_SECONDS must be at least 60');
}

if (!config.bot.verifiedRoleName.trim()) {
  throw new Error('VERIFIED_ROLE_NAME must not be empty');
}
