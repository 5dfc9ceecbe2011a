import type * as BotConfigModule from '../bot/src/config';
import type * as WebConfigModule from '../backend/src/config';
import { DEFAULT_CHECK_INTERVAL_SECONDS, DEFAULT_EXPIRY_SECONDS } from '../shared/src/config/verification';

type BotConfig = typeof BotConfigModule.config;
type WebConfig = typeof WebConfigModule.config;

const ORIGINAL_ENV = process.env;

function loadBotConfig(env: NodeJS.ProcessEnv): BotConfig {
  process.env = { NODE_ENV: 'test', DISCORD_BOT_TOKEN: 'test-token', CLIENT_ID: '123', ...env };
  const loaded: { config?: BotConfig } = {};
  jest.isolateModules(() => {
    loaded.config = (require('../bot/src/config') as typeof BotConfigModule).config;
  });
  if (!loaded.config) {
    throw new Error('bot config did not load');
  }
  return loaded.config;
}

function loadWebConfig(env: NodeJS.ProcessEnv): WebConfig {
  process.env = { NODE_ENV: 'test', ...env };
  const loaded: { config?: WebConfig } = {};
  jest.isolateModules(() => {
    loaded.config = (require('../backend/src/config') as typeof WebConfigModule).config;
  });
  if (!loaded.config) {
    throw new Error('web config did not load');
  }
  return loaded.config;
}

describe('configuration', () => {
  afterEach(() => {
    process.env = ORIGINAL_ENV;
  });

  describe('bot', () => {
    it('reads the environment with defaults', () => {
      const config = loadBotConfig({ WEB_URL: 'https://verify.example.com/' });

      expect(config).toEqual({
        env: 'test',
        bot: {
          discordBotToken: 'test-token',
          clientId: '123',
          webUrl: 'https://verify.example.com',
          verifiedRoleName: 'Verified',
          checkIntervalSeconds: DEFAULT_CHECK_INTERVAL_SECONDS,
          verifyChannelKeyword: 'verification',
        },
        database: {
          file: './database/sessions.sqlite',
          expirySeconds: DEFAULT_EXPIRY_SECONDS,
        },
        logging: { level: 'info', format: 'text' },
      });
    });

    it('takes explicit log settings', () => {
      const config = loadBotConfig({ LOG_LEVEL: 'warn', LOG_FORMAT: 'json' });

      expect(config.logging).toEqual({ level: 'warn', format: 'json' });
    });

    it('rejects a sync interval under 5 seconds', () => {
      expect(() => loadBotConfig({ CHECK_INTERVAL_SECONDS: '4' })).toThrow('CHECK_INTERVAL_SECONDS must be at least 5');
    });

    it('rejects an expiry under 60 seconds', () => {
      expect(() => loadBotConfig({ SESSION_EXPIRY_SECONDS: '59' })).toThrow('SESSION_EXPIRY_SECONDS must be at least 60');
    });
  });

  describe('web', () => {
    it('normalizes the allowed domain and logs codes without SMTP', () => {
      const config = loadWebConfig({ ALLOWED_EMAIL_DOMAIN: '@Example.COM' });

      expect(config.server).toEqual({ port: 5000, env: 'test', trustProxy: false, payloadLimit: '10kb' });
      expect(config.verification.allowedEmailDomain).toBe('example.com');
      expect(config.smtp).toBeNull();
      expect(config.rateLimiting).toEqual({ windowMs: 900000, maxRequests: 30 });
      expect(config.logging).toEqual({ level: 'debug', format: 'text' });
    });

    it('falls back to SMTP_USER as the sender', () => {
      const config = loadWebConfig({
        SMTP_HOST: 'smtp.example.com',
        SMTP_USER: 'bot@example.com',
        SMTP_PASS: 'test-secret',
      });

      expect(config.smtp).toEqual({
        host: 'smtp.example.com',
        port: 587,
        user: 'bot@example.com',
        pass: 'test-secret',
        from: 'bot@example.com',
      });
    });

    it('requires a sender when SMTP_HOST is set', () => {
      expect(() => loadWebConfig({ SMTP_HOST: 'smtp.example.com' }))
        .toThrow('SMTP_FROM or SMTP_USER must be set when SMTP_HOST is set');
    });

    it('rejects an expiry under 60 seconds', () => {
      expect(() => loadWebConfig({ SESSION_EXPIRY_SECONDS: '30' })).toThrow('SESSION_EXPIRY_SECONDS must be at least 60');
    });

    it('refuses to run in production without SMTP', () => {
      expect(() => loadWebConfig({ NODE_ENV: 'production', ALLOWED_EMAIL_DOMAIN: 'example.com' }))
        .toThrow('Production environment detected but SMTP_HOST is not set.');
    });
  });
});
