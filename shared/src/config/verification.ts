// Session engine constants shared by the bot and web processes

export const MAX_VERIFICATION_ATTEMPTS = 5;

export const VERIFICATION_CODE_MIN = 100000;
export const VERIFICATION_CODE_MAX = 999999;

export const DEFAULT_EXPIRY_SECONDS = 24 * 60 * 60;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;

// Compare-and-swap attempts before a write is reported as a conflict
export const MAX_WRITE_RETRIES = 5;

/**
 * Code carried by the synthetic session used for manual end-to-end testing
 * of the web forms. Sessions holding it never reach role sync.
 */
export const TESTING_VERIFICATION_CODE = '-420';

export const TEST_SESSION = {
  userId: '0',
  guildId: '0',
  displayName: 'Testing#123',
  secondaryId: '8ab14a16-9168-4d44-95d7-605ef23583f8',
} as const;
