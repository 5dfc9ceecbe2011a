import { DiscordAPIError } from 'discord.js';
import { classifyError, createUserFriendlyMessage, ERROR_CODES } from '../bot/src/utils/errorHandler';
import { SessionConflictError, StoreUnavailableError } from '../shared/src/utils/errors';

describe('bot error handler', () => {
  it('classifies store failures', () => {
    const classified = classifyError(new StoreUnavailableError('database is locked'));

    expect(classified.code).toBe(ERROR_CODES.DATABASE_ERROR);
    expect(classified.technicalDetails).toBe('database is locked');
  });

  it('classifies write conflicts', () => {
    const classified = classifyError(new SessionConflictError('1', 'verify', 5));

    expect(classified.code).toBe(ERROR_CODES.SESSION_CONFLICT);
    expect(classified.technicalDetails).toBe('Gave up on verify for session 1 after 5 conflicting writes');
  });

  it('classifies Discord API errors', () => {
    const error = new DiscordAPIError(
      { code: 50013, message: 'Missing Permissions' },
      50013,
      403,
      'PUT',
      'https://discord.com/api/v10/guilds/10/members/1/roles/r1',
      { body: undefined, files: undefined }
    );

    expect(classifyError(error).code).toBe(ERROR_CODES.DISCORD_API_ERROR);
  });

  it('falls back to an internal error', () => {
    const classified = classifyError('not even an error');

    expect(classified.code).toBe(ERROR_CODES.INTERNAL_ERROR);
    expect(classified.technicalDetails).toBe('Unknown error type');
  });

  it('formats a user-facing message', () => {
    expect(createUserFriendlyMessage(classifyError(new SessionConflictError('1', 'verify', 5)))).toBe(
      '❌ **Session Busy**\n\nYour verification session was being updated at the same time. Please try again.' +
      '\n\n💡 You can run the command again.'
    );
  });
});
