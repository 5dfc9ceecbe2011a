import { ChatInputCommandInteraction, DiscordAPIError, MessageFlags } from 'discord.js';
import { SessionConflictError, StoreUnavailableError, toError } from '../../../shared/src/utils/errors';
import { Logger } from '../../../shared/src/utils/logger';

export interface UserFriendlyError {
  code: ErrorCode;
  title: string;
  userMessage: string;
  retryable: boolean;
  technicalDetails?: string;
}

export interface ErrorContext {
  userId?: string;
  guildId?: string;
  operation: string;
}

export const ERROR_CODES = {
  DISCORD_API_ERROR: 'discord_api_error',
  DATABASE_ERROR: 'database_error',
  SESSION_CONFLICT: 'session_conflict',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

const USER_FRIENDLY_ERRORS: Record<ErrorCode, Omit<UserFriendlyError, 'technicalDetails'>> = {
  [ERROR_CODES.DISCORD_API_ERROR]: {
    code: ERROR_CODES.DISCORD_API_ERROR,
    title: 'Discord Service Unavailable',
    userMessage: 'Discord services are temporarily unavailable. Please try again in a few minutes.',
    retryable: true,
  },
  [ERROR_CODES.DATABASE_ERROR]: {
    code: ERROR_CODES.DATABASE_ERROR,
    title: 'Verification Unavailable',
    userMessage: 'The verification service could not reach its storage. Please try again later.',
    retryable: true,
  },
  [ERROR_CODES.SESSION_CONFLICT]: {
    code: ERROR_CODES.SESSION_CONFLICT,
    title: 'Session Busy',
    userMessage: 'Your verification session was being updated at the same time. Please try again.',
    retryable: true,
  },
  [ERROR_CODES.INTERNAL_ERROR]: {
    code: ERROR_CODES.INTERNAL_ERROR,
    title: 'Internal Error',
    userMessage: 'An unexpected error occurred. Please try again.',
    retryable: true,
  },
};

/**
 * Classifies an error and returns a user-friendly error object
 */
export function classifyError(error: unknown): UserFriendlyError {
  let errorCode: ErrorCode;

  if (error instanceof StoreUnavailableError) {
    errorCode = ERROR_CODES.DATABASE_ERROR;
  } else if (error instanceof SessionConflictError) {
    errorCode = ERROR_CODES.SESSION_CONFLICT;
  } else if (error instanceof DiscordAPIError) {
    errorCode = ERROR_CODES.DISCORD_API_ERROR;
  } else {
    errorCode = ERROR_CODES.INTERNAL_ERROR;
  }

  return {
    ...USER_FRIENDLY_ERRORS[errorCode],
    technicalDetails: error instanceof Error ? error.message : 'Unknown error type',
  };
}

/**
 * Creates a safe error message for Discord interactions
 */
export function createUserFriendlyMessage(error: UserFriendlyError): string {
  let message = `❌ **${error.title}**\n\n${error.userMessage}`;

  if (error.retryable) {
    message += '\n\n💡 You can run the command again.';
  }

  return message;
}

/**
 * Handles errors in Discord slash commands
 */
export async function handleDiscordCommandError(
  error: unknown,
  context: ErrorContext,
  interaction: ChatInputCommandInteraction,
  logger: Logger
): Promise<void> {
  const classifiedError = classifyError(error);
  const userMessage = createUserFriendlyMessage(classifiedError);

  logger.error(`Command failed: ${context.operation}`, toError(error), {
    ...context,
    errorCode: classifiedError.code,
  });

  try {
    if (interaction.deferred) {
      await interaction.editReply({ content: userMessage, embeds: [] });
    } else if (interaction.replied) {
      await interaction.followUp({ content: userMessage, flags: MessageFlags.Ephemeral });
    } else {
      await interaction.reply({ content: userMessage, flags: MessageFlags.Ephemeral });
    }
  } catch (replyError) {
    logger.error('Failed to send error message to Discord', toError(replyError), { operation: context.operation });
  }
}
