// Shared utilities for the email verification bot

import { randomInt } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { VERIFICATION_CODE_MAX, VERIFICATION_CODE_MIN } from '../config/verification';

/**
 * Generates the capability token bound to a session (128-bit, UUID v4 text)
 */
export function generateSecondaryId(): string {
  return uuidv4();
}

/**
 * Generates a 6-digit numeric verification code
 */
export function generateVerificationCode(): string {
  return String(randomInt(VERIFICATION_CODE_MIN, VERIFICATION_CODE_MAX + 1));
}

/**
 * Validates if a Discord snowflake ID is in the correct format
 */
export function isValidSnowflake(id: string): boolean {
  return /^\d{1,20}$/.test(id);
}

/**
 * Returns `value` typed as one of `choices`, or throws naming the setting
 */
export function parseChoice<T extends string>(name: string, value: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new Error(`${name} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Checks whether an email address belongs to the allowed domain or one of
 * its subdomains
 */
export function isAllowedEmailDomain(email: string, allowedDomain: string): boolean {
  const domain = allowedDomain.replace(/^@/, '').toLowerCase();
  const address = email.trim().toLowerCase();
  return address.endsWith(`@${domain}`) || (address.includes('@') && address.endsWith(`.${domain}`));
}

export { KeyedLock } from './keyedLock';
export { StoreUnavailableError, SessionConflictError, toError } from './errors';
