// Shared types for the email verification bot

/**
 * Lifecycle of a verification session.
 *
 * 1. A session starts out AwaitingStart until the user submits an email.
 * 2. Once the code has been mailed it moves to AwaitingCode.
 * 3. A correct code moves it to Verified; running out of attempts moves it
 *    to Failed. Both are terminal and the session lingers until it expires.
 */
export enum SessionState {
  AwaitingStart = 'awaiting_start',
  AwaitingCode = 'awaiting_code',
  Verified = 'verified',
  Failed = 'failed',
}

export interface Session {
  /** Capability token handed out in the verification link. */
  secondaryId: string;
  /** Discord user snowflake, primary key. */
  userId: string;
  guildId: string;
  displayName: string;
  verificationCode: string;
  /** Epoch milliseconds. */
  createdAt: number;
  state: SessionState;
  remainingAttempts: number;
}

/**
 * A session as held by the store, with the version counter used for
 * compare-and-swap writes.
 */
export interface StoredSession extends Session {
  version: number;
}

export type VerifyResult =
  | { kind: 'verified' }
  | { kind: 'attempts_remaining'; remaining: number }
  | { kind: 'not_found' };

export type MarkEmailSentResult = 'ok' | 'not_found';

export type DeleteSessionResult = 'ok' | 'not_found';

const SESSION_STATES: readonly string[] = Object.values(SessionState);

export function isSessionState(value: string): value is SessionState {
  return SESSION_STATES.includes(value);
}
