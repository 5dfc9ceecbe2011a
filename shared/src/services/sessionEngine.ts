import {
  DeleteSessionResult,
  MarkEmailSentResult,
  Session,
  SessionState,
  StoredSession,
  VerifyResult
} from '../types';
import { SessionStore } from '../database/interfaces';
import {
  MAX_VERIFICATION_ATTEMPTS,
  MAX_WRITE_RETRIES,
  TEST_SESSION,
  TESTING_VERIFICATION_CODE
} from '../config/verification';
import { generateSecondaryId, generateVerificationCode } from '../utils';
import { KeyedLock } from '../utils/keyedLock';
import { SessionConflictError } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface SessionEngineOptions {
  expirySeconds: number;
  maxWriteRetries?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

interface Transition<T> {
  next: Session | null;
  result: T;
}

const VERIFIED: VerifyResult = { kind: 'verified' };

function attemptsRemaining(remaining: number): VerifyResult {
  return { kind: 'attempts_remaining', remaining };
}

function toSession(stored: StoredSession): Session {
  return {
    secondaryId: stored.secondaryId,
    userId: stored.userId,
    guildId: stored.guildId,
    displayName: stored.displayName,
    verificationCode: stored.verificationCode,
    createdAt: stored.createdAt,
    state: stored.state,
    remainingAttempts: stored.remainingAttempts
  };
}

/**
 * Owns the verification session state machine.
 *
 * Sessions are keyed by Discord user id and guarded by a secondary id that
 * acts as a capability; there is at most one session per user. Mutations
 * for the same user are serialized in-process by a keyed lock and across
 * processes by versioned compare-and-swap writes against the store.
 */
export class SessionEngine {
  private readonly locks = new KeyedLock();
  private readonly expiryMs: number;
  private readonly maxWriteRetries: number;
  private readonly now: () => number;

  constructor(
    private readonly store: SessionStore,
    private readonly logger: Logger,
    options: SessionEngineOptions
  ) {
    this.expiryMs = options.expirySeconds * 1000;
    this.maxWriteRetries = options.maxWriteRetries ?? MAX_WRITE_RETRIES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start a new session for the user, or return the existing one untouched.
   *
   * Returns the secondary id of the session, new or existing.
   */
  async createOrGet(userId: string, guildId: string, displayName: string): Promise<string> {
    return this.locks.runExclusive(userId, async () => {
      for (let attempt = 1; attempt <= this.maxWriteRetries; attempt++) {
        const existing = await this.store.get(userId);
        if (existing) {
          return existing.secondaryId;
        }

        const session: Session = {
          secondaryId: generateSecondaryId(),
          userId,
          guildId,
          displayName,
          verificationCode: generateVerificationCode(),
          createdAt: this.now(),
          state: SessionState.AwaitingStart,
          remainingAttempts: MAX_VERIFICATION_ATTEMPTS
        };

        // Another process may have created the session since the read above
        const inserted = await this.store.insertIfAbsent(session);
        if (inserted) {
          this.logger.info('Started new session', { userId, guildId, displayName });
          return inserted.secondaryId;
        }
      }

      throw new SessionConflictError(userId, 'createOrGet', this.maxWriteRetries);
    });
  }

  /**
   * Write the synthetic always-present session used to exercise the web
   * forms by hand. It is excluded from role sync.
   */
  async createTestSession(): Promise<string> {
    return this.locks.runExclusive(TEST_SESSION.userId, async () => {
      const stored = await this.store.put({
        secondaryId: TEST_SESSION.secondaryId,
        userId: TEST_SESSION.userId,
        guildId: TEST_SESSION.guildId,
        displayName: TEST_SESSION.displayName,
        verificationCode: TESTING_VERIFICATION_CODE,
        createdAt: this.now(),
        state: SessionState.AwaitingStart,
        remainingAttempts: MAX_VERIFICATION_ATTEMPTS
      });
      return stored.secondaryId;
    });
  }

  /**
   * Retrieve a session by user id and secondary id. A mismatched secondary
   * id is reported exactly like a missing session.
   */
  async lookup(userId: string, secondaryId: string): Promise<Session | null> {
    const stored = await this.store.get(userId);
    if (!stored || stored.secondaryId !== secondaryId) {
      return null;
    }
    return toSession(stored);
  }

  /**
   * Record that the verification email went out.
   */
  async markEmailSent(userId: string, secondaryId: string): Promise<MarkEmailSentResult> {
    const result = await this.update<MarkEmailSentResult>(userId, secondaryId, 'markEmailSent', current => {
      if (current.state !== SessionState.AwaitingStart) {
        return { next: null, result: 'ok' };
      }
      return { next: { ...current, state: SessionState.AwaitingCode }, result: 'ok' };
    });

    if (result === null) {
      // The session can expire between the caller's lookup and this call.
      // The user can start a fresh session straight away.
      this.logger.warn('Session went away mid-transition', { userId, operation: 'markEmailSent' });
      return 'not_found';
    }

    return result;
  }

  /**
   * Check an attempted code against the session.
   *
   * Exhausted and failed sessions are left in place until they expire so a
   * user cannot reset their attempts by forcing a fresh session.
   */
  async verify(userId: string, secondaryId: string, attemptedCode: string): Promise<VerifyResult> {
    const result = await this.update<VerifyResult>(userId, secondaryId, 'verify', current => {
      if (current.remainingAttempts <= 0) {
        return { next: null, result: attemptsRemaining(0) };
      }

      const matches = attemptedCode === current.verificationCode;

      if (current.state === SessionState.Verified) {
        return { next: null, result: matches ? VERIFIED : attemptsRemaining(current.remainingAttempts) };
      }

      if (matches) {
        return { next: { ...current, state: SessionState.Verified }, result: VERIFIED };
      }

      const remaining = current.remainingAttempts - 1;
      // A code attempt implies the email went out even if that transition
      // never got recorded
      const state = remaining === 0 ? SessionState.Failed : SessionState.AwaitingCode;
      return {
        next: { ...current, remainingAttempts: remaining, state },
        result: attemptsRemaining(remaining)
      };
    });

    if (result === null) {
      return { kind: 'not_found' };
    }

    if (result.kind === 'verified') {
      this.logger.info('Session verified', { userId });
    } else if (result.kind === 'attempts_remaining') {
      this.logger.info('Incorrect verification code', { userId, remainingAttempts: result.remaining });
    }

    return result;
  }

  /**
   * Remove a session unconditionally.
   */
  async deleteSession(userId: string): Promise<DeleteSessionResult> {
    const deleted = await this.locks.runExclusive(userId, () => this.store.delete(userId));
    if (!deleted) {
      this.logger.warn('Attempted to delete nonexistent session', { userId });
      return 'not_found';
    }
    this.logger.info('Deleted session', { userId });
    return 'ok';
  }

  async healthCheck(): Promise<boolean> {
    return this.store.healthCheck();
  }

  isExpired(session: Session): boolean {
    return this.now() - session.createdAt > this.expiryMs;
  }

  /**
   * Delete expired sessions, whatever their state.
   *
   * Works from a snapshot of the keys and takes each record's lock only for
   * its own check-and-delete, so live traffic is never held up for the whole
   * sweep.
   */
  async collectGarbage(): Promise<number> {
    const userIds = await this.store.keys();
    let deleted = 0;

    for (const userId of userIds) {
      const removed = await this.locks.runExclusive(userId, async () => {
        const stored = await this.store.get(userId);
        if (!stored || !this.isExpired(stored)) {
          return false;
        }
        // A record rewritten by another process since the read is left for
        // the next sweep
        return this.store.deleteIfVersion(userId, stored.version);
      });

      if (removed) {
        deleted++;
      }
    }

    if (deleted > 0) {
      this.logger.info(`Collected ${deleted} expired sessions`, { scanned: userIds.length });
    }

    return deleted;
  }

  /**
   * Yield all verified sessions, skipping the synthetic test session.
   * Each call takes a fresh snapshot of the keys; records that vanish after
   * the snapshot are skipped.
   */
  async *listVerifiedSessions(): AsyncGenerator<Session> {
    const userIds = await this.store.keys();

    for (const userId of userIds) {
      const stored = await this.store.get(userId);
      if (!stored || stored.state !== SessionState.Verified) {
        continue;
      }

      if (stored.verificationCode === TESTING_VERIFICATION_CODE) {
        continue;
      }

      yield toSession(stored);
    }
  }

  /**
   * Read-modify-write of a single session under its lock, retried on
   * version conflicts.
   * @returns the transition's result, or null if the session is missing or
   * the secondary id does not match
   */
  private async update<T>(
    userId: string,
    secondaryId: string,
    operation: string,
    transition: (current: Session) => Transition<T>
  ): Promise<T | null> {
    return this.locks.runExclusive(userId, async () => {
      for (let attempt = 1; attempt <= this.maxWriteRetries; attempt++) {
        const stored = await this.store.get(userId);
        if (!stored || stored.secondaryId !== secondaryId) {
          return null;
        }

        const { next, result } = transition(toSession(stored));
        if (!next) {
          return result;
        }

        const written = await this.store.replace(stored.version, next);
        if (written) {
          return result;
        }

        this.logger.debug('Session write conflict, retrying', { userId, operation, attempt });
      }

      throw new SessionConflictError(userId, operation, this.maxWriteRetries);
    });
  }
}
