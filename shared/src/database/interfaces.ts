// Storage abstraction for verification sessions. One record per user id;
// every conditional write is checked against the record's version so two
// processes sharing the store cannot clobber each other's transitions.

import { Session, StoredSession } from '../types';

export interface SessionStore {
  get(userId: string): Promise<StoredSession | null>;

  /**
   * Insert a new record unless one already exists for the user.
   * @returns the stored record, or null if the user already had one
   */
  insertIfAbsent(session: Session): Promise<StoredSession | null>;

  /**
   * Replace the record for `next.userId` only if it is still at
   * `expectedVersion`.
   * @returns the stored record, or null on a version conflict or if the
   * record has gone
   */
  replace(expectedVersion: number, next: Session): Promise<StoredSession | null>;

  /** Unconditional upsert */
  put(session: Session): Promise<StoredSession>;

  delete(userId: string): Promise<boolean>;

  /** Delete only if the record is still at `expectedVersion` */
  deleteIfVersion(userId: string, expectedVersion: number): Promise<boolean>;

  /** Snapshot of every user id currently stored */
  keys(): Promise<string[]>;

  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}
