// In-memory session store, used by tests and as a stand-in wherever no
// database file is wanted

import { Session, StoredSession } from '../types';
import { SessionStore } from './interfaces';

export class MemorySessionStore implements SessionStore {
  private records: Map<string, StoredSession> = new Map();

  async get(userId: string): Promise<StoredSession | null> {
    const record = this.records.get(userId);
    return record ? { ...record } : null;
  }

  async insertIfAbsent(session: Session): Promise<StoredSession | null> {
    if (this.records.has(session.userId)) {
      return null;
    }
    return this.write(session, 1);
  }

  async replace(expectedVersion: number, next: Session): Promise<StoredSession | null> {
    const current = this.records.get(next.userId);
    if (!current || current.version !== expectedVersion) {
      return null;
    }
    return this.write(next, current.version + 1);
  }

  async put(session: Session): Promise<StoredSession> {
    const current = this.records.get(session.userId);
    return this.write(session, current ? current.version + 1 : 1);
  }

  async delete(userId: string): Promise<boolean> {
    return this.records.delete(userId);
  }

  async deleteIfVersion(userId: string, expectedVersion: number): Promise<boolean> {
    const current = this.records.get(userId);
    if (!current || current.version !== expectedVersion) {
      return false;
    }
    return this.records.delete(userId);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.records.keys());
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  private write(session: Session, version: number): StoredSession {
    const record: StoredSession = {
      secondaryId: session.secondaryId,
      userId: session.userId,
      guildId: session.guildId,
      displayName: session.displayName,
      verificationCode: session.verificationCode,
      createdAt: session.createdAt,
      state: session.state,
      remainingAttempts: session.remainingAttempts,
      version
    };
    this.records.set(session.userId, record);
    return { ...record };
  }
}
