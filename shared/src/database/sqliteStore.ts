import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { Session, StoredSession, isSessionState } from '../types';
import { Logger } from '../utils/logger';
import { StoreUnavailableError } from '../utils/errors';
import { SessionStore } from './interfaces';

interface SessionRow {
  user_id: string;
  secondary_id: string;
  guild_id: string;
  display_name: string;
  verification_code: string;
  created_at: number;
  state: string;
  remaining_attempts: number;
  version: number;
}

interface SessionParams {
  userId: string;
  secondaryId: string;
  guildId: string;
  displayName: string;
  verificationCode: string;
  createdAt: number;
  state: string;
  remainingAttempts: number;
}

const SESSION_COLUMNS = `user_id, secondary_id, guild_id, display_name, verification_code,
  created_at, state, remaining_attempts, version`;

// SQLite session store. A single long-lived handle per process; the bot and
// web processes open the same file and rely on WAL mode plus versioned
// writes for consistency.
export class SQLiteSessionStore implements SessionStore {
  private db: Database.Database;
  private statements: {
    get: Database.Statement<[string], SessionRow>;
    insert: Database.Statement<[SessionParams], unknown>;
    replace: Database.Statement<[SessionParams & { expectedVersion: number }], unknown>;
    upsert: Database.Statement<[SessionParams], unknown>;
    delete: Database.Statement<[string], unknown>;
    deleteIfVersion: Database.Statement<[string, number], unknown>;
    keys: Database.Statement<[], { user_id: string }>;
  };

  constructor(private readonly databasePath: string, private readonly logger: Logger) {
    try {
      if (databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
      }

      // WAL mode for concurrent read/write across processes
      this.db = new Database(databasePath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('busy_timeout = 5000');

      this.initializeSchema();

      this.statements = {
        get: this.db.prepare<[string], SessionRow>(
          `SELECT ${SESSION_COLUMNS} FROM sessions WHERE user_id = ?`
        ),
        insert: this.db.prepare<[SessionParams], unknown>(`
          INSERT INTO sessions (${SESSION_COLUMNS})
          VALUES (@userId, @secondaryId, @guildId, @displayName, @verificationCode,
            @createdAt, @state, @remainingAttempts, 1)
          ON CONFLICT(user_id) DO NOTHING
        `),
        replace: this.db.prepare<[SessionParams & { expectedVersion: number }], unknown>(`
          UPDATE sessions
          SET secondary_id = @secondaryId, guild_id = @guildId, display_name = @displayName,
            verification_code = @verificationCode, created_at = @createdAt, state = @state,
            remaining_attempts = @remainingAttempts, version = version + 1
          WHERE user_id = @userId AND version = @expectedVersion
        `),
        upsert: this.db.prepare<[SessionParams], unknown>(`
          INSERT INTO sessions (${SESSION_COLUMNS})
          VALUES (@userId, @secondaryId, @guildId, @displayName, @verificationCode,
            @createdAt, @state, @remainingAttempts, 1)
          ON CONFLICT(user_id) DO UPDATE SET
            secondary_id = excluded.secondary_id, guild_id = excluded.guild_id,
            display_name = excluded.display_name, verification_code = excluded.verification_code,
            created_at = excluded.created_at, state = excluded.state,
            remaining_attempts = excluded.remaining_attempts, version = sessions.version + 1
        `),
        delete: this.db.prepare<[string], unknown>('DELETE FROM sessions WHERE user_id = ?'),
        deleteIfVersion: this.db.prepare<[string, number], unknown>(
          'DELETE FROM sessions WHERE user_id = ? AND version = ?'
        ),
        keys: this.db.prepare<[], { user_id: string }>('SELECT user_id FROM sessions')
      };

      this.logger.info(`SQLite session store opened at: ${databasePath}`);
    } catch (error) {
      throw new StoreUnavailableError(
        `SQLite session store initialization failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        user_id TEXT PRIMARY KEY,
        secondary_id TEXT NOT NULL,
        guild_id TEXT NOT NULL,
        display_name TEXT NOT NULL,
        verification_code TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        state TEXT NOT NULL,
        remaining_attempts INTEGER NOT NULL,
        version INTEGER NOT NULL DEFAULT 1
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_state ON sessions(state);
    `);
  }

  async get(userId: string): Promise<StoredSession | null> {
    return this.execute('get', () => {
      const row = this.statements.get.get(userId);
      return row ? this.toSession(row) : null;
    });
  }

  async insertIfAbsent(session: Session): Promise<StoredSession | null> {
    return this.execute('insertIfAbsent', () => {
      const result = this.statements.insert.run(this.toParams(session));
      return result.changes === 1 ? { ...session, version: 1 } : null;
    });
  }

  async replace(expectedVersion: number, next: Session): Promise<StoredSession | null> {
    return this.execute('replace', () => {
      const result = this.statements.replace.run({ ...this.toParams(next), expectedVersion });
      return result.changes === 1 ? { ...next, version: expectedVersion + 1 } : null;
    });
  }

  async put(session: Session): Promise<StoredSession> {
    return this.execute('put', () => {
      const upsertAndRead = this.db.transaction((params: SessionParams) => {
        this.statements.upsert.run(params);
        return this.statements.get.get(params.userId);
      });
      const row = upsertAndRead(this.toParams(session));
      if (!row) {
        throw new Error(`Session ${session.userId} missing after upsert`);
      }
      return this.toSession(row);
    });
  }

  async delete(userId: string): Promise<boolean> {
    return this.execute('delete', () => this.statements.delete.run(userId).changes === 1);
  }

  async deleteIfVersion(userId: string, expectedVersion: number): Promise<boolean> {
    return this.execute('deleteIfVersion', () =>
      this.statements.deleteIfVersion.run(userId, expectedVersion).changes === 1
    );
  }

  async keys(): Promise<string[]> {
    return this.execute('keys', () => this.statements.keys.all().map(row => row.user_id));
  }

  async healthCheck(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      this.logger.error('SQLite health check failed', error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      this.logger.info(`SQLite session store closed: ${this.databasePath}`);
    }
  }

  private execute<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(
        `Session store ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private toParams(session: Session): SessionParams {
    return {
      userId: session.userId,
      secondaryId: session.secondaryId,
      guildId: session.guildId,
      displayName: session.displayName,
      verificationCode: session.verificationCode,
      createdAt: session.createdAt,
      state: session.state,
      remainingAttempts: session.remainingAttempts
    };
  }

  private toSession(row: SessionRow): StoredSession {
    if (!isSessionState(row.state)) {
      throw new StoreUnavailableError(`Session ${row.user_id} has unknown state '${row.state}'`);
    }

    return {
      userId: row.user_id,
      secondaryId: row.secondary_id,
      guildId: row.guild_id,
      displayName: row.display_name,
      verificationCode: row.verification_code,
      createdAt: row.created_at,
      state: row.state,
      remainingAttempts: row.remaining_attempts,
      version: row.version
    };
  }
}
