// Session store factory - SQLite on disk, or in memory when no file is wanted

import { SessionStore } from './interfaces';
import { SQLiteSessionStore } from './sqliteStore';
import { MemorySessionStore } from './memoryStore';
import { Logger } from '../utils/logger';

export function openSessionStore(databaseFile: string, logger: Logger): SessionStore {
  if (databaseFile === ':memory:') {
    logger.warn('Using in-memory session store; sessions will not survive a restart or be shared between processes');
    return new MemorySessionStore();
  }
  return new SQLiteSessionStore(databaseFile, logger);
}

export type { SessionStore } from './interfaces';
export { SQLiteSessionStore } from './sqliteStore';
export { MemorySessionStore } from './memoryStore';
