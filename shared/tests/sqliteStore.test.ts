import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SQLiteSessionStore } from '../src/database/sqliteStore';
import { openSessionStore, MemorySessionStore } from '../src/database';
import { SessionEngine } from '../src/services/sessionEngine';
import { Session, SessionState } from '../src/types';
import { StoreUnavailableError } from '../src/utils/errors';
import { codeFor, createMockLogger } from './helpers';

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    secondaryId: '3f1c2b8e-5a4d-4e6f-9a1b-2c3d4e5f6a7b',
    userId: '1',
    guildId: '10',
    displayName: 'Alice#0001',
    verificationCode: '123456',
    createdAt: 1_700_000_000_000,
    state: SessionState.AwaitingStart,
    remainingAttempts: 5,
    ...overrides,
  };
}

describe('SQLiteSessionStore', () => {
  let store: SQLiteSessionStore;

  beforeEach(() => {
    store = new SQLiteSessionStore(':memory:', createMockLogger());
  });

  afterEach(async () => {
    await store.close();
  });

  it('inserts a session only when none exists for the user', async () => {
    const session = makeSession();

    expect(await store.insertIfAbsent(session)).toEqual({ ...session, version: 1 });
    expect(await store.insertIfAbsent(makeSession({ secondaryId: 'other' }))).toBeNull();
    expect(await store.get('1')).toEqual({ ...session, version: 1 });
  });

  it('returns null for unknown users', async () => {
    expect(await store.get('404')).toBeNull();
  });

  it('replaces only against the expected version', async () => {
    await store.insertIfAbsent(makeSession());
    const next = makeSession({ state: SessionState.AwaitingCode, remainingAttempts: 4 });

    expect(await store.replace(1, next)).toEqual({ ...next, version: 2 });
    expect(await store.replace(1, makeSession({ remainingAttempts: 3 }))).toBeNull();
    expect(await store.get('1')).toEqual({ ...next, version: 2 });
  });

  it('does not resurrect a deleted session on replace', async () => {
    await store.insertIfAbsent(makeSession());
    await store.delete('1');

    expect(await store.replace(1, makeSession())).toBeNull();
    expect(await store.get('1')).toBeNull();
  });

  it('upserts with put and bumps the version', async () => {
    expect(await store.put(makeSession())).toEqual({ ...makeSession(), version: 1 });
    const updated = makeSession({ verificationCode: '-420' });
    expect(await store.put(updated)).toEqual({ ...updated, version: 2 });
  });

  it('deletes unconditionally or by version', async () => {
    await store.insertIfAbsent(makeSession());
    await store.insertIfAbsent(makeSession({ userId: '2' }));

    expect(await store.deleteIfVersion('1', 7)).toBe(false);
    expect(await store.deleteIfVersion('1', 1)).toBe(true);
    expect(await store.delete('2')).toBe(true);
    expect(await store.delete('2')).toBe(false);
    expect(await store.keys()).toEqual([]);
  });

  it('lists user ids', async () => {
    await store.insertIfAbsent(makeSession({ userId: '1' }));
    await store.insertIfAbsent(makeSession({ userId: '2' }));

    expect((await store.keys()).sort()).toEqual(['1', '2']);
  });

  it('keeps large snowflakes exact', async () => {
    const userId = '1234567890123456789';
    await store.insertIfAbsent(makeSession({ userId, guildId: '9876543210987654321' }));

    expect(await store.get(userId)).toMatchObject({ userId, guildId: '9876543210987654321' });
  });

  it('reports health and wraps failures after close', async () => {
    expect(await store.healthCheck()).toBe(true);

    await store.close();

    await expect(store.get('1')).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('SQLiteSessionStore on a shared file', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'sessions-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const file = path.join(directory, 'nested', 'sessions.sqlite');
    const store = new SQLiteSessionStore(file, createMockLogger());

    expect(fs.existsSync(file)).toBe(true);
    await store.close();
  });

  it('lets two handles see each other\'s writes and conflicts', async () => {
    const file = path.join(directory, 'sessions.sqlite');
    const bot = new SQLiteSessionStore(file, createMockLogger());
    const web = new SQLiteSessionStore(file, createMockLogger());

    try {
      await bot.insertIfAbsent(makeSession());
      const seen = await web.get('1');
      expect(seen?.version).toBe(1);

      expect(await web.replace(1, makeSession({ state: SessionState.AwaitingCode }))).not.toBeNull();
      expect(await bot.replace(1, makeSession({ remainingAttempts: 4 }))).toBeNull();
      expect((await bot.get('1'))?.state).toBe(SessionState.AwaitingCode);
    } finally {
      await bot.close();
      await web.close();
    }
  });

  it('drives the engine end to end', async () => {
    const store = new SQLiteSessionStore(path.join(directory, 'sessions.sqlite'), createMockLogger());
    const engine = new SessionEngine(store, createMockLogger(), { expirySeconds: 60 });

    try {
      const secondaryId = await engine.createOrGet('1', '10', 'Alice#0001');
      expect(await engine.markEmailSent('1', secondaryId)).toBe('ok');
      expect(await engine.verify('1', secondaryId, 'wrong')).toEqual({ kind: 'attempts_remaining', remaining: 4 });
      expect(await engine.verify('1', secondaryId, await codeFor(engine, '1', secondaryId))).toEqual({ kind: 'verified' });
      expect((await store.get('1'))?.version).toBe(4);
    } finally {
      await store.close();
    }
  });
});

describe('openSessionStore', () => {
  it('returns an in-memory store for :memory:', async () => {
    const logger = createMockLogger();
    const store = openSessionStore(':memory:', logger);

    expect(store).toBeInstanceOf(MemorySessionStore);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    await store.close();
  });
});
