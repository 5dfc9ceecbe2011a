import { Logger } from '../src/utils/logger';
import { SessionEngine } from '../src/services/sessionEngine';
import { MemorySessionStore } from '../src/database/memoryStore';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export interface EngineFixture {
  store: MemorySessionStore;
  engine: SessionEngine;
  logger: jest.Mocked<Logger>;
  clock: { now: number };
}

export const START_TIME = 1_700_000_000_000;

export function createEngineFixture(expirySeconds = 60): EngineFixture {
  const store = new MemorySessionStore();
  const logger = createMockLogger();
  const clock = { now: START_TIME };
  const engine = new SessionEngine(store, logger, { expirySeconds, now: () => clock.now });
  return { store, engine, logger, clock };
}

export async function codeFor(engine: SessionEngine, userId: string, secondaryId: string): Promise<string> {
  const session = await engine.lookup(userId, secondaryId);
  if (!session) {
    throw new Error(`No session for ${userId}`);
  }
  return session.verificationCode;
}
