import { setTimeout as delay } from 'timers/promises';
import { SessionEngine } from './sessionEngine';
import { Logger } from '../utils/logger';
import { toError } from '../utils/errors';

export type GrantOutcome = 'granted' | 'already_granted' | 'no_role';

/**
 * Chat-platform side of role sync. Implemented by the bot over discord.js.
 */
export interface RoleGranter {
  /** Resolves once the platform client is connected and its role cache built */
  waitUntilReady(signal: AbortSignal): Promise<void>;

  /**
   * Grant the configured verified role. Throws when the member, the guild or
   * the permission to assign the role is unavailable.
   */
  grantVerifiedRole(guildId: string, userId: string, displayName: string): Promise<GrantOutcome>;
}

export interface SweepSummary {
  granted: number;
  alreadyGranted: number;
  skipped: number;
  failed: number;
  collected: number;
}

/**
 * Background task that grants the verified role to every verified session,
 * then garbage-collects expired sessions, then sleeps.
 *
 * Sessions are not deleted after a grant; they keep being re-granted
 * (harmlessly) until they expire.
 */
export class RoleSyncLoop {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly engine: SessionEngine,
    private readonly granter: RoleGranter,
    private readonly logger: Logger,
    private readonly intervalSeconds: number
  ) {}

  start(): void {
    if (this.running) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.logger.info(`Sleeping ${this.intervalSeconds} seconds between role sync sweeps`);
    this.running = this.run(controller.signal);
  }

  /**
   * Cancel the sleep between sweeps and wait for the current sweep to finish
   */
  async stop(): Promise<void> {
    if (!this.controller || !this.running) {
      return;
    }

    this.controller.abort();
    await this.running;
    this.controller = null;
    this.running = null;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * A single sweep. Each grant is isolated: one failure never stops the
   * remaining sessions from being processed.
   */
  async runOnce(): Promise<SweepSummary> {
    const summary: SweepSummary = { granted: 0, alreadyGranted: 0, skipped: 0, failed: 0, collected: 0 };

    for await (const session of this.engine.listVerifiedSessions()) {
      const { guildId, userId, displayName } = session;
      try {
        const outcome = await this.granter.grantVerifiedRole(guildId, userId, displayName);
        switch (outcome) {
          case 'granted':
            summary.granted++;
            break;
          case 'already_granted':
            summary.alreadyGranted++;
            break;
          case 'no_role':
            summary.skipped++;
            this.logger.warn('Skipping verification because no role was found in guild', { displayName, userId, guildId });
            break;
        }
      } catch (error) {
        summary.failed++;
        this.logger.error('Failed to add role to user', toError(error), { displayName, userId, guildId });
      }
    }

    summary.collected = await this.engine.collectGarbage();

    this.logger.info('Role sync sweep complete', { ...summary });
    return summary;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.granter.waitUntilReady(signal);
        if (signal.aborted) {
          break;
        }
        await this.runOnce();
      } catch (error) {
        // Store failures are retried on the next sweep
        this.logger.error('Role sync sweep failed', toError(error));
      }

      await this.sleep(signal);
    }

    this.logger.info('Role sync loop stopped');
  }

  private async sleep(signal: AbortSignal): Promise<void> {
    try {
      await delay(this.intervalSeconds * 1000, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}
