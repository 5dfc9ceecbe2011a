import { Client } from 'discord.js';
import { GrantOutcome, RoleGranter } from '../../../shared/src/services/roleSyncLoop';
import { Logger } from '../../../shared/src/utils/logger';
import { RoleCache } from './roleCache';

/**
 * Grants the verified role over discord.js on behalf of the role sync loop
 */
export class DiscordRoleGranter implements RoleGranter {
  constructor(
    private readonly client: Client,
    private readonly roleCache: RoleCache,
    private readonly logger: Logger
  ) {}

  async waitUntilReady(signal: AbortSignal): Promise<void> {
    if (this.roleCache.isBuilt() || signal.aborted) {
      return;
    }

    const aborted = new Promise<void>(resolve => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
    await Promise.race([this.roleCache.whenBuilt(), aborted]);
  }

  async grantVerifiedRole(guildId: string, userId: string, displayName: string): Promise<GrantOutcome> {
    const roleId = this.roleCache.get(guildId);
    if (!roleId) {
      return 'no_role';
    }

    const guild = await this.client.guilds.fetch(guildId);
    const member = await guild.members.fetch(userId);

    if (member.roles.cache.has(roleId)) {
      return 'already_granted';
    }

    this.logger.info('Adding verified role to member', { displayName, userId, guildId });
    await member.roles.add(roleId, 'Email verification');
    return 'granted';
  }
}
