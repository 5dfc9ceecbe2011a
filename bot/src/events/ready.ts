import { Client } from 'discord.js';
import { Logger } from '../../../shared/src/utils/logger';
import { GuildRoles, RoleCache } from '../services/roleCache';

interface RoleLike {
  id: string;
  name: string;
}

export interface GuildLike {
  id: string;
  name: string;
  roles: {
    cache: { values(): Iterable<RoleLike> };
  };
}

export function collectGuildRoles(guilds: Iterable<GuildLike>): GuildRoles[] {
  return Array.from(guilds, guild => ({
    id: guild.id,
    name: guild.name,
    roles: Array.from(guild.roles.cache.values(), role => ({ id: role.id, name: role.name })),
  }));
}

/**
 * Builds the role cache from the guilds the bot is in.
 * @returns false when the bot is in at least one guild and none of them has
 * the verified role
 */
export function assembleRoleCache(guilds: Iterable<GuildLike>, roleCache: RoleCache, logger: Logger): boolean {
  const guildRoles = collectGuildRoles(guilds);
  const matched = roleCache.build(guildRoles);

  if (guildRoles.length > 0 && matched === 0) {
    logger.error(`${roleCache.roleName} role not found in any guild`, undefined, { guildCount: guildRoles.length });
    return false;
  }

  return true;
}

export function handleReady(client: Client<true>, roleCache: RoleCache, logger: Logger): boolean {
  logger.info('Bot is ready', {
    username: client.user.tag,
    guildsCount: client.guilds.cache.size
  });

  client.guilds.cache.forEach((guild) => {
    logger.info('Guild connected', {
      guildName: guild.name,
      guildId: guild.id,
      memberCount: guild.memberCount
    });
  });

  return assembleRoleCache(client.guilds.cache.values(), roleCache, logger);
}
