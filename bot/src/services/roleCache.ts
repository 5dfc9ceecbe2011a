import { Logger } from '../../../shared/src/utils/logger';

export interface GuildRoles {
  id: string;
  name: string;
  roles: Array<{ id: string; name: string }>;
}

/**
 * Maps guild id to the id of the verified role in that guild, matched by
 * exact role name. Built once when the client becomes ready.
 */
export class RoleCache {
  private roleIds: Map<string, string> = new Map();
  private built = false;
  private markBuilt: () => void = () => undefined;
  private readonly builtPromise: Promise<void>;

  constructor(public readonly roleName: string, private readonly logger: Logger) {
    this.builtPromise = new Promise<void>(resolve => {
      this.markBuilt = () => resolve();
    });
  }

  /**
   * Rebuild the cache from the guilds the bot is in
   * @returns number of guilds where the role was found
   */
  build(guilds: GuildRoles[]): number {
    this.roleIds.clear();

    for (const guild of guilds) {
      const role = guild.roles.find(candidate => candidate.name === this.roleName);
      if (role) {
        this.roleIds.set(guild.id, role.id);
      } else {
        this.logger.warn(`${this.roleName} role not found in guild`, { guildName: guild.name, guildId: guild.id });
      }
    }

    this.built = true;
    this.markBuilt();

    this.logger.info('Role cache assembled', { roleName: this.roleName, guilds: guilds.length, matched: this.roleIds.size });
    return this.roleIds.size;
  }

  get(guildId: string): string | undefined {
    return this.roleIds.get(guildId);
  }

  get size(): number {
    return this.roleIds.size;
  }

  isBuilt(): boolean {
    return this.built;
  }

  whenBuilt(): Promise<void> {
    return this.builtPromise;
  }
}
