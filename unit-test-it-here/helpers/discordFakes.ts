import { ChatInputCommandInteraction, Client, EmbedBuilder, Interaction } from 'discord.js';

export interface ReplyPayload {
  content?: string;
  embeds?: EmbedBuilder[];
  flags?: number;
}

interface FakeUser {
  id: string;
  tag: string;
  username: string;
  send: jest.Mock<Promise<void>, [{ embeds: EmbedBuilder[] }]>;
  toString(): string;
}

export interface FakeInteractionOptions {
  commandName?: string;
  guildId?: string | null;
  channelName?: string;
  canManageRoles?: boolean;
  targetUserId?: string;
}

/**
 * Stand-in for the parts of a slash command interaction the handlers touch
 */
export class FakeInteraction {
  deferred = false;
  replied = false;
  readonly commandName: string;
  readonly guildId: string | null;
  readonly channel: { name: string } | null;
  readonly user: FakeUser = {
    id: '1',
    tag: 'Alice#0001',
    username: 'alice',
    send: jest.fn<Promise<void>, [{ embeds: EmbedBuilder[] }]>(async () => undefined),
    toString: () => '<@1>',
  };
  readonly memberPermissions: { has: jest.Mock<boolean, [bigint]> };
  readonly options: { getUser: jest.Mock<{ id: string; toString(): string }, [string, boolean]> };

  readonly deferReply = jest.fn<Promise<void>, [ReplyPayload?]>(async () => {
    this.deferred = true;
  });
  readonly reply = jest.fn<Promise<void>, [ReplyPayload]>(async () => {
    this.replied = true;
  });
  readonly editReply = jest.fn<Promise<void>, [ReplyPayload]>(async () => undefined);
  readonly followUp = jest.fn<Promise<void>, [ReplyPayload]>(async () => undefined);

  constructor(options: FakeInteractionOptions = {}) {
    this.commandName = options.commandName ?? 'verify';
    this.guildId = options.guildId === undefined ? '10' : options.guildId;
    this.channel = { name: options.channelName ?? 'email-verification' };
    const canManageRoles = options.canManageRoles ?? true;
    this.memberPermissions = { has: jest.fn<boolean, [bigint]>(() => canManageRoles) };
    const targetUserId = options.targetUserId ?? '2';
    this.options = {
      getUser: jest.fn<{ id: string; toString(): string }, [string, boolean]>(() => ({
        id: targetUserId,
        toString: () => `<@${targetUserId}>`,
      })),
    };
  }

  inGuild(): boolean {
    return this.guildId !== null;
  }

  isChatInputCommand(): boolean {
    return true;
  }

  asCommand(): ChatInputCommandInteraction {
    return this as unknown as ChatInputCommandInteraction;
  }

  asInteraction(): Interaction {
    return this as unknown as Interaction;
  }
}

export interface FakeMember {
  roles: {
    cache: Map<string, { id: string }>;
    add: jest.Mock<Promise<void>, [string, string]>;
  };
}

export function createFakeMember(roleIds: string[] = []): FakeMember {
  return {
    roles: {
      cache: new Map(roleIds.map(id => [id, { id }])),
      add: jest.fn<Promise<void>, [string, string]>(async () => undefined),
    },
  };
}

export interface FakeClient {
  guilds: {
    fetch: jest.Mock<Promise<{ members: { fetch: jest.Mock<Promise<FakeMember>, [string]> } }>, [string]>;
  };
}

export function createFakeClient(member: FakeMember): { client: FakeClient; fetchMember: jest.Mock<Promise<FakeMember>, [string]> } {
  const fetchMember = jest.fn<Promise<FakeMember>, [string]>(async () => member);
  const client: FakeClient = {
    guilds: {
      fetch: jest.fn<Promise<{ members: { fetch: jest.Mock<Promise<FakeMember>, [string]> } }>, [string]>(
        async () => ({ members: { fetch: fetchMember } })
      ),
    },
  };
  return { client, fetchMember };
}

export function asClient(client: FakeClient): Client {
  return client as unknown as Client;
}
