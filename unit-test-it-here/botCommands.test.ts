import { MessageFlags, PermissionFlagsBits } from 'discord.js';
import * as verifyCommand from '../bot/src/commands/verify';
import * as resetSessionCommand from '../bot/src/commands/resetSession';
import { commands, CommandContext } from '../bot/src/commands';
import { handleInteractionCreate } from '../bot/src/events/interactionCreate';
import { StoreUnavailableError } from '../shared/src/utils/errors';
import { EngineFixture, createEngineFixture } from '../shared/tests/helpers';
import { FakeInteraction } from './helpers/discordFakes';

const WEB_URL = 'https://verify.example.com';

describe('bot commands', () => {
  let fixture: EngineFixture;
  let context: CommandContext;

  beforeEach(() => {
    fixture = createEngineFixture();
    context = {
      engine: fixture.engine,
      logger: fixture.logger,
      webUrl: WEB_URL,
      verifyChannelKeyword: 'verification',
    };
  });

  describe('command definitions', () => {
    it('registers verify and reset-session', () => {
      expect(commands.map(command => command.data.name)).toEqual(['verify', 'reset-session']);
    });

    it('restricts reset-session to members who can manage roles', () => {
      const json = resetSessionCommand.data.toJSON();

      expect(json.default_member_permissions).toBe(PermissionFlagsBits.ManageRoles.toString());
      expect(json.options).toEqual([
        expect.objectContaining({ name: 'member', required: true }),
      ]);
    });
  });

  describe('/verify', () => {
    it('DMs a verification link built from the session', async () => {
      const interaction = new FakeInteraction();

      await verifyCommand.execute(interaction.asCommand(), context);

      const stored = await fixture.store.get('1');
      expect(stored).toMatchObject({ guildId: '10', displayName: 'Alice#0001' });
      const link = `${WEB_URL}/start/1/${stored?.secondaryId}`;

      expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
      expect(interaction.user.send).toHaveBeenCalledTimes(1);
      const embed = interaction.user.send.mock.calls[0][0].embeds[0].toJSON();
      expect(embed.title).toBe('Verification!');
      expect(embed.url).toBe(link);
      expect(embed.description).toBe(
        'Please use this page to enter your email for verification. Your email will not be shared with Discord.'
      );
      expect(embed.fields).toEqual([{ name: 'Verification Link', value: link, inline: true }]);
      expect(interaction.editReply).toHaveBeenCalledWith({ content: '✅ Verification link sent to your DMs!' });
    });

    it('sends the same link when run again', async () => {
      const first = new FakeInteraction();
      const second = new FakeInteraction();

      await verifyCommand.execute(first.asCommand(), context);
      await verifyCommand.execute(second.asCommand(), context);

      const firstLink = first.user.send.mock.calls[0][0].embeds[0].toJSON().url;
      const secondLink = second.user.send.mock.calls[0][0].embeds[0].toJSON().url;
      expect(secondLink).toBe(firstLink);
    });

    it('matches the channel keyword case-insensitively', async () => {
      const interaction = new FakeInteraction({ channelName: 'Email-VERIFICATION' });

      await verifyCommand.execute(interaction.asCommand(), context);

      expect(interaction.user.send).toHaveBeenCalledTimes(1);
    });

    it('ignores channels without the keyword', async () => {
      const interaction = new FakeInteraction({ channelName: 'general' });

      await verifyCommand.execute(interaction.asCommand(), context);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: 'Please use `/verify` in a verification channel.',
        flags: MessageFlags.Ephemeral,
      });
      expect(await fixture.store.keys()).toEqual([]);
    });

    it('refuses to run in DMs', async () => {
      const interaction = new FakeInteraction({ guildId: null });

      await verifyCommand.execute(interaction.asCommand(), context);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: '❌ **Commands can only be used in a server!**',
        flags: MessageFlags.Ephemeral,
      });
      expect(await fixture.store.keys()).toEqual([]);
    });

    it('tells the user to enable DMs when the DM is refused', async () => {
      const interaction = new FakeInteraction();
      interaction.user.send.mockRejectedValueOnce(new Error('Cannot send messages to this user'));

      await verifyCommand.execute(interaction.asCommand(), context);

      expect(interaction.editReply).toHaveBeenCalledWith({
        content: 'Unable to send DM. Are you sure you have DMs enabled on this server?',
      });
      expect(fixture.logger.warn).toHaveBeenCalledWith('Unable to send verification DM', {
        userId: '1',
        guildId: '10',
        error: 'Cannot send messages to this user',
      });
    });

    it('reports an unavailable store without a link', async () => {
      const interaction = new FakeInteraction();
      jest.spyOn(fixture.store, 'get').mockRejectedValueOnce(new StoreUnavailableError('database is locked'));

      await verifyCommand.execute(interaction.asCommand(), context);

      expect(interaction.user.send).not.toHaveBeenCalled();
      expect(interaction.editReply).toHaveBeenCalledWith({
        content:
          '❌ **Verification Unavailable**\n\nThe verification service could not reach its storage. Please try again later.' +
          '\n\n💡 You can run the command again.',
        embeds: [],
      });
    });
  });

  describe('/reset-session', () => {
    it('removes the member\'s session', async () => {
      await fixture.engine.createOrGet('2', '10', 'Bob#0002');
      const interaction = new FakeInteraction({ commandName: 'reset-session' });

      await resetSessionCommand.execute(interaction.asCommand(), context);

      expect(interaction.options.getUser).toHaveBeenCalledWith('member', true);
      expect(interaction.reply).toHaveBeenCalledWith({
        content: 'Removed session for <@2>',
        flags: MessageFlags.Ephemeral,
      });
      expect(await fixture.store.get('2')).toBeNull();
    });

    it('says so when the member has no session', async () => {
      const interaction = new FakeInteraction({ commandName: 'reset-session' });

      await resetSessionCommand.execute(interaction.asCommand(), context);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: 'No session found for <@2>',
        flags: MessageFlags.Ephemeral,
      });
      expect(fixture.logger.warn).toHaveBeenCalledWith('Attempted to delete nonexistent session', { userId: '2' });
    });

    it('refuses members without Manage Roles', async () => {
      await fixture.engine.createOrGet('2', '10', 'Bob#0002');
      const interaction = new FakeInteraction({ commandName: 'reset-session', canManageRoles: false });

      await resetSessionCommand.execute(interaction.asCommand(), context);

      expect(interaction.memberPermissions.has).toHaveBeenCalledWith(PermissionFlagsBits.ManageRoles);
      expect(interaction.reply).toHaveBeenCalledWith({
        content: '❌ You need the Manage Roles permission to reset sessions.',
        flags: MessageFlags.Ephemeral,
      });
      expect(await fixture.store.keys()).toEqual(['2']);
    });

    it('refuses to run in DMs', async () => {
      await fixture.engine.createOrGet('2', '10', 'Bob#0002');
      const interaction = new FakeInteraction({ commandName: 'reset-session', guildId: null });

      await resetSessionCommand.execute(interaction.asCommand(), context);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: '❌ **Commands can only be used in a server!**',
        flags: MessageFlags.Ephemeral,
      });
      expect(await fixture.store.keys()).toEqual(['2']);
    });
  });

  describe('handleInteractionCreate', () => {
    it('dispatches to the matching command', async () => {
      const interaction = new FakeInteraction({ commandName: 'verify' });

      await handleInteractionCreate(interaction.asInteraction(), commands, context);

      expect(interaction.user.send).toHaveBeenCalledTimes(1);
      expect(fixture.logger.info).toHaveBeenCalledWith('Command executed', {
        commandName: 'verify',
        username: 'alice',
        userId: '1',
      });
    });

    it('rejects unknown commands', async () => {
      const interaction = new FakeInteraction({ commandName: 'status' });

      await handleInteractionCreate(interaction.asInteraction(), commands, context);

      expect(interaction.reply).toHaveBeenCalledWith({ content: '❌ Unknown command.', flags: MessageFlags.Ephemeral });
    });

    it('turns a thrown command error into an ephemeral reply', async () => {
      const interaction = new FakeInteraction({ commandName: 'explode' });
      const failure = new Error('boom');
      const exploding = {
        data: { name: 'explode', toJSON: verifyCommand.data.toJSON.bind(verifyCommand.data) },
        execute: jest.fn(async () => {
          throw failure;
        }),
      };

      await handleInteractionCreate(interaction.asInteraction(), [exploding], context);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: '❌ **Internal Error**\n\nAn unexpected error occurred. Please try again.\n\n💡 You can run the command again.',
        flags: MessageFlags.Ephemeral,
      });
      expect(fixture.logger.error).toHaveBeenCalledWith('Command failed: explode', failure, {
        userId: '1',
        guildId: '10',
        operation: 'explode',
        errorCode: 'internal_error',
      });
    });
  });
});
