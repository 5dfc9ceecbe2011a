import { ChatInputCommandInteraction, SlashCommandBuilder, MessageFlags, PermissionFlagsBits } from 'discord.js';
import { CommandContext } from './types';
import { handleDiscordCommandError } from '../utils/errorHandler';

export const data = new SlashCommandBuilder()
  .setName('reset-session')
  .setDescription('Reset the verification session for a member')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .addUserOption(option =>
    option.setName('member')
      .setDescription('Member whose session should be removed')
      .setRequired(true)
  );

/**
 * Reset the session for a user. For members with the Manage Roles permission only.
 */
export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const { engine, logger } = context;

  if (!interaction.inGuild()) {
    await interaction.reply({
      content: '❌ **Commands can only be used in a server!**',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  if (!interaction.memberPermissions.has(PermissionFlagsBits.ManageRoles)) {
    logger.warn('Session reset refused: missing permission', { userId: interaction.user.id, guildId: interaction.guildId });
    await interaction.reply({
      content: '❌ You need the Manage Roles permission to reset sessions.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const member = interaction.options.getUser('member', true);

  try {
    const result = await engine.deleteSession(member.id);
    logger.info('Session reset requested', { actor: interaction.user.id, targetUserId: member.id, result });

    await interaction.reply({
      content: result === 'ok' ? `Removed session for ${member}` : `No session found for ${member}`,
      flags: MessageFlags.Ephemeral,
    });
  } catch (error) {
    await handleDiscordCommandError(
      error,
      { userId: interaction.user.id, guildId: interaction.guildId, operation: 'reset_session_command' },
      interaction,
      logger
    );
  }
}
