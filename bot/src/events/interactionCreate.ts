import { Interaction, MessageFlags } from 'discord.js';
import { Command, CommandContext } from '../commands/types';
import { handleDiscordCommandError } from '../utils/errorHandler';

export async function handleInteractionCreate(
  interaction: Interaction,
  commands: Command[],
  context: CommandContext
): Promise<void> {
  // Only handle chat input commands
  if (!interaction.isChatInputCommand()) return;

  const { logger } = context;
  const command = commands.find(cmd => cmd.data.name === interaction.commandName);

  if (!command) {
    logger.warn('Unknown command received', {
      commandName: interaction.commandName
    });
    await interaction.reply({
      content: '❌ Unknown command.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  logger.info('Command executed', {
    commandName: interaction.commandName,
    username: interaction.user.username,
    userId: interaction.user.id
  });

  try {
    await command.execute(interaction, context);
  } catch (error) {
    await handleDiscordCommandError(
      error,
      { userId: interaction.user.id, guildId: interaction.guildId ?? undefined, operation: interaction.commandName },
      interaction,
      logger
    );
  }
}
