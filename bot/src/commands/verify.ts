import { ChatInputCommandInteraction, SlashCommandBuilder, EmbedBuilder, MessageFlags } from 'discord.js';
import { CommandContext } from './types';
import { handleDiscordCommandError } from '../utils/errorHandler';

export const data = new SlashCommandBuilder()
  .setName('verify')
  .setDescription('Verify your email address to receive the verified role');

export function buildVerificationLink(webUrl: string, userId: string, secondaryId: string): string {
  return `${webUrl}/start/${userId}/${secondaryId}`;
}

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const { engine, logger } = context;

  // Ignore DMs
  if (!interaction.inGuild()) {
    await interaction.reply({
      content: '❌ **Commands can only be used in a server!**',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  // Only respond in verification channels
  const channel = interaction.channel;
  const channelName = channel && 'name' in channel ? channel.name ?? '' : '';
  if (!channelName.toLowerCase().includes(context.verifyChannelKeyword.toLowerCase())) {
    await interaction.reply({
      content: `Please use \`/verify\` in a ${context.verifyChannelKeyword} channel.`,
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const userId = interaction.user.id;
  const guildId = interaction.guildId;

  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });

    const secondaryId = await engine.createOrGet(userId, guildId, interaction.user.tag);
    const verificationLink = buildVerificationLink(context.webUrl, userId, secondaryId);

    const embed = new EmbedBuilder()
      .setTitle('Verification!')
      .setURL(verificationLink)
      .setDescription('Please use this page to enter your email for verification. Your email will not be shared with Discord.')
      .setColor(0xffc0cb)
      .addFields([
        {
          name: 'Verification Link',
          value: verificationLink,
          inline: true,
        },
      ]);

    try {
      await interaction.user.send({ embeds: [embed] });
      await interaction.editReply({
        content: '✅ Verification link sent to your DMs!',
      });
      logger.info('Verification link sent', { userId, guildId });
    } catch (dmError) {
      logger.warn('Unable to send verification DM', {
        userId,
        guildId,
        error: dmError instanceof Error ? dmError.message : String(dmError),
      });
      await interaction.editReply({
        content: 'Unable to send DM. Are you sure you have DMs enabled on this server?',
      });
    }
  } catch (error) {
    await handleDiscordCommandError(error, { userId, guildId, operation: 'verify_command' }, interaction, logger);
  }
}
