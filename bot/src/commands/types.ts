import { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import { SessionEngine } from '../../../shared/src/services/sessionEngine';
import { Logger } from '../../../shared/src/utils/logger';

export interface CommandContext {
  engine: SessionEngine;
  logger: Logger;
  webUrl: string;
  verifyChannelKeyword: string;
}

export interface Command {
  data: {
    name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void>;
}
