import { Client, GatewayIntentBits, REST, Routes, Events } from 'discord.js';
import { config } from './config';
import { commands, CommandContext } from './commands';
import { logger } from './utils/logger';
import { handleReady } from './events/ready';
import { handleInteractionCreate } from './events/interactionCreate';
import { RoleCache } from './services/roleCache';
import { DiscordRoleGranter } from './services/discordService';
import { openSessionStore, SessionStore } from '../../shared/src/database';
import { SessionEngine, RoleSyncLoop } from '../../shared/src/services';
import { toError } from '../../shared/src/utils/errors';

let store: SessionStore;
try {
  store = openSessionStore(config.database.file, logger);
} catch (error) {
  logger.error('Failed to open session store', toError(error), { databaseFile: config.database.file });
  process.exit(1);
}

const engine = new SessionEngine(store, logger, { expirySeconds: config.database.expirySeconds });
const roleCache = new RoleCache(config.bot.verifiedRoleName, logger);

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers
  ]
});

const roleSyncLoop = new RoleSyncLoop(
  engine,
  new DiscordRoleGranter(client, roleCache, logger),
  logger,
  config.bot.checkIntervalSeconds
);

const commandContext: CommandContext = {
  engine,
  logger,
  webUrl: config.bot.webUrl,
  verifyChannelKeyword: config.bot.verifyChannelKeyword,
};

const rest = new REST({ version: '10' }).setToken(config.bot.discordBotToken);

let shuttingDown = false;

const gracefulShutdown = async (exitCode: number) => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Graceful shutdown initiated');

  try {
    await roleSyncLoop.stop();
    await client.destroy();
    await store.close();
    logger.info('Graceful shutdown completed');
  } catch (error) {
    logger.error('Error during graceful shutdown', toError(error));
  } finally {
    process.exit(exitCode);
  }
};

// Event handlers
client.once(Events.ClientReady, (readyClient) => {
  if (!handleReady(readyClient, roleCache, logger)) {
    void gracefulShutdown(1);
  }
});

client.on(Events.InteractionCreate, (interaction) => {
  handleInteractionCreate(interaction, commands, commandContext).catch((error) => {
    logger.error('Unhandled interaction failure', toError(error));
  });
});

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('SIGINT signal received');
  void gracefulShutdown(0);
});

process.on('SIGTERM', () => {
  logger.info('SIGTERM signal received');
  void gracefulShutdown(0);
});

async function main() {
  try {
    logger.info('Starting email verification bot...');

    // Register slash commands
    logger.info('Registering slash commands...');
    await rest.put(Routes.applicationCommands(config.bot.clientId), {
      body: commands.map(command => command.data.toJSON()),
    });
    logger.info(`Successfully registered ${commands.length} slash commands`);

    await client.login(config.bot.discordBotToken);
    logger.info('Bot logged in successfully');

    // Waits for the role cache before its first sweep
    roleSyncLoop.start();
  } catch (error) {
    logger.error('Failed to start bot', toError(error));
    await gracefulShutdown(1);
  }
}

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', toError(reason));
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

void main();
