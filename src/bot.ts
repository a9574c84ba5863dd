import { Client, GatewayIntentBits, Interaction } from 'discord.js';
import dotenv from 'dotenv';
import { loadEnvConfig } from './config.js';
import { PriceCollector } from './core/collector.js';
import { handlePricesCommand } from './commands/prices.js';
import { describeError } from './errors.js';
import { createProviders } from './providers/index.js';
import { createLimiter } from './util/rate.js';
import { logger } from './util/logger.js';

dotenv.config();

const config = loadEnvConfig();
const globalLimiter = createLimiter({ minTime: 250, maxConcurrent: 3 });
const collector = new PriceCollector(createProviders(config), globalLimiter, config.providerTimeoutMs);

const client = new Client({ intents: [GatewayIntentBits.Guilds] });

client.once('ready', (readyClient) => {
  logger.info(`Bot logged in as ${readyClient.user.tag}`, { providers: collector.providerNames });
});

client.on('interactionCreate', async (interaction: Interaction) => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  if (interaction.commandName === 'prices') {
    try {
      await handlePricesCommand(interaction, collector);
    } catch (error) {
      logger.error('Prices command failed', { error: describeError(error) });
    }
  }
});

const token = process.env.DISCORD_TOKEN;

if (!token) {
  throw new Error('DISCORD_TOKEN must be set.');
}

client
  .login(token)
  .then(() => logger.info('Login succeeded, bot ready.'))
  .catch((error) => {
    logger.error('Login failed', { error: describeError(error) });
    process.exitCode = 1;
  });
