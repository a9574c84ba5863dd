import { SlashCommandBuilder, REST, Routes } from 'discord.js';
import dotenv from 'dotenv';
import { DEFAULT_ALLOCATION_CONFIG } from '../config.js';
import { describeError } from '../errors.js';
import { logger } from '../util/logger.js';

dotenv.config();

const VENDOR_CHOICES: { name: string; value: string }[] = [
  { name: 'All vendors', value: 'all' },
  { name: 'CryptMTG only', value: 'cryptmtg' },
  { name: 'MagiCarte only', value: 'magicarte' },
  { name: 'Face to Face Games only', value: 'facetoface' }
];

const buildPricesCommand = () => {
  const command = new SlashCommandBuilder()
    .setName('prices')
    .setDescription('Compare card prices across vendors and build consolidated buy lists.')
    .addStringOption((option) =>
      option
        .setName('cards')
        .setDescription('Card list, one "<qty> <name>" entry per line or separated by ";"')
        .setRequired(true)
    )
    .addIntegerOption((option) =>
      option
        .setName('min_cards')
        .setDescription(`Minimum items per vendor (default ${DEFAULT_ALLOCATION_CONFIG.minCardsPerVendor})`)
        .setMinValue(1)
        .setMaxValue(50)
    )
    .addNumberOption((option) =>
      option
        .setName('override')
        .setDescription(
          `Price gap that keeps an item at a small vendor (default ${DEFAULT_ALLOCATION_CONFIG.priceOverrideThreshold})`
        )
        .setMinValue(0)
    )
    .addBooleanOption((option) =>
      option.setName('filtering').setDescription('Consolidate small vendor orders (default on)')
    )
    .addStringOption((option) => {
      option.setName('vendor').setDescription('Vendors to query');
      VENDOR_CHOICES.forEach((choice) => option.addChoices(choice));
      return option;
    });

  return command;
};

const register = async () => {
  const token = process.env.DISCORD_TOKEN;
  const clientId = process.env.DISCORD_CLIENT_ID;
  const guildId = process.env.DISCORD_GUILD_ID;

  if (!token || !clientId) {
    throw new Error('DISCORD_TOKEN and DISCORD_CLIENT_ID must be set.');
  }

  const rest = new REST({ version: '10' }).setToken(token);
  const commands = [buildPricesCommand().toJSON()];

  if (guildId) {
    logger.info('Registering commands for guild', { guildId });
    await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commands });
  } else {
    logger.info('Registering commands globally');
    await rest.put(Routes.applicationCommands(clientId), { body: commands });
  }
  logger.info('Slash commands registered');
};

register().catch((error) => {
  logger.error('Command registration failed', { error: describeError(error) });
  process.exitCode = 1;
});
