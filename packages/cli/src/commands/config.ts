import { Command } from 'commander';
import {
  ConfigManager,
  ValidationError,
  describeError,
  isBackendKind,
  isLogLevel,
  isThumbnailSize,
  type AppConfig,
  type EngineTimings,
} from '@printlink/core';
import { formatSuccess, formatError, formatInfo, formatJSON } from '../formatters/output';

const DEVICE_KEYS = ['apiUrl', 'backend', 'thumbnailSize', 'requestTimeoutMs'] as const;
const ENGINE_KEYS = [
  'pollMinIntervalMs',
  'pollMaxIntervalMs',
  'reconnectBaseMs',
  'reconnectJitterMs',
  'awaitingTimeoutMs',
] as const;

type EngineKey = (typeof ENGINE_KEYS)[number];

function isEngineKey(value: string): value is EngineKey {
  return ENGINE_KEYS.some((key) => key === value);
}

function parseNumber(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${key} must be a number`, key);
  }
  return parsed;
}

/** Applies `category.setting=value` to the stored config. */
export async function applySetting(configManager: ConfigManager, key: string, value: string): Promise<void> {
  const [category, setting] = key.split('.');

  switch (category) {
    case 'device':
      switch (setting) {
        case 'apiUrl':
          await configManager.updateDevice({ apiUrl: value });
          return;
        case 'backend':
          if (!isBackendKind(value)) throw new ValidationError('backend must be "odyssey" or "nanodlp"', 'backend');
          await configManager.updateDevice({ backend: value });
          return;
        case 'thumbnailSize':
          if (!isThumbnailSize(value)) {
            throw new ValidationError('thumbnailSize must be "Small" or "Large"', 'thumbnailSize');
          }
          await configManager.updateDevice({ thumbnailSize: value });
          return;
        case 'requestTimeoutMs':
          await configManager.updateDevice({ requestTimeoutMs: parseNumber(key, value) });
          return;
        default:
          throw new ValidationError(`Unknown device setting: ${setting}. Available: ${DEVICE_KEYS.join(', ')}`, key);
      }

    case 'engine': {
      if (!setting || !isEngineKey(setting)) {
        throw new ValidationError(`Unknown engine setting: ${setting}. Available: ${ENGINE_KEYS.join(', ')}`, key);
      }
      const timings: EngineTimings = configManager.getEngineTimings();
      timings[setting] = parseNumber(key, value);
      await configManager.updateEngine(timings);
      return;
    }

    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new ValidationError('logLevel must be debug, info, warn, error or silent', 'logLevel');
      }
      await configManager.setLogLevel(value);
      return;

    default:
      throw new ValidationError(`Unknown category: ${category}. Available categories: device, engine, logLevel`, key);
  }
}

function describeConfig(config: AppConfig, path: string): string {
  const { device, engine } = config;
  return `
Configuration (${path}):
  Version: ${config.version}
  Log Level: ${config.logLevel}

Device:
  API URL: ${device.apiUrl}
  Backend: ${device.backend}${device.backend === 'nanodlp' ? ' (polling only)' : ''}
  Thumbnail Size: ${device.thumbnailSize}
  Request Timeout: ${device.requestTimeoutMs}ms

Engine:
  Poll Interval: ${engine.pollMinIntervalMs}ms (after failure ${engine.pollMaxIntervalMs}ms)
  Reconnect Delay: ${engine.reconnectBaseMs}ms + up to ${engine.reconnectJitterMs}ms
  New Session Timeout: ${engine.awaitingTimeoutMs}ms
  `.trim();
}

export const configCommand = new Command('config')
  .description('Configuration management')
  .option('--config-dir <dir>', 'Configuration directory');

function managerFor(command: Command): ConfigManager {
  const { configDir } = command.optsWithGlobals<{ configDir?: string }>();
  return new ConfigManager({ configDir });
}

configCommand
  .command('show')
  .description('Show current configuration')
  .option('-f, --format <format>', 'Output format (text|json)', 'text')
  .action(async (options: { format: string }, command: Command) => {
    try {
      const configManager = managerFor(command);
      const config = await configManager.load();

      if (options.format === 'json') {
        console.log(formatJSON(config));
      } else {
        console.log(describeConfig(config, configManager.getConfigPath()));
      }
    } catch (error) {
      console.error(formatError(describeError(error)));
      process.exit(1);
    }
  });

configCommand
  .command('set <key> <value>')
  .description('Update a configuration value, e.g. device.apiUrl http://printer.local:12357')
  .action(async (key: string, value: string, _options: unknown, command: Command) => {
    try {
      const configManager = managerFor(command);
      await configManager.load();
      await applySetting(configManager, key, value);
      console.log(formatSuccess(`Updated ${key} to ${value}`));
    } catch (error) {
      console.error(formatError(describeError(error)));
      process.exit(1);
    }
  });

configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action(async (options: { yes?: boolean }, command: Command) => {
    try {
      if (!options.yes) {
        console.log(formatInfo('This will reset all settings to defaults.'));
        console.log('Use --yes to confirm.');
        return;
      }

      const configManager = managerFor(command);
      await configManager.load();
      await configManager.reset();
      console.log(formatSuccess('Configuration reset to defaults'));
    } catch (error) {
      console.error(formatError(describeError(error)));
      process.exit(1);
    }
  });
