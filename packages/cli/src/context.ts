import {
  ConfigManager,
  HttpDeviceClient,
  StatusEngine,
  ValidationError,
  createLogger,
  isBackendKind,
  normalizeUrl,
  resolveLogLevel,
  toEngineConfig,
  type AppConfig,
  type Logger,
} from '@printlink/core';

/** Options every device command accepts. */
export interface DeviceCommandOptions {
  url?: string;
  backend?: string;
  configDir?: string;
}

export interface DeviceContext {
  config: AppConfig;
  engine: StatusEngine;
  logger: Logger;
}

export async function loadConfig(options: DeviceCommandOptions): Promise<AppConfig> {
  const configManager = new ConfigManager({ configDir: options.configDir });
  const config = await configManager.load();

  if (options.url) {
    config.device.apiUrl = normalizeUrl(options.url);
  }
  if (options.backend !== undefined) {
    if (!isBackendKind(options.backend)) {
      throw new ValidationError(`Unknown backend: ${options.backend}`, 'backend');
    }
    config.device.backend = options.backend;
  }
  return config;
}

/** Builds an engine for the configured device; the caller owns `dispose()`. */
export async function createDeviceContext(options: DeviceCommandOptions): Promise<DeviceContext> {
  const config = await loadConfig(options);
  const logger = createLogger('printlink', resolveLogLevel(config.logLevel));

  const client = new HttpDeviceClient({
    apiUrl: config.device.apiUrl,
    requestTimeoutMs: config.device.requestTimeoutMs,
    logger: logger.child('http'),
  });

  const engine = new StatusEngine({
    client,
    config: toEngineConfig(config),
    logger,
  });

  return { config, engine, logger };
}

/** One fetch, then wait for the preview so the view is complete. */
export async function fetchOnce(engine: StatusEngine): Promise<void> {
  await engine.refresh();
  await engine.whenIdle();
}
