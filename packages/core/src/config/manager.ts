import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import type { AppConfig, ConfigManagerOptions, DeviceSettings, EngineConfig, EngineTimings, LogLevel } from '../types';
import { ConfigError, describeError, toError } from '../errors';
import { expandPath, getDefaultConfigDir, fileExists, normalizeUrl } from '../utils';
import { DEFAULT_CONFIG, toEngineConfig, validateConfig, validateDevice, validateTimings } from './schema';

const CONFIG_FILE = 'config.json';

function cloneConfig(config: AppConfig): AppConfig {
  return { ...config, device: { ...config.device }, engine: { ...config.engine } };
}

export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private loaded = false;

  constructor(options: ConfigManagerOptions = {}) {
    const configDir = options.configDir ? expandPath(options.configDir) : getDefaultConfigDir();
    this.configPath = join(configDir, CONFIG_FILE);
    this.config = cloneConfig(DEFAULT_CONFIG);
  }

  async load(): Promise<AppConfig> {
    try {
      await mkdir(dirname(this.configPath), { recursive: true });

      if (await fileExists(this.configPath)) {
        const content = await readFile(this.configPath, 'utf-8');
        const rawConfig: unknown = JSON.parse(content);
        this.config = validateConfig(rawConfig);
      }

      this.loaded = true;
      return this.getConfig();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigError('Invalid config file format (JSON parse error)', error);
      }
      throw new ConfigError(`Failed to load config: ${describeError(error)}`, toError(error));
    }
  }

  async save(): Promise<void> {
    try {
      await mkdir(dirname(this.configPath), { recursive: true });
      await writeFile(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
    } catch (error) {
      throw new ConfigError(`Failed to save config: ${describeError(error)}`, toError(error));
    }
  }

  // Device settings
  getDevice(): DeviceSettings {
    return { ...this.config.device };
  }

  async updateDevice(updates: Partial<DeviceSettings>): Promise<void> {
    const updated: DeviceSettings = { ...this.config.device, ...updates };
    if (updates.apiUrl !== undefined) {
      updated.apiUrl = normalizeUrl(updates.apiUrl);
    }

    validateDevice(updated);
    this.config.device = updated;
    await this.save();
  }

  // Engine timings
  getEngineTimings(): EngineTimings {
    return { ...this.config.engine };
  }

  async updateEngine(updates: Partial<EngineTimings>): Promise<void> {
    const updated: EngineTimings = { ...this.config.engine, ...updates };
    validateTimings(updated);
    this.config.engine = updated;
    await this.save();
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  async setLogLevel(level: LogLevel): Promise<void> {
    this.config.logLevel = level;
    await this.save();
  }

  async reset(): Promise<void> {
    this.config = cloneConfig(DEFAULT_CONFIG);
    await this.save();
  }

  getEngineConfig(): EngineConfig {
    return toEngineConfig(this.config);
  }

  getConfig(): AppConfig {
    return cloneConfig(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  isLoaded(): boolean {
    return this.loaded;
  }
}
