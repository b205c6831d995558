import type { AppConfig, BackendKind, DeviceSettings, EngineConfig, EngineTimings, ThumbnailSize } from '../types';
import { ValidationError, describeError } from '../errors';
import { isLogLevel } from '../logger';
import { isRecord, isValidUrl } from '../utils';

export const DEFAULT_DEVICE_SETTINGS: DeviceSettings = {
  apiUrl: 'http://localhost:12357',
  backend: 'odyssey',
  thumbnailSize: 'Large',
  requestTimeoutMs: 5000,
};

export const DEFAULT_ENGINE_TIMINGS: EngineTimings = {
  pollMinIntervalMs: 1000,
  pollMaxIntervalMs: 15000,
  reconnectBaseMs: 3000,
  reconnectJitterMs: 2000,
  awaitingTimeoutMs: 12000,
};

export const DEFAULT_CONFIG: AppConfig = {
  version: '1.0.0',
  device: DEFAULT_DEVICE_SETTINGS,
  engine: DEFAULT_ENGINE_TIMINGS,
  logLevel: 'info',
};

const BACKENDS: readonly BackendKind[] = ['odyssey', 'nanodlp'];
const THUMBNAIL_SIZES: readonly ThumbnailSize[] = ['Small', 'Large'];

export function isBackendKind(value: unknown): value is BackendKind {
  return BACKENDS.some((backend) => backend === value);
}

export function isThumbnailSize(value: unknown): value is ThumbnailSize {
  return THUMBNAIL_SIZES.some((size) => size === value);
}

export function validateDevice(device: Partial<DeviceSettings>): void {
  if (!device.apiUrl || !isValidUrl(device.apiUrl)) {
    throw new ValidationError('apiUrl must be an absolute http(s) URL', 'apiUrl');
  }

  if (!/^https?:\/\//.test(device.apiUrl)) {
    throw new ValidationError('apiUrl must start with http:// or https://', 'apiUrl');
  }

  if (!isBackendKind(device.backend)) {
    throw new ValidationError('backend must be "odyssey" or "nanodlp"', 'backend');
  }

  if (!isThumbnailSize(device.thumbnailSize)) {
    throw new ValidationError('thumbnailSize must be "Small" or "Large"', 'thumbnailSize');
  }

  if (!device.requestTimeoutMs || device.requestTimeoutMs <= 0) {
    throw new ValidationError('requestTimeoutMs must be a positive number', 'requestTimeoutMs');
  }
}

export function validateTimings(timings: EngineTimings): void {
  for (const [field, value] of Object.entries(timings)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ValidationError(`${field} must be a non-negative number`, field);
    }
  }

  if (timings.pollMinIntervalMs > timings.pollMaxIntervalMs) {
    throw new ValidationError('pollMinIntervalMs cannot exceed pollMaxIntervalMs', 'pollMinIntervalMs');
  }
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  return typeof value === 'number' ? value : fallback;
}

function readTimings(raw: unknown): EngineTimings {
  const input = isRecord(raw) ? raw : {};
  const d = DEFAULT_ENGINE_TIMINGS;
  return {
    pollMinIntervalMs: readNumber(input, 'pollMinIntervalMs', d.pollMinIntervalMs),
    pollMaxIntervalMs: readNumber(input, 'pollMaxIntervalMs', d.pollMaxIntervalMs),
    reconnectBaseMs: readNumber(input, 'reconnectBaseMs', d.reconnectBaseMs),
    reconnectJitterMs: readNumber(input, 'reconnectJitterMs', d.reconnectJitterMs),
    awaitingTimeoutMs: readNumber(input, 'awaitingTimeoutMs', d.awaitingTimeoutMs),
  };
}

/**
 * Fills in defaults for a config read from disk. Invalid device settings
 * fall back to the defaults with a warning instead of failing the load.
 */
export function validateConfig(raw: unknown): AppConfig {
  const input = isRecord(raw) ? raw : {};
  const rawDevice = isRecord(input.device) ? input.device : {};

  const device: DeviceSettings = {
    apiUrl: typeof rawDevice.apiUrl === 'string' ? rawDevice.apiUrl : DEFAULT_DEVICE_SETTINGS.apiUrl,
    backend: isBackendKind(rawDevice.backend) ? rawDevice.backend : DEFAULT_DEVICE_SETTINGS.backend,
    thumbnailSize: isThumbnailSize(rawDevice.thumbnailSize)
      ? rawDevice.thumbnailSize
      : DEFAULT_DEVICE_SETTINGS.thumbnailSize,
    requestTimeoutMs: readNumber(rawDevice, 'requestTimeoutMs', DEFAULT_DEVICE_SETTINGS.requestTimeoutMs),
  };

  let validDevice = device;
  try {
    validateDevice(device);
  } catch (error) {
    console.warn(`Ignoring invalid device settings: ${describeError(error)}`);
    validDevice = { ...DEFAULT_DEVICE_SETTINGS };
  }

  const engine = readTimings(input.engine);
  validateTimings(engine);

  return {
    version: typeof input.version === 'string' ? input.version : DEFAULT_CONFIG.version,
    device: validDevice,
    engine,
    logLevel: typeof input.logLevel === 'string' && isLogLevel(input.logLevel) ? input.logLevel : DEFAULT_CONFIG.logLevel,
  };
}

/** NanoDLP only answers polls; every other backend streams. */
export function toEngineConfig(config: AppConfig): EngineConfig {
  return {
    ...config.engine,
    streamingSupported: config.device.backend !== 'nanodlp',
    thumbnailSize: config.device.thumbnailSize,
  };
}
