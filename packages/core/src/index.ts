// Sync Module
export {
  StatusEngine,
  StatusStore,
  ChannelManager,
  PollLoop,
  StreamSubscriber,
  ThumbnailResolver,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_AWAITING_TIMEOUT,
  DEFAULT_RECONNECT_BASE,
  DEFAULT_RECONNECT_JITTER,
  DEFAULT_POLL_MIN_INTERVAL,
  DEFAULT_POLL_MAX_INTERVAL,
} from './sync';
export type {
  StatusEngineOptions,
  StatusStoreOptions,
  ChannelManagerOptions,
  PollLoopOptions,
  StreamSubscriberOptions,
  ThumbnailResolverOptions,
} from './sync';

// Device client
export { HttpDeviceClient, SseDecoder } from './client';
export type { DeviceClient, StatusStream, StatusStreamHandlers, FetchLike, HttpDeviceClientOptions, SseMessage } from './client';

// Payload codec
export { parseSnapshot, parseTemperature, describeStatus, jobKey } from './codec';
export type { LabelIntent } from './codec';

// Config Module
export { ConfigManager } from './config';
export {
  DEFAULT_CONFIG,
  DEFAULT_DEVICE_SETTINGS,
  DEFAULT_ENGINE_TIMINGS,
  isBackendKind,
  isThumbnailSize,
  validateDevice,
  validateTimings,
  validateConfig,
  toEngineConfig,
} from './config';

// Logging
export { createLogger, resolveLogLevel, isLogLevel, silentLogger } from './logger';
export type { Logger } from './logger';

// Types
export type * from './types';

// Errors
export * from './errors';

// Utilities
export {
  jitteredDelay,
  clamp,
  fileExists,
  expandPath,
  getDefaultConfigDir,
  formatDuration,
  formatClock,
  isValidUrl,
  normalizeUrl,
  isRecord,
} from './utils';
export type { RandomSource } from './utils';
