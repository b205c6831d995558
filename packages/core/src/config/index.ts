export { ConfigManager } from './manager';
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
} from './schema';
