export type BackendKind = 'odyssey' | 'nanodlp';

export type ThumbnailSize = 'Small' | 'Large';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface DeviceSettings {
  apiUrl: string;
  backend: BackendKind;
  thumbnailSize: ThumbnailSize;
  requestTimeoutMs: number;
}

export interface EngineTimings {
  pollMinIntervalMs: number;
  pollMaxIntervalMs: number;
  reconnectBaseMs: number;
  reconnectJitterMs: number;
  awaitingTimeoutMs: number;
}

export interface AppConfig {
  version: string;
  device: DeviceSettings;
  engine: EngineTimings;
  logLevel: LogLevel;
}

export interface ConfigManagerOptions {
  configDir?: string;
}

/** What the engine needs at construction time. */
export interface EngineConfig extends EngineTimings {
  /** Static per-backend capability, never probed at runtime. */
  streamingSupported: boolean;
  thumbnailSize: ThumbnailSize;
}
