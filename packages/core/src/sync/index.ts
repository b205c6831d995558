export { StatusEngine, DEFAULT_ENGINE_CONFIG } from './engine';
export type { StatusEngineOptions } from './engine';
export { StatusStore, DEFAULT_AWAITING_TIMEOUT } from './status-store';
export type { StatusStoreOptions } from './status-store';
export { ChannelManager, DEFAULT_RECONNECT_BASE, DEFAULT_RECONNECT_JITTER } from './channel-manager';
export type { ChannelManagerOptions } from './channel-manager';
export { PollLoop, DEFAULT_POLL_MIN_INTERVAL, DEFAULT_POLL_MAX_INTERVAL } from './poll-loop';
export type { PollLoopOptions } from './poll-loop';
export { StreamSubscriber } from './stream-subscriber';
export type { StreamSubscriberOptions } from './stream-subscriber';
export { ThumbnailResolver } from './thumbnail-resolver';
export type { ThumbnailResolverOptions } from './thumbnail-resolver';
