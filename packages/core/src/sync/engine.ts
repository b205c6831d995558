import type { DeviceClient } from '../client';
import type {
  ConnectionState,
  EngineConfig,
  RefreshOutcome,
  ResetHints,
  StatusObserver,
  StatusView,
  Unsubscribe,
} from '../types';
import { ChannelManager, DEFAULT_RECONNECT_BASE, DEFAULT_RECONNECT_JITTER } from './channel-manager';
import { PollLoop, DEFAULT_POLL_MAX_INTERVAL, DEFAULT_POLL_MIN_INTERVAL } from './poll-loop';
import { StatusStore, DEFAULT_AWAITING_TIMEOUT } from './status-store';
import { StreamSubscriber } from './stream-subscriber';
import { ThumbnailResolver } from './thumbnail-resolver';
import { EngineDisposedError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { RandomSource } from '../utils';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  streamingSupported: true,
  thumbnailSize: 'Large',
  pollMinIntervalMs: DEFAULT_POLL_MIN_INTERVAL,
  pollMaxIntervalMs: DEFAULT_POLL_MAX_INTERVAL,
  reconnectBaseMs: DEFAULT_RECONNECT_BASE,
  reconnectJitterMs: DEFAULT_RECONNECT_JITTER,
  awaitingTimeoutMs: DEFAULT_AWAITING_TIMEOUT,
};

export interface StatusEngineOptions {
  client: DeviceClient;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  random?: RandomSource;
}

/**
 * Wires the status pipeline around one device:
 * channel manager → poll loop / stream subscriber → status store → observers.
 */
export class StatusEngine {
  readonly store: StatusStore;
  readonly channels: ChannelManager;
  private readonly pollLoop: PollLoop;
  private readonly subscriber: StreamSubscriber;
  private readonly logger: Logger;
  private disposed = false;

  constructor(options: StatusEngineOptions) {
    const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.logger = options.logger ?? silentLogger;

    const thumbnails = new ThumbnailResolver({
      client: options.client,
      size: config.thumbnailSize,
      logger: this.logger.child('thumbnail'),
    });

    this.store = new StatusStore({
      client: options.client,
      thumbnails,
      awaitingTimeoutMs: config.awaitingTimeoutMs,
      logger: this.logger.child('store'),
    });

    this.pollLoop = new PollLoop({
      tick: () => this.store.refresh(),
      minIntervalMs: config.pollMinIntervalMs,
      maxIntervalMs: config.pollMaxIntervalMs,
      logger: this.logger.child('poll'),
    });

    this.subscriber = new StreamSubscriber({
      client: options.client,
      logger: this.logger.child('stream'),
    });
    this.subscriber.on('snapshot', (snapshot) => this.store.applySnapshot(snapshot, 'stream'));

    this.channels = new ChannelManager({
      streamingSupported: config.streamingSupported,
      pollLoop: this.pollLoop,
      subscriber: this.subscriber,
      reconnectBaseMs: config.reconnectBaseMs,
      reconnectJitterMs: config.reconnectJitterMs,
      random: options.random,
      logger: this.logger.child('channel'),
    });
    this.channels.on('state:change', (state) => this.store.setConnectionState(state));
  }

  start(): void {
    this.ensureUsable();
    this.channels.start();
  }

  /** Explicit refresh; shares the poll loop's in-flight guard. */
  refresh(): Promise<RefreshOutcome> {
    if (this.disposed) return Promise.resolve('skipped');
    return this.pollLoop.refresh();
  }

  pauseOrResume(): Promise<boolean> {
    this.ensureUsable();
    return this.store.pauseOrResume();
  }

  cancel(): Promise<boolean> {
    this.ensureUsable();
    return this.store.cancel();
  }

  resetForNewSession(hints?: ResetHints): void {
    this.ensureUsable();
    this.store.resetForNewSession(hints);
  }

  subscribe(observer: StatusObserver): Unsubscribe {
    return this.store.subscribe(observer);
  }

  getView(): StatusView {
    return this.store.getView();
  }

  getConnectionState(): ConnectionState {
    return this.channels.getState();
  }

  whenIdle(): Promise<void> {
    return this.store.whenIdle();
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /** Cancels every timer and subscription. Safe to call more than once. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.channels.dispose();
    this.subscriber.removeAllListeners();
    this.store.dispose();
    this.logger.debug('Status engine disposed');
  }

  private ensureUsable(): void {
    if (this.disposed) {
      throw new EngineDisposedError();
    }
  }
}
