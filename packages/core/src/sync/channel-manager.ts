import { EventEmitter } from 'eventemitter3';
import type { ChannelManagerEvents, ConnectionState } from '../types';
import type { PollLoop } from './poll-loop';
import type { StreamSubscriber } from './stream-subscriber';
import { describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { jitteredDelay, type RandomSource } from '../utils';

export interface ChannelManagerOptions {
  /** Static capability of the configured backend. */
  streamingSupported: boolean;
  pollLoop: PollLoop;
  subscriber: StreamSubscriber;
  reconnectBaseMs?: number;
  reconnectJitterMs?: number;
  random?: RandomSource;
  logger?: Logger;
}

export const DEFAULT_RECONNECT_BASE = 3000;
export const DEFAULT_RECONNECT_JITTER = 2000;

/**
 * Keeps exactly one channel driving updates.
 *
 *   init ──(polling-only backend)──────────────▶ polling (permanent)
 *   init ──▶ attempt stream ──ok──▶ streaming
 *                  │                   │ error / remote close
 *                  └──fail──▶ polling ◀┘  + reconnect in base + jitter
 *   polling ──reconnect ok──▶ streaming (poll loop stopped)
 */
export class ChannelManager extends EventEmitter<ChannelManagerEvents> {
  private readonly streamingSupported: boolean;
  private readonly pollLoop: PollLoop;
  private readonly subscriber: StreamSubscriber;
  private readonly reconnectBaseMs: number;
  private readonly reconnectJitterMs: number;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  private state: ConnectionState = 'disconnected';
  private started = false;
  private disposed = false;
  private connecting = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private nextReconnectAt: number | null = null;

  constructor(options: ChannelManagerOptions) {
    super();
    this.streamingSupported = options.streamingSupported;
    this.pollLoop = options.pollLoop;
    this.subscriber = options.subscriber;
    this.reconnectBaseMs = options.reconnectBaseMs ?? DEFAULT_RECONNECT_BASE;
    this.reconnectJitterMs = options.reconnectJitterMs ?? DEFAULT_RECONNECT_JITTER;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;

    this.subscriber.on('lost', (error) => this.handleStreamLost(error));
  }

  start(): void {
    if (this.started || this.disposed) return;
    this.started = true;

    if (!this.streamingSupported) {
      this.logger.info('Backend does not stream status; using polling only');
      this.enterPolling();
      return;
    }
    void this.attemptStream();
  }

  getState(): ConnectionState {
    return this.state;
  }

  getNextReconnectAt(): number | null {
    return this.nextReconnectAt;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.clearReconnect();
    this.subscriber.close();
    this.pollLoop.stop();
    this.setState('disconnected');
    this.removeAllListeners();
  }

  private async attemptStream(): Promise<void> {
    if (this.disposed || this.connecting || this.state === 'streaming') return;
    this.connecting = true;
    this.logger.debug('Attempting status stream subscription');

    try {
      await this.subscriber.subscribe();
    } catch (error) {
      this.connecting = false;
      if (this.disposed) return;
      this.logger.warn('Status stream unavailable; falling back to polling', describeError(error));
      this.fallBack();
      return;
    }

    this.connecting = false;
    if (this.disposed) {
      this.subscriber.close();
      return;
    }
    if (!this.subscriber.isActive()) {
      // Lost before we got here; the fallback already ran.
      return;
    }
    this.pollLoop.stop();
    this.setState('streaming');
    this.subscriber.deliverPending();
  }

  private handleStreamLost(error: Error): void {
    if (this.disposed) return;
    this.logger.warn('Status stream lost; falling back to polling', error.message);
    this.fallBack();
  }

  private fallBack(): void {
    this.enterPolling();
    this.scheduleReconnect();
  }

  private enterPolling(): void {
    this.pollLoop.start();
    this.setState('polling');
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.disposed) return;
    const delay = jitteredDelay(this.reconnectBaseMs, this.reconnectJitterMs, this.random);
    this.nextReconnectAt = Date.now() + delay;
    this.logger.info(`Stream reconnect scheduled in ${delay}ms`);
    this.emit('reconnect:scheduled', delay);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.nextReconnectAt = null;
      void this.attemptStream();
    }, delay);
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.nextReconnectAt = null;
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    this.state = next;
    this.emit('state:change', next);
  }
}
