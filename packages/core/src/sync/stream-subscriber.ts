import { EventEmitter } from 'eventemitter3';
import type { DeviceClient, StatusStream } from '../client';
import type { DeviceSnapshot, StreamSubscriberEvents } from '../types';
import { parseSnapshot } from '../codec';
import { StreamError, describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';

export interface StreamSubscriberOptions {
  client: DeviceClient;
  logger?: Logger;
}

/**
 * Owns one push subscription at a time. Decoded snapshots are emitted as
 * `snapshot`; an error or remote close is reported once as `lost` and the
 * subscription is released.
 *
 * Events that arrive while the stream is still opening are held back (latest
 * only) until the owner calls {@link StreamSubscriber.deliverPending}.
 */
export class StreamSubscriber extends EventEmitter<StreamSubscriberEvents> {
  private readonly client: DeviceClient;
  private readonly logger: Logger;
  private stream: StatusStream | null = null;
  private pending: DeviceSnapshot | null = null;
  private attemptId = 0;

  constructor(options: StreamSubscriberOptions) {
    super();
    this.client = options.client;
    this.logger = options.logger ?? silentLogger;
  }

  async subscribe(): Promise<void> {
    if (this.stream) return;

    const attempt = ++this.attemptId;
    this.pending = null;
    const stream = await this.client.openStatusStream({
      onPayload: (payload) => this.handlePayload(attempt, payload),
      onEnd: (error) => this.handleEnd(attempt, error),
    });

    if (attempt !== this.attemptId) {
      // Closed, or the stream already ended, while we were waiting for it to open.
      stream.close();
      this.pending = null;
      throw new StreamError('Subscription was closed before it became active');
    }
    this.stream = stream;
    this.logger.info('Status stream subscribed');
  }

  /** Emits the latest event received while opening, if any. */
  deliverPending(): void {
    const snapshot = this.pending;
    this.pending = null;
    if (snapshot && this.stream) {
      this.emit('snapshot', snapshot);
    }
  }

  /** Local teardown; does not emit `lost`. */
  close(): void {
    this.attemptId++;
    this.pending = null;
    if (this.stream) {
      this.stream.close();
      this.stream = null;
      this.logger.debug('Status stream closed');
    }
  }

  isActive(): boolean {
    return this.stream !== null;
  }

  private handlePayload(attempt: number, payload: unknown): void {
    if (attempt !== this.attemptId) return;
    let snapshot: DeviceSnapshot;
    try {
      snapshot = parseSnapshot(payload);
    } catch (error) {
      this.logger.warn('Dropping undecodable stream event', describeError(error));
      return;
    }
    if (!this.stream) {
      this.pending = snapshot;
      return;
    }
    this.emit('snapshot', snapshot);
  }

  private handleEnd(attempt: number, error: Error): void {
    if (attempt !== this.attemptId) return;
    this.attemptId++;
    this.pending = null;
    if (!this.stream) {
      // Still opening: subscribe() reports the failure.
      return;
    }
    this.stream.close();
    this.stream = null;
    this.logger.warn('Status stream lost', error.message);
    this.emit('lost', error);
  }
}
