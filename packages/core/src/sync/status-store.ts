import { EventEmitter } from 'eventemitter3';
import type { DeviceClient } from '../client';
import type {
  ConnectionState,
  DeviceSnapshot,
  JobInfo,
  PrintStatus,
  RefreshOutcome,
  ResetHints,
  SnapshotSource,
  StatusObserver,
  StatusStoreEvents,
  StatusView,
  TransitionalIntent,
  Unsubscribe,
} from '../types';
import type { ThumbnailResolver } from './thumbnail-resolver';
import { describeStatus, parseSnapshot } from '../codec';
import { describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';

export interface StatusStoreOptions {
  client: DeviceClient;
  thumbnails: ThumbnailResolver;
  awaitingTimeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_AWAITING_TIMEOUT = 12000;

const MAX_LAYER_SECONDS = 24 * 60 * 60;

interface AwaitingSession {
  since: number;
}

/**
 * Single point of truth for the printer view. Every snapshot, whichever
 * channel delivered it, is reconciled here and published synchronously to
 * observers once the merge is complete.
 */
export class StatusStore extends EventEmitter<StatusStoreEvents> {
  private readonly client: DeviceClient;
  private readonly thumbnails: ThumbnailResolver;
  private readonly awaitingTimeoutMs: number;
  private readonly logger: Logger;

  private snapshot: DeviceSnapshot | null = null;
  private connection: ConnectionState = 'disconnected';
  private intent: TransitionalIntent = { pausing: false, canceling: false };
  private pauseTarget: PrintStatus = 'paused';
  private hintJob: JobInfo | null = null;

  private awaiting: AwaitingSession | null = null;
  private awaitingTimer: ReturnType<typeof setTimeout> | null = null;

  private loading = true;
  private error: string | null = null;
  private consecutiveErrors = 0;
  private hasEverConnected = false;

  private lastLayer: number | null = null;
  private lastLayerAt: number | null = null;
  private prevLayerSeconds: number | null = null;

  private refreshTask: Promise<RefreshOutcome> | null = null;
  private thumbnailTask: Promise<void> | null = null;
  private disposed = false;
  private view: StatusView;

  constructor(options: StatusStoreOptions) {
    super();
    this.client = options.client;
    this.thumbnails = options.thumbnails;
    this.awaitingTimeoutMs = options.awaitingTimeoutMs ?? DEFAULT_AWAITING_TIMEOUT;
    this.logger = options.logger ?? silentLogger;
    this.view = this.buildView();
  }

  // Observation

  subscribe(observer: StatusObserver): Unsubscribe {
    const listener = (view: StatusView) => {
      try {
        observer.onUpdate(view);
      } catch (error) {
        this.logger.error('Status observer threw', describeError(error));
      }
    };
    this.on('update', listener);
    return () => {
      this.off('update', listener);
    };
  }

  getView(): StatusView {
    return this.view;
  }

  getSnapshot(): DeviceSnapshot | null {
    return this.snapshot;
  }

  getIntent(): Readonly<TransitionalIntent> {
    return { ...this.intent };
  }

  isAwaitingSession(): boolean {
    return this.awaiting !== null;
  }

  // Reconciliation

  applySnapshot(snapshot: DeviceSnapshot, source: SnapshotSource): void {
    if (this.disposed) return;

    this.mergeIntent(snapshot);
    this.evaluateBarrier(snapshot);
    this.maybeResolveThumbnail(snapshot);

    this.trackLayer(snapshot);
    this.snapshot = snapshot;
    this.loading = false;
    this.error = null;
    this.consecutiveErrors = 0;
    this.hasEverConnected = true;
    this.logger.debug(`Applied ${source} snapshot (${snapshot.status})`);

    this.publish();
  }

  /** Decodes and applies a raw payload; `false` when it was dropped. */
  ingest(payload: unknown, source: SnapshotSource): boolean {
    if (this.disposed) return false;
    let snapshot: DeviceSnapshot;
    try {
      snapshot = parseSnapshot(payload);
    } catch (error) {
      this.logger.warn(`Dropping ${source} payload`, describeError(error));
      return false;
    }
    this.applySnapshot(snapshot, source);
    return true;
  }

  /** The only writer of `connection`; fed by the channel manager. */
  setConnectionState(state: ConnectionState): void {
    if (this.disposed || this.connection === state) return;
    this.connection = state;
    this.publish();
  }

  /**
   * Fetches and reconciles one status. A call made while another is still
   * resolving is dropped (`skipped`), never queued. Never rejects.
   */
  refresh(): Promise<RefreshOutcome> {
    if (this.disposed || this.refreshTask) {
      return Promise.resolve('skipped');
    }
    const task = this.runRefresh().finally(() => {
      this.refreshTask = null;
    });
    this.refreshTask = task;
    return task;
  }

  /** Resolves once no refresh or thumbnail fetch is outstanding. */
  async whenIdle(): Promise<void> {
    while (this.refreshTask || this.thumbnailTask) {
      await Promise.all([this.refreshTask, this.thumbnailTask]);
    }
  }

  // Commands

  /** Pauses a printing job or resumes a paused one. */
  async pauseOrResume(): Promise<boolean> {
    const current = this.snapshot;
    if (this.disposed || !current || this.intent.pausing) return false;

    const resuming = current.isPaused;
    this.intent.pausing = true;
    this.pauseTarget = resuming ? 'printing' : 'paused';
    this.publish();

    try {
      if (resuming) {
        await this.client.resume();
      } else {
        await this.client.pause();
      }
      return true;
    } catch (error) {
      this.logger.error(`${resuming ? 'Resume' : 'Pause'} failed`, describeError(error));
      if (!this.disposed) {
        this.intent.pausing = false;
        this.publish();
      }
      return false;
    } finally {
      await this.refresh();
    }
  }

  /** Cancels the job. On failure the canceling flag stays up until the device settles. */
  async cancel(): Promise<boolean> {
    if (this.disposed || this.intent.canceling) return false;

    this.intent.canceling = true;
    this.publish();

    try {
      await this.client.cancel();
      return true;
    } catch (error) {
      this.logger.error('Cancel failed', describeError(error));
      return false;
    } finally {
      await this.refresh();
    }
  }

  /**
   * Forgets the previous job and waits for a new one. Hints let a caller that
   * just started a print show its file and preview before the first snapshot.
   */
  resetForNewSession(hints: ResetHints = {}): void {
    if (this.disposed) return;
    this.logger.debug('Resetting for a new session');

    this.snapshot = null;
    this.hintJob = hints.job ?? null;
    this.thumbnails.reset({ bytes: hints.thumbnail, job: hints.job });
    this.thumbnailTask = null;
    this.intent = { pausing: false, canceling: false };
    this.pauseTarget = 'paused';
    this.loading = true;
    this.error = null;
    this.lastLayer = null;
    this.lastLayerAt = null;
    this.prevLayerSeconds = null;

    this.awaiting = { since: Date.now() };
    this.clearAwaitingTimer();
    this.awaitingTimer = setTimeout(() => {
      this.awaitingTimer = null;
      if (this.disposed) return;
      this.evaluateBarrier(this.snapshot);
      this.publish();
    }, this.awaitingTimeoutMs);

    this.publish();
    void this.refresh();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.clearAwaitingTimer();
    this.connection = 'disconnected';
    this.removeAllListeners();
  }

  // Internals

  private async runRefresh(): Promise<RefreshOutcome> {
    let payload: unknown;
    try {
      payload = await this.client.getStatus();
    } catch (error) {
      if (this.disposed) return 'skipped';
      this.consecutiveErrors++;
      this.error = describeError(error);
      this.loading = false;
      this.logger.warn(`Status refresh failed (attempt ${this.consecutiveErrors})`, this.error);
      this.publish();
      return 'failed';
    }
    if (this.disposed) return 'skipped';
    return this.ingest(payload, 'poll') ? 'ok' : 'failed';
  }

  private mergeIntent(snapshot: DeviceSnapshot): void {
    if (snapshot.cancelLatched && !snapshot.isIdle) {
      this.intent.canceling = true;
    } else if (this.intent.canceling && (snapshot.isCanceled || snapshot.isIdle || snapshot.finished)) {
      this.intent.canceling = false;
    }

    if (snapshot.pauseLatched) {
      this.intent.pausing = true;
      this.pauseTarget = 'paused';
    } else if (this.intent.pausing) {
      const jobEnded = snapshot.isCanceled || snapshot.isIdle;
      if (snapshot.status === this.pauseTarget || jobEnded) {
        this.intent.pausing = false;
      }
    }
  }

  private evaluateBarrier(latest: DeviceSnapshot | null): void {
    if (!this.awaiting) return;

    const timedOut = Date.now() - this.awaiting.since >= this.awaitingTimeoutMs;
    const ready =
      latest !== null &&
      (latest.isPrinting || latest.isPaused) &&
      latest.job !== null &&
      this.thumbnails.isReadyFor(latest.job);

    if (ready || timedOut) {
      this.logger.debug(ready ? 'New session data is ready' : 'New session wait timed out');
      this.awaiting = null;
      this.clearAwaitingTimer();
    }
  }

  private maybeResolveThumbnail(snapshot: DeviceSnapshot): void {
    const job = snapshot.job;
    if (!snapshot.isPrinting || !job || this.thumbnails.stateFor(job) !== 'unresolved') {
      return;
    }

    const task: Promise<void> = this.thumbnails
      .resolve(job)
      .then(() => {
        if (this.disposed) return;
        this.evaluateBarrier(this.snapshot);
        this.publish();
      })
      .catch((error: unknown) => {
        this.logger.warn(`Thumbnail resolution failed for ${job.name}`, describeError(error));
      })
      .finally(() => {
        if (this.thumbnailTask === task) this.thumbnailTask = null;
      });
    this.thumbnailTask = task;
  }

  private trackLayer(snapshot: DeviceSnapshot): void {
    const layer = snapshot.layerIndex;
    if (layer === null) return;

    const now = Date.now();
    if (this.lastLayer === null || this.lastLayerAt === null) {
      this.lastLayer = layer;
      this.lastLayerAt = now;
      return;
    }
    if (layer === this.lastLayer) return;

    if (layer > this.lastLayer) {
      const seconds = (now - this.lastLayerAt) / 1000;
      if (seconds > 0 && seconds < MAX_LAYER_SECONDS) {
        this.prevLayerSeconds = seconds;
      }
    }
    this.lastLayer = layer;
    this.lastLayerAt = now;
  }

  private clearAwaitingTimer(): void {
    if (this.awaitingTimer) {
      clearTimeout(this.awaitingTimer);
      this.awaitingTimer = null;
    }
  }

  private publish(): void {
    if (this.disposed) return;
    this.view = this.buildView();
    this.emit('update', this.view);
  }

  private buildView(): StatusView {
    const snapshot = this.snapshot;
    const job = snapshot?.job ?? this.hintJob;
    const pausing = this.intent.pausing && this.pauseTarget === 'paused';
    const resuming = this.intent.pausing && this.pauseTarget === 'printing';
    const thumbnailState = job ? this.thumbnails.stateFor(job) : this.thumbnails.state;

    return Object.freeze({
      snapshot,
      connection: this.connection,
      pausing: this.intent.pausing,
      resuming,
      canceling: this.intent.canceling,
      label: describeStatus(snapshot, { pausing, resuming, canceling: this.intent.canceling }),
      progress: snapshot?.progress ?? 0,
      job,
      awaitingSession: this.awaiting !== null,
      sessionReady: this.awaiting === null,
      thumbnail: thumbnailState === 'ready' ? this.thumbnails.bytes : null,
      thumbnailState,
      prevLayerSeconds: this.prevLayerSeconds,
      loading: this.loading,
      error: this.error,
      consecutiveErrors: this.consecutiveErrors,
      hasEverConnected: this.hasEverConnected,
    });
  }
}
