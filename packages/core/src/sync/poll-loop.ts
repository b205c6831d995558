import type { RefreshOutcome } from '../types';
import { describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';

export interface PollLoopOptions {
  /** One fetch-and-reconcile cycle. */
  tick: () => Promise<RefreshOutcome>;
  minIntervalMs?: number;
  maxIntervalMs?: number;
  logger?: Logger;
}

export const DEFAULT_POLL_MIN_INTERVAL = 1000;
export const DEFAULT_POLL_MAX_INTERVAL = 15000;

/**
 * Pull loop with a two-level cadence: after a good poll the next one is due
 * in `minIntervalMs`, after a failed one in `maxIntervalMs`.
 */
export class PollLoop {
  private readonly tick: () => Promise<RefreshOutcome>;
  private readonly minIntervalMs: number;
  private readonly maxIntervalMs: number;
  private readonly logger: Logger;

  private running = false;
  private inFlight = false;
  private runId = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextDelayMs: number;

  constructor(options: PollLoopOptions) {
    this.tick = options.tick;
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_POLL_MIN_INTERVAL;
    this.maxIntervalMs = options.maxIntervalMs ?? DEFAULT_POLL_MAX_INTERVAL;
    this.logger = options.logger ?? silentLogger;
    this.nextDelayMs = this.minIntervalMs;
  }

  /** Starts polling with an immediate fetch. No-op while already running. */
  start(): void {
    if (this.running) return;
    this.running = true;
    const runId = ++this.runId;
    this.logger.debug('Poll loop started');
    void this.cycle(runId);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.runId++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.debug('Poll loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  get currentIntervalMs(): number {
    return this.nextDelayMs;
  }

  /**
   * Runs one poll. A call made while another is outstanding is dropped and
   * reports `skipped`.
   */
  async refresh(): Promise<RefreshOutcome> {
    if (this.inFlight) return 'skipped';
    this.inFlight = true;
    try {
      const outcome = await this.tick();
      if (outcome === 'ok') {
        this.nextDelayMs = this.minIntervalMs;
      } else if (outcome === 'failed') {
        this.nextDelayMs = this.maxIntervalMs;
      }
      return outcome;
    } catch (error) {
      this.logger.error('Poll tick threw', describeError(error));
      this.nextDelayMs = this.maxIntervalMs;
      return 'failed';
    } finally {
      this.inFlight = false;
    }
  }

  private async cycle(runId: number): Promise<void> {
    this.timer = null;
    if (runId !== this.runId) return;
    const outcome = await this.refresh();
    if (runId !== this.runId) return;
    if (outcome === 'failed') {
      this.logger.warn(`Poll failed; next attempt in ${this.nextDelayMs}ms`);
    }
    this.timer = setTimeout(() => {
      void this.cycle(runId);
    }, this.nextDelayMs);
  }
}
