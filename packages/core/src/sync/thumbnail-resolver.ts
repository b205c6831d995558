import type { DeviceClient } from '../client';
import type { JobInfo, ThumbnailSize, ThumbnailState } from '../types';
import { jobKey } from '../codec';
import { describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';

interface ThumbnailHandle {
  /** `null` matches any job (seeded from reset hints without a job). */
  key: string | null;
  state: ThumbnailState;
  bytes: Uint8Array | null;
  inflight?: Promise<void>;
}

export interface ThumbnailResolverOptions {
  client: DeviceClient;
  size?: ThumbnailSize;
  logger?: Logger;
}

/**
 * Fetches the preview image for the active job at most once per session.
 * A failed fetch still ends in `ready` (without bytes) so nothing waits on it
 * indefinitely.
 */
export class ThumbnailResolver {
  private handle: ThumbnailHandle = { key: null, state: 'unresolved', bytes: null };
  private generation = 0;
  private readonly client: DeviceClient;
  private readonly size: ThumbnailSize;
  private readonly logger: Logger;

  constructor(options: ThumbnailResolverOptions) {
    this.client = options.client;
    this.size = options.size ?? 'Large';
    this.logger = options.logger ?? silentLogger;
  }

  stateFor(job: JobInfo): ThumbnailState {
    if (this.handle.state === 'unresolved') return 'unresolved';
    if (this.handle.key === null || this.handle.key === jobKey(job)) {
      return this.handle.state;
    }
    return 'unresolved';
  }

  isReadyFor(job: JobInfo): boolean {
    return this.stateFor(job) === 'ready';
  }

  get state(): ThumbnailState {
    return this.handle.state;
  }

  get bytes(): Uint8Array | null {
    return this.handle.bytes;
  }

  /**
   * Resolves the thumbnail for `job`. Concurrent calls share the in-flight
   * fetch; once ready the handle is never fetched again for the same job.
   * Never rejects.
   */
  resolve(job: JobInfo): Promise<void> {
    const key = jobKey(job);
    const current = this.stateFor(job);
    if (current === 'ready') return Promise.resolve();
    if (current === 'resolving' && this.handle.inflight) return this.handle.inflight;

    const generation = this.generation;
    const handle: ThumbnailHandle = { key, state: 'resolving', bytes: null };
    this.handle = handle;

    handle.inflight = this.fetch(job).then((bytes) => {
      // A reset happened while fetching; the result belongs to a dead session.
      if (generation !== this.generation || this.handle !== handle) return;
      handle.bytes = bytes;
      handle.state = 'ready';
      handle.inflight = undefined;
    });
    return handle.inflight;
  }

  /** Starts a new session, optionally seeded with a thumbnail already on hand. */
  reset(seed?: { bytes?: Uint8Array; job?: JobInfo }): void {
    this.generation++;
    if (seed?.bytes) {
      this.handle = {
        key: seed.job ? jobKey(seed.job) : null,
        state: 'ready',
        bytes: seed.bytes,
      };
    } else {
      this.handle = { key: null, state: 'unresolved', bytes: null };
    }
  }

  private async fetch(job: JobInfo): Promise<Uint8Array | null> {
    try {
      const bytes = await this.client.getThumbnail(job.locationCategory, job.path, this.size);
      this.logger.debug(`Thumbnail for ${job.path}: ${bytes ? `${bytes.length} bytes` : 'none'}`);
      return bytes;
    } catch (error) {
      this.logger.warn(`Thumbnail fetch failed for ${job.path}; continuing without image`, describeError(error));
      return null;
    }
  }
}
