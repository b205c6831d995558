import type { DeviceClient, StatusStream, StatusStreamHandlers } from '../src/client';
import type { ThumbnailSize } from '../src/types';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface PayloadOptions {
  layer?: number | null;
  layerCount?: number;
  path?: string;
  location?: string;
  extra?: Record<string, unknown>;
}

/** Device `/status` body for tests. */
export function statusPayload(status: string, options: PayloadOptions = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = { status, layer: options.layer ?? null, ...options.extra };
  if (options.path) {
    payload.print_data = {
      layer_count: options.layerCount ?? 100,
      print_time: 0,
      used_material: 0,
      file_data: { path: options.path, location_category: options.location ?? 'Local' },
    };
  }
  return payload;
}

export const JOB_PATH = '/models/cube.ctb';

export function printingPayload(layer = 10): Record<string, unknown> {
  return statusPayload('Printing', { layer, path: JOB_PATH });
}

/**
 * Scripted device. `getStatus` answers from `statusQueue` first, then
 * `status`; a queued Error rejects. Gates hold a call open until released.
 */
export class FakeDeviceClient implements DeviceClient {
  status: unknown = statusPayload('Idle');
  statusQueue: Array<unknown> = [];
  statusGate: Deferred<void> | null = null;
  statusCalls = 0;

  streamHandlers: StatusStreamHandlers | null = null;
  streamOpenError: Error | null = null;
  openCalls = 0;
  closedStreams = 0;

  thumbnail: Uint8Array | null = new Uint8Array([1, 2, 3]);
  thumbnailError: Error | null = null;
  thumbnailGate: Deferred<void> | null = null;
  thumbnailCalls: Array<{ location: string; path: string; size: ThumbnailSize }> = [];

  commandError: Error | null = null;
  commands: string[] = [];

  async getStatus(): Promise<unknown> {
    this.statusCalls++;
    if (this.statusGate) await this.statusGate.promise;
    const next = this.statusQueue.length > 0 ? this.statusQueue.shift() : this.status;
    if (next instanceof Error) throw next;
    return next;
  }

  async openStatusStream(handlers: StatusStreamHandlers): Promise<StatusStream> {
    this.openCalls++;
    if (this.streamOpenError) throw this.streamOpenError;
    this.streamHandlers = handlers;
    return {
      close: () => {
        this.closedStreams++;
      },
    };
  }

  async pause(): Promise<void> {
    this.command('pause');
  }

  async resume(): Promise<void> {
    this.command('resume');
  }

  async cancel(): Promise<void> {
    this.command('cancel');
  }

  async getThumbnail(location: string, path: string, size: ThumbnailSize): Promise<Uint8Array | null> {
    this.thumbnailCalls.push({ location, path, size });
    if (this.thumbnailGate) await this.thumbnailGate.promise;
    if (this.thumbnailError) throw this.thumbnailError;
    return this.thumbnail;
  }

  private command(name: string): void {
    this.commands.push(name);
    if (this.commandError) throw this.commandError;
  }
}
