import type { ThumbnailSize } from '../types';

export interface StatusStreamHandlers {
  onPayload: (payload: unknown) => void;
  /** Called once when the stream ends for any reason other than `close()`. */
  onEnd: (error: Error) => void;
}

export interface StatusStream {
  close(): void;
}

/**
 * The slice of the printer API the engine talks to. Payloads are returned
 * undecoded; the engine runs them through the snapshot codec.
 */
export interface DeviceClient {
  getStatus(): Promise<unknown>;
  /** Resolves once the push channel is open, rejects if it cannot be opened. */
  openStatusStream(handlers: StatusStreamHandlers): Promise<StatusStream>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  cancel(): Promise<void>;
  /** `null` when the device has no preview for the file. */
  getThumbnail(location: string, path: string, size: ThumbnailSize): Promise<Uint8Array | null>;
}
