import type { DeviceSnapshot, JobInfo } from './snapshot';

export type ConnectionState = 'disconnected' | 'streaming' | 'polling';

export type SnapshotSource = 'stream' | 'poll';

export type ThumbnailState = 'unresolved' | 'resolving' | 'ready';

export interface TransitionalIntent {
  pausing: boolean;
  canceling: boolean;
}

export interface ResetHints {
  thumbnail?: Uint8Array;
  job?: JobInfo;
}

/** Read-only view handed to observers after every reconciliation. */
export interface StatusView {
  readonly snapshot: DeviceSnapshot | null;
  readonly connection: ConnectionState;
  readonly pausing: boolean;
  readonly resuming: boolean;
  readonly canceling: boolean;
  readonly label: string;
  readonly progress: number;
  readonly job: Readonly<JobInfo> | null;
  readonly awaitingSession: boolean;
  readonly sessionReady: boolean;
  readonly thumbnail: Uint8Array | null;
  readonly thumbnailState: ThumbnailState;
  readonly prevLayerSeconds: number | null;
  readonly loading: boolean;
  readonly error: string | null;
  readonly consecutiveErrors: number;
  readonly hasEverConnected: boolean;
}

export interface StatusObserver {
  onUpdate(view: StatusView): void;
}

export type Unsubscribe = () => void;

export type RefreshOutcome = 'ok' | 'failed' | 'skipped';
