export type PrintStatus = 'idle' | 'printing' | 'paused' | 'canceled';

export interface JobInfo {
  name: string;
  path: string;
  locationCategory: string;
}

export interface PhysicalPosition {
  z: number;
}

/**
 * One observation of the printer. Produced by `parseSnapshot` and frozen,
 * the derived flags are computed from `status` at parse time.
 */
export interface DeviceSnapshot {
  readonly status: PrintStatus;
  readonly isPrinting: boolean;
  readonly isPaused: boolean;
  readonly isCanceled: boolean;
  readonly isIdle: boolean;
  /** Fraction of layers done, always within [0, 1]. */
  readonly progress: number;
  readonly layerIndex: number | null;
  readonly layerCount: number | null;
  readonly elapsedSeconds: number;
  readonly physicalPosition: Readonly<PhysicalPosition>;
  readonly usedMaterialMl: number;
  readonly job: Readonly<JobInfo> | null;
  readonly curing: boolean;
  /** Device has accepted a pause that has not taken effect yet. */
  readonly pauseLatched: boolean;
  /** Device has accepted a cancel that has not taken effect yet. */
  readonly cancelLatched: boolean;
  readonly finished: boolean;
  readonly deviceMessage: string | null;
  readonly resinTemperature: number | null;
  readonly cpuTemperature: number | null;
}
