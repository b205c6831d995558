import type { DeviceSnapshot, JobInfo, PrintStatus } from '../types';
import { ParseError } from '../errors';
import { clamp, isRecord } from '../utils';

const DEFAULT_LOCATION = 'Local';

interface StatusMapping {
  status: PrintStatus;
  pauseLatched?: boolean;
  cancelLatched?: boolean;
}

// Keys are lower-cased device status strings.
const STATUS_MAP: Record<string, StatusMapping> = {
  idle: { status: 'idle' },
  printing: { status: 'printing' },
  paused: { status: 'paused' },
  canceled: { status: 'canceled' },
  cancelled: { status: 'canceled' },
  pausing: { status: 'printing', pauseLatched: true },
  canceling: { status: 'printing', cancelLatched: true },
  cancelling: { status: 'printing', cancelLatched: true },
};

function readNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readInteger(value: unknown): number | null {
  const n = readNumber(value);
  return n === null ? null : Math.trunc(n);
}

/** Accepts numbers and strings like "24.5 °C". */
export function parseTemperature(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[^0-9+\-.eE]/g, '');
  if (cleaned === '') return null;
  const parsed = Number.parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function readFlag(value: unknown): boolean {
  return value === true || value === 'true';
}

function readString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

function readJob(fileData: unknown): JobInfo | null {
  if (!isRecord(fileData)) return null;
  const path = readString(fileData.path);
  if (!path) return null;
  const name = readString(fileData.name) ?? path.split('/').pop() ?? path;
  const locationCategory = readString(fileData.location_category) ?? DEFAULT_LOCATION;
  return Object.freeze({ name, path, locationCategory });
}

function computeProgress(raw: unknown, layer: number | null, layerCount: number | null): number {
  const explicit = readNumber(raw);
  if (explicit !== null) {
    return clamp(explicit, 0, 1);
  }
  if (layer === null || layerCount === null || layerCount <= 0) {
    return 0;
  }
  return clamp(layer / layerCount, 0, 1);
}

/**
 * Decodes a `/status` payload (poll response or stream event).
 *
 * Throws {@link ParseError} when the payload is not an object or carries no
 * recognizable `status`; callers drop the update and keep their previous
 * snapshot.
 */
export function parseSnapshot(payload: unknown): DeviceSnapshot {
  if (!isRecord(payload)) {
    throw new ParseError('Status payload must be a JSON object');
  }

  const rawStatus = readString(payload.status);
  if (rawStatus === null || rawStatus.trim() === '') {
    throw new ParseError('Status payload is missing the status field', 'status');
  }

  const mapping = STATUS_MAP[rawStatus.trim().toLowerCase()];
  if (!mapping) {
    throw new ParseError(`Unknown printer status: ${rawStatus}`, 'status');
  }

  let status = mapping.status;
  if (status === 'printing' && readFlag(payload.paused)) {
    status = 'paused';
  }

  const printData = isRecord(payload.print_data) ? payload.print_data : {};
  const physicalState = isRecord(payload.physical_state) ? payload.physical_state : {};

  const layerIndex = readInteger(payload.layer);
  const layerCount = readInteger(printData.layer_count);

  const snapshot: DeviceSnapshot = {
    status,
    isPrinting: status === 'printing',
    isPaused: status === 'paused',
    isCanceled: status === 'canceled',
    isIdle: status === 'idle',
    progress: computeProgress(payload.progress, layerIndex, layerCount),
    layerIndex,
    layerCount,
    elapsedSeconds: Math.max(0, readNumber(printData.print_time) ?? 0),
    physicalPosition: Object.freeze({ z: readNumber(physicalState.z) ?? 0 }),
    usedMaterialMl: Math.max(0, readNumber(printData.used_material) ?? 0),
    job: readJob(printData.file_data),
    curing: readFlag(physicalState.curing),
    pauseLatched: mapping.pauseLatched === true || readFlag(payload.pause_latched),
    cancelLatched: mapping.cancelLatched === true || readFlag(payload.cancel_latched),
    finished: readFlag(payload.finished),
    deviceMessage: readString(payload.device_status_message) ?? rawStatus,
    resinTemperature: parseTemperature(payload.resin_temperature ?? payload.resin),
    cpuTemperature: parseTemperature(payload.cpu_temp ?? payload.temp),
  };

  return Object.freeze(snapshot);
}

export function jobKey(job: Pick<JobInfo, 'locationCategory' | 'path'>): string {
  return `${job.locationCategory}:${job.path}`;
}

export interface LabelIntent {
  pausing: boolean;
  resuming: boolean;
  canceling: boolean;
}

/** Human-facing status label, transitional intents take precedence. */
export function describeStatus(snapshot: DeviceSnapshot | null, intent: LabelIntent): string {
  if (!snapshot) {
    return intent.canceling ? 'Canceling' : 'Unknown';
  }
  if (intent.canceling && !snapshot.isCanceled) return 'Canceling';
  if (snapshot.isCanceled) return 'Canceled';
  if (intent.resuming && snapshot.isPaused) return 'Resuming';
  if (intent.pausing && !snapshot.isPaused) return 'Pausing';
  if (snapshot.isPaused) return 'Paused';
  if (snapshot.isIdle && snapshot.layerIndex !== null) return 'Finished';
  if (snapshot.curing) return 'Curing';
  return snapshot.isPrinting ? 'Printing' : 'Idle';
}
